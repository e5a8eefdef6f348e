import type { SimetryLogger } from "./types";

const noop = () => {};

export const noopLogger: SimetryLogger = {
  info: noop,
  warn: noop,
  error: noop,
  debug: noop
};
