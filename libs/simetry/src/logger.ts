import type { SimetryLogger } from "@pitwall/driver-core";
import { pino } from "pino";

type LogFn = (obj: Record<string, unknown>, msg?: string) => void;

/** The part of a pino (or Fastify) logger the adapter calls. */
export interface PinoLike {
  info: LogFn;
  warn: LogFn;
  error: LogFn;
  debug: LogFn;
}

/**
 * Adapts a pino logger to {@link SimetryLogger}. Without an argument a new
 * pino logger named "pitwall" is created at `PITWALL_LOG_LEVEL` (default info).
 */
export function createPinoLogger(base?: PinoLike): SimetryLogger {
  const logger: PinoLike = base ?? pino({ name: "pitwall", level: process.env.PITWALL_LOG_LEVEL ?? "info" });
  return {
    info: (msg, meta) => logger.info(meta ?? {}, msg),
    warn: (msg, meta) => logger.warn(meta ?? {}, msg),
    error: (msg, meta) => logger.error(meta ?? {}, msg),
    debug: (msg, meta) => logger.debug(meta ?? {}, msg)
  };
}
