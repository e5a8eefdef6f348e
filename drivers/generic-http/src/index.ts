import type { DriverFactory } from "@pitwall/driver-core";
import type { GenericHttpDriverOptions } from "./config";
import { GenericHttpDriver } from "./generic-http";

export const createGenericHttpDriver: DriverFactory<GenericHttpDriverOptions> = (options) =>
  new GenericHttpDriver(options);

export { GENERIC_HTTP_DRIVER_ID, GenericHttpDriver, GenericHttpMoment, GenericHttpSimetry } from "./generic-http";
export { DEFAULT_GENERIC_HTTP_URI, GenericHttpDriverConfigSchema } from "./config";
export type { GenericHttpDriverConfig, GenericHttpDriverOptions } from "./config";
export { GenericHttpPayloadSchema } from "./payload";
export type { GenericHttpPayload } from "./payload";

export default createGenericHttpDriver;
