import type { DriverFactory } from "@pitwall/driver-core";
import type { DirtRally2DriverOptions } from "./config";
import { DirtRally2Driver } from "./dirt-rally-2";

export const createDirtRally2Driver: DriverFactory<DirtRally2DriverOptions> = (options) =>
  new DirtRally2Driver(options);

export { DIRT_RALLY_2_DRIVER_ID, DirtRally2Driver, DirtRally2Moment, DirtRally2Simetry } from "./dirt-rally-2";
export { DEFAULT_DIRT_RALLY_2_URI, DirtRally2DriverConfigSchema, parseHostPort } from "./config";
export type { DirtRally2DriverConfig, DirtRally2DriverOptions } from "./config";
export { DIRT_RALLY_2_PACKET_SIZE, decodePacket } from "./packet";
export type { DirtRally2Packet } from "./packet";

export default createDirtRally2Driver;
