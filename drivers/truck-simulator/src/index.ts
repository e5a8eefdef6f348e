import type { DriverFactory } from "@pitwall/driver-core";
import type { TruckSimulatorDriverOptions } from "./config";
import { TruckSimulatorDriver } from "./truck-simulator";

export const createTruckSimulatorDriver: DriverFactory<TruckSimulatorDriverOptions> = (options) =>
  new TruckSimulatorDriver(options);

export {
  TRUCK_SIMULATOR_DRIVER_ID,
  TruckSimulatorDriver,
  TruckSimulatorMoment,
  TruckSimulatorSimetry
} from "./truck-simulator";
export { DEFAULT_TRUCK_SIMULATOR_URI, TruckSimulatorDriverConfigSchema } from "./config";
export type { TruckSimulatorDriverConfig, TruckSimulatorDriverOptions } from "./config";
export { TruckTelemetrySchema, truckSimulatorName } from "./telemetry";
export type { TruckTelemetry } from "./telemetry";

export default createTruckSimulatorDriver;
