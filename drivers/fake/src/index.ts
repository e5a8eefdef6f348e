import type { DriverFactory } from "@pitwall/driver-core";
import { FakeDriver, type FakeDriverOptions } from "./fake-driver";

export const createFakeDriver: DriverFactory<FakeDriverOptions> = (options) => new FakeDriver(options);

export { FAKE_DRIVER_ID, FakeDriver, FakeDriverConfigSchema, FakeMoment, FakeSimetry } from "./fake-driver";
export type { FakeDriverConfig, FakeDriverOptions } from "./fake-driver";

export default createFakeDriver;
