export { SimetryConnectionBuilder, connect, defaultDrivers } from "./builder";
export type { SimetryConnectionBuilderOptions } from "./builder";
export { raceConnections } from "./race";
export type { ConnectionAttempt, RaceOptions } from "./race";
export {
  DEFAULT_RETRY_DELAY_MS,
  SimetryConnectionConfigSchema,
  loadConnectionConfigFromEnv,
  parseConnectionConfig
} from "./config";
export type { SimetryConnectionConfig, SimetryConnectionConfigInput } from "./config";
export { ConnectionAbortedError, DriverConnectError, NoSimulatorAvailableError } from "./errors";
export { createPinoLogger } from "./logger";
export type { PinoLike } from "./logger";

export { BaseMoment, BaseSimetry, moments, noopLogger, snapshotMoment } from "@pitwall/driver-core";
export type { Moment, Simetry, SimetryDriver, SimetryLogger } from "@pitwall/driver-core";
export * from "@pitwall/schemas";
