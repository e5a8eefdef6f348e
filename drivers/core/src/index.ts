export type {
  DriverConnectOptions,
  DriverFactory,
  Moment,
  Simetry,
  SimetryDriver,
  SimetryLogger
} from "./types";
export { BaseMoment } from "./moment";
export { BaseSimetry } from "./simetry";
export { HttpPollingSimetry, fetchJson } from "./http";
export type { FetchJsonOptions, HttpPollingOptions, PayloadSchema } from "./http";
export { retryUntilConnected } from "./retry";
export type { RetryOptions } from "./retry";
export { linkSignal, sleep } from "./signals";
export type { LinkedSignal } from "./signals";
export { noopLogger } from "./logger";
export { moments } from "./moments";
export { snapshotMoment } from "./snapshot";
