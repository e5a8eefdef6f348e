export * from "./common/scalars";
export * from "./units";
export * from "./telemetry/basic-telemetry";
export * from "./telemetry/racing-flags";
export * from "./telemetry/moment-snapshot";
