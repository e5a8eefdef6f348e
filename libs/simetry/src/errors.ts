export class ConnectionAbortedError extends Error {
  constructor(message = "Simulator connection aborted") {
    super(message);
    this.name = "ConnectionAbortedError";
  }
}

/** A driver's connection attempt failed instead of retrying. */
export class DriverConnectError extends Error {
  constructor(
    readonly driverId: string,
    cause: unknown
  ) {
    super(`Driver "${driverId}" failed to connect: ${cause instanceof Error ? cause.message : String(cause)}`, {
      cause
    });
    this.name = "DriverConnectError";
  }
}

/** Every driver dropped out of the race; none is left to wait on. */
export class NoSimulatorAvailableError extends Error {
  constructor(readonly failures: DriverConnectError[]) {
    super(
      failures.length === 0
        ? "No simulator drivers configured"
        : `No simulator driver left to connect: ${failures.map((f) => f.driverId).join(", ")}`
    );
    this.name = "NoSimulatorAvailableError";
  }
}
