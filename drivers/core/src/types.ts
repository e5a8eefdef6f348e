import type { AngularVelocity, BasicTelemetry, RacingFlags } from "@pitwall/schemas";

/**
 * One reading of telemetry from a sim.
 *
 * If a sim does not support certain data, a suitable default is returned
 * instead; see {@link BaseMoment} for the defaults and why they were chosen.
 */
export interface Moment {
  /** Whether another vehicle is alongside on the driver's left. */
  vehicleLeft(): boolean;
  /** Whether another vehicle is alongside on the driver's right. */
  vehicleRight(): boolean;
  basicTelemetry(): BasicTelemetry | undefined;
  /** Engine speed at which the driver should shift up. */
  shiftPoint(): AngularVelocity | undefined;
  flags(): RacingFlags;
  /**
   * ID that uniquely identifies the current vehicle make and model.
   *
   * Use this to provide behavior for a specific vehicle.
   */
  vehicleUniqueId(): string | undefined;
  ignitionOn(): boolean;
  starterOn(): boolean;
}

/**
 * A live connection to one sim.
 */
export interface Simetry {
  /** Name of the sim this session is connected to. */
  readonly name: string;

  /**
   * Waits for the next reading from the sim.
   *
   * `undefined` means the connection is gone for good, similar to the end of
   * an iterator. Every later call also resolves `undefined`.
   */
  nextMoment(): Promise<Moment | undefined>;

  /** Releases the transport. Safe to call more than once. */
  close(): Promise<void>;
}

export interface SimetryLogger {
  info: (msg: string, meta?: Record<string, unknown>) => void;
  warn: (msg: string, meta?: Record<string, unknown>) => void;
  error: (msg: string, meta?: Record<string, unknown>) => void;
  debug: (msg: string, meta?: Record<string, unknown>) => void;
}

export interface DriverConnectOptions {
  /** Endpoint override for sims reachable over the network. */
  uri?: string;
  /** Delay between attempts while the sim is not reachable. */
  retryDelayMs: number;
  /** Aborted when another sim won the race or the caller gave up. */
  signal: AbortSignal;
  logger: SimetryLogger;
}

/**
 * A backend for one sim (or family of sims).
 *
 * `connect` keeps retrying every `retryDelayMs` until the sim answers. It only
 * rejects when `signal` aborts, with the signal's reason, after releasing
 * anything it had opened.
 */
export interface SimetryDriver {
  readonly id: string;
  connect(options: DriverConnectOptions): Promise<Simetry>;
}

export type DriverFactory<TOptions = Record<string, unknown>> = (options?: TOptions) => SimetryDriver;
