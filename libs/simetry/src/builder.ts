import { noopLogger, type Simetry, type SimetryDriver, type SimetryLogger } from "@pitwall/driver-core";
import { DIRT_RALLY_2_DRIVER_ID, createDirtRally2Driver } from "@pitwall/driver-dirt-rally-2";
import { GENERIC_HTTP_DRIVER_ID, createGenericHttpDriver } from "@pitwall/driver-generic-http";
import { TRUCK_SIMULATOR_DRIVER_ID, createTruckSimulatorDriver } from "@pitwall/driver-truck-simulator";
import {
  parseConnectionConfig,
  type SimetryConnectionConfig,
  type SimetryConnectionConfigInput
} from "./config";
import { raceConnections, type ConnectionAttempt } from "./race";

export interface SimetryConnectionBuilderOptions {
  /** Backends to race. Defaults to every bundled driver. */
  drivers?: SimetryDriver[];
  logger?: SimetryLogger;
}

export function defaultDrivers(): SimetryDriver[] {
  return [createGenericHttpDriver(), createTruckSimulatorDriver(), createDirtRally2Driver()];
}

function endpointFor(driverId: string, config: SimetryConnectionConfig): string | undefined {
  switch (driverId) {
    case GENERIC_HTTP_DRIVER_ID:
      return config.genericHttpUri;
    case TRUCK_SIMULATOR_DRIVER_ID:
      return config.truckSimulatorUri;
    case DIRT_RALLY_2_DRIVER_ID:
      return config.dirtRally2Uri;
    default:
      return undefined;
  }
}

export class SimetryConnectionBuilder {
  readonly config: SimetryConnectionConfig;
  private readonly drivers: SimetryDriver[];
  private readonly logger: SimetryLogger;

  constructor(config: SimetryConnectionConfigInput = {}, options: SimetryConnectionBuilderOptions = {}) {
    this.config = parseConnectionConfig(config);
    this.drivers = options.drivers ?? defaultDrivers();
    this.logger = options.logger ?? noopLogger;
  }

  /** A new builder with `overrides` applied on top of this one's config. */
  with(overrides: SimetryConnectionConfigInput): SimetryConnectionBuilder {
    return new SimetryConnectionBuilder(
      { ...this.config, ...overrides },
      { drivers: this.drivers, logger: this.logger }
    );
  }

  /**
   * Races every driver and resolves with the first simulator that answers.
   * Waits indefinitely when nothing is running; bound it with `signal`.
   */
  connect(signal?: AbortSignal): Promise<Simetry> {
    const { retryDelayMs } = this.config;
    const logger = this.logger;
    const attempts: ConnectionAttempt[] = this.drivers.map((driver) => ({
      id: driver.id,
      start: (raceSignal) =>
        driver.connect({
          uri: endpointFor(driver.id, this.config),
          retryDelayMs,
          signal: raceSignal,
          logger
        })
    }));
    logger.debug("racing simulator drivers", { drivers: attempts.map((a) => a.id), retryDelayMs });
    return raceConnections(attempts, { signal, logger });
  }
}

/** Connects to whichever supported simulator is running. */
export function connect(
  config: SimetryConnectionConfigInput = {},
  options: SimetryConnectionBuilderOptions & { signal?: AbortSignal } = {}
): Promise<Simetry> {
  const { signal, ...builderOptions } = options;
  return new SimetryConnectionBuilder(config, builderOptions).connect(signal);
}
