import { noRacingFlags, type AngularVelocity, type BasicTelemetry, type RacingFlags } from "@pitwall/schemas";
import type { Moment } from "./types";

/**
 * Base for every driver's moment. Each query returns the value used when a
 * sim does not report that datum; drivers override what their sim supplies.
 *
 * Physical states default to normal driving (ignition on, starter off, nobody
 * alongside). Data-bearing queries default to `undefined`, never to a zero
 * that could be mistaken for a measurement.
 */
export abstract class BaseMoment implements Moment {
  /** Without proximity data no blind-spot hazard is assumed. */
  vehicleLeft(): boolean {
    return false;
  }

  /** Without proximity data no blind-spot hazard is assumed. */
  vehicleRight(): boolean {
    return false;
  }

  basicTelemetry(): BasicTelemetry | undefined {
    return undefined;
  }

  /** An unknown shift point is not faked as zero. */
  shiftPoint(): AngularVelocity | undefined {
    return undefined;
  }

  flags(): RacingFlags {
    return noRacingFlags();
  }

  vehicleUniqueId(): string | undefined {
    return undefined;
  }

  /** Sims without ignition modelling behave as if the engine always runs. */
  ignitionOn(): boolean {
    return true;
  }

  /** Sims without a starter motor never crank. */
  starterOn(): boolean {
    return false;
  }
}
