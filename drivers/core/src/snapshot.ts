import { serializeBasicTelemetry, type MomentSnapshotJson } from "@pitwall/schemas";
import type { Moment } from "./types";

/** Evaluates every query of a moment into its JSON form. */
export function snapshotMoment(moment: Moment): MomentSnapshotJson {
  const telemetry = moment.basicTelemetry();
  const shiftPoint = moment.shiftPoint();
  const vehicleUniqueId = moment.vehicleUniqueId();

  return {
    vehicleLeft: moment.vehicleLeft(),
    vehicleRight: moment.vehicleRight(),
    ...(telemetry ? { basicTelemetry: serializeBasicTelemetry(telemetry) } : {}),
    ...(shiftPoint ? { shiftPoint: shiftPoint.radiansPerSecond } : {}),
    flags: moment.flags(),
    ...(vehicleUniqueId !== undefined ? { vehicleUniqueId } : {}),
    ignitionOn: moment.ignitionOn(),
    starterOn: moment.starterOn()
  };
}
