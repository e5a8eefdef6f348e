import { z } from "zod";
import { FiniteNumberSchema } from "../common/scalars";
import { AngularVelocity, Velocity } from "../units";

/**
 * The handful of values nearly every sim reports: gear, speed and engine speed.
 *
 * `gear` is negative for reverse and 0 for neutral.
 */
export interface BasicTelemetry {
  gear: number;
  speed: Velocity;
  engineRotationSpeed: AngularVelocity;
  maxEngineRotationSpeed: AngularVelocity;
  pitLimiterEngaged: boolean;
  inPitLane: boolean;
}

export const GearSchema = z.number().int().min(-128).max(127);

/**
 * Wire form of {@link BasicTelemetry}. Speeds are SI numbers (m/s and rad/s).
 */
export const BasicTelemetryJsonSchema = z.object({
  gear: GearSchema.default(0),
  speed: FiniteNumberSchema.default(0),
  engineRotationSpeed: FiniteNumberSchema.default(0),
  maxEngineRotationSpeed: FiniteNumberSchema.default(0),
  pitLimiterEngaged: z.boolean().default(false),
  inPitLane: z.boolean().default(false)
});

export type BasicTelemetryJson = z.infer<typeof BasicTelemetryJsonSchema>;

export function basicTelemetryFromJson(json: BasicTelemetryJson): BasicTelemetry {
  return {
    gear: json.gear,
    speed: Velocity.fromMetersPerSecond(json.speed),
    engineRotationSpeed: AngularVelocity.fromRadiansPerSecond(json.engineRotationSpeed),
    maxEngineRotationSpeed: AngularVelocity.fromRadiansPerSecond(json.maxEngineRotationSpeed),
    pitLimiterEngaged: json.pitLimiterEngaged,
    inPitLane: json.inPitLane
  };
}

export const BasicTelemetrySchema = BasicTelemetryJsonSchema.transform(basicTelemetryFromJson);

export function serializeBasicTelemetry(telemetry: BasicTelemetry): BasicTelemetryJson {
  return {
    gear: telemetry.gear,
    speed: telemetry.speed.metersPerSecond,
    engineRotationSpeed: telemetry.engineRotationSpeed.radiansPerSecond,
    maxEngineRotationSpeed: telemetry.maxEngineRotationSpeed.radiansPerSecond,
    pitLimiterEngaged: telemetry.pitLimiterEngaged,
    inPitLane: telemetry.inPitLane
  };
}

export function parseBasicTelemetry(value: unknown): BasicTelemetry {
  return BasicTelemetrySchema.parse(value);
}

export function defaultBasicTelemetry(): BasicTelemetry {
  return {
    gear: 0,
    speed: Velocity.ZERO,
    engineRotationSpeed: AngularVelocity.ZERO,
    maxEngineRotationSpeed: AngularVelocity.ZERO,
    pitLimiterEngaged: false,
    inPitLane: false
  };
}
