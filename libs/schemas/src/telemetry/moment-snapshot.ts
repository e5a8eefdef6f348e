import { z } from "zod";
import { FiniteNumberSchema } from "../common/scalars";
import { BasicTelemetryJsonSchema } from "./basic-telemetry";
import { RacingFlagsSchema } from "./racing-flags";

/**
 * JSON form of a single telemetry reading. Missing fields take the same
 * defaults a sim without that datum reports.
 */
export const MomentSnapshotJsonSchema = z.object({
  vehicleLeft: z.boolean().default(false),
  vehicleRight: z.boolean().default(false),
  basicTelemetry: BasicTelemetryJsonSchema.optional(),
  /** rad/s */
  shiftPoint: FiniteNumberSchema.optional(),
  flags: RacingFlagsSchema.default({}),
  vehicleUniqueId: z.string().min(1).optional(),
  ignitionOn: z.boolean().default(true),
  starterOn: z.boolean().default(false)
});

export type MomentSnapshotJson = z.infer<typeof MomentSnapshotJsonSchema>;
