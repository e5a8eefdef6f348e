import { MomentSnapshotJsonSchema, NonEmptyStringSchema } from "@pitwall/schemas";
import type { z } from "zod";

/**
 * What a generic HTTP source serves: the sim's name plus any subset of the
 * moment queries. Unit fields are SI numbers.
 *
 * ```json
 * { "name": "My Sim", "basicTelemetry": { "gear": 3, "speed": 41.2 }, "flags": { "yellow": true } }
 * ```
 */
export const GenericHttpPayloadSchema = MomentSnapshotJsonSchema.extend({
  name: NonEmptyStringSchema
});

export type GenericHttpPayload = z.infer<typeof GenericHttpPayloadSchema>;
