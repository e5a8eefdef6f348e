import { HttpUrlSchema, NonNegativeIntegerSchema, PositiveIntegerSchema } from "@pitwall/schemas";
import { z } from "zod";

export const DEFAULT_GENERIC_HTTP_URI = "http://localhost:25055/";

export const GenericHttpDriverConfigSchema = z.object({
  uri: HttpUrlSchema.default(DEFAULT_GENERIC_HTTP_URI),
  pollIntervalMs: NonNegativeIntegerSchema.default(16),
  requestTimeoutMs: PositiveIntegerSchema.default(2000),
  /** Failed polls are retried until none has succeeded for this long. */
  connectionLostAfterMs: PositiveIntegerSchema.default(5000)
});

export type GenericHttpDriverConfig = z.infer<typeof GenericHttpDriverConfigSchema>;
export type GenericHttpDriverOptions = z.input<typeof GenericHttpDriverConfigSchema>;
