import { HttpUrlSchema, NonNegativeIntegerSchema, PositiveIntegerSchema } from "@pitwall/schemas";
import { z } from "zod";

export const DEFAULT_TRUCK_SIMULATOR_URI = "http://localhost:25555/api/ets2/telemetry";

export const TruckSimulatorDriverConfigSchema = z.object({
  uri: HttpUrlSchema.default(DEFAULT_TRUCK_SIMULATOR_URI),
  pollIntervalMs: NonNegativeIntegerSchema.default(16),
  requestTimeoutMs: PositiveIntegerSchema.default(2000),
  /** Failed polls are retried until none has succeeded for this long. */
  connectionLostAfterMs: PositiveIntegerSchema.default(5000)
});

export type TruckSimulatorDriverConfig = z.infer<typeof TruckSimulatorDriverConfigSchema>;
export type TruckSimulatorDriverOptions = z.input<typeof TruckSimulatorDriverConfigSchema>;
