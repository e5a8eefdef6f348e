import { DEFAULT_DIRT_RALLY_2_URI } from "@pitwall/driver-dirt-rally-2";
import { DEFAULT_GENERIC_HTTP_URI } from "@pitwall/driver-generic-http";
import { DEFAULT_TRUCK_SIMULATOR_URI } from "@pitwall/driver-truck-simulator";
import { HostPortSchema, HttpUrlSchema, PositiveIntegerSchema } from "@pitwall/schemas";
import { z } from "zod";

export const DEFAULT_RETRY_DELAY_MS = 5000;

export const SimetryConnectionConfigSchema = z.object({
  genericHttpUri: HttpUrlSchema.default(DEFAULT_GENERIC_HTTP_URI),
  truckSimulatorUri: HttpUrlSchema.default(DEFAULT_TRUCK_SIMULATOR_URI),
  dirtRally2Uri: HostPortSchema.default(DEFAULT_DIRT_RALLY_2_URI),
  /** Wait between two connection attempts of the same driver. */
  retryDelayMs: PositiveIntegerSchema.default(DEFAULT_RETRY_DELAY_MS)
});

export type SimetryConnectionConfig = Readonly<z.infer<typeof SimetryConnectionConfigSchema>>;
export type SimetryConnectionConfigInput = z.input<typeof SimetryConnectionConfigSchema>;

export function parseConnectionConfig(input: SimetryConnectionConfigInput = {}): SimetryConnectionConfig {
  return Object.freeze(SimetryConnectionConfigSchema.parse(input));
}

/**
 * Connection config from `PITWALL_*` environment variables, falling back to
 * the defaults for anything unset.
 */
export function loadConnectionConfigFromEnv(env: NodeJS.ProcessEnv = process.env): SimetryConnectionConfig {
  const retryDelay = readEnv(env, "PITWALL_RETRY_DELAY_MS");
  return parseConnectionConfig({
    genericHttpUri: readEnv(env, "PITWALL_GENERIC_HTTP_URI"),
    truckSimulatorUri: readEnv(env, "PITWALL_TRUCK_SIMULATOR_URI"),
    dirtRally2Uri: readEnv(env, "PITWALL_DIRT_RALLY_2_URI"),
    retryDelayMs: retryDelay === undefined ? undefined : Number(retryDelay)
  });
}

/** An empty variable counts as unset. */
function readEnv(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key];
  return value === undefined || value === "" ? undefined : value;
}
