import { HostPortSchema } from "@pitwall/schemas";
import { z } from "zod";

export const DEFAULT_DIRT_RALLY_2_URI = "127.0.0.1:20777";

export const DirtRally2DriverConfigSchema = z.object({
  /** `host:port` the game sends its UDP telemetry to. */
  uri: HostPortSchema.default(DEFAULT_DIRT_RALLY_2_URI),
  /** The session ends when no packet arrives for this long. */
  dataTimeoutMs: z.number().int().positive().default(5000),
  /** Packets kept while the reader is behind; the oldest are dropped. */
  maxQueuedPackets: z.number().int().positive().default(256)
});

export type DirtRally2DriverConfig = z.infer<typeof DirtRally2DriverConfigSchema>;
export type DirtRally2DriverOptions = z.input<typeof DirtRally2DriverConfigSchema>;

export function parseHostPort(uri: string): { host: string; port: number } {
  const separator = uri.lastIndexOf(":");
  const host = uri.slice(0, separator);
  const port = Number(uri.slice(separator + 1));
  if (!host || !Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`Invalid host:port "${uri}"`);
  }
  return { host, port };
}
