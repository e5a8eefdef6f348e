import { z } from "zod";

/**
 * The subset of the ETS2/ATS telemetry server response we read. The server
 * reports speed in km/h and engine speed in rpm.
 */
export const TruckTelemetrySchema = z.object({
  game: z.object({
    connected: z.boolean(),
    gameName: z.string().nullish(),
    paused: z.boolean().default(false)
  }),
  truck: z.object({
    id: z.string().default(""),
    make: z.string().default(""),
    model: z.string().default(""),
    speed: z.number().finite().default(0),
    engineRpm: z.number().finite().default(0),
    engineRpmMax: z.number().finite().default(0),
    displayedGear: z.number().int().default(0),
    engineOn: z.boolean().default(false),
    electricOn: z.boolean().default(true)
  })
});

export type TruckTelemetry = z.infer<typeof TruckTelemetrySchema>;

const GAME_NAMES: Record<string, string> = {
  ETS2: "Euro Truck Simulator 2",
  ATS: "American Truck Simulator"
};

export function truckSimulatorName(gameName: string | null | undefined): string {
  if (!gameName) return "Truck Simulator";
  return GAME_NAMES[gameName.toUpperCase()] ?? gameName;
}
