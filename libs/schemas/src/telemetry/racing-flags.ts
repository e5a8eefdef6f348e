import { z } from "zod";

export const RACING_FLAG_NAMES = [
  "green",
  "yellow",
  "caution",
  "blue",
  "white",
  "black",
  "meatball",
  "red",
  "checkered"
] as const;

export type RacingFlagName = (typeof RACING_FLAG_NAMES)[number];

export const RacingFlagsSchema = z.object({
  green: z.boolean().default(false),
  yellow: z.boolean().default(false),
  caution: z.boolean().default(false),
  blue: z.boolean().default(false),
  white: z.boolean().default(false),
  black: z.boolean().default(false),
  meatball: z.boolean().default(false),
  red: z.boolean().default(false),
  checkered: z.boolean().default(false)
});

export type RacingFlags = z.infer<typeof RacingFlagsSchema>;

/** No flag shown. */
export function noRacingFlags(): RacingFlags {
  return RacingFlagsSchema.parse({});
}

export function activeRacingFlags(flags: RacingFlags): RacingFlagName[] {
  return RACING_FLAG_NAMES.filter((name) => flags[name]);
}
