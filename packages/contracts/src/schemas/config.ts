import { z } from "zod";
import { CaveError } from "../types/error";
import { Err, Ok, type Result } from "../types/result";
import { SeedInputSchema } from "./seed";

// =============================================================================
// DEFAULTS
// =============================================================================

export const DEFAULT_WORLD_WIDTH = 160;
export const DEFAULT_WORLD_HEIGHT = 90;

/** Chance that an interior cell starts as wall in a random fill */
export const DEFAULT_FILL_PROBABILITY = 0.45;

/** Share of the world a drunk walk opens up */
export const DEFAULT_WALK_RATIO = 0.4;

/** Time between autonomous steps while running */
export const DEFAULT_TICK_INTERVAL_MS = 50;

// =============================================================================
// SCHEMA
// =============================================================================

export const SIMULATION_MODES = ["paint", "life", "drunk-walk"] as const;

export const SimulationModeSchema = z.enum(SIMULATION_MODES);

export type SimulationModeName = z.infer<typeof SimulationModeSchema>;

const Probability = z
  .number()
  .min(0, { error: "Must be between 0 and 1" })
  .max(1, { error: "Must be between 0 and 1" });

const WorldDimension = z
  .number()
  .int({ error: "Dimension must be an integer" })
  .min(3, { error: "World must be at least 3 cells wide and tall" })
  .max(10000);

export const SimulationConfigSchema = z.object({
  worldWidth: WorldDimension.default(DEFAULT_WORLD_WIDTH),
  worldHeight: WorldDimension.default(DEFAULT_WORLD_HEIGHT),
  fillProbability: Probability.default(DEFAULT_FILL_PROBABILITY),
  walkRatio: Probability.default(DEFAULT_WALK_RATIO),
  tickIntervalMs: z
    .number()
    .int()
    .min(1)
    .max(10000)
    .default(DEFAULT_TICK_INTERVAL_MS),
  seed: SeedInputSchema.default(0n),
  initialMode: SimulationModeSchema.default("paint"),
  maxWalkSteps: z.number().int().positive().optional(),
});

/** Raw configuration before defaults are applied */
export type SimulationConfigInput = z.input<typeof SimulationConfigSchema>;

/** Configuration with every default resolved */
export type SimulationConfig = z.output<typeof SimulationConfigSchema>;

/**
 * Validate a configuration and fill its defaults.
 * Every issue is listed in `details.issues` as `path: message`.
 */
export function validateConfig(
  input: unknown,
): Result<SimulationConfig, CaveError> {
  const parsed = SimulationConfigSchema.safeParse(input ?? {});
  if (parsed.success) {
    return Ok(parsed.data);
  }

  const issues = parsed.error.issues.map((issue) => {
    const path = issue.path.map(String).join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });

  return Err(
    CaveError.configInvalid(`Invalid configuration: ${issues.join("; ")}`, {
      issues,
    }),
  );
}
