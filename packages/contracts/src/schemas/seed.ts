import { z } from "zod";
import { CaveError } from "../types/error";
import { Err, Ok, type Result } from "../types/result";

/** Largest value the 64-bit seed counter can hold */
export const MAX_SEED = (1n << 64n) - 1n;

export const SeedSchema = z
  .bigint()
  .min(0n, { error: "Seed must be non-negative" })
  .max(MAX_SEED, { error: "Seed must fit in 64 bits" });

/**
 * Seed as it arrives from callers: a bigint, or a safe non-negative integer.
 */
export const SeedInputSchema = z
  .union([
    z.bigint(),
    z
      .number()
      .int({ error: "Seed must be an integer" })
      .min(0, { error: "Seed must be non-negative" })
      .max(Number.MAX_SAFE_INTEGER)
      .transform((n) => BigInt(n)),
  ])
  .pipe(SeedSchema);

export type Seed = z.infer<typeof SeedSchema>;

/**
 * Advance the seed counter, wrapping at 2^64.
 */
export function nextSeed(seed: Seed): Seed {
  return BigInt.asUintN(64, seed + 1n);
}

const DECIMAL_SEED = /^\d+$/;
const HEX_SEED = /^0x[0-9a-f]+$/i;

/**
 * Parse a seed typed by a user: decimal digits or `0x`-prefixed hex.
 */
export function parseSeed(text: string): Result<Seed, CaveError> {
  const trimmed = text.trim();
  if (!DECIMAL_SEED.test(trimmed) && !HEX_SEED.test(trimmed)) {
    return Err(
      CaveError.seedInvalid(`Seed "${text}" is not a number`, { input: text }),
    );
  }

  const parsed = SeedSchema.safeParse(BigInt(trimmed));
  if (!parsed.success) {
    return Err(
      CaveError.seedInvalid(parsed.error.issues[0]?.message ?? "Invalid seed", {
        input: text,
      }),
    );
  }
  return Ok(parsed.data);
}
