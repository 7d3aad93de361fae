import { webcrypto } from "node:crypto";
import type { Seed } from "../schemas/seed";

/**
 * Unpredictable 64-bit seed for a session started without one.
 * Never call this from generation code.
 */
export function freshSeed(): Seed {
  const [high = 0, low = 0] = webcrypto.getRandomValues(new Uint32Array(2));
  return (BigInt(high) << 32n) | BigInt(low);
}
