/**
 * Seeded pseudorandom stream for the generators.
 *
 * xoshiro128++ over four 32-bit words, seeded through SplitMix32 so that
 * neighbouring counter values (0, 1, 2...) still give unrelated streams.
 * See https://prng.di.unimi.it/xoshiro128plusplus.c
 */

const GOLDEN_GAMMA = 0x9e3779b9;
const TWO_POW_32 = 0x100000000;

/** Draws discarded after seeding */
const WARMUP = 8;

/**
 * Fold a seed into 32 bits. The seed is taken as a 64-bit counter value
 * (numbers truncated, negatives wrapped) and its high word is XORed into
 * its low word, so `n` and `BigInt(n)` always give the same stream.
 * Non-finite numbers fold to 0.
 */
export function foldSeed(seed: number | bigint): number {
  const wide =
    typeof seed === "bigint"
      ? seed
      : Number.isFinite(seed)
        ? BigInt(Math.trunc(seed))
        : 0n;
  const counter = BigInt.asUintN(64, wide);
  return Number(BigInt.asUintN(32, counter ^ (counter >> 32n)));
}

/** Saved generator state, one entry per 32-bit word */
export type RngState = readonly [number, number, number, number];

export class SeededRandom {
  private readonly words = new Uint32Array(4);

  constructor(seed: number | bigint) {
    let z = foldSeed(seed);
    for (let i = 0; i < 4; i++) {
      z = (z + GOLDEN_GAMMA) >>> 0;
      let t = Math.imul(z ^ (z >>> 16), 0x21f0aaad);
      t = Math.imul(t ^ (t >>> 15), 0x735a2d97);
      this.words[i] = t ^ (t >>> 15);
    }

    // An all-zero state would only ever produce zeros
    if (this.words.every((word) => word === 0)) this.words[0] = 1;

    for (let i = 0; i < WARMUP; i++) this.nextWord();
  }

  /**
   * Next raw 32-bit output.
   */
  nextWord(): number {
    const w = this.words;
    const [a = 0, b = 0, c = 0, d = 0] = w;

    const out = (rotateLeft((a + d) >>> 0, 7) + a) >>> 0;

    const c1 = c ^ a;
    const d1 = d ^ b;
    w[0] = a ^ d1;
    w[1] = b ^ c1;
    w[2] = c1 ^ (b << 9);
    w[3] = rotateLeft(d1, 11);

    return out;
  }

  /** Uniform double in [0, 1) */
  next(): number {
    return this.nextWord() / TWO_POW_32;
  }

  /** Uniform integer in [min, max], both ends included */
  int(min: number, max: number): number {
    return min + Math.floor(this.next() * (max - min + 1));
  }

  /**
   * Uniformly chosen element; undefined only for an empty list.
   */
  pick<T>(items: readonly [T, ...T[]]): T;
  pick<T>(items: readonly T[]): T | undefined;
  pick<T>(items: readonly T[]): T | undefined {
    if (items.length === 0) return undefined;
    return items[this.int(0, items.length - 1)];
  }

  /** `true` with probability `p` */
  chance(p: number): boolean {
    return this.next() < p;
  }

  save(): RngState {
    const [a = 0, b = 0, c = 0, d = 0] = this.words;
    return [a, b, c, d];
  }

  restore(state: RngState): void {
    this.words.set(state);
  }
}

function rotateLeft(x: number, k: number): number {
  return ((x << k) | (x >>> (32 - k))) >>> 0;
}
