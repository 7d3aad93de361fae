/**
 * Random fill generator
 *
 * Seals the border with walls and scatters walls over the interior
 * with an independent chance per cell.
 */

import { DEFAULT_FILL_PROBABILITY, SeededRandom } from "@cavern/contracts";
import type { MutableGrid } from "../core/grid";
import { assertUnitInterval } from "./validation";

export interface RandomFillReport {
  /** Walls placed, border included */
  readonly walls: number;
}

/**
 * Refill the grid from `seed`.
 *
 * Cells are visited row by row. Border cells are walls without drawing
 * from the generator; each interior cell draws once. The same seed,
 * dimensions and probability always give the same grid.
 *
 * @param probability - chance that an interior cell becomes wall
 */
export function regenRandom(
  grid: MutableGrid,
  seed: bigint | number,
  probability: number = DEFAULT_FILL_PROBABILITY,
): RandomFillReport {
  assertUnitInterval("probability", probability);

  const rng = new SeededRandom(seed);
  const { width, height } = grid;
  let walls = 0;

  grid.clear();

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const border = x === 0 || y === 0 || x === width - 1 || y === height - 1;
      const wall = border || rng.chance(probability);
      if (wall) {
        grid.set(x, y, true);
        walls++;
      }
    }
  }

  return { walls };
}
