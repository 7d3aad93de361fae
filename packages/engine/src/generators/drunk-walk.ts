/**
 * Drunk-walk cave carver
 *
 * Fills the world with rock and lets a random walker dig from the
 * centre until enough cells are open. The outermost ring is never dug.
 */

import { DEFAULT_WALK_RATIO, SeededRandom } from "@cavern/contracts";
import { clamp, DIRECTIONS_4 } from "../core/geometry/types";
import type { MutableGrid } from "../core/grid";
import { assertUnitInterval } from "./validation";

const DEV_MODE = process.env.NODE_ENV !== "production";

export interface DrunkWalkOptions {
  /**
   * Stop after this many moves even if the target is not reached.
   * Unset means walk until done.
   */
  readonly maxSteps?: number;
}

export interface DrunkWalkReport {
  /** round(width * height * ratio) */
  readonly requested: number;
  /** `requested` capped at the number of interior cells */
  readonly target: number;
  /** Cells carved from wall to open */
  readonly opened: number;
  /** Moves made by the walker */
  readonly steps: number;
  /** The step budget ran out before `target` was met */
  readonly exhausted: boolean;
}

/**
 * Carve a cave into `grid` by random walk.
 *
 * The walker starts at the centre pulled one cell in from every edge.
 * Each move picks a cardinal direction uniformly, saturates at the world
 * edge, then clamps back inside the 1-cell border and opens the cell it
 * lands on if it is still rock. The target is capped at the interior
 * area, so without a step budget the walk ends once every needed cell
 * has been reached.
 */
export function genDrunkWalk(
  grid: MutableGrid,
  seed: bigint | number,
  ratio: number = DEFAULT_WALK_RATIO,
  options: DrunkWalkOptions = {},
): DrunkWalkReport {
  assertUnitInterval("ratio", ratio);

  const { width, height } = grid;
  const interior = Math.max(0, width - 2) * Math.max(0, height - 2);
  const requested = Math.round(width * height * ratio);
  const target = Math.min(requested, interior);

  grid.fill(true);

  if (target === 0) {
    return { requested, target, opened: 0, steps: 0, exhausted: false };
  }

  const rng = new SeededRandom(seed);
  const maxSteps = options.maxSteps ?? Number.POSITIVE_INFINITY;

  let x = clamp(Math.floor(width / 2), 1, width - 2);
  let y = clamp(Math.floor(height / 2), 1, height - 2);
  let opened = 0;
  let steps = 0;

  while (opened < target) {
    if (steps >= maxSteps) {
      if (DEV_MODE) {
        console.warn(
          `genDrunkWalk: step budget ${maxSteps} exhausted with ` +
            `${opened}/${target} cells open`,
        );
      }
      return { requested, target, opened, steps, exhausted: true };
    }

    const dir = rng.pick(DIRECTIONS_4);
    x = clamp(clamp(x + dir.x, 0, width - 1), 1, width - 2);
    y = clamp(clamp(y + dir.y, 0, height - 1), 1, height - 2);
    steps++;

    if (grid.get(x, y) === true) {
      grid.set(x, y, false);
      opened++;
    }
  }

  return { requested, target, opened, steps, exhausted: false };
}
