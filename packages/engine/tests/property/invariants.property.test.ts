/**
 * Property-based invariant tests
 *
 * Sweep many seeds and sizes and check the structural guarantees of
 * every generator and of the Life step.
 */

import { SeededRandom } from "@cavern/contracts";
import { describe, expect, it } from "vitest";
import { Grid } from "../../src/core/grid";
import { genDrunkWalk, regenRandom } from "../../src/generators";

const SEED_COUNT = 100;

function borderIsWall(grid: Grid): boolean {
  for (let x = 0; x < grid.width; x++) {
    if (!grid.get(x, 0) || !grid.get(x, grid.height - 1)) return false;
  }
  for (let y = 0; y < grid.height; y++) {
    if (!grid.get(0, y) || !grid.get(grid.width - 1, y)) return false;
  }
  return true;
}

describe("property: generator invariants", () => {
  it("random fill always seals the border", () => {
    const sizes = new SeededRandom(1);
    const failures: number[] = [];

    for (let seed = 0; seed < SEED_COUNT; seed++) {
      const grid = new Grid(sizes.int(1, 50), sizes.int(1, 50));
      regenRandom(grid, BigInt(seed), sizes.next());
      if (!borderIsWall(grid)) failures.push(seed);
    }

    expect(failures).toEqual([]);
  });

  it("drunk walk meets its target and never touches the border", () => {
    const sizes = new SeededRandom(2);
    const failures: Array<{ seed: number; reason: string }> = [];

    for (let seed = 0; seed < SEED_COUNT; seed++) {
      // From 8x8 up the interior is over half the grid, so every ratio
      // below 0.5 is reachable
      const width = sizes.int(8, 40);
      const height = sizes.int(8, 30);
      const ratio = sizes.next() * 0.5;
      const grid = new Grid(width, height);
      const report = genDrunkWalk(grid, BigInt(seed), ratio);

      if (report.opened < Math.round(width * height * ratio)) {
        failures.push({ seed, reason: `opened ${report.opened}` });
      }
      if (grid.countAlive() !== width * height - report.opened) {
        failures.push({ seed, reason: "open count mismatch" });
      }
      if (!borderIsWall(grid)) {
        failures.push({ seed, reason: "border carved" });
      }
    }

    expect(failures).toEqual([]);
  });
});

describe("property: Life step", () => {
  it("never creates cells that a recount of the previous generation forbids", () => {
    const rng = new SeededRandom(3);

    for (let trial = 0; trial < 25; trial++) {
      const grid = new Grid(rng.int(1, 20), rng.int(1, 20));
      regenRandom(grid, BigInt(trial), 0.5);
      const before = grid.clone();

      grid.stepLife();

      grid.forEachCell((x, y, alive) => {
        const n = before.countNeighbors(x, y);
        const wasAlive = before.get(x, y) === true;
        const expected = wasAlive ? n === 2 || n === 3 : n === 3;
        expect(alive).toBe(expected);
      });
    }
  });
});
