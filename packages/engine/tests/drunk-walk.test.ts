import { CaveError } from "@cavern/contracts";
import { afterEach, describe, expect, it, vi } from "vitest";
import { Grid } from "../src/core/grid";
import { genDrunkWalk } from "../src/generators";
import { assertDeterministic, gridToRows } from "../src/testing";

function borderIsWall(grid: Grid): boolean {
  for (let x = 0; x < grid.width; x++) {
    if (!grid.get(x, 0) || !grid.get(x, grid.height - 1)) return false;
  }
  for (let y = 0; y < grid.height; y++) {
    if (!grid.get(0, y) || !grid.get(grid.width - 1, y)) return false;
  }
  return true;
}

describe("genDrunkWalk", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("opens round(w*h*ratio) cells on an 8x8 grid", () => {
    const grid = new Grid(8, 8);
    const report = genDrunkWalk(grid, 1n, 0.5);

    expect(report.requested).toBe(32);
    expect(report.target).toBe(32);
    expect(report.opened).toBe(32);
    expect(report.exhausted).toBe(false);
    expect(report.steps).toBeGreaterThanOrEqual(32);
    expect(grid.countAlive()).toBe(64 - 32);
  });

  it("keeps the outer ring as wall", () => {
    for (let seed = 0n; seed < 20n; seed++) {
      const grid = new Grid(23, 13);
      genDrunkWalk(grid, seed, 0.5);
      expect(borderIsWall(grid)).toBe(true);
    }
  });

  it("starts from solid rock whatever the grid held", () => {
    const grid = new Grid(10, 10);
    genDrunkWalk(grid, 4n, 0);
    expect(grid.countAlive()).toBe(100);
  });

  it("uses a default ratio of 0.4", () => {
    const grid = new Grid(20, 15);
    const report = genDrunkWalk(grid, 9n);
    expect(report.requested).toBe(120);
    expect(report.opened).toBe(120);
  });

  it("rounds the target to the nearest cell", () => {
    // 7 * 7 * 0.25 = 12.25
    expect(genDrunkWalk(new Grid(7, 7), 1n, 0.25).target).toBe(12);
    // 10 * 5 * 0.41 = 20.5
    expect(genDrunkWalk(new Grid(10, 5), 1n, 0.41).target).toBe(21);
  });

  it("caps the target at the interior area", () => {
    const grid = new Grid(6, 6);
    const report = genDrunkWalk(grid, 3n, 1);

    expect(report.requested).toBe(36);
    expect(report.target).toBe(16);
    expect(report.opened).toBe(16);
    expect(gridToRows(grid)).toEqual([
      "######",
      "#....#",
      "#....#",
      "#....#",
      "#....#",
      "######",
    ]);
  });

  it("leaves grids without an interior solid", () => {
    for (const [w, h] of [
      [1, 1],
      [2, 9],
      [9, 2],
    ] as const) {
      const grid = new Grid(w, h);
      const report = genDrunkWalk(grid, 1n, 0.9);
      expect(report.opened).toBe(0);
      expect(report.steps).toBe(0);
      expect(grid.countAlive()).toBe(w * h);
    }
  });

  it("carves from a single interior cell", () => {
    const grid = new Grid(3, 3);
    const report = genDrunkWalk(grid, 11n, 0.5);
    expect(report.target).toBe(1);
    expect(gridToRows(grid)).toEqual(["###", "#.#", "###"]);
  });

  it("stops at the step budget and says so", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const grid = new Grid(20, 20);
    const report = genDrunkWalk(grid, 1n, 0.5, { maxSteps: 1 });

    // The first move always lands on rock
    expect(report).toEqual({
      requested: 200,
      target: 200,
      opened: 1,
      steps: 1,
      exhausted: true,
    });
    expect(grid.countAlive()).toBe(399);
    expect(warn).toHaveBeenCalledWith(
      "genDrunkWalk: step budget 1 exhausted with 1/200 cells open",
    );
  });

  it("reproduces the same cave for the same seed", () => {
    assertDeterministic(() => {
      const grid = new Grid(8, 8);
      genDrunkWalk(grid, 1n, 0.5);
      return grid;
    });
  });

  it("gives different caves across seeds", () => {
    const layouts = new Set<string>();
    for (let seed = 1n; seed <= 5n; seed++) {
      const grid = new Grid(30, 20);
      genDrunkWalk(grid, seed, 0.3);
      layouts.add(gridToRows(grid).join("\n"));
    }
    expect(layouts.size).toBeGreaterThan(1);
  });

  it.each([-0.5, 1.5, Number.NaN])("rejects ratio %s", (ratio) => {
    expect(() => genDrunkWalk(new Grid(5, 5), 1n, ratio)).toThrow(CaveError);
  });
});
