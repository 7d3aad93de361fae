/**
 * Conway step on a bounded grid
 */

import { describe, expect, it } from "vitest";
import { Grid } from "../src/core/grid";
import { gridFromRows, gridToRows } from "../src/testing";

describe("Grid.stepLife", () => {
  it("leaves an empty grid empty", () => {
    const grid = new Grid(12, 9);
    grid.stepLife();
    expect(grid.countAlive()).toBe(0);
  });

  it("keeps a 2x2 block stable", () => {
    const rows = ["....", ".##.", ".##.", "...."];
    const grid = gridFromRows(rows);
    grid.stepLife();
    expect(gridToRows(grid)).toEqual(rows);
  });

  it("oscillates a blinker with period 2", () => {
    const vertical = [".....", "..#..", "..#..", "..#..", "....."];
    const horizontal = [".....", ".....", ".###.", ".....", "....."];
    const grid = gridFromRows(vertical);

    grid.stepLife();
    expect(gridToRows(grid)).toEqual(horizontal);

    grid.stepLife();
    expect(gridToRows(grid)).toEqual(vertical);
  });

  it("evolves a lone 3x3 block into a ring", () => {
    const grid = gridFromRows([
      ".......",
      ".......",
      "..###..",
      "..###..",
      "..###..",
      ".......",
      ".......",
    ]);

    grid.stepLife();

    expect(gridToRows(grid)).toEqual([
      ".......",
      "...#...",
      "..#.#..",
      ".#...#.",
      "..#.#..",
      "...#...",
      ".......",
    ]);
  });

  it("counts truthfully fewer neighbors for a block against the corner", () => {
    const grid = gridFromRows([
      "###..",
      "###..",
      "###..",
      ".....",
      ".....",
    ]);

    grid.stepLife();

    // An unbounded grid would also give births at (1, -1) and (-1, 1)
    expect(gridToRows(grid)).toEqual([
      "#.#..",
      "...#.",
      "#.#..",
      ".#...",
      ".....",
    ]);
  });

  it("keeps only the corners of a grid that is entirely alive", () => {
    const grid = new Grid(3, 3, true);
    grid.stepLife();
    // With wrapping every cell would see 8 neighbors and die
    expect(gridToRows(grid)).toEqual(["#.#", "...", "#.#"]);
  });

  it("evaluates every cell against the same generation", () => {
    // Sequential in-place updates would let the first births feed later counts
    const grid = gridFromRows(["#.#", "...", "..#"]);
    grid.stepLife();
    expect(gridToRows(grid)).toEqual(["...", ".#.", "..."]);
  });

  it("moves a glider one cell diagonally every four generations", () => {
    const grid = gridFromRows([
      ".#......",
      "..#.....",
      "###.....",
      "........",
      "........",
      "........",
    ]);

    for (let i = 0; i < 4; i++) grid.stepLife();

    expect(gridToRows(grid)).toEqual([
      "........",
      "..#.....",
      "...#....",
      ".###....",
      "........",
      "........",
    ]);
  });
});
