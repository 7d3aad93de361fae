/**
 * Testing utilities for grids and generators.
 */

import { Grid } from "./core/grid";
import { renderAscii, SIMPLE_CHARSET } from "./utils/ascii-renderer";

/**
 * Build a grid from rows of text: `#` is filled, anything else empty.
 * All rows must have the same length.
 *
 * @example
 * ```typescript
 * const blinker = gridFromRows([
 *   ".....",
 *   "..#..",
 *   "..#..",
 *   "..#..",
 *   ".....",
 * ]);
 * ```
 */
export function gridFromRows(rows: readonly string[]): Grid {
  const width = rows[0]?.length ?? 0;
  const grid = new Grid(width, rows.length);

  rows.forEach((row, y) => {
    if (row.length !== width) {
      throw new Error(`Row ${y} has length ${row.length}, expected ${width}`);
    }
    for (let x = 0; x < width; x++) {
      if (row[x] === "#") grid.set(x, y, true);
    }
  });

  return grid;
}

/**
 * Inverse of gridFromRows: `#` for filled cells, `.` for empty ones.
 */
export function gridToRows(grid: Grid): string[] {
  return renderAscii(grid, { charset: SIMPLE_CHARSET }).split("\n");
}

/**
 * Error thrown when determinism assertion fails
 */
export class DeterminismViolationError extends Error {
  constructor(public readonly renders: string[]) {
    super(
      `Non-deterministic generation detected: ${renders.length} different ` +
        "grids from the same input",
    );
    this.name = "DeterminismViolationError";
  }
}

/**
 * Run `generate` on fresh grids several times and check every result
 * is identical.
 *
 * @throws {DeterminismViolationError} If two runs differ
 *
 * @example
 * ```typescript
 * assertDeterministic(() => {
 *   const grid = new Grid(30, 20);
 *   genDrunkWalk(grid, 42n);
 *   return grid;
 * });
 * ```
 */
export function assertDeterministic(
  generate: () => Grid,
  runs: number = 3,
): void {
  const renders = new Set<string>();
  for (let i = 0; i < runs; i++) {
    renders.add(gridToRows(generate()).join("\n"));
  }
  if (renders.size > 1) {
    throw new DeterminismViolationError([...renders]);
  }
}
