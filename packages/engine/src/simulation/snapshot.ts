import type { Dimensions, Point, Rect } from "../core/geometry/types";
import type { ReadonlyGrid } from "../core/grid";
import type { SimulationMode } from "./modes";

/**
 * Everything a renderer needs for one frame. Read-only.
 */
export interface SimulationSnapshot {
  readonly grid: ReadonlyGrid;
  readonly world: Dimensions;
  /** Visible window in world cells */
  readonly view: Rect;
  readonly cursor: Point;
  readonly mode: SimulationMode;
  readonly modeLabel: string;
  readonly seed: bigint;
  readonly running: boolean;
  /** Steps taken since start, manual and autonomous */
  readonly generation: number;
}

/**
 * Rows of the visible window, `true` for filled cells.
 */
export function visibleCells(snapshot: SimulationSnapshot): boolean[][] {
  const { grid, view } = snapshot;
  const rows: boolean[][] = [];

  for (let y = view.y; y < view.y + view.height; y++) {
    const row: boolean[] = [];
    for (let x = view.x; x < view.x + view.width; x++) {
      row.push(grid.get(x, y) ?? false);
    }
    rows.push(row);
  }

  return rows;
}
