/**
 * ASCII Grid Renderer
 *
 * Renders a grid (or a window of it) as plain text for debugging,
 * tests and the non-interactive `--ascii` output.
 *
 * @example
 * ```typescript
 * const grid = new Grid(40, 20);
 * regenRandom(grid, 12345n);
 * console.log(renderAscii(grid));
 * ```
 */

import type { Point, Rect } from "../core/geometry/types";
import type { ReadonlyGrid } from "../core/grid";

// =============================================================================
// CONFIGURATION
// =============================================================================

export interface AsciiCharset {
  readonly wall: string;
  readonly open: string;
  readonly cursor: string;
}

/**
 * Default charset, two columns per cell so cells look square
 */
export const DEFAULT_CHARSET: AsciiCharset = {
  wall: "██",
  open: "  ",
  cursor: "[]",
};

/**
 * Simple ASCII charset (for terminals without unicode support)
 */
export const SIMPLE_CHARSET: AsciiCharset = {
  wall: "#",
  open: ".",
  cursor: "@",
};

export interface RenderOptions {
  readonly charset?: AsciiCharset;
  /** Window to draw; defaults to the whole grid */
  readonly region?: Rect;
  /** Cell drawn with the cursor character */
  readonly cursor?: Point;
}

// =============================================================================
// RENDER FUNCTIONS
// =============================================================================

/**
 * Render rows of the grid, one string per row.
 */
export function renderAsciiLines(
  grid: ReadonlyGrid,
  options: RenderOptions = {},
): string[] {
  const {
    charset = DEFAULT_CHARSET,
    region = { x: 0, y: 0, width: grid.width, height: grid.height },
    cursor,
  } = options;

  const lines: string[] = [];
  for (let y = region.y; y < region.y + region.height; y++) {
    let line = "";
    for (let x = region.x; x < region.x + region.width; x++) {
      if (cursor && cursor.x === x && cursor.y === y) {
        line += charset.cursor;
      } else {
        line += grid.get(x, y) ? charset.wall : charset.open;
      }
    }
    lines.push(line);
  }
  return lines;
}

export function renderAscii(
  grid: ReadonlyGrid,
  options: RenderOptions = {},
): string {
  return renderAsciiLines(grid, options).join("\n");
}
