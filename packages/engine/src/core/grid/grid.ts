/**
 * Boolean cave grid with flat storage and double-buffered Life evolution.
 */

import { CaveError } from "@cavern/contracts";
import { DIRECTIONS_8 } from "../geometry/types";
import type { CellVisitor, MutableGrid } from "./types";

const DEV_MODE = process.env.NODE_ENV !== "production";

/**
 * Fixed-size grid of "filled" (wall) cells.
 *
 * @remarks
 * Out-of-bounds access is part of the contract, not an error:
 * `get` returns `undefined` and `set`/`toggle` do nothing. Camera and
 * walk clamping arithmetic rely on this, so do not turn it into a throw.
 *
 * Two buffers are owned for the lifetime of the grid. `stepLife` writes
 * the next generation into the scratch buffer, then swaps the two.
 */
export class Grid implements MutableGrid {
  readonly width: number;
  readonly height: number;
  private cells: Uint8Array;
  private scratch: Uint8Array;

  constructor(width: number, height: number, filled = false) {
    if (
      !Number.isInteger(width) ||
      !Number.isInteger(height) ||
      width <= 0 ||
      height <= 0
    ) {
      throw CaveError.dimensionInvalid(width, height);
    }

    this.width = width;
    this.height = height;
    this.cells = new Uint8Array(width * height);
    this.scratch = new Uint8Array(width * height);

    if (filled) {
      this.cells.fill(1);
    }
  }

  // ===========================================================================
  // BOUNDS CHECKING
  // ===========================================================================

  isInBounds(x: number, y: number): boolean {
    return (
      Number.isInteger(x) &&
      Number.isInteger(y) &&
      x >= 0 &&
      x < this.width &&
      y >= 0 &&
      y < this.height
    );
  }

  // ===========================================================================
  // CELL ACCESS
  // ===========================================================================

  /**
   * Cell value, or `undefined` when (x, y) lies outside the grid
   */
  get(x: number, y: number): boolean | undefined {
    if (!this.isInBounds(x, y)) return undefined;
    return this.cells[y * this.width + x] === 1;
  }

  /**
   * Set a cell. Silently ignored outside the grid.
   */
  set(x: number, y: number, value: boolean): void {
    if (!this.isInBounds(x, y)) {
      if (DEV_MODE) {
        console.warn(
          `Grid.set: out of bounds (${x}, ${y}) ` +
            `for grid ${this.width}x${this.height}`,
        );
      }
      return;
    }
    this.cells[y * this.width + x] = value ? 1 : 0;
  }

  /**
   * Flip a cell. Silently ignored outside the grid.
   */
  toggle(x: number, y: number): void {
    if (!this.isInBounds(x, y)) return;
    const i = y * this.width + x;
    this.cells[i] = this.cells[i] === 1 ? 0 : 1;
  }

  fill(value: boolean): void {
    this.cells.fill(value ? 1 : 0);
  }

  clear(): void {
    this.cells.fill(0);
  }

  // ===========================================================================
  // LIFE
  // ===========================================================================

  /**
   * Number of filled cells among the up-to-8 neighbours of (x, y).
   * Cells past the edge count as empty; the grid does not wrap.
   */
  countNeighbors(x: number, y: number): number {
    let count = 0;

    for (const dir of DIRECTIONS_8) {
      const nx = x + dir.x;
      const ny = y + dir.y;

      if (nx >= 0 && nx < this.width && ny >= 0 && ny < this.height) {
        if (this.cells[ny * this.width + nx] === 1) count++;
      }
    }

    return count;
  }

  /**
   * Advance one Conway generation (B3/S23).
   * Every cell reads the current buffer; the result lands in scratch,
   * and the buffers swap once the whole grid is computed.
   */
  stepLife(): void {
    const { width, height } = this;
    const current = this.cells;
    const next = this.scratch;

    for (let y = 0; y < height; y++) {
      for (let x = 0; x < width; x++) {
        const i = y * width + x;
        const neighbors = this.countNeighbors(x, y);
        const alive = current[i] === 1;

        const survives = alive && (neighbors === 2 || neighbors === 3);
        const born = !alive && neighbors === 3;
        next[i] = survives || born ? 1 : 0;
      }
    }

    this.cells = next;
    this.scratch = current;
  }

  // ===========================================================================
  // QUERIES
  // ===========================================================================

  countAlive(): number {
    let count = 0;
    for (let i = 0; i < this.cells.length; i++) {
      if (this.cells[i] === 1) count++;
    }
    return count;
  }

  forEachCell(visitor: CellVisitor): void {
    for (let y = 0; y < this.height; y++) {
      for (let x = 0; x < this.width; x++) {
        visitor(x, y, this.cells[y * this.width + x] === 1);
      }
    }
  }

  equals(other: Grid): boolean {
    if (this.width !== other.width || this.height !== other.height) {
      return false;
    }
    for (let i = 0; i < this.cells.length; i++) {
      if (this.cells[i] !== other.cells[i]) return false;
    }
    return true;
  }

  clone(): Grid {
    const copy = new Grid(this.width, this.height);
    copy.cells.set(this.cells);
    return copy;
  }
}
