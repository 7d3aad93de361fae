/**
 * Grid interfaces.
 */

import type { Dimensions } from "../geometry/types";

export type CellVisitor = (x: number, y: number, filled: boolean) => void;

/**
 * Read-only grid interface.
 *
 * Use this type when a function only needs to read from a grid, such as
 * a renderer drawing the visible window.
 */
export interface ReadonlyGrid extends Dimensions {
  isInBounds(x: number, y: number): boolean;
  get(x: number, y: number): boolean | undefined;
  countNeighbors(x: number, y: number): number;
  countAlive(): number;
  forEachCell(visitor: CellVisitor): void;
}

/**
 * Mutable grid interface, what generators and the controller write through.
 */
export interface MutableGrid extends ReadonlyGrid {
  set(x: number, y: number, value: boolean): void;
  toggle(x: number, y: number): void;
  fill(value: boolean): void;
  clear(): void;
  stepLife(): void;
}
