import {
  clamp,
  type Dimensions,
  DIRECTION_VECTORS,
  type Direction,
  type Point,
} from "../core/geometry/types";

/**
 * Editing cursor in world space, always inside [0, w-1] x [0, h-1].
 */
export class Cursor implements Point {
  private _x = 0;
  private _y = 0;

  get x(): number {
    return this._x;
  }

  get y(): number {
    return this._y;
  }

  /**
   * Step one cell, stopping at the world edge.
   */
  move(direction: Direction, world: Dimensions): void {
    const delta = DIRECTION_VECTORS[direction];
    this.moveTo(this._x + delta.x, this._y + delta.y, world);
  }

  moveTo(x: number, y: number, world: Dimensions): void {
    this._x = clamp(Math.trunc(x), 0, world.width - 1);
    this._y = clamp(Math.trunc(y), 0, world.height - 1);
  }
}
