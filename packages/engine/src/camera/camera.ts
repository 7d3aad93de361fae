import {
  clamp,
  type Dimensions,
  type Point,
  type Rect,
} from "../core/geometry/types";

/**
 * Scroll one axis of the camera so `cursor` stays visible.
 *
 * Moves the origin to the cursor when it is before the window, or so
 * the cursor sits on the last visible cell when it is past the window,
 * then clamps to [0, world - view]. A view as large as the world pins
 * the origin to 0.
 */
export function followAxis(
  cursor: number,
  origin: number,
  view: number,
  world: number,
): number {
  if (view >= world) return 0;

  if (cursor < origin) {
    origin = cursor;
  } else if (cursor >= origin + view) {
    origin = cursor + 1 - view;
  }

  return clamp(origin, 0, world - view);
}

/**
 * Window onto the world, in world cells.
 *
 * A zero-sized viewport means the renderer has not reported its size
 * yet; `follow` leaves the origin alone until it has.
 */
export class Camera {
  private _x = 0;
  private _y = 0;
  private _viewWidth = 0;
  private _viewHeight = 0;

  get x(): number {
    return this._x;
  }

  get y(): number {
    return this._y;
  }

  get viewWidth(): number {
    return this._viewWidth;
  }

  get viewHeight(): number {
    return this._viewHeight;
  }

  get initialized(): boolean {
    return this._viewWidth > 0 && this._viewHeight > 0;
  }

  /**
   * Set the viewport size, shrunk to the world where it is larger,
   * and pull the origin back inside the world.
   */
  resize(viewWidth: number, viewHeight: number, world: Dimensions): void {
    this._viewWidth = clamp(Math.floor(viewWidth), 0, world.width);
    this._viewHeight = clamp(Math.floor(viewHeight), 0, world.height);
    this.clampToWorld(world);
  }

  follow(cursor: Point, world: Dimensions): void {
    if (!this.initialized) return;
    this._x = followAxis(cursor.x, this._x, this._viewWidth, world.width);
    this._y = followAxis(cursor.y, this._y, this._viewHeight, world.height);
  }

  /**
   * Put `point` in the middle of the viewport, as far as the world allows.
   */
  centerOn(point: Point, world: Dimensions): void {
    this._x = point.x - Math.floor(this._viewWidth / 2);
    this._y = point.y - Math.floor(this._viewHeight / 2);
    this.clampToWorld(world);
  }

  visibleRect(): Rect {
    return {
      x: this._x,
      y: this._y,
      width: this._viewWidth,
      height: this._viewHeight,
    };
  }

  private clampToWorld(world: Dimensions): void {
    this._x = clamp(this._x, 0, Math.max(0, world.width - this._viewWidth));
    this._y = clamp(this._y, 0, Math.max(0, world.height - this._viewHeight));
  }
}
