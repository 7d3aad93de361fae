/**
 * Core geometry types for the cave world.
 * All types are immutable value objects.
 */

/**
 * 2D point with integer coordinates
 */
export interface Point {
  readonly x: number;
  readonly y: number;
}

/**
 * Rectangle defined by position and size
 */
export interface Rect {
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
}

/**
 * Grid dimensions
 */
export interface Dimensions {
  readonly width: number;
  readonly height: number;
}

export type Direction = "up" | "down" | "left" | "right";

/**
 * Unit vectors for the four cardinal directions
 */
export const DIRECTION_VECTORS: Readonly<Record<Direction, Point>> = {
  up: { x: 0, y: -1 },
  right: { x: 1, y: 0 },
  down: { x: 0, y: 1 },
  left: { x: -1, y: 0 },
};

export const DIRECTIONS_4 = [
  DIRECTION_VECTORS.up,
  DIRECTION_VECTORS.right,
  DIRECTION_VECTORS.down,
  DIRECTION_VECTORS.left,
] as const;

export const DIRECTIONS_8 = [
  { x: -1, y: -1 },
  { x: 0, y: -1 },
  { x: 1, y: -1 },
  { x: -1, y: 0 },
  { x: 1, y: 0 },
  { x: -1, y: 1 },
  { x: 0, y: 1 },
  { x: 1, y: 1 },
] as const;

/**
 * Clamp an integer into [min, max]. When max < min the result is min.
 */
export function clamp(value: number, min: number, max: number): number {
  if (value > max) value = max;
  if (value < min) value = min;
  return value;
}
