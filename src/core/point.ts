import type { Point } from '../types';

export function point(x: number, y: number): Point {
  return { x, y };
}

/**
 * Component access by index: 0 is x, 1 is y.
 */
export function pointAt(p: Point, index: number): number {
  if (!Number.isInteger(index)) throw new TypeError(`Point index must be an integer, got ${index}`);
  if (index === 0) return p.x;
  if (index === 1) return p.y;
  throw new RangeError(`Point index ${index} out of range (0-1)`);
}

/** x then y, for `const [x, y] = pointToTuple(p)`. */
export function pointToTuple(p: Point): readonly [x: number, y: number] {
  return [p.x, p.y];
}

export function pointsEqual(a: Point, b: Point, epsilon = 0): boolean {
  return Math.abs(a.x - b.x) <= epsilon && Math.abs(a.y - b.y) <= epsilon;
}

export function midpoint(a: Point, b: Point): Point {
  return { x: (a.x + b.x) / 2, y: (a.y + b.y) / 2 };
}

export function distance(a: Point, b: Point): number {
  return Math.hypot(b.x - a.x, b.y - a.y);
}
