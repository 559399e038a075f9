import type { AnchorPair, Point } from '../types';
import { midpoint } from './point';

export function toRadians(deg: number): number {
  return (deg * Math.PI) / 180;
}

/**
 * Rotate `p` about `origin` by `angleDeg` degrees, counter-clockwise.
 * Non-finite inputs propagate to the result.
 */
export function rotate(p: Point, origin: Point, angleDeg: number): Point {
  const rad = toRadians(angleDeg);
  const cos = Math.cos(rad);
  const sin = Math.sin(rad);
  const dx = p.x - origin.x;
  const dy = p.y - origin.y;
  return {
    x: dx * cos - dy * sin + origin.x,
    y: dx * sin + dy * cos + origin.y,
  };
}

/**
 * Re-express two diagonal corners around a shifted rotation center.
 *
 * `cornerA` is rotated about `center`; the midpoint of that and `cornerC` becomes
 * the new center, and both corners are rotated back by `-angleDeg` about it.
 * Corners are not checked to be diagonal.
 */
export function adjustPoints(cornerA: Point, cornerC: Point, center: Point, angleDeg: number): AnchorPair {
  const rotatedA = rotate(cornerA, center, angleDeg);
  const nextCenter = midpoint(rotatedA, cornerC);
  return [rotate(rotatedA, nextCenter, -angleDeg), rotate(cornerC, nextCenter, -angleDeg)];
}
