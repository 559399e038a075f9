import type { Handle, Point, Rect, RotatedRect } from '../types';
import { getAdjustedPoint, toRect } from './handles';

/**
 * Drag `handle` of `r` (rotated by `angleDeg`) to `target` and return the resulting rect.
 * Does not re-center the rotation; compose with `adjustPoints` for that.
 */
export function resizeRect(r: Rect, target: Point, angleDeg: number, handle: Handle): Rect {
  const [fixed, moving] = getAdjustedPoint(r, target, angleDeg, handle);
  return toRect(fixed, moving, handle);
}

/** `resizeRect` for a shape record carrying its own rotation. */
export function resizeRotatedRect(shape: RotatedRect, target: Point, handle: Handle): RotatedRect {
  const rotation = shape.rotation ?? 0;
  return { ...resizeRect(shape, target, rotation, handle), rotation };
}
