import type { AnchorPair, Handle, Point, Rect } from '../types';
import { HANDLES } from '../types';
import { rectCenter } from './rect';
import { rotate } from './rotate';

function assertNever(handle: never): never {
  throw new TypeError(`Unknown handle: ${String(handle)}`);
}

export function isHandle(value: unknown): value is Handle {
  return typeof value === 'string' && HANDLES.some((h) => h === value);
}

/** Handle id from an untyped source, e.g. a `data-handle` attribute. */
export function parseHandle(value: string): Handle {
  if (!isHandle(value)) throw new TypeError(`Unknown handle: ${value}`);
  return value;
}

/**
 * World position of `handle` on `r` rotated by `angleDeg` about its center.
 */
export function handlePosition(r: Rect, angleDeg: number, handle: Handle): Point {
  const left = r.x;
  const right = r.x + r.width;
  const bottom = r.y;
  const top = r.y + r.height;
  const midX = r.x + r.width / 2;
  const midY = r.y + r.height / 2;
  let local: Point;
  switch (handle) {
    case 'top-right':
      local = { x: right, y: top };
      break;
    case 'middle-right':
      local = { x: right, y: midY };
      break;
    case 'bottom-right':
      local = { x: right, y: bottom };
      break;
    case 'top-left':
      local = { x: left, y: top };
      break;
    case 'middle-left':
      local = { x: left, y: midY };
      break;
    case 'bottom-left':
      local = { x: left, y: bottom };
      break;
    case 'top-middle':
      local = { x: midX, y: top };
      break;
    case 'bottom-middle':
      local = { x: midX, y: bottom };
      break;
    default:
      return assertNever(handle);
  }
  return rotate(local, rectCenter(r), angleDeg);
}

/**
 * Fixed and moving anchors for dragging `handle` of `r` (rotated by `angleDeg`) to `target`.
 *
 * Corner handles: the opposite corner stays, the dragged corner becomes `target`.
 * Edge handles: `target` is taken into the local frame, only the axis the edge moves
 * along is read from it, and the interpolated corner is rotated back to world space.
 */
export function getAdjustedPoint(r: Rect, target: Point, angleDeg: number, handle: Handle): AnchorPair {
  const center = rectCenter(r);
  const normalC = rotate(target, center, -angleDeg);
  const right = r.x + r.width;
  const top = r.y + r.height;
  switch (handle) {
    case 'top-right':
      return [{ x: r.x, y: r.y }, target];
    case 'bottom-right':
      return [{ x: r.x, y: top }, target];
    case 'top-left':
      return [{ x: right, y: r.y }, target];
    case 'bottom-left':
      return [{ x: right, y: top }, target];
    case 'middle-right':
      return [{ x: r.x, y: r.y }, rotate({ x: normalC.x, y: top }, center, angleDeg)];
    case 'middle-left':
      return [{ x: right, y: r.y }, rotate({ x: normalC.x, y: top }, center, angleDeg)];
    case 'top-middle':
      return [{ x: r.x, y: r.y }, rotate({ x: right, y: normalC.y }, center, angleDeg)];
    case 'bottom-middle':
      return [{ x: r.x, y: top }, rotate({ x: right, y: normalC.y }, center, angleDeg)];
    default:
      return assertNever(handle);
  }
}

/**
 * Rebuild the unrotated rect from a drag's anchors. Extents are not clamped:
 * dragging past the opposite edge gives a negative width or height.
 */
export function toRect(fixed: Point, moving: Point, handle: Handle): Rect {
  switch (handle) {
    case 'top-right':
    case 'middle-right':
    case 'top-middle':
      return { x: fixed.x, y: fixed.y, width: moving.x - fixed.x, height: moving.y - fixed.y };
    case 'bottom-right': {
      const height = fixed.y - moving.y;
      return { x: fixed.x, y: fixed.y - height, width: moving.x - fixed.x, height };
    }
    case 'top-left':
    case 'middle-left': {
      const height = moving.y - fixed.y;
      return { x: moving.x, y: moving.y - height, width: fixed.x - moving.x, height };
    }
    case 'bottom-left':
      return { x: moving.x, y: moving.y, width: fixed.x - moving.x, height: fixed.y - moving.y };
    case 'bottom-middle':
      return { x: fixed.x, y: moving.y, width: moving.x - fixed.x, height: fixed.y - moving.y };
    default:
      return assertNever(handle);
  }
}
