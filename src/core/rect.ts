import type { Point, Rect } from '../types';

export function rect(x: number, y: number, width: number, height: number): Rect {
  return { x, y, width, height };
}

export function rectCenter(r: Rect): Point {
  return { x: r.x + r.width / 2, y: r.y + r.height / 2 };
}

export function rectPosition(r: Rect): Point {
  return { x: r.x, y: r.y };
}

export function rectSize(r: Rect): { width: number; height: number } {
  return { width: r.width, height: r.height };
}

export function rectsEqual(a: Rect, b: Rect, epsilon = 0): boolean {
  return (
    Math.abs(a.x - b.x) <= epsilon &&
    Math.abs(a.y - b.y) <= epsilon &&
    Math.abs(a.width - b.width) <= epsilon &&
    Math.abs(a.height - b.height) <= epsilon
  );
}

/**
 * Same covered area with non-negative width/height.
 * Resize results are never normalized implicitly: a negative extent means the
 * handle was dragged through the opposite edge, and callers may want to keep it.
 */
export function normalizeRect(r: Rect): Rect {
  const x = r.width < 0 ? r.x + r.width : r.x;
  const y = r.height < 0 ? r.y + r.height : r.y;
  return { x, y, width: Math.abs(r.width), height: Math.abs(r.height) };
}
