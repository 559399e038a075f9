export type Point = Readonly<{ x: number; y: number }>;

/**
 * Axis-aligned rectangle in its own (unrotated) frame.
 * Width/height may come out negative from reconstruction; see `normalizeRect`.
 */
export type Rect = Readonly<{ x: number; y: number; width: number; height: number }>;

/**
 * Shape record kept by an editor: a rect plus its rotation.
 */
export type RotatedRect = Rect &
  Readonly<{
    /** Rotation in degrees, counter-clockwise. Defaults to 0 when omitted. */
    rotation?: number;
  }>;

/**
 * Control point on a rect's bounding box.
 * `top` is the `y + height` edge and `right` the `x + width` edge of the local frame.
 */
export type Handle =
  | 'top-right'
  | 'middle-right'
  | 'bottom-right'
  | 'top-left'
  | 'middle-left'
  | 'bottom-left'
  | 'top-middle'
  | 'bottom-middle';

export const HANDLES: readonly Handle[] = [
  'top-right',
  'middle-right',
  'bottom-right',
  'top-left',
  'middle-left',
  'bottom-left',
  'top-middle',
  'bottom-middle',
];

/** Anchor points of a drag: the corner that stays put, then the one that follows the pointer. */
export type AnchorPair = readonly [fixed: Point, moving: Point];
