import { describe, it, expect } from 'vitest';
import type { RotatedRect } from '../types';
import { HANDLES } from '../types';
import { handlePosition } from './handles';
import { normalizeRect } from './rect';
import { resizeRect, resizeRotatedRect } from './resize';

describe('resize', () => {
  it('runs the resolver and the reconstructor in one call', () => {
    const r = { x: 0, y: 0, width: 2, height: 2 };
    expect(resizeRect(r, { x: 3, y: 3 }, 45, 'bottom-right')).toEqual({ x: 0, y: 3, width: 3, height: -1 });
  });

  it('identity drag for every handle', () => {
    const r = { x: -3, y: 0.5, width: 6, height: 2 };
    for (const h of HANDLES) {
      expect(resizeRect(r, handlePosition(r, 0, h), 0, h)).toEqual(r);
    }
  });

  it('leaves flips to the caller', () => {
    const r = { x: 0, y: 0, width: 4, height: 2 };
    const flipped = resizeRect(r, { x: -2, y: 1 }, 0, 'middle-right');
    expect(flipped).toEqual({ x: 0, y: 0, width: -2, height: 2 });
    expect(normalizeRect(flipped)).toEqual({ x: -2, y: 0, width: 2, height: 2 });
  });

  it('resizeRotatedRect reads and keeps the shape rotation', () => {
    const shape: RotatedRect = { x: 0, y: 0, width: 2, height: 2, rotation: 45 };
    expect(resizeRotatedRect(shape, { x: 3, y: 3 }, 'bottom-right')).toEqual({
      x: 0,
      y: 3,
      width: 3,
      height: -1,
      rotation: 45,
    });
  });

  it('resizeRotatedRect treats a missing rotation as 0', () => {
    const shape: RotatedRect = { x: 0, y: 0, width: 4, height: 2 };
    expect(resizeRotatedRect(shape, { x: 6, y: 3 }, 'top-right')).toEqual({
      x: 0,
      y: 0,
      width: 6,
      height: 3,
      rotation: 0,
    });
  });
});
