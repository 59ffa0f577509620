import type { Rect, Size } from '../types';

export interface CropRect {
  sx: number;
  sy: number;
  sw: number;
  sh: number;
}

/**
 * Source region to draw so the image covers `target` completely, cropping the
 * overflow evenly from both sides of the longer axis.
 */
export function getCoverCrop(source: Size, target: Size): CropRect {
  if (source.width <= 0 || source.height <= 0 || target.width <= 0 || target.height <= 0) {
    return { sx: 0, sy: 0, sw: source.width, sh: source.height };
  }
  const sourceRatio = source.width / source.height;
  const targetRatio = target.width / target.height;

  if (sourceRatio > targetRatio) {
    const sw = source.height * targetRatio;
    return { sx: (source.width - sw) / 2, sy: 0, sw, sh: source.height };
  }
  const sh = source.width / targetRatio;
  return { sx: 0, sy: (source.height - sh) / 2, sw: source.width, sh };
}

export function expandRect(rect: Rect, amount: number): Rect {
  return {
    x: rect.x - amount,
    y: rect.y - amount,
    width: rect.width + amount * 2,
    height: rect.height + amount * 2
  };
}

// Absorbs float noise such as 427.99999999999997 before snapping to pixels.
const SNAP_EPSILON = 1e-6;

export function roundRectOutward(rect: Rect): Rect {
  const x = Math.floor(rect.x + SNAP_EPSILON);
  const y = Math.floor(rect.y + SNAP_EPSILON);
  return {
    x,
    y,
    width: Math.ceil(rect.x + rect.width - SNAP_EPSILON) - x,
    height: Math.ceil(rect.y + rect.height - SNAP_EPSILON) - y
  };
}

/** Intersection of `rect` with `bounds` shrunk by `margin` on every side. */
export function clampRect(rect: Rect, bounds: Size, margin = 0): Rect {
  const left = Math.max(rect.x, margin);
  const top = Math.max(rect.y, margin);
  const right = Math.min(rect.x + rect.width, bounds.width - margin);
  const bottom = Math.min(rect.y + rect.height, bounds.height - margin);
  return {
    x: left,
    y: top,
    width: right - left,
    height: bottom - top
  };
}
