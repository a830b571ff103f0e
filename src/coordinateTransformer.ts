import { BoundingBox, Size } from './models/types';

export const CROP_BUFFER_PX = 10;
export const POINTS_PER_INCH = 72;

// A4 at 72 points per inch
export const FALLBACK_PAGE_SIZE: Size = { width: 595, height: 842 };

export interface PixelBounds {
  left: number;
  top: number;
  right: number;
  bottom: number;
}

/**
 * Crop rectangle in raster pixels. `left/top/width/height` is the buffered,
 * clamped region ready for `sharp().extract()`; `unbuffered` is the box as
 * converted before the buffer was applied.
 */
export interface PixelRect {
  left: number;
  top: number;
  width: number;
  height: number;
  unbuffered: PixelBounds;
  // True when the fallback page size stood in for a missing reference size
  degraded: boolean;
}

export type PixelRectResult =
  | { valid: true; rect: PixelRect }
  | { valid: false; reason: string };

export function isNormalizedBox(box: BoundingBox): boolean {
  if (box.space) {
    return box.space === 'normalized';
  }
  return [box.x, box.y, box.x + box.width, box.y + box.height].every(v => v >= 0 && v <= 1);
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

/**
 * Converts a normalized or point-space bounding box into a crop rectangle on a
 * rasterized page.
 * @param box Entity or image region box
 * @param rasterSize Size of the page raster in pixels
 * @param referencePageSize Page size the point-space box refers to
 * @param bufferPx Margin added on every side before clamping
 */
export function toPixelRect(
  box: BoundingBox,
  rasterSize: Size,
  referencePageSize?: Size,
  bufferPx: number = CROP_BUFFER_PX
): PixelRectResult {
  if (!(box.width > 0) || !(box.height > 0)) {
    return { valid: false, reason: `bounding box has non-positive size ${box.width}x${box.height}` };
  }
  if (!(rasterSize.width > 0) || !(rasterSize.height > 0)) {
    return { valid: false, reason: `page raster has non-positive size ${rasterSize.width}x${rasterSize.height}` };
  }

  let scaleX: number;
  let scaleY: number;
  let degraded = false;

  if (isNormalizedBox(box)) {
    scaleX = rasterSize.width;
    scaleY = rasterSize.height;
  } else {
    let reference = referencePageSize;
    if (!reference || !(reference.width > 0) || !(reference.height > 0)) {
      reference = FALLBACK_PAGE_SIZE;
      degraded = true;
    }
    // Single factor keeps the aspect ratio of the page
    const scale = Math.min(rasterSize.width / reference.width, rasterSize.height / reference.height);
    scaleX = scale;
    scaleY = scale;
  }

  const unbuffered: PixelBounds = {
    left: Math.round(box.x * scaleX),
    top: Math.round(box.y * scaleY),
    right: Math.round((box.x + box.width) * scaleX),
    bottom: Math.round((box.y + box.height) * scaleY)
  };

  const left = clamp(unbuffered.left - bufferPx, 0, rasterSize.width);
  const top = clamp(unbuffered.top - bufferPx, 0, rasterSize.height);
  const right = clamp(unbuffered.right + bufferPx, 0, rasterSize.width);
  const bottom = clamp(unbuffered.bottom + bufferPx, 0, rasterSize.height);

  if (right <= left || bottom <= top) {
    return {
      valid: false,
      reason: `crop rectangle (${left},${top})-(${right},${bottom}) is empty after clamping to ${rasterSize.width}x${rasterSize.height}`
    };
  }

  return {
    valid: true,
    rect: { left, top, width: right - left, height: bottom - top, unbuffered, degraded }
  };
}

/**
 * Intersection over union of two boxes in the same coordinate space.
 */
export function boxOverlap(a: BoundingBox, b: BoundingBox): number {
  const ix = Math.max(0, Math.min(a.x + a.width, b.x + b.width) - Math.max(a.x, b.x));
  const iy = Math.max(0, Math.min(a.y + a.height, b.y + b.height) - Math.max(a.y, b.y));
  const intersection = ix * iy;
  const union = a.width * a.height + b.width * b.height - intersection;
  return union > 0 ? intersection / union : 0;
}
