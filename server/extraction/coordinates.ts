/**
 * Unit conversion between PDF point space and raster pixel space.
 *
 * Every integer pixel value in a response (page size and all four box edges)
 * is produced by `convert`, so the same scale and the same truncation apply
 * to geometry and words alike.
 */

import type { BBox } from "@shared/schema";

export const POINTS_PER_INCH = 72;

/**
 * Ratio between two rasterizations of the same page.
 */
export function scale(nativeDpi: number, targetDpi: number): number {
  return targetDpi / nativeDpi;
}

/**
 * Ratio from point space to pixels at `dpi`.
 */
export function pointScale(dpi: number): number {
  return scale(POINTS_PER_INCH, dpi);
}

/**
 * Convert a length measured at `fromPerInch` units per inch to
 * `toPerInch`, truncated toward zero.
 */
export function convert(value: number, fromPerInch: number, toPerInch: number): number {
  // Multiply first: 612 * 150 / 72 is exactly 1275, 612 * (150 / 72) is not.
  return Math.trunc((value * toPerInch) / fromPerInch) || 0;
}

export function toPixels(valuePts: number, targetDpi: number): number {
  return convert(valuePts, POINTS_PER_INCH, targetDpi);
}

export function rescale(valuePx: number, nativeDpi: number, targetDpi: number): number {
  return convert(valuePx, nativeDpi, targetDpi);
}

/**
 * Map a box whose edges are in point space (top-left origin) to pixels.
 */
export function pointBoxToPixels(box: readonly [number, number, number, number], targetDpi: number): BBox {
  const [x0, y0, x1, y1] = box;
  return [
    toPixels(x0, targetDpi),
    toPixels(y0, targetDpi),
    toPixels(x1, targetDpi),
    toPixels(y1, targetDpi),
  ];
}

export function rescaleBox(box: readonly [number, number, number, number], nativeDpi: number, targetDpi: number): BBox {
  if (nativeDpi === targetDpi) {
    return [box[0], box[1], box[2], box[3]];
  }
  const [x0, y0, x1, y1] = box;
  return [
    rescale(x0, nativeDpi, targetDpi),
    rescale(y0, nativeDpi, targetDpi),
    rescale(x1, nativeDpi, targetDpi),
    rescale(y1, nativeDpi, targetDpi),
  ];
}
