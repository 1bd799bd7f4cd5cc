/**
 * @module mask-refinement
 * Pure pixel operations for refining candidate masks before commit:
 * brush editing and boundary adjustment.
 *
 * All functions take cropped binary bitmaps, clip their result to the image
 * and return new bitmaps (no mutation of inputs). A result with no pixel left
 * is returned as null.
 */

import type { MaskBitmap, Point, Size } from '@mezo/types';
import { cloneBitmap, createBitmap, cropToContent, subtractBitmaps, unionBitmaps } from '@mezo/core';

/** Brush mode: add paints foreground, remove paints background. */
export type BrushMode = 'add' | 'remove';

/** Configuration for a mask brush stroke. */
export interface BrushConfig {
  /** Brush radius in pixels. Rounded, minimum 1. */
  radius: number;
  /** Whether the brush adds to or removes from the mask. */
  mode: BrushMode;
}

/** Integer offsets inside a disc of radius `r`. */
function discOffsets(r: number): Array<{ dx: number; dy: number }> {
  const offsets: Array<{ dx: number; dy: number }> = [];
  for (let dy = -r; dy <= r; dy++) {
    for (let dx = -r; dx <= r; dx++) {
      if (dx * dx + dy * dy <= r * r) {
        offsets.push({ dx, dy });
      }
    }
  }
  return offsets;
}

/** Stamp centres along a polyline, at most `spacing` pixels apart. */
function strokeCentres(points: readonly Point[], spacing: number): Point[] {
  if (points.length === 1) return [points[0]];
  const centres: Point[] = [];
  for (let i = 0; i + 1 < points.length; i++) {
    const a = points[i];
    const b = points[i + 1];
    const steps = Math.max(1, Math.ceil(Math.hypot(b.x - a.x, b.y - a.y) / spacing));
    for (let s = i === 0 ? 0 : 1; s <= steps; s++) {
      centres.push({ x: a.x + ((b.x - a.x) * s) / steps, y: a.y + ((b.y - a.y) * s) / steps });
    }
  }
  return centres;
}

/**
 * Apply a brush stroke along a series of points.
 * Each stamp is a hard-edged disc; consecutive points are interpolated.
 *
 * @param bitmap - Mask to edit, or null to paint from nothing.
 * @param size - Image dimensions; the result is clipped to them.
 * @param points - Stroke path in image coordinates.
 * @returns The edited mask, or null if no pixel remains.
 */
export function applyBrushStroke(
  bitmap: MaskBitmap | null,
  size: Size,
  points: readonly Point[],
  config: BrushConfig,
): MaskBitmap | null {
  if (points.length === 0) {
    return bitmap ? cloneBitmap(bitmap) : null;
  }

  const r = Math.max(1, Math.round(config.radius));
  const centres = strokeCentres(points, Math.max(1, r / 2)).map((p) => ({
    x: Math.round(p.x),
    y: Math.round(p.y),
  }));

  let minX = Infinity;
  let minY = Infinity;
  let maxX = -Infinity;
  let maxY = -Infinity;
  for (const p of centres) {
    minX = Math.min(minX, p.x - r);
    minY = Math.min(minY, p.y - r);
    maxX = Math.max(maxX, p.x + r);
    maxY = Math.max(maxY, p.y + r);
  }
  const stroke = createBitmap({ x: minX, y: minY, width: maxX - minX + 1, height: maxY - minY + 1 });
  const offsets = discOffsets(r);

  for (const c of centres) {
    for (const { dx, dy } of offsets) {
      stroke.data[(c.y + dy - minY) * stroke.bounds.width + c.x + dx - minX] = 1;
    }
  }

  if (config.mode === 'add') {
    return cropToContent(bitmap ? unionBitmaps(bitmap, stroke) : stroke, size);
  }
  if (!bitmap) return null;
  const rest = subtractBitmaps(bitmap, stroke);
  return rest && cropToContent(rest, size);
}

/**
 * Expand or contract the mask boundary using morphological operations.
 * Positive amount = dilate (expand), negative amount = erode (contract).
 * Uses a circular structuring element.
 *
 * @param bitmap - Source mask.
 * @param size - Image dimensions; dilation stops at the image edge.
 * @param amount - Pixels to expand (positive) or contract (negative).
 * @returns The adjusted mask, or null if erosion removed every pixel.
 */
export function adjustBoundary(bitmap: MaskBitmap, size: Size, amount: number): MaskBitmap | null {
  const absAmount = Math.round(Math.abs(amount));
  if (absAmount === 0) {
    return cloneBitmap(bitmap);
  }

  const isDilate = amount > 0;
  const offsets = discOffsets(absAmount);
  const src = bitmap.bounds;

  const isSet = (x: number, y: number): boolean => {
    const lx = x - src.x;
    const ly = y - src.y;
    if (lx < 0 || ly < 0 || lx >= src.width || ly >= src.height) return false;
    return bitmap.data[ly * src.width + lx] !== 0;
  };

  // Dilation can reach `absAmount` pixels beyond the source bounds.
  const grow = isDilate ? absAmount : 0;
  const x0 = Math.max(0, src.x - grow);
  const y0 = Math.max(0, src.y - grow);
  const x1 = Math.min(size.width, src.x + src.width + grow);
  const y1 = Math.min(size.height, src.y + src.height + grow);
  if (x1 <= x0 || y1 <= y0) return null;
  const result = createBitmap({ x: x0, y: y0, width: x1 - x0, height: y1 - y0 });

  for (let y = y0; y < y1; y++) {
    for (let x = x0; x < x1; x++) {
      const hit = isDilate
        ? offsets.some(({ dx, dy }) => isSet(x + dx, y + dy))
        : offsets.every(({ dx, dy }) => isSet(x + dx, y + dy));
      if (hit) {
        result.data[(y - y0) * result.bounds.width + x - x0] = 1;
      }
    }
  }

  return cropToContent(result, size);
}
