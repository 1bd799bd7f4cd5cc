/**
 * @module mask-geometry
 * Pure operations on cropped binary masks ({@link MaskBitmap}).
 *
 * A bitmap stores one byte per pixel of its bounding box (1 = set, 0 = clear)
 * in image coordinates. Functions never mutate their inputs.
 */

import type { MaskBitmap, Point, Rect, Size } from '@mezo/types';
import { InvalidMaskError } from './errors';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function clamp(v: number, min: number, max: number): number {
  return v < min ? min : v > max ? max : v;
}

/** Smallest rect covering both inputs. */
function unionRect(a: Rect, b: Rect): Rect {
  const x = Math.min(a.x, b.x);
  const y = Math.min(a.y, b.y);
  return {
    x,
    y,
    width: Math.max(a.x + a.width, b.x + b.width) - x,
    height: Math.max(a.y + a.height, b.y + b.height) - y,
  };
}

/** Overlap of two rects, or null when they do not intersect. */
function intersectRect(a: Rect, b: Rect): Rect | null {
  const x0 = Math.max(a.x, b.x);
  const y0 = Math.max(a.y, b.y);
  const x1 = Math.min(a.x + a.width, b.x + b.width);
  const y1 = Math.min(a.y + a.height, b.y + b.height);
  if (x1 <= x0 || y1 <= y0) return null;
  return { x: x0, y: y0, width: x1 - x0, height: y1 - y0 };
}

/** Throw unless the bitmap's bounds are integral and its data matches them. */
export function assertWellFormed(bitmap: MaskBitmap): void {
  const { x, y, width, height } = bitmap.bounds;
  if (![x, y, width, height].every(Number.isInteger) || width < 0 || height < 0) {
    throw new InvalidMaskError('Mask bounds must be non-negative integers');
  }
  if (bitmap.data.length !== width * height) {
    throw new InvalidMaskError(
      `Mask data length (${bitmap.data.length}) does not match bounds (${width}x${height})`,
    );
  }
}

// ---------------------------------------------------------------------------
// Construction & inspection
// ---------------------------------------------------------------------------

/** Create an all-clear bitmap covering `bounds`. */
export function createBitmap(bounds: Rect): MaskBitmap {
  return {
    bounds: { ...bounds },
    data: new Uint8Array(bounds.width * bounds.height),
  };
}

/** Deep copy of a bitmap. */
export function cloneBitmap(bitmap: MaskBitmap): MaskBitmap {
  return { bounds: { ...bitmap.bounds }, data: new Uint8Array(bitmap.data) };
}

/** Number of set pixels. */
export function bitmapArea(bitmap: MaskBitmap): number {
  let area = 0;
  for (let i = 0; i < bitmap.data.length; i++) {
    if (bitmap.data[i] !== 0) area++;
  }
  return area;
}

/** Whether the pixel at image coordinate `(x, y)` is set. */
export function bitmapContains(bitmap: MaskBitmap, x: number, y: number): boolean {
  const { bounds } = bitmap;
  const lx = Math.floor(x) - bounds.x;
  const ly = Math.floor(y) - bounds.y;
  if (lx < 0 || ly < 0 || lx >= bounds.width || ly >= bounds.height) return false;
  return bitmap.data[ly * bounds.width + lx] !== 0;
}

/**
 * Clip a bitmap to an image and shrink its bounds to the set pixels.
 *
 * @param bitmap - Source bitmap, possibly extending past the image.
 * @param size - Image dimensions; omit to only tighten the bounds.
 * @returns The tight bitmap, or null when no set pixel remains.
 */
export function cropToContent(bitmap: MaskBitmap, size?: Size): MaskBitmap | null {
  assertWellFormed(bitmap);
  const { bounds, data } = bitmap;
  const visible = size
    ? intersectRect(bounds, { x: 0, y: 0, width: size.width, height: size.height })
    : bounds.width > 0 && bounds.height > 0
      ? bounds
      : null;
  if (!visible) return null;

  let minX = Infinity;
  let minY = Infinity;
  let maxX = -1;
  let maxY = -1;
  for (let y = visible.y; y < visible.y + visible.height; y++) {
    const row = (y - bounds.y) * bounds.width;
    for (let x = visible.x; x < visible.x + visible.width; x++) {
      if (data[row + x - bounds.x] !== 0) {
        if (x < minX) minX = x;
        if (x > maxX) maxX = x;
        if (y < minY) minY = y;
        if (y > maxY) maxY = y;
      }
    }
  }
  if (maxX < 0) return null;

  const tight = createBitmap({ x: minX, y: minY, width: maxX - minX + 1, height: maxY - minY + 1 });
  for (let y = minY; y <= maxY; y++) {
    for (let x = minX; x <= maxX; x++) {
      if (data[(y - bounds.y) * bounds.width + x - bounds.x] !== 0) {
        tight.data[(y - minY) * tight.bounds.width + x - minX] = 1;
      }
    }
  }
  return tight;
}

/** Build a tight bitmap from a full-frame mask where any non-zero byte is set. */
export function bitmapFromDense(data: Uint8Array, size: Size): MaskBitmap | null {
  return cropToContent({ bounds: { x: 0, y: 0, ...size }, data }, size);
}

/** Expand a bitmap into a full-frame 0/1 mask. Pixels outside the image are dropped. */
export function bitmapToDense(bitmap: MaskBitmap, size: Size): Uint8Array {
  const out = new Uint8Array(size.width * size.height);
  forEachSetPixel(bitmap, (x, y) => {
    if (x >= 0 && y >= 0 && x < size.width && y < size.height) {
      out[y * size.width + x] = 1;
    }
  });
  return out;
}

/** Visit every set pixel in row-major order with image coordinates. */
export function forEachSetPixel(bitmap: MaskBitmap, visit: (x: number, y: number) => void): void {
  const { bounds, data } = bitmap;
  for (let ly = 0; ly < bounds.height; ly++) {
    for (let lx = 0; lx < bounds.width; lx++) {
      if (data[ly * bounds.width + lx] !== 0) {
        visit(bounds.x + lx, bounds.y + ly);
      }
    }
  }
}

// ---------------------------------------------------------------------------
// Boolean operations
// ---------------------------------------------------------------------------

/** Pixels set in either input. */
export function unionBitmaps(a: MaskBitmap, b: MaskBitmap): MaskBitmap {
  const out = createBitmap(unionRect(a.bounds, b.bounds));
  const paint = (x: number, y: number): void => {
    out.data[(y - out.bounds.y) * out.bounds.width + x - out.bounds.x] = 1;
  };
  forEachSetPixel(a, paint);
  forEachSetPixel(b, paint);
  return out;
}

/** Pixels set in `a` but not in `b`; null when nothing remains. */
export function subtractBitmaps(a: MaskBitmap, b: MaskBitmap): MaskBitmap | null {
  const out = cloneBitmap(a);
  forEachSetPixel(b, (x, y) => {
    const lx = x - out.bounds.x;
    const ly = y - out.bounds.y;
    if (lx >= 0 && ly >= 0 && lx < out.bounds.width && ly < out.bounds.height) {
      out.data[ly * out.bounds.width + lx] = 0;
    }
  });
  return cropToContent(out);
}

/** Number of pixels set in both inputs. */
export function intersectionArea(a: MaskBitmap, b: MaskBitmap): number {
  const overlap = intersectRect(a.bounds, b.bounds);
  if (!overlap) return 0;
  let count = 0;
  for (let y = overlap.y; y < overlap.y + overlap.height; y++) {
    for (let x = overlap.x; x < overlap.x + overlap.width; x++) {
      const ia = (y - a.bounds.y) * a.bounds.width + x - a.bounds.x;
      const ib = (y - b.bounds.y) * b.bounds.width + x - b.bounds.x;
      if (a.data[ia] !== 0 && b.data[ib] !== 0) count++;
    }
  }
  return count;
}

/** Intersection over union of two bitmaps (0 when both are empty). */
export function bitmapIou(a: MaskBitmap, b: MaskBitmap): number {
  const inter = intersectionArea(a, b);
  const union = bitmapArea(a) + bitmapArea(b) - inter;
  return union === 0 ? 0 : inter / union;
}

// ---------------------------------------------------------------------------
// Rasterization
// ---------------------------------------------------------------------------

/** Rectangle with integer-rounded edges; null when empty. */
export function rectBitmap(rect: Rect): MaskBitmap | null {
  const x0 = Math.round(rect.x);
  const y0 = Math.round(rect.y);
  const x1 = Math.round(rect.x + rect.width);
  const y1 = Math.round(rect.y + rect.height);
  if (x1 <= x0 || y1 <= y0) return null;
  const out = createBitmap({ x: x0, y: y0, width: x1 - x0, height: y1 - y0 });
  out.data.fill(1);
  return out;
}

/**
 * Filled circle: every pixel whose centre lies within `radius` of `center`.
 * @returns The circle, or null when it covers no pixel centre.
 */
export function circleBitmap(center: Point, radius: number): MaskBitmap | null {
  if (!(radius > 0)) return null;
  const x0 = Math.floor(center.x - radius);
  const y0 = Math.floor(center.y - radius);
  const x1 = Math.ceil(center.x + radius);
  const y1 = Math.ceil(center.y + radius);
  const out = createBitmap({ x: x0, y: y0, width: x1 - x0, height: y1 - y0 });
  const r2 = radius * radius;

  for (let py = y0; py < y1; py++) {
    for (let px = x0; px < x1; px++) {
      const dx = px + 0.5 - center.x;
      const dy = py + 0.5 - center.y;
      if (dx * dx + dy * dy <= r2) {
        out.data[(py - y0) * out.bounds.width + px - x0] = 1;
      }
    }
  }
  return cropToContent(out);
}

/**
 * Filled polygon (even-odd rule, sampled at pixel centres).
 * @returns The polygon, or null when it has fewer than three vertices or covers no pixel centre.
 */
export function polygonBitmap(points: readonly Point[]): MaskBitmap | null {
  if (points.length < 3) return null;

  let minX = Infinity;
  let minY = Infinity;
  let maxX = -Infinity;
  let maxY = -Infinity;
  for (const p of points) {
    minX = Math.min(minX, p.x);
    minY = Math.min(minY, p.y);
    maxX = Math.max(maxX, p.x);
    maxY = Math.max(maxY, p.y);
  }
  const x0 = Math.floor(minX);
  const y0 = Math.floor(minY);
  const out = createBitmap({
    x: x0,
    y: y0,
    width: Math.ceil(maxX) - x0,
    height: Math.ceil(maxY) - y0,
  });

  for (let py = y0; py < y0 + out.bounds.height; py++) {
    const cy = py + 0.5;
    const crossings: number[] = [];
    for (let i = 0; i < points.length; i++) {
      const p1 = points[i];
      const p2 = points[(i + 1) % points.length];
      if (p1.y <= cy !== p2.y <= cy) {
        crossings.push(p1.x + ((cy - p1.y) * (p2.x - p1.x)) / (p2.y - p1.y));
      }
    }
    crossings.sort((a, b) => a - b);

    for (let k = 0; k + 1 < crossings.length; k += 2) {
      const start = clamp(Math.ceil(crossings[k] - 0.5), x0, x0 + out.bounds.width);
      const end = clamp(Math.ceil(crossings[k + 1] - 0.5), x0, x0 + out.bounds.width);
      for (let px = start; px < end; px++) {
        out.data[(py - y0) * out.bounds.width + px - x0] = 1;
      }
    }
  }
  return cropToContent(out);
}

/** Pixels visited by a Bresenham walk from `a` to `b` (inclusive). */
function bresenham(a: Point, b: Point, visit: (x: number, y: number) => void): void {
  let x = Math.floor(a.x);
  let y = Math.floor(a.y);
  const xEnd = Math.floor(b.x);
  const yEnd = Math.floor(b.y);
  const dx = Math.abs(xEnd - x);
  const dy = -Math.abs(yEnd - y);
  const sx = x < xEnd ? 1 : -1;
  const sy = y < yEnd ? 1 : -1;
  let err = dx + dy;

  for (;;) {
    visit(x, y);
    if (x === xEnd && y === yEnd) return;
    const e2 = 2 * err;
    if (e2 >= dy) {
      err += dy;
      x += sx;
    }
    if (e2 <= dx) {
      err += dx;
      y += sy;
    }
  }
}

// ---------------------------------------------------------------------------
// Connectivity & split
// ---------------------------------------------------------------------------

/** 4-neighbour offsets in the order left, up, right, down. */
const NEIGHBOURS: ReadonlyArray<readonly [number, number]> = [
  [-1, 0],
  [0, -1],
  [1, 0],
  [0, 1],
];

/**
 * Label 4-connected components of a local 0/1 grid.
 * @returns Per-pixel labels (0 = clear, 1..n) and pixel counts indexed by label.
 */
function labelComponents(
  grid: Uint8Array,
  width: number,
  height: number,
): { labels: Int32Array; sizes: number[] } {
  const labels = new Int32Array(grid.length);
  const sizes = [0];
  const queue = new Int32Array(grid.length);

  for (let start = 0; start < grid.length; start++) {
    if (grid[start] === 0 || labels[start] !== 0) continue;
    const label = sizes.length;
    let head = 0;
    let tail = 0;
    queue[tail++] = start;
    labels[start] = label;
    let size = 0;

    while (head < tail) {
      const idx = queue[head++];
      size++;
      const x = idx % width;
      const y = (idx - x) / width;
      for (const [ox, oy] of NEIGHBOURS) {
        const nx = x + ox;
        const ny = y + oy;
        if (nx < 0 || ny < 0 || nx >= width || ny >= height) continue;
        const n = ny * width + nx;
        if (grid[n] !== 0 && labels[n] === 0) {
          labels[n] = label;
          queue[tail++] = n;
        }
      }
    }
    sizes.push(size);
  }
  return { labels, sizes };
}

/**
 * Split a bitmap into its 4-connected components.
 * @returns Tight component bitmaps, largest first (ties in raster order).
 */
export function connectedComponents(bitmap: MaskBitmap): MaskBitmap[] {
  const { width, height } = bitmap.bounds;
  const { labels, sizes } = labelComponents(bitmap.data, width, height);
  const components: MaskBitmap[] = [];

  for (let label = 1; label < sizes.length; label++) {
    const part = createBitmap(bitmap.bounds);
    for (let i = 0; i < labels.length; i++) {
      if (labels[i] === label) part.data[i] = 1;
    }
    const tight = cropToContent(part);
    if (tight) components.push(tight);
  }
  // Stable sort keeps raster order for equal sizes.
  return components.sort((a, b) => bitmapArea(b) - bitmapArea(a));
}

/**
 * Partition a bitmap in two along a cut path.
 *
 * The polyline is rasterized one pixel wide and removed from the mask. The
 * largest remaining 4-connected piece becomes the first part and every other
 * piece the second. Pixels under the cut are then handed to the part of an
 * adjacent pixel, so the two parts together cover the input exactly.
 *
 * @param bitmap - Mask to split.
 * @param cutPath - Polyline in image coordinates (at least two points).
 * @returns The two parts, larger first.
 * @throws {InvalidMaskError} If the path does not divide the mask.
 */
export function splitBitmap(
  bitmap: MaskBitmap,
  cutPath: readonly Point[],
): [MaskBitmap, MaskBitmap] {
  if (cutPath.length < 2) {
    throw new InvalidMaskError('A cut path needs at least two points');
  }
  if (!cutPath.every((p) => Number.isFinite(p.x) && Number.isFinite(p.y))) {
    throw new InvalidMaskError('Cut path coordinates must be finite');
  }
  const { bounds } = bitmap;
  const { width, height } = bounds;

  const remaining = new Uint8Array(bitmap.data);
  const cut = new Uint8Array(remaining.length);
  for (let i = 0; i + 1 < cutPath.length; i++) {
    bresenham(cutPath[i], cutPath[i + 1], (x, y) => {
      const lx = x - bounds.x;
      const ly = y - bounds.y;
      if (lx < 0 || ly < 0 || lx >= width || ly >= height) return;
      const idx = ly * width + lx;
      if (remaining[idx] !== 0) {
        remaining[idx] = 0;
        cut[idx] = 1;
      }
    });
  }

  const { labels, sizes } = labelComponents(remaining, width, height);
  if (sizes.length < 3) {
    throw new InvalidMaskError('Cut path does not divide the mask');
  }

  let largest = 1;
  for (let label = 2; label < sizes.length; label++) {
    if (sizes[label] > sizes[largest]) largest = label;
  }

  // 0 = unassigned, 1 = first part, 2 = second part
  const part = new Uint8Array(remaining.length);
  for (let i = 0; i < labels.length; i++) {
    if (labels[i] !== 0) part[i] = labels[i] === largest ? 1 : 2;
  }

  let changed = true;
  while (changed) {
    changed = false;
    for (let i = 0; i < cut.length; i++) {
      if (cut[i] === 0 || part[i] !== 0) continue;
      const x = i % width;
      const y = (i - x) / width;
      for (const [ox, oy] of NEIGHBOURS) {
        const nx = x + ox;
        const ny = y + oy;
        if (nx < 0 || ny < 0 || nx >= width || ny >= height) continue;
        const neighbour = part[ny * width + nx];
        if (neighbour !== 0) {
          part[i] = neighbour;
          changed = true;
          break;
        }
      }
    }
  }

  const first = createBitmap(bounds);
  const second = createBitmap(bounds);
  for (let i = 0; i < part.length; i++) {
    if (bitmap.data[i] === 0) continue;
    if (part[i] === 2) second.data[i] = 1;
    else first.data[i] = 1;
  }

  const a = cropToContent(first);
  const b = cropToContent(second);
  if (!a || !b) {
    throw new InvalidMaskError('Cut path does not divide the mask');
  }
  return [a, b];
}
