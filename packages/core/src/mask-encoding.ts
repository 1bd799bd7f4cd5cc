/**
 * @module mask-encoding
 * Run-length encoding of mask bitmaps for persistence and oracle transport.
 *
 * Runs cover the bitmap's bounds in row-major order and alternate
 * clear/set, always starting with a (possibly empty) clear run.
 */

import type { MaskBitmap, Rect, RleMaskEncoding } from '@mezo/types';
import { InvalidMaskError } from './errors';

/**
 * Run-length encode a bitmap.
 *
 * @example
 * ```ts
 * encodeRle({ bounds: { x: 0, y: 0, width: 3, height: 1 }, data: new Uint8Array([1, 1, 0]) });
 * // → { kind: 'rle', bounds: {...}, runs: [0, 2, 1] }
 * ```
 */
export function encodeRle(bitmap: MaskBitmap): RleMaskEncoding {
  const runs: number[] = [];
  let current = 0;
  let length = 0;

  for (let i = 0; i < bitmap.data.length; i++) {
    const value = bitmap.data[i] !== 0 ? 1 : 0;
    if (value === current) {
      length++;
    } else {
      runs.push(length);
      current = value;
      length = 1;
    }
  }
  runs.push(length);

  return { kind: 'rle', bounds: { ...bitmap.bounds }, runs };
}

/**
 * Decode a run-length encoding back into a bitmap over the same bounds.
 *
 * @throws {InvalidMaskError} If the bounds are malformed, a run is not a
 *   non-negative integer, or the runs do not cover the bounds exactly.
 */
export function decodeRle(encoding: { bounds: Rect; runs: readonly number[] }): MaskBitmap {
  const { bounds, runs } = encoding;
  const { x, y, width, height } = bounds;
  if (![x, y, width, height].every(Number.isInteger) || width < 0 || height < 0) {
    throw new InvalidMaskError('RLE bounds must be non-negative integers');
  }

  const total = width * height;
  let covered = 0;
  for (const run of runs) {
    if (!Number.isInteger(run) || run < 0) {
      throw new InvalidMaskError(`Invalid RLE run length: ${String(run)}`);
    }
    covered += run;
    if (covered > total) {
      throw new InvalidMaskError('RLE runs exceed mask bounds');
    }
  }
  if (covered !== total) {
    throw new InvalidMaskError(`RLE runs cover ${covered} of ${total} pixels`);
  }

  const data = new Uint8Array(total);
  let offset = 0;
  let value = 0;
  for (const run of runs) {
    if (value === 1) data.fill(1, offset, offset + run);
    offset += run;
    value ^= 1;
  }
  return { bounds: { ...bounds }, data };
}
