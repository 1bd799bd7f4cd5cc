import { describe, it, expect } from 'vitest';
import { DEFAULT_PALETTE, renderOverlay } from './overlay';
import { MaskStore } from './mask-store';
import { rectBitmap } from './mask-geometry';

function storeWithSquare(): MaskStore {
  const store = new MaskStore({ width: 4, height: 4 });
  const bitmap = rectBitmap({ x: 0, y: 0, width: 3, height: 3 });
  if (!bitmap) throw new Error('empty rect');
  store.add({ source: 'manual-edit', bitmap, label: 'mesophase-fine' });
  return store;
}

function pixel(data: Uint8Array, width: number, x: number, y: number): number[] {
  const o = (y * width + x) * 4;
  return Array.from(data.subarray(o, o + 4));
}

describe('renderOverlay', () => {
  it('fills interiors translucently and outlines edges', () => {
    const overlay = renderOverlay(storeWithSquare());

    expect(overlay.width).toBe(4);
    expect(overlay.data).toHaveLength(64);
    expect(pixel(overlay.data, 4, 1, 1)).toEqual([191, 255, 0, 128]);
    expect(pixel(overlay.data, 4, 0, 0)).toEqual([191, 255, 0, 255]);
    expect(pixel(overlay.data, 4, 2, 2)).toEqual([191, 255, 0, 255]);
    expect(pixel(overlay.data, 4, 3, 3)).toEqual([0, 0, 0, 0]);
  });

  it('omits outlines when disabled', () => {
    const overlay = renderOverlay(storeWithSquare(), { outline: false });
    expect(pixel(overlay.data, 4, 0, 0)).toEqual([191, 255, 0, 128]);
  });

  it('applies palette overrides per label', () => {
    const overlay = renderOverlay(storeWithSquare(), {
      outline: false,
      palette: { 'mesophase-fine': { r: 1, g: 2, b: 3, a: 1 } },
    });
    expect(pixel(overlay.data, 4, 1, 1)).toEqual([1, 2, 3, 255]);
    expect(DEFAULT_PALETTE['mesophase-fine'].r).toBe(191);
  });
});
