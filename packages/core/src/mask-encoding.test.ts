import { describe, it, expect } from 'vitest';
import { decodeRle, encodeRle } from './mask-encoding';
import { InvalidMaskError } from './errors';

describe('encodeRle', () => {
  it('starts with a clear run', () => {
    const bitmap = { bounds: { x: 2, y: 3, width: 3, height: 2 }, data: new Uint8Array([1, 1, 0, 0, 1, 1]) };
    expect(encodeRle(bitmap)).toEqual({
      kind: 'rle',
      bounds: { x: 2, y: 3, width: 3, height: 2 },
      runs: [0, 2, 2, 2],
    });
  });

  it('decodes back to the same pixels', () => {
    const data = new Uint8Array([0, 1, 1, 0, 1, 0, 0, 1, 1]);
    const encoded = encodeRle({ bounds: { x: 0, y: 0, width: 3, height: 3 }, data });
    expect(encoded.runs).toEqual([1, 2, 1, 1, 2, 2]);
    expect(decodeRle(encoded).data).toEqual(data);
  });
});

describe('decodeRle', () => {
  it('rejects runs that overflow the bounds', () => {
    expect(() => decodeRle({ bounds: { x: 0, y: 0, width: 2, height: 1 }, runs: [1, 5] })).toThrow(
      InvalidMaskError,
    );
  });

  it('rejects runs that under-fill the bounds', () => {
    expect(() => decodeRle({ bounds: { x: 0, y: 0, width: 2, height: 2 }, runs: [1, 1] })).toThrow(
      'RLE runs cover 2 of 4 pixels',
    );
  });

  it('rejects negative or fractional runs', () => {
    const bounds = { x: 0, y: 0, width: 2, height: 1 };
    expect(() => decodeRle({ bounds, runs: [-1, 3] })).toThrow(InvalidMaskError);
    expect(() => decodeRle({ bounds, runs: [0.5, 1.5] })).toThrow(InvalidMaskError);
  });
});
