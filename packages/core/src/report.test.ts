import { describe, it, expect } from 'vitest';
import { assertCalibration, buildReport } from './report';
import { MaskStore } from './mask-store';
import { rectBitmap } from './mask-geometry';

function addRect(store: MaskStore, x: number, y: number, size: number, label: 'mesophase-fine' | 'isotropic'): string {
  const bitmap = rectBitmap({ x, y, width: size, height: size });
  if (!bitmap) throw new Error('empty rect');
  return store.add({ source: 'manual-edit', bitmap, label }).id;
}

describe('buildReport', () => {
  it('converts pixel areas with the calibration', () => {
    const store = new MaskStore({ width: 100, height: 100 });
    const fine = addRect(store, 0, 0, 10, 'mesophase-fine');
    const report = buildReport(store, { pixels: 10, micrometers: 20, porosity: 0.2 });

    expect(report.umPerPixel).toBe(2);
    expect(report.materialAreaMm2).toBeCloseTo(0.032);
    expect(report.mesophaseAreaMm2).toBeCloseTo(0.0004);
    expect(report.mesophaseFraction).toBeCloseTo(0.0125);
    expect(report.regionCount).toBe(1);
    expect(report.rows).toEqual([
      {
        index: 1,
        maskId: fine,
        label: 'mesophase-fine',
        pixels: 100,
        areaUm2: 400,
        diameterUm: 2 * Math.sqrt(400 / Math.PI),
      },
    ]);
    expect(report.maxDiameterUm).toBeCloseTo(22.5676, 3);
  });

  it('lists isotropic regions without counting them as mesophase', () => {
    const store = new MaskStore({ width: 10, height: 10 });
    addRect(store, 0, 0, 2, 'isotropic');
    const report = buildReport(store);

    expect(report.rows).toHaveLength(1);
    expect(report.regionCount).toBe(0);
    expect(report.maxDiameterUm).toBe(0);
    expect(report.mesophaseAreaMm2).toBe(0);
  });

  it('skips fully hidden masks', () => {
    const store = new MaskStore({ width: 10, height: 10 });
    addRect(store, 0, 0, 2, 'mesophase-fine');
    const top = addRect(store, 0, 0, 2, 'isotropic');
    const report = buildReport(store);

    expect(report.rows.map((r) => r.maskId)).toEqual([top]);
  });
});

describe('assertCalibration', () => {
  it('rejects a non-positive scale or porosity outside [0, 1)', () => {
    expect(() => assertCalibration({ pixels: 0, micrometers: 1, porosity: 0 })).toThrow(RangeError);
    expect(() => assertCalibration({ pixels: 1, micrometers: 1, porosity: 1 })).toThrow(RangeError);
    expect(() => assertCalibration({ pixels: 1, micrometers: 5, porosity: 0.5 })).not.toThrow();
  });
});
