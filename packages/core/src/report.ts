/**
 * @module report
 * Calibrated analysis of a classified image: region sizes in micrometres,
 * material and mesophase areas in mm², and the mesophase content.
 *
 * Regions labelled `isotropic` or `unlabeled` are listed but do not count as
 * mesophase.
 */

import type { Calibration, MaskLabel, MaskLayering } from '@mezo/types';
import { resolveLayering } from './classification';

/** Calibration used when a sample has never been calibrated. */
export const DEFAULT_CALIBRATION: Readonly<Calibration> = Object.freeze({
  pixels: 1,
  micrometers: 1,
  porosity: 0,
});

/** One visible region. */
export interface RegionRow {
  /** 1-based position in creation order among visible regions. */
  index: number;
  maskId: string;
  label: MaskLabel;
  /** Visible pixels after overlap resolution. */
  pixels: number;
  /** Visible area in µm². */
  areaUm2: number;
  /** Diameter of the circle with the same area, in µm. */
  diameterUm: number;
}

/** Analysis of one image. */
export interface SampleReport {
  calibration: Calibration;
  /** Micrometres per pixel. */
  umPerPixel: number;
  /** Number of mesophase regions. */
  regionCount: number;
  /** Largest mesophase region diameter in µm (0 when there is none). */
  maxDiameterUm: number;
  /** Non-porous area of the image in mm². */
  materialAreaMm2: number;
  /** Visible mesophase area in mm². */
  mesophaseAreaMm2: number;
  /** `mesophaseAreaMm2 / materialAreaMm2`. */
  mesophaseFraction: number;
  rows: RegionRow[];
}

/**
 * Validate a calibration.
 * @throws {RangeError} If the scale is not positive or porosity is outside [0, 1).
 */
export function assertCalibration(calibration: Calibration): void {
  const { pixels, micrometers, porosity } = calibration;
  if (!(pixels > 0) || !(micrometers > 0) || !Number.isFinite(pixels) || !Number.isFinite(micrometers)) {
    throw new RangeError('Calibration scale must be positive');
  }
  if (!(porosity >= 0 && porosity < 1)) {
    throw new RangeError('Porosity must be within [0, 1)');
  }
}

const UM2_PER_MM2 = 1_000_000;

function isMesophase(label: MaskLabel): boolean {
  return label !== 'unlabeled' && label !== 'isotropic';
}

/** Build the calibrated report for a layering. */
export function buildReport(
  layering: MaskLayering,
  calibration: Calibration = DEFAULT_CALIBRATION,
): SampleReport {
  assertCalibration(calibration);
  const { width, height, masks, visiblePixels } = resolveLayering(layering);
  const umPerPixel = calibration.micrometers / calibration.pixels;
  const um2PerPixel = umPerPixel * umPerPixel;

  const rows: RegionRow[] = [];
  let regionCount = 0;
  let maxDiameterUm = 0;
  let mesophasePixels = 0;

  masks.forEach((mask, i) => {
    const pixels = visiblePixels[i];
    if (pixels === 0) return;
    const areaUm2 = pixels * um2PerPixel;
    const diameterUm = 2 * Math.sqrt(areaUm2 / Math.PI);
    rows.push({ index: rows.length + 1, maskId: mask.id, label: mask.label, pixels, areaUm2, diameterUm });

    if (isMesophase(mask.label)) {
      regionCount++;
      mesophasePixels += pixels;
      maxDiameterUm = Math.max(maxDiameterUm, diameterUm);
    }
  });

  const materialAreaMm2 = ((1 - calibration.porosity) * width * height * um2PerPixel) / UM2_PER_MM2;
  const mesophaseAreaMm2 = (mesophasePixels * um2PerPixel) / UM2_PER_MM2;

  return {
    calibration: { ...calibration },
    umPerPixel,
    regionCount,
    maxDiameterUm,
    materialAreaMm2,
    mesophaseAreaMm2,
    mesophaseFraction: mesophaseAreaMm2 / materialAreaMm2,
    rows,
  };
}
