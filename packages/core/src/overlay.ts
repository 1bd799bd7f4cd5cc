/**
 * @module overlay
 * Renders a classification overlay: one translucent colour per category with
 * an opaque one-pixel outline around every visible region.
 */

import type { Color, MaskLabel, MaskLayering, RasterImage } from '@mezo/types';
import { resolveLayering } from './classification';

/** Default colour per label. Alpha is the fill opacity (0-1). */
export const DEFAULT_PALETTE: Readonly<Record<MaskLabel, Color>> = Object.freeze({
  isotropic: { r: 64, g: 160, b: 255, a: 0.35 },
  'mesophase-fine': { r: 191, g: 255, b: 0, a: 0.5 },
  'mesophase-medium': { r: 255, g: 200, b: 0, a: 0.5 },
  'mesophase-coarse': { r: 255, g: 110, b: 0, a: 0.5 },
  'mesophase-domain': { r: 131, g: 90, b: 255, a: 0.5 },
  unlabeled: { r: 160, g: 160, b: 160, a: 0.4 },
});

/** Options for {@link renderOverlay}. */
export interface OverlayOptions {
  /** Per-label colours; missing labels fall back to {@link DEFAULT_PALETTE}. */
  palette?: Partial<Record<MaskLabel, Color>>;
  /** Draw region outlines (default true). */
  outline?: boolean;
}

/**
 * Render the overlap-resolved layering as an RGBA image the size of the source.
 * Background pixels are fully transparent.
 */
export function renderOverlay(layering: MaskLayering, options: OverlayOptions = {}): RasterImage {
  const { width, height, masks, owners } = resolveLayering(layering);
  const palette = { ...DEFAULT_PALETTE, ...options.palette };
  const outline = options.outline ?? true;
  const data = new Uint8Array(width * height * 4);

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const i = y * width + x;
      const owner = owners[i];
      if (owner < 0) continue;

      const color = palette[masks[owner].label];
      const edge =
        outline &&
        (x === 0 ||
          y === 0 ||
          x === width - 1 ||
          y === height - 1 ||
          owners[i - 1] !== owner ||
          owners[i + 1] !== owner ||
          owners[i - width] !== owner ||
          owners[i + width] !== owner);

      const o = i * 4;
      data[o] = color.r;
      data[o + 1] = color.g;
      data[o + 2] = color.b;
      data[o + 3] = edge ? 255 : Math.round(color.a * 255);
    }
  }

  return { width, height, data };
}
