/**
 * @module classification
 * Classification Aggregator: per-category statistics of a mask layering.
 *
 * The layering is rasterized once per call into an owner buffer (the
 * highest-order mask covering each pixel), then tallied. The functions hold
 * no state, so equal inputs always produce equal results.
 */

import type {
  CategoryTally,
  ClassificationResult,
  Mask,
  MaskLayering,
  MesophaseCategory,
} from '@mezo/types';
import { MESOPHASE_CATEGORIES } from './categories';
import { InvalidMaskError } from './errors';
import { forEachSetPixel } from './mask-geometry';

/** Overlap-resolved view of a layering. */
export interface ResolvedLayering {
  width: number;
  height: number;
  /** Masks sorted by creation order (bottom to top). */
  masks: readonly Mask[];
  /** Per pixel, the index into `masks` of the visible mask, or -1 for background. */
  owners: Int32Array;
  /** Per mask, the number of pixels where it is visible. */
  visiblePixels: number[];
}

/**
 * Resolve overlaps: every pixel belongs to the covering mask with the highest
 * creation order.
 *
 * @throws {InvalidMaskError} If the image size is invalid or a mask extends
 *   outside the image.
 */
export function resolveLayering(layering: MaskLayering): ResolvedLayering {
  const { width, height } = layering;
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new InvalidMaskError(`Invalid image size ${width}x${height}`);
  }

  const masks = [...layering.masks].sort((a, b) => a.order - b.order);
  const owners = new Int32Array(width * height).fill(-1);

  masks.forEach((mask, index) => {
    forEachSetPixel(mask.bitmap, (x, y) => {
      if (x < 0 || y < 0 || x >= width || y >= height) {
        throw new InvalidMaskError(`Mask ${mask.id} extends outside the image`);
      }
      owners[y * width + x] = index;
    });
  });

  const visiblePixels = new Array<number>(masks.length).fill(0);
  for (let i = 0; i < owners.length; i++) {
    const owner = owners[i];
    if (owner >= 0) visiblePixels[owner]++;
  }

  return { width, height, masks, owners, visiblePixels };
}

/** A tally with every category at zero. */
function emptyCategories(): Record<MesophaseCategory, CategoryTally> {
  const zero = (): CategoryTally => ({ pixels: 0, fraction: 0, regions: 0 });
  return {
    isotropic: zero(),
    'mesophase-fine': zero(),
    'mesophase-medium': zero(),
    'mesophase-coarse': zero(),
    'mesophase-domain': zero(),
  };
}

/**
 * Compute the classification of an image from its masks.
 *
 * Pixels of `unlabeled` masks and uncovered pixels go to the `unclassified`
 * bucket and are excluded from the fraction denominator.
 *
 * @example
 * ```ts
 * const result = computeClassification(store);
 * result.categories['mesophase-coarse'].fraction; // 0.42
 * ```
 */
export function computeClassification(layering: MaskLayering): ClassificationResult {
  const { width, height, masks, visiblePixels } = resolveLayering(layering);
  const categories = emptyCategories();
  const totalPixels = width * height;

  let classifiedPixels = 0;
  let unlabeledPixels = 0;
  let coveredPixels = 0;

  masks.forEach((mask, index) => {
    const visible = visiblePixels[index];
    if (visible === 0) return;
    coveredPixels += visible;
    if (mask.label === 'unlabeled') {
      unlabeledPixels += visible;
      return;
    }
    const tally = categories[mask.label];
    tally.pixels += visible;
    tally.regions++;
    classifiedPixels += visible;
  });

  if (classifiedPixels > 0) {
    for (const category of MESOPHASE_CATEGORIES) {
      categories[category].fraction = categories[category].pixels / classifiedPixels;
    }
  }

  const backgroundPixels = totalPixels - coveredPixels;
  return {
    totalPixels,
    classifiedPixels,
    categories,
    unclassified: {
      pixels: unlabeledPixels + backgroundPixels,
      unlabeledPixels,
      backgroundPixels,
    },
  };
}
