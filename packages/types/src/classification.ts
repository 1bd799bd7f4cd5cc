/**
 * @module classification
 * Per-category statistics derived from a mask layering.
 */

import type { MesophaseCategory } from './mask';

/** Tally for one category. */
export interface CategoryTally {
  /** Visible pixels after overlap resolution. */
  pixels: number;
  /** `pixels / classifiedPixels`, or 0 when nothing is classified. */
  fraction: number;
  /** Masks of this category with at least one visible pixel. */
  regions: number;
}

/** Pixels not attributed to any category. */
export interface UnclassifiedTally {
  /** `unlabeledPixels + backgroundPixels`. */
  pixels: number;
  /** Visible pixels of masks labeled `unlabeled`. */
  unlabeledPixels: number;
  /** Pixels covered by no mask. */
  backgroundPixels: number;
}

/** Classification of an image, recomputed on demand and never stored. */
export interface ClassificationResult {
  /** Image pixel count. */
  totalPixels: number;
  /** Pixels attributed to a category; the denominator for fractions. */
  classifiedPixels: number;
  /** One tally per category, every category present. */
  categories: Record<MesophaseCategory, CategoryTally>;
  unclassified: UnclassifiedTally;
}
