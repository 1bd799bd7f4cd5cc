/**
 * @module categories
 * The fixed mesophase category set.
 */

import type { MaskLabel, MesophaseCategory } from '@mezo/types';

/** Every category, in display order. */
export const MESOPHASE_CATEGORIES: readonly MesophaseCategory[] = [
  'isotropic',
  'mesophase-fine',
  'mesophase-medium',
  'mesophase-coarse',
  'mesophase-domain',
];

/** Narrow an arbitrary value to a {@link MesophaseCategory}. */
export function isMesophaseCategory(value: unknown): value is MesophaseCategory {
  return typeof value === 'string' && (MESOPHASE_CATEGORIES as readonly string[]).includes(value);
}

/** Narrow an arbitrary value to a {@link MaskLabel}. */
export function isMaskLabel(value: unknown): value is MaskLabel {
  return value === 'unlabeled' || isMesophaseCategory(value);
}
