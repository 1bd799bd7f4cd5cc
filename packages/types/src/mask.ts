/**
 * @module mask
 * Region masks, mesophase categories and Mask Store snapshots.
 */

import type { Rect } from './common';

/** Fixed set of mesophase categories an operator can assign to a region. */
export type MesophaseCategory =
  | 'isotropic'
  | 'mesophase-fine'
  | 'mesophase-medium'
  | 'mesophase-coarse'
  | 'mesophase-domain';

/** Label carried by a mask: a category, or `unlabeled` until the operator decides. */
export type MaskLabel = MesophaseCategory | 'unlabeled';

/** Where a mask came from. */
export type MaskSource = 'oracle' | 'manual-edit';

/**
 * A binary pixel grid cropped to its bounding box.
 * `data[y * bounds.width + x]` is 1 for a set pixel and 0 otherwise,
 * with `(x, y)` relative to `bounds`.
 */
export interface MaskBitmap {
  /** Bounding box in image coordinates. */
  readonly bounds: Rect;
  /** One byte per pixel of `bounds`. */
  readonly data: Uint8Array;
}

/** Fields shared by every mask regardless of source. */
interface MaskBase {
  /** Unique within a Mask Store. */
  readonly id: string;
  /** Category label. */
  readonly label: MaskLabel;
  /** Creation-order index; the highest order wins on overlap. */
  readonly order: number;
  /** Pixel region, always inside the image and tight to its set pixels. */
  readonly bitmap: MaskBitmap;
  /** Number of set pixels (> 0). */
  readonly area: number;
}

/** A mask accepted unchanged from the segmentation oracle. */
export interface OracleMask extends MaskBase {
  readonly source: 'oracle';
  /** Normalized oracle confidence in [0, 1]. */
  readonly confidence: number;
}

/** A mask drawn or edited by the operator (including merge/split results). */
export interface ManualMask extends MaskBase {
  readonly source: 'manual-edit';
}

/** A region mask in the Mask Store. */
export type Mask = OracleMask | ManualMask;

/** Input accepted by `MaskStore.add`. Bitmap may extend past the image and is clipped. */
export type MaskInput =
  | {
      source: 'oracle';
      confidence: number;
      bitmap: MaskBitmap;
      label?: MaskLabel;
      id?: string;
    }
  | {
      source: 'manual-edit';
      bitmap: MaskBitmap;
      label?: MaskLabel;
      id?: string;
    };

/** Deep, structurally independent copy of a Mask Store's state. */
export interface MaskStoreSnapshot {
  /** Width of the image the masks belong to. */
  readonly width: number;
  /** Height of the image the masks belong to. */
  readonly height: number;
  /** Masks in insertion order. */
  readonly masks: readonly Mask[];
  /** Id of the mask being edited, if any. */
  readonly activeId: string | null;
  /** Creation-order index the next added mask will receive. */
  readonly nextOrder: number;
}

/** Read-only view of an ordered mask layering over an image. */
export interface MaskLayering {
  readonly width: number;
  readonly height: number;
  readonly masks: readonly Mask[];
}
