/**
 * @module mask-store
 * The set of region masks for one open image.
 *
 * Masks are kept in insertion order and carry a creation-order index; on
 * overlap the mask with the highest index wins (painter's model). Mask
 * records are immutable: relabelling replaces the record, and every mask
 * handed out is a copy.
 */

import type {
  Mask,
  MaskInput,
  MaskLabel,
  MaskLayering,
  MaskStoreSnapshot,
  Point,
  Size,
} from '@mezo/types';
import { isMaskLabel } from './categories';
import { InvalidMaskError, NotFoundError } from './errors';
import { bitmapArea, bitmapContains, cloneBitmap, cropToContent } from './mask-geometry';
import { generateId } from './uuid';

/** Options for {@link MaskStore}. */
export interface MaskStoreOptions {
  /** Initial state. Must match the image size. */
  snapshot?: MaskStoreSnapshot;
  /** Id factory for masks added without an explicit id. */
  createId?: () => string;
}

/** Deep copy of a mask record. */
function cloneMask(mask: Mask): Mask {
  return { ...mask, bitmap: cloneBitmap(mask.bitmap) };
}

/**
 * Check that a snapshot satisfies every Mask Store invariant.
 *
 * @throws {InvalidMaskError} On the first violation.
 */
export function validateSnapshot(snapshot: MaskStoreSnapshot): void {
  const { width, height, masks, activeId, nextOrder } = snapshot;
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new InvalidMaskError(`Invalid image size ${width}x${height}`);
  }

  const ids = new Set<string>();
  let maxOrder = -1;
  for (const mask of masks) {
    if (ids.has(mask.id)) {
      throw new InvalidMaskError(`Duplicate mask id: ${mask.id}`);
    }
    ids.add(mask.id);
    if (!isMaskLabel(mask.label)) {
      throw new InvalidMaskError(`Unknown label on mask ${mask.id}`);
    }
    if (mask.source === 'oracle' && !(mask.confidence >= 0 && mask.confidence <= 1)) {
      throw new InvalidMaskError(`Confidence of mask ${mask.id} is outside [0, 1]`);
    }
    if (!Number.isInteger(mask.order) || mask.order < 0) {
      throw new InvalidMaskError(`Invalid creation order on mask ${mask.id}`);
    }
    const { x, y, width: w, height: h } = mask.bitmap.bounds;
    if (x < 0 || y < 0 || x + w > width || y + h > height) {
      throw new InvalidMaskError(`Mask ${mask.id} extends outside the image`);
    }
    const area = bitmapArea(mask.bitmap);
    if (area === 0 || area !== mask.area) {
      throw new InvalidMaskError(`Mask ${mask.id} has an invalid area`);
    }
    maxOrder = Math.max(maxOrder, mask.order);
  }

  if (activeId !== null && !ids.has(activeId)) {
    throw new InvalidMaskError(`Active mask ${activeId} is not in the snapshot`);
  }
  if (!Number.isInteger(nextOrder) || nextOrder <= maxOrder) {
    throw new InvalidMaskError('nextOrder must exceed every creation order');
  }
}

/**
 * Ordered, single-writer collection of masks over one image.
 *
 * Usage:
 * ```ts
 * const store = new MaskStore({ width: 640, height: 480 });
 * const mask = store.add({ source: 'manual-edit', bitmap, label: 'mesophase-fine' });
 * const saved = store.snapshot();
 * store.remove(mask.id);
 * store.restore(saved);
 * ```
 */
export class MaskStore implements MaskLayering {
  readonly width: number;
  readonly height: number;

  private items: Mask[] = [];
  private byId = new Map<string, Mask>();
  private active: string | null = null;
  private nextOrder = 0;
  private readonly createId: () => string;

  constructor(size: Size, options: MaskStoreOptions = {}) {
    if (!Number.isInteger(size.width) || !Number.isInteger(size.height) || size.width <= 0 || size.height <= 0) {
      throw new InvalidMaskError(`Invalid image size ${size.width}x${size.height}`);
    }
    this.width = size.width;
    this.height = size.height;
    this.createId = options.createId ?? generateId;
    if (options.snapshot) {
      this.restore(options.snapshot);
    }
  }

  /** Copies of the masks in insertion (and creation) order. */
  get masks(): readonly Mask[] {
    return this.items.map(cloneMask);
  }

  /** Number of masks. */
  get count(): number {
    return this.items.length;
  }

  /** Id of the mask being edited, or null. */
  get activeId(): string | null {
    return this.active;
  }

  /** Whether a mask with this id exists. */
  has(maskId: string): boolean {
    return this.byId.has(maskId);
  }

  /**
   * Look up a mask.
   * @returns A copy of the stored mask.
   * @throws {NotFoundError} If the id is unknown.
   */
  get(maskId: string): Mask {
    return cloneMask(this.find(maskId));
  }

  private find(maskId: string): Mask {
    const mask = this.byId.get(maskId);
    if (!mask) {
      throw new NotFoundError('mask', maskId);
    }
    return mask;
  }

  /** The topmost mask covering a pixel, or null. */
  maskAt(point: Point): Mask | null {
    for (let i = this.items.length - 1; i >= 0; i--) {
      const mask = this.items[i];
      if (bitmapContains(mask.bitmap, point.x, point.y)) {
        return cloneMask(mask);
      }
    }
    return null;
  }

  /**
   * Add a mask on top of the layering. The bitmap is clipped to the image.
   *
   * @returns The stored mask with its id, order and area.
   * @throws {InvalidMaskError} If no pixel lies inside the image, the id is
   *   taken, the label is unknown, or an oracle confidence is outside [0, 1].
   */
  add(input: MaskInput): Mask {
    const label: MaskLabel = input.label ?? 'unlabeled';
    if (!isMaskLabel(label)) {
      throw new InvalidMaskError(`Unknown label: ${String(label)}`);
    }
    if (input.id !== undefined && this.byId.has(input.id)) {
      throw new InvalidMaskError(`Duplicate mask id: ${input.id}`);
    }
    if (input.source === 'oracle' && !(input.confidence >= 0 && input.confidence <= 1)) {
      throw new InvalidMaskError(`Confidence ${input.confidence} is outside [0, 1]`);
    }

    const bitmap = cropToContent(input.bitmap, this);
    if (!bitmap) {
      throw new InvalidMaskError('Mask has no pixels inside the image');
    }

    const base = {
      id: input.id ?? this.createId(),
      label,
      order: this.nextOrder,
      bitmap,
      area: bitmapArea(bitmap),
    };
    const mask: Mask =
      input.source === 'oracle'
        ? { ...base, source: 'oracle', confidence: input.confidence }
        : { ...base, source: 'manual-edit' };

    this.items.push(mask);
    this.byId.set(mask.id, mask);
    this.nextOrder++;
    return cloneMask(mask);
  }

  /**
   * Remove a mask. Clears the active mask if it was the one removed.
   * @throws {NotFoundError} If the id is unknown.
   */
  remove(maskId: string): Mask {
    const mask = this.find(maskId);
    this.items.splice(this.items.indexOf(mask), 1);
    this.byId.delete(maskId);
    if (this.active === maskId) {
      this.active = null;
    }
    return mask;
  }

  /**
   * Change a mask's label.
   * @throws {NotFoundError} If the id is unknown.
   * @throws {InvalidMaskError} If the label is unknown.
   */
  relabel(maskId: string, label: MaskLabel): Mask {
    const current = this.find(maskId);
    if (!isMaskLabel(label)) {
      throw new InvalidMaskError(`Unknown label: ${String(label)}`);
    }
    const updated: Mask = { ...current, label };
    this.items[this.items.indexOf(current)] = updated;
    this.byId.set(maskId, updated);
    return cloneMask(updated);
  }

  /**
   * Select the mask being edited, or none.
   * @throws {NotFoundError} If the id is unknown.
   */
  setActive(maskId: string | null): void {
    if (maskId !== null) {
      this.find(maskId);
    }
    this.active = maskId;
  }

  /** Deep copy of the current state. */
  snapshot(): MaskStoreSnapshot {
    return {
      width: this.width,
      height: this.height,
      masks: this.items.map(cloneMask),
      activeId: this.active,
      nextOrder: this.nextOrder,
    };
  }

  /**
   * Replace the current state with a deep copy of a snapshot.
   * @throws {InvalidMaskError} If the snapshot is for another image size or
   *   violates a store invariant. The store is left unchanged in that case.
   */
  restore(snapshot: MaskStoreSnapshot): void {
    if (snapshot.width !== this.width || snapshot.height !== this.height) {
      throw new InvalidMaskError(
        `Snapshot is for a ${snapshot.width}x${snapshot.height} image, store is ${this.width}x${this.height}`,
      );
    }
    validateSnapshot(snapshot);

    const masks = snapshot.masks.map(cloneMask).sort((a, b) => a.order - b.order);
    this.items = masks;
    this.byId = new Map(masks.map((m) => [m.id, m]));
    this.active = snapshot.activeId;
    this.nextOrder = snapshot.nextOrder;
  }
}
