import { describe, it, expect } from 'vitest';
import type { MaskBitmap, MaskLabel } from '@mezo/types';
import { MaskStore, validateSnapshot } from './mask-store';
import { InvalidMaskError, NotFoundError } from './errors';
import { bitmapArea, rectBitmap } from './mask-geometry';
import { MESOPHASE_CATEGORIES } from './categories';

function rect(x: number, y: number, width: number, height: number): MaskBitmap {
  const bitmap = rectBitmap({ x, y, width, height });
  if (!bitmap) throw new Error('empty rect');
  return bitmap;
}

/** Sequential id factory for deterministic assertions. */
function counter(): () => string {
  let n = 0;
  return () => `m${++n}`;
}

/** Mulberry32: small seeded PRNG. */
function prng(seed: number): () => number {
  let a = seed;
  return () => {
    a = (a + 0x6d2b79f5) | 0;
    let t = Math.imul(a ^ (a >>> 15), 1 | a);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

describe('MaskStore', () => {
  it('rejects a non-positive image size', () => {
    expect(() => new MaskStore({ width: 0, height: 10 })).toThrow(InvalidMaskError);
  });

  describe('add', () => {
    it('assigns id, increasing order, area and default label', () => {
      const store = new MaskStore({ width: 10, height: 10 }, { createId: counter() });
      const a = store.add({ source: 'manual-edit', bitmap: rect(0, 0, 2, 2) });
      const b = store.add({ source: 'oracle', confidence: 0.8, bitmap: rect(1, 1, 3, 3), label: 'mesophase-fine' });

      expect(a).toMatchObject({ id: 'm1', order: 0, area: 4, label: 'unlabeled', source: 'manual-edit' });
      expect(b).toMatchObject({ id: 'm2', order: 1, area: 9, label: 'mesophase-fine', confidence: 0.8 });
      expect(store.masks.map((m) => m.id)).toEqual(['m1', 'm2']);
    });

    it('clips the bitmap to the image', () => {
      const store = new MaskStore({ width: 10, height: 10 });
      const mask = store.add({ source: 'manual-edit', bitmap: rect(8, 8, 5, 5) });
      expect(mask.bitmap.bounds).toEqual({ x: 8, y: 8, width: 2, height: 2 });
      expect(mask.area).toBe(4);
    });

    it('rejects a mask with no pixel inside the image', () => {
      const store = new MaskStore({ width: 10, height: 10 });
      expect(() => store.add({ source: 'manual-edit', bitmap: rect(20, 20, 2, 2) })).toThrow(InvalidMaskError);
      expect(store.count).toBe(0);
    });

    it('rejects a duplicate id', () => {
      const store = new MaskStore({ width: 10, height: 10 });
      store.add({ source: 'manual-edit', bitmap: rect(0, 0, 1, 1), id: 'same' });
      expect(() => store.add({ source: 'manual-edit', bitmap: rect(2, 2, 1, 1), id: 'same' })).toThrow(
        'Duplicate mask id: same',
      );
    });

    it('rejects a confidence outside [0, 1]', () => {
      const store = new MaskStore({ width: 10, height: 10 });
      expect(() => store.add({ source: 'oracle', confidence: 1.2, bitmap: rect(0, 0, 1, 1) })).toThrow(
        InvalidMaskError,
      );
    });

    it('does not share the caller bitmap', () => {
      const store = new MaskStore({ width: 10, height: 10 });
      const bitmap = rect(0, 0, 2, 2);
      const mask = store.add({ source: 'manual-edit', bitmap });
      bitmap.data.fill(0);
      expect(bitmapArea(store.get(mask.id).bitmap)).toBe(4);
    });
  });

  describe('lookup', () => {
    it('maskAt returns the topmost mask', () => {
      const store = new MaskStore({ width: 10, height: 10 }, { createId: counter() });
      store.add({ source: 'manual-edit', bitmap: rect(0, 0, 5, 5) });
      store.add({ source: 'manual-edit', bitmap: rect(3, 3, 5, 5) });

      expect(store.maskAt({ x: 1, y: 1 })?.id).toBe('m1');
      expect(store.maskAt({ x: 4, y: 4 })?.id).toBe('m2');
      expect(store.maskAt({ x: 9, y: 0 })).toBeNull();
    });

    it('get throws NotFoundError for unknown ids', () => {
      const store = new MaskStore({ width: 10, height: 10 });
      expect(() => store.get('nope')).toThrow(NotFoundError);
    });
  });

  describe('remove / relabel / setActive', () => {
    it('remove clears the active mask', () => {
      const store = new MaskStore({ width: 10, height: 10 });
      const mask = store.add({ source: 'manual-edit', bitmap: rect(0, 0, 2, 2) });
      store.setActive(mask.id);
      store.remove(mask.id);
      expect(store.activeId).toBeNull();
      expect(store.has(mask.id)).toBe(false);
    });

    it('relabel replaces the record and keeps order', () => {
      const store = new MaskStore({ width: 10, height: 10 });
      const original = store.add({ source: 'manual-edit', bitmap: rect(0, 0, 2, 2) });
      const updated = store.relabel(original.id, 'mesophase-domain');

      expect(updated.label).toBe('mesophase-domain');
      expect(updated.order).toBe(original.order);
      expect(original.label).toBe('unlabeled');
    });

    it('relabel rejects an unknown label', () => {
      const store = new MaskStore({ width: 10, height: 10 });
      const mask = store.add({ source: 'manual-edit', bitmap: rect(0, 0, 2, 2) });
      const bogus: string = 'mesophase-huge';
      expect(() => store.relabel(mask.id, bogus as MaskLabel)).toThrow(InvalidMaskError);
    });

    it('setActive rejects unknown ids', () => {
      const store = new MaskStore({ width: 10, height: 10 });
      expect(() => store.setActive('ghost')).toThrow(NotFoundError);
    });
  });

  describe('snapshot / restore', () => {
    it('snapshots are isolated from later edits', () => {
      const store = new MaskStore({ width: 10, height: 10 });
      const mask = store.add({ source: 'manual-edit', bitmap: rect(0, 0, 2, 2) });
      const saved = store.snapshot();

      store.relabel(mask.id, 'isotropic');
      store.add({ source: 'manual-edit', bitmap: rect(5, 5, 2, 2) });

      expect(saved.masks).toHaveLength(1);
      expect(saved.masks[0].label).toBe('unlabeled');
      expect(saved.nextOrder).toBe(1);
    });

    it('restore brings back ids, orders and the active mask', () => {
      const store = new MaskStore({ width: 10, height: 10 });
      const mask = store.add({ source: 'manual-edit', bitmap: rect(0, 0, 2, 2) });
      store.setActive(mask.id);
      const saved = store.snapshot();

      store.remove(mask.id);
      store.restore(saved);

      expect(store.activeId).toBe(mask.id);
      expect(store.get(mask.id).order).toBe(0);
      expect(store.snapshot()).toEqual(saved);
    });

    it('restore rejects a snapshot for another image size', () => {
      const store = new MaskStore({ width: 10, height: 10 });
      const other = new MaskStore({ width: 5, height: 5 }).snapshot();
      expect(() => store.restore(other)).toThrow(InvalidMaskError);
    });

    it('restore leaves the store unchanged on an invalid snapshot', () => {
      const store = new MaskStore({ width: 10, height: 10 });
      store.add({ source: 'manual-edit', bitmap: rect(0, 0, 2, 2) });
      const saved = store.snapshot();
      const broken = { ...saved, nextOrder: 0 };

      expect(() => store.restore(broken)).toThrow('nextOrder must exceed every creation order');
      expect(store.snapshot()).toEqual(saved);
    });
  });

  it('hands out copies that cannot change the stored masks', () => {
    const store = new MaskStore({ width: 10, height: 10 }, { createId: counter() });
    const added = store.add({ source: 'manual-edit', bitmap: rect(0, 0, 2, 2) });
    store.add({ source: 'manual-edit', bitmap: rect(4, 4, 3, 3) });
    const before = store.snapshot();

    added.bitmap.data.fill(0);
    store.get('m1').bitmap.data.fill(0);
    store.masks[1].bitmap.data.fill(0);
    const hit = store.maskAt({ x: 5, y: 5 });
    hit?.bitmap.data.fill(0);
    store.relabel('m2', 'isotropic').bitmap.data.fill(0);

    const after = store.snapshot();
    expect(() => validateSnapshot(after)).not.toThrow();
    expect(after.masks.map((m) => bitmapArea(m.bitmap))).toEqual([4, 9]);
    expect(after.masks[0]).toEqual(before.masks[0]);
  });

  it('keeps its invariants under random edits', () => {
    const random = prng(42);
    const labels: MaskLabel[] = [...MESOPHASE_CATEGORIES, 'unlabeled'];
    const store = new MaskStore({ width: 32, height: 32 });
    const history = [store.snapshot()];

    for (let step = 0; step < 300; step++) {
      const roll = random();
      const masks = store.masks;
      if (roll < 0.5 || masks.length === 0) {
        const x = Math.floor(random() * 40) - 4;
        const y = Math.floor(random() * 40) - 4;
        const bitmap = rect(x, y, 1 + Math.floor(random() * 8), 1 + Math.floor(random() * 8));
        try {
          store.add({ source: 'oracle', confidence: random(), bitmap });
        } catch (error) {
          expect(error).toBeInstanceOf(InvalidMaskError);
        }
      } else if (roll < 0.7) {
        store.remove(masks[Math.floor(random() * masks.length)].id);
      } else if (roll < 0.9) {
        store.relabel(masks[Math.floor(random() * masks.length)].id, labels[Math.floor(random() * labels.length)]);
      } else {
        store.restore(history[Math.floor(random() * history.length)]);
      }

      const snapshot = store.snapshot();
      expect(() => validateSnapshot(snapshot)).not.toThrow();
      const orders = snapshot.masks.map((m) => m.order);
      expect(orders).toEqual([...orders].sort((a, b) => a - b));
      history.push(snapshot);
    }
  });
});
