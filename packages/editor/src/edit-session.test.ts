import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type {
  ClassificationResult,
  LibraryIndex,
  MaskLabel,
  MaskStoreSnapshot,
  OracleRequest,
  Prompt,
  RasterImage,
  RawProposal,
  SampleRecord,
  SegmentationOracle,
} from '@mezo/types';
import {
  BusyError,
  InvalidMaskError,
  MaskStore,
  NotFoundError,
  SessionStateError,
  rectBitmap,
} from '@mezo/core';
import { EditSession, type EditSessionOptions } from './edit-session';

const IMAGE: RasterImage = { width: 10, height: 10, data: new Uint8Array(400) };
const CLICK: Prompt = { kind: 'point', position: { x: 1, y: 1 }, label: 'foreground' };

/** Oracle proposal covering a full rectangle. */
function rectProposal(x: number, y: number, width: number, height: number, score: number): RawProposal {
  return { mask: { kind: 'rle', bounds: { x, y, width, height }, runs: [0, width * height] }, score };
}

function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

function mockOracle() {
  const predict = vi.fn<[OracleRequest, AbortSignal?], Promise<RawProposal[]>>();
  const oracle: SegmentationOracle = { predict };
  return { oracle, predict };
}

/** Store with `a` (fine, 2x2 at 0,0), `b` (coarse, 2x2 at 4,4) and `c` (isotropic, 10x4 at 0,6). */
function seededSnapshot(): MaskStoreSnapshot {
  const store = new MaskStore(IMAGE);
  const shapes = [
    { id: 'a', rect: { x: 0, y: 0, width: 2, height: 2 }, label: 'mesophase-fine' },
    { id: 'b', rect: { x: 4, y: 4, width: 2, height: 2 }, label: 'mesophase-coarse' },
    { id: 'c', rect: { x: 0, y: 6, width: 10, height: 4 }, label: 'isotropic' },
  ] as const;
  for (const { id, rect, label } of shapes) {
    const bitmap = rectBitmap(rect);
    if (!bitmap) throw new Error('empty rect');
    store.add({ source: 'manual-edit', bitmap, label, id });
  }
  return store.snapshot();
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

function createSession(overrides: Partial<EditSessionOptions> = {}): EditSession {
  let next = 0;
  return new EditSession({
    image: IMAGE,
    oracle: mockOracle().oracle,
    createId: () => `m${++next}`,
    ...overrides,
  });
}

describe('EditSession', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'debug').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('starts idle with an unclassified image', () => {
    const state = createSession().getState();
    expect(state.mode).toBe('idle');
    expect(state.maskCount).toBe(0);
    expect(state.canUndo).toBe(false);
    expect(state.dirty).toBe(false);
    expect(state.classification.unclassified).toEqual({ pixels: 100, unlabeledPixels: 0, backgroundPixels: 100 });
  });

  describe('prompt workflow', () => {
    it('arms the prompt tool and reports the mode change', () => {
      const session = createSession();
      const modes = vi.fn();
      session.events.on('session:mode-changed', modes);

      session.beginPrompt();

      expect(session.getState().mode).toBe('awaiting-prompt');
      expect(modes).toHaveBeenCalledWith({ from: 'idle', to: 'awaiting-prompt' });
    });

    it('enters proposing synchronously and reviews the candidates', async () => {
      const { oracle, predict } = mockOracle();
      predict.mockResolvedValue([rectProposal(5, 5, 2, 2, 0.7), rectProposal(0, 0, 4, 4, 0.9)]);
      const session = createSession({ oracle });

      const done = session.submitPrompt(CLICK);
      expect(session.getState().mode).toBe('proposing');
      await done;

      const state = session.getState();
      expect(state.mode).toBe('reviewing');
      expect(state.requestToken).toBe(1);
      expect(state.candidates.map((c) => [c.confidence, c.area, c.edited])).toEqual([
        [0.9, 16, false],
        [0.7, 4, false],
      ]);
      expect(predict.mock.calls[0][0]).toEqual({ image: IMAGE, prompt: CLICK });
    });

    it('adds the accepted candidate as one undoable operation', async () => {
      const { oracle, predict } = mockOracle();
      predict.mockResolvedValue([rectProposal(0, 0, 4, 4, 0.9)]);
      const session = createSession({ oracle });
      const results: ClassificationResult[] = [];
      session.onClassification((result) => results.push(result));

      await session.submitPrompt(CLICK);
      const mask = session.accept(0, 'mesophase-coarse');

      expect(mask).toMatchObject({ id: 'm1', source: 'oracle', confidence: 0.9, label: 'mesophase-coarse', area: 16 });
      const state = session.getState();
      expect(state.mode).toBe('idle');
      expect(state.candidates).toEqual([]);
      expect(state.maskCount).toBe(1);
      expect(state.canUndo).toBe(true);
      expect(state.undoDescription).toBe('Accept proposed mask');
      expect(state.dirty).toBe(true);
      expect(state.classification.categories['mesophase-coarse'].pixels).toBe(16);
      expect(results).toHaveLength(1);
      expect(results[0].classifiedPixels).toBe(16);
    });

    it('leaves the store untouched on reject', async () => {
      const { oracle, predict } = mockOracle();
      predict.mockResolvedValue([rectProposal(0, 0, 4, 4, 0.9)]);
      const session = createSession({ oracle });

      await session.submitPrompt(CLICK);
      session.reject();

      expect(session.getState().mode).toBe('idle');
      expect(session.getState().maskCount).toBe(0);
      expect(session.getState().canUndo).toBe(false);
    });

    it('returns to idle with an advisory when nothing passes the floor', async () => {
      const { oracle, predict } = mockOracle();
      predict.mockResolvedValue([rectProposal(0, 0, 4, 4, 0.2)]);
      const session = createSession({ oracle });

      await session.submitPrompt(CLICK);

      expect(session.getState().mode).toBe('idle');
      expect(session.getState().advisory?.kind).toBe('no-proposals');
    });

    it('turns an oracle failure into an advisory', async () => {
      const { oracle, predict } = mockOracle();
      predict.mockRejectedValue(new Error('model crashed'));
      const session = createSession({ oracle });
      const advisories = vi.fn();
      session.events.on('session:advisory', advisories);

      await session.submitPrompt(CLICK);

      const expected = { kind: 'oracle-unavailable', message: 'Segmentation oracle failed: model crashed' };
      expect(session.getState().mode).toBe('idle');
      expect(session.getState().advisory).toEqual(expected);
      expect(advisories).toHaveBeenCalledWith(expected);
      expect(console.warn).toHaveBeenCalledOnce();
    });

    it('clears the advisory on the next prompt', async () => {
      const { oracle, predict } = mockOracle();
      predict.mockResolvedValueOnce([]).mockResolvedValueOnce([rectProposal(0, 0, 4, 4, 0.9)]);
      const session = createSession({ oracle });

      await session.submitPrompt(CLICK);
      expect(session.getState().advisory).not.toBeNull();
      await session.submitPrompt(CLICK);
      expect(session.getState().advisory).toBeNull();
      expect(session.getState().requestToken).toBe(2);
    });

    it('rejects a second prompt while one is in flight', async () => {
      const { oracle, predict } = mockOracle();
      const response = deferred<RawProposal[]>();
      predict.mockReturnValue(response.promise);
      const session = createSession({ oracle });

      const first = session.submitPrompt(CLICK);
      await expect(session.submitPrompt(CLICK)).rejects.toBeInstanceOf(BusyError);

      response.resolve([rectProposal(0, 0, 4, 4, 0.9)]);
      await first;
      expect(session.getState().mode).toBe('reviewing');
      expect(predict).toHaveBeenCalledOnce();
    });

    it('discards a late result after cancellation', async () => {
      const { oracle, predict } = mockOracle();
      const response = deferred<RawProposal[]>();
      predict.mockReturnValue(response.promise);
      const session = createSession({ oracle });
      const discarded = vi.fn();
      session.events.on('oracle:discarded', discarded);
      const before = session.snapshot();

      const pending = session.submitPrompt(CLICK);
      expect(session.cancelPrompt()).toBe(true);
      response.resolve([rectProposal(0, 0, 4, 4, 0.9)]);
      await pending;

      const state = session.getState();
      expect(state.mode).toBe('idle');
      expect(state.candidates).toEqual([]);
      expect(state.advisory).toBeNull();
      expect(session.snapshot()).toEqual(before);
      expect(discarded).toHaveBeenCalledWith({ requestToken: 1 });
      expect(predict.mock.calls[0][1]?.aborted).toBe(true);
    });

    it('cancels the request in flight on dispose', async () => {
      const { oracle, predict } = mockOracle();
      predict.mockReturnValue(deferred<RawProposal[]>().promise);
      const session = createSession({ oracle });

      const pending = session.submitPrompt(CLICK);
      session.dispose();
      await pending;

      expect(session.getState().mode).toBe('idle');
      expect(predict.mock.calls[0][1]?.aborted).toBe(true);
    });

    it('has nothing to cancel when no request is in flight', () => {
      expect(createSession().cancelPrompt()).toBe(false);
    });

    it('refuses prompts in manual-draw', async () => {
      const session = createSession();
      session.startManualDraw();
      await expect(session.submitPrompt(CLICK)).rejects.toBeInstanceOf(SessionStateError);
    });

    it('refuses accept outside reviewing', () => {
      expect(() => createSession().accept()).toThrow('accept is not available while idle');
    });
  });

  describe('refineCandidate', () => {
    async function reviewing(): Promise<EditSession> {
      const { oracle, predict } = mockOracle();
      predict.mockResolvedValue([rectProposal(0, 0, 4, 4, 0.9)]);
      const session = createSession({ oracle });
      await session.submitPrompt(CLICK);
      return session;
    }

    it('grows the boundary and accepts the result as a manual mask', async () => {
      const session = await reviewing();

      const refined = session.refineCandidate(0, { kind: 'boundary', amount: 1 });
      expect(refined.area).toBe(24);
      expect(refined.edited).toBe(true);
      expect(session.getState().candidates[0]).toBe(refined);

      const mask = session.accept();
      expect(mask.source).toBe('manual-edit');
      expect(mask.area).toBe(24);
      expect('confidence' in mask).toBe(false);
    });

    it('keeps the candidate when an edit would erase it', async () => {
      const session = await reviewing();
      const original = session.getState().candidates[0];

      expect(() =>
        session.refineCandidate(0, { kind: 'brush', points: [{ x: 2, y: 2 }], radius: 4, mode: 'remove' }),
      ).toThrow(InvalidMaskError);
      expect(session.getState().candidates[0]).toBe(original);
    });

    it('rejects an unknown index', async () => {
      const session = await reviewing();
      expect(() => session.refineCandidate(3, { kind: 'boundary', amount: 1 })).toThrow(RangeError);
    });
  });

  describe('manual drawing', () => {
    it('commits a union of shapes', () => {
      const session = createSession();
      session.startManualDraw();
      session.drawShape({
        kind: 'polygon',
        points: [
          { x: 0, y: 0 },
          { x: 4, y: 0 },
          { x: 4, y: 4 },
          { x: 0, y: 4 },
        ],
      });
      session.drawShape({ kind: 'circle', center: { x: 5, y: 5 }, radius: 2 });

      const mask = session.commitManual('isotropic');
      expect(mask).toMatchObject({ source: 'manual-edit', label: 'isotropic', area: 28 });
      expect(session.getState().mode).toBe('idle');
      expect(session.getState().draft).toBeNull();
      expect(session.getState().classification.categories.isotropic.pixels).toBe(28);
    });

    it('paints and erases with the brush', () => {
      const session = createSession();
      session.startManualDraw();

      const painted = session.drawShape({ kind: 'brush', points: [{ x: 5, y: 5 }], radius: 2, mode: 'add' });
      expect(painted?.bounds).toEqual({ x: 3, y: 3, width: 5, height: 5 });
      const erased = session.drawShape({ kind: 'brush', points: [{ x: 5, y: 5 }], radius: 3, mode: 'remove' });
      expect(erased).toBeNull();
    });

    it('rejects a shape outside the image', () => {
      const session = createSession();
      session.startManualDraw();
      expect(() => session.drawShape({ kind: 'circle', center: { x: -20, y: -20 }, radius: 2 })).toThrow(
        InvalidMaskError,
      );
    });

    it('rejects a commit with nothing drawn', () => {
      const session = createSession();
      session.startManualDraw();
      expect(() => session.commitManual()).toThrow('Nothing has been drawn');
    });

    it('drops the draft on cancel', () => {
      const session = createSession();
      session.startManualDraw();
      session.drawShape({ kind: 'circle', center: { x: 5, y: 5 }, radius: 2 });
      session.cancelManual();

      expect(session.getState().mode).toBe('idle');
      expect(session.getState().draft).toBeNull();
      expect(session.getState().maskCount).toBe(0);
    });
  });

  describe('store edits', () => {
    it('lets the later of two overlapping masks win', async () => {
      const { oracle, predict } = mockOracle();
      predict.mockResolvedValue([rectProposal(0, 0, 10, 10, 0.9)]);
      const session = createSession({ oracle });

      await session.submitPrompt(CLICK);
      session.accept(0, 'mesophase-fine');
      await session.submitPrompt(CLICK);
      session.accept(0, 'mesophase-coarse');

      const { categories } = session.getState().classification;
      expect(categories['mesophase-coarse'].pixels).toBe(100);
      expect(categories['mesophase-fine'].pixels).toBe(0);
    });

    it('merges two masks and restores both with one undo', () => {
      const session = createSession({ snapshot: seededSnapshot() });
      session.setActive('a');

      const merged = session.merge('a', 'b');
      expect(merged).toMatchObject({ id: 'm1', source: 'manual-edit', label: 'mesophase-coarse', area: 8, order: 3 });
      expect(session.layering.masks.map((m) => m.id)).toEqual(['c', 'm1']);
      expect(session.getState().activeId).toBe('m1');

      expect(session.undo()).toBe(true);
      expect(session.layering.masks.map((m) => m.id)).toEqual(['a', 'b', 'c']);
      expect(session.getState().activeId).toBe('a');

      expect(session.redo()).toBe(true);
      expect(session.layering.masks.map((m) => m.id)).toEqual(['c', 'm1']);
    });

    it('splits a mask into two with the same label', () => {
      const session = createSession({ snapshot: seededSnapshot() });

      const parts = session.split('c', [
        { x: 5.5, y: 5 },
        { x: 5.5, y: 11 },
      ]);
      expect(parts.map((m) => [m.area, m.label])).toEqual([
        [24, 'isotropic'],
        [16, 'isotropic'],
      ]);
      expect(session.layering.masks.map((m) => m.id)).toEqual(['a', 'b', 'm1', 'm2']);
    });

    it('records nothing when an edit fails', () => {
      const session = createSession({ snapshot: seededSnapshot() });
      const before = session.snapshot();

      expect(() => session.split('c', [{ x: 0.5, y: 5 }, { x: 0.5, y: 6.5 }])).toThrow(InvalidMaskError);
      expect(() => session.merge('a', 'a')).toThrow(InvalidMaskError);
      expect(() => session.remove('missing')).toThrow(NotFoundError);

      expect(session.snapshot()).toEqual(before);
      expect(session.getState().canUndo).toBe(false);
    });

    it('removes the topmost mask under a pixel', () => {
      const session = createSession({ snapshot: seededSnapshot() });
      expect(session.removeAt({ x: 4, y: 5 })?.id).toBe('b');
      expect(session.removeAt({ x: 9, y: 0 })).toBeNull();
      expect(session.getState().maskCount).toBe(2);
    });

    it('does not record selecting the active mask again', () => {
      const session = createSession({ snapshot: seededSnapshot() });
      session.setActive('a');
      session.setActive('a');
      expect(session.undo()).toBe(true);
      expect(session.getState().canUndo).toBe(false);
    });

    it('returns to the starting state after undoing every operation', () => {
      const initial = seededSnapshot();
      const session = createSession({ snapshot: initial });

      session.relabel('a', 'isotropic');
      session.setActive('b');
      const [left, right] = session.split('c', [
        { x: 5.5, y: 5 },
        { x: 5.5, y: 11 },
      ]);
      session.merge(left.id, right.id);
      session.remove('b');

      for (let i = 0; i < 5; i++) {
        expect(session.undo()).toBe(true);
      }
      expect(session.undo()).toBe(false);
      expect(session.snapshot()).toEqual(initial);
    });

    it('returns to the starting state after undoing random edit sequences', () => {
      const random = prng(7);
      const pick = <T>(items: readonly T[]): T => items[Math.floor(random() * items.length)];
      const labels: MaskLabel[] = ['unlabeled', 'isotropic', 'mesophase-fine', 'mesophase-coarse'];

      for (let round = 0; round < 25; round++) {
        const initial = seededSnapshot();
        const session = createSession({ snapshot: initial });
        let recorded = 0;
        session.events.on('history:pushed', () => recorded++);

        for (let step = 0; step < 15; step++) {
          const ids = session.layering.masks.map((m) => m.id);
          const roll = random();
          try {
            if (roll < 0.25 || ids.length === 0) {
              session.startManualDraw();
              session.drawShape({ kind: 'circle', center: { x: random() * 10, y: random() * 10 }, radius: 1 + random() * 3 });
              session.commitManual();
            } else if (roll < 0.4) {
              session.remove(pick(ids));
            } else if (roll < 0.55) {
              session.relabel(pick(ids), pick(labels));
            } else if (roll < 0.7) {
              session.setActive(random() < 0.2 ? null : pick(ids));
            } else if (roll < 0.85) {
              session.merge(pick(ids), pick(ids));
            } else {
              const x = 0.5 + Math.floor(random() * 9);
              session.split(pick(ids), [
                { x, y: -1 },
                { x, y: 11 },
              ]);
            }
          } catch (err) {
            expect(err).toBeInstanceOf(InvalidMaskError);
          }
        }

        for (let i = 0; i < recorded; i++) {
          expect(session.undo()).toBe(true);
        }
        expect(session.undo()).toBe(false);
        expect(session.snapshot()).toEqual(initial);
      }
    });

    it('hands out masks that cannot change the store', () => {
      const initial = seededSnapshot();
      const session = createSession({ snapshot: initial });

      session.getMask('a').bitmap.data.fill(0);
      session.layering.masks[1].bitmap.data.fill(0);

      expect(session.snapshot()).toEqual(initial);
      expect(session.getState().classification.classifiedPixels).toBe(48);
    });

    it('clears redo on a new operation', () => {
      const session = createSession({ snapshot: seededSnapshot() });
      session.relabel('a', 'isotropic');
      session.undo();
      expect(session.getState().canRedo).toBe(true);

      session.relabel('b', 'isotropic');
      expect(session.getState().canRedo).toBe(false);
      expect(session.redo()).toBe(false);
    });

    it('keeps at most historyDepth operations', () => {
      const session = createSession({ snapshot: seededSnapshot(), config: { historyDepth: 2 } });
      session.relabel('a', 'isotropic');
      session.relabel('a', 'mesophase-medium');
      session.relabel('a', 'mesophase-domain');

      expect(session.undo()).toBe(true);
      expect(session.undo()).toBe(true);
      expect(session.undo()).toBe(false);
      expect(session.getMask('a').label).toBe('isotropic');
    });
  });

  describe('save', () => {
    function fakeLibrary(save: LibraryIndex['save']): LibraryIndex {
      const unexpected = (): Promise<never> => Promise.reject(new Error('unexpected call'));
      return {
        add: unexpected,
        open: unexpected,
        openImage: unexpected,
        save,
        updateCalibration: unexpected,
        delete: unexpected,
        list: unexpected,
      };
    }

    const RECORD: SampleRecord = {
      id: 's1',
      name: 'Pitch',
      description: '',
      imageFile: 'image.png',
      width: 10,
      height: 10,
      createdAt: '2024-01-01T00:00:00.000Z',
      lastModified: '2024-01-01T00:00:00.000Z',
      hasSnapshot: true,
      calibration: { pixels: 1, micrometers: 1, porosity: 0 },
    };

    it('writes the store and clears the dirty flag', async () => {
      const save = vi.fn<Parameters<LibraryIndex['save']>, Promise<SampleRecord>>().mockResolvedValue(RECORD);
      const session = createSession({
        snapshot: seededSnapshot(),
        persistence: { library: fakeLibrary(save), sampleId: 's1' },
      });
      session.relabel('a', 'isotropic');

      await expect(session.save()).resolves.toBe(RECORD);
      expect(save).toHaveBeenCalledWith('s1', session.snapshot());
      expect(session.getState().dirty).toBe(false);
    });

    it('raises an advisory and rethrows when the library fails', async () => {
      const save = vi.fn<Parameters<LibraryIndex['save']>, Promise<SampleRecord>>()
        .mockRejectedValue(new Error('disk full'));
      const session = createSession({ persistence: { library: fakeLibrary(save), sampleId: 's1' } });

      await expect(session.save()).rejects.toThrow('disk full');
      expect(session.getState().advisory).toEqual({
        kind: 'save-failed',
        message: 'Could not save sample s1: disk full',
      });
    });

    it('is clean again after undoing back to the saved state', async () => {
      const save = vi.fn<Parameters<LibraryIndex['save']>, Promise<SampleRecord>>().mockResolvedValue(RECORD);
      const session = createSession({
        snapshot: seededSnapshot(),
        persistence: { library: fakeLibrary(save), sampleId: 's1' },
      });

      session.relabel('a', 'isotropic');
      await session.save();
      session.relabel('b', 'isotropic');
      expect(session.getState().dirty).toBe(true);

      session.undo();
      expect(session.getState().dirty).toBe(false);
      session.undo();
      expect(session.getState().dirty).toBe(true);
      session.redo();
      expect(session.getState().dirty).toBe(false);

      session.undo();
      session.relabel('c', 'mesophase-fine');
      session.undo();
      expect(session.getState().dirty).toBe(true);
    });

    it('stays dirty once the saved state has left the history', () => {
      const session = createSession({ snapshot: seededSnapshot(), config: { historyDepth: 1 } });
      session.relabel('a', 'isotropic');
      session.relabel('b', 'isotropic');

      expect(session.undo()).toBe(true);
      expect(session.undo()).toBe(false);
      expect(session.getState().dirty).toBe(true);
    });

    it('needs a library sample', async () => {
      await expect(createSession().save()).rejects.toBeInstanceOf(SessionStateError);
    });
  });
});
