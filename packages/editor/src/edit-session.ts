/**
 * @module edit-session
 * Interactive editing of one image's mask layering.
 *
 * An EditSession owns a Mask Store, its undo history and the oracle adapter,
 * and walks the prompt workflow:
 *
 * ```
 * idle → awaiting-prompt → proposing → reviewing → idle
 * idle → manual-draw → idle
 * ```
 *
 * Every accepted mutation is recorded as one {@link EditOperation} holding the
 * store state before and after it. After each store change the session
 * recomputes the classification and publishes it through its observable
 * state and the `classification:updated` event.
 */

import { createStore, type StoreApi } from 'zustand/vanilla';
import type {
  Advisory,
  CandidateEdit,
  ClassificationResult,
  EditOperation,
  EditOperationKind,
  EventBus,
  LibraryIndex,
  ManualShape,
  Mask,
  MaskBitmap,
  MaskLabel,
  MaskLayering,
  MaskStoreSnapshot,
  MezoConfig,
  Point,
  Prompt,
  ProposedMask,
  RasterImage,
  ReviewCandidate,
  SampleRecord,
  SegmentationOracle,
  SessionMode,
  SessionState,
} from '@mezo/types';
import {
  BusyError,
  EditHistoryImpl,
  EventBusImpl,
  InvalidMaskError,
  MaskStore,
  OracleUnavailableError,
  SessionStateError,
  bitmapArea,
  circleBitmap,
  computeClassification,
  cropToContent,
  polygonBitmap,
  resolveConfig,
  splitBitmap,
  unionBitmaps,
} from '@mezo/core';
import { SegmentationOracleAdapter, adjustBoundary, applyBrushStroke } from '@mezo/ai';

/** Library sample a session saves into. */
export interface SessionPersistence {
  library: LibraryIndex;
  sampleId: string;
}

/** Options for {@link EditSession}. */
export interface EditSessionOptions {
  /** The image being segmented. Held by reference. */
  image: RasterImage;
  /** Model that proposes candidate masks. */
  oracle: SegmentationOracle;
  /** Overrides of `DEFAULT_CONFIG`. */
  config?: Partial<MezoConfig>;
  /** Store contents to start from. */
  snapshot?: MaskStoreSnapshot;
  /** Event bus to publish on; a private one is created when omitted. */
  events?: EventBus;
  /** Where {@link EditSession.save} writes to. */
  persistence?: SessionPersistence;
  /** Advisory to show as soon as the session opens. */
  advisory?: Advisory;
  /** Id factory for new masks. */
  createId?: () => string;
}

interface PendingRequest {
  token: number;
  controller: AbortController;
}

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Edit Engine for one image.
 *
 * Usage:
 * ```ts
 * const session = new EditSession({ image, oracle });
 * session.subscribe((state) => render(state));
 * await session.submitPrompt({ kind: 'point', position: { x: 40, y: 30 }, label: 'foreground' });
 * if (session.getState().mode === 'reviewing') session.accept(0, 'mesophase-coarse');
 * ```
 */
export class EditSession {
  /** The image being segmented. */
  readonly image: RasterImage;
  /** Bus carrying mask, history, mode and classification events. */
  readonly events: EventBus;
  readonly config: Readonly<MezoConfig>;

  private readonly store: MaskStore;
  private readonly history: EditHistoryImpl;
  private readonly adapter: SegmentationOracleAdapter;
  private readonly persistence: SessionPersistence | null;
  private readonly state: StoreApi<SessionState>;
  private pending: PendingRequest | null = null;
  /** History position the saved copy matches; undefined once it is out of reach. */
  private savedAt: EditOperation | null | undefined = null;

  /**
   * @throws {RangeError} If a config value is out of range.
   * @throws {InvalidMaskError} If the snapshot does not fit the image.
   */
  constructor(options: EditSessionOptions) {
    this.image = options.image;
    this.config = resolveConfig(options.config);
    this.events = options.events ?? new EventBusImpl();
    this.persistence = options.persistence ?? null;
    this.store = new MaskStore(options.image, { snapshot: options.snapshot, createId: options.createId });
    this.history = new EditHistoryImpl(this.config.historyDepth);
    this.adapter = new SegmentationOracleAdapter(options.oracle, this.config);

    const classification = computeClassification(this.store);
    this.state = createStore<SessionState>()(() => ({
      mode: 'idle',
      requestToken: 0,
      candidates: [],
      draft: null,
      advisory: options.advisory ?? null,
      classification,
      maskCount: this.store.count,
      activeId: this.store.activeId,
      canUndo: false,
      canRedo: false,
      undoDescription: null,
      redoDescription: null,
      dirty: false,
    }));
  }

  // ── Observation ──

  /** Current session state. */
  getState(): SessionState {
    return this.state.getState();
  }

  /** Observe state changes. Returns an unsubscribe function. */
  subscribe(listener: (state: SessionState, previous: SessionState) => void): () => void {
    return this.state.subscribe(listener);
  }

  /** Observe classification updates. Returns an unsubscribe function. */
  onClassification(listener: (result: ClassificationResult) => void): () => void {
    return this.events.on('classification:updated', ({ result }) => listener(result));
  }

  /** Read-only view of the masks, for reports and overlays. */
  get layering(): MaskLayering {
    return { width: this.store.width, height: this.store.height, masks: this.store.masks };
  }

  /**
   * Look up a mask.
   * @throws {NotFoundError} If the id is unknown.
   */
  getMask(maskId: string): Mask {
    return this.store.get(maskId);
  }

  /** Deep copy of the store. */
  snapshot(): MaskStoreSnapshot {
    return this.store.snapshot();
  }

  /** Clear the current advisory. */
  dismissAdvisory(): void {
    this.state.setState({ advisory: null });
  }

  // ── Prompt workflow ──

  /** Arm the prompt tool. */
  beginPrompt(): void {
    this.expectMode('beginPrompt', 'idle', 'awaiting-prompt');
    this.transition('awaiting-prompt');
  }

  /**
   * Send a prompt to the oracle.
   *
   * The session enters `proposing` before this returns its promise. The
   * promise settles when the request has been resolved into `reviewing`
   * (candidates found) or `idle` (none found, or the oracle was
   * unavailable, both with an advisory).
   *
   * @throws {BusyError} If a request is already in flight.
   * @throws {SessionStateError} In `manual-draw`.
   */
  async submitPrompt(prompt: Prompt): Promise<void> {
    const { mode, requestToken } = this.getState();
    if (mode === 'proposing') {
      throw new BusyError();
    }
    this.expectMode('submitPrompt', 'idle', 'awaiting-prompt', 'reviewing');

    const token = requestToken + 1;
    const controller = new AbortController();
    this.pending = { token, controller };
    this.transition('proposing', { requestToken: token, candidates: [], advisory: null });

    let proposals: ProposedMask[];
    try {
      proposals = await this.adapter.propose(this.image, prompt, { signal: controller.signal });
    } catch (err) {
      if (this.isStale(token)) {
        this.discard(token);
        return;
      }
      this.pending = null;
      if (err instanceof OracleUnavailableError) {
        console.warn(`[editor] Request ${token} failed (${err.reason}):`, err.message);
        this.transition('idle');
        this.raise({ kind: 'oracle-unavailable', message: err.message });
        return;
      }
      this.transition('idle');
      throw err;
    }

    if (this.isStale(token)) {
      this.discard(token);
      return;
    }
    this.pending = null;
    this.events.emit('oracle:proposed', { requestToken: token, count: proposals.length });

    if (proposals.length === 0) {
      this.transition('idle');
      this.raise({ kind: 'no-proposals', message: 'The model found no region for this prompt' });
      return;
    }
    this.transition('reviewing', {
      candidates: proposals.map((p) => ({ ...p, edited: false })),
    });
  }

  /**
   * Abandon the request in flight. Its result, if it still arrives, is
   * discarded without touching the store.
   * @returns Whether there was a request to cancel.
   */
  cancelPrompt(): boolean {
    if (!this.pending) return false;
    const { controller } = this.pending;
    this.pending = null;
    controller.abort();
    this.transition('idle');
    return true;
  }

  /**
   * Edit a candidate before accepting it.
   *
   * @returns The edited candidate.
   * @throws {RangeError} If there is no candidate at `index`.
   * @throws {InvalidMaskError} If the edit would leave no pixel; the candidate is kept.
   */
  refineCandidate(index: number, edit: CandidateEdit): ReviewCandidate {
    this.expectMode('refineCandidate', 'reviewing');
    const candidates = this.getState().candidates;
    const candidate = this.candidateAt(index);

    const bitmap =
      edit.kind === 'brush'
        ? applyBrushStroke(candidate.bitmap, this.image, edit.points, { radius: edit.radius, mode: edit.mode })
        : adjustBoundary(candidate.bitmap, this.image, edit.amount);
    if (!bitmap) {
      throw new InvalidMaskError('Refinement would leave the candidate empty');
    }

    const refined: ReviewCandidate = { ...candidate, bitmap, area: bitmapArea(bitmap), edited: true };
    this.state.setState({ candidates: candidates.map((c, i) => (i === index ? refined : c)) });
    return refined;
  }

  /**
   * Add a candidate to the store and return to idle.
   *
   * @param index - Candidate to keep (default: the best one).
   * @param label - Label for the new mask (default `unlabeled`).
   * @throws {RangeError} If there is no candidate at `index`.
   */
  accept(index = 0, label?: MaskLabel): Mask {
    this.expectMode('accept', 'reviewing');
    const candidate = this.candidateAt(index);

    const mask = this.apply('add-mask', 'Accept proposed mask', () => {
      const added = candidate.edited
        ? this.store.add({ source: 'manual-edit', bitmap: candidate.bitmap, label })
        : this.store.add({ source: 'oracle', confidence: candidate.confidence, bitmap: candidate.bitmap, label });
      return { result: added, maskIds: [added.id] };
    });
    this.transition('idle', { candidates: [] });
    this.events.emit('mask:added', { maskId: mask.id });
    return mask;
  }

  /** Discard the candidates without changing the store. */
  reject(): void {
    this.expectMode('reject', 'reviewing');
    this.transition('idle', { candidates: [] });
  }

  // ── Manual drawing ──

  /** Enter manual-draw with an empty draft. */
  startManualDraw(): void {
    this.expectMode('startManualDraw', 'idle');
    this.transition('manual-draw', { draft: null });
  }

  /**
   * Add a shape to the draft, or erase with a `remove` brush.
   *
   * @returns The draft after the shape, or null if nothing is left.
   * @throws {InvalidMaskError} If a polygon or circle covers no pixel of the image.
   */
  drawShape(shape: ManualShape): MaskBitmap | null {
    this.expectMode('drawShape', 'manual-draw');
    const { draft } = this.getState();

    let next: MaskBitmap | null;
    if (shape.kind === 'brush') {
      next = applyBrushStroke(draft, this.image, shape.points, { radius: shape.radius, mode: shape.mode });
    } else {
      const drawn = shape.kind === 'polygon' ? polygonBitmap(shape.points) : circleBitmap(shape.center, shape.radius);
      const clipped = drawn && cropToContent(drawn, this.image);
      if (!clipped) {
        throw new InvalidMaskError(`The ${shape.kind} covers no pixel of the image`);
      }
      next = draft ? unionBitmaps(draft, clipped) : clipped;
    }

    this.state.setState({ draft: next });
    return next;
  }

  /**
   * Add the draft as a manual mask and return to idle.
   * @throws {InvalidMaskError} If nothing has been drawn.
   */
  commitManual(label?: MaskLabel): Mask {
    this.expectMode('commitManual', 'manual-draw');
    const { draft } = this.getState();
    if (!draft) {
      throw new InvalidMaskError('Nothing has been drawn');
    }

    const mask = this.apply('add-mask', 'Draw mask', () => {
      const added = this.store.add({ source: 'manual-edit', bitmap: draft, label });
      return { result: added, maskIds: [added.id] };
    });
    this.transition('idle', { draft: null });
    this.events.emit('mask:added', { maskId: mask.id });
    return mask;
  }

  /** Leave manual-draw, dropping the draft. */
  cancelManual(): void {
    this.expectMode('cancelManual', 'manual-draw');
    this.transition('idle', { draft: null });
  }

  // ── Store edits ──

  /**
   * Delete a mask.
   * @throws {NotFoundError} If the id is unknown.
   */
  remove(maskId: string): Mask {
    const wasActive = this.store.activeId === maskId;
    const removed = this.apply('remove-mask', 'Remove mask', () => ({
      result: this.store.remove(maskId),
      maskIds: [maskId],
    }));
    this.events.emit('mask:removed', { maskId });
    if (wasActive) this.events.emit('active:changed', { maskId: null });
    return removed;
  }

  /**
   * Delete the topmost mask under a pixel.
   * @returns The removed mask, or null if no mask covers the pixel.
   */
  removeAt(point: Point): Mask | null {
    const hit = this.store.maskAt(point);
    return hit && this.remove(hit.id);
  }

  /**
   * Change a mask's label.
   * @throws {NotFoundError} If the id is unknown.
   * @throws {InvalidMaskError} If the label is unknown.
   */
  relabel(maskId: string, label: MaskLabel): Mask {
    const updated = this.apply('relabel-mask', `Label mask as ${label}`, () => ({
      result: this.store.relabel(maskId, label),
      maskIds: [maskId],
    }));
    this.events.emit('mask:relabeled', { maskId, label });
    return updated;
  }

  /**
   * Select the mask being edited. Selecting the current one records nothing.
   * @throws {NotFoundError} If the id is unknown.
   */
  setActive(maskId: string | null): void {
    if (this.store.activeId === maskId) {
      if (maskId !== null) this.store.get(maskId);
      return;
    }
    this.apply('set-active', maskId === null ? 'Clear selection' : 'Select mask', () => {
      this.store.setActive(maskId);
      return { result: undefined, maskIds: maskId === null ? [] : [maskId] };
    });
    this.events.emit('active:changed', { maskId });
  }

  /**
   * Replace two masks by their union. The result takes the label of the
   * higher-order mask and sits on top of the layering.
   *
   * @throws {NotFoundError} If either id is unknown.
   * @throws {InvalidMaskError} If both ids are the same.
   */
  merge(aId: string, bId: string): Mask {
    if (aId === bId) {
      throw new InvalidMaskError('Cannot merge a mask with itself');
    }
    const wasActive = this.store.activeId === aId || this.store.activeId === bId;

    const merged = this.apply('merge-masks', 'Merge masks', () => {
      const a = this.store.get(aId);
      const b = this.store.get(bId);
      const top = a.order > b.order ? a : b;
      this.store.remove(aId);
      this.store.remove(bId);
      const added = this.store.add({
        source: 'manual-edit',
        bitmap: unionBitmaps(a.bitmap, b.bitmap),
        label: top.label,
      });
      if (wasActive) this.store.setActive(added.id);
      return { result: added, maskIds: [aId, bId, added.id] };
    });

    this.events.emit('mask:removed', { maskId: aId });
    this.events.emit('mask:removed', { maskId: bId });
    this.events.emit('mask:added', { maskId: merged.id });
    if (wasActive) this.events.emit('active:changed', { maskId: merged.id });
    return merged;
  }

  /**
   * Cut a mask in two along a path. Both parts keep the label.
   *
   * @returns The two new masks, larger first.
   * @throws {NotFoundError} If the id is unknown.
   * @throws {InvalidMaskError} If the path does not divide the mask.
   */
  split(maskId: string, cutPath: readonly Point[]): [Mask, Mask] {
    const wasActive = this.store.activeId === maskId;

    const parts = this.apply('split-mask', 'Split mask', () => {
      const mask = this.store.get(maskId);
      const [first, second] = splitBitmap(mask.bitmap, cutPath);
      this.store.remove(maskId);
      const a = this.store.add({ source: 'manual-edit', bitmap: first, label: mask.label });
      const b = this.store.add({ source: 'manual-edit', bitmap: second, label: mask.label });
      const result: [Mask, Mask] = [a, b];
      return { result, maskIds: [maskId, a.id, b.id] };
    });

    this.events.emit('mask:removed', { maskId });
    this.events.emit('mask:added', { maskId: parts[0].id });
    this.events.emit('mask:added', { maskId: parts[1].id });
    if (wasActive) this.events.emit('active:changed', { maskId: null });
    return parts;
  }

  // ── History ──

  /**
   * Revert the most recent operation.
   * @returns Whether there was an operation to undo.
   */
  undo(): boolean {
    const operation = this.history.undo();
    if (!operation) return false;
    this.store.restore(operation.before);
    this.events.emit('history:undone', { description: operation.description });
    this.storeChanged();
    return true;
  }

  /**
   * Re-apply the most recently undone operation.
   * @returns Whether there was an operation to redo.
   */
  redo(): boolean {
    const operation = this.history.redo();
    if (!operation) return false;
    this.store.restore(operation.after);
    this.events.emit('history:redone', { description: operation.description });
    this.storeChanged();
    return true;
  }

  // ── Persistence ──

  /**
   * Write the store to the library sample the session was opened from.
   *
   * @returns The updated sample record.
   * @throws {SessionStateError} If the session has no library sample.
   * @throws The library's error, after raising a `save-failed` advisory.
   */
  async save(): Promise<SampleRecord> {
    if (!this.persistence) {
      throw new SessionStateError('Session is not attached to a library sample');
    }
    const { library, sampleId } = this.persistence;
    const position = this.history.current;
    try {
      const record = await library.save(sampleId, this.store.snapshot());
      this.savedAt = position;
      this.state.setState({ dirty: this.isDirty() });
      return record;
    } catch (err) {
      const message = `Could not save sample ${sampleId}: ${messageOf(err)}`;
      console.warn('[editor]', message);
      this.raise({ kind: 'save-failed', message });
      throw err;
    }
  }

  /** Cancel any request in flight and drop every listener. */
  dispose(): void {
    this.cancelPrompt();
    this.events.clear();
  }

  // ── Internals ──

  /**
   * Run a store mutation as one recorded operation. If the mutation throws,
   * the store is restored and nothing is recorded.
   */
  private apply<T>(
    kind: EditOperationKind,
    description: string,
    mutate: () => { result: T; maskIds: readonly string[] },
  ): T {
    const before = this.store.snapshot();
    let outcome: { result: T; maskIds: readonly string[] };
    try {
      outcome = mutate();
    } catch (err) {
      this.store.restore(before);
      throw err;
    }

    if (this.savedAt === null && this.history.depth === this.history.maxDepth) {
      // The push evicts the oldest operation, so the saved state can no longer be undone to.
      this.savedAt = undefined;
    }
    this.history.push({ kind, description, maskIds: outcome.maskIds, before, after: this.store.snapshot() });
    this.events.emit('history:pushed', { description });
    this.storeChanged();
    return outcome.result;
  }

  /** Publish the store's new contents and classification. */
  private storeChanged(): void {
    const classification = computeClassification(this.store);
    this.state.setState({
      classification,
      maskCount: this.store.count,
      activeId: this.store.activeId,
      canUndo: this.history.canUndo,
      canRedo: this.history.canRedo,
      undoDescription: this.history.undoDescription,
      redoDescription: this.history.redoDescription,
      dirty: this.isDirty(),
    });
    this.events.emit('store:changed');
    this.events.emit('classification:updated', { result: classification });
  }

  private isDirty(): boolean {
    return this.history.current !== this.savedAt;
  }

  private transition(to: SessionMode, patch: Partial<SessionState> = {}): void {
    const from = this.getState().mode;
    this.state.setState({ ...patch, mode: to });
    if (from !== to) {
      this.events.emit('session:mode-changed', { from, to });
    }
  }

  private raise(advisory: Advisory): void {
    this.state.setState({ advisory });
    this.events.emit('session:advisory', advisory);
  }

  private isStale(token: number): boolean {
    return this.pending?.token !== token;
  }

  private discard(token: number): void {
    console.debug(`[editor] Discarding result of stale request ${token}`);
    this.events.emit('oracle:discarded', { requestToken: token });
  }

  private candidateAt(index: number): ReviewCandidate {
    const candidate = this.getState().candidates[index];
    if (!candidate) {
      throw new RangeError(`No candidate at index ${index}`);
    }
    return candidate;
  }

  private expectMode(operation: string, ...allowed: SessionMode[]): void {
    const { mode } = this.getState();
    if (!allowed.includes(mode)) {
      throw new SessionStateError(`${operation} is not available while ${mode}`);
    }
  }
}
