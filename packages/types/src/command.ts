/**
 * @module command
 * Edit operation records for undo/redo support.
 * Every accepted mutation is one immutable operation holding the Mask Store
 * state before and after it; undo and redo restore those snapshots.
 */

import type { MaskStoreSnapshot } from './mask';

/** Kinds of state transitions recorded in history. */
export type EditOperationKind =
  | 'add-mask'
  | 'remove-mask'
  | 'relabel-mask'
  | 'merge-masks'
  | 'split-mask'
  | 'set-active';

/** An immutable record of one state transition. */
export interface EditOperation {
  readonly kind: EditOperationKind;
  /** Human-readable description (for the undo/redo menu). */
  readonly description: string;
  /** Ids of the masks the operation touched or produced. */
  readonly maskIds: readonly string[];
  /** Store state before the operation. */
  readonly before: MaskStoreSnapshot;
  /** Store state after the operation. */
  readonly after: MaskStoreSnapshot;
}

/** Linear undo/redo history of edit operations. */
export interface EditHistory {
  /** Maximum number of operations to keep. */
  readonly maxDepth: number;
  /** Whether there are operations that can be undone. */
  readonly canUndo: boolean;
  /** Whether there are operations that can be redone. */
  readonly canRedo: boolean;
  /** Number of operations that can be undone. */
  readonly depth: number;
  /** The most recent operation the state reflects, or null at the oldest state. */
  readonly current: EditOperation | null;
  /** Description of the next operation to undo, or null. */
  readonly undoDescription: string | null;
  /** Description of the next operation to redo, or null. */
  readonly redoDescription: string | null;

  /** Push an already-applied operation. Clears the redo stack. */
  push(operation: EditOperation): void;
  /** Pop the most recent operation for undo, or null if none. */
  undo(): EditOperation | null;
  /** Pop the most recently undone operation for redo, or null if none. */
  redo(): EditOperation | null;
  /** Clear all history. */
  clear(): void;
}
