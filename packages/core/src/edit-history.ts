/**
 * @module edit-history
 * Linear undo/redo history of {@link EditOperation} records.
 *
 * The history only stores operations; applying them is the caller's job,
 * normally by restoring `before` (undo) or `after` (redo) into a Mask Store.
 *
 * @see {@link @mezo/types#EditHistory} for the interface contract
 */

import type { EditHistory, EditOperation } from '@mezo/types';

/** Default maximum number of operations retained in history. */
const DEFAULT_MAX_DEPTH = 50;

/**
 * Concrete implementation of {@link EditHistory}.
 *
 * Pushing a new operation clears the redo stack. When the undo stack exceeds
 * `maxDepth`, the oldest operation is discarded.
 */
export class EditHistoryImpl implements EditHistory {
  /** @inheritdoc */
  readonly maxDepth: number;

  private undoStack: EditOperation[] = [];
  private redoStack: EditOperation[] = [];

  /**
   * @param maxDepth - Maximum number of operations to keep (default 50).
   */
  constructor(maxDepth: number = DEFAULT_MAX_DEPTH) {
    if (maxDepth < 1) {
      throw new RangeError('maxDepth must be at least 1');
    }
    this.maxDepth = maxDepth;
  }

  /** @inheritdoc */
  get canUndo(): boolean {
    return this.undoStack.length > 0;
  }

  /** @inheritdoc */
  get canRedo(): boolean {
    return this.redoStack.length > 0;
  }

  /** @inheritdoc */
  get depth(): number {
    return this.undoStack.length;
  }

  /** @inheritdoc */
  get current(): EditOperation | null {
    return this.undoStack.at(-1) ?? null;
  }

  /** @inheritdoc */
  get undoDescription(): string | null {
    return this.undoStack.at(-1)?.description ?? null;
  }

  /** @inheritdoc */
  get redoDescription(): string | null {
    return this.redoStack.at(-1)?.description ?? null;
  }

  /** @inheritdoc */
  push(operation: EditOperation): void {
    this.undoStack.push(operation);
    this.redoStack = [];
    if (this.undoStack.length > this.maxDepth) {
      this.undoStack.shift();
    }
  }

  /** @inheritdoc */
  undo(): EditOperation | null {
    const operation = this.undoStack.pop();
    if (!operation) return null;
    this.redoStack.push(operation);
    return operation;
  }

  /** @inheritdoc */
  redo(): EditOperation | null {
    const operation = this.redoStack.pop();
    if (!operation) return null;
    this.undoStack.push(operation);
    return operation;
  }

  /** @inheritdoc */
  clear(): void {
    this.undoStack = [];
    this.redoStack = [];
  }
}
