/**
 * @module events
 * Type-safe event bus definitions for cross-module communication.
 */

import type { ClassificationResult } from './classification';
import type { MaskLabel } from './mask';
import type { Advisory, SessionMode } from './session';

/** Map of event names to their payload types. */
export interface EventMap {
  /** Fired after any Mask Store change, including undo/redo. */
  'store:changed': undefined;
  /** Fired when a mask is added. */
  'mask:added': { maskId: string };
  /** Fired when a mask is removed. */
  'mask:removed': { maskId: string };
  /** Fired when a mask's label changes. */
  'mask:relabeled': { maskId: string; label: MaskLabel };
  /** Fired when the active mask changes. */
  'active:changed': { maskId: string | null };
  /** Fired when an operation is pushed to history. */
  'history:pushed': { description: string };
  /** Fired when an operation is undone. */
  'history:undone': { description: string };
  /** Fired when an operation is redone. */
  'history:redone': { description: string };
  /** Fired when the session changes mode. */
  'session:mode-changed': { from: SessionMode; to: SessionMode };
  /** Fired when the oracle delivers candidates for the current request. */
  'oracle:proposed': { requestToken: number; count: number };
  /** Fired when a late oracle result is discarded. */
  'oracle:discarded': { requestToken: number };
  /** Fired when a recoverable problem should be shown to the operator. */
  'session:advisory': Advisory;
  /** Fired with the recomputed classification after every store change. */
  'classification:updated': { result: ClassificationResult };
}

/** Callback function type for event listeners. */
export type EventCallback<K extends keyof EventMap> = EventMap[K] extends undefined
  ? () => void
  : (payload: EventMap[K]) => void;

/** Type-safe event bus for pub/sub communication. */
export interface EventBus {
  /** Subscribe to an event. Returns an unsubscribe function. */
  on<K extends keyof EventMap>(event: K, callback: EventCallback<K>): () => void;
  /** Subscribe to an event for a single emission. */
  once<K extends keyof EventMap>(event: K, callback: EventCallback<K>): () => void;
  /** Unsubscribe a specific callback from an event. */
  off<K extends keyof EventMap>(event: K, callback: EventCallback<K>): void;
  /** Emit an event with an optional payload. */
  emit<K extends keyof EventMap>(
    event: K,
    ...args: EventMap[K] extends undefined ? [] : [EventMap[K]]
  ): void;
  /** Remove all listeners for all events. */
  clear(): void;
}
