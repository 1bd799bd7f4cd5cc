/**
 * @module event-bus
 * Type-safe pub/sub emitter connecting the engine to its observers.
 *
 * @see {@link @mezo/types#EventBus} for the interface contract
 * @see {@link @mezo/types#EventMap} for the event catalogue
 */

import type { EventBus, EventCallback, EventMap } from '@mezo/types';

/** Generic callback type used internally by the event bus. */
type Callback = (...args: unknown[]) => void;

/**
 * Concrete implementation of {@link EventBus}.
 *
 * Each event maps callbacks to a `once` flag, so `on`, `once` and `off`
 * share one registry and iteration follows subscription order.
 */
export class EventBusImpl implements EventBus {
  private listeners = new Map<keyof EventMap, Map<Callback, boolean>>();

  /** @inheritdoc */
  on<K extends keyof EventMap>(event: K, callback: EventCallback<K>): () => void {
    return this.register(event, callback as Callback, false);
  }

  /** @inheritdoc */
  once<K extends keyof EventMap>(event: K, callback: EventCallback<K>): () => void {
    return this.register(event, callback as Callback, true);
  }

  /** @inheritdoc */
  off<K extends keyof EventMap>(event: K, callback: EventCallback<K>): void {
    this.unregister(event, callback as Callback);
  }

  /** @inheritdoc */
  emit<K extends keyof EventMap>(
    event: K,
    ...args: EventMap[K] extends undefined ? [] : [EventMap[K]]
  ): void {
    const registry = this.listeners.get(event);
    if (!registry) return;

    // Snapshot: listeners added during emission wait for the next one.
    for (const [callback, once] of [...registry]) {
      if (once) {
        this.unregister(event, callback);
      }
      callback(...args);
    }
  }

  /** @inheritdoc */
  clear(): void {
    this.listeners.clear();
  }

  /** Number of listeners currently registered for an event. */
  listenerCount(event: keyof EventMap): number {
    return this.listeners.get(event)?.size ?? 0;
  }

  private register(event: keyof EventMap, callback: Callback, once: boolean): () => void {
    let registry = this.listeners.get(event);
    if (!registry) {
      registry = new Map();
      this.listeners.set(event, registry);
    }
    registry.set(callback, once);
    return () => this.unregister(event, callback);
  }

  private unregister(event: keyof EventMap, callback: Callback): void {
    const registry = this.listeners.get(event);
    if (registry?.delete(callback) && registry.size === 0) {
      this.listeners.delete(event);
    }
  }
}
