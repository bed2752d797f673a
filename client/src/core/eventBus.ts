/**
 * Typed event bus for viewer events.
 * Zero-dependency pub/sub with type safety.
 */

import type { PoseSnapshot } from '../types';

type Listener<T> = (payload: T) => void;

type ListenerTable<EventMap> = { [K in keyof EventMap]?: Set<Listener<EventMap[K]>> };

export class EventBus<EventMap extends { [K in keyof EventMap]: unknown }> {
  private listeners: ListenerTable<EventMap> = {};

  on<K extends keyof EventMap>(event: K, listener: Listener<EventMap[K]>): () => void {
    const set = this.listeners[event] ?? new Set<Listener<EventMap[K]>>();
    this.listeners[event] = set;
    set.add(listener);

    // Return unsubscribe function
    return () => {
      set.delete(listener);
      if (set.size === 0 && this.listeners[event] === set) delete this.listeners[event];
    };
  }

  once<K extends keyof EventMap>(event: K, listener: Listener<EventMap[K]>): () => void {
    const unsub = this.on(event, (payload) => {
      unsub();
      listener(payload);
    });
    return unsub;
  }

  emit<K extends keyof EventMap>(event: K, payload: EventMap[K]): void {
    const set = this.listeners[event];
    if (!set) return;
    for (const listener of [...set]) {
      listener(payload);
    }
  }

  off<K extends keyof EventMap>(event: K): void {
    delete this.listeners[event];
  }

  clear(): void {
    this.listeners = {};
  }
}

// ── Viewer Event Map ────────────────────────────────────────────

export interface ViewerEventMap {
  camera_moved: PoseSnapshot;
  camera_reset: PoseSnapshot;
  grid_visibility_changed: boolean;
}

/** Singleton viewer event bus. */
export const viewerEvents = new EventBus<ViewerEventMap>();
