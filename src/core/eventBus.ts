/**
 * Ordered event dispatch for game events.
 *
 * Listeners receive every event in registration order and report whether
 * they consumed it. Order matters: several systems react to the same
 * map change, so the engine registers them in a fixed sequence.
 */

import type { TileMap } from '../types';

export interface EventListener<E> {
  /** Return true when the event was handled. */
  handle(event: E): boolean;
}

export class EventBus<E extends { type: string }> {
  private listeners: EventListener<E>[] = [];

  addListener(listener: EventListener<E>): () => void {
    if (!this.listeners.includes(listener)) {
      this.listeners.push(listener);
    }

    // Return unsubscribe function
    return () => this.removeListener(listener);
  }

  removeListener(listener: EventListener<E>): void {
    const index = this.listeners.indexOf(listener);
    if (index >= 0) this.listeners.splice(index, 1);
  }

  /**
   * Deliver an event to every listener. Listener errors propagate and stop
   * delivery to the listeners after it.
   */
  fire(event: E): boolean {
    let handled = false;
    for (const listener of [...this.listeners]) {
      if (listener.handle(event)) handled = true;
    }
    return handled;
  }

  get size(): number {
    return this.listeners.length;
  }

  clear(): void {
    this.listeners = [];
  }
}

// ── Game Events ─────────────────────────────────────────────────

/** A new tile map became the active map. */
export interface MapChangeEvent {
  type: 'map_changed';
  map: TileMap;
}

export type GameEvent = MapChangeEvent;

export type GameEventListener = EventListener<GameEvent>;

export function mapChanged(map: TileMap): MapChangeEvent {
  return { type: 'map_changed', map };
}
