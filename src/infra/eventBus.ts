/**
 * Simple in-memory pub/sub event bus.
 * The governance service publishes committed notifications here; the
 * WebSocket handler broadcasts them.
 */

import type { GovernanceNotificationType } from '../domain/governance/governanceTypes.js';

export type EventType = GovernanceNotificationType;

export type EventCallback = (event: EventType, data: unknown) => void;

class EventBus {
  private listeners: Map<string, Set<EventCallback>> = new Map();
  private wildcardListeners: Set<EventCallback> = new Set();

  /**
   * Subscribe to a specific event type, or '*' for all events.
   */
  on(event: EventType | '*', callback: EventCallback): () => void {
    if (event === '*') {
      this.wildcardListeners.add(callback);
      return () => {
        this.wildcardListeners.delete(callback);
      };
    }

    let specific = this.listeners.get(event);
    if (!specific) {
      specific = new Set();
      this.listeners.set(event, specific);
    }
    specific.add(callback);

    return () => {
      this.listeners.get(event)?.delete(callback);
    };
  }

  /**
   * Emit an event to all matching subscribers. Returns the listener
   * failures so the publisher can report them; delivery to the remaining
   * listeners continues regardless.
   */
  emit(event: EventType, data: unknown): unknown[] {
    const failures: unknown[] = [];
    const deliver = (cb: EventCallback): void => {
      try {
        cb(event, data);
      } catch (error) {
        failures.push(error);
      }
    };

    const specific = this.listeners.get(event);
    if (specific) {
      for (const cb of specific) deliver(cb);
    }
    for (const cb of this.wildcardListeners) deliver(cb);

    return failures;
  }

  /**
   * Remove all listeners. Useful for tests.
   */
  clear(): void {
    this.listeners.clear();
    this.wildcardListeners.clear();
  }
}

/** Singleton event bus instance for the application. */
export const eventBus = new EventBus();
