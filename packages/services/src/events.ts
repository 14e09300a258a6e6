/**
 * Events service
 *
 * In-process pub/sub for picture lifecycle events.
 */

import { randomUUID } from 'node:crypto';

export type EventType =
  | 'picture.inserted'
  | 'picture.updated'
  | 'picture.deleted';

export interface Event<T = unknown> {
  id: string;
  type: EventType;
  timestamp: Date;
  payload: T;
}

export type EventHandler<T = unknown> = (event: Event<T>) => void | Promise<void>;

export class EventsService {
  private handlers: Map<EventType, Set<EventHandler>> = new Map();
  private globalHandlers: Set<EventHandler> = new Set();
  private eventHistory: Event[] = [];

  constructor(private maxHistorySize = 1000) {}

  /** Subscribe to a specific event type; returns the unsubscribe function */
  subscribe(eventType: EventType, handler: EventHandler): () => void {
    let handlers = this.handlers.get(eventType);
    if (!handlers) {
      handlers = new Set();
      this.handlers.set(eventType, handlers);
    }
    handlers.add(handler);

    return () => {
      this.handlers.get(eventType)?.delete(handler);
    };
  }

  subscribeAll(handler: EventHandler): () => void {
    this.globalHandlers.add(handler);
    return () => {
      this.globalHandlers.delete(handler);
    };
  }

  /** Emit an event to all subscribers. Handler failures are logged. */
  async emit<T>(eventType: EventType, payload: T): Promise<void> {
    const event: Event<T> = {
      id: randomUUID(),
      type: eventType,
      timestamp: new Date(),
      payload
    };

    this.eventHistory.push(event);
    if (this.eventHistory.length > this.maxHistorySize) {
      this.eventHistory = this.eventHistory.slice(-this.maxHistorySize);
    }

    const targets = [...(this.handlers.get(eventType) ?? []), ...this.globalHandlers];
    const results = await Promise.allSettled(
      targets.map(async (handler) => handler(event))
    );

    for (const result of results) {
      if (result.status === 'rejected') {
        console.error(`Event handler error for ${eventType}:`, result.reason);
      }
    }
  }

  // ─── History ──────────────────────────────────────────────────────

  getHistory(count?: number, types?: EventType[]): Event[] {
    let events = this.eventHistory;
    if (types && types.length > 0) {
      events = events.filter((e) => types.includes(e.type));
    }
    if (count) {
      events = events.slice(-count);
    }
    return events;
  }
}
