// src/core/events/bus.ts
// Subscriber list with synchronous, in-line delivery

import type {
  AdtEvent,
  AdtEventKind,
  EventEmitter,
  EventFilter,
  EventListener,
  EventOf,
  EventPayload,
  SubscriptionHandle,
} from "./types";
import { type Logger, silentLogger } from "../log/logger";

type Subscriber = {
  id: number;
  accepts: (kind: AdtEventKind) => boolean;
  listener: EventListener;
};

function toPredicate(filter: EventFilter): (kind: AdtEventKind) => boolean {
  if (typeof filter === "function") {
    return filter;
  }
  const kinds = new Set(filter);
  return kind => kinds.has(kind);
}

export const allEvents: EventFilter = () => true;

export class EventBus implements EventEmitter {
  private subscribers: Subscriber[] = [];
  private nextId = 1;
  private enabled: boolean;
  private readonly logger: Logger;

  constructor(options: { enabled?: boolean; logger?: Logger } = {}) {
    this.enabled = options.enabled ?? true;
    this.logger = options.logger ?? silentLogger;
  }

  get active(): boolean {
    return this.enabled && this.subscribers.length > 0;
  }

  get subscriberCount(): number {
    return this.subscribers.length;
  }

  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }

  subscribe(filter: EventFilter, listener: EventListener): SubscriptionHandle {
    const id = this.nextId++;
    this.subscribers = [...this.subscribers, { id, accepts: toPredicate(filter), listener }];
    return {
      id,
      unsubscribe: () => this.unsubscribe(id),
    };
  }

  /**
   * Remove a subscriber. Returns false if it was already gone.
   */
  unsubscribe(handle: SubscriptionHandle | number): boolean {
    const id = typeof handle === "number" ? handle : handle.id;
    const before = this.subscribers.length;
    this.subscribers = this.subscribers.filter(s => s.id !== id);
    return this.subscribers.length < before;
  }

  /**
   * Deliver to every matching subscriber. The subscriber list is replaced on
   * (un)subscribe, so listeners that change subscriptions do not disturb this pass.
   * A throwing listener is logged and skipped.
   */
  emit(payload: EventPayload): void {
    if (!this.active) return;

    const event: AdtEvent = { ...payload, timestamp: Date.now() };
    for (const sub of this.subscribers) {
      if (!sub.accepts(event.tag)) continue;
      try {
        sub.listener(event);
      } catch (e) {
        this.logger.warn("event subscriber threw", {
          subscriber: sub.id,
          event: event.tag,
          error: e instanceof Error ? e.message : String(e),
        });
      }
    }
  }
}

/**
 * Collect events into an array until `stop` is called.
 */
export function recordEvents(
  bus: EventBus,
  filter: EventFilter = allEvents
): { events: AdtEvent[]; stop: () => void; ofKind: <K extends AdtEventKind>(kind: K) => EventOf<K>[] } {
  const events: AdtEvent[] = [];
  const handle = bus.subscribe(filter, event => {
    events.push(event);
  });
  return {
    events,
    stop: () => {
      handle.unsubscribe();
    },
    ofKind: <K extends AdtEventKind>(kind: K) => events.filter((e): e is EventOf<K> => e.tag === kind),
  };
}

/**
 * Emitter that drops everything; used when components run without a bus.
 */
export const nullEmitter: EventEmitter = {
  active: false,
  emit: () => undefined,
};
