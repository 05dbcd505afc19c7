import { errorMessage } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import { noopLogger } from "../utils/noop-logger.js";

/** Receiver with bounded inbound capacity. Returns false when it dropped the event. */
export interface EventSink<E> {
  offer(event: E): boolean;
}

export type EventListener<E> = (event: E) => void;

/**
 * Per-subscriber filter. A non-empty `only` wins outright and `exclude` is
 * then ignored.
 */
export interface EventFilter<K extends string> {
  only?: readonly K[];
  exclude?: readonly K[];
}

export interface Subscription {
  unsubscribe(): void;
  /** Events this subscriber did not accept (full sink or throwing listener). */
  readonly dropped: number;
}

interface Subscriber<E> {
  sink: EventSink<E>;
  accepts: (type: string) => boolean;
  dropped: number;
}

function listenerSink<E>(listener: EventListener<E>): EventSink<E> {
  return {
    offer(event) {
      listener(event);
      return true;
    },
  };
}

function compileFilter<K extends string>(filter: EventFilter<K> = {}): (type: string) => boolean {
  const only = new Set<string>(filter.only ?? []);
  if (only.size > 0) return (type) => only.has(type);
  const exclude = new Set<string>(filter.exclude ?? []);
  if (exclude.size > 0) return (type) => !exclude.has(type);
  return () => true;
}

/**
 * Fan-out dispatcher for typed events.
 *
 * `publish` delivers synchronously to every matching subscriber and never
 * blocks: a sink that refuses an event (its buffer is full) simply misses it.
 * Consumers that read from an EventChannel must therefore poll with a timeout
 * rather than assume delivery.
 */
export class EventBus<E extends { type: string }> {
  private subscribers: ReadonlyArray<Subscriber<E>> = [];
  private readonly logger: Logger;

  constructor(options: { logger?: Logger } = {}) {
    this.logger = options.logger ?? noopLogger;
  }

  subscribe(sink: EventSink<E> | EventListener<E>, filter?: EventFilter<E["type"]>): Subscription {
    const subscriber: Subscriber<E> = {
      sink: typeof sink === "function" ? listenerSink(sink) : sink,
      accepts: compileFilter(filter),
      dropped: 0,
    };
    // Copy-on-write: a publish in progress keeps iterating its own snapshot.
    this.subscribers = [...this.subscribers, subscriber];

    return {
      unsubscribe: () => {
        this.subscribers = this.subscribers.filter((s) => s !== subscriber);
      },
      get dropped() {
        return subscriber.dropped;
      },
    };
  }

  publish(event: E): void {
    for (const subscriber of this.subscribers) {
      if (!subscriber.accepts(event.type)) continue;
      if (!this.deliver(subscriber, event)) subscriber.dropped++;
    }
  }

  get subscriberCount(): number {
    return this.subscribers.length;
  }

  private deliver(subscriber: Subscriber<E>, event: E): boolean {
    try {
      return subscriber.sink.offer(event);
    } catch (err) {
      this.logger.warn("Event subscriber threw; event dropped for this subscriber", {
        eventType: event.type,
        error: errorMessage(err),
      });
      return false;
    }
  }
}
