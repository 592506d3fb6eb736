/**
 * @module primitives/event-dispatcher
 * @description Fan-out of events to bounded async-iterable subscriptions.
 *
 * `publish` never blocks: each subscriber owns a queue of fixed capacity,
 * and when a slow consumer lets it fill, the oldest queued event is
 * dropped. A stalled reader therefore costs memory up to its bound and
 * nothing else.
 */

import type { MeshEvent, MeshEventMap, MeshEventType } from "../types/events.js";

export type EventFilter<E extends MeshEvent = MeshEvent> = (event: MeshEvent) => event is E;

export interface Subscription<E extends MeshEvent = MeshEvent> extends AsyncIterable<E> {
  /** Events discarded because the queue was full. */
  readonly dropped: number;
  /** Ends the stream; a pending `next()` resolves with `done`. */
  close(): void;
}

export const DEFAULT_SUBSCRIBER_BUFFER = 100;

// ─── Filters ────────────────────────────────────────────────────────

/** Predicates for {@link EventDispatcher.subscribe}. */
export const EventFilters = {
  all: (_event: MeshEvent): _event is MeshEvent => true,

  ofType<T extends MeshEventType>(...types: T[]): EventFilter<MeshEventMap[T]> {
    const wanted = new Set<MeshEventType>(types);
    return (event): event is MeshEventMap[T] => wanted.has(event.type);
  },

  messages: (
    event: MeshEvent
  ): event is MeshEventMap["CONTACT_MESSAGE"] | MeshEventMap["CHANNEL_MESSAGE"] =>
    event.type === "CONTACT_MESSAGE" || event.type === "CHANNEL_MESSAGE",

  contacts: (
    event: MeshEvent
  ): event is
    | MeshEventMap["ADVERTISEMENT"]
    | MeshEventMap["NEW_CONTACT"]
    | MeshEventMap["PATH_UPDATE"]
    | MeshEventMap["CONTACT"] =>
    event.type === "ADVERTISEMENT" ||
    event.type === "NEW_CONTACT" ||
    event.type === "PATH_UPDATE" ||
    event.type === "CONTACT",

  connection: (event: MeshEvent): event is MeshEventMap["CONNECTION_STATE_CHANGED"] =>
    event.type === "CONNECTION_STATE_CHANGED",
} as const;

// ─── Subscriber ─────────────────────────────────────────────────────

interface Subscriber {
  offer(event: MeshEvent): void;
  close(): void;
}

class BoundedSubscription<E extends MeshEvent> implements Subscription<E>, Subscriber {
  private readonly queue: E[] = [];
  private waiter: ((result: IteratorResult<E>) => void) | null = null;
  private closed = false;
  private droppedCount = 0;

  constructor(
    private readonly filter: EventFilter<E>,
    private readonly capacity: number,
    private readonly onClose: () => void
  ) {}

  get dropped(): number {
    return this.droppedCount;
  }

  offer(event: MeshEvent): void {
    if (this.closed || !this.filter(event)) return;

    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve({ value: event, done: false });
      return;
    }

    this.queue.push(event);
    if (this.queue.length > this.capacity) {
      this.queue.shift();
      this.droppedCount++;
    }
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.queue.length = 0;
    this.onClose();
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve({ value: undefined, done: true });
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<E> {
    return {
      next: () => {
        const queued = this.queue.shift();
        if (queued !== undefined) return Promise.resolve({ value: queued, done: false });
        if (this.closed) return Promise.resolve({ value: undefined, done: true });
        return new Promise<IteratorResult<E>>((resolve) => {
          this.waiter = resolve;
        });
      },
      return: () => {
        this.close();
        return Promise.resolve({ value: undefined, done: true });
      },
    };
  }
}

// ─── Dispatcher ─────────────────────────────────────────────────────

export class EventDispatcher {
  private readonly subscribers = new Set<Subscriber>();

  constructor(private readonly capacity: number = DEFAULT_SUBSCRIBER_BUFFER) {}

  subscribe(): Subscription<MeshEvent>;
  subscribe<E extends MeshEvent>(filter: EventFilter<E>, capacity?: number): Subscription<E>;
  subscribe<E extends MeshEvent>(
    filter?: EventFilter<E>,
    capacity: number = this.capacity
  ): Subscription<E> | Subscription<MeshEvent> {
    return filter
      ? this.attach(filter, capacity)
      : this.attach(EventFilters.all, capacity);
  }

  /** Delivers to every open subscription, in subscription order. */
  publish(event: MeshEvent): void {
    for (const subscriber of this.subscribers) {
      subscriber.offer(event);
    }
  }

  closeAll(): void {
    for (const subscriber of [...this.subscribers]) {
      subscriber.close();
    }
  }

  get subscriberCount(): number {
    return this.subscribers.size;
  }

  private attach<E extends MeshEvent>(
    filter: EventFilter<E>,
    capacity: number
  ): Subscription<E> {
    const subscription: BoundedSubscription<E> = new BoundedSubscription(
      filter,
      Math.max(1, capacity),
      () => this.subscribers.delete(subscription)
    );
    this.subscribers.add(subscription);
    return subscription;
  }
}
