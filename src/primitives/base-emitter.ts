/**
 * @module primitives/base-emitter
 * @description Base implementation of the typed event emitter.
 */

import type {
  IMeshEmitter,
  EventListener,
} from "../interfaces/event-emitter.js";
import type { MeshEvent, MeshEventType } from "../types/events.js";

type AnyListener = EventListener<MeshEventType>;

/**
 * Typed emitter backed by a Map of Sets. A listener that throws does not
 * stop delivery to the others; the error goes to `onListenerError`.
 */
export class MeshEmitter implements IMeshEmitter {
  private readonly listeners = new Map<MeshEventType, Set<AnyListener>>();

  constructor(
    private readonly onListenerError: (error: unknown, event: MeshEvent) => void = () => {}
  ) {}

  on<T extends MeshEventType>(eventType: T, listener: EventListener<T>): () => void {
    let set = this.listeners.get(eventType);
    if (!set) {
      set = new Set();
      this.listeners.set(eventType, set);
    }
    set.add(listener as AnyListener);
    return () => this.off(eventType, listener);
  }

  once<T extends MeshEventType>(eventType: T, listener: EventListener<T>): () => void {
    const wrapper: EventListener<T> = (event) => {
      this.off(eventType, wrapper);
      listener(event);
    };
    return this.on(eventType, wrapper);
  }

  off<T extends MeshEventType>(eventType: T, listener: EventListener<T>): void {
    const set = this.listeners.get(eventType);
    if (set) {
      set.delete(listener as AnyListener);
      if (set.size === 0) {
        this.listeners.delete(eventType);
      }
    }
  }

  emit(event: MeshEvent): void {
    const set = this.listeners.get(event.type);
    if (!set) return;
    for (const listener of [...set]) {
      try {
        listener(event);
      } catch (error) {
        this.onListenerError(error, event);
      }
    }
  }

  listenerCount(eventType: MeshEventType): number {
    return this.listeners.get(eventType)?.size ?? 0;
  }

  removeAllListeners(): void {
    this.listeners.clear();
  }
}
