/**
 * @module interfaces/event-emitter
 * @description Typed event emitter contract for mesh events.
 *
 * The event map gives listeners correctly typed payloads without runtime
 * checks.
 */

import type {
  MeshEvent,
  MeshEventMap,
  MeshEventType,
} from "../types/events.js";

export type EventListener<T extends MeshEventType> = (
  event: MeshEventMap[T]
) => void;

/**
 * @interface IMeshEmitter
 * @description Typed emitter keyed by `MeshEvent["type"]`.
 */
export interface IMeshEmitter {
  /**
   * Registers a listener for one event type.
   * @returns Unsubscribe function.
   */
  on<T extends MeshEventType>(eventType: T, listener: EventListener<T>): () => void;

  /** Registers a listener that removes itself after the first call. */
  once<T extends MeshEventType>(eventType: T, listener: EventListener<T>): () => void;

  off<T extends MeshEventType>(eventType: T, listener: EventListener<T>): void;

  /** Invokes all listeners for `event.type` synchronously. */
  emit(event: MeshEvent): void;
}
