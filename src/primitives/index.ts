/**
 * @module primitives
 * @description Stateful building blocks the session composes.
 */

export { MeshEmitter } from "./base-emitter.js";
export { PendingRequestRegistry } from "./pending-requests.js";
export type {
  RequestOutcome,
  RegisterOptions,
  BinaryRequestKey,
  BinaryRequestInfo,
  RegistryOptions,
} from "./pending-requests.js";
export { EventDispatcher, EventFilters, DEFAULT_SUBSCRIBER_BUFFER } from "./event-dispatcher.js";
export type { EventFilter, Subscription } from "./event-dispatcher.js";
export { ContactCache, contactIdOf } from "./contact-cache.js";
export {
  MessageDedupCache,
  UNKNOWN_SENDER,
  DEFAULT_DIRECT_DEDUP_CAPACITY,
  DEFAULT_CHANNEL_DEDUP_CAPACITY,
} from "./dedup-cache.js";
export type { DedupCapacity } from "./dedup-cache.js";
