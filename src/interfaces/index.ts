/**
 * @module interfaces
 * @description Contracts and error classes.
 */

export * from "./event-emitter.js";
export * from "./transport.js";
export * from "./errors.js";
export * from "./store.js";
