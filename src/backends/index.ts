/**
 * @module backends
 * @description Key derivation and direct-message crypto.
 */

export * from "./crypto-utils.js";
export * from "./direct-message-crypto.js";
