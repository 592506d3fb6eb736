/**
 * @module mesh-companion-core
 * @description Protocol and session engine for mesh companion radios.
 *
 * Exports the frame and LPP codecs, key derivation and direct-message
 * crypto, the request registry and caches, the transports, and the
 * MeshSession orchestrator.
 *
 * @license MIT
 */

// ─── Types ──────────────────────────────────────────────────────────
export * from "./types/index.js";

// ─── Interfaces ─────────────────────────────────────────────────────
export * from "./interfaces/index.js";

// ─── Primitives ─────────────────────────────────────────────────────
export * from "./primitives/index.js";

// ─── Codec ──────────────────────────────────────────────────────────
export * from "./codec/index.js";

// ─── Crypto ─────────────────────────────────────────────────────────
export * from "./backends/index.js";

// ─── Transports ─────────────────────────────────────────────────────
export * from "./transports/index.js";

// ─── Logging and Retry ──────────────────────────────────────────────
export { Logger, LogLevel, isLogLevelName } from "./logger.js";
export type { LogLevelName, MeshLogger } from "./logger.js";
export { withRetry } from "./utils/retry.js";
export type { RetryOptions } from "./utils/retry.js";

// ─── Orchestrator ───────────────────────────────────────────────────
export { MeshSession, splitChannelText } from "./session.js";
export type {
  SessionConfig,
  FetchedMessage,
  AckedSend,
  MessageTarget,
  NeighboursQuery,
  TraceOptions,
} from "./session.js";
