/**
 * @module interfaces/errors
 * @description Protocol, crypto and application error classes.
 *
 * Transport failures live beside the transport contract
 * ({@link TransportError}). Protocol and timeout errors may be retried;
 * crypto and application errors are terminal for the operation.
 */

import { TransportError } from "./transport.js";

/** The radio answered, but not with what the command expects. */
export class ProtocolError extends Error {
  constructor(
    message: string,
    public readonly code:
      | "PARSE_ERROR"
      | "UNEXPECTED_RESPONSE"
      | "DEVICE_ERROR",
    /** Firmware error byte, for DEVICE_ERROR. */
    public readonly deviceCode?: number
  ) {
    super(message);
    this.name = "ProtocolError";
  }
}

export class CryptoError extends Error {
  constructor(
    message: string,
    public readonly code:
      | "KEY_ERROR"
      | "MAC_MISMATCH"
      | "DECRYPTION_FAILED"
      | "INVALID_PAYLOAD"
  ) {
    super(message);
    this.name = "CryptoError";
  }
}

/** Caller-side mistakes and missing local state. */
export class SessionError extends Error {
  constructor(
    message: string,
    public readonly code:
      | "CONTACT_NOT_FOUND"
      | "INVALID_INPUT"
      | "DATA_TOO_LARGE"
      | "SESSION_NOT_STARTED"
  ) {
    super(message);
    this.name = "SessionError";
  }
}

/** Whether repeating the same operation unchanged could succeed. */
export function isRetryable(error: unknown): boolean {
  if (error instanceof TransportError) {
    return error.code === "TIMEOUT" || error.code === "CONNECTION_LOST";
  }
  return error instanceof ProtocolError;
}
