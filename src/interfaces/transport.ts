/**
 * @module interfaces/transport
 * @description MeshTransport: the raw duplex link to a companion radio.
 *
 * Implementations deliver whole protocol frames: any byte-level framing
 * the medium needs (BLE characteristic writes, the `<`/`>` length prefix
 * on serial and TCP) is stripped before `onReceive` callbacks run.
 */

import type {
  TransportDisconnectCallback,
  TransportReceiveCallback,
} from "../types/transport.js";

/**
 * Errors that may be thrown by MeshTransport operations, and by session
 * commands when the link fails under them.
 */
export class TransportError extends Error {
  constructor(
    message: string,
    public readonly code:
      | "NOT_CONNECTED"
      | "CONNECTION_LOST"
      | "TIMEOUT"
      | "SEND_FAILED"
  ) {
    super(message);
    this.name = "TransportError";
  }
}

/**
 * @interface MeshTransport
 * @description The only I/O dependency of the session.
 */
export interface MeshTransport {
  // ─── Commands ───────────────────────────────────────────────────

  /**
   * Opens the link. Resolves once frames can be sent.
   * @throws {TransportError} code=NOT_CONNECTED if the link cannot be opened.
   */
  connect(): Promise<void>;

  /** Closes the link. Does not fire `onDisconnect` callbacks. */
  disconnect(): Promise<void>;

  /**
   * Transmits one frame.
   * @throws {TransportError} code=NOT_CONNECTED when the link is down.
   * @throws {TransportError} code=SEND_FAILED if the write is rejected.
   */
  send(frame: Uint8Array): Promise<void>;

  /**
   * Registers a callback for inbound frames, in arrival order.
   * @returns Unsubscribe function.
   */
  onReceive(callback: TransportReceiveCallback): () => void;

  /**
   * Registers a callback for link drops the caller did not request.
   * @returns Unsubscribe function.
   */
  onDisconnect(callback: TransportDisconnectCallback): () => void;

  // ─── Queries ────────────────────────────────────────────────────

  readonly isConnected: boolean;
}
