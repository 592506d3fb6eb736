/**
 * @module types/transport
 * @description Connection lifecycle as seen by the session.
 *
 * ```
 * disconnected → connecting → connected
 *                    ↑            │ link drop
 *                    └─ reconnecting(attempt) ─→ failed
 * ```
 */

export type ConnectionState =
  | { readonly status: "disconnected" }
  | { readonly status: "connecting" }
  | { readonly status: "connected" }
  | { readonly status: "reconnecting"; readonly attempt: number }
  | { readonly status: "failed"; readonly reason: string };

export type ConnectionStatus = ConnectionState["status"];

/** Callback for raw inbound frames (one complete frame per call). */
export type TransportReceiveCallback = (frame: Uint8Array) => void;

/** Callback for an unrequested link drop. */
export type TransportDisconnectCallback = (reason?: Error) => void;
