/**
 * @module transports/mock
 * @description In-process MeshTransport for tests and offline tooling.
 *
 * Records every frame sent and lets the caller play the radio's side:
 * inject inbound frames, drop the link, or install a responder that
 * answers each command.
 */

import { TransportError } from "../interfaces/transport.js";
import type { MeshTransport } from "../interfaces/transport.js";
import type {
  TransportDisconnectCallback,
  TransportReceiveCallback,
} from "../types/transport.js";

/** Returns the frames the fake radio sends back for one command, if any. */
export type MockResponder = (frame: Uint8Array) => readonly Uint8Array[] | void;

export class MockTransport implements MeshTransport {
  readonly sent: Uint8Array[] = [];
  /** The next this-many `connect()` calls fail with NOT_CONNECTED. */
  failConnects = 0;
  connectCount = 0;

  private connected = false;
  private responder: MockResponder | null = null;
  private receiveListeners = new Set<TransportReceiveCallback>();
  private disconnectListeners = new Set<TransportDisconnectCallback>();

  constructor(responder?: MockResponder) {
    this.responder = responder ?? null;
  }

  // ─── Commands ───────────────────────────────────────────────────

  async connect(): Promise<void> {
    this.connectCount++;
    if (this.failConnects > 0) {
      this.failConnects--;
      throw new TransportError("Mock link refused", "NOT_CONNECTED");
    }
    this.connected = true;
  }

  async disconnect(): Promise<void> {
    this.connected = false;
  }

  async send(frame: Uint8Array): Promise<void> {
    if (!this.connected) {
      throw new TransportError("Mock link is down", "NOT_CONNECTED");
    }
    this.sent.push(frame.slice());

    const replies = this.responder?.(frame);
    if (replies) {
      // Replies arrive after send() returns, as they would over a radio.
      queueMicrotask(() => {
        for (const reply of replies) this.simulateReceive(reply);
      });
    }
  }

  onReceive(callback: TransportReceiveCallback): () => void {
    this.receiveListeners.add(callback);
    return () => {
      this.receiveListeners.delete(callback);
    };
  }

  onDisconnect(callback: TransportDisconnectCallback): () => void {
    this.disconnectListeners.add(callback);
    return () => {
      this.disconnectListeners.delete(callback);
    };
  }

  // ─── Test Controls ──────────────────────────────────────────────

  setResponder(responder: MockResponder | null): void {
    this.responder = responder;
  }

  simulateReceive(frame: Uint8Array): void {
    for (const listener of [...this.receiveListeners]) {
      listener(frame);
    }
  }

  /** Drops the link as if the radio went out of range. */
  simulateDisconnect(reason: Error = new Error("Link lost")): void {
    this.connected = false;
    for (const listener of [...this.disconnectListeners]) {
      listener(reason);
    }
  }

  clearSent(): void {
    this.sent.length = 0;
  }

  // ─── Queries ────────────────────────────────────────────────────

  get isConnected(): boolean {
    return this.connected;
  }

  get lastSent(): Uint8Array | undefined {
    return this.sent[this.sent.length - 1];
  }
}
