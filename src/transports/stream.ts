/**
 * @module transports/stream
 * @description MeshTransport over a Node byte stream (TCP socket, serial port).
 *
 * Outbound frames get the `<` length prefix; inbound bytes are reassembled
 * into `>` frames whatever the chunking.
 */

import { createConnection } from "node:net";
import type { Duplex } from "node:stream";
import { FrameAccumulator, frameOutbound } from "../codec/framing.js";
import { TransportError } from "../interfaces/transport.js";
import type { MeshTransport } from "../interfaces/transport.js";
import type {
  TransportDisconnectCallback,
  TransportReceiveCallback,
} from "../types/transport.js";
import type { MeshLogger } from "../logger.js";

/** Produces a fresh, open stream on every connect. */
export type StreamOpener = () => Duplex | Promise<Duplex>;

export interface StreamTransportOptions {
  readonly open: StreamOpener;
  readonly logger?: MeshLogger;
}

export class StreamTransport implements MeshTransport {
  private stream: Duplex | null = null;
  private readonly accumulator = new FrameAccumulator();
  private receiveListeners = new Set<TransportReceiveCallback>();
  private disconnectListeners = new Set<TransportDisconnectCallback>();

  constructor(private readonly options: StreamTransportOptions) {}

  /** TCP companion link (the radio's WiFi or a serial bridge). */
  static tcp(host: string, port: number, logger?: MeshLogger): StreamTransport {
    return new StreamTransport({
      logger,
      open: () =>
        new Promise<Duplex>((resolve, reject) => {
          const socket = createConnection({ host, port });
          socket.setNoDelay(true);
          socket.once("connect", () => {
            socket.off("error", reject);
            resolve(socket);
          });
          socket.once("error", reject);
        }),
    });
  }

  // ─── Commands ───────────────────────────────────────────────────

  async connect(): Promise<void> {
    if (this.stream) return;

    let stream: Duplex;
    try {
      stream = await this.options.open();
    } catch (err) {
      throw new TransportError(
        `Failed to open stream: ${err instanceof Error ? err.message : String(err)}`,
        "NOT_CONNECTED"
      );
    }

    this.accumulator.reset();
    this.stream = stream;
    stream.on("data", (chunk: Buffer | string) => this.handleChunk(stream, chunk));
    stream.on("error", (err: Error) => this.handleClose(stream, err));
    stream.on("close", () => this.handleClose(stream));
  }

  async disconnect(): Promise<void> {
    const stream = this.stream;
    if (!stream) return;
    // Detach first so the close event is not reported as a drop.
    this.stream = null;
    stream.removeAllListeners("data");
    stream.destroy();
  }

  async send(frame: Uint8Array): Promise<void> {
    const stream = this.stream;
    if (!stream) {
      throw new TransportError("Stream not connected", "NOT_CONNECTED");
    }

    const framed = frameOutbound(frame);
    this.options.logger?.debug("tx %d bytes", framed.length);

    await new Promise<void>((resolve, reject) => {
      stream.write(framed, (err) => {
        if (err) {
          reject(new TransportError(`Write failed: ${err.message}`, "SEND_FAILED"));
        } else {
          resolve();
        }
      });
    });
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

  // ─── Queries ────────────────────────────────────────────────────

  get isConnected(): boolean {
    return this.stream !== null;
  }

  // ─── Internal ───────────────────────────────────────────────────

  private handleChunk(stream: Duplex, chunk: Buffer | string): void {
    if (stream !== this.stream) return;
    const bytes = typeof chunk === "string" ? Buffer.from(chunk, "latin1") : chunk;
    for (const frame of this.accumulator.push(new Uint8Array(bytes))) {
      this.options.logger?.debug("rx frame 0x%s, %d bytes", (frame[0] ?? 0).toString(16), frame.length);
      for (const listener of [...this.receiveListeners]) {
        listener(frame);
      }
    }
  }

  private handleClose(stream: Duplex, reason?: Error): void {
    if (stream !== this.stream) return;
    this.stream = null;
    this.options.logger?.warn("stream closed%s", reason ? `: ${reason.message}` : "");
    for (const listener of [...this.disconnectListeners]) {
      listener(reason);
    }
  }
}
