/**
 * @module session
 * @description MeshSession, the orchestrator that wires codec, registry,
 * caches and transport together.
 *
 * Commands run one at a time. Each one registers its tag with the pending
 * request registry before a byte is written, then waits for the registry's
 * outcome. Inbound frames are decoded in arrival order and offered first to
 * the command in flight, then to the push router (acks, binary replies,
 * logins, traces), then to the contact cache, and finally broadcast.
 *
 * Replies from remote nodes (status, telemetry, login, trace) arrive long
 * after the local radio has answered `MESSAGE_SENT`. Those waits are
 * registered while that reply is being dispatched and awaited outside the
 * command lock, so other commands can proceed in the meantime.
 *
 * @example
 * ```ts
 * const session = new MeshSession(StreamTransport.tcp("192.168.1.20", 5000));
 * const self = await session.start();
 *
 * session.on("CONTACT_MESSAGE", ({ message }) => console.log(message.text));
 * await session.syncContacts();
 * const alice = session.contacts.getByName("alice");
 * if (alice) await session.sendMessageWithAck(alice, "hello");
 * ```
 */

import { randomBytes } from "@noble/hashes/utils.js";
import { ByteReader, ByteWriter, bytesEqual, encodeUtf8, toHex } from "./codec/bytes.js";
import { BinaryRequestKind, PacketSize } from "./codec/codes.js";
import { encodeCommand } from "./codec/commands.js";
import { decodeFrame } from "./codec/responses.js";
import type { DecodedFrame } from "./codec/responses.js";
import { decodeLpp } from "./codec/lpp.js";
import {
  parseAcl,
  parseBinaryStatus,
  parseMma,
  parseNeighbours,
} from "./codec/binary.js";
import {
  deriveChannelSecret,
  deriveFloodScopeKey,
  disabledFloodScopeKey,
} from "./backends/crypto-utils.js";
import { decryptDirectMessage } from "./backends/direct-message-crypto.js";
import { MeshEmitter } from "./primitives/base-emitter.js";
import { ContactCache, contactIdOf } from "./primitives/contact-cache.js";
import {
  DEFAULT_CHANNEL_DEDUP_CAPACITY,
  DEFAULT_DIRECT_DEDUP_CAPACITY,
  MessageDedupCache,
  UNKNOWN_SENDER,
} from "./primitives/dedup-cache.js";
import {
  DEFAULT_SUBSCRIBER_BUFFER,
  EventDispatcher,
} from "./primitives/event-dispatcher.js";
import { PendingRequestRegistry } from "./primitives/pending-requests.js";
import { ProtocolError, SessionError } from "./interfaces/errors.js";
import { TransportError } from "./interfaces/transport.js";
import { Logger } from "./logger.js";
import { withRetry } from "./utils/retry.js";
import type { MeshCommand, StatsSelector } from "./codec/commands.js";
import type { AclEntry, MmaEntry, NeighboursResult } from "./codec/binary.js";
import type { DecryptResult } from "./backends/direct-message-crypto.js";
import type { EventListener } from "./interfaces/event-emitter.js";
import type { MeshStore } from "./interfaces/store.js";
import type { MeshTransport } from "./interfaces/transport.js";
import type { EventFilter, Subscription } from "./primitives/event-dispatcher.js";
import type { RequestOutcome } from "./primitives/pending-requests.js";
import type { LogLevelName, MeshLogger } from "./logger.js";
import type {
  ChannelSecret,
  ContactId,
  FloodScopeKey,
  PrivateKey,
  PublicKeyPrefix,
  RequestTag,
  UnixTimestamp,
} from "./types/branded.js";
import type { Contact } from "./types/contact.js";
import type {
  BatteryInfo,
  ChannelInfo,
  CoreStats,
  DeviceInfo,
  OtherParams,
  PacketStats,
  RadioSettings,
  RadioStats,
  SelfInfo,
} from "./types/device.js";
import type {
  ChannelMessage,
  ContactMessage,
  LoginInfo,
  MeshEvent,
  MeshEventMap,
  MeshEventType,
  MessageSentInfo,
  PathInfo,
  StatusReport,
  TraceInfo,
} from "./types/events.js";
import type { LppDataPoint } from "./types/lpp.js";
import type { ConnectionState } from "./types/transport.js";

// ─── Configuration ────────────────────────────────────────────────

export interface SessionConfig {
  /** Wait for a command's reply. Default: 5000 */
  defaultTimeoutMs?: number;
  /** Wait for the appStart handshake and a full contact sync. Default: 15000 */
  handshakeTimeoutMs?: number;
  /** Sent in appStart; the radio keeps at most 5 bytes. Default: "mcore" */
  clientId?: string;
  /** Drain the message queue when the radio reports waiting messages. Default: true */
  autoFetchMessages?: boolean;
  /** Reconnect after an unrequested link drop. Default: true */
  autoReconnect?: boolean;
  /** Default: 3 */
  reconnectAttempts?: number;
  /** Wait before reconnect attempt n is this times n. Default: 500 */
  reconnectBaseDelayMs?: number;
  /** Period of the sweep for overdue requests. Default: 1000 */
  cleanupIntervalMs?: number;
  /** Queue bound for each `subscribe()` stream. Default: 100 */
  subscriberBufferSize?: number;
  /** Default: 50 */
  directDedupCapacity?: number;
  /** Default: 100 */
  channelDedupCapacity?: number;
  /** Ignored when `logger` is given. Default: "warn" */
  logLevel?: LogLevelName;
  logger?: MeshLogger;
  /** Receives every contact, message and channel the session decodes. */
  store?: MeshStore;
  /** X25519 identity key for {@link MeshSession.decryptDirect}. */
  privateKey?: PrivateKey;
}

type ResolvedConfig = Required<Omit<SessionConfig, "logger" | "store" | "privateKey">>;

const NUMERIC_SETTINGS = [
  "defaultTimeoutMs",
  "handshakeTimeoutMs",
  "reconnectAttempts",
  "reconnectBaseDelayMs",
  "cleanupIntervalMs",
  "subscriberBufferSize",
  "directDedupCapacity",
  "channelDedupCapacity",
] as const;

// ─── Public Result Types ──────────────────────────────────────────

export type FetchedMessage =
  | { readonly kind: "direct"; readonly message: ContactMessage; readonly duplicate: boolean }
  | { readonly kind: "channel"; readonly message: ChannelMessage; readonly duplicate: boolean };

export interface AckedSend {
  readonly sent: MessageSentInfo;
  /** False when no ack arrived before the firmware's suggested timeout. */
  readonly acknowledged: boolean;
}

export type MessageTarget = Contact | Uint8Array;

export interface NeighboursQuery {
  /** Default: 255 */
  readonly count?: number;
  readonly offset?: number;
  /** 0 newest first, 1 oldest first, 2 strongest first, 3 weakest first. */
  readonly orderBy?: number;
  /** Key-prefix bytes per entry in the reply. Default: 4 */
  readonly prefixLength?: number;
}

export interface TraceOptions {
  readonly tag?: number;
  readonly authCode?: number;
  readonly flags?: number;
  /** Repeater hashes to route through; empty for a zero-hop trace. */
  readonly path?: Uint8Array;
}

// ─── Internal ─────────────────────────────────────────────────────

/** What the command in flight makes of an inbound event. */
type ReplyVerdict = "ignore" | "consume" | "complete";
type ReplyHandler = (event: MeshEvent) => ReplyVerdict;

const CONNECTION_LOST = "connection lost";
const SESSION_STOPPED = "session stopped";
const SIGN_CHUNK_SIZE = 128;

function isOneOf<T extends MeshEventType>(
  event: MeshEvent,
  types: readonly T[]
): event is MeshEventMap[T] {
  return types.some((type) => type === event.type);
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Channel text arrives as "sender: body". */
export function splitChannelText(text: string): { sender: string; body: string } {
  const colon = text.indexOf(": ");
  return colon === -1
    ? { sender: "", body: text }
    : { sender: text.slice(0, colon), body: text.slice(colon + 2) };
}

const ackTag = (bytes: Uint8Array): RequestTag => toHex(bytes) as RequestTag;
const prefixHex = (key: Uint8Array): string => toHex(key.subarray(0, PacketSize.KEY_PREFIX));
const loginTag = (key: Uint8Array): RequestTag => `login:${prefixHex(key)}` as RequestTag;
const pathTag = (key: Uint8Array): RequestTag => `path:${prefixHex(key)}` as RequestTag;
const traceTag = (tag: number): RequestTag => `trace:${tag >>> 0}` as RequestTag;

const nowSeconds = (): UnixTimestamp => Math.floor(Date.now() / 1000) as UnixTimestamp;

// ─── Orchestrator ──────────────────────────────────────────────────

export class MeshSession {
  readonly contacts = new ContactCache();
  readonly dedup: MessageDedupCache;
  readonly logger: MeshLogger;

  private readonly config: ResolvedConfig;
  private readonly store: MeshStore | undefined;
  private privateKey: PrivateKey | undefined;

  private readonly registry: PendingRequestRegistry;
  private readonly emitter: MeshEmitter;
  private readonly dispatcher: EventDispatcher;

  private connection: ConnectionState = { status: "disconnected" };
  private started = false;
  private starting: Promise<SelfInfo> | null = null;
  private self: SelfInfo | null = null;
  private commandSeq = 0;
  private commandQueue: Promise<unknown> = Promise.resolve();
  private inFlight: { readonly tag: RequestTag; readonly accept: ReplyHandler } | null = null;
  private lastLoginTag: RequestTag | null = null;
  private readonly duplicates = new WeakSet<MeshEvent>();
  private draining: Promise<FetchedMessage[]> | null = null;
  private syncingContacts = false;
  private cleanupTimer: ReturnType<typeof setInterval> | null = null;
  private detach: Array<() => void> = [];

  constructor(
    readonly transport: MeshTransport,
    config: SessionConfig = {}
  ) {
    for (const setting of NUMERIC_SETTINGS) {
      const value = config[setting];
      if (value !== undefined && (!Number.isFinite(value) || value < 0)) {
        throw new SessionError(`${setting} must be a finite, non-negative number`, "INVALID_INPUT");
      }
    }

    this.config = {
      defaultTimeoutMs: config.defaultTimeoutMs ?? 5000,
      handshakeTimeoutMs: config.handshakeTimeoutMs ?? 15000,
      clientId: config.clientId ?? "mcore",
      autoFetchMessages: config.autoFetchMessages ?? true,
      autoReconnect: config.autoReconnect ?? true,
      reconnectAttempts: config.reconnectAttempts ?? 3,
      reconnectBaseDelayMs: config.reconnectBaseDelayMs ?? 500,
      cleanupIntervalMs: config.cleanupIntervalMs ?? 1000,
      subscriberBufferSize: config.subscriberBufferSize ?? DEFAULT_SUBSCRIBER_BUFFER,
      directDedupCapacity: config.directDedupCapacity ?? DEFAULT_DIRECT_DEDUP_CAPACITY,
      channelDedupCapacity: config.channelDedupCapacity ?? DEFAULT_CHANNEL_DEDUP_CAPACITY,
      logLevel: config.logLevel ?? "warn",
    };

    this.logger = config.logger ?? new Logger("session", this.config.logLevel);
    this.store = config.store;
    this.privateKey = config.privateKey;

    this.registry = new PendingRequestRegistry({ logger: this.logger.child("registry") });
    this.emitter = new MeshEmitter((error, event) =>
      this.logger.warn("listener for %s threw: %s", event.type, describe(error))
    );
    this.dispatcher = new EventDispatcher(this.config.subscriberBufferSize);
    this.dedup = new MessageDedupCache({
      direct: this.config.directDedupCapacity,
      channel: this.config.channelDedupCapacity,
    });
  }

  // ─── Lifecycle ──────────────────────────────────────────────────

  /**
   * Connects and performs the appStart handshake. Concurrent calls share
   * one attempt.
   * @returns The radio's self-description.
   */
  start(): Promise<SelfInfo> {
    if (this.starting) return this.starting;
    if (this.started && this.self) return Promise.resolve(this.self);

    this.starting = this.open().finally(() => {
      this.starting = null;
    });
    return this.starting;
  }

  private async open(): Promise<SelfInfo> {
    this.started = true;
    this.detach = [
      this.transport.onReceive((frame) => this.handleFrame(frame)),
      this.transport.onDisconnect((reason) => this.handleDisconnect(reason)),
    ];
    this.setState({ status: "connecting" });

    try {
      await this.transport.connect();
      const info = await this.handshake();
      this.setState({ status: "connected" });
      this.startCleanup();
      return info;
    } catch (error) {
      this.teardown(SESSION_STOPPED);
      this.setState({ status: "failed", reason: describe(error) });
      await this.closeTransport();
      throw error;
    }
  }

  /** Cancels everything pending and closes the link. Subscriptions end. */
  async stop(): Promise<void> {
    if (!this.started) return;
    this.teardown(SESSION_STOPPED);
    await this.closeTransport();
    this.setState({ status: "disconnected" });
    this.dispatcher.closeAll();
  }

  get state(): ConnectionState {
    return this.connection;
  }

  get selfInfo(): SelfInfo | null {
    return this.self;
  }

  /** Live entries in the pending request registry. */
  get pendingRequestCount(): number {
    return this.registry.size;
  }

  // ─── Subscriptions ──────────────────────────────────────────────

  on<T extends MeshEventType>(eventType: T, listener: EventListener<T>): () => void {
    return this.emitter.on(eventType, listener);
  }

  once<T extends MeshEventType>(eventType: T, listener: EventListener<T>): () => void {
    return this.emitter.once(eventType, listener);
  }

  /** A bounded stream of events; the oldest queued event is dropped when full. */
  subscribe(): Subscription<MeshEvent>;
  subscribe<E extends MeshEvent>(filter: EventFilter<E>, capacity?: number): Subscription<E>;
  subscribe<E extends MeshEvent>(
    filter?: EventFilter<E>,
    capacity?: number
  ): Subscription<E> | Subscription<MeshEvent> {
    return filter ? this.dispatcher.subscribe(filter, capacity) : this.dispatcher.subscribe();
  }

  // ─── Device ─────────────────────────────────────────────────────

  async queryDevice(): Promise<DeviceInfo> {
    return (await this.expect({ kind: "deviceQuery" }, ["DEVICE_INFO"])).info;
  }

  async getBattery(): Promise<BatteryInfo> {
    return (await this.expect({ kind: "getBattery" }, ["BATTERY"])).battery;
  }

  async getTime(): Promise<UnixTimestamp> {
    return (await this.expect({ kind: "getTime" }, ["CURRENT_TIME"])).time;
  }

  async setTime(time: UnixTimestamp = nowSeconds()): Promise<void> {
    await this.expect({ kind: "setTime", time }, ["OK"]);
  }

  async setName(name: string): Promise<void> {
    await this.expect({ kind: "setName", name }, ["OK"]);
  }

  async setCoordinates(latitude: number, longitude: number): Promise<void> {
    if (Math.abs(latitude) > 90 || Math.abs(longitude) > 180) {
      throw new SessionError(`Coordinates out of range: ${latitude}, ${longitude}`, "INVALID_INPUT");
    }
    await this.expect({ kind: "setCoordinates", latitude, longitude }, ["OK"]);
  }

  async setTxPower(power: number): Promise<void> {
    await this.expect({ kind: "setTxPower", power }, ["OK"]);
  }

  async setRadio(radio: RadioSettings): Promise<void> {
    await this.expect({ kind: "setRadio", radio }, ["OK"]);
  }

  async setTuning(rxDelay: number, airtimeFactor: number): Promise<void> {
    await this.expect({ kind: "setTuning", rxDelay, airtimeFactor }, ["OK"]);
  }

  async setOtherParams(params: OtherParams): Promise<void> {
    await this.expect({ kind: "setOtherParams", params }, ["OK"]);
  }

  async setDevicePin(pin: number): Promise<void> {
    await this.expect({ kind: "setDevicePin", pin }, ["OK"]);
  }

  async sendAdvertisement(flood = false): Promise<void> {
    await this.expect({ kind: "sendAdvertisement", flood }, ["OK"]);
  }

  /** The radio restarts without replying; resolves once the frame is written. */
  async reboot(): Promise<void> {
    await this.exclusive(async () => {
      this.requireStarted();
      await this.transmit(encodeCommand({ kind: "reboot" }));
    });
  }

  async factoryReset(): Promise<void> {
    await this.expect({ kind: "factoryReset" }, ["OK"]);
  }

  getStats(stats: "core"): Promise<CoreStats>;
  getStats(stats: "radio"): Promise<RadioStats>;
  getStats(stats: "packets"): Promise<PacketStats>;
  async getStats(stats: StatsSelector): Promise<CoreStats | RadioStats | PacketStats> {
    switch (stats) {
      case "core":
        return (await this.expect({ kind: "getStats", stats }, ["CORE_STATS"])).stats;
      case "radio":
        return (await this.expect({ kind: "getStats", stats }, ["RADIO_STATS"])).stats;
      case "packets":
        return (await this.expect({ kind: "getStats", stats }, ["PACKET_STATS"])).stats;
    }
  }

  async getCustomVars(): Promise<Readonly<Record<string, string>>> {
    return (await this.expect({ kind: "getCustomVars" }, ["CUSTOM_VARS"])).vars;
  }

  async setCustomVar(key: string, value: string): Promise<void> {
    if (key.includes(":") || key.includes(",")) {
      throw new SessionError(`Invalid variable name: ${key}`, "INVALID_INPUT");
    }
    await this.expect({ kind: "setCustomVar", key, value }, ["OK"]);
  }

  /** Remote nodes' telemetry pushes that arrive meanwhile are not taken as the reply. */
  async getSelfTelemetry(): Promise<LppDataPoint[]> {
    const ownPrefix = this.self?.publicKey.subarray(0, PacketSize.KEY_PREFIX);
    const event = await this.execute({ kind: "getSelfTelemetry" }, (candidate) =>
      candidate.type === "TELEMETRY_RESPONSE" &&
      (!ownPrefix || bytesEqual(candidate.telemetry.senderPrefix, ownPrefix))
        ? "complete"
        : "ignore"
    );
    if (event.type !== "TELEMETRY_RESPONSE") {
      throw new ProtocolError(`getSelfTelemetry answered with ${event.type}`, "UNEXPECTED_RESPONSE");
    }
    return decodeLpp(event.telemetry.lpp);
  }

  /**
   * Restricts flood traffic to a region. A string is hashed into a key;
   * `null` turns scoping off.
   */
  async setFloodScope(scope: FloodScopeKey | string | null): Promise<void> {
    const key =
      scope === null
        ? disabledFloodScopeKey()
        : typeof scope === "string"
          ? deriveFloodScopeKey(scope)
          : scope;
    await this.expect({ kind: "setFloodScope", key }, ["OK"]);
  }

  /** The radio's 64-byte signing key; firmware may refuse with DISABLED. */
  async exportPrivateKey(): Promise<Uint8Array> {
    return (await this.expect({ kind: "exportPrivateKey" }, ["PRIVATE_KEY"])).key;
  }

  async importPrivateKey(key: Uint8Array): Promise<void> {
    if (key.length !== 64) {
      throw new SessionError(`Private key must be 64 bytes, got ${key.length}`, "INVALID_INPUT");
    }
    await this.expect({ kind: "importPrivateKey", key }, ["OK"]);
  }

  /**
   * Signs `data` with the radio's identity key.
   * @throws {SessionError} code=DATA_TOO_LARGE beyond the radio's limit.
   */
  async sign(data: Uint8Array): Promise<Uint8Array> {
    const { maxLength } = await this.expect({ kind: "signStart" }, ["SIGN_START"]);
    if (data.length > maxLength) {
      throw new SessionError(
        `Cannot sign ${data.length} bytes; the radio accepts ${maxLength}`,
        "DATA_TOO_LARGE"
      );
    }
    for (let offset = 0; offset < data.length; offset += SIGN_CHUNK_SIZE) {
      const chunk = data.subarray(offset, offset + SIGN_CHUNK_SIZE);
      await this.expect({ kind: "signData", chunk }, ["OK"]);
    }
    return (await this.expect({ kind: "signFinish" }, ["SIGNATURE"])).signature;
  }

  // ─── Contacts ───────────────────────────────────────────────────

  /**
   * Fetches contacts changed since the cache's watermark (all of them
   * when `full` or on first sync) and records the new watermark.
   * @returns The contacts the radio sent.
   */
  async syncContacts(full = false): Promise<Contact[]> {
    const since = full ? undefined : this.contacts.lastModified;
    const received: Contact[] = [];

    this.syncingContacts = true;
    try {
      const end = await this.execute(
        { kind: "getContacts", since },
        (event) => {
          switch (event.type) {
            case "CONTACTS_START":
              return "consume";
            case "CONTACT":
              received.push(event.contact);
              return "consume";
            case "CONTACTS_END":
              return "complete";
            default:
              return "ignore";
          }
        },
        this.config.handshakeTimeoutMs
      );
      if (end.type !== "CONTACTS_END") {
        throw new ProtocolError(`Contact sync ended with ${end.type}`, "UNEXPECTED_RESPONSE");
      }

      this.contacts.updateFromSync(received, end.lastModified);
      for (const contact of received) {
        this.persist("contact", (store) => store.saveContact(contact));
      }
      this.logger.info("synced %d contacts", received.length);
      return received;
    } finally {
      this.syncingContacts = false;
    }
  }

  /** Writes a full contact record to the radio. */
  async addContact(contact: Contact): Promise<void> {
    await this.expect({ kind: "addContact", contact }, ["OK"]);
    this.contacts.store(contact);
    this.persist("contact", (store) => store.saveContact(contact));
  }

  /** Imports a card produced by {@link exportContact} on another radio. */
  async importContact(card: Uint8Array): Promise<void> {
    await this.expect({ kind: "importContact", card }, ["OK"]);
    this.contacts.markDirty();
  }

  /**
   * Adds a contact that advertised while manual-add is on.
   * @throws {SessionError} code=CONTACT_NOT_FOUND if nothing is pending under `id`.
   */
  async confirmPendingContact(id: ContactId): Promise<Contact> {
    const contact = this.contacts.popPending(id);
    if (!contact) {
      throw new SessionError(`No pending contact ${id}`, "CONTACT_NOT_FOUND");
    }
    try {
      await this.addContact(contact);
    } catch (error) {
      this.contacts.addPending(contact);
      throw error;
    }
    return contact;
  }

  async removeContact(target: MessageTarget): Promise<void> {
    const publicKey = this.resolvePublicKey(target);
    await this.expect({ kind: "removeContact", publicKey }, ["OK"]);
    this.contacts.remove(contactIdOf(publicKey));
  }

  /** Forgets the learned route so the next message floods. */
  async resetPath(target: MessageTarget): Promise<void> {
    const publicKey = this.resolvePublicKey(target);
    await this.expect({ kind: "resetPath", publicKey }, ["OK"]);
    this.contacts.markDirty();
  }

  async updateContactFlags(target: MessageTarget, flags: number): Promise<void> {
    const publicKey = this.resolvePublicKey(target);
    await this.expect({ kind: "updateContact", publicKey, flags }, ["OK"]);

    const cached = this.contacts.getByPublicKey(publicKey);
    if (cached) this.contacts.store({ ...cached, flags });
  }

  /** Broadcasts the contact's advertisement zero-hop. */
  async shareContact(target: MessageTarget): Promise<void> {
    const publicKey = this.resolvePublicKey(target);
    await this.expect({ kind: "shareContact", publicKey }, ["OK"]);
  }

  /** `meshcore://` URI for a contact, or for this radio when `target` is omitted. */
  async exportContact(target?: MessageTarget): Promise<string> {
    const publicKey = target === undefined ? undefined : this.resolvePublicKey(target);
    return (await this.expect({ kind: "exportContact", publicKey }, ["CONTACT_URI"])).uri;
  }

  // ─── Messages ───────────────────────────────────────────────────

  async sendMessage(
    target: MessageTarget,
    text: string,
    options: { timestamp?: UnixTimestamp; attempt?: number } = {}
  ): Promise<MessageSentInfo> {
    const event = await this.expect(
      {
        kind: "sendMessage",
        destination: this.resolvePrefix(target),
        text,
        timestamp: options.timestamp ?? nowSeconds(),
        attempt: options.attempt,
      },
      ["MESSAGE_SENT"]
    );
    return event.info;
  }

  /**
   * Sends and waits for the recipient's ack. The ack wait is registered
   * while `MESSAGE_SENT` is dispatched, before any later frame is read.
   */
  async sendMessageWithAck(
    target: MessageTarget,
    text: string,
    options: { timestamp?: UnixTimestamp; attempt?: number } = {}
  ): Promise<AckedSend> {
    const { sent, reply } = await this.sendAwaitingReply(
      {
        kind: "sendMessage",
        destination: this.resolvePrefix(target),
        text,
        timestamp: options.timestamp ?? nowSeconds(),
        attempt: options.attempt,
      },
      (info) => ackTag(info.expectedAck)
    );
    const outcome = await reply;
    if (outcome.status === "cancelled") {
      throw new TransportError(`Waiting for ack cancelled: ${outcome.reason}`, "CONNECTION_LOST");
    }
    return { sent, acknowledged: outcome.status === "completed" };
  }

  /** Sends a CLI command to a repeater or room server. */
  async sendCommand(target: MessageTarget, command: string): Promise<MessageSentInfo> {
    const event = await this.expect(
      {
        kind: "sendCommand",
        destination: this.resolvePrefix(target),
        command,
        timestamp: nowSeconds(),
      },
      ["MESSAGE_SENT"]
    );
    return event.info;
  }

  async sendChannelMessage(
    channel: number,
    text: string,
    timestamp: UnixTimestamp = nowSeconds()
  ): Promise<void> {
    await this.expect({ kind: "sendChannelMessage", channel, text, timestamp }, ["OK"]);
  }

  /** Pops one message off the radio's queue; null when it is empty. */
  async fetchNextMessage(): Promise<FetchedMessage | null> {
    const event = await this.expect({ kind: "getMessage" }, [
      "CONTACT_MESSAGE",
      "CHANNEL_MESSAGE",
      "NO_MORE_MESSAGES",
    ]);
    const duplicate = this.duplicates.has(event);
    switch (event.type) {
      case "CONTACT_MESSAGE":
        return { kind: "direct", message: event.message, duplicate };
      case "CHANNEL_MESSAGE":
        return { kind: "channel", message: event.message, duplicate };
      case "NO_MORE_MESSAGES":
        return null;
    }
  }

  /**
   * Drains the queue. Duplicates are dropped; everything else has already
   * been persisted and broadcast by the time it is returned. Concurrent
   * calls share one drain.
   */
  syncMessages(): Promise<FetchedMessage[]> {
    if (!this.draining) {
      this.draining = this.drainMessages().finally(() => {
        this.draining = null;
      });
    }
    return this.draining;
  }

  /**
   * Decrypts a raw direct-message payload (from RAW_DATA or LOG_DATA).
   * @throws {SessionError} code=INVALID_INPUT without an identity key.
   */
  decryptDirect(payload: Uint8Array, senderPublicKey: Uint8Array): DecryptResult {
    if (!this.privateKey) {
      throw new SessionError("No identity key configured", "INVALID_INPUT");
    }
    return decryptDirectMessage(payload, this.privateKey, senderPublicKey);
  }

  setPrivateKey(privateKey: PrivateKey): void {
    this.privateKey = privateKey;
  }

  // ─── Channels ───────────────────────────────────────────────────

  async getChannel(index: number): Promise<ChannelInfo> {
    const { channel } = await this.expect({ kind: "getChannel", index }, ["CHANNEL_INFO"]);
    this.persist("channel", (store) => store.saveChannel(channel));
    return channel;
  }

  /** Without a secret, one is derived from the name (hashtag channels). */
  async setChannel(index: number, name: string, secret?: ChannelSecret): Promise<ChannelInfo> {
    if (encodeUtf8(name).length > PacketSize.NAME_FIELD) {
      throw new SessionError(`Channel name longer than ${PacketSize.NAME_FIELD} bytes`, "DATA_TOO_LARGE");
    }
    const channel: ChannelInfo = { index, name, secret: secret ?? deriveChannelSecret(name) };
    await this.expect({ kind: "setChannel", ...channel }, ["OK"]);
    this.persist("channel", (store) => store.saveChannel(channel));
    return channel;
  }

  // ─── Remote Nodes ───────────────────────────────────────────────

  /** @returns Login details, or null if the node rejected the password. */
  async login(target: MessageTarget, password: string): Promise<LoginInfo | null> {
    const publicKey = this.resolvePublicKey(target);
    const tag = loginTag(publicKey);
    const { reply } = await this.sendAwaitingReply(
      { kind: "sendLogin", publicKey, password },
      () => {
        this.lastLoginTag = tag;
        return tag;
      }
    );
    const event = this.unwrap(await reply, "login");
    if (event.type === "LOGIN_SUCCESS") return event.login;
    if (event.type === "LOGIN_FAILED") return null;
    throw new ProtocolError(`Login answered with ${event.type}`, "UNEXPECTED_RESPONSE");
  }

  async logout(target: MessageTarget): Promise<void> {
    const publicKey = this.resolvePublicKey(target);
    await this.expect({ kind: "sendLogout", publicKey }, ["OK"]);
  }

  async requestStatus(target: MessageTarget): Promise<StatusReport> {
    const publicKey = this.resolvePublicKey(target);
    const event = await this.binaryRequest(publicKey, BinaryRequestKind.STATUS);
    if (event.type === "STATUS_RESPONSE") return event.status;
    if (event.type === "BINARY_RESPONSE") {
      const senderPrefix = publicKey.slice(0, PacketSize.KEY_PREFIX) as PublicKeyPrefix;
      const status = parseBinaryStatus(event.data, senderPrefix);
      if (status) return status;
    }
    throw new ProtocolError("Malformed status reply", "PARSE_ERROR");
  }

  async requestTelemetry(target: MessageTarget): Promise<LppDataPoint[]> {
    const publicKey = this.resolvePublicKey(target);
    const event = await this.binaryRequest(publicKey, BinaryRequestKind.TELEMETRY);
    if (event.type === "TELEMETRY_RESPONSE") return decodeLpp(event.telemetry.lpp);
    if (event.type === "BINARY_RESPONSE") return decodeLpp(event.data);
    throw new ProtocolError(`Telemetry answered with ${event.type}`, "UNEXPECTED_RESPONSE");
  }

  /** Min/max/average of each sensor between two instants. */
  async requestMma(
    target: MessageTarget,
    from: UnixTimestamp,
    to: UnixTimestamp
  ): Promise<MmaEntry[]> {
    const publicKey = this.resolvePublicKey(target);
    const payload = new ByteWriter().u32le(from).u32le(to).u16le(0).toBytes();
    return parseMma(await this.binaryData(publicKey, BinaryRequestKind.MMA, payload));
  }

  async requestAcl(target: MessageTarget): Promise<AclEntry[]> {
    const publicKey = this.resolvePublicKey(target);
    const payload = new Uint8Array(2);
    return parseAcl(await this.binaryData(publicKey, BinaryRequestKind.ACL, payload));
  }

  async requestNeighbours(
    target: MessageTarget,
    query: NeighboursQuery = {}
  ): Promise<NeighboursResult> {
    const publicKey = this.resolvePublicKey(target);
    const prefixLength = query.prefixLength ?? 4;
    const payload = new ByteWriter()
      .u8(0)
      .u8(query.count ?? 255)
      .u16le(query.offset ?? 0)
      .u8(query.orderBy ?? 0)
      .u8(prefixLength)
      .bytes(randomBytes(4))
      .toBytes();
    const data = await this.binaryData(publicKey, BinaryRequestKind.NEIGHBOURS, payload);
    return parseNeighbours(data, prefixLength);
  }

  async sendTrace(options: TraceOptions = {}): Promise<TraceInfo> {
    const tag = options.tag ?? new ByteReader(randomBytes(4)).u32le();
    const { reply } = await this.sendAwaitingReply(
      {
        kind: "sendTrace",
        tag,
        authCode: options.authCode ?? 0,
        flags: options.flags ?? 0,
        path: options.path,
      },
      () => traceTag(tag)
    );
    const event = this.unwrap(await reply, "trace");
    if (event.type !== "TRACE_DATA") {
      throw new ProtocolError(`Trace answered with ${event.type}`, "UNEXPECTED_RESPONSE");
    }
    return event.trace;
  }

  /** Asks the target for its return path; the radio learns the route. */
  async discoverPath(target: MessageTarget): Promise<PathInfo> {
    const publicKey = this.resolvePublicKey(target);
    const { reply } = await this.sendAwaitingReply(
      { kind: "pathDiscovery", publicKey },
      () => pathTag(publicKey)
    );
    const event = this.unwrap(await reply, "path discovery");
    if (event.type !== "PATH_DISCOVERY_RESPONSE") {
      throw new ProtocolError(`Path discovery answered with ${event.type}`, "UNEXPECTED_RESPONSE");
    }
    return event.path;
  }

  // ─── Command Execution ──────────────────────────────────────────

  /** Runs `task` after every earlier task has settled. */
  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.commandQueue.then(task, task);
    this.commandQueue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  /**
   * Registers a tag, transmits, and returns whatever event `accept`
   * completed it with. Device errors and timeouts become exceptions.
   */
  private execute(
    command: MeshCommand,
    accept: ReplyHandler,
    timeoutMs: number = this.config.defaultTimeoutMs
  ): Promise<MeshEvent> {
    return this.exclusive(async () => {
      this.requireStarted();
      const tag = `cmd:${++this.commandSeq}` as RequestTag;
      const outcome = this.registry.register(tag, { timeoutMs, context: command.kind });
      this.inFlight = { tag, accept };

      try {
        await this.transmit(encodeCommand(command));
      } catch (error) {
        this.registry.cancel(tag, "send failed");
        if (this.inFlight?.tag === tag) this.inFlight = null;
        throw error;
      }

      try {
        return this.unwrap(await outcome, command.kind);
      } finally {
        if (this.inFlight?.tag === tag) this.inFlight = null;
      }
    });
  }

  /** {@link execute} for commands answered by a single event of a known type. */
  private async expect<T extends MeshEventType>(
    command: MeshCommand,
    types: readonly T[],
    timeoutMs?: number
  ): Promise<MeshEventMap[T]> {
    const event = await this.execute(
      command,
      (candidate) => (isOneOf(candidate, types) ? "complete" : "ignore"),
      timeoutMs
    );
    if (!isOneOf(event, types)) {
      throw new ProtocolError(
        `${command.kind} answered with ${event.type}, expected ${types.join("|")}`,
        "UNEXPECTED_RESPONSE"
      );
    }
    return event;
  }

  /**
   * Sends a command the radio answers with `MESSAGE_SENT`, and registers a
   * second wait, under the tag `waitFor` picks, for the remote node's reply.
   */
  private async sendAwaitingReply(
    command: MeshCommand,
    waitFor: (info: MessageSentInfo) => RequestTag,
    binary?: { kind: BinaryRequestKind; keyPrefix: Uint8Array }
  ): Promise<{ sent: MessageSentInfo; reply: Promise<RequestOutcome> }> {
    const pending: { reply?: Promise<RequestOutcome> } = {};

    const event = await this.execute(command, (candidate) => {
      if (candidate.type !== "MESSAGE_SENT") return "ignore";
      const info = candidate.info;
      pending.reply = this.registry.register(waitFor(info), {
        timeoutMs: info.suggestedTimeoutMs > 0 ? info.suggestedTimeoutMs : this.config.defaultTimeoutMs,
        binary,
        context: `${command.kind} reply`,
      });
      return "complete";
    });

    if (event.type !== "MESSAGE_SENT" || !pending.reply) {
      throw new ProtocolError(`${command.kind} answered with ${event.type}`, "UNEXPECTED_RESPONSE");
    }
    return { sent: event.info, reply: pending.reply };
  }

  private async binaryRequest(
    publicKey: Uint8Array,
    kind: BinaryRequestKind,
    payload?: Uint8Array
  ): Promise<MeshEvent> {
    const { reply } = await this.sendAwaitingReply(
      { kind: "binaryRequest", publicKey, request: kind, payload },
      (info) => ackTag(info.expectedAck),
      { kind, keyPrefix: publicKey }
    );
    return this.unwrap(await reply, `binary request 0x${kind.toString(16)}`);
  }

  private async binaryData(
    publicKey: Uint8Array,
    kind: BinaryRequestKind,
    payload?: Uint8Array
  ): Promise<Uint8Array> {
    const event = await this.binaryRequest(publicKey, kind, payload);
    if (event.type !== "BINARY_RESPONSE") {
      throw new ProtocolError(`Binary request answered with ${event.type}`, "UNEXPECTED_RESPONSE");
    }
    return event.data;
  }

  private unwrap(outcome: RequestOutcome, what: string): MeshEvent {
    switch (outcome.status) {
      case "completed": {
        const event = outcome.event;
        if (event.type === "ERROR") {
          throw new ProtocolError(
            `${what} failed with device error ${event.code ?? "(none)"}`,
            "DEVICE_ERROR",
            event.code
          );
        }
        if (event.type === "DISABLED") {
          throw new ProtocolError(`${what}: ${event.reason}`, "DEVICE_ERROR");
        }
        return event;
      }
      case "timeout":
        throw new TransportError(`${what} timed out`, "TIMEOUT");
      case "cancelled":
        throw new TransportError(`${what} cancelled: ${outcome.reason}`, "CONNECTION_LOST");
    }
  }

  private async transmit(frame: Uint8Array): Promise<void> {
    if (!this.transport.isConnected) {
      throw new TransportError("Transport is not connected", "NOT_CONNECTED");
    }
    this.logger.debug("tx 0x%s (%d bytes)", (frame[0] ?? 0).toString(16), frame.length);
    await this.transport.send(frame);
  }

  private async handshake(): Promise<SelfInfo> {
    const { info } = await this.expect(
      { kind: "appStart", clientId: this.config.clientId },
      ["SELF_INFO"],
      this.config.handshakeTimeoutMs
    );
    this.self = info;
    this.logger.info("connected to %s", info.name);
    return info;
  }

  // ─── Inbound ────────────────────────────────────────────────────

  private handleFrame(frame: Uint8Array): void {
    let decoded: DecodedFrame;
    try {
      decoded = decodeFrame(frame);
    } catch (error) {
      this.logger.error("decoder failed on 0x%s: %s", toHex(frame), describe(error));
      return;
    }
    if (decoded.kind === "unrecognized") {
      this.logger.warn("dropping frame: %s", decoded.reason);
      return;
    }
    const event = decoded.event;
    this.logger.debug("rx %s %s", decoded.kind, event.type);

    if (event.type === "CONTACT_MESSAGE" || event.type === "CHANNEL_MESSAGE") {
      this.admitMessage(event);
    }

    this.offerToInFlight(event, decoded.kind === "response");
    if (decoded.kind === "push") this.routePush(event);
    this.contacts.trackChanges(event);

    if (!this.duplicates.has(event)) this.broadcast(event);
  }

  private offerToInFlight(event: MeshEvent, isResponse: boolean): void {
    const current = this.inFlight;
    if (!current) return;

    const failed = isResponse && (event.type === "ERROR" || event.type === "DISABLED");
    const verdict = failed ? "complete" : current.accept(event);
    if (verdict === "complete") {
      this.inFlight = null;
      this.registry.complete(current.tag, event);
    }
  }

  private routePush(event: MeshEvent): void {
    switch (event.type) {
      case "ACK":
        this.registry.complete(ackTag(event.code), event);
        break;
      case "BINARY_RESPONSE":
        if (!this.registry.complete(ackTag(event.tag), event)) {
          this.logger.debug("unmatched binary response %s", toHex(event.tag));
        }
        break;
      case "TELEMETRY_RESPONSE": {
        const { tag, senderPrefix } = event.telemetry;
        if (tag && this.registry.complete(ackTag(tag), event)) break;
        this.registry.completeBinaryRequest(senderPrefix, BinaryRequestKind.TELEMETRY, event);
        break;
      }
      case "STATUS_RESPONSE":
        this.registry.completeBinaryRequest(event.status.senderPrefix, BinaryRequestKind.STATUS, event);
        break;
      case "LOGIN_SUCCESS":
      case "LOGIN_FAILED": {
        const prefix = event.type === "LOGIN_SUCCESS" ? event.login.senderPrefix : event.senderPrefix;
        const tag = prefix && prefix.length > 0 ? loginTag(prefix) : this.lastLoginTag;
        if (tag) this.registry.complete(tag, event);
        break;
      }
      case "PATH_DISCOVERY_RESPONSE":
        this.registry.complete(pathTag(event.path.senderPrefix), event);
        break;
      case "TRACE_DATA":
        this.registry.complete(traceTag(event.trace.tag), event);
        break;
      case "MESSAGES_WAITING":
        if (this.config.autoFetchMessages) {
          void this.syncMessages().catch((error: unknown) =>
            this.logger.warn("message fetch failed: %s", describe(error))
          );
        }
        break;
      case "ADVERTISEMENT":
      case "PATH_UPDATE":
        if (this.contacts.autoUpdate && !this.syncingContacts) {
          void this.syncContacts().catch((error: unknown) =>
            this.logger.warn("contact refresh failed: %s", describe(error))
          );
        }
        break;
    }
  }

  /** Dedups one received message and persists it when it is new. */
  private admitMessage(
    event: MeshEventMap["CONTACT_MESSAGE"] | MeshEventMap["CHANNEL_MESSAGE"]
  ): void {
    const receivedAt = Date.now();

    if (event.type === "CONTACT_MESSAGE") {
      const message = event.message;
      const contactId = this.contacts.getByKeyPrefix(message.senderPrefix)?.id;
      const duplicate = this.dedup.isDuplicateDirectMessage(
        contactId ?? UNKNOWN_SENDER,
        message.senderTimestamp,
        message.text
      );
      if (duplicate) {
        this.duplicates.add(event);
        return;
      }
      this.persist("message", (store) =>
        store.saveMessage({ kind: "direct", contactId, message, receivedAt })
      );
      return;
    }

    const message = event.message;
    const { sender, body } = splitChannelText(message.text);
    if (this.dedup.isDuplicateChannelMessage(message.channelIndex, message.senderTimestamp, sender, body)) {
      this.duplicates.add(event);
      return;
    }
    this.persist("message", (store) => store.saveMessage({ kind: "channel", message, receivedAt }));
  }

  private async drainMessages(): Promise<FetchedMessage[]> {
    const fresh: FetchedMessage[] = [];
    for (;;) {
      const next = await this.fetchNextMessage();
      if (!next) return fresh;
      if (!next.duplicate) fresh.push(next);
    }
  }

  private broadcast(event: MeshEvent): void {
    this.emitter.emit(event);
    this.dispatcher.publish(event);
  }

  // ─── Connection ─────────────────────────────────────────────────

  private setState(state: ConnectionState): void {
    this.connection = state;
    this.broadcast({ type: "CONNECTION_STATE_CHANGED", state });
  }

  private handleDisconnect(reason?: Error): void {
    if (!this.started) return;
    this.logger.warn("link lost%s", reason ? `: ${reason.message}` : "");

    this.stopCleanup();
    this.registry.cancelAll(CONNECTION_LOST);
    this.inFlight = null;
    this.dedup.clear();
    this.setState({ status: "disconnected" });

    if (this.config.autoReconnect && this.config.reconnectAttempts > 0) {
      void this.reconnect();
    }
  }

  private async reconnect(): Promise<void> {
    try {
      await withRetry(
        async (attempt) => {
          if (!this.started) throw new SessionError("Session stopped", "SESSION_NOT_STARTED");
          this.setState({ status: "reconnecting", attempt });
          await this.transport.connect();
          await this.handshake();
        },
        {
          attempts: this.config.reconnectAttempts,
          baseDelayMs: this.config.reconnectBaseDelayMs,
          logger: this.logger,
          shouldRetry: () => this.started,
        }
      );
      this.setState({ status: "connected" });
      this.startCleanup();
    } catch (error) {
      if (!this.started) return;
      this.logger.error("reconnect failed: %s", describe(error));
      this.teardown(CONNECTION_LOST);
      this.setState({ status: "failed", reason: describe(error) });
      await this.closeTransport();
    }
  }

  private teardown(reason: string): void {
    this.started = false;
    this.self = null;
    this.stopCleanup();
    for (const unsubscribe of this.detach) unsubscribe();
    this.detach = [];
    this.registry.cancelAll(reason);
    this.inFlight = null;
    this.dedup.clear();
  }

  private async closeTransport(): Promise<void> {
    try {
      await this.transport.disconnect();
    } catch (error) {
      this.logger.warn("disconnect failed: %s", describe(error));
    }
  }

  private startCleanup(): void {
    this.stopCleanup();
    if (this.config.cleanupIntervalMs <= 0) return;
    this.cleanupTimer = setInterval(() => {
      const expired = this.registry.cleanupExpired();
      if (expired > 0) this.logger.debug("expired %d requests", expired);
    }, this.config.cleanupIntervalMs);
    this.cleanupTimer.unref();
  }

  private stopCleanup(): void {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = null;
    }
  }

  // ─── Helpers ────────────────────────────────────────────────────

  private requireStarted(): void {
    if (!this.started) {
      throw new SessionError("Call start() first", "SESSION_NOT_STARTED");
    }
  }

  /** At least the 6-byte prefix the radio addresses messages by. */
  private resolvePrefix(target: MessageTarget): Uint8Array {
    if (!(target instanceof Uint8Array)) return target.publicKey;
    if (target.length < PacketSize.KEY_PREFIX) {
      throw new SessionError(
        `Destination needs at least ${PacketSize.KEY_PREFIX} key bytes, got ${target.length}`,
        "INVALID_INPUT"
      );
    }
    return target;
  }

  /** A full key, looked up in the cache when only a prefix is given. */
  private resolvePublicKey(target: MessageTarget): Uint8Array {
    const bytes = this.resolvePrefix(target);
    if (bytes.length >= PacketSize.PUBLIC_KEY) return bytes.subarray(0, PacketSize.PUBLIC_KEY);

    const contact = this.contacts.getByKeyPrefix(bytes);
    if (!contact) {
      throw new SessionError(`No contact with key prefix ${toHex(bytes)}`, "CONTACT_NOT_FOUND");
    }
    return contact.publicKey;
  }

  private persist(what: string, write: (store: MeshStore) => void | Promise<void>): void {
    const store = this.store;
    if (!store) return;
    void Promise.resolve()
      .then(() => write(store))
      .catch((error: unknown) => this.logger.warn("saving %s failed: %s", what, describe(error)));
  }
}
