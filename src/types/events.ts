/**
 * @module types/events
 * @description Event catalog produced by the frame decoder and the session.
 *
 * Every decoded frame becomes one `MeshEvent`, discriminated on `type`.
 * Responses (solicited) and pushes (unsolicited) share this union; the
 * decoder reports which of the two a frame was. The session adds
 * `CONNECTION_STATE_CHANGED`, which never comes from the wire.
 */

import type {
  PublicKey,
  PublicKeyPrefix,
  UnixTimestamp,
} from "./branded.js";
import type { Contact } from "./contact.js";
import type {
  BatteryInfo,
  ChannelInfo,
  CoreStats,
  DeviceInfo,
  PacketStats,
  RadioStats,
  SelfInfo,
} from "./device.js";
import type { ConnectionState } from "./transport.js";

// ─── Supporting Records ─────────────────────────────────────────────

export interface MessageSentInfo {
  /** 1 when the firmware sent the message by flood. */
  readonly routeType: number;
  /** 4 bytes the radio will echo in an `ACK` push on delivery. */
  readonly expectedAck: Uint8Array;
  readonly suggestedTimeoutMs: number;
}

export interface ContactMessage {
  readonly senderPrefix: PublicKeyPrefix;
  readonly pathLength: number;
  readonly textType: number;
  readonly senderTimestamp: UnixTimestamp;
  /** Present only for signed (textType 2) messages. */
  readonly signature?: Uint8Array;
  readonly text: string;
  /** Only v3 frames carry link quality. */
  readonly snr?: number;
}

export interface ChannelMessage {
  readonly channelIndex: number;
  readonly pathLength: number;
  readonly textType: number;
  readonly senderTimestamp: UnixTimestamp;
  /** Channel text arrives as "sender: body". */
  readonly text: string;
  readonly snr?: number;
}

export interface StatusReport {
  readonly senderPrefix: PublicKeyPrefix;
  /** Millivolts. */
  readonly battery: number;
  readonly txQueueLength: number;
  readonly noiseFloor: number;
  readonly lastRssi: number;
  readonly packetsReceived: number;
  readonly packetsSent: number;
  readonly airtime: number;
  readonly uptime: number;
  readonly sentFlood: number;
  readonly sentDirect: number;
  readonly receivedFlood: number;
  readonly receivedDirect: number;
  readonly fullEvents: number;
  readonly lastSnr: number;
  readonly directDuplicates: number;
  readonly floodDuplicates: number;
  readonly rxAirtime: number;
}

export interface TelemetryReport {
  readonly senderPrefix: PublicKeyPrefix;
  readonly tag?: Uint8Array;
  /** Undecoded LPP frame. */
  readonly lpp: Uint8Array;
}

export interface TraceHop {
  /** Null when the hop did not report a hash (0xFF on the wire). */
  readonly hash: number | null;
  readonly snr: number;
}

export interface TraceInfo {
  readonly tag: number;
  readonly authCode: number;
  readonly flags: number;
  readonly pathLength: number;
  readonly path: readonly TraceHop[];
}

export interface PathInfo {
  readonly senderPrefix: PublicKeyPrefix;
  readonly outPath: Uint8Array;
  readonly inPath: Uint8Array;
}

export interface LoginInfo {
  readonly permissions: number;
  readonly isAdmin: boolean;
  readonly senderPrefix: PublicKeyPrefix;
}

export interface RadioFrameInfo {
  readonly snr: number;
  readonly rssi: number;
  readonly payload: Uint8Array;
}

export interface ControlDataInfo extends RadioFrameInfo {
  readonly pathLength: number;
  readonly payloadType: number;
}

export interface DiscoverResponse {
  readonly nodeType: number;
  readonly snrIn: number;
  readonly snr: number;
  readonly rssi: number;
  readonly pathLength: number;
  readonly tag: Uint8Array;
  /** Prefix or full key, depending on what the request asked for. */
  readonly publicKey: Uint8Array;
}

// ─── Response Events ────────────────────────────────────────────────

export interface OkEvent {
  readonly type: "OK";
  readonly value?: number;
}

export interface ErrorEvent {
  readonly type: "ERROR";
  readonly code?: number;
}

export interface ContactsStartEvent {
  readonly type: "CONTACTS_START";
  readonly count: number;
}

export interface ContactEvent {
  readonly type: "CONTACT";
  readonly contact: Contact;
}

export interface ContactsEndEvent {
  readonly type: "CONTACTS_END";
  readonly lastModified: UnixTimestamp;
}

export interface SelfInfoEvent {
  readonly type: "SELF_INFO";
  readonly info: SelfInfo;
}

export interface MessageSentEvent {
  readonly type: "MESSAGE_SENT";
  readonly info: MessageSentInfo;
}

export interface ContactMessageEvent {
  readonly type: "CONTACT_MESSAGE";
  readonly message: ContactMessage;
}

export interface ChannelMessageEvent {
  readonly type: "CHANNEL_MESSAGE";
  readonly message: ChannelMessage;
}

export interface CurrentTimeEvent {
  readonly type: "CURRENT_TIME";
  readonly time: UnixTimestamp;
}

export interface NoMoreMessagesEvent {
  readonly type: "NO_MORE_MESSAGES";
}

export interface ContactUriEvent {
  readonly type: "CONTACT_URI";
  readonly uri: string;
}

export interface BatteryEvent {
  readonly type: "BATTERY";
  readonly battery: BatteryInfo;
}

export interface DeviceInfoEvent {
  readonly type: "DEVICE_INFO";
  readonly info: DeviceInfo;
}

export interface PrivateKeyEvent {
  readonly type: "PRIVATE_KEY";
  /** 64 bytes: the firmware's expanded signing key. */
  readonly key: Uint8Array;
}

export interface DisabledEvent {
  readonly type: "DISABLED";
  readonly reason: string;
}

export interface ChannelInfoEvent {
  readonly type: "CHANNEL_INFO";
  readonly channel: ChannelInfo;
}

export interface SignStartEvent {
  readonly type: "SIGN_START";
  readonly maxLength: number;
}

export interface SignatureEvent {
  readonly type: "SIGNATURE";
  readonly signature: Uint8Array;
}

export interface CustomVarsEvent {
  readonly type: "CUSTOM_VARS";
  readonly vars: Readonly<Record<string, string>>;
}

export interface CoreStatsEvent {
  readonly type: "CORE_STATS";
  readonly stats: CoreStats;
}

export interface RadioStatsEvent {
  readonly type: "RADIO_STATS";
  readonly stats: RadioStats;
}

export interface PacketStatsEvent {
  readonly type: "PACKET_STATS";
  readonly stats: PacketStats;
}

// ─── Push Events ────────────────────────────────────────────────────

export interface AdvertisementEvent {
  readonly type: "ADVERTISEMENT";
  readonly publicKey: PublicKey;
}

/** A previously unknown node advertised; carries the full record when sent. */
export interface NewContactEvent {
  readonly type: "NEW_CONTACT";
  readonly contact: Contact;
}

export interface PathUpdateEvent {
  readonly type: "PATH_UPDATE";
  readonly publicKey: PublicKey;
}

export interface AckEvent {
  readonly type: "ACK";
  readonly code: Uint8Array;
}

export interface MessagesWaitingEvent {
  readonly type: "MESSAGES_WAITING";
}

export interface RawDataEvent {
  readonly type: "RAW_DATA";
  readonly frame: RadioFrameInfo;
}

export interface LoginSuccessEvent {
  readonly type: "LOGIN_SUCCESS";
  readonly login: LoginInfo;
}

export interface LoginFailedEvent {
  readonly type: "LOGIN_FAILED";
  readonly senderPrefix?: PublicKeyPrefix;
}

export interface StatusResponseEvent {
  readonly type: "STATUS_RESPONSE";
  readonly status: StatusReport;
}

export interface LogDataEvent {
  readonly type: "LOG_DATA";
  readonly snr?: number;
  readonly rssi?: number;
  readonly payload: Uint8Array;
}

export interface TraceDataEvent {
  readonly type: "TRACE_DATA";
  readonly trace: TraceInfo;
}

export interface TelemetryResponseEvent {
  readonly type: "TELEMETRY_RESPONSE";
  readonly telemetry: TelemetryReport;
}

export interface BinaryResponseEvent {
  readonly type: "BINARY_RESPONSE";
  readonly tag: Uint8Array;
  readonly data: Uint8Array;
}

export interface PathDiscoveryResponseEvent {
  readonly type: "PATH_DISCOVERY_RESPONSE";
  readonly path: PathInfo;
}

export interface ControlDataEvent {
  readonly type: "CONTROL_DATA";
  readonly control: ControlDataInfo;
}

export interface DiscoverResponseEvent {
  readonly type: "DISCOVER_RESPONSE";
  readonly response: DiscoverResponse;
}

// ─── Session Events ─────────────────────────────────────────────────

export interface ConnectionStateChangedEvent {
  readonly type: "CONNECTION_STATE_CHANGED";
  readonly state: ConnectionState;
}

// ─── Union Types ────────────────────────────────────────────────────

/** Union of all events. */
export type MeshEvent =
  | OkEvent
  | ErrorEvent
  | ContactsStartEvent
  | ContactEvent
  | ContactsEndEvent
  | SelfInfoEvent
  | MessageSentEvent
  | ContactMessageEvent
  | ChannelMessageEvent
  | CurrentTimeEvent
  | NoMoreMessagesEvent
  | ContactUriEvent
  | BatteryEvent
  | DeviceInfoEvent
  | PrivateKeyEvent
  | DisabledEvent
  | ChannelInfoEvent
  | SignStartEvent
  | SignatureEvent
  | CustomVarsEvent
  | CoreStatsEvent
  | RadioStatsEvent
  | PacketStatsEvent
  | AdvertisementEvent
  | NewContactEvent
  | PathUpdateEvent
  | AckEvent
  | MessagesWaitingEvent
  | RawDataEvent
  | LoginSuccessEvent
  | LoginFailedEvent
  | StatusResponseEvent
  | LogDataEvent
  | TraceDataEvent
  | TelemetryResponseEvent
  | BinaryResponseEvent
  | PathDiscoveryResponseEvent
  | ControlDataEvent
  | DiscoverResponseEvent
  | ConnectionStateChangedEvent;

/** String literal union of all event type discriminants. */
export type MeshEventType = MeshEvent["type"];

/** Maps event type strings to their event interfaces. */
export type MeshEventMap = {
  [E in MeshEvent as E["type"]]: E;
};
