/**
 * @module codec/responses
 * @description Inbound frame decoder.
 *
 * `decodeFrame` is total: an empty frame, an unknown code or a payload
 * shorter than its layout yields `{ kind: "unrecognized" }` with a reason,
 * never an exception. Callers log and drop those frames.
 */

import {
  ByteReader,
  decodeCString,
  decodeUtf8,
  toHex,
} from "./bytes.js";
import {
  ControlType,
  PacketSize,
  PushCode,
  PUSH_CODE_MIN,
  ResponseCode,
  StatsKind,
  TextType,
} from "./codes.js";
import { toContactType } from "../types/contact.js";
import type {
  ChannelSecret,
  ContactId,
  PublicKey,
  PublicKeyPrefix,
  UnixTimestamp,
} from "../types/branded.js";
import type { Contact } from "../types/contact.js";
import type { MeshEvent, StatusReport, TraceHop } from "../types/events.js";

export type DecodedFrame =
  | { readonly kind: "response"; readonly code: number; readonly event: MeshEvent }
  | { readonly kind: "push"; readonly code: number; readonly event: MeshEvent }
  | {
      readonly kind: "unrecognized";
      readonly code?: number;
      readonly data: Uint8Array;
      readonly reason: string;
    };

/** Thrown inside parsers; converted to an `unrecognized` frame at the boundary. */
class FrameTooShort extends Error {}

function need(payload: Uint8Array, min: number, what: string): void {
  if (payload.length < min) {
    throw new FrameTooShort(`${what} too short: ${payload.length} < ${min}`);
  }
}

const snrOf = (raw: number): number => raw / 4;

// ─── Shared Records ─────────────────────────────────────────────────

/** Reads the 147-byte contact record. */
export function readContact(r: ByteReader): Contact {
  const publicKey = r.bytes(PacketSize.PUBLIC_KEY) as PublicKey;
  const type = toContactType(r.u8());
  const flags = r.u8();
  const outPathLength = r.i8();
  const pathField = r.bytes(PacketSize.PATH_MAX);
  const name = r.cString(PacketSize.NAME_FIELD);
  const lastAdvertisement = r.u32le() as UnixTimestamp;
  const latitude = r.i32le() / 1_000_000;
  const longitude = r.i32le() / 1_000_000;
  const lastModified = r.u32le() as UnixTimestamp;

  return {
    id: toHex(publicKey) as ContactId,
    publicKey,
    type,
    flags,
    outPathLength,
    outPath: outPathLength > 0 ? pathField.slice(0, outPathLength) : new Uint8Array(0),
    name,
    lastAdvertisement,
    lastModified,
    ...(latitude !== 0 || longitude !== 0 ? { location: { latitude, longitude } } : {}),
  };
}

function readStatusFields(r: ByteReader, senderPrefix: PublicKeyPrefix): StatusReport {
  return {
    senderPrefix,
    battery: r.u16le(),
    txQueueLength: r.u16le(),
    noiseFloor: r.i16le(),
    lastRssi: r.i16le(),
    packetsReceived: r.u32le(),
    packetsSent: r.u32le(),
    airtime: r.u32le(),
    uptime: r.u32le(),
    sentFlood: r.u32le(),
    sentDirect: r.u32le(),
    receivedFlood: r.u32le(),
    receivedDirect: r.u32le(),
    fullEvents: r.u16le(),
    lastSnr: snrOf(r.i16le()),
    directDuplicates: r.u16le(),
    floodDuplicates: r.u16le(),
    rxAirtime: r.u32le(),
  };
}

/**
 * Status fields as carried in a binary response (no reserved byte, no
 * prefix). The prefix comes from the request that solicited it.
 */
export function parseStatusFields(
  data: Uint8Array,
  senderPrefix: PublicKeyPrefix
): StatusReport | null {
  if (data.length < PacketSize.STATUS_FIELDS) return null;
  return readStatusFields(new ByteReader(data), senderPrefix);
}

// ─── Responses ──────────────────────────────────────────────────────

function decodeSelfInfo(p: Uint8Array): MeshEvent {
  need(p, PacketSize.SELF_INFO_MIN, "SelfInfo");
  const r = new ByteReader(p);
  const advertisementType = r.u8();
  const txPower = r.u8();
  const maxTxPower = r.u8();
  const publicKey = r.bytes(PacketSize.PUBLIC_KEY) as PublicKey;
  const latitude = r.i32le() / 1_000_000;
  const longitude = r.i32le() / 1_000_000;
  const multiAcks = r.u8();
  const advertisementLocationPolicy = r.u8();
  const telemetryMode = r.u8();
  const manualAddContacts = r.u8() > 0;
  const radioFrequency = r.u32le() / 1000;
  const radioBandwidth = r.u32le() / 1000;
  const radioSpreadingFactor = r.u8();
  const radioCodingRate = r.u8();
  return {
    type: "SELF_INFO",
    info: {
      advertisementType,
      txPower,
      maxTxPower,
      publicKey,
      latitude,
      longitude,
      multiAcks,
      advertisementLocationPolicy,
      telemetryModeEnvironment: (telemetryMode >> 4) & 0b11,
      telemetryModeLocation: (telemetryMode >> 2) & 0b11,
      telemetryModeBase: telemetryMode & 0b11,
      manualAddContacts,
      radioFrequency,
      radioBandwidth,
      radioSpreadingFactor,
      radioCodingRate,
      name: decodeCString(r.rest()),
    },
  };
}

function decodeDeviceInfo(p: Uint8Array): MeshEvent {
  need(p, 1, "DeviceInfo");
  const r = new ByteReader(p);
  const firmwareVersion = r.u8();
  if (firmwareVersion < 3 || p.length < PacketSize.DEVICE_INFO_V3_FULL) {
    return {
      type: "DEVICE_INFO",
      info: {
        firmwareVersion,
        maxContacts: 0,
        maxChannels: 0,
        blePin: 0,
        firmwareBuild: "",
        model: "",
        version: "",
      },
    };
  }
  return {
    type: "DEVICE_INFO",
    info: {
      firmwareVersion,
      // Reported in units of two.
      maxContacts: r.u8() * 2,
      maxChannels: r.u8(),
      blePin: r.u32le(),
      firmwareBuild: r.cString(12),
      model: r.cString(40),
      version: r.cString(20),
    },
  };
}

function decodeContactMessage(p: Uint8Array, v3: boolean): MeshEvent {
  need(
    p,
    v3 ? PacketSize.CONTACT_MESSAGE_V3_MIN : PacketSize.CONTACT_MESSAGE_V1_MIN,
    "ContactMessage"
  );
  const r = new ByteReader(p);
  let snr: number | undefined;
  if (v3) {
    snr = snrOf(r.i8());
    r.skip(2);
  }
  const senderPrefix = r.bytes(PacketSize.KEY_PREFIX) as PublicKeyPrefix;
  const pathLength = r.u8();
  const textType = r.u8();
  const senderTimestamp = r.u32le() as UnixTimestamp;
  const signature =
    textType === TextType.SIGNED && r.remaining >= 4 ? r.bytes(4) : undefined;
  return {
    type: "CONTACT_MESSAGE",
    message: {
      senderPrefix,
      pathLength,
      textType,
      senderTimestamp,
      ...(signature ? { signature } : {}),
      text: decodeUtf8(r.rest()),
      ...(snr !== undefined ? { snr } : {}),
    },
  };
}

function decodeChannelMessage(p: Uint8Array, v3: boolean): MeshEvent {
  need(
    p,
    v3 ? PacketSize.CHANNEL_MESSAGE_V3_MIN : PacketSize.CHANNEL_MESSAGE_V1_MIN,
    "ChannelMessage"
  );
  const r = new ByteReader(p);
  let snr: number | undefined;
  if (v3) {
    snr = snrOf(r.i8());
    r.skip(2);
  }
  const channelIndex = r.u8();
  const pathLength = r.u8();
  const textType = r.u8();
  const senderTimestamp = r.u32le() as UnixTimestamp;
  return {
    type: "CHANNEL_MESSAGE",
    message: {
      channelIndex,
      pathLength,
      textType,
      senderTimestamp,
      text: decodeUtf8(r.rest()),
      ...(snr !== undefined ? { snr } : {}),
    },
  };
}

function decodeBattery(p: Uint8Array): MeshEvent {
  need(p, PacketSize.BATTERY_MIN, "Battery");
  const r = new ByteReader(p);
  const level = r.u16le();
  if (p.length < PacketSize.BATTERY_EXTENDED) {
    return { type: "BATTERY", battery: { level } };
  }
  return {
    type: "BATTERY",
    battery: { level, usedStorageKb: r.u32le(), totalStorageKb: r.u32le() },
  };
}

function decodeStats(p: Uint8Array): MeshEvent {
  need(p, 1, "Stats");
  const r = new ByteReader(p);
  const kind = r.u8();
  const body = p.subarray(1);
  switch (kind) {
    case StatsKind.CORE:
      need(body, PacketSize.CORE_STATS_MIN, "CoreStats");
      return {
        type: "CORE_STATS",
        stats: {
          batteryMv: r.u16le(),
          uptimeSeconds: r.u32le(),
          errors: r.u16le(),
          queueLength: r.u8(),
        },
      };
    case StatsKind.RADIO:
      need(body, PacketSize.RADIO_STATS_MIN, "RadioStats");
      return {
        type: "RADIO_STATS",
        stats: {
          noiseFloor: r.i16le(),
          lastRssi: r.i8(),
          lastSnr: snrOf(r.i8()),
          txAirtimeSeconds: r.u32le(),
          rxAirtimeSeconds: r.u32le(),
        },
      };
    case StatsKind.PACKETS:
      need(body, PacketSize.PACKET_STATS_MIN, "PacketStats");
      return {
        type: "PACKET_STATS",
        stats: {
          received: r.u32le(),
          sent: r.u32le(),
          floodTx: r.u32le(),
          directTx: r.u32le(),
          floodRx: r.u32le(),
          directRx: r.u32le(),
        },
      };
    default:
      throw new FrameTooShort(`Unknown stats kind ${kind}`);
  }
}

function decodeCustomVars(p: Uint8Array): MeshEvent {
  const vars: Record<string, string> = {};
  for (const pair of decodeUtf8(p).split(",")) {
    const split = pair.indexOf(":");
    if (split > 0) {
      vars[pair.slice(0, split)] = pair.slice(split + 1);
    }
  }
  return { type: "CUSTOM_VARS", vars };
}

function decodeResponse(code: number, p: Uint8Array): MeshEvent | undefined {
  switch (code) {
    case ResponseCode.OK:
      return p.length >= 4
        ? { type: "OK", value: new ByteReader(p).u32le() }
        : { type: "OK" };
    case ResponseCode.ERROR: {
      const errorCode = p[0];
      return errorCode === undefined ? { type: "ERROR" } : { type: "ERROR", code: errorCode };
    }
    case ResponseCode.CONTACT_START:
      need(p, PacketSize.CONTACTS_START_MIN, "ContactsStart");
      return { type: "CONTACTS_START", count: new ByteReader(p).u32le() };
    case ResponseCode.CONTACT:
      need(p, PacketSize.CONTACT, "Contact");
      return { type: "CONTACT", contact: readContact(new ByteReader(p)) };
    case ResponseCode.CONTACT_END:
      return {
        type: "CONTACTS_END",
        lastModified: (p.length >= 4 ? new ByteReader(p).u32le() : 0) as UnixTimestamp,
      };
    case ResponseCode.SELF_INFO:
      return decodeSelfInfo(p);
    case ResponseCode.MESSAGE_SENT: {
      need(p, PacketSize.MESSAGE_SENT_MIN, "MessageSent");
      const r = new ByteReader(p);
      return {
        type: "MESSAGE_SENT",
        info: { routeType: r.u8(), expectedAck: r.bytes(4), suggestedTimeoutMs: r.u32le() },
      };
    }
    case ResponseCode.CONTACT_MESSAGE:
      return decodeContactMessage(p, false);
    case ResponseCode.CONTACT_MESSAGE_V3:
      return decodeContactMessage(p, true);
    case ResponseCode.CHANNEL_MESSAGE:
      return decodeChannelMessage(p, false);
    case ResponseCode.CHANNEL_MESSAGE_V3:
      return decodeChannelMessage(p, true);
    case ResponseCode.CURRENT_TIME:
      need(p, 4, "CurrentTime");
      return { type: "CURRENT_TIME", time: new ByteReader(p).u32le() as UnixTimestamp };
    case ResponseCode.NO_MORE_MESSAGES:
      return { type: "NO_MORE_MESSAGES" };
    case ResponseCode.CONTACT_URI:
      return { type: "CONTACT_URI", uri: `meshcore://${toHex(p)}` };
    case ResponseCode.BATTERY:
      return decodeBattery(p);
    case ResponseCode.DEVICE_INFO:
      return decodeDeviceInfo(p);
    case ResponseCode.PRIVATE_KEY:
      need(p, PacketSize.PRIVATE_KEY, "PrivateKey");
      return { type: "PRIVATE_KEY", key: p.slice(0, PacketSize.PRIVATE_KEY) };
    case ResponseCode.DISABLED:
      return { type: "DISABLED", reason: decodeCString(p) || "Feature disabled" };
    case ResponseCode.CHANNEL_INFO: {
      need(p, PacketSize.CHANNEL_INFO_MIN, "ChannelInfo");
      const r = new ByteReader(p);
      return {
        type: "CHANNEL_INFO",
        channel: {
          index: r.u8(),
          name: r.cString(PacketSize.NAME_FIELD),
          secret: r.bytes(PacketSize.SECRET) as ChannelSecret,
        },
      };
    }
    case ResponseCode.SIGN_START:
      need(p, PacketSize.SIGN_START_MIN, "SignStart");
      return { type: "SIGN_START", maxLength: new ByteReader(p).skip(1).u32le() };
    case ResponseCode.SIGNATURE:
      return { type: "SIGNATURE", signature: p.slice() };
    case ResponseCode.CUSTOM_VARS:
      return decodeCustomVars(p);
    case ResponseCode.STATS:
      return decodeStats(p);
    default:
      return undefined;
  }
}

// ─── Pushes ─────────────────────────────────────────────────────────

function decodeTrace(p: Uint8Array): MeshEvent {
  need(p, PacketSize.TRACE_DATA_MIN, "TraceData");
  const r = new ByteReader(p).skip(1);
  const pathLength = r.u8();
  const flags = r.u8();
  const tag = r.u32le();
  const authCode = r.u32le();
  const path: TraceHop[] = [];

  if (pathLength > 0 && r.remaining >= pathLength * 2 + 1) {
    const hashes = r.bytes(pathLength);
    const snrs = new ByteReader(r.bytes(pathLength));
    for (const hash of hashes) {
      path.push({ hash: hash === 0xff ? null : hash, snr: snrOf(snrs.i8()) });
    }
    path.push({ hash: null, snr: snrOf(r.i8()) });
  }

  return { type: "TRACE_DATA", trace: { tag, authCode, flags, pathLength, path } };
}

function decodePathDiscovery(p: Uint8Array): MeshEvent {
  need(p, PacketSize.PATH_DISCOVERY_MIN, "PathDiscoveryResponse");
  const r = new ByteReader(p);
  const senderPrefix = r.bytes(PacketSize.KEY_PREFIX) as PublicKeyPrefix;
  const readPath = (): Uint8Array => {
    if (r.remaining < 1) return new Uint8Array(0);
    const length = r.u8();
    return length > 0 && r.remaining >= length ? r.bytes(length) : new Uint8Array(0);
  };
  const outPath = readPath();
  const inPath = readPath();
  return { type: "PATH_DISCOVERY_RESPONSE", path: { senderPrefix, outPath, inPath } };
}

function decodeControlData(p: Uint8Array): MeshEvent {
  need(p, PacketSize.CONTROL_DATA_MIN, "ControlData");
  const r = new ByteReader(p);
  const snr = snrOf(r.i8());
  const rssi = r.i8();
  const pathLength = r.u8();
  const payloadType = r.u8();
  const payload = r.rest();

  if ((payloadType & 0xf0) === ControlType.NODE_DISCOVER_RESPONSE && payload.length >= 5) {
    const inner = new ByteReader(payload);
    return {
      type: "DISCOVER_RESPONSE",
      response: {
        nodeType: payloadType & 0x0f,
        snrIn: snrOf(inner.i8()),
        snr,
        rssi,
        pathLength,
        tag: inner.bytes(4),
        publicKey: inner.rest(),
      },
    };
  }
  return { type: "CONTROL_DATA", control: { snr, rssi, pathLength, payloadType, payload } };
}

function decodePush(code: number, p: Uint8Array): MeshEvent | undefined {
  switch (code) {
    case PushCode.ADVERTISEMENT:
      need(p, PacketSize.PUBLIC_KEY, "Advertisement");
      return { type: "ADVERTISEMENT", publicKey: p.slice(0, PacketSize.PUBLIC_KEY) as PublicKey };
    case PushCode.NEW_ADVERTISEMENT:
      if (p.length >= PacketSize.CONTACT) {
        return { type: "NEW_CONTACT", contact: readContact(new ByteReader(p)) };
      }
      need(p, PacketSize.PUBLIC_KEY, "NewAdvertisement");
      return { type: "ADVERTISEMENT", publicKey: p.slice(0, PacketSize.PUBLIC_KEY) as PublicKey };
    case PushCode.PATH_UPDATE:
      need(p, PacketSize.PUBLIC_KEY, "PathUpdate");
      return { type: "PATH_UPDATE", publicKey: p.slice(0, PacketSize.PUBLIC_KEY) as PublicKey };
    case PushCode.ACK:
      need(p, PacketSize.ACK_MIN, "Ack");
      return { type: "ACK", code: p.slice(0, 4) };
    case PushCode.MESSAGES_WAITING:
      return { type: "MESSAGES_WAITING" };
    case PushCode.RAW_DATA: {
      need(p, PacketSize.RAW_DATA_MIN, "RawData");
      const r = new ByteReader(p);
      return { type: "RAW_DATA", frame: { snr: snrOf(r.i8()), rssi: r.i8(), payload: r.rest() } };
    }
    case PushCode.LOGIN_SUCCESS: {
      if (p.length < PacketSize.LOGIN_SUCCESS_MIN) {
        return {
          type: "LOGIN_SUCCESS",
          login: { permissions: 0, isAdmin: false, senderPrefix: new Uint8Array(0) as PublicKeyPrefix },
        };
      }
      const r = new ByteReader(p);
      const permissions = r.u8();
      return {
        type: "LOGIN_SUCCESS",
        login: {
          permissions,
          isAdmin: (permissions & 0x01) !== 0,
          senderPrefix: r.bytes(PacketSize.KEY_PREFIX) as PublicKeyPrefix,
        },
      };
    }
    case PushCode.LOGIN_FAILED:
      return p.length >= PacketSize.LOGIN_SUCCESS_MIN
        ? { type: "LOGIN_FAILED", senderPrefix: p.slice(1, 7) as PublicKeyPrefix }
        : { type: "LOGIN_FAILED" };
    case PushCode.STATUS_RESPONSE: {
      need(p, PacketSize.STATUS_RESPONSE_MIN, "StatusResponse");
      const r = new ByteReader(p).skip(1);
      const prefix = r.bytes(PacketSize.KEY_PREFIX) as PublicKeyPrefix;
      return { type: "STATUS_RESPONSE", status: readStatusFields(r, prefix) };
    }
    case PushCode.LOG_DATA: {
      if (p.length < 2) return { type: "LOG_DATA", payload: p.slice() };
      const r = new ByteReader(p);
      return { type: "LOG_DATA", snr: snrOf(r.i8()), rssi: r.i8(), payload: r.rest() };
    }
    case PushCode.TRACE_DATA:
      return decodeTrace(p);
    case PushCode.TELEMETRY_RESPONSE: {
      need(p, PacketSize.KEY_PREFIX, "TelemetryResponse");
      const r = new ByteReader(p);
      const senderPrefix = r.bytes(PacketSize.KEY_PREFIX) as PublicKeyPrefix;
      const tag = r.remaining >= 4 ? r.bytes(4) : undefined;
      return {
        type: "TELEMETRY_RESPONSE",
        telemetry: { senderPrefix, ...(tag ? { tag } : {}), lpp: r.rest() },
      };
    }
    case PushCode.BINARY_RESPONSE: {
      need(p, 4, "BinaryResponse");
      const r = new ByteReader(p);
      return { type: "BINARY_RESPONSE", tag: r.bytes(4), data: r.rest() };
    }
    case PushCode.PATH_DISCOVERY_RESPONSE:
      return decodePathDiscovery(p);
    case PushCode.CONTROL_DATA:
      return decodeControlData(p);
    default:
      return undefined;
  }
}

// ─── Entry Point ────────────────────────────────────────────────────

/**
 * Decodes one complete frame.
 *
 * @example
 * ```ts
 * const frame = decodeFrame(bytes);
 * if (frame.kind === "push" && frame.event.type === "ACK") { ... }
 * ```
 */
export function decodeFrame(frame: Uint8Array): DecodedFrame {
  const code = frame[0];
  if (code === undefined) {
    return { kind: "unrecognized", data: frame, reason: "Empty frame" };
  }
  const payload = frame.subarray(1);
  const isPush = code >= PUSH_CODE_MIN;

  try {
    const event = isPush ? decodePush(code, payload) : decodeResponse(code, payload);
    if (!event) {
      return {
        kind: "unrecognized",
        code,
        data: frame,
        reason: `Unknown ${isPush ? "push" : "response"} code 0x${code.toString(16).padStart(2, "0")}`,
      };
    }
    return { kind: isPush ? "push" : "response", code, event };
  } catch (error) {
    if (error instanceof FrameTooShort || error instanceof RangeError) {
      return { kind: "unrecognized", code, data: frame, reason: error.message };
    }
    throw error;
  }
}
