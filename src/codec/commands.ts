/**
 * @module codec/commands
 * @description Outbound command encoder.
 *
 * Byte 0 is the command code. Integers are little-endian unless noted.
 * Keys are cut to their wire width (32 bytes for full keys, 6 for
 * destination prefixes, 16 for secrets) rather than rejected.
 */

import { ByteWriter, encodeUtf8 } from "./bytes.js";
import { CommandCode, ControlType, PacketSize, StatsKind } from "./codes.js";
import type { BinaryRequestKind } from "./codes.js";
import type {
  ChannelSecret,
  FloodScopeKey,
  UnixTimestamp,
} from "../types/branded.js";
import type { Contact } from "../types/contact.js";
import type { OtherParams, RadioSettings } from "../types/device.js";

export type StatsSelector = "core" | "radio" | "packets";

/** Every command the session can send, discriminated on `kind`. */
export type MeshCommand =
  // Device
  | { readonly kind: "appStart"; readonly clientId: string }
  | { readonly kind: "deviceQuery" }
  | { readonly kind: "getBattery" }
  | { readonly kind: "getTime" }
  | { readonly kind: "setTime"; readonly time: UnixTimestamp }
  | { readonly kind: "setName"; readonly name: string }
  | { readonly kind: "setCoordinates"; readonly latitude: number; readonly longitude: number }
  | { readonly kind: "setTxPower"; readonly power: number }
  | { readonly kind: "setRadio"; readonly radio: RadioSettings }
  | { readonly kind: "setTuning"; readonly rxDelay: number; readonly airtimeFactor: number }
  | { readonly kind: "setOtherParams"; readonly params: OtherParams }
  | { readonly kind: "sendAdvertisement"; readonly flood: boolean }
  | { readonly kind: "reboot" }
  | { readonly kind: "factoryReset" }
  | { readonly kind: "getStats"; readonly stats: StatsSelector }
  | { readonly kind: "getCustomVars" }
  | { readonly kind: "setCustomVar"; readonly key: string; readonly value: string }
  | { readonly kind: "getSelfTelemetry"; readonly destination?: Uint8Array }
  | { readonly kind: "setDevicePin"; readonly pin: number }
  | { readonly kind: "setFloodScope"; readonly key: FloodScopeKey }
  // Keys and signing
  | { readonly kind: "exportPrivateKey" }
  | { readonly kind: "importPrivateKey"; readonly key: Uint8Array }
  | { readonly kind: "signStart" }
  | { readonly kind: "signData"; readonly chunk: Uint8Array }
  | { readonly kind: "signFinish" }
  // Contacts
  | { readonly kind: "getContacts"; readonly since?: UnixTimestamp }
  | { readonly kind: "resetPath"; readonly publicKey: Uint8Array }
  | { readonly kind: "removeContact"; readonly publicKey: Uint8Array }
  | { readonly kind: "shareContact"; readonly publicKey: Uint8Array }
  | { readonly kind: "exportContact"; readonly publicKey?: Uint8Array }
  | { readonly kind: "importContact"; readonly card: Uint8Array }
  /** Writes the whole record; the radio adds or overwrites by key. */
  | { readonly kind: "addContact"; readonly contact: Contact }
  | {
      readonly kind: "updateContact";
      readonly publicKey: Uint8Array;
      readonly flags?: number;
      readonly path?: { readonly length: number; readonly bytes: Uint8Array };
    }
  // Messaging
  | { readonly kind: "getMessage" }
  | {
      readonly kind: "sendMessage";
      readonly destination: Uint8Array;
      readonly text: string;
      readonly timestamp: UnixTimestamp;
      readonly attempt?: number;
    }
  | {
      readonly kind: "sendCommand";
      readonly destination: Uint8Array;
      readonly command: string;
      readonly timestamp: UnixTimestamp;
    }
  | {
      readonly kind: "sendChannelMessage";
      readonly channel: number;
      readonly text: string;
      readonly timestamp: UnixTimestamp;
    }
  // Channels
  | { readonly kind: "getChannel"; readonly index: number }
  | {
      readonly kind: "setChannel";
      readonly index: number;
      readonly name: string;
      readonly secret: ChannelSecret;
    }
  // Remote nodes
  | { readonly kind: "sendLogin"; readonly publicKey: Uint8Array; readonly password: string }
  | { readonly kind: "sendLogout"; readonly publicKey: Uint8Array }
  | { readonly kind: "sendStatusRequest"; readonly publicKey: Uint8Array }
  | {
      readonly kind: "binaryRequest";
      readonly publicKey: Uint8Array;
      readonly request: BinaryRequestKind;
      readonly payload?: Uint8Array;
    }
  | { readonly kind: "pathDiscovery"; readonly publicKey: Uint8Array }
  | {
      readonly kind: "sendTrace";
      readonly tag: number;
      readonly authCode: number;
      readonly flags: number;
      readonly path?: Uint8Array;
    }
  | { readonly kind: "sendControlData"; readonly controlType: number; readonly payload: Uint8Array }
  | {
      readonly kind: "nodeDiscoverRequest";
      readonly filter: number;
      readonly tag: number;
      readonly prefixOnly?: boolean;
      readonly since?: number;
    };

export type MeshCommandKind = MeshCommand["kind"];

const STATS_SELECTOR: Record<StatsSelector, number> = {
  core: StatsKind.CORE,
  radio: StatsKind.RADIO,
  packets: StatsKind.PACKETS,
};

/** Up to `width` leading bytes, never padded. */
const head = (data: Uint8Array, width: number): Uint8Array =>
  data.subarray(0, width);

/**
 * Encodes one command into a frame.
 *
 * @example
 * ```ts
 * encodeCommand({ kind: "getChannel", index: 2 }); // Uint8Array [0x1f, 0x02]
 * ```
 */
export function encodeCommand(command: MeshCommand): Uint8Array {
  const w = new ByteWriter();
  const key = (publicKey: Uint8Array) => w.bytes(head(publicKey, PacketSize.PUBLIC_KEY));

  switch (command.kind) {
    case "appStart":
      // Six reserved spaces, then at most five bytes of client id.
      w.u8(CommandCode.APP_START).u8(0x03).bytes(new Uint8Array(6).fill(0x20));
      w.bytes(head(encodeUtf8(Array.from(command.clientId).slice(0, 5).join("")), 5));
      break;
    case "deviceQuery":
      w.u8(CommandCode.DEVICE_QUERY).u8(0x03);
      break;
    case "getBattery":
      w.u8(CommandCode.GET_BATTERY);
      break;
    case "getTime":
      w.u8(CommandCode.GET_TIME);
      break;
    case "setTime":
      w.u8(CommandCode.SET_TIME).u32le(command.time);
      break;
    case "setName":
      w.u8(CommandCode.SET_NAME).utf8(command.name);
      break;
    case "setCoordinates":
      w.u8(CommandCode.SET_COORDINATES)
        .i32le(Math.trunc(command.latitude * 1_000_000))
        .i32le(Math.trunc(command.longitude * 1_000_000))
        .u32le(0);
      break;
    case "setTxPower":
      w.u8(CommandCode.SET_TX_POWER).u32le(command.power);
      break;
    case "setRadio":
      w.u8(CommandCode.SET_RADIO)
        .u32le(Math.round(command.radio.frequency * 1000))
        .u32le(Math.round(command.radio.bandwidth * 1000))
        .u8(command.radio.spreadingFactor)
        .u8(command.radio.codingRate);
      break;
    case "setTuning":
      w.u8(CommandCode.SET_TUNING).u32le(command.rxDelay).u32le(command.airtimeFactor).u16le(0);
      break;
    case "setOtherParams": {
      const p = command.params;
      const telemetryMode =
        ((p.telemetryModeEnvironment & 0b11) << 4) |
        ((p.telemetryModeLocation & 0b11) << 2) |
        (p.telemetryModeBase & 0b11);
      w.u8(CommandCode.SET_OTHER_PARAMS)
        .u8(p.manualAddContacts ? 1 : 0)
        .u8(telemetryMode)
        .u8(p.advertisementLocationPolicy)
        .u8(p.multiAcks);
      break;
    }
    case "sendAdvertisement":
      w.u8(CommandCode.SEND_ADVERTISEMENT);
      if (command.flood) w.u8(0x01);
      break;
    case "reboot":
      w.u8(CommandCode.REBOOT).utf8("reboot");
      break;
    case "factoryReset":
      w.u8(CommandCode.FACTORY_RESET);
      break;
    case "getStats":
      w.u8(CommandCode.GET_STATS).u8(STATS_SELECTOR[command.stats]);
      break;
    case "getCustomVars":
      w.u8(CommandCode.GET_CUSTOM_VARS);
      break;
    case "setCustomVar":
      w.u8(CommandCode.SET_CUSTOM_VAR).utf8(`${command.key}:${command.value}`);
      break;
    case "getSelfTelemetry":
      w.u8(CommandCode.GET_SELF_TELEMETRY).u8(0).u8(0).u8(0);
      if (command.destination) key(command.destination);
      break;
    case "setDevicePin":
      w.u8(CommandCode.SET_DEVICE_PIN).u32le(command.pin);
      break;
    case "setFloodScope":
      w.u8(CommandCode.SET_FLOOD_SCOPE).u8(0x00).fixed(command.key, PacketSize.SECRET);
      break;

    case "exportPrivateKey":
      w.u8(CommandCode.EXPORT_PRIVATE_KEY);
      break;
    case "importPrivateKey":
      w.u8(CommandCode.IMPORT_PRIVATE_KEY).bytes(command.key);
      break;
    case "signStart":
      w.u8(CommandCode.SIGN_START);
      break;
    case "signData":
      w.u8(CommandCode.SIGN_DATA).bytes(command.chunk);
      break;
    case "signFinish":
      w.u8(CommandCode.SIGN_FINISH);
      break;

    case "getContacts":
      w.u8(CommandCode.GET_CONTACTS);
      if (command.since !== undefined) w.u32le(command.since);
      break;
    case "resetPath":
      w.u8(CommandCode.RESET_PATH);
      key(command.publicKey);
      break;
    case "removeContact":
      w.u8(CommandCode.REMOVE_CONTACT);
      key(command.publicKey);
      break;
    case "shareContact":
      w.u8(CommandCode.SHARE_CONTACT);
      key(command.publicKey);
      break;
    case "exportContact":
      w.u8(CommandCode.EXPORT_CONTACT);
      if (command.publicKey) key(command.publicKey);
      break;
    case "importContact":
      w.u8(CommandCode.IMPORT_CONTACT).bytes(command.card);
      break;
    case "addContact": {
      const c = command.contact;
      w.u8(CommandCode.UPDATE_CONTACT);
      key(c.publicKey)
        .u8(c.type)
        .u8(c.flags)
        .u8(c.outPathLength)
        .fixed(c.outPath, PacketSize.PATH_MAX)
        .fixed(encodeUtf8(c.name), PacketSize.NAME_FIELD)
        .u32le(c.lastAdvertisement)
        .i32le(Math.trunc((c.location?.latitude ?? 0) * 1_000_000))
        .i32le(Math.trunc((c.location?.longitude ?? 0) * 1_000_000));
      break;
    }
    case "updateContact":
      w.u8(CommandCode.UPDATE_CONTACT);
      key(command.publicKey);
      if (command.flags !== undefined) w.u8(command.flags);
      if (command.path) {
        w.u8(command.path.length).bytes(head(command.path.bytes, PacketSize.PATH_MAX));
      }
      break;

    case "getMessage":
      w.u8(CommandCode.GET_MESSAGE);
      break;
    case "sendMessage":
      w.u8(CommandCode.SEND_MESSAGE)
        .u8(0x00)
        .u8(command.attempt ?? 0)
        .u32le(command.timestamp)
        .bytes(head(command.destination, PacketSize.KEY_PREFIX))
        .utf8(command.text);
      break;
    case "sendCommand":
      w.u8(CommandCode.SEND_MESSAGE)
        .u8(0x01)
        .u8(0x00)
        .u32le(command.timestamp)
        .bytes(head(command.destination, PacketSize.KEY_PREFIX))
        .utf8(command.command);
      break;
    case "sendChannelMessage":
      w.u8(CommandCode.SEND_CHANNEL_MESSAGE)
        .u8(0x00)
        .u8(command.channel)
        .u32le(command.timestamp)
        .utf8(command.text);
      break;

    case "getChannel":
      w.u8(CommandCode.GET_CHANNEL).u8(command.index);
      break;
    case "setChannel":
      w.u8(CommandCode.SET_CHANNEL)
        .u8(command.index)
        .fixed(encodeUtf8(command.name), PacketSize.NAME_FIELD)
        .fixed(command.secret, PacketSize.SECRET);
      break;

    case "sendLogin":
      w.u8(CommandCode.SEND_LOGIN);
      key(command.publicKey).utf8(command.password);
      break;
    case "sendLogout":
      w.u8(CommandCode.SEND_LOGOUT);
      key(command.publicKey);
      break;
    case "sendStatusRequest":
      w.u8(CommandCode.SEND_STATUS_REQUEST);
      key(command.publicKey);
      break;
    case "binaryRequest":
      w.u8(CommandCode.BINARY_REQUEST);
      key(command.publicKey).u8(command.request);
      if (command.payload) w.bytes(command.payload);
      break;
    case "pathDiscovery":
      w.u8(CommandCode.PATH_DISCOVERY).u8(0x00);
      key(command.publicKey);
      break;
    case "sendTrace":
      w.u8(CommandCode.SEND_TRACE)
        .u32le(command.tag)
        .u32le(command.authCode)
        .u8(command.flags);
      if (command.path) w.bytes(command.path);
      break;
    case "sendControlData":
      w.u8(CommandCode.SEND_CONTROL_DATA).u8(command.controlType).bytes(command.payload);
      break;
    case "nodeDiscoverRequest":
      w.u8(CommandCode.SEND_CONTROL_DATA)
        .u8(ControlType.NODE_DISCOVER_REQUEST | ((command.prefixOnly ?? true) ? 1 : 0))
        .u8(command.filter)
        .u32le(command.tag);
      if (command.since !== undefined) w.u32le(command.since);
      break;
  }

  return w.toBytes();
}
