import { ByteWriter, encodeUtf8, toHex } from "../src/codec/bytes.js";
import { PushCode, ResponseCode } from "../src/codec/codes.js";
import type {
  ContactId,
  PublicKey,
  UnixTimestamp,
} from "../src/types/branded.js";
import { ContactType } from "../src/types/contact.js";
import type { Contact } from "../src/types/contact.js";

/** 32-byte key whose every byte is `seed`. */
export function testKey(seed: number): PublicKey {
  return new Uint8Array(32).fill(seed) as PublicKey;
}

export function createTestContact(seed: number, name = `node-${seed}`): Contact {
  const publicKey = testKey(seed);
  return {
    id: toHex(publicKey) as ContactId,
    publicKey,
    type: ContactType.CHAT,
    flags: 0,
    outPathLength: -1,
    outPath: new Uint8Array(0),
    name,
    lastAdvertisement: 1700000000 as UnixTimestamp,
    lastModified: 1700000100 as UnixTimestamp,
  };
}

/** The 147-byte on-wire contact record. */
export function contactRecord(contact: Contact): Uint8Array {
  return new ByteWriter()
    .bytes(contact.publicKey)
    .u8(contact.type)
    .u8(contact.flags)
    .u8(contact.outPathLength)
    .fixed(contact.outPath, 64)
    .fixed(encodeUtf8(contact.name), 32)
    .u32le(contact.lastAdvertisement)
    .i32le(Math.trunc((contact.location?.latitude ?? 0) * 1_000_000))
    .i32le(Math.trunc((contact.location?.longitude ?? 0) * 1_000_000))
    .u32le(contact.lastModified)
    .toBytes();
}

export function frame(code: number, ...parts: (Uint8Array | number[])[]): Uint8Array {
  const w = new ByteWriter().u8(code);
  for (const part of parts) w.bytes(Uint8Array.from(part));
  return w.toBytes();
}

export function selfInfoFrame(name = "base", publicKey: Uint8Array = testKey(0xaa)): Uint8Array {
  return new ByteWriter()
    .u8(ResponseCode.SELF_INFO)
    .u8(1) // advertisement type
    .u8(20) // tx power
    .u8(22) // max tx power
    .bytes(publicKey)
    .i32le(51_500_000)
    .i32le(-120_000)
    .u8(0) // multi acks
    .u8(1) // location policy
    .u8(0b0010_0101) // telemetry modes
    .u8(1) // manual add contacts
    .u32le(869_525)
    .u32le(250_000)
    .u8(11)
    .u8(5)
    .utf8(name)
    .toBytes();
}

export const okFrame = (): Uint8Array => frame(ResponseCode.OK);

export const errorFrame = (code: number): Uint8Array => frame(ResponseCode.ERROR, [code]);

export function messageSentFrame(ack: number[], suggestedTimeoutMs: number, routeType = 0): Uint8Array {
  return new ByteWriter()
    .u8(ResponseCode.MESSAGE_SENT)
    .u8(routeType)
    .bytes(Uint8Array.from(ack))
    .u32le(suggestedTimeoutMs)
    .toBytes();
}

export const ackFrame = (ack: number[]): Uint8Array => frame(PushCode.ACK, ack);

export function contactMessageFrame(
  senderPrefix: Uint8Array,
  timestamp: number,
  text: string
): Uint8Array {
  return new ByteWriter()
    .u8(ResponseCode.CONTACT_MESSAGE)
    .bytes(senderPrefix.subarray(0, 6))
    .u8(0) // path length
    .u8(0) // plain text
    .u32le(timestamp)
    .utf8(text)
    .toBytes();
}

export function channelMessageFrame(channel: number, timestamp: number, text: string): Uint8Array {
  return new ByteWriter()
    .u8(ResponseCode.CHANNEL_MESSAGE)
    .u8(channel)
    .u8(0)
    .u8(0)
    .u32le(timestamp)
    .utf8(text)
    .toBytes();
}
