import { describe, it, expect } from "vitest";
import {
  ByteReader,
  ByteWriter,
  CommandCode,
  FrameAccumulator,
  PacketSize,
  PushCode,
  ResponseCode,
  decodeCString,
  decodeFrame,
  encodeCommand,
  frameOutbound,
  fromHex,
  parseAcl,
  parseMma,
  parseNeighbours,
  parseStatusFields,
  toHex,
  tryDecodeUtf8,
} from "../src/codec/index.js";
import type {
  ChannelSecret,
  PublicKeyPrefix,
  UnixTimestamp,
} from "../src/types/branded.js";
import {
  channelMessageFrame,
  contactRecord,
  createTestContact,
  errorFrame,
  frame,
  messageSentFrame,
  selfInfoFrame,
  testKey,
} from "./fixtures.js";

const view = (bytes: Uint8Array) =>
  new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);

describe("Frame Codec", () => {
  describe("bytes", () => {
    it("should read little- and big-endian fields independently", () => {
      const r = new ByteReader(Uint8Array.from([0x01, 0x02, 0x01, 0x02]));
      expect(r.u16le()).toBe(0x0201);
      expect(r.u16be()).toBe(0x0102);
      expect(r.remaining).toBe(0);
    });

    it("should sign-extend 24-bit values", () => {
      expect(new ByteReader(Uint8Array.from([0xff, 0xff, 0xfe])).i24be()).toBe(-2);
      expect(new ByteReader(Uint8Array.from([0x00, 0x01, 0x00])).i24be()).toBe(256);
    });

    it("should throw RangeError on reads past the end", () => {
      const r = new ByteReader(Uint8Array.from([1, 2]));
      expect(() => r.bytes(3)).toThrow(RangeError);
      expect(() => r.u32le()).toThrow(RangeError);
    });

    it("should truncate or zero-pad fixed fields", () => {
      const w = new ByteWriter()
        .fixed(Uint8Array.from([1, 2, 3]), 2)
        .fixed(Uint8Array.from([9]), 3);
      expect(Array.from(w.toBytes())).toEqual([1, 2, 9, 0, 0]);
    });

    it("should decode NUL-terminated strings and strip control padding", () => {
      expect(decodeCString(Uint8Array.from([0x41, 0x42, 0x00, 0x43]))).toBe("AB");
      expect(decodeCString(Uint8Array.from([0x0a, 0x41, 0x0d]))).toBe("A");
    });

    it("should round-trip hex and reject malformed input", () => {
      expect(toHex(Uint8Array.from([0x00, 0xab, 0x10]))).toBe("00ab10");
      expect(Array.from(fromHex("00AB10") ?? [])).toEqual([0x00, 0xab, 0x10]);
      expect(fromHex("abc")).toBeNull();
      expect(fromHex("zz")).toBeNull();
    });

    it("should return null for invalid UTF-8 in strict mode", () => {
      expect(tryDecodeUtf8(Uint8Array.from([0xc3, 0x28]))).toBeNull();
      expect(tryDecodeUtf8(Uint8Array.from([0x68, 0x69]))).toBe("hi");
    });
  });

  describe("encodeCommand()", () => {
    it("should pad the app-start client id after six spaces", () => {
      const bytes = encodeCommand({ kind: "appStart", clientId: "mcore-client" });
      expect(Array.from(bytes)).toEqual([
        CommandCode.APP_START, 0x03,
        0x20, 0x20, 0x20, 0x20, 0x20, 0x20,
        0x6d, 0x63, 0x6f, 0x72, 0x65,
      ]);
    });

    it("should encode channel lookups as two bytes", () => {
      expect(Array.from(encodeCommand({ kind: "getChannel", index: 2 }))).toEqual([0x1f, 0x02]);
    });

    it("should encode time as little-endian seconds", () => {
      const bytes = encodeCommand({ kind: "setTime", time: 0x01020304 as UnixTimestamp });
      expect(Array.from(bytes)).toEqual([CommandCode.SET_TIME, 0x04, 0x03, 0x02, 0x01]);
    });

    it("should scale coordinates to micro-degrees", () => {
      const bytes = encodeCommand({ kind: "setCoordinates", latitude: 51.5, longitude: -2.25 });
      expect(bytes.length).toBe(13);
      expect(view(bytes).getInt32(1, true)).toBe(51_500_000);
      expect(view(bytes).getInt32(5, true)).toBe(-2_250_000);
    });

    it("should only append the flood byte for flooded adverts", () => {
      expect(Array.from(encodeCommand({ kind: "sendAdvertisement", flood: false }))).toEqual([0x07]);
      expect(Array.from(encodeCommand({ kind: "sendAdvertisement", flood: true }))).toEqual([0x07, 0x01]);
    });

    it("should address direct messages by a six-byte prefix", () => {
      const bytes = encodeCommand({
        kind: "sendMessage",
        destination: testKey(0x42),
        text: "hi",
        timestamp: 1 as UnixTimestamp,
      });
      expect(Array.from(bytes)).toEqual([
        CommandCode.SEND_MESSAGE, 0x00, 0x00,
        0x01, 0x00, 0x00, 0x00,
        0x42, 0x42, 0x42, 0x42, 0x42, 0x42,
        0x68, 0x69,
      ]);
    });

    it("should mark CLI commands with text type 1", () => {
      const bytes = encodeCommand({
        kind: "sendCommand",
        destination: testKey(0x42),
        command: "ver",
        timestamp: 0 as UnixTimestamp,
      });
      expect(bytes[1]).toBe(0x01);
    });

    it("should lay out channel settings in fixed fields", () => {
      const bytes = encodeCommand({
        kind: "setChannel",
        index: 3,
        name: "General",
        secret: new Uint8Array(16).fill(7) as ChannelSecret,
      });
      expect(bytes.length).toBe(1 + 1 + PacketSize.NAME_FIELD + PacketSize.SECRET);
      expect(bytes[1]).toBe(3);
      expect(bytes[9]).toBe(0);
      expect(bytes[34]).toBe(7);
    });

    it("should write a full contact record for addContact", () => {
      const contact = createTestContact(0x11, "alpha");
      const bytes = encodeCommand({ kind: "addContact", contact });
      expect(bytes.length).toBe(144);
      expect(bytes[0]).toBe(CommandCode.UPDATE_CONTACT);
      expect(bytes[33]).toBe(1);
      expect(bytes[35]).toBe(0xff);
      expect(bytes[100]).toBe(0x61);
      expect(view(bytes).getUint32(132, true)).toBe(1700000000);
    });

    it("should append the request kind after the key for binary requests", () => {
      const bytes = encodeCommand({
        kind: "binaryRequest",
        publicKey: testKey(1),
        request: 0x03,
        payload: Uint8Array.from([9]),
      });
      expect(bytes.length).toBe(35);
      expect(bytes[0]).toBe(CommandCode.BINARY_REQUEST);
      expect(bytes[33]).toBe(0x03);
      expect(bytes[34]).toBe(9);
    });

    it("should join custom variables as key:value", () => {
      const bytes = encodeCommand({ kind: "setCustomVar", key: "gps", value: "1" });
      expect(new TextDecoder().decode(bytes.subarray(1))).toBe("gps:1");
    });
  });

  describe("decodeFrame()", () => {
    it("should report empty frames as unrecognized", () => {
      const result = decodeFrame(new Uint8Array(0));
      expect(result).toMatchObject({ kind: "unrecognized", reason: "Empty frame" });
    });

    it("should report unknown codes with their hex value", () => {
      expect(decodeFrame(Uint8Array.from([0x7f]))).toMatchObject({
        kind: "unrecognized",
        code: 0x7f,
        reason: "Unknown response code 0x7f",
      });
      expect(decodeFrame(Uint8Array.from([0xfe]))).toMatchObject({
        reason: "Unknown push code 0xfe",
      });
    });

    it("should report short payloads instead of throwing", () => {
      const result = decodeFrame(frame(ResponseCode.CONTACT, new Array<number>(10).fill(0)));
      expect(result).toMatchObject({
        kind: "unrecognized",
        code: ResponseCode.CONTACT,
        reason: "Contact too short: 10 < 147",
      });
    });

    it("should decode OK with and without a value", () => {
      expect(decodeFrame(frame(ResponseCode.OK))).toEqual({
        kind: "response",
        code: 0,
        event: { type: "OK" },
      });
      expect(decodeFrame(frame(ResponseCode.OK, [5, 0, 0, 0]))).toMatchObject({
        event: { type: "OK", value: 5 },
      });
    });

    it("should carry the device error code", () => {
      expect(decodeFrame(errorFrame(3))).toMatchObject({ event: { type: "ERROR", code: 3 } });
    });

    it("should decode self info", () => {
      const result = decodeFrame(selfInfoFrame("base"));
      expect(result.kind).toBe("response");
      if (result.kind !== "response" || result.event.type !== "SELF_INFO") {
        throw new Error("expected SELF_INFO");
      }
      expect(result.event.info).toMatchObject({
        name: "base",
        txPower: 20,
        maxTxPower: 22,
        latitude: 51.5,
        longitude: -0.12,
        telemetryModeEnvironment: 2,
        telemetryModeLocation: 1,
        telemetryModeBase: 1,
        manualAddContacts: true,
        radioFrequency: 869.525,
        radioBandwidth: 250,
        radioSpreadingFactor: 11,
        radioCodingRate: 5,
      });
    });

    it("should decode a contact record", () => {
      const contact = {
        ...createTestContact(0x21, "relay"),
        location: { latitude: 40.5, longitude: -3.25 },
      };
      const result = decodeFrame(frame(ResponseCode.CONTACT, contactRecord(contact)));
      expect(result).toMatchObject({ kind: "response", event: { type: "CONTACT" } });
      if (result.kind === "response" && result.event.type === "CONTACT") {
        expect(result.event.contact).toEqual(contact);
      }
    });

    it("should decode a message-sent acknowledgement", () => {
      const result = decodeFrame(messageSentFrame([1, 2, 3, 4], 7000, 1));
      if (result.kind !== "response" || result.event.type !== "MESSAGE_SENT") {
        throw new Error("expected MESSAGE_SENT");
      }
      expect(result.event.info.routeType).toBe(1);
      expect(Array.from(result.event.info.expectedAck)).toEqual([1, 2, 3, 4]);
      expect(result.event.info.suggestedTimeoutMs).toBe(7000);
    });

    it("should decode channel messages", () => {
      const result = decodeFrame(channelMessageFrame(2, 100, "Ann: hello"));
      expect(result).toMatchObject({
        event: {
          type: "CHANNEL_MESSAGE",
          message: { channelIndex: 2, senderTimestamp: 100, text: "Ann: hello" },
        },
      });
    });

    it("should decode v3 contact messages with SNR", () => {
      const bytes = new ByteWriter()
        .u8(ResponseCode.CONTACT_MESSAGE_V3)
        .u8(-8) // snr * 4
        .u8(0).u8(0)
        .bytes(testKey(5).subarray(0, 6))
        .u8(1)
        .u8(0)
        .u32le(42)
        .utf8("yo")
        .toBytes();
      expect(decodeFrame(bytes)).toMatchObject({
        event: { type: "CONTACT_MESSAGE", message: { snr: -2, pathLength: 1, text: "yo" } },
      });
    });

    it("should parse custom variables", () => {
      const bytes = new ByteWriter().u8(ResponseCode.CUSTOM_VARS).utf8("gps:1,bad,ch:two").toBytes();
      expect(decodeFrame(bytes)).toMatchObject({
        event: { type: "CUSTOM_VARS", vars: { gps: "1", ch: "two" } },
      });
    });

    it("should render exported contacts as a URI", () => {
      expect(decodeFrame(frame(ResponseCode.CONTACT_URI, [0xab, 0x01]))).toMatchObject({
        event: { type: "CONTACT_URI", uri: "meshcore://ab01" },
      });
    });

    it("should classify pushes by code", () => {
      expect(decodeFrame(frame(PushCode.ACK, [9, 8, 7, 6]))).toMatchObject({
        kind: "push",
        code: PushCode.ACK,
        event: { type: "ACK" },
      });
      expect(decodeFrame(frame(PushCode.MESSAGES_WAITING))).toMatchObject({
        kind: "push",
        event: { type: "MESSAGES_WAITING" },
      });
    });

    it("should promote a full new advertisement to a new contact", () => {
      const contact = createTestContact(0x31);
      expect(decodeFrame(frame(PushCode.NEW_ADVERTISEMENT, contactRecord(contact)))).toMatchObject({
        event: { type: "NEW_CONTACT", contact: { name: "node-49" } },
      });
      expect(decodeFrame(frame(PushCode.NEW_ADVERTISEMENT, testKey(0x31)))).toMatchObject({
        event: { type: "ADVERTISEMENT" },
      });
    });

    it("should decode trace hops with a final SNR", () => {
      const bytes = new ByteWriter()
        .u8(PushCode.TRACE_DATA)
        .u8(0)
        .u8(2) // path length
        .u8(0)
        .u32le(77)
        .u32le(5)
        .u8(0x12).u8(0xff) // hashes
        .u8(8).u8(-4) // snrs
        .u8(20)
        .toBytes();
      expect(decodeFrame(bytes)).toMatchObject({
        event: {
          type: "TRACE_DATA",
          trace: {
            tag: 77,
            authCode: 5,
            pathLength: 2,
            path: [
              { hash: 0x12, snr: 2 },
              { hash: null, snr: -1 },
              { hash: null, snr: 5 },
            ],
          },
        },
      });
    });

    it("should read login success permissions", () => {
      const bytes = frame(PushCode.LOGIN_SUCCESS, [0x03], testKey(9).subarray(0, 6));
      expect(decodeFrame(bytes)).toMatchObject({
        event: { type: "LOGIN_SUCCESS", login: { permissions: 3, isAdmin: true } },
      });
    });
  });

  describe("framing", () => {
    it("should prefix outbound frames with marker and length", () => {
      expect(Array.from(frameOutbound(Uint8Array.from([1, 2, 3])))).toEqual([0x3c, 3, 0, 1, 2, 3]);
    });

    it("should reassemble frames split across chunks", () => {
      const acc = new FrameAccumulator();
      expect(acc.push(Uint8Array.from([0x3e, 0x02]))).toEqual([]);
      expect(acc.pending).toBe(2);
      const frames = acc.push(Uint8Array.from([0x00, 0xaa, 0xbb, 0x3e, 0x01, 0x00, 0xcc]));
      expect(frames.map((f) => Array.from(f))).toEqual([[0xaa, 0xbb], [0xcc]]);
      expect(acc.pending).toBe(0);
    });

    it("should skip noise and implausible lengths", () => {
      const acc = new FrameAccumulator();
      const frames = acc.push(
        Uint8Array.from([0x00, 0x11, 0x3e, 0xff, 0xff, 0x3e, 0x01, 0x00, 0x05])
      );
      expect(frames.map((f) => Array.from(f))).toEqual([[0x05]]);
    });
  });

  describe("binary response parsers", () => {
    it("should read status fields from a binary body", () => {
      const body = new Uint8Array(PacketSize.STATUS_FIELDS);
      body[0] = 0x04;
      body[1] = 0x10;
      const prefix = testKey(1).subarray(0, 6) as PublicKeyPrefix;
      expect(parseStatusFields(body, prefix)?.battery).toBe(0x1004);
      expect(parseStatusFields(body.subarray(0, 50), prefix)).toBeNull();
    });

    it("should skip empty ACL slots", () => {
      const data = Uint8Array.from([
        0, 0, 0, 0, 0, 0, 1,
        1, 2, 3, 4, 5, 6, 3,
      ]);
      const entries = parseAcl(data);
      expect(entries).toHaveLength(1);
      expect(entries[0]?.permissions).toBe(3);
    });

    it("should parse neighbours with quarter-dB SNR", () => {
      const data = new ByteWriter()
        .u16le(5)
        .u16le(1)
        .bytes(Uint8Array.from([1, 2, 3, 4]))
        .i32le(60)
        .u8(-20)
        .toBytes();
      const result = parseNeighbours(data);
      expect(result.totalCount).toBe(5);
      expect(result.neighbours).toHaveLength(1);
      expect(result.neighbours[0]?.secondsAgo).toBe(60);
      expect(result.neighbours[0]?.snr).toBe(-5);
    });

    it("should return an empty neighbour list for short bodies", () => {
      expect(parseNeighbours(Uint8Array.from([1]))).toEqual({ totalCount: 0, neighbours: [] });
    });

    it("should parse min/max/avg records", () => {
      const data = Uint8Array.from([1, 103, 0x00, 0xc8, 0x00, 0xfa, 0x00, 0xe1]);
      expect(parseMma(data)).toEqual([
        { channel: 1, sensor: "Temperature", min: 20, max: 25, avg: 22.5 },
      ]);
    });
  });
});
