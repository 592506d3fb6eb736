/**
 * @module codec/binary
 * @description Re-parsers for `BINARY_RESPONSE` payloads.
 *
 * A binary response carries only the request's tag and an opaque body;
 * which layout applies is known only to whoever sent the request. The
 * session looks the tag up in the registry and picks one of these.
 */

import { ByteReader } from "./bytes.js";
import { decodeLpp, lppSensorName, lppValueSize } from "./lpp.js";
import { parseStatusFields } from "./responses.js";
import { LppSensorType } from "../types/lpp.js";
import type { PublicKeyPrefix } from "../types/branded.js";
import type { LppDataPoint } from "../types/lpp.js";
import type { StatusReport } from "../types/events.js";

// ─── Result Types ───────────────────────────────────────────────────

export interface MmaEntry {
  readonly channel: number;
  readonly sensor: string;
  readonly min: number;
  readonly max: number;
  readonly avg: number;
}

export interface AclEntry {
  readonly keyPrefix: Uint8Array;
  readonly permissions: number;
}

export interface Neighbour {
  readonly keyPrefix: Uint8Array;
  readonly secondsAgo: number;
  readonly snr: number;
}

export interface NeighboursResult {
  /** Neighbours known to the remote node; may exceed `neighbours.length`. */
  readonly totalCount: number;
  readonly neighbours: readonly Neighbour[];
}

// ─── Parsers ────────────────────────────────────────────────────────

export function parseBinaryStatus(
  data: Uint8Array,
  senderPrefix: PublicKeyPrefix
): StatusReport | null {
  return parseStatusFields(data, senderPrefix);
}

export function parseBinaryTelemetry(data: Uint8Array): LppDataPoint[] {
  return decodeLpp(data);
}

/** Reads one MMA sample as a plain number, scaled like the LPP value. */
function readSample(type: number, r: ByteReader): number {
  const T = LppSensorType;
  switch (type) {
    case T.DIGITAL_INPUT:
    case T.DIGITAL_OUTPUT:
    case T.PRESENCE:
    case T.SWITCH:
    case T.PERCENTAGE:
      return r.u8();
    case T.HUMIDITY:
      return r.u8() * 0.5;
    case T.TEMPERATURE:
      return r.i16be() / 10;
    case T.BAROMETER:
      return r.u16be() / 10;
    case T.VOLTAGE:
    case T.LOAD:
      return r.u16be() / 100;
    case T.CURRENT:
      return r.u16be() / 1000;
    case T.ILLUMINANCE:
    case T.CONCENTRATION:
    case T.POWER:
    case T.DIRECTION:
      return r.u16be();
    case T.ALTITUDE:
      return r.i16be();
    case T.ANALOG_INPUT:
    case T.ANALOG_OUTPUT:
      return r.i16be() / 100;
    case T.GENERIC_SENSOR:
      return r.i32be();
    case T.FREQUENCY:
    case T.UNIX_TIME:
      return r.u32be();
    case T.DISTANCE:
    case T.ENERGY:
      return r.u32be() / 1000;
    default: {
      // Multi-axis types: the first component only.
      const size = lppValueSize(type) ?? 0;
      const first = r.i16be();
      r.skip(size - 2);
      return first / (type === T.ACCELEROMETER ? 1000 : 100);
    }
  }
}

/**
 * Min/max/average records: `[channel][type][min][max][avg]`, each sample
 * the sensor's LPP width. Stops at the first unknown type or short record.
 */
export function parseMma(data: Uint8Array): MmaEntry[] {
  const entries: MmaEntry[] = [];
  const r = new ByteReader(data);

  while (r.remaining >= 2) {
    const channel = r.u8();
    const type = r.u8();
    const size = lppValueSize(type);
    if (size === undefined || r.remaining < size * 3) break;

    const min = readSample(type, new ByteReader(r.bytes(size)));
    const max = readSample(type, new ByteReader(r.bytes(size)));
    const avg = readSample(type, new ByteReader(r.bytes(size)));
    entries.push({ channel, sensor: lppSensorName(type), min, max, avg });
  }

  return entries;
}

/** 7-byte entries `[prefix:6][permissions:1]`; all-zero prefixes are empty slots. */
export function parseAcl(data: Uint8Array): AclEntry[] {
  const entries: AclEntry[] = [];
  const r = new ByteReader(data);

  while (r.remaining >= 7) {
    const keyPrefix = r.bytes(6);
    const permissions = r.u8();
    if (keyPrefix.every((b) => b === 0)) continue;
    entries.push({ keyPrefix, permissions });
  }

  return entries;
}

/**
 * `[total:i16][count:i16]` then `count` entries of
 * `[prefix:N][secondsAgo:i32][snr:i8]`.
 */
export function parseNeighbours(data: Uint8Array, prefixLength = 4): NeighboursResult {
  if (data.length < 4) return { totalCount: 0, neighbours: [] };

  const r = new ByteReader(data);
  const totalCount = r.i16le();
  const count = r.i16le();
  const neighbours: Neighbour[] = [];

  for (let i = 0; i < count && r.remaining >= prefixLength + 5; i++) {
    neighbours.push({
      keyPrefix: r.bytes(prefixLength),
      secondsAgo: r.i32le(),
      snr: r.i8() / 4,
    });
  }

  return { totalCount, neighbours };
}
