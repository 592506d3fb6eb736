/**
 * @module types/contact
 * @description Peer records as stored on the radio and mirrored by the cache.
 */

import type { ContactId, PublicKey, UnixTimestamp } from "./branded.js";

export const ContactType = {
  NONE: 0,
  CHAT: 1,
  REPEATER: 2,
  ROOM: 3,
  SENSOR: 4,
} as const;

export type ContactType = (typeof ContactType)[keyof typeof ContactType];

/** Bits of {@link Contact.flags}. */
export const ContactFlag = {
  FAVORITE: 0x01,
  TELEMETRY_BASE: 0x02,
  TELEMETRY_LOCATION: 0x04,
  TELEMETRY_ENVIRONMENT: 0x08,
} as const;

/** Sentinel path length meaning "no known route, flood". */
export const FLOOD_PATH_LENGTH = -1;

export interface GeoPoint {
  readonly latitude: number;
  readonly longitude: number;
}

export interface Contact {
  /** Lowercase hex of `publicKey`. */
  readonly id: ContactId;
  readonly publicKey: PublicKey;
  readonly type: ContactType;
  readonly flags: number;
  /** -1 for flood routing, otherwise the number of hop bytes in `outPath`. */
  readonly outPathLength: number;
  readonly outPath: Uint8Array;
  readonly name: string;
  readonly lastAdvertisement: UnixTimestamp;
  readonly lastModified: UnixTimestamp;
  /** Absent when the node advertises 0,0. */
  readonly location?: GeoPoint;
}

export function isFloodPath(contact: Pick<Contact, "outPathLength">): boolean {
  return contact.outPathLength === FLOOD_PATH_LENGTH;
}

export function hasFlag(contact: Pick<Contact, "flags">, flag: number): boolean {
  return (contact.flags & flag) !== 0;
}

/** Maps a wire byte onto a known contact type; unknown codes become NONE. */
export function toContactType(code: number): ContactType {
  switch (code) {
    case ContactType.CHAT:
    case ContactType.REPEATER:
    case ContactType.ROOM:
    case ContactType.SENSOR:
      return code;
    default:
      return ContactType.NONE;
  }
}
