/**
 * @module primitives/dedup-cache
 * @description Suppresses messages the firmware delivers more than once.
 *
 * A sender that misses an ack retries with the same timestamp and text, and
 * every copy that gets through reaches the queue. Each conversation keeps a
 * FIFO of recent fingerprints; `isDuplicate*` checks and records in one call.
 */

import { encodeUtf8, toHex } from "../codec/bytes.js";
import { sha256Bytes } from "../backends/crypto-utils.js";

export interface DedupCapacity {
  /** Fingerprints kept per contact. */
  readonly direct?: number;
  /** Fingerprints kept per channel. */
  readonly channel?: number;
}

export const DEFAULT_DIRECT_DEDUP_CAPACITY = 50;
export const DEFAULT_CHANNEL_DEDUP_CAPACITY = 100;

/** Bucket shared by direct messages whose sender is not in the contact cache. */
export const UNKNOWN_SENDER = "unknown";

function textHash(text: string): string {
  return toHex(sha256Bytes(encodeUtf8(text)).subarray(0, 4));
}

export class MessageDedupCache {
  private readonly direct = new Map<string, string[]>();
  private readonly channel = new Map<number, string[]>();
  private readonly directLimit: number;
  private readonly channelLimit: number;

  constructor(capacity: DedupCapacity = {}) {
    this.directLimit = Math.max(1, capacity.direct ?? DEFAULT_DIRECT_DEDUP_CAPACITY);
    this.channelLimit = Math.max(1, capacity.channel ?? DEFAULT_CHANNEL_DEDUP_CAPACITY);
  }

  /** @returns true if seen before; otherwise records it and returns false. */
  isDuplicateDirectMessage(contactId: string, timestamp: number, text: string): boolean {
    const key = `${timestamp}-${textHash(text)}`;
    return this.checkAndRecord(this.direct, contactId, key, this.directLimit);
  }

  isDuplicateChannelMessage(
    channelIndex: number,
    timestamp: number,
    senderName: string,
    text: string
  ): boolean {
    const key = `${timestamp}-${senderName}-${textHash(text)}`;
    return this.checkAndRecord(this.channel, channelIndex, key, this.channelLimit);
  }

  /** Forget everything; the session calls this on disconnect. */
  clear(): void {
    this.direct.clear();
    this.channel.clear();
  }

  private checkAndRecord<K>(
    buckets: Map<K, string[]>,
    conversation: K,
    key: string,
    limit: number
  ): boolean {
    let keys = buckets.get(conversation);
    if (!keys) {
      keys = [];
      buckets.set(conversation, keys);
    }
    if (keys.includes(key)) return true;

    keys.push(key);
    if (keys.length > limit) keys.shift();
    return false;
  }
}
