/**
 * @module primitives/pending-requests
 * @description Correlates outbound commands with their eventual replies.
 *
 * Every waiter is keyed by an opaque tag. Binary requests are also indexed
 * by (key prefix, request kind) because some firmware replies, telemetry
 * and status pushes among them, carry the sender's prefix but not the tag.
 *
 * An entry retires exactly once, through whichever of completion, timeout
 * or cancellation reaches it first. Retirement removes it from both indices
 * and clears its timer in the same synchronous step, so a later trigger
 * finds nothing and is a no-op. Node runs this on one thread; that step is
 * the serialization point.
 */

import { toHex } from "../codec/bytes.js";
import { PacketSize } from "../codec/codes.js";
import { SessionError } from "../interfaces/errors.js";
import type { BinaryRequestKind } from "../codec/codes.js";
import type { PublicKeyPrefix, RequestTag } from "../types/branded.js";
import type { MeshEvent } from "../types/events.js";
import type { MeshLogger } from "../logger.js";

// ─── Types ──────────────────────────────────────────────────────────

export type RequestOutcome =
  | { readonly status: "completed"; readonly event: MeshEvent }
  | { readonly status: "timeout" }
  | { readonly status: "cancelled"; readonly reason: string };

export interface BinaryRequestKey {
  readonly kind: BinaryRequestKind;
  /** Target's public key or a prefix of it; only the first 6 bytes count. */
  readonly keyPrefix: Uint8Array;
}

export interface RegisterOptions {
  readonly timeoutMs: number;
  readonly binary?: BinaryRequestKey;
  /** Free-form label carried for diagnostics. */
  readonly context?: string;
}

export interface BinaryRequestInfo {
  readonly kind: BinaryRequestKind;
  readonly keyPrefix: PublicKeyPrefix;
  readonly context?: string;
}

export interface RegistryOptions {
  /** Millisecond clock; `Date.now` unless a test supplies one. */
  readonly now?: () => number;
  readonly logger?: MeshLogger;
}

interface PendingEntry {
  readonly tag: RequestTag;
  readonly expiresAt: number;
  readonly binary?: BinaryRequestInfo;
  readonly binaryKey?: string;
  readonly context?: string;
  readonly timer: ReturnType<typeof setTimeout>;
  readonly resolve: (outcome: RequestOutcome) => void;
}

function binaryIndexKey(keyPrefix: Uint8Array, kind: number): string {
  return `${kind}:${toHex(keyPrefix.subarray(0, PacketSize.KEY_PREFIX))}`;
}

// ─── Registry ───────────────────────────────────────────────────────

export class PendingRequestRegistry {
  private readonly byTag = new Map<RequestTag, PendingEntry>();
  private readonly byBinary = new Map<string, PendingEntry>();
  private readonly now: () => number;
  private readonly logger: MeshLogger | undefined;

  constructor(options: RegistryOptions = {}) {
    this.now = options.now ?? Date.now;
    this.logger = options.logger;
  }

  // ─── Commands ───────────────────────────────────────────────────

  /**
   * Registers a waiter and returns its outcome. The entry exists as soon as
   * this returns, so a reply that arrives before the caller awaits still
   * finds it.
   *
   * A live entry under the same tag, or the same (prefix, kind) pair, is
   * cancelled with reason `"superseded"`.
   *
   * @throws {SessionError} code=INVALID_INPUT if `timeoutMs` is negative or not finite.
   */
  register(tag: RequestTag, options: RegisterOptions): Promise<RequestOutcome> {
    const { timeoutMs, binary, context } = options;
    if (!Number.isFinite(timeoutMs) || timeoutMs < 0) {
      throw new SessionError(`Invalid timeout: ${timeoutMs}`, "INVALID_INPUT");
    }

    const previous = this.byTag.get(tag);
    if (previous) this.retire(previous, { status: "cancelled", reason: "superseded" });

    let binaryInfo: BinaryRequestInfo | undefined;
    let binaryKey: string | undefined;
    if (binary) {
      binaryInfo = {
        kind: binary.kind,
        keyPrefix: binary.keyPrefix.slice(0, PacketSize.KEY_PREFIX) as PublicKeyPrefix,
        context,
      };
      binaryKey = binaryIndexKey(binary.keyPrefix, binary.kind);
      const shadowed = this.byBinary.get(binaryKey);
      if (shadowed) this.retire(shadowed, { status: "cancelled", reason: "superseded" });
    }

    return new Promise<RequestOutcome>((resolve) => {
      const entry: PendingEntry = {
        tag,
        expiresAt: this.now() + timeoutMs,
        binary: binaryInfo,
        binaryKey,
        context,
        timer: setTimeout(() => this.retire(entry, { status: "timeout" }), timeoutMs),
        resolve,
      };
      this.byTag.set(tag, entry);
      if (binaryKey) this.byBinary.set(binaryKey, entry);
      this.logger?.debug("registered %s (%s, %dms)", tag, context ?? "-", timeoutMs);
    });
  }

  /** @returns Whether a live waiter took the event. */
  complete(tag: RequestTag, event: MeshEvent): boolean {
    const entry = this.byTag.get(tag);
    if (!entry) return false;
    return this.retire(entry, { status: "completed", event });
  }

  /** Completes the waiter registered for (prefix, kind), for replies that lost their tag. */
  completeBinaryRequest(
    keyPrefix: Uint8Array,
    kind: BinaryRequestKind,
    event: MeshEvent
  ): boolean {
    const entry = this.byBinary.get(binaryIndexKey(keyPrefix, kind));
    if (!entry) return false;
    return this.retire(entry, { status: "completed", event });
  }

  cancel(tag: RequestTag, reason = "cancelled"): boolean {
    const entry = this.byTag.get(tag);
    if (!entry) return false;
    return this.retire(entry, { status: "cancelled", reason });
  }

  /** @returns How many waiters were cancelled. */
  cancelAll(reason: string): number {
    const entries = [...this.byTag.values()];
    for (const entry of entries) {
      this.retire(entry, { status: "cancelled", reason });
    }
    return entries.length;
  }

  /**
   * Times out entries whose expiry has passed even if their timer has not
   * run yet (a suspended process wakes with timers overdue).
   * @returns How many entries were timed out.
   */
  cleanupExpired(now: number = this.now()): number {
    let count = 0;
    for (const entry of [...this.byTag.values()]) {
      if (entry.expiresAt <= now && this.retire(entry, { status: "timeout" })) {
        count++;
      }
    }
    return count;
  }

  // ─── Queries ────────────────────────────────────────────────────

  hasPending(tag: RequestTag): boolean {
    return this.byTag.has(tag);
  }

  hasPendingBinaryRequest(keyPrefix: Uint8Array, kind: BinaryRequestKind): boolean {
    return this.byBinary.has(binaryIndexKey(keyPrefix, kind));
  }

  /** Whether `tag` is a live binary request of the given kind. */
  matchesBinaryRequest(tag: RequestTag, kind: BinaryRequestKind): boolean {
    return this.byTag.get(tag)?.binary?.kind === kind;
  }

  getBinaryRequestInfo(tag: RequestTag): BinaryRequestInfo | undefined {
    return this.byTag.get(tag)?.binary;
  }

  get size(): number {
    return this.byTag.size;
  }

  // ─── Internal ───────────────────────────────────────────────────

  /** The single exit for every entry. Returns false if it already left. */
  private retire(entry: PendingEntry, outcome: RequestOutcome): boolean {
    if (this.byTag.get(entry.tag) !== entry) return false;

    this.byTag.delete(entry.tag);
    if (entry.binaryKey && this.byBinary.get(entry.binaryKey) === entry) {
      this.byBinary.delete(entry.binaryKey);
    }
    clearTimeout(entry.timer);

    this.logger?.debug("retired %s: %s", entry.tag, outcome.status);
    entry.resolve(outcome);
    return true;
  }
}
