/**
 * @module backends/crypto-utils
 * @description Hashing helpers and 16-byte key derivation.
 *
 * Channel secrets and flood-scope keys are both the first 16 bytes of
 * SHA-256 over the UTF-8 name, which is what the firmware computes for a
 * hashtag channel or region. They are distinct branded types so a key
 * derived for one purpose is never handed to the other.
 *
 * All functions are pure and stateless.
 */

import { sha256 } from "@noble/hashes/sha2.js";
import { hmac } from "@noble/hashes/hmac.js";
import { encodeUtf8 } from "../codec/bytes.js";
import type { ChannelSecret, FloodScopeKey } from "../types/branded.js";

/** Width of every channel secret and flood-scope key on the wire. */
export const KEY_SIZE = 16;

// ─── Hashing ───────────────────────────────────────────────────────

export function sha256Bytes(data: Uint8Array): Uint8Array {
  return sha256(data);
}

export function hmacSha256(key: Uint8Array, data: Uint8Array): Uint8Array {
  return hmac(sha256, key, data);
}

/** Constant-time comparison for MACs. */
export function timingSafeEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  let diff = 0;
  for (let i = 0; i < a.length; i++) {
    diff |= (a[i] ?? 0) ^ (b[i] ?? 0);
  }
  return diff === 0;
}

// ─── Key Derivation ────────────────────────────────────────────────

function nameDigest(name: string): Uint8Array {
  return sha256(encodeUtf8(name)).slice(0, KEY_SIZE);
}

/** Zero-pads or truncates to exactly 16 bytes, always copying. */
function fit(bytes: Uint8Array): Uint8Array {
  const out = new Uint8Array(KEY_SIZE);
  out.set(bytes.subarray(0, KEY_SIZE));
  return out;
}

/**
 * Secret for a channel known only by name (e.g. `"#general"`).
 *
 * @example
 * ```ts
 * const secret = deriveChannelSecret("General");
 * await session.setChannel(1, "General", secret);
 * ```
 */
export function deriveChannelSecret(name: string): ChannelSecret {
  return nameDigest(name) as ChannelSecret;
}

/** Flood-scope key for a region name. */
export function deriveFloodScopeKey(name: string): FloodScopeKey {
  return nameDigest(name) as FloodScopeKey;
}

export function explicitChannelSecret(bytes: Uint8Array): ChannelSecret {
  return fit(bytes) as ChannelSecret;
}

export function explicitFloodScopeKey(bytes: Uint8Array): FloodScopeKey {
  return fit(bytes) as FloodScopeKey;
}

/** Sixteen zero bytes: flood traffic is not scoped. */
export function disabledFloodScopeKey(): FloodScopeKey {
  return new Uint8Array(KEY_SIZE) as FloodScopeKey;
}

export function isDisabledFloodScope(key: FloodScopeKey): boolean {
  return key.every((b) => b === 0);
}
