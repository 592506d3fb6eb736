/**
 * @module backends/direct-message-crypto
 * @description End-to-end crypto for point-to-point messages.
 *
 * Payload: `[destHash:1][srcHash:1][mac:2][ciphertext:16n]`.
 * - Shared secret: X25519(myPrivateKey, senderPublicKey), 32 bytes.
 * - MAC: HMAC-SHA256(secret, ciphertext), first 2 bytes. The header is
 *   not covered.
 * - Cipher: AES-128-ECB keyed by the first 16 bytes of the secret, no
 *   padding scheme; the sender zero-fills the last block.
 * - Plaintext: `[timestamp:u32le][typeAttempt:1][text…][NUL padding]`.
 *
 * The MAC is checked before anything is decrypted, so a wrong key or a
 * corrupted packet reports `macMismatch` and no plaintext is produced.
 */

import { x25519 } from "@noble/curves/ed25519.js";
import { ecb } from "@noble/ciphers/aes.js";
import { hmacSha256, timingSafeEqual } from "./crypto-utils.js";
import { ByteReader, ByteWriter, encodeUtf8, tryDecodeUtf8 } from "../codec/bytes.js";
import { CryptoError } from "../interfaces/errors.js";
import type {
  PrivateKey,
  PublicKey,
  SharedSecret,
  UnixTimestamp,
} from "../types/branded.js";

export const DirectMessageLayout = {
  MAC_SIZE: 2,
  HEADER_SIZE: 2,
  TIMESTAMP_SIZE: 4,
  TYPE_ATTEMPT_SIZE: 1,
  MIN_CIPHERTEXT_SIZE: 16,
  MIN_PACKET_SIZE: 20,
  BLOCK_SIZE: 16,
  KEY_SIZE: 32,
} as const;

const L = DirectMessageLayout;

export interface DecryptedDirectMessage {
  readonly timestamp: UnixTimestamp;
  readonly typeAttempt: number;
  readonly text: string;
}

export type DecryptResult =
  | { readonly status: "success"; readonly message: DecryptedDirectMessage }
  | { readonly status: "macMismatch" }
  | { readonly status: "decryptionFailed" }
  | { readonly status: "invalidPayload" }
  | { readonly status: "keyError" };

export type DecryptStatus = DecryptResult["status"];

// ─── Key Agreement ─────────────────────────────────────────────────

/** Null when either key has the wrong length or agreement fails. */
export function computeSharedSecret(
  myPrivateKey: Uint8Array,
  theirPublicKey: Uint8Array
): SharedSecret | null {
  if (myPrivateKey.length !== L.KEY_SIZE || theirPublicKey.length !== L.KEY_SIZE) {
    return null;
  }
  try {
    return x25519.getSharedSecret(myPrivateKey, theirPublicKey) as SharedSecret;
  } catch {
    // Low-order public keys yield an all-zero secret, which noble rejects.
    return null;
  }
}

export function publicKeyFromPrivate(privateKey: PrivateKey): PublicKey {
  return x25519.getPublicKey(privateKey) as PublicKey;
}

const macOf = (secret: SharedSecret, ciphertext: Uint8Array): Uint8Array =>
  hmacSha256(secret, ciphertext).slice(0, L.MAC_SIZE);

const cipherFor = (secret: SharedSecret) =>
  ecb(secret.slice(0, 16), { disablePadding: true });

// ─── Decrypt ───────────────────────────────────────────────────────

export function decryptDirectMessage(
  payload: Uint8Array,
  myPrivateKey: Uint8Array,
  senderPublicKey: Uint8Array
): DecryptResult {
  if (payload.length < L.MIN_PACKET_SIZE) {
    return { status: "invalidPayload" };
  }

  const secret = computeSharedSecret(myPrivateKey, senderPublicKey);
  if (!secret) {
    return { status: "keyError" };
  }

  const macStart = L.HEADER_SIZE;
  const receivedMac = payload.subarray(macStart, macStart + L.MAC_SIZE);
  const ciphertext = payload.subarray(macStart + L.MAC_SIZE);

  if (!timingSafeEqual(receivedMac, macOf(secret, ciphertext))) {
    return { status: "macMismatch" };
  }
  if (ciphertext.length % L.BLOCK_SIZE !== 0) {
    return { status: "decryptionFailed" };
  }

  const plaintext = cipherFor(secret).decrypt(ciphertext);
  if (plaintext.length < L.TIMESTAMP_SIZE + L.TYPE_ATTEMPT_SIZE) {
    return { status: "decryptionFailed" };
  }

  const reader = new ByteReader(plaintext);
  const timestamp = reader.u32le() as UnixTimestamp;
  const typeAttempt = reader.u8();
  const body = reader.rest();
  const end = body.indexOf(0);
  const text = tryDecodeUtf8(end === -1 ? body : body.subarray(0, end));
  if (text === null) {
    return { status: "decryptionFailed" };
  }

  return { status: "success", message: { timestamp, typeAttempt, text } };
}

/** Runs the full decrypt pipeline and keeps only the timestamp. */
export function extractTimestamp(
  payload: Uint8Array,
  myPrivateKey: Uint8Array,
  senderPublicKey: Uint8Array
): UnixTimestamp | null {
  const result = decryptDirectMessage(payload, myPrivateKey, senderPublicKey);
  return result.status === "success" ? result.message.timestamp : null;
}

const FAILURES: Record<
  Exclude<DecryptStatus, "success">,
  { code: CryptoError["code"]; message: string }
> = {
  macMismatch: { code: "MAC_MISMATCH", message: "Message authentication failed" },
  decryptionFailed: { code: "DECRYPTION_FAILED", message: "Decrypted payload is malformed" },
  invalidPayload: { code: "INVALID_PAYLOAD", message: "Payload shorter than 20 bytes" },
  keyError: { code: "KEY_ERROR", message: "Key agreement failed" },
};

/**
 * Exception-style variant of {@link decryptDirectMessage}.
 * @throws {CryptoError} with the code matching the failure.
 */
export function decryptOrThrow(
  payload: Uint8Array,
  myPrivateKey: Uint8Array,
  senderPublicKey: Uint8Array
): DecryptedDirectMessage {
  const result = decryptDirectMessage(payload, myPrivateKey, senderPublicKey);
  if (result.status === "success") return result.message;
  const failure = FAILURES[result.status];
  throw new CryptoError(failure.message, failure.code);
}

// ─── Encrypt ───────────────────────────────────────────────────────

export interface DirectMessageInput {
  readonly timestamp: UnixTimestamp;
  readonly typeAttempt: number;
  readonly text: string;
}

/**
 * Builds a payload that {@link decryptDirectMessage} accepts. The header
 * hashes are the first byte of each party's public key.
 *
 * @throws {CryptoError} code=KEY_ERROR if key agreement fails.
 */
export function encryptDirectMessage(
  message: DirectMessageInput,
  senderPrivateKey: PrivateKey,
  recipientPublicKey: PublicKey
): Uint8Array {
  const secret = computeSharedSecret(senderPrivateKey, recipientPublicKey);
  if (!secret) {
    throw new CryptoError("Key agreement failed", "KEY_ERROR");
  }

  const body = new ByteWriter()
    .u32le(message.timestamp)
    .u8(message.typeAttempt)
    .bytes(encodeUtf8(message.text));
  const padded = Math.max(
    L.MIN_CIPHERTEXT_SIZE,
    Math.ceil(body.length / L.BLOCK_SIZE) * L.BLOCK_SIZE
  );
  const plaintext = new ByteWriter().fixed(body.toBytes(), padded).toBytes();
  const ciphertext = cipherFor(secret).encrypt(plaintext);

  const senderPublicKey = publicKeyFromPrivate(senderPrivateKey);
  return new ByteWriter()
    .u8(recipientPublicKey[0] ?? 0)
    .u8(senderPublicKey[0] ?? 0)
    .bytes(macOf(secret, ciphertext))
    .bytes(ciphertext)
    .toBytes();
}
