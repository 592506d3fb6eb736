/**
 * @module types/branded
 * @description Branded types for compile-time safety across the session engine.
 *
 * Branded types keep raw primitives (strings, numbers, Uint8Arrays) from being
 * passed where a protocol-level value is expected. A 16-byte channel secret can
 * never be handed to `setFloodScope`, and a 6-byte key prefix can never stand in
 * for a full 32-byte public key.
 *
 * @example
 * ```ts
 * const raw = new Uint8Array(16);
 * // Type error: Uint8Array is not assignable to FloodScopeKey
 * const key: FloodScopeKey = raw;
 * // Correct:
 * const scope = deriveFloodScopeKey("#region");
 * ```
 */

/** Unique symbol for branding. Internal only. */
declare const __brand: unique symbol;

/**
 * Generic branded type utility.
 * Intersects a base type with a phantom brand field that exists only
 * at the type level, never at runtime.
 */
export type Brand<T, B extends string> = T & { readonly [__brand]: B };

// ─── Identity Brands ────────────────────────────────────────────────

/** A full 32-byte Curve25519 public key identifying a mesh node. */
export type PublicKey = Brand<Uint8Array, "PublicKey">;

/** A 32-byte Curve25519 private key. */
export type PrivateKey = Brand<Uint8Array, "PrivateKey">;

/**
 * A short leading slice of a public key (usually 6 bytes) used by the
 * firmware as a compact peer identifier.
 */
export type PublicKeyPrefix = Brand<Uint8Array, "PublicKeyPrefix">;

/** Lowercase hex of a full public key. Always derived, never assigned. */
export type ContactId = Brand<string, "ContactId">;

// ─── Cryptographic Brands ───────────────────────────────────────────

/** A 16-byte channel secret (explicit or derived from the channel name). */
export type ChannelSecret = Brand<Uint8Array, "ChannelSecret">;

/** A 16-byte flood-scope key. All zeros disables scoping. */
export type FloodScopeKey = Brand<Uint8Array, "FloodScopeKey">;

/** A 32-byte X25519 shared secret. */
export type SharedSecret = Brand<Uint8Array, "SharedSecret">;

// ─── Correlation Brands ─────────────────────────────────────────────

/**
 * Opaque correlation token. Device-issued tags (expected acks) are the
 * lowercase hex of their 4 wire bytes; session-issued command tags are
 * prefixed with `cmd:`.
 */
export type RequestTag = Brand<string, "RequestTag">;

// ─── Wire Format Brands ─────────────────────────────────────────────

/** An unsigned 8-bit integer (0–255). */
export type Uint8 = Brand<number, "Uint8">;

/** A Unix timestamp in seconds (uint32). */
export type UnixTimestamp = Brand<number, "UnixTimestamp">;
