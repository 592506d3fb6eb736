import { describe, it, expect } from "vitest";
import {
  computeSharedSecret,
  decryptDirectMessage,
  decryptOrThrow,
  deriveChannelSecret,
  deriveFloodScopeKey,
  disabledFloodScopeKey,
  encryptDirectMessage,
  explicitChannelSecret,
  explicitFloodScopeKey,
  extractTimestamp,
  hmacSha256,
  isDisabledFloodScope,
  publicKeyFromPrivate,
  timingSafeEqual,
} from "../src/backends/index.js";
import { toHex } from "../src/codec/bytes.js";
import { CryptoError } from "../src/interfaces/errors.js";
import type { PrivateKey, UnixTimestamp } from "../src/types/branded.js";

describe("Key Derivation", () => {
  describe("deriveChannelSecret()", () => {
    it("should return the first 16 bytes of SHA-256 over the name", () => {
      const secret = deriveChannelSecret("General");
      expect(secret.length).toBe(16);
      expect(toHex(secret)).toBe("c910d474dcd724bff83ddedeb06bf1ec");
    });

    it("should be deterministic across calls", () => {
      expect(toHex(deriveChannelSecret("#test"))).toBe(toHex(deriveChannelSecret("#test")));
      expect(toHex(deriveChannelSecret("#test"))).toBe("9cd8fcf22a47333b591d96a2b848b73f");
    });

    it("should differ by name", () => {
      expect(toHex(deriveChannelSecret("General"))).not.toBe(toHex(deriveChannelSecret("general")));
    });
  });

  describe("deriveFloodScopeKey()", () => {
    it("should share the digest with channel secrets", () => {
      expect(toHex(deriveFloodScopeKey("General"))).toBe(toHex(deriveChannelSecret("General")));
    });
  });

  describe("explicit keys", () => {
    it("should zero-pad short input to 16 bytes", () => {
      const secret = explicitChannelSecret(Uint8Array.from([1, 2, 3]));
      expect(Array.from(secret)).toEqual([1, 2, 3, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0]);
    });

    it("should truncate long input to 16 bytes", () => {
      const key = explicitFloodScopeKey(new Uint8Array(40).fill(9));
      expect(key.length).toBe(16);
      expect(key.every((b) => b === 9)).toBe(true);
    });

    it("should copy rather than alias the input", () => {
      const input = new Uint8Array(16).fill(4);
      const secret = explicitChannelSecret(input);
      input[0] = 0;
      expect(secret[0]).toBe(4);
    });
  });

  describe("flood scope", () => {
    it("should treat sixteen zero bytes as disabled", () => {
      expect(isDisabledFloodScope(disabledFloodScopeKey())).toBe(true);
      expect(isDisabledFloodScope(deriveFloodScopeKey("#region"))).toBe(false);
    });
  });

  describe("timingSafeEqual()", () => {
    it("should compare content and length", () => {
      expect(timingSafeEqual(Uint8Array.from([1, 2]), Uint8Array.from([1, 2]))).toBe(true);
      expect(timingSafeEqual(Uint8Array.from([1, 2]), Uint8Array.from([1, 3]))).toBe(false);
      expect(timingSafeEqual(Uint8Array.from([1]), Uint8Array.from([1, 2]))).toBe(false);
    });
  });
});

describe("Direct Message Crypto", () => {
  const recipientPrivate = new Uint8Array(32).fill(0x11) as PrivateKey;
  const senderPrivate = new Uint8Array(32).fill(0x22) as PrivateKey;
  const strangerPrivate = new Uint8Array(32).fill(0x33) as PrivateKey;
  const recipientPublic = publicKeyFromPrivate(recipientPrivate);
  const senderPublic = publicKeyFromPrivate(senderPrivate);

  const timestamp = 1703123456 as UnixTimestamp;
  const encrypt = (text = "Hello from sender!") =>
    encryptDirectMessage({ timestamp, typeAttempt: 0, text }, senderPrivate, recipientPublic);

  describe("computeSharedSecret()", () => {
    it("should agree from both sides", () => {
      const a = computeSharedSecret(recipientPrivate, senderPublic);
      const b = computeSharedSecret(senderPrivate, recipientPublic);
      expect(a).not.toBeNull();
      expect(toHex(a ?? new Uint8Array(0))).toBe(toHex(b ?? new Uint8Array(1)));
    });

    it("should reject keys of the wrong length", () => {
      expect(computeSharedSecret(new Uint8Array(31), senderPublic)).toBeNull();
      expect(computeSharedSecret(recipientPrivate, new Uint8Array(33))).toBeNull();
    });
  });

  describe("encryptDirectMessage()", () => {
    it("should lay out header, MAC and whole cipher blocks", () => {
      // 4 + 1 + 18 = 23 plaintext bytes → two blocks.
      const payload = encrypt();
      expect(payload.length).toBe(4 + 32);
      expect(payload[0]).toBe(recipientPublic[0]);
      expect(payload[1]).toBe(senderPublic[0]);
    });

    it("should use one block for short texts", () => {
      expect(encrypt("hi").length).toBe(20);
    });
  });

  describe("decryptDirectMessage()", () => {
    it("should recover timestamp, type and text", () => {
      const result = decryptDirectMessage(encrypt(), recipientPrivate, senderPublic);
      expect(result).toEqual({
        status: "success",
        message: { timestamp: 1703123456, typeAttempt: 0, text: "Hello from sender!" },
      });
    });

    it("should handle multi-byte text", () => {
      const result = decryptDirectMessage(encrypt("héllo ☀"), recipientPrivate, senderPublic);
      expect(result.status === "success" && result.message.text).toBe("héllo ☀");
    });

    it("should report a flipped MAC bit as macMismatch", () => {
      const payload = encrypt();
      payload[2] = (payload[2] ?? 0) ^ 0x01;
      expect(decryptDirectMessage(payload, recipientPrivate, senderPublic)).toEqual({
        status: "macMismatch",
      });
    });

    it("should report tampered ciphertext as macMismatch", () => {
      const payload = encrypt();
      payload[10] = (payload[10] ?? 0) ^ 0x80;
      expect(decryptDirectMessage(payload, recipientPrivate, senderPublic).status).toBe("macMismatch");
    });

    it("should not produce plaintext under the wrong key", () => {
      const result = decryptDirectMessage(encrypt(), strangerPrivate, senderPublic);
      expect(result).toEqual({ status: "macMismatch" });
    });

    it("should ignore the header bytes", () => {
      const payload = encrypt();
      payload[0] = 0;
      payload[1] = 0;
      expect(decryptDirectMessage(payload, recipientPrivate, senderPublic).status).toBe("success");
    });

    it("should reject payloads shorter than 20 bytes", () => {
      expect(decryptDirectMessage(new Uint8Array(19), recipientPrivate, senderPublic)).toEqual({
        status: "invalidPayload",
      });
    });

    it("should reject malformed keys before any crypto", () => {
      const payload = encrypt();
      expect(decryptDirectMessage(payload, new Uint8Array(16), senderPublic)).toEqual({
        status: "keyError",
      });
      expect(decryptDirectMessage(payload, recipientPrivate, new Uint8Array(7))).toEqual({
        status: "keyError",
      });
    });

    it("should fail a MAC-valid ciphertext that is not whole blocks", () => {
      const secret = computeSharedSecret(recipientPrivate, senderPublic);
      if (!secret) throw new Error("no shared secret");
      const ciphertext = encrypt().subarray(4, 21);
      const mac = hmacSha256(secret, ciphertext).subarray(0, 2);
      const payload = Uint8Array.from([0, 0, ...mac, ...ciphertext]);
      expect(decryptDirectMessage(payload, recipientPrivate, senderPublic)).toEqual({
        status: "decryptionFailed",
      });
    });
  });

  describe("extractTimestamp()", () => {
    it("should return only the timestamp", () => {
      expect(extractTimestamp(encrypt(), recipientPrivate, senderPublic)).toBe(1703123456);
    });

    it("should return null on failure", () => {
      expect(extractTimestamp(encrypt(), strangerPrivate, senderPublic)).toBeNull();
    });
  });

  describe("decryptOrThrow()", () => {
    it("should return the message on success", () => {
      expect(decryptOrThrow(encrypt(), recipientPrivate, senderPublic).text).toBe(
        "Hello from sender!"
      );
    });

    it("should throw a CryptoError carrying the failure code", () => {
      const attempt = () => decryptOrThrow(new Uint8Array(5), recipientPrivate, senderPublic);
      expect(attempt).toThrow(CryptoError);
      expect(attempt).toThrow("Payload shorter than 20 bytes");
      try {
        attempt();
      } catch (error) {
        expect(error instanceof CryptoError && error.code).toBe("INVALID_PAYLOAD");
      }
    });
  });
});
