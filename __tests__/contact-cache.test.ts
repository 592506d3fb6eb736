import { describe, it, expect, beforeEach } from "vitest";
import { ContactCache, contactIdOf } from "../src/primitives/contact-cache.js";
import type { PublicKey, UnixTimestamp } from "../src/types/branded.js";
import { createTestContact, testKey } from "./fixtures.js";

const ts = (value: number) => value as UnixTimestamp;

describe("ContactCache", () => {
  let cache: ContactCache;

  beforeEach(() => {
    cache = new ContactCache();
  });

  it("should start empty and dirty", () => {
    expect(cache.isEmpty).toBe(true);
    expect(cache.needsRefresh).toBe(true);
    expect(cache.lastModified).toBeUndefined();
    expect(cache.autoUpdate).toBe(false);
  });

  describe("contactIdOf()", () => {
    it("should use the lowercase hex key", () => {
      expect(contactIdOf(Uint8Array.from([0xab, 0x0c]))).toBe("ab0c");
    });
  });

  describe("store()", () => {
    it("should replace a contact with the same key", () => {
      cache.store(createTestContact(1, "old"));
      cache.store(createTestContact(1, "new"));
      expect(cache.contacts).toHaveLength(1);
      expect(cache.contacts[0]?.name).toBe("new");
    });
  });

  describe("updateFromSync()", () => {
    it("should merge contacts and record the watermark", () => {
      cache.store(createTestContact(1));
      cache.updateFromSync([createTestContact(2), createTestContact(3)], ts(1700000500));
      expect(cache.contacts).toHaveLength(3);
      expect(cache.needsRefresh).toBe(false);
      expect(cache.lastModified).toBe(1700000500);
    });
  });

  describe("remove()", () => {
    it("should drop confirmed and pending entries and mark dirty", () => {
      const contact = createTestContact(1);
      cache.updateFromSync([contact], ts(1));
      cache.addPending(contact);
      expect(cache.remove(contact.id)).toBe(true);
      expect(cache.isEmpty).toBe(true);
      expect(cache.pendingContacts).toHaveLength(0);
      expect(cache.needsRefresh).toBe(true);
    });

    it("should report a missing contact", () => {
      expect(cache.remove(createTestContact(9).id)).toBe(false);
    });
  });

  describe("clear()", () => {
    it("should reset contacts and the watermark", () => {
      cache.updateFromSync([createTestContact(1)], ts(50));
      cache.clear();
      expect(cache.isEmpty).toBe(true);
      expect(cache.lastModified).toBeUndefined();
      expect(cache.needsRefresh).toBe(true);
    });
  });

  describe("pending contacts", () => {
    it("should pop a pending contact exactly once", () => {
      const contact = createTestContact(4);
      cache.addPending(contact);
      expect(cache.popPending(contact.id)).toBe(contact);
      expect(cache.popPending(contact.id)).toBeUndefined();
    });

    it("should flush all pending contacts", () => {
      cache.addPending(createTestContact(4));
      cache.addPending(createTestContact(5));
      cache.flushPending();
      expect(cache.pendingContacts).toEqual([]);
    });
  });

  describe("trackChanges()", () => {
    it("should store contacts from sync records", () => {
      cache.trackChanges({ type: "CONTACT", contact: createTestContact(1) });
      expect(cache.contacts).toHaveLength(1);
    });

    it("should queue new contacts as pending and mark dirty", () => {
      cache.markClean(ts(1));
      cache.trackChanges({ type: "NEW_CONTACT", contact: createTestContact(2) });
      expect(cache.isEmpty).toBe(true);
      expect(cache.pendingContacts).toHaveLength(1);
      expect(cache.needsRefresh).toBe(true);
    });

    it("should mark clean at the end of a sync", () => {
      cache.trackChanges({ type: "CONTACTS_END", lastModified: ts(99) });
      expect(cache.needsRefresh).toBe(false);
      expect(cache.lastModified).toBe(99);
    });

    it("should mark dirty on adverts and path updates", () => {
      cache.markClean(ts(1));
      cache.trackChanges({ type: "ADVERTISEMENT", publicKey: testKey(1) });
      expect(cache.needsRefresh).toBe(true);

      cache.markClean(ts(2));
      cache.trackChanges({ type: "PATH_UPDATE", publicKey: testKey(1) });
      expect(cache.needsRefresh).toBe(true);
    });

    it("should ignore unrelated events", () => {
      cache.markClean(ts(1));
      cache.trackChanges({ type: "MESSAGES_WAITING" });
      expect(cache.needsRefresh).toBe(false);
    });
  });

  describe("lookups", () => {
    beforeEach(() => {
      cache.store(createTestContact(0x12, "Alpha Base"));
      cache.store(createTestContact(0x34, "Bravo"));
    });

    it("should match names exactly ignoring case", () => {
      expect(cache.getByName("alpha base", true)?.name).toBe("Alpha Base");
      expect(cache.getByName("alpha", true)).toBeUndefined();
    });

    it("should match name fragments case-insensitively", () => {
      expect(cache.getByName("BASE")?.name).toBe("Alpha Base");
      expect(cache.getByName("charlie")).toBeUndefined();
    });

    it("should match hex prefixes in either case", () => {
      expect(cache.getByKeyPrefix("3434")?.name).toBe("Bravo");
      expect(cache.getByKeyPrefix("1212AB")).toBeUndefined();
    });

    it("should match byte prefixes", () => {
      expect(cache.getByKeyPrefix(Uint8Array.from([0x12, 0x12]))?.name).toBe("Alpha Base");
      expect(cache.getByKeyPrefix(new Uint8Array(40).fill(0x12))).toBeUndefined();
    });

    it("should find by full public key", () => {
      expect(cache.getByPublicKey(testKey(0x34))?.name).toBe("Bravo");
      expect(cache.getByPublicKey(new Uint8Array(32) as PublicKey)).toBeUndefined();
    });
  });
});
