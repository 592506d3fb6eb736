/**
 * @module primitives/contact-cache
 * @description In-memory mirror of the radio's contact table.
 *
 * Confirmed and pending contacts live in two maps keyed by the lowercase hex
 * public key; a write to either replaces what was there. The dirty flag
 * marks the mirror as possibly stale. Only a completed sync clears it, and
 * that sync's watermark bounds the next one to newer records.
 */

import { startsWith, toHex } from "../codec/bytes.js";
import type { ContactId, UnixTimestamp } from "../types/branded.js";
import type { Contact } from "../types/contact.js";
import type { MeshEvent } from "../types/events.js";

export function contactIdOf(publicKey: Uint8Array): ContactId {
  return toHex(publicKey) as ContactId;
}

export class ContactCache {
  private readonly confirmed = new Map<ContactId, Contact>();
  private readonly pending = new Map<ContactId, Contact>();
  private watermark: UnixTimestamp | undefined;
  private dirty = true;

  /** When set, the session re-syncs after advertisements and path updates. */
  autoUpdate = false;

  // ─── Commands ───────────────────────────────────────────────────

  store(contact: Contact): void {
    this.confirmed.set(contact.id, contact);
  }

  remove(id: ContactId): boolean {
    const removed = this.confirmed.delete(id);
    this.pending.delete(id);
    this.dirty = true;
    return removed;
  }

  clear(): void {
    this.confirmed.clear();
    this.pending.clear();
    this.watermark = undefined;
    this.dirty = true;
  }

  addPending(contact: Contact): void {
    this.pending.set(contact.id, contact);
  }

  popPending(id: ContactId): Contact | undefined {
    const contact = this.pending.get(id);
    this.pending.delete(id);
    return contact;
  }

  flushPending(): void {
    this.pending.clear();
  }

  /** Applies a completed sync and records its watermark. */
  updateFromSync(contacts: readonly Contact[], lastModified: UnixTimestamp): void {
    for (const contact of contacts) {
      this.confirmed.set(contact.id, contact);
    }
    this.markClean(lastModified);
  }

  markClean(lastModified: UnixTimestamp): void {
    this.watermark = lastModified;
    this.dirty = false;
  }

  markDirty(): void {
    this.dirty = true;
  }

  /** Folds one inbound event into the mirror. Unrelated events are ignored. */
  trackChanges(event: MeshEvent): void {
    switch (event.type) {
      case "CONTACT":
        this.confirmed.set(event.contact.id, event.contact);
        break;
      case "NEW_CONTACT":
        this.addPending(event.contact);
        this.dirty = true;
        break;
      case "CONTACTS_END":
        this.markClean(event.lastModified);
        break;
      case "ADVERTISEMENT":
      case "PATH_UPDATE":
        this.dirty = true;
        break;
    }
  }

  // ─── Queries ────────────────────────────────────────────────────

  /**
   * Exact matching ignores case. Otherwise the first contact whose name
   * contains `name`, case-insensitively.
   */
  getByName(name: string, exact = false): Contact | undefined {
    const needle = name.toLowerCase();
    for (const contact of this.confirmed.values()) {
      const candidate = contact.name.toLowerCase();
      if (exact ? candidate === needle : candidate.includes(needle)) return contact;
    }
    return undefined;
  }

  /** Compares exactly the supplied prefix (bytes, or hex digits) against each key. */
  getByKeyPrefix(prefix: Uint8Array | string): Contact | undefined {
    if (typeof prefix === "string") {
      const normalized = prefix.toLowerCase();
      for (const contact of this.confirmed.values()) {
        if (contact.id.startsWith(normalized)) return contact;
      }
      return undefined;
    }
    for (const contact of this.confirmed.values()) {
      if (startsWith(contact.publicKey, prefix)) return contact;
    }
    return undefined;
  }

  getByPublicKey(publicKey: Uint8Array): Contact | undefined {
    return this.confirmed.get(contactIdOf(publicKey));
  }

  get contacts(): Contact[] {
    return [...this.confirmed.values()];
  }

  get pendingContacts(): Contact[] {
    return [...this.pending.values()];
  }

  get needsRefresh(): boolean {
    return this.dirty;
  }

  get lastModified(): UnixTimestamp | undefined {
    return this.watermark;
  }

  get isEmpty(): boolean {
    return this.confirmed.size === 0;
  }
}
