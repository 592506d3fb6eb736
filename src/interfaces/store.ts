/**
 * @module interfaces/store
 * @description MeshStore: optional persistence collaborator.
 *
 * The session hands it fully decoded records as they arrive. The schema
 * behind it is the application's business.
 */

import type { ContactId } from "../types/branded.js";
import type { Contact } from "../types/contact.js";
import type { ChannelInfo } from "../types/device.js";
import type { ChannelMessage, ContactMessage } from "../types/events.js";

export type StoredMessage =
  | {
      readonly kind: "direct";
      /** Resolved sender, when the prefix matched a cached contact. */
      readonly contactId?: ContactId;
      readonly message: ContactMessage;
      readonly receivedAt: number;
    }
  | {
      readonly kind: "channel";
      readonly message: ChannelMessage;
      readonly receivedAt: number;
    };

export interface MeshStore {
  saveContact(contact: Contact): void | Promise<void>;
  saveMessage(record: StoredMessage): void | Promise<void>;
  saveChannel(channel: ChannelInfo): void | Promise<void>;
}
