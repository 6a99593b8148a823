import type { MessageStore, ProtocolSession } from '../core/interfaces.js';
import type { Contact, DirectoryContact } from '../dto/messages.js';
import { isGroupJid } from '../utils/jid.js';
import { createLogger } from '../utils/logger.js';

function matches(entry: DirectoryContact, needle: string): boolean {
  return [entry.fullName, entry.pushName, entry.id].some(
    (value) => value !== undefined && value.toLowerCase().includes(needle)
  );
}

function fromDirectory(entry: DirectoryContact): Contact {
  return {
    id: entry.id,
    displayName: entry.fullName ?? '',
    pushName: entry.pushName ?? '',
    isGroup: isGroupJid(entry.id),
    isBlocked: false
  };
}

/**
 * Contact search over the local store and the live protocol directory.
 * Local entries win; directory entries only fill in ids the store lacks.
 */
export class ContactDirectory {
  private readonly logger = createLogger('contactDirectory');

  constructor(
    private readonly store: MessageStore,
    private readonly session: ProtocolSession
  ) {}

  async search(query: string): Promise<Contact[]> {
    const local = await this.store.searchContacts(query);

    let directory: DirectoryContact[];
    try {
      directory = await this.session.listContacts();
    } catch (err) {
      this.logger.warn({ err }, 'Directory lookup failed, returning stored contacts only');
      return local;
    }

    const needle = query.toLowerCase();
    const merged = new Map(local.map((c) => [c.id, c]));
    for (const entry of directory) {
      if (!merged.has(entry.id) && matches(entry, needle)) {
        merged.set(entry.id, fromDirectory(entry));
      }
    }
    return [...merged.values()];
  }
}
