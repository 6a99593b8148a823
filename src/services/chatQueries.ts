import type { MessageStore } from '../core/interfaces.js';
import type { Chat, Message } from '../dto/messages.js';

/** How far back in a chat `getMessageContext` looks for the target */
const CONTEXT_SCAN_LIMIT = 500;

/**
 * Read side over the message store.
 */
export class ChatQueries {
  constructor(private readonly store: MessageStore) {}

  listChats(): Promise<Chat[]> {
    return this.store.getChats();
  }

  getChat(chatId: string): Promise<Chat | null> {
    return this.store.getChat(chatId);
  }

  /** A direct chat's id is the contact's id */
  getDirectChat(contactId: string): Promise<Chat | null> {
    return this.store.getChat(contactId);
  }

  listMessages(chatId: string, limit: number, offset = 0): Promise<Message[]> {
    return this.store.getMessages(chatId, limit, offset);
  }

  getChatsByContact(contactId: string): Promise<Chat[]> {
    return this.store.getChatsByContact(contactId);
  }

  getLastInteraction(contactId: string): Promise<Message | null> {
    return this.store.getLastMessageWithContact(contactId);
  }

  /**
   * Up to `size` messages on each side of the target, most recent first.
   * Undefined when the message is unknown.
   */
  async getMessageContext(messageId: string, size: number): Promise<Message[] | undefined> {
    const target = await this.store.getMessageById(messageId);
    if (!target) return undefined;

    const recent = await this.store.getMessages(target.chatId, CONTEXT_SCAN_LIMIT, 0);
    const index = recent.findIndex((m) => m.messageId === messageId);
    if (index === -1) return [target];

    return recent.slice(Math.max(0, index - size), index + size + 1);
  }
}
