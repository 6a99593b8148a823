/**
 * In-process message store, used when no Redis URL is configured and by tests.
 * Reads hand out copies; stored entries only change through the write methods.
 */

import type { MessageStore } from '../core/interfaces.js';
import type { Chat, Contact, Message } from '../dto/messages.js';

function messageKey(chatId: string, messageId: string): string {
  return `${chatId}\u0000${messageId}`;
}

function byTimeDesc(a: Message, b: Message): number {
  return b.time.getTime() - a.time.getTime();
}

export class MemoryMessageStore implements MessageStore {
  private readonly messages = new Map<string, Message>();
  private readonly chats = new Map<string, Chat>();
  private readonly contacts = new Map<string, Contact>();
  private closed = false;

  async storeMessage(message: Message): Promise<void> {
    this.messages.set(messageKey(message.chatId, message.messageId), { ...message });
  }

  async getMessages(chatId: string, limit: number, offset = 0): Promise<Message[]> {
    return [...this.messages.values()]
      .filter((m) => m.chatId === chatId)
      .sort(byTimeDesc)
      .slice(offset, offset + limit)
      .map((m) => ({ ...m }));
  }

  async getMessageById(messageId: string): Promise<Message | null> {
    for (const message of this.messages.values()) {
      if (message.messageId === messageId) return { ...message };
    }
    return null;
  }

  async upsertChat(chat: Chat): Promise<void> {
    this.chats.set(chat.id, { ...chat });
  }

  async getChats(): Promise<Chat[]> {
    return [...this.chats.values()]
      .sort((a, b) => b.lastMessageTime.getTime() - a.lastMessageTime.getTime())
      .map((c) => ({ ...c }));
  }

  async getChat(chatId: string): Promise<Chat | null> {
    const chat = this.chats.get(chatId);
    return chat ? { ...chat } : null;
  }

  async getChatsByContact(contactId: string): Promise<Chat[]> {
    const chatIds = new Set<string>();
    if (this.chats.has(contactId)) chatIds.add(contactId);
    for (const message of this.messages.values()) {
      if (message.sender === contactId) chatIds.add(message.chatId);
    }

    const chats = await this.getChats();
    return chats.filter((chat) => chatIds.has(chat.id));
  }

  async getLastMessageWithContact(contactId: string): Promise<Message | null> {
    const related = [...this.messages.values()]
      .filter((m) => m.chatId === contactId || m.sender === contactId)
      .sort(byTimeDesc);
    const latest = related[0];
    return latest ? { ...latest } : null;
  }

  async upsertContact(contact: Contact): Promise<void> {
    this.contacts.set(contact.id, { ...contact });
  }

  async searchContacts(query: string): Promise<Contact[]> {
    const needle = query.toLowerCase();
    return [...this.contacts.values()]
      .filter(
        (c) =>
          c.id.toLowerCase().includes(needle) ||
          c.displayName.toLowerCase().includes(needle) ||
          c.pushName.toLowerCase().includes(needle)
      )
      .map((c) => ({ ...c }));
  }

  async isHealthy(): Promise<boolean> {
    return !this.closed;
  }

  getBackendType(): string {
    return 'memory';
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
