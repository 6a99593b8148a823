/**
 * Redis-backed message store.
 *
 * Layout (all keys under `prefix`):
 *   msg:{chatId}:{messageId}      hash, one per message
 *   chat:{chatId}:messages        zset of messageIds scored by time
 *   msgid:{messageId}             chatId of the message
 *   sender:{sender}:messages      zset of message hash keys scored by time
 *   sender:{sender}:chats         set of chat ids the sender wrote to
 *   chat:{chatId}                 hash, one per chat
 *   chats                         zset of chat ids scored by last message time
 *   contact:{id}                  hash, one per contact
 *   contacts                      set of contact ids
 */

import type { Redis } from 'ioredis';
import { z } from 'zod';
import type { MessageStore } from '../core/interfaces.js';
import type { Chat, Contact, Message } from '../dto/messages.js';
import { createLogger } from '../utils/logger.js';

const flagSchema = z.enum(['0', '1']).transform((v) => v === '1');

const messageHashSchema = z.object({
  time: z.coerce.number(),
  sender: z.string(),
  content: z.string(),
  isFromMe: flagSchema,
  mediaType: z.enum(['text', 'image', 'video', 'audio', 'voice', 'document', 'unknown']),
  filename: z.string().optional(),
  chatId: z.string(),
  messageId: z.string()
});

const chatHashSchema = z.object({
  id: z.string(),
  displayName: z.string(),
  lastMessage: z.string(),
  lastMessageTime: z.coerce.number(),
  isGroup: flagSchema
});

const contactHashSchema = z.object({
  id: z.string(),
  displayName: z.string(),
  pushName: z.string(),
  isGroup: flagSchema,
  isBlocked: flagSchema
});

const flag = (value: boolean): string => (value ? '1' : '0');

function toMessage(raw: unknown): Message | null {
  const parsed = messageHashSchema.safeParse(raw);
  if (!parsed.success) return null;
  const { time, filename, ...rest } = parsed.data;
  return { ...rest, time: new Date(time), ...(filename !== undefined ? { filename } : {}) };
}

function toChat(raw: unknown): Chat | null {
  const parsed = chatHashSchema.safeParse(raw);
  if (!parsed.success) return null;
  return { ...parsed.data, lastMessageTime: new Date(parsed.data.lastMessageTime) };
}

function toContact(raw: unknown): Contact | null {
  const parsed = contactHashSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

export class RedisMessageStore implements MessageStore {
  private readonly logger = createLogger('redisMessageStore');

  constructor(
    private readonly redis: Redis,
    private readonly prefix = 'bridge:'
  ) {}

  private key(...parts: string[]): string {
    return this.prefix + parts.join(':');
  }

  private messageHashKey(chatId: string, messageId: string): string {
    return this.key('msg', chatId, messageId);
  }

  async storeMessage(message: Message): Promise<void> {
    const hashKey = this.messageHashKey(message.chatId, message.messageId);
    const score = message.time.getTime();
    const fields: Record<string, string> = {
      time: String(score),
      sender: message.sender,
      content: message.content,
      isFromMe: flag(message.isFromMe),
      mediaType: message.mediaType,
      chatId: message.chatId,
      messageId: message.messageId
    };
    if (message.filename !== undefined) {
      fields.filename = message.filename;
    }

    const previousSender = await this.redis.hget(hashKey, 'sender');

    const tx = this.redis.multi();
    if (previousSender !== null && previousSender !== message.sender) {
      tx.zrem(this.key('sender', previousSender, 'messages'), hashKey);
    }
    await tx
      .del(hashKey)
      .hset(hashKey, fields)
      .zadd(this.key('chat', message.chatId, 'messages'), score, message.messageId)
      .set(this.key('msgid', message.messageId), message.chatId)
      .zadd(this.key('sender', message.sender, 'messages'), score, hashKey)
      .sadd(this.key('sender', message.sender, 'chats'), message.chatId)
      .exec();
  }

  private async readHashes(keys: string[]): Promise<unknown[]> {
    if (keys.length === 0) return [];
    const pipeline = this.redis.pipeline();
    for (const k of keys) pipeline.hgetall(k);
    const results = (await pipeline.exec()) ?? [];
    return results.map(([err, value]) => {
      if (err) {
        this.logger.warn({ err }, 'Failed to read hash');
        return null;
      }
      return value;
    });
  }

  async getMessages(chatId: string, limit: number, offset = 0): Promise<Message[]> {
    if (limit <= 0) return [];
    const ids = await this.redis.zrevrange(this.key('chat', chatId, 'messages'), offset, offset + limit - 1);
    const hashes = await this.readHashes(ids.map((id) => this.messageHashKey(chatId, id)));
    return hashes.map(toMessage).filter((m): m is Message => m !== null);
  }

  async getMessageById(messageId: string): Promise<Message | null> {
    const chatId = await this.redis.get(this.key('msgid', messageId));
    if (!chatId) return null;
    return toMessage(await this.redis.hgetall(this.messageHashKey(chatId, messageId)));
  }

  async upsertChat(chat: Chat): Promise<void> {
    const score = chat.lastMessageTime.getTime();
    await this.redis
      .multi()
      .hset(this.key('chat', chat.id), {
        id: chat.id,
        displayName: chat.displayName,
        lastMessage: chat.lastMessage,
        lastMessageTime: String(score),
        isGroup: flag(chat.isGroup)
      })
      .zadd(this.key('chats'), score, chat.id)
      .exec();
  }

  private async readChats(ids: string[]): Promise<Chat[]> {
    const hashes = await this.readHashes(ids.map((id) => this.key('chat', id)));
    return hashes.map(toChat).filter((c): c is Chat => c !== null);
  }

  async getChats(): Promise<Chat[]> {
    return this.readChats(await this.redis.zrevrange(this.key('chats'), 0, -1));
  }

  async getChat(chatId: string): Promise<Chat | null> {
    return toChat(await this.redis.hgetall(this.key('chat', chatId)));
  }

  async getChatsByContact(contactId: string): Promise<Chat[]> {
    const ids = new Set(await this.redis.smembers(this.key('sender', contactId, 'chats')));
    ids.add(contactId);
    const chats = await this.readChats([...ids]);
    return chats.sort((a, b) => b.lastMessageTime.getTime() - a.lastMessageTime.getTime());
  }

  async getLastMessageWithContact(contactId: string): Promise<Message | null> {
    const [directId] = await this.redis.zrevrange(this.key('chat', contactId, 'messages'), 0, 0);
    const [sentKey] = await this.redis.zrevrange(this.key('sender', contactId, 'messages'), 0, 0);

    const candidates = await this.readHashes([
      ...(directId ? [this.messageHashKey(contactId, directId)] : []),
      ...(sentKey ? [sentKey] : [])
    ]);

    let latest: Message | null = null;
    for (const message of candidates.map(toMessage)) {
      if (message && (!latest || message.time > latest.time)) {
        latest = message;
      }
    }
    return latest;
  }

  async upsertContact(contact: Contact): Promise<void> {
    await this.redis
      .multi()
      .hset(this.key('contact', contact.id), {
        id: contact.id,
        displayName: contact.displayName,
        pushName: contact.pushName,
        isGroup: flag(contact.isGroup),
        isBlocked: flag(contact.isBlocked)
      })
      .sadd(this.key('contacts'), contact.id)
      .exec();
  }

  async searchContacts(query: string): Promise<Contact[]> {
    const ids = await this.redis.smembers(this.key('contacts'));
    const hashes = await this.readHashes(ids.map((id) => this.key('contact', id)));
    const needle = query.toLowerCase();
    return hashes
      .map(toContact)
      .filter((c): c is Contact => c !== null)
      .filter(
        (c) =>
          c.id.toLowerCase().includes(needle) ||
          c.displayName.toLowerCase().includes(needle) ||
          c.pushName.toLowerCase().includes(needle)
      );
  }

  async isHealthy(): Promise<boolean> {
    try {
      return (await this.redis.ping()) === 'PONG';
    } catch (err) {
      this.logger.warn({ err }, 'Redis health check failed');
      return false;
    }
  }

  getBackendType(): string {
    return 'redis';
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }
}
