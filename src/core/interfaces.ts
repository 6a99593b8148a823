/**
 * Core interfaces for the bridge: the protocol session it consumes and the
 * message store it writes to.
 */

import type EventEmitter from 'eventemitter3';
import type { Chat, Contact, DirectoryContact, Message } from '../dto/messages.js';
import type { MediaKind, MediaReference, ProtocolEvent } from '../dto/events.js';

/**
 * Result of pushing a media blob to the protocol's media servers
 */
export interface UploadedMedia {
  url: string;
  directPath: string;
  mediaKey: Uint8Array;
  fileSha256: Uint8Array;
  fileEncSha256: Uint8Array;
  fileLength: number;
}

interface UploadedContent {
  media: UploadedMedia;
  mimetype: string;
}

export type OutboundContent =
  | { type: 'text'; text: string }
  | (UploadedContent & { type: 'audio'; seconds: number; ptt: boolean })
  | (UploadedContent & { type: 'image'; caption?: string })
  | (UploadedContent & { type: 'video'; caption?: string })
  | (UploadedContent & { type: 'document'; caption?: string; fileName: string });

export type ChatPresence = 'recording' | 'typing' | 'paused';

export interface ProtocolSessionEvents {
  event: (event: ProtocolEvent) => void;
}

/**
 * Pre-authenticated protocol session. Connection, pairing and encryption are
 * owned by the implementation; the bridge only talks to it through this
 * surface.
 */
export interface ProtocolSession {
  readonly events: EventEmitter<ProtocolSessionEvents>;

  /** Our own protocol identifier, once logged in */
  ownId(): string | undefined;
  isConnected(): boolean;
  connect(): Promise<void>;

  sendMessage(recipient: string, content: OutboundContent): Promise<{ id: string }>;
  upload(data: Buffer, kind: MediaKind): Promise<UploadedMedia>;
  download(media: MediaReference): Promise<Buffer>;
  sendChatPresence(chatId: string, presence: ChatPresence): Promise<void>;

  getContact(id: string): Promise<DirectoryContact | undefined>;
  listContacts(): Promise<DirectoryContact[]>;
}

/**
 * Interface for message persistence backends
 */
export interface MessageStore {
  /**
   * Store a message. Storing the same (chatId, messageId) twice overwrites.
   */
  storeMessage(message: Message): Promise<void>;

  /**
   * Messages of a chat, most recent first
   */
  getMessages(chatId: string, limit: number, offset?: number): Promise<Message[]>;

  getMessageById(messageId: string): Promise<Message | null>;

  upsertChat(chat: Chat): Promise<void>;

  /**
   * All chats, most recently active first
   */
  getChats(): Promise<Chat[]>;

  getChat(chatId: string): Promise<Chat | null>;

  /**
   * Chats the contact took part in: its direct chat plus any chat it sent a message to
   */
  getChatsByContact(contactId: string): Promise<Chat[]>;

  getLastMessageWithContact(contactId: string): Promise<Message | null>;

  upsertContact(contact: Contact): Promise<void>;

  /**
   * Case-insensitive substring match on id, display name and push name
   */
  searchContacts(query: string): Promise<Contact[]>;

  isHealthy(): Promise<boolean>;

  getBackendType(): string;

  close(): Promise<void>;
}
