import type { MessageStore, ProtocolSession } from '../core/interfaces.js';
import { PersistenceError, errorMessage } from '../core/errors.js';
import type { Chat, Message } from '../dto/messages.js';
import { isGroupJid } from '../utils/jid.js';
import { KeyedSequencer } from '../utils/keyedSequencer.js';
import { createLogger } from '../utils/logger.js';

export interface RecordOptions {
  /** Sender's self-chosen name, saved as a local contact when present */
  pushName?: string;
}

/**
 * Writes messages and keeps the chat list current.
 *
 * Writes for one chat are applied in the order `record` was called, so the
 * chat's last message always reflects the most recently dispatched event.
 * Failures are logged and never propagate to the caller.
 */
export class ChatLedger {
  private readonly logger = createLogger('chatLedger');
  private readonly sequencer = new KeyedSequencer();

  constructor(
    private readonly store: MessageStore,
    private readonly session: ProtocolSession
  ) {}

  record(message: Message, options: RecordOptions = {}): Promise<void> {
    return this.sequencer.run(message.chatId, () => this.write(message, options));
  }

  private async write(message: Message, options: RecordOptions): Promise<void> {
    const log = { chatId: message.chatId, messageId: message.messageId };

    try {
      await this.store.storeMessage(message);
    } catch (err) {
      const error = new PersistenceError(`Failed to store message: ${errorMessage(err)}`, { cause: err });
      this.logger.error({ ...log, err: error }, 'Message not stored');
    }

    try {
      await this.store.upsertChat(await this.chatFor(message));
    } catch (err) {
      const error = new PersistenceError(`Failed to update chat: ${errorMessage(err)}`, { cause: err });
      this.logger.error({ ...log, err: error }, 'Chat not updated');
    }

    if (options.pushName && !message.isFromMe) {
      await this.rememberContact(message.sender, options.pushName);
    }
  }

  private async chatFor(message: Message): Promise<Chat> {
    const isGroup = isGroupJid(message.chatId);
    return {
      id: message.chatId,
      displayName: isGroup ? message.chatId : await this.directoryName(message.chatId),
      lastMessage: message.content,
      lastMessageTime: message.time,
      isGroup
    };
  }

  private async directoryName(chatId: string): Promise<string> {
    try {
      const contact = await this.session.getContact(chatId);
      return contact?.fullName || chatId;
    } catch (err) {
      this.logger.debug({ chatId, err }, 'Directory lookup failed');
      return chatId;
    }
  }

  private async rememberContact(id: string, pushName: string): Promise<void> {
    try {
      await this.store.upsertContact({
        id,
        displayName: pushName,
        pushName,
        isGroup: isGroupJid(id),
        isBlocked: false
      });
    } catch (err) {
      this.logger.warn({ contactId: id, err }, 'Failed to save contact');
    }
  }
}
