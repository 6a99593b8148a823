import type { MessageInfo } from '../dto/events.js';
import { createLogger } from '../utils/logger.js';
import type { InferenceClient } from './inferenceClient.js';
import type { Messenger } from './messenger.js';
import type { PresenceSignaler } from './presenceSignaler.js';

export const HELP_REPLY = 'Available commands:\n/help - Show this help\n/ping - Test connection\n/time - Get current time';
export const PING_REPLY = 'Pong! 🏓';
export const GREETING_REPLY = 'Hello! 👋 How can I help you?';
export const TEXT_FALLBACK_REPLY =
  "Sorry, I'm having trouble processing your message right now. Please try again later.";

export type TextIntent =
  | { kind: 'help' }
  | { kind: 'ping' }
  | { kind: 'time' }
  | { kind: 'greeting' }
  | { kind: 'agent' };

export type TextOutcome = 'skipped' | TextIntent['kind'] | 'fallback';

const pad = (n: number): string => String(n).padStart(2, '0');

/**
 * `YYYY-MM-DD HH:mm:ss` in local time
 */
export function formatLocalTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export function classifyText(content: string): TextIntent {
  const text = content.trim().toLowerCase();
  if (text.startsWith('/help')) return { kind: 'help' };
  if (text.startsWith('/ping')) return { kind: 'ping' };
  if (text.startsWith('/time')) return { kind: 'time' };
  // Plain substring match, so "this" or "which" count as greetings too
  if (text.includes('hello') || text.includes('hi')) return { kind: 'greeting' };
  return { kind: 'agent' };
}

export class TextHandler {
  private readonly logger = createLogger('textHandler');

  constructor(
    private readonly messenger: Messenger,
    private readonly inference: InferenceClient,
    private readonly presence: PresenceSignaler,
    private readonly now: () => Date = () => new Date()
  ) {}

  async handle(info: MessageInfo, content: string): Promise<TextOutcome> {
    if (info.isFromMe) {
      return 'skipped';
    }

    const chatId = info.chatId;
    const intent = classifyText(content);

    switch (intent.kind) {
      case 'help':
        await this.messenger.sendText(chatId, HELP_REPLY);
        return 'help';
      case 'ping':
        await this.messenger.sendText(chatId, PING_REPLY);
        return 'ping';
      case 'time':
        await this.messenger.sendText(chatId, `Current time: ${formatLocalTimestamp(this.now())}`);
        return 'time';
      case 'greeting':
        await this.messenger.sendText(chatId, GREETING_REPLY);
        return 'greeting';
      case 'agent':
        return this.askAgent(chatId, info.id, content);
    }
  }

  private async askAgent(chatId: string, messageId: string, content: string): Promise<TextOutcome> {
    await this.presence.setTyping(chatId);
    try {
      const { agent_response: reply } = await this.inference.textChat(content);
      if (!reply.trim()) {
        this.logger.warn({ chatId, messageId }, 'Agent returned an empty reply');
        await this.messenger.sendText(chatId, TEXT_FALLBACK_REPLY);
        return 'fallback';
      }
      await this.messenger.sendText(chatId, reply);
      return 'agent';
    } catch (err) {
      this.logger.error({ chatId, messageId, err }, 'Text chat failed');
      await this.messenger.sendText(chatId, TEXT_FALLBACK_REPLY);
      return 'fallback';
    } finally {
      await this.presence.clear(chatId);
    }
  }
}
