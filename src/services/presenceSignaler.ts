import type { ChatPresence, ProtocolSession } from '../core/interfaces.js';
import { ConnectionError, errorMessage } from '../core/errors.js';
import { createLogger } from '../utils/logger.js';
import { withTimeout } from '../utils/timeout.js';

/**
 * Chat-state indicators (recording / typing / paused). Every call is best
 * effort: failures are logged and reported as `false`.
 */
export class PresenceSignaler {
  private readonly logger = createLogger('presenceSignaler');

  constructor(
    private readonly session: ProtocolSession,
    private readonly timeoutMs = 60_000
  ) {}

  setRecording(chatId: string): Promise<boolean> {
    return this.signal(chatId, 'recording');
  }

  setTyping(chatId: string): Promise<boolean> {
    return this.signal(chatId, 'typing');
  }

  clear(chatId: string): Promise<boolean> {
    return this.signal(chatId, 'paused');
  }

  private async signal(chatId: string, presence: ChatPresence): Promise<boolean> {
    if (!this.session.isConnected()) {
      try {
        await withTimeout(this.session.connect(), this.timeoutMs, 'connect');
      } catch (err) {
        const error = new ConnectionError(`Reconnect failed: ${errorMessage(err)}`, { cause: err });
        this.logger.warn({ chatId, presence, err: error }, 'Cannot signal presence while disconnected');
        return false;
      }
    }

    try {
      await withTimeout(this.session.sendChatPresence(chatId, presence), this.timeoutMs, 'presence');
      this.logger.debug({ chatId, presence }, 'Chat presence sent');
      return true;
    } catch (err) {
      this.logger.warn({ chatId, presence, err }, 'Failed to send chat presence');
      return false;
    }
  }
}
