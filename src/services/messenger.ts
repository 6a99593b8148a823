import { readFile } from 'node:fs/promises';
import path from 'node:path';
import type { OutboundContent, ProtocolSession } from '../core/interfaces.js';
import { ConnectionError, errorMessage } from '../core/errors.js';
import type { MediaKind } from '../dto/events.js';
import { AUDIO_MESSAGE_CONTENT, VOICE_MESSAGE_CONTENT, type MediaType } from '../dto/messages.js';
import { createLogger } from '../utils/logger.js';
import { withTimeout } from '../utils/timeout.js';
import type { ChatLedger } from './chatLedger.js';
import type { MediaTranscoder } from './mediaTranscoder.js';
import { voiceNoteMimetype } from './mediaTranscoder.js';
import type { UploadRetryManager } from './uploadRetryManager.js';

const FILE_KINDS: Record<string, { kind: MediaKind; mimetype: string }> = {
  '.jpg': { kind: 'image', mimetype: 'image/jpeg' },
  '.jpeg': { kind: 'image', mimetype: 'image/jpeg' },
  '.png': { kind: 'image', mimetype: 'image/png' },
  '.gif': { kind: 'image', mimetype: 'image/gif' },
  '.webp': { kind: 'image', mimetype: 'image/webp' },
  '.mp4': { kind: 'video', mimetype: 'video/mp4' },
  '.avi': { kind: 'video', mimetype: 'video/x-msvideo' },
  '.mov': { kind: 'video', mimetype: 'video/quicktime' },
  '.mkv': { kind: 'video', mimetype: 'video/x-matroska' },
  '.ogg': { kind: 'audio', mimetype: 'audio/ogg; codecs=opus' },
  '.opus': { kind: 'audio', mimetype: 'audio/ogg; codecs=opus' }
};

const DOCUMENT_MIMETYPE = 'application/octet-stream';

export function classifyFile(filePath: string): { kind: MediaKind; mimetype: string } {
  return FILE_KINDS[path.extname(filePath).toLowerCase()] ?? { kind: 'document', mimetype: DOCUMENT_MIMETYPE };
}

/**
 * Outbound sends. Every message that goes out is also written to the ledger
 * as a message from us.
 */
export class Messenger {
  private readonly logger = createLogger('messenger');

  constructor(
    private readonly session: ProtocolSession,
    private readonly ledger: ChatLedger,
    private readonly uploader: UploadRetryManager,
    private readonly transcoder: MediaTranscoder,
    /** Limit for connecting and for each send */
    private readonly timeoutMs = 60_000
  ) {}

  /**
   * Sends a text reply. Failures are logged; the result is the sent message
   * id, or undefined when nothing went out.
   */
  async sendText(chatId: string, text: string): Promise<string | undefined> {
    try {
      await this.ensureConnected();
      const { id } = await this.deliver(chatId, { type: 'text', text });
      await this.recordOutbound(chatId, id, text, 'text');
      this.logger.info({ chatId, messageId: id }, 'Text message sent');
      return id;
    } catch (err) {
      this.logger.error({ chatId, err }, 'Failed to send text message');
      return undefined;
    }
  }

  /**
   * Sends an audio file as a push-to-talk voice note. Throws on failure.
   */
  async sendVoice(chatId: string, filePath: string): Promise<string> {
    await this.ensureConnected();

    const data = await readFile(filePath);
    const seconds = await this.transcoder.durationSeconds(filePath);
    const media = await this.uploader.upload(data, 'audio');
    const { id } = await this.deliver(chatId, {
      type: 'audio',
      media,
      mimetype: voiceNoteMimetype(filePath),
      seconds,
      ptt: true
    });

    await this.recordOutbound(chatId, id, VOICE_MESSAGE_CONTENT, 'voice', path.basename(filePath));
    this.logger.info({ chatId, messageId: id, seconds, size: data.length }, 'Voice message sent');
    return id;
  }

  /**
   * Sends a file as image, video, audio or document depending on its extension.
   */
  async sendFile(chatId: string, filePath: string, caption = ''): Promise<string> {
    await this.ensureConnected();

    const data = await readFile(filePath);
    const { kind, mimetype } = classifyFile(filePath);
    const fileName = path.basename(filePath);
    const media = await this.uploader.upload(data, kind);

    let content: OutboundContent;
    let stored: { text: string; mediaType: MediaType };
    switch (kind) {
      case 'image':
      case 'video':
        content = { type: kind, media, mimetype, caption };
        stored = { text: caption, mediaType: kind };
        break;
      case 'audio':
        content = {
          type: 'audio',
          media,
          mimetype,
          seconds: await this.transcoder.durationSeconds(filePath),
          ptt: false
        };
        stored = { text: AUDIO_MESSAGE_CONTENT, mediaType: 'audio' };
        break;
      case 'document':
        content = { type: 'document', media, mimetype, caption, fileName };
        stored = { text: caption, mediaType: 'document' };
        break;
    }

    const { id } = await this.deliver(chatId, content);
    await this.recordOutbound(chatId, id, stored.text, stored.mediaType, fileName);
    this.logger.info({ chatId, messageId: id, kind }, 'File sent');
    return id;
  }

  private deliver(chatId: string, content: OutboundContent): Promise<{ id: string }> {
    return withTimeout(this.session.sendMessage(chatId, content), this.timeoutMs, 'send');
  }

  private async ensureConnected(): Promise<void> {
    if (this.session.isConnected()) return;
    try {
      await withTimeout(this.session.connect(), this.timeoutMs, 'connect');
    } catch (err) {
      throw new ConnectionError(`Not connected: ${errorMessage(err)}`, { cause: err });
    }
  }

  private recordOutbound(
    chatId: string,
    messageId: string,
    content: string,
    mediaType: MediaType,
    filename?: string
  ): Promise<void> {
    return this.ledger.record({
      time: new Date(),
      sender: this.session.ownId() ?? '',
      content,
      isFromMe: true,
      mediaType,
      ...(filename !== undefined ? { filename } : {}),
      chatId,
      messageId
    });
  }
}
