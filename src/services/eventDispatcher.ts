/**
 * Event Dispatcher
 * Entry point for protocol events: classifies, persists and hands each one
 * to its handler without blocking the transport.
 */

import EventEmitter from 'eventemitter3';
import type { MessageEvent, MessageInfo, MessagePayload, ProtocolEvent } from '../dto/events.js';
import {
  AUDIO_MESSAGE_CONTENT,
  UNKNOWN_MESSAGE_CONTENT,
  VOICE_MESSAGE_CONTENT,
  type Message
} from '../dto/messages.js';
import { KeyedSequencer } from '../utils/keyedSequencer.js';
import { createLogger } from '../utils/logger.js';
import type { ChatLedger } from './chatLedger.js';
import type { TextHandler } from './textHandler.js';
import type { VoicePipeline, VoicePipelineReport } from './voicePipeline.js';

export interface DispatchedEvent {
  kind: ProtocolEvent['kind'];
  messageId?: string;
  chatId?: string;
}

export interface DispatcherEvents {
  'event:handled': (event: DispatchedEvent) => void;
  'event:failed': (event: DispatchedEvent, error: unknown) => void;
  'pipeline:completed': (report: VoicePipelineReport) => void;
}

export interface EventDispatcherDeps {
  ledger: ChatLedger;
  textHandler: TextHandler;
  voicePipeline: VoicePipeline;
}

/**
 * The stored form of an inbound message
 */
export function toStoredMessage(info: MessageInfo, payload: MessagePayload): Message {
  const base = {
    time: info.timestamp,
    sender: info.sender,
    isFromMe: info.isFromMe,
    chatId: info.chatId,
    messageId: info.id
  };

  switch (payload.type) {
    case 'text':
    case 'extendedText':
      return { ...base, content: payload.text, mediaType: 'text' };
    case 'image':
    case 'video':
      return { ...base, content: payload.caption ?? '', mediaType: payload.type };
    case 'audio':
      return payload.ptt
        ? { ...base, content: VOICE_MESSAGE_CONTENT, mediaType: 'voice' }
        : { ...base, content: AUDIO_MESSAGE_CONTENT, mediaType: 'audio' };
    case 'document':
      return {
        ...base,
        content: payload.caption ?? '',
        mediaType: 'document',
        ...(payload.fileName !== undefined ? { filename: payload.fileName } : {})
      };
    case 'unknown':
      return { ...base, content: UNKNOWN_MESSAGE_CONTENT, mediaType: 'unknown' };
  }
}

function describe(event: ProtocolEvent): DispatchedEvent {
  if (event.kind === 'message') {
    return { kind: event.kind, messageId: event.info.id, chatId: event.info.chatId };
  }
  return { kind: event.kind };
}

export class EventDispatcher extends EventEmitter<DispatcherEvents> {
  private readonly logger = createLogger('eventDispatcher');
  private readonly inFlight = new Set<Promise<void>>();
  /** Replies for one chat, text and voice alike, run one at a time */
  private readonly replyLanes = new KeyedSequencer();

  constructor(private readonly deps: EventDispatcherDeps) {
    super();
  }

  /**
   * Starts handling `event` and returns immediately. Never throws.
   */
  dispatch(event: ProtocolEvent): void {
    const summary = describe(event);

    let work: Promise<void>;
    try {
      work = this.route(event);
    } catch (err) {
      work = Promise.reject(err);
    }

    const tracked = work
      .then(
        () => {
          this.emit('event:handled', summary);
        },
        (err: unknown) => {
          this.logger.error({ ...summary, err }, 'Event handler failed');
          this.emit('event:failed', summary, err);
        }
      )
      .catch((err: unknown) => {
        this.logger.error({ ...summary, err }, 'Dispatcher listener threw');
      })
      .finally(() => {
        this.inFlight.delete(tracked);
      });

    this.inFlight.add(tracked);
  }

  get inFlightCount(): number {
    return this.inFlight.size;
  }

  /**
   * Resolves once every handler started so far, and any started meanwhile,
   * has settled.
   */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight]);
    }
  }

  private route(event: ProtocolEvent): Promise<void> {
    switch (event.kind) {
      case 'message':
        return this.handleMessage(event);
      case 'receipt':
        this.logger.debug(
          { chatId: event.chatId, receiptType: event.receiptType, messageIds: event.messageIds },
          'Receipt received'
        );
        return Promise.resolve();
      case 'presence':
        this.logger.debug(
          { from: event.from, unavailable: event.unavailable, lastSeen: event.lastSeen },
          'Presence update'
        );
        return Promise.resolve();
      case 'other':
        this.logger.debug({ name: event.name }, 'Ignoring protocol event');
        return Promise.resolve();
    }
  }

  /**
   * The ledger write and the reply are both queued synchronously, so for
   * one chat writes, presence updates and sends keep dispatch order.
   */
  private handleMessage(event: MessageEvent): Promise<void> {
    const { info, payload } = event;
    const message = toStoredMessage(info, payload);
    this.logger.info(
      { chatId: info.chatId, messageId: info.id, mediaType: message.mediaType, fromMe: info.isFromMe },
      'Message received'
    );

    const persisted = this.deps.ledger.record(message, info.pushName ? { pushName: info.pushName } : {});

    switch (payload.type) {
      case 'text':
      case 'extendedText':
        return this.replyLanes.run(info.chatId, async () => {
          await persisted;
          await this.deps.textHandler.handle(info, payload.text);
        });
      case 'audio':
        if (!payload.ptt || info.isFromMe) {
          return persisted;
        }
        return this.replyLanes.run(info.chatId, async () => {
          await persisted;
          const report = await this.deps.voicePipeline.process(info, payload);
          this.emit('pipeline:completed', report);
        });
      case 'image':
      case 'video':
      case 'document':
      case 'unknown':
        return persisted;
    }
  }
}
