/**
 * Wires the protocol session to the handlers: one dispatcher fed by the
 * session's `event` stream, plus the services the HTTP API reads from.
 */

import type { AxiosAdapter } from 'axios';
import type { BridgeConfig } from './config.js';
import type { MessageStore, ProtocolSession } from './core/interfaces.js';
import type { ProtocolEvent } from './dto/events.js';
import { ChatLedger } from './services/chatLedger.js';
import { ChatQueries } from './services/chatQueries.js';
import { ContactDirectory } from './services/contactDirectory.js';
import { EventDispatcher } from './services/eventDispatcher.js';
import { InferenceClient } from './services/inferenceClient.js';
import { MediaTranscoder, type CommandRunner } from './services/mediaTranscoder.js';
import { Messenger } from './services/messenger.js';
import { PresenceSignaler } from './services/presenceSignaler.js';
import { TextHandler } from './services/textHandler.js';
import { UploadRetryManager } from './services/uploadRetryManager.js';
import { VoicePipeline } from './services/voicePipeline.js';
import { MemoryMessageStore } from './storage/memoryMessageStore.js';
import { createLogger } from './utils/logger.js';

export interface BridgeOptions {
  session: ProtocolSession;
  config: BridgeConfig;
  /** Defaults to an in-memory store */
  store?: MessageStore;
  /** Transport override for the inference backend */
  inferenceAdapter?: AxiosAdapter;
  /** Runs ffmpeg / ffprobe; defaults to child processes */
  commandRunner?: CommandRunner;
  /** Pause between upload attempts */
  sleep?: (ms: number) => Promise<void>;
}

export class Bridge {
  private readonly logger = createLogger('bridge');
  private readonly onEvent = (event: ProtocolEvent): void => this.dispatcher.dispatch(event);
  private started = false;

  readonly session: ProtocolSession;
  readonly store: MessageStore;
  readonly inference: InferenceClient;
  readonly transcoder: MediaTranscoder;
  readonly uploader: UploadRetryManager;
  readonly presence: PresenceSignaler;
  readonly ledger: ChatLedger;
  readonly messenger: Messenger;
  readonly textHandler: TextHandler;
  readonly voicePipeline: VoicePipeline;
  readonly dispatcher: EventDispatcher;
  readonly contacts: ContactDirectory;
  readonly queries: ChatQueries;

  constructor(options: BridgeOptions) {
    const { session, config } = options;

    this.session = session;
    this.store = options.store ?? new MemoryMessageStore();
    this.inference = new InferenceClient({
      baseUrl: config.voiceApiBaseUrl,
      timeoutMs: config.inferenceTimeoutMs,
      ...(options.inferenceAdapter ? { adapter: options.inferenceAdapter } : {})
    });
    this.transcoder = new MediaTranscoder({
      ffmpegPath: config.ffmpegPath,
      ffprobePath: config.ffprobePath,
      timeoutMs: config.stageTimeoutMs,
      ...(options.commandRunner ? { runner: options.commandRunner } : {})
    });
    this.uploader = new UploadRetryManager(session, {
      maxAttempts: config.upload.maxAttempts,
      delayMs: config.upload.delayMs,
      timeoutMs: config.stageTimeoutMs,
      ...(options.sleep ? { sleep: options.sleep } : {})
    });
    this.presence = new PresenceSignaler(session, config.stageTimeoutMs);
    this.ledger = new ChatLedger(this.store, session);
    this.messenger = new Messenger(session, this.ledger, this.uploader, this.transcoder, config.stageTimeoutMs);
    this.textHandler = new TextHandler(this.messenger, this.inference, this.presence);
    this.voicePipeline = new VoicePipeline(
      {
        session,
        inference: this.inference,
        transcoder: this.transcoder,
        messenger: this.messenger,
        presence: this.presence
      },
      {
        mediaDir: config.mediaDir,
        convertToIntermediate: config.convertToIntermediate,
        keepTempFiles: config.keepTempAudioFiles,
        stageTimeoutMs: config.stageTimeoutMs
      }
    );
    this.dispatcher = new EventDispatcher({
      ledger: this.ledger,
      textHandler: this.textHandler,
      voicePipeline: this.voicePipeline
    });
    this.contacts = new ContactDirectory(this.store, session);
    this.queries = new ChatQueries(this.store);
  }

  /**
   * Subscribes to the session's events. Idempotent.
   */
  start(): void {
    if (this.started) return;
    this.session.events.on('event', this.onEvent);
    this.started = true;
    this.logger.info({ store: this.store.getBackendType() }, 'Bridge started');
  }

  /**
   * Stops taking events and waits for in-flight handlers.
   */
  async stop(): Promise<void> {
    if (this.started) {
      this.session.events.off('event', this.onEvent);
      this.started = false;
    }
    await this.dispatcher.drain();
    this.logger.info('Bridge stopped');
  }
}
