/**
 * Voice note → agent → voice note.
 *
 *   idle → downloading → converting → conversationReset → inferring →
 *   responseDecoding → responseTranscoding → sending → cleanup → done
 *
 * `error` is reachable from the fatal stages (downloading, inferring) and
 * is followed by cleanup. Failures after inference degrade to a text reply
 * carrying the agent's answer instead.
 */

import { mkdir, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { v4 as uuidv4 } from 'uuid';
import { BridgeError, DownloadError, InferenceError, errorMessage } from '../core/errors.js';
import type { ProtocolSession } from '../core/interfaces.js';
import type { MediaReference, MessageInfo, MessagePayload } from '../dto/events.js';
import { KeyedSequencer } from '../utils/keyedSequencer.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { withTimeout } from '../utils/timeout.js';
import type { InferenceClient, VoiceCompleteResponse } from './inferenceClient.js';
import { COMPRESSED_VOICE_EXTENSIONS, replaceExtension, type MediaTranscoder } from './mediaTranscoder.js';
import type { Messenger } from './messenger.js';
import type { PresenceSignaler } from './presenceSignaler.js';

export const DOWNLOAD_FAILED_REPLY = "Sorry, I couldn't download your voice message. Please try again.";
export const VOICE_FALLBACK_REPLY =
  "Sorry, I'm having trouble processing your voice message right now. Please try again later.";

export type VoiceState =
  | 'idle'
  | 'downloading'
  | 'converting'
  | 'conversationReset'
  | 'inferring'
  | 'responseDecoding'
  | 'responseTranscoding'
  | 'sending'
  | 'cleanup'
  | 'done'
  | 'error';

/**
 * `voice`: the agent answered with a voice note.
 * `agent-text`: the agent's answer went out as text.
 * `fallback`: a canned apology went out.
 */
export type VoiceOutcome = 'voice' | 'agent-text' | 'fallback';

export interface VoicePipelineReport {
  chatId: string;
  messageId: string;
  state: 'done' | 'error';
  transitions: VoiceState[];
  outcome: VoiceOutcome;
  error?: BridgeError;
}

export type AudioPayload = Extract<MessagePayload, { type: 'audio' }>;

export interface VoicePipelineOptions {
  mediaDir: string;
  /** Convert compressed voice notes to WAV before submitting them */
  convertToIntermediate: boolean;
  keepTempFiles: boolean;
  stageTimeoutMs: number;
}

export interface VoicePipelineDeps {
  session: ProtocolSession;
  inference: InferenceClient;
  transcoder: MediaTranscoder;
  messenger: Messenger;
  presence: PresenceSignaler;
}

const EXTENSIONS_BY_MIMETYPE: Record<string, string> = {
  'audio/ogg': '.ogg',
  'audio/opus': '.opus',
  'audio/mpeg': '.mp3',
  'audio/mp4': '.m4a',
  'audio/aac': '.aac',
  'audio/wav': '.wav',
  'audio/x-wav': '.wav',
  'audio/amr': '.amr',
  'audio/3gpp': '.3gp'
};

export function extensionForMimetype(mimetype?: string): string {
  const base = mimetype?.split(';')[0]?.trim().toLowerCase() ?? '';
  return EXTENSIONS_BY_MIMETYPE[base] ?? '.ogg';
}

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * Standard base64 with padding; line breaks are ignored, anything else
 * outside the alphabet is rejected.
 */
export function decodeBase64Strict(input: string): Buffer {
  const compact = input.replace(/[\r\n]/g, '');
  if (compact.length === 0 || compact.length % 4 !== 0 || !BASE64_PATTERN.test(compact)) {
    throw new InferenceError('Response audio is not valid base64');
  }
  return Buffer.from(compact, 'base64');
}

class PipelineRun {
  readonly transitions: VoiceState[] = ['idle'];
  readonly tempFiles: string[] = [];

  constructor(
    readonly chatId: string,
    readonly messageId: string,
    private readonly logger: Logger
  ) {}

  enter(state: VoiceState): void {
    this.transitions.push(state);
    this.logger.debug({ chatId: this.chatId, messageId: this.messageId, state }, 'Voice pipeline state');
  }
}

export class VoicePipeline {
  private readonly logger = createLogger('voicePipeline');
  private readonly lanes = new KeyedSequencer();

  constructor(
    private readonly deps: VoicePipelineDeps,
    private readonly options: VoicePipelineOptions
  ) {}

  /**
   * Queues the voice note behind any pipeline already running for the chat.
   */
  process(info: MessageInfo, payload: AudioPayload): Promise<VoicePipelineReport> {
    return this.lanes.run(info.chatId, () => this.execute(info, payload.media));
  }

  private async execute(info: MessageInfo, media: MediaReference): Promise<VoicePipelineReport> {
    const { presence, messenger } = this.deps;
    const run = new PipelineRun(info.chatId, info.id, this.logger);
    const log = { chatId: info.chatId, messageId: info.id };

    this.logger.info(log, 'Voice pipeline started');
    await presence.setRecording(info.chatId);

    let outcome: VoiceOutcome;
    let failure: BridgeError | undefined;

    try {
      run.enter('downloading');
      const downloaded = await this.download(info, media, run);

      run.enter('converting');
      const submitted = await this.convert(downloaded, run);

      run.enter('conversationReset');
      await this.resetConversation();

      run.enter('inferring');
      const response = await this.infer(submitted);
      this.logger.info({ ...log, transcript: response.transcript }, 'Voice message transcribed');

      outcome = await this.respond(response, run);
    } catch (err) {
      failure =
        err instanceof BridgeError
          ? err
          : new InferenceError(`Voice pipeline failed: ${errorMessage(err)}`, undefined, undefined, { cause: err });
      run.enter('error');
      this.logger.error({ ...log, err: failure }, 'Voice pipeline failed');

      await presence.clear(info.chatId);
      await messenger.sendText(info.chatId, failure instanceof DownloadError ? DOWNLOAD_FAILED_REPLY : VOICE_FALLBACK_REPLY);
      outcome = 'fallback';
    }

    run.enter('cleanup');
    await this.cleanup(run);
    await presence.clear(info.chatId);

    if (!failure) {
      run.enter('done');
    }
    this.logger.info({ ...log, outcome, state: failure ? 'error' : 'done' }, 'Voice pipeline finished');

    return {
      chatId: info.chatId,
      messageId: info.id,
      state: failure ? 'error' : 'done',
      transitions: run.transitions,
      outcome,
      ...(failure ? { error: failure } : {})
    };
  }

  private async download(info: MessageInfo, media: MediaReference, run: PipelineRun): Promise<string> {
    try {
      const data = await withTimeout(this.deps.session.download(media), this.options.stageTimeoutMs, 'download');
      await mkdir(this.options.mediaDir, { recursive: true });

      const safeId = info.id.replace(/[^A-Za-z0-9_-]/g, '_');
      const filePath = path.join(
        this.options.mediaDir,
        `voice_${safeId}_${uuidv4()}${extensionForMimetype(media.mimetype)}`
      );
      // registered before writing so a partial file is still removed
      run.tempFiles.push(filePath);
      await writeFile(filePath, data);
      this.logger.debug({ chatId: info.chatId, filePath, size: data.length }, 'Voice message downloaded');
      return filePath;
    } catch (err) {
      throw new DownloadError(`Failed to download voice message: ${errorMessage(err)}`, { cause: err });
    }
  }

  private async convert(filePath: string, run: PipelineRun): Promise<string> {
    if (!this.options.convertToIntermediate) {
      this.logger.debug({ filePath }, 'Conversion disabled, submitting original file');
      return filePath;
    }
    if (!COMPRESSED_VOICE_EXTENSIONS.has(path.extname(filePath).toLowerCase())) {
      return filePath;
    }

    const wavPath = replaceExtension(filePath, '.wav');
    run.tempFiles.push(wavPath);
    try {
      return await this.deps.transcoder.toWav(filePath, wavPath);
    } catch (err) {
      this.logger.warn({ filePath, err }, 'WAV conversion failed, submitting original file');
      return filePath;
    }
  }

  private async resetConversation(): Promise<void> {
    try {
      await withTimeout(this.deps.inference.clearConversation(), this.options.stageTimeoutMs, 'clear conversation');
    } catch (err) {
      this.logger.warn({ err }, 'Failed to clear conversation history, continuing');
    }
  }

  private async infer(filePath: string): Promise<VoiceCompleteResponse> {
    try {
      return await this.deps.inference.completeVoice(filePath);
    } catch (err) {
      if (err instanceof InferenceError) throw err;
      throw new InferenceError(`Voice completion failed: ${errorMessage(err)}`, undefined, undefined, { cause: err });
    }
  }

  private async respond(response: VoiceCompleteResponse, run: PipelineRun): Promise<VoiceOutcome> {
    const { chatId } = run;

    run.enter('responseDecoding');
    let responsePath: string;
    try {
      const audio = await this.responseAudio(response);
      responsePath = path.join(this.options.mediaDir, `response_${uuidv4()}.wav`);
      run.tempFiles.push(responsePath);
      await writeFile(responsePath, audio);
    } catch (err) {
      this.logger.warn({ chatId, err }, 'No usable response audio, replying with text');
      return this.replyWithText(chatId, response.agent_text);
    }

    run.enter('responseTranscoding');
    let outboundPath = responsePath;
    const oggPath = replaceExtension(responsePath, '.ogg');
    run.tempFiles.push(oggPath);
    try {
      outboundPath = await this.deps.transcoder.toOggOpus(responsePath, oggPath);
    } catch (err) {
      this.logger.warn({ chatId, err }, 'Ogg/Opus conversion failed, sending WAV');
    }

    run.enter('sending');
    try {
      await this.deps.messenger.sendVoice(chatId, outboundPath);
      return 'voice';
    } catch (err) {
      this.logger.error({ chatId, err }, 'Failed to send voice reply, replying with text');
      return this.replyWithText(chatId, response.agent_text);
    }
  }

  private async responseAudio(response: VoiceCompleteResponse): Promise<Buffer> {
    if (response.wav_base64) {
      return decodeBase64Strict(response.wav_base64);
    }
    if (!response.agent_text.trim()) {
      throw new InferenceError('Response has neither audio nor text');
    }
    return withTimeout(this.deps.inference.speak(response.agent_text), this.options.stageTimeoutMs, 'speak');
  }

  private async replyWithText(chatId: string, agentText: string): Promise<VoiceOutcome> {
    await this.deps.presence.clear(chatId);
    if (!agentText.trim()) {
      await this.deps.messenger.sendText(chatId, VOICE_FALLBACK_REPLY);
      return 'fallback';
    }
    await this.deps.messenger.sendText(chatId, agentText);
    return 'agent-text';
  }

  private async cleanup(run: PipelineRun): Promise<void> {
    if (this.options.keepTempFiles) {
      this.logger.debug({ files: run.tempFiles }, 'Keeping temporary audio files');
      return;
    }
    for (const file of run.tempFiles) {
      try {
        await rm(file, { force: true });
      } catch (err) {
        this.logger.warn({ file, err }, 'Failed to remove temporary file');
      }
    }
  }
}
