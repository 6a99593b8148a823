/**
 * HTTP client for the conversational-AI backend.
 *
 *   POST /api/text/chat                 { text } → { user_input, agent_response, conversation_length }
 *   POST /api/voice/complete            multipart `file` → { transcript, agent_text, wav_base64 }
 *   POST /api/voice/speak?text=...      → audio bytes
 *   POST /api/voice/conversation/clear  → 2xx
 */

import { readFile } from 'node:fs/promises';
import path from 'node:path';
import axios, { type AxiosAdapter, type AxiosInstance, type AxiosResponse } from 'axios';
import { z } from 'zod';
import { InferenceError, errorMessage } from '../core/errors.js';
import { createLogger } from '../utils/logger.js';

const textChatSchema = z.object({
  user_input: z.string().default(''),
  agent_response: z.string(),
  conversation_length: z.number().optional()
});

const voiceCompleteSchema = z.object({
  transcript: z.string().default(''),
  agent_text: z.string().default(''),
  wav_base64: z.string().default('')
});

export type TextChatResponse = z.infer<typeof textChatSchema>;
export type VoiceCompleteResponse = z.infer<typeof voiceCompleteSchema>;

export interface InferenceClientOptions {
  baseUrl: string;
  timeoutMs?: number;
  /** Replaces the network transport; tests answer requests in process */
  adapter?: AxiosAdapter;
}

function bodyText(data: unknown): string {
  if (typeof data === 'string') return data;
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8');
  if (data === undefined || data === null) return '';
  return JSON.stringify(data);
}

function toBuffer(data: unknown): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (data instanceof ArrayBuffer) return Buffer.from(data);
  if (ArrayBuffer.isView(data)) return Buffer.from(data.buffer, data.byteOffset, data.byteLength);
  if (typeof data === 'string') return Buffer.from(data, 'binary');
  throw new InferenceError('Speech response is not binary audio');
}

export class InferenceClient {
  private readonly logger = createLogger('inferenceClient');
  private readonly http: AxiosInstance;

  constructor(options: InferenceClientOptions) {
    this.http = axios.create({
      baseURL: options.baseUrl.replace(/\/+$/, ''),
      timeout: options.timeoutMs ?? 60_000,
      // Status is checked per call so the body can go into the error
      validateStatus: () => true,
      ...(options.adapter ? { adapter: options.adapter } : {})
    });
  }

  async textChat(text: string): Promise<TextChatResponse> {
    const res = await this.send('text chat', () => this.http.post('/api/text/chat', { text }));
    const parsed = textChatSchema.safeParse(res.data);
    if (!parsed.success) {
      throw new InferenceError('Invalid text chat response', res.status, bodyText(res.data));
    }
    return parsed.data;
  }

  /**
   * Submits an audio file for transcription, agent reply and speech synthesis.
   */
  async completeVoice(filePath: string): Promise<VoiceCompleteResponse> {
    const audio = await readFile(filePath);
    const form = new FormData();
    form.append('file', new Blob([new Uint8Array(audio)]), path.basename(filePath));

    this.logger.debug({ filePath, size: audio.length }, 'Submitting voice message');
    const res = await this.send('voice complete', () => this.http.post('/api/voice/complete', form));
    const parsed = voiceCompleteSchema.safeParse(res.data);
    if (!parsed.success) {
      throw new InferenceError('Invalid voice completion response', res.status, bodyText(res.data));
    }
    this.logger.info(
      {
        transcriptLength: parsed.data.transcript.length,
        agentTextLength: parsed.data.agent_text.length,
        hasAudio: parsed.data.wav_base64.length > 0
      },
      'Voice completion received'
    );
    return parsed.data;
  }

  async speak(text: string): Promise<Buffer> {
    const query = new URLSearchParams({ text }).toString();
    const res = await this.send('speak', () =>
      this.http.post(`/api/voice/speak?${query}`, undefined, { responseType: 'arraybuffer' })
    );
    const audio = toBuffer(res.data);
    if (audio.length === 0) {
      throw new InferenceError('Speech response is empty', res.status);
    }
    return audio;
  }

  async clearConversation(): Promise<void> {
    await this.send('clear conversation', () => this.http.post('/api/voice/conversation/clear'));
  }

  private async send(label: string, call: () => Promise<AxiosResponse<unknown>>): Promise<AxiosResponse<unknown>> {
    let res: AxiosResponse<unknown>;
    try {
      res = await call();
    } catch (err) {
      throw new InferenceError(`${label} request failed: ${errorMessage(err)}`, undefined, undefined, { cause: err });
    }

    if (res.status < 200 || res.status >= 300) {
      const body = bodyText(res.data);
      this.logger.warn({ label, status: res.status, body }, 'Inference backend returned an error');
      throw new InferenceError(`${label} returned status ${res.status}`, res.status, body);
    }
    return res;
  }
}
