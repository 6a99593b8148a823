import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtemp, readdir, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { Bridge } from '../../bridge.js';
import type { BridgeConfig } from '../../config.js';
import { DownloadError, InferenceError } from '../../core/errors.js';
import { MemoryMessageStore } from '../../storage/memoryMessageStore.js';
import { VOICE_MESSAGE_CONTENT } from '../../dto/messages.js';
import {
  DOWNLOAD_FAILED_REPLY,
  VOICE_FALLBACK_REPLY,
  decodeBase64Strict,
  extensionForMimetype,
  type VoicePipelineReport
} from '../voicePipeline.js';
import {
  CHAT_ID,
  FakeSession,
  OWN_ID,
  fakeBackend,
  fakeMediaTools,
  testConfig,
  textEvent,
  uploadedFile,
  voiceEvent,
  type FakeReply,
  type RecordedRequest
} from '../../__tests__/fakes.js';

const RESPONSE_WAV = Buffer.from('RIFF-agent-reply');

function voiceBackend(overrides: { complete?: FakeReply; speak?: FakeReply } = {}) {
  return fakeBackend((req: RecordedRequest): FakeReply => {
    if (req.url === '/api/voice/conversation/clear') return { status: 200, data: { ok: true } };
    if (req.url === '/api/voice/complete') {
      return (
        overrides.complete ?? {
          status: 200,
          data: { transcript: 'what is my balance', agent_text: 'Your balance is 10', wav_base64: RESPONSE_WAV.toString('base64') }
        }
      );
    }
    if (req.url.startsWith('/api/voice/speak')) return overrides.speak ?? { status: 200, data: RESPONSE_WAV };
    return { status: 404, data: 'not found' };
  });
}

describe('VoicePipeline', () => {
  let mediaDir: string;
  let session: FakeSession;
  let store: MemoryMessageStore;

  beforeEach(async () => {
    mediaDir = await mkdtemp(path.join(os.tmpdir(), 'voice-pipeline-'));
    session = new FakeSession();
    store = new MemoryMessageStore();
  });

  afterEach(async () => {
    await rm(mediaDir, { recursive: true, force: true });
  });

  function createBridge(
    backend: ReturnType<typeof voiceBackend>,
    tools = fakeMediaTools({ duration: '3.2' }),
    overrides: Partial<BridgeConfig> = {}
  ) {
    const bridge = new Bridge({
      session,
      config: testConfig(mediaDir, overrides),
      store,
      inferenceAdapter: backend.adapter,
      commandRunner: tools.runner,
      sleep: async () => undefined
    });
    const reports: VoicePipelineReport[] = [];
    bridge.dispatcher.on('pipeline:completed', (report) => reports.push(report));
    bridge.start();
    return { bridge, reports };
  }

  async function receiveVoiceNote(bridge: Bridge): Promise<void> {
    session.events.emit('event', voiceEvent({ id: 'VOICE1' }));
    await bridge.dispatcher.drain();
  }

  it('answers a voice note with a voice note', async () => {
    const backend = voiceBackend();
    const tools = fakeMediaTools({ duration: '3.2' });
    const { bridge, reports } = createBridge(backend, tools);

    await receiveVoiceNote(bridge);

    expect(reports).toHaveLength(1);
    expect(reports[0]).toMatchObject({ state: 'done', outcome: 'voice', messageId: 'VOICE1' });
    expect(reports[0]?.transitions).toEqual([
      'idle',
      'downloading',
      'converting',
      'conversationReset',
      'inferring',
      'responseDecoding',
      'responseTranscoding',
      'sending',
      'cleanup',
      'done'
    ]);

    expect(backend.requests.map((r) => r.url)).toEqual(['/api/voice/conversation/clear', '/api/voice/complete']);

    expect(session.sent).toHaveLength(1);
    const sent = session.sent[0];
    expect(sent?.recipient).toBe(CHAT_ID);
    expect(sent?.content).toMatchObject({ type: 'audio', ptt: true, seconds: 3, mimetype: 'audio/ogg; codecs=opus' });

    const fromMe = (await store.getMessages(CHAT_ID, 10)).filter((m) => m.isFromMe);
    expect(fromMe).toHaveLength(1);
    expect(fromMe[0]).toMatchObject({ content: VOICE_MESSAGE_CONTENT, mediaType: 'voice', sender: OWN_ID, messageId: 'SENT1' });
    expect(fromMe[0]?.filename).toMatch(/^response_.+\.ogg$/);

    expect(session.presence[0]).toEqual({ chatId: CHAT_ID, presence: 'recording' });
    expect(session.presence[session.presence.length - 1]).toEqual({ chatId: CHAT_ID, presence: 'paused' });

    expect(await readdir(mediaDir)).toEqual([]);
  });

  it('submits the WAV conversion when conversion is enabled', async () => {
    const backend = voiceBackend();
    const tools = fakeMediaTools({ duration: '2', output: Buffer.from('converted-wav') });
    const { bridge } = createBridge(backend, tools);

    await receiveVoiceNote(bridge);

    const complete = backend.requests.find((r) => r.url === '/api/voice/complete');
    if (!complete) throw new Error('voice completion was not requested');
    expect((await uploadedFile(complete)).toString()).toBe('converted-wav');
    expect(tools.calls.some((c) => c.args.includes('s16'))).toBe(true);
  });

  it('submits the downloaded file byte-identical when conversion is disabled', async () => {
    const backend = voiceBackend();
    const tools = fakeMediaTools({ duration: '2' });
    const { bridge } = createBridge(backend, tools, { convertToIntermediate: false });

    await receiveVoiceNote(bridge);

    const complete = backend.requests.find((r) => r.url === '/api/voice/complete');
    if (!complete) throw new Error('voice completion was not requested');
    expect((await uploadedFile(complete)).equals(session.downloadData)).toBe(true);
    expect(tools.calls.some((c) => c.args.includes('s16'))).toBe(false);
  });

  it('sends exactly one fallback text and clears presence when inference fails', async () => {
    const backend = voiceBackend({ complete: { status: 502, data: 'bad gateway' } });
    const { bridge, reports } = createBridge(backend);

    await receiveVoiceNote(bridge);

    expect(session.sent).toHaveLength(1);
    expect(session.sentTexts()).toEqual([VOICE_FALLBACK_REPLY]);
    expect(session.presence[session.presence.length - 1]?.presence).toBe('paused');
    expect(reports[0]).toMatchObject({ state: 'error', outcome: 'fallback' });
    expect(reports[0]?.error).toBeInstanceOf(InferenceError);
    expect(reports[0]?.transitions.slice(-3)).toEqual(['inferring', 'error', 'cleanup']);
  });

  it('apologises for a failed download', async () => {
    session.downloadError = new Error('media expired');
    const backend = voiceBackend();
    const { bridge, reports } = createBridge(backend);

    await receiveVoiceNote(bridge);

    expect(session.sentTexts()).toEqual([DOWNLOAD_FAILED_REPLY]);
    expect(backend.requests).toEqual([]);
    expect(reports[0]?.error).toBeInstanceOf(DownloadError);
    expect(reports[0]?.transitions).toEqual(['idle', 'downloading', 'error', 'cleanup']);
  });

  it('replies with the agent text when the response audio is not valid base64', async () => {
    const backend = voiceBackend({
      complete: { status: 200, data: { transcript: 't', agent_text: 'Your balance is 10', wav_base64: 'not base64!' } }
    });
    const { bridge, reports } = createBridge(backend);

    await receiveVoiceNote(bridge);

    expect(session.sentTexts()).toEqual(['Your balance is 10']);
    expect(reports[0]).toMatchObject({ state: 'done', outcome: 'agent-text' });
  });

  it('asks for speech when the completion carries no audio', async () => {
    const backend = voiceBackend({
      complete: { status: 200, data: { transcript: 't', agent_text: 'Your balance is 10', wav_base64: '' } }
    });
    const { bridge, reports } = createBridge(backend);

    await receiveVoiceNote(bridge);

    expect(backend.requests.map((r) => r.url)).toContain('/api/voice/speak?text=Your+balance+is+10');
    expect(reports[0]?.outcome).toBe('voice');
  });

  it('sends the WAV when Opus encoding fails', async () => {
    const backend = voiceBackend();
    const tools = fakeMediaTools({ duration: '2', failFfmpeg: true });
    const { bridge, reports } = createBridge(backend, tools);

    await receiveVoiceNote(bridge);

    expect(reports[0]?.outcome).toBe('voice');
    expect(session.sent[0]?.content).toMatchObject({ type: 'audio', mimetype: 'audio/wav' });
  });

  it('falls back to the agent text when the upload keeps failing', async () => {
    session.uploadFailures = 3;
    const { bridge, reports } = createBridge(voiceBackend());

    await receiveVoiceNote(bridge);

    expect(session.uploads).toHaveLength(3);
    expect(session.sentTexts()).toEqual(['Your balance is 10']);
    expect(reports[0]?.outcome).toBe('agent-text');
  });

  it('keeps temporary files when retention is on', async () => {
    const { bridge } = createBridge(voiceBackend(), fakeMediaTools({ duration: '2' }), { keepTempAudioFiles: true });

    await receiveVoiceNote(bridge);

    const files = (await readdir(mediaDir)).sort();
    expect(files).toHaveLength(4);
    expect(files.filter((f) => f.startsWith('voice_VOICE1_'))).toHaveLength(2);
    expect(files.filter((f) => f.startsWith('response_'))).toHaveLength(2);
  });

  it('removes partial transcoder output when ffmpeg fails midway', async () => {
    const tools = fakeMediaTools({ duration: '2', failFfmpeg: 'after-write' });
    const { bridge, reports } = createBridge(voiceBackend(), tools);

    await receiveVoiceNote(bridge);

    expect(reports[0]?.outcome).toBe('voice');
    expect(session.sent[0]?.content).toMatchObject({ type: 'audio', mimetype: 'audio/wav' });
    expect(await readdir(mediaDir)).toEqual([]);
  });

  it('treats an upload that never settles as failed and clears presence', async () => {
    session.uploadHangs = true;
    const { bridge, reports } = createBridge(voiceBackend(), fakeMediaTools({ duration: '2' }), { stageTimeoutMs: 50 });

    await receiveVoiceNote(bridge);

    expect(session.uploads).toHaveLength(3);
    expect(reports[0]).toMatchObject({ state: 'done', outcome: 'agent-text' });
    expect(session.sentTexts()).toEqual(['Your balance is 10']);
    expect(session.presence[session.presence.length - 1]?.presence).toBe('paused');
    expect(bridge.dispatcher.inFlightCount).toBe(0);
  });

  it('finishes when sends never settle', async () => {
    session.sendHangs = true;
    const { bridge, reports } = createBridge(voiceBackend(), fakeMediaTools({ duration: '2' }), { stageTimeoutMs: 50 });

    await receiveVoiceNote(bridge);

    expect(reports).toHaveLength(1);
    expect(session.sent).toEqual([]);
    expect(session.presence[session.presence.length - 1]?.presence).toBe('paused');
  });

  it('answers a text only after the voice note that came before it', async () => {
    const backend = fakeBackend(async (req: RecordedRequest): Promise<FakeReply> => {
      if (req.url === '/api/text/chat') return { status: 200, data: { agent_response: 'text answer' } };
      if (req.url === '/api/voice/complete') {
        await new Promise((resolve) => setTimeout(resolve, 50));
        return {
          status: 200,
          data: { transcript: 't', agent_text: 'voice answer', wav_base64: RESPONSE_WAV.toString('base64') }
        };
      }
      return { status: 200, data: { ok: true } };
    });
    const { bridge } = createBridge(backend);

    session.events.emit('event', voiceEvent({ id: 'VOICE1' }));
    session.events.emit('event', textEvent('balance please'));
    await bridge.dispatcher.drain();

    expect(session.presence.map((p) => p.presence)).toEqual(['recording', 'paused', 'typing', 'paused']);
    expect(session.sent.map((m) => m.content.type)).toEqual(['audio', 'text']);
    expect(session.sentTexts()).toEqual(['text answer']);
  });

  it('ignores voice notes sent from this account', async () => {
    const backend = voiceBackend();
    const { bridge, reports } = createBridge(backend);

    session.events.emit('event', voiceEvent({ isFromMe: true }));
    await bridge.dispatcher.drain();

    expect(reports).toEqual([]);
    expect(session.downloads).toEqual([]);
  });
});

describe('decodeBase64Strict', () => {
  it('decodes padded base64 across line breaks', () => {
    expect(decodeBase64Strict('UklG\r\nRg==').toString()).toBe('RIFF');
  });

  it('rejects characters outside the alphabet and bad lengths', () => {
    expect(() => decodeBase64Strict('UklG-g==')).toThrow(InferenceError);
    expect(() => decodeBase64Strict('UklGR')).toThrow(InferenceError);
  });
});

describe('extensionForMimetype', () => {
  it('ignores parameters and defaults to .ogg', () => {
    expect(extensionForMimetype('audio/ogg; codecs=opus')).toBe('.ogg');
    expect(extensionForMimetype('audio/mpeg')).toBe('.mp3');
    expect(extensionForMimetype(undefined)).toBe('.ogg');
  });
});
