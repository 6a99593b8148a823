import { describe, it, expect } from '@jest/globals'
import path from 'node:path'
import { loadConfig } from '../config.js'

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig({ STORAGE_DIR: '/var/bridge' })

    expect(config).toEqual({
      voiceApiBaseUrl: 'http://localhost:8000',
      convertToIntermediate: true,
      keepTempAudioFiles: true,
      mediaDir: path.resolve('/var/bridge/media'),
      inferenceTimeoutMs: 60_000,
      stageTimeoutMs: 60_000,
      upload: { maxAttempts: 3, delayMs: 2_000 },
      ffmpegPath: 'ffmpeg',
      ffprobePath: 'ffprobe',
      redisUrl: undefined,
      port: 3000,
      apiTokens: []
    })
  })

  it('reads the audio flags leniently', () => {
    expect(loadConfig({ DISABLE_OGG_TO_WAV_CONVERSION: 'TRUE' }).convertToIntermediate).toBe(false)
    expect(loadConfig({ DISABLE_OGG_TO_WAV_CONVERSION: 't' }).convertToIntermediate).toBe(false)
    expect(loadConfig({ DISABLE_OGG_TO_WAV_CONVERSION: 'maybe' }).convertToIntermediate).toBe(true)
    expect(loadConfig({ KEEP_TEMP_AUDIO_FILES: '0' }).keepTempAudioFiles).toBe(false)
    expect(loadConfig({ KEEP_TEMP_AUDIO_FILES: 'nope' }).keepTempAudioFiles).toBe(true)
  })

  it('trims the backend url and splits tokens', () => {
    const config = loadConfig({
      VOICE_API_BASE_URL: 'http://voice-api.test/',
      API_TOKENS: ' test-secret , other-secret ,,',
      MEDIA_DIR: '/tmp/bridge-media',
      REDIS_URL: 'redis://localhost:6379'
    })

    expect(config.voiceApiBaseUrl).toBe('http://voice-api.test')
    expect(config.apiTokens).toEqual(['test-secret', 'other-secret'])
    expect(config.mediaDir).toBe(path.resolve('/tmp/bridge-media'))
    expect(config.redisUrl).toBe('redis://localhost:6379')
  })

  it('rejects invalid values', () => {
    expect(() => loadConfig({ VOICE_API_BASE_URL: 'not a url' })).toThrow(/^Invalid configuration: VOICE_API_BASE_URL/)
    expect(() => loadConfig({ UPLOAD_MAX_ATTEMPTS: '0' })).toThrow(/UPLOAD_MAX_ATTEMPTS/)
  })
})
