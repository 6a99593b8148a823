import path from 'path';
import dotenv from 'dotenv';
import { z } from 'zod';

const TRUE_VALUES = new Set(['1', 't', 'true']);
const FALSE_VALUES = new Set(['0', 'f', 'false']);

/**
 * Lenient boolean flag: unparsable values fall back to the default.
 */
function flag(defaultValue: boolean) {
  return z
    .string()
    .optional()
    .transform((raw) => {
      const value = raw?.trim().toLowerCase();
      if (!value) return defaultValue;
      if (TRUE_VALUES.has(value)) return true;
      if (FALSE_VALUES.has(value)) return false;
      return defaultValue;
    });
}

function positiveInt(defaultValue: number) {
  return z.coerce.number().int().positive().default(defaultValue);
}

const envSchema = z.object({
  VOICE_API_BASE_URL: z.string().url().default('http://localhost:8000'),
  DISABLE_OGG_TO_WAV_CONVERSION: flag(false),
  KEEP_TEMP_AUDIO_FILES: flag(true),
  STORAGE_DIR: z.string().optional(),
  MEDIA_DIR: z.string().optional(),
  INFERENCE_TIMEOUT_MS: positiveInt(60_000),
  STAGE_TIMEOUT_MS: positiveInt(60_000),
  UPLOAD_MAX_ATTEMPTS: positiveInt(3),
  UPLOAD_RETRY_DELAY_MS: z.coerce.number().int().nonnegative().default(2_000),
  FFMPEG_PATH: z.string().default('ffmpeg'),
  FFPROBE_PATH: z.string().default('ffprobe'),
  REDIS_URL: z.string().optional(),
  PORT: positiveInt(3000),
  API_TOKENS: z.string().default('')
});

export interface BridgeConfig {
  voiceApiBaseUrl: string;
  convertToIntermediate: boolean;
  keepTempAudioFiles: boolean;
  mediaDir: string;
  inferenceTimeoutMs: number;
  stageTimeoutMs: number;
  upload: {
    maxAttempts: number;
    delayMs: number;
  };
  ffmpegPath: string;
  ffprobePath: string;
  redisUrl?: string;
  port: number;
  apiTokens: string[];
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): BridgeConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${issues.join('; ')}`);
  }

  const e = parsed.data;
  const storageDir = e.STORAGE_DIR || process.cwd();

  return {
    voiceApiBaseUrl: e.VOICE_API_BASE_URL.replace(/\/+$/, ''),
    convertToIntermediate: !e.DISABLE_OGG_TO_WAV_CONVERSION,
    keepTempAudioFiles: e.KEEP_TEMP_AUDIO_FILES,
    mediaDir: path.resolve(e.MEDIA_DIR || path.join(storageDir, 'media')),
    inferenceTimeoutMs: e.INFERENCE_TIMEOUT_MS,
    stageTimeoutMs: e.STAGE_TIMEOUT_MS,
    upload: {
      maxAttempts: e.UPLOAD_MAX_ATTEMPTS,
      delayMs: e.UPLOAD_RETRY_DELAY_MS
    },
    ffmpegPath: e.FFMPEG_PATH,
    ffprobePath: e.FFPROBE_PATH,
    redisUrl: e.REDIS_URL || undefined,
    port: e.PORT,
    apiTokens: e.API_TOKENS
      .split(',')
      .map((s) => s.trim())
      .filter((s) => s.length > 0)
  };
}

/**
 * Loads `.env` (or `ENV_PATH`) into process.env and parses it.
 */
export function loadConfigFromEnvFile(): BridgeConfig {
  dotenv.config({ path: process.env.ENV_PATH || '.env' });
  return loadConfig(process.env);
}
