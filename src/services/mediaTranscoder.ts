import { execFile } from 'node:child_process';
import { stat } from 'node:fs/promises';
import path from 'node:path';
import { promisify } from 'node:util';
import { z } from 'zod';
import { TranscodeError, errorMessage } from '../core/errors.js';
import { createLogger } from '../utils/logger.js';

const execFileAsync = promisify(execFile);

/** Rough byte rate of a compressed voice note */
const ESTIMATED_BYTES_PER_SECOND = 16_000;

export const VOICE_NOTE_MIMETYPE = 'audio/ogg; codecs=opus';

/** Containers the intermediate WAV conversion applies to */
export const COMPRESSED_VOICE_EXTENSIONS = new Set(['.ogg', '.opus', '.oga']);

const AUDIO_MIMETYPES: Record<string, string> = {
  '.ogg': 'audio/ogg',
  '.opus': 'audio/ogg',
  '.oga': 'audio/ogg',
  '.mp3': 'audio/mpeg',
  '.wav': 'audio/wav',
  '.m4a': 'audio/mp4',
  '.mp4': 'audio/mp4',
  '.aac': 'audio/aac',
  '.flac': 'audio/flac',
  '.wma': 'audio/x-ms-wma',
  '.3gp': 'audio/3gpp',
  '.amr': 'audio/amr'
};

const probeOutputSchema = z.object({
  format: z.object({
    duration: z.string()
  })
});

export interface CommandResult {
  stdout: string;
  stderr: string;
}

export type CommandRunner = (
  file: string,
  args: string[],
  options: { timeoutMs: number }
) => Promise<CommandResult>;

export const execFileRunner: CommandRunner = async (file, args, { timeoutMs }) => {
  const { stdout, stderr } = await execFileAsync(file, args, {
    timeout: timeoutMs,
    maxBuffer: 4 * 1024 * 1024
  });
  return { stdout, stderr };
};

export function audioMimetype(filePath: string): string {
  return AUDIO_MIMETYPES[path.extname(filePath).toLowerCase()] ?? 'audio/ogg';
}

/**
 * Mimetype to announce on an outbound voice note
 */
export function voiceNoteMimetype(filePath: string): string {
  const ext = path.extname(filePath).toLowerCase();
  return COMPRESSED_VOICE_EXTENSIONS.has(ext) ? VOICE_NOTE_MIMETYPE : audioMimetype(filePath);
}

/**
 * Whole seconds, never below one.
 */
export function normalizeDuration(seconds: number): number {
  return Math.max(1, Math.trunc(seconds));
}

export function estimateDuration(sizeBytes: number): number {
  return normalizeDuration(sizeBytes / ESTIMATED_BYTES_PER_SECOND);
}

export function replaceExtension(filePath: string, ext: string): string {
  const parsed = path.parse(filePath);
  return path.join(parsed.dir, `${parsed.name}${ext}`);
}

export interface MediaTranscoderOptions {
  ffmpegPath?: string;
  ffprobePath?: string;
  timeoutMs?: number;
  runner?: CommandRunner;
}

export class MediaTranscoder {
  private readonly logger = createLogger('mediaTranscoder');
  private readonly ffmpegPath: string;
  private readonly ffprobePath: string;
  private readonly timeoutMs: number;
  private readonly run: CommandRunner;

  constructor(options: MediaTranscoderOptions = {}) {
    this.ffmpegPath = options.ffmpegPath ?? 'ffmpeg';
    this.ffprobePath = options.ffprobePath ?? 'ffprobe';
    this.timeoutMs = options.timeoutMs ?? 60_000;
    this.run = options.runner ?? execFileRunner;
  }

  /**
   * Compressed voice note → WAV, mono, 16 kHz, signed 16-bit.
   * The output defaults to the input's path with a `.wav` extension.
   */
  async toWav(inputPath: string, outputPath = replaceExtension(inputPath, '.wav')): Promise<string> {
    await this.ffmpeg(['-y', '-i', inputPath, '-ar', '16000', '-ac', '1', '-sample_fmt', 's16', outputPath]);
    return outputPath;
  }

  /**
   * WAV → Ogg/Opus at 64 kbit/s, 48 kHz, mono.
   */
  async toOggOpus(wavPath: string, outputPath = replaceExtension(wavPath, '.ogg')): Promise<string> {
    await this.ffmpeg([
      '-y', '-i', wavPath,
      '-c:a', 'libopus', '-b:a', '64k', '-ar', '48000', '-ac', '1',
      outputPath
    ]);
    return outputPath;
  }

  async probeDuration(filePath: string): Promise<number> {
    let stdout: string;
    try {
      ({ stdout } = await this.run(
        this.ffprobePath,
        ['-v', 'quiet', '-print_format', 'json', '-show_format', filePath],
        { timeoutMs: this.timeoutMs }
      ));
    } catch (err) {
      throw new TranscodeError(`ffprobe failed: ${errorMessage(err)}`, { cause: err });
    }

    let json: unknown;
    try {
      json = JSON.parse(stdout);
    } catch (err) {
      throw new TranscodeError('ffprobe returned invalid JSON', { cause: err });
    }

    const parsed = probeOutputSchema.safeParse(json);
    if (!parsed.success) {
      throw new TranscodeError('ffprobe output has no format.duration');
    }

    const seconds = Number.parseFloat(parsed.data.format.duration);
    if (!Number.isFinite(seconds)) {
      throw new TranscodeError(`Unparsable duration: ${parsed.data.format.duration}`);
    }
    return normalizeDuration(seconds);
  }

  /**
   * Probed duration, or an estimate from the file size when probing fails.
   */
  async durationSeconds(filePath: string): Promise<number> {
    try {
      return await this.probeDuration(filePath);
    } catch (err) {
      const { size } = await stat(filePath);
      const estimate = estimateDuration(size);
      this.logger.warn({ filePath, size, estimate, err }, 'Could not probe audio duration, using estimate');
      return estimate;
    }
  }

  private async ffmpeg(args: string[]): Promise<void> {
    try {
      await this.run(this.ffmpegPath, args, { timeoutMs: this.timeoutMs });
    } catch (err) {
      throw new TranscodeError(`ffmpeg failed: ${errorMessage(err)}`, { cause: err });
    }
  }
}
