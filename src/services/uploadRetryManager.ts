import type { ProtocolSession, UploadedMedia } from '../core/interfaces.js';
import { UploadError, errorMessage } from '../core/errors.js';
import type { MediaKind } from '../dto/events.js';
import { createLogger } from '../utils/logger.js';
import { sleep, withTimeout } from '../utils/timeout.js';

export interface UploadRetryOptions {
  /** Total attempts, including the first. Default 3 */
  maxAttempts?: number;
  /** Fixed pause between consecutive attempts. Default 2000 */
  delayMs?: number;
  /** Limit for a single attempt; a hung attempt counts as failed */
  timeoutMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Uploads media through the session, retrying with a fixed delay.
 */
export class UploadRetryManager {
  private readonly logger = createLogger('uploadRetryManager');
  private readonly maxAttempts: number;
  private readonly delayMs: number;
  private readonly timeoutMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly session: ProtocolSession,
    options: UploadRetryOptions = {}
  ) {
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 3);
    this.delayMs = options.delayMs ?? 2000;
    this.timeoutMs = options.timeoutMs ?? 60_000;
    this.sleep = options.sleep ?? sleep;
  }

  async upload(data: Buffer, kind: MediaKind): Promise<UploadedMedia> {
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        const uploaded = await withTimeout(this.session.upload(data, kind), this.timeoutMs, 'upload');
        if (attempt > 1) {
          this.logger.info({ kind, attempt }, 'Upload succeeded after retry');
        }
        return uploaded;
      } catch (err) {
        lastError = err;
        if (attempt < this.maxAttempts) {
          this.logger.warn(
            { kind, attempt, maxAttempts: this.maxAttempts, err },
            `Upload failed, retrying in ${this.delayMs}ms`
          );
          await this.sleep(this.delayMs);
        }
      }
    }

    throw new UploadError(
      `Upload failed after ${this.maxAttempts} attempts: ${errorMessage(lastError)}`,
      this.maxAttempts,
      { cause: lastError }
    );
  }
}
