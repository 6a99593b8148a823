/**
 * Error taxonomy shared by the pipeline stages
 */

export type BridgeErrorCode =
  | 'connection'
  | 'download'
  | 'transcode'
  | 'inference'
  | 'upload'
  | 'persistence'
  | 'timeout';

export class BridgeError extends Error {
  constructor(
    public readonly code: BridgeErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConnectionError extends BridgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('connection', message, options);
  }
}

export class DownloadError extends BridgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('download', message, options);
  }
}

export class TranscodeError extends BridgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('transcode', message, options);
  }
}

export class InferenceError extends BridgeError {
  constructor(
    message: string,
    public readonly status?: number,
    public readonly body?: string,
    options?: { cause?: unknown }
  ) {
    super('inference', message, options);
  }
}

export class UploadError extends BridgeError {
  constructor(
    message: string,
    public readonly attempts: number,
    options?: { cause?: unknown }
  ) {
    super('upload', message, options);
  }
}

export class PersistenceError extends BridgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('persistence', message, options);
  }
}

export class TimeoutError extends BridgeError {
  constructor(label: string, public readonly timeoutMs: number) {
    super('timeout', `${label} timed out after ${timeoutMs}ms`);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
