export type CollectorErrorCode =
  | 'RATE_LIMITED'
  | 'TRANSIENT_NETWORK'
  | 'FATAL_ADAPTER'
  | 'MALFORMED_RECORD'
  | 'PERSISTENCE_FAILURE';

export class CollectorError extends Error {
  constructor(readonly code: CollectorErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class RateLimitedError extends CollectorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('RATE_LIMITED', message, options);
  }
}

export class TransientNetworkError extends CollectorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('TRANSIENT_NETWORK', message, options);
  }
}

export class FatalAdapterError extends CollectorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('FATAL_ADAPTER', message, options);
  }
}

export class MalformedRecordError extends CollectorError {
  constructor(message: string) {
    super('MALFORMED_RECORD', message);
  }
}

export class PersistenceFailureError extends CollectorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('PERSISTENCE_FAILURE', message, options);
  }
}

export function isRetryable(err: unknown): err is RateLimitedError | TransientNetworkError {
  return err instanceof RateLimitedError || err instanceof TransientNetworkError;
}

export type ErrorInfo = { code: string; message: string };

export function toErrorInfo(err: unknown): ErrorInfo {
  if (err instanceof CollectorError) return { code: err.code, message: err.message };
  if (err instanceof Error) return { code: 'INTERNAL_ERROR', message: err.message };
  return { code: 'INTERNAL_ERROR', message: String(err) };
}
