export type StreamCacheErrorKind =
  | 'TransientConnectivityLoss'
  | 'ServerError'
  | 'SizeMismatch'
  | 'OutOfRange'
  | 'FilesystemError'
  | 'RequestTimeout'
  | 'TransferCancelled'
  | 'TransferFailed'
  | 'CacheDisposed';

export abstract class StreamCacheError extends Error {
  public abstract readonly kind: StreamCacheErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class TransientConnectivityLossError extends StreamCacheError {
  public readonly kind = 'TransientConnectivityLoss';
}

export class ServerError extends StreamCacheError {
  public readonly kind = 'ServerError';

  constructor(public readonly status: number, statusText: string) {
    super(`Failed downloading asset. Reason: response status code ${status}${statusText ? ` ${statusText}` : ''}.`);
  }
}

export class SizeMismatchError extends StreamCacheError {
  public readonly kind = 'SizeMismatch';

  constructor(public readonly expected: number, public readonly actual: number, reason: 'expected' | 'minimum') {
    super(
      reason === 'expected'
        ? `Failed downloading asset. Reason: wrong file size, expected: ${expected}, actual: ${actual}.`
        : `Failed downloading asset. Reason: file size ${actual} is smaller than the minimum of ${expected}.`
    );
  }
}

export class OutOfRangeError extends StreamCacheError {
  public readonly kind = 'OutOfRange';

  constructor(public readonly offset: number, public readonly size: number) {
    super(`Offset ${offset} is beyond the ${size} bytes stored`);
  }
}

export class FilesystemError extends StreamCacheError {
  public readonly kind = 'FilesystemError';
}

export class RequestTimeoutError extends StreamCacheError {
  public readonly kind = 'RequestTimeout';
}

export class TransferCancelledError extends StreamCacheError {
  public readonly kind = 'TransferCancelled';

  constructor() {
    super('Download cancelled');
  }
}

/** Any other terminal transfer failure (bad URL, TLS, unreadable body...). */
export class TransferFailedError extends StreamCacheError {
  public readonly kind = 'TransferFailed';
}

export class CacheDisposedError extends StreamCacheError {
  public readonly kind = 'CacheDisposed';

  constructor() {
    super('Stream cache disposed');
  }
}

// Unreachable network or a dropped connection. Refused and timed out connects are terminal.
const TRANSIENT_CODES = new Set([
  'ECONNRESET',
  'EPIPE',
  'ENOTFOUND',
  'EAI_AGAIN',
  'ENETUNREACH',
  'ENETDOWN',
  'EHOSTUNREACH',
  'UND_ERR_SOCKET',
  'UND_ERR_CLOSED',
]);

function errorCode(value: unknown): string | undefined {
  if (typeof value !== 'object' || value === null || !('code' in value)) return undefined;
  return typeof value.code === 'string' ? value.code : undefined;
}

function errorCause(value: unknown): unknown {
  if (typeof value !== 'object' || value === null || !('cause' in value)) return undefined;
  return value.cause;
}

/**
 * True when the error (or anything in its cause chain) means the network
 * dropped out from under the request, as opposed to the server refusing it.
 */
export function isTransientNetworkError(error: unknown): boolean {
  let current: unknown = error;
  for (let depth = 0; current !== undefined && depth < 8; depth++) {
    if (current instanceof TransientConnectivityLossError) return true;
    const code = errorCode(current);
    if (code && TRANSIENT_CODES.has(code)) return true;
    current = errorCause(current);
  }
  return false;
}

export function toStreamCacheError(error: unknown): StreamCacheError {
  if (error instanceof StreamCacheError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new TransferFailedError(message, { cause: error });
}
