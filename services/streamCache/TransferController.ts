import { clearTimeout, setTimeout } from 'node:timers';
import type { BackingStore } from './BackingStore';
import type { StreamCacheConfig } from './config';
import {
  RequestTimeoutError,
  ServerError,
  SizeMismatchError,
  StreamCacheError,
  TransferCancelledError,
  TransferFailedError,
  TransientConnectivityLossError,
  isTransientNetworkError,
  toStreamCacheError,
} from './errors';
import { concatBytes } from './utils/bytes';

export type TransferState = 'idle' | 'active' | 'suspended' | 'completed' | 'failed';

export interface TransferProgress {
  loaded: number;
  total: number | null; // null until the server tells us
}

export interface ContentInformation {
  contentType: string | null;
  contentLength: number | null;
  byteRangeAccessSupported: boolean;
}

export interface TransferCallbacks {
  onResponse?: (info: ContentInformation) => void;
  onBytesReceived?: (chunk: Uint8Array, progress: TransferProgress) => void;
  onFlushed?: (persistedBytes: number) => void;
  onStateChange?: (state: TransferState) => void;
  onInterrupted?: (error: TransientConnectivityLossError) => void;
  onCompleted?: () => void;
  onFailed?: (error: StreamCacheError) => void;
}

type StopReason = 'suspend' | 'cancel' | 'invalidate' | 'timeout';

interface Attempt {
  controller: AbortController;
  stopReason: StopReason | null;
  stopMessage: string;
  reader: ReadableStreamDefaultReader<Uint8Array> | null;
}

function parseContentRangeTotal(header: string | null): number | null {
  const match = header?.match(/\/(\d+)\s*$/);
  return match ? parseInt(match[1], 10) : null;
}

function parseContentRangeStart(header: string | null): number | null {
  const match = header?.match(/^\s*bytes\s+(\d+)-/i);
  return match ? parseInt(match[1], 10) : null;
}

function expectedTotal(response: Response, resumeOffset: number): number | null {
  const fromRange = parseContentRangeTotal(response.headers.get('Content-Range'));
  if (fromRange !== null) return fromRange;

  const contentLength = response.headers.get('Content-Length');
  if (!contentLength) return null;
  const length = parseInt(contentLength, 10);
  if (Number.isNaN(length)) return null;
  return response.status === 206 ? resumeOffset + length : length;
}

function discardBody(response: Response): void {
  response.body?.cancel().catch((e: unknown) => {
    console.warn('[Transfer] Failed to discard response body', e);
  });
}

/**
 * Drives one resumable GET into a BackingStore.
 *
 * Received bytes are buffered in memory and flushed once the buffer reaches
 * `downloadBufferFlushThreshold`, and whenever an attempt ends. Suspending
 * aborts the current attempt; resuming starts a new one with a `Range` header
 * from the persisted size.
 */
export class TransferController {
  public state: TransferState = 'idle';
  public progress: TransferProgress = { loaded: 0, total: null };
  public error: StreamCacheError | null = null;
  public contentInfo: ContentInformation | null = null;

  private url = '';
  private headers: Record<string, string> = {};
  private callbacks: TransferCallbacks = {};
  private attempt: Attempt | null = null;
  private running: Promise<void> = Promise.resolve();
  private generation = 0;
  private invalidated = false;

  private pendingChunks: Uint8Array[] = [];
  private pendingSize = 0;

  constructor(
    private readonly store: BackingStore,
    private readonly config: StreamCacheConfig
  ) { }

  public setCallbacks(callbacks: TransferCallbacks) {
    this.callbacks = callbacks;
  }

  public start(url: string, resumeOffset: number, headers: Record<string, string> = {}) {
    if (this.state !== 'idle' || this.invalidated) return;
    this.url = url;
    this.headers = { ...headers };
    this.progress = { loaded: resumeOffset, total: null };
    if (resumeOffset > 0) {
      console.log(`[Transfer] Resuming ${url} from ${resumeOffset} bytes`);
    }
    this.setState('active');
    this.launch(resumeOffset);
  }

  public suspend() {
    if (this.state !== 'active') return;
    this.generation++;
    this.setState('suspended');
    this.stop('suspend', 'Download paused');
  }

  public async resume(): Promise<void> {
    if (this.state !== 'suspended' || this.invalidated) return;
    const generation = ++this.generation;
    this.setState('active');

    // The previous attempt flushes its buffer before it settles
    await this.running;
    if (generation !== this.generation || this.state !== 'active') return;

    let resumeOffset: number;
    try {
      resumeOffset = await this.store.size();
    } catch (e: unknown) {
      await this.fail(toStreamCacheError(e));
      return;
    }
    if (generation !== this.generation || this.state !== 'active') return;

    console.log(`[Transfer] Resuming ${this.url} from ${resumeOffset} bytes`);
    this.launch(resumeOffset);
  }

  /** Explicit cancellation. Always terminal: the partial file is removed. */
  public cancel() {
    if (this.state === 'completed' || this.state === 'failed') return;
    this.generation++;
    this.stop('cancel', 'Download cancelled');
    this.running = this.running.then(() => this.fail(new TransferCancelledError()));
  }

  /**
   * Stops the transfer for good without reporting anything. Buffered bytes
   * are still flushed so a later session can resume from them.
   */
  public invalidate(): Promise<void> {
    this.invalidated = true;
    this.generation++;
    if (this.state === 'active') this.state = 'suspended';
    this.stop('invalidate', 'Transfer invalidated');
    return this.running;
  }

  /** Resolves once the current attempt (and any queued failure) has settled. */
  public settled(): Promise<void> {
    return this.running;
  }

  private get live(): boolean {
    return !this.invalidated;
  }

  private setState(state: TransferState) {
    this.state = state;
    if (this.live) this.callbacks.onStateChange?.(state);
  }

  private launch(resumeOffset: number) {
    const attempt: Attempt = {
      controller: new AbortController(),
      stopReason: null,
      stopMessage: '',
      reader: null,
    };
    this.attempt = attempt;
    this.running = this.run(attempt, resumeOffset);
  }

  private stop(reason: StopReason, message: string, attempt: Attempt | null = this.attempt) {
    if (!attempt || attempt.stopReason) return;
    attempt.stopReason = reason;
    attempt.stopMessage = message;
    attempt.controller.abort();
    attempt.reader?.cancel().catch((e: unknown) => {
      console.warn('[Transfer] Failed to cancel response body', e);
    });
  }

  private async run(attempt: Attempt, resumeOffset: number): Promise<void> {
    const { requestTimeoutMs, resourceTimeoutMs } = this.config;
    const requestTimer = setTimeout(
      () => this.stop('timeout', `No data received for ${requestTimeoutMs} ms`, attempt),
      requestTimeoutMs
    ).unref();
    const resourceTimer = setTimeout(
      () => this.stop('timeout', `Resource not received within ${resourceTimeoutMs} ms`, attempt),
      resourceTimeoutMs
    ).unref();

    let failure: unknown = null;
    let finished = false;
    try {
      finished = await this.receive(attempt, resumeOffset, () => requestTimer.refresh());
    } catch (e: unknown) {
      failure = e;
    } finally {
      clearTimeout(requestTimer);
      clearTimeout(resourceTimer);
      if (this.attempt === attempt) this.attempt = null;
    }

    let flushError: unknown = null;
    try {
      await this.flush();
    } catch (e: unknown) {
      flushError = e;
    }

    switch (attempt.stopReason) {
      case 'invalidate':
        if (flushError) console.error('[Transfer] Failed to persist buffered bytes on teardown', flushError);
        return;
      case 'cancel':
        // cancel() queues the failure behind this attempt
        return;
      case 'timeout':
        await this.fail(new RequestTimeoutError(attempt.stopMessage));
        return;
      default:
        break;
    }

    if (flushError) {
      await this.fail(toStreamCacheError(flushError));
      return;
    }
    if (attempt.stopReason === 'suspend') {
      console.log(`[Transfer] ${attempt.stopMessage}: ${this.url} at ${this.progress.loaded} bytes`);
      return;
    }

    if (failure) {
      if (isTransientNetworkError(failure)) {
        this.interrupt(failure);
        return;
      }
      await this.fail(toStreamCacheError(failure));
      return;
    }

    if (finished) {
      try {
        await this.verify();
      } catch (e: unknown) {
        await this.fail(toStreamCacheError(e));
        return;
      }
      this.setState('completed');
      console.log(`[Transfer] Download complete: ${this.url} (${this.progress.loaded} bytes)`);
      if (this.live) this.callbacks.onCompleted?.();
    }
  }

  /** Returns true when the resource has been received to its end. */
  private async receive(attempt: Attempt, resumeOffset: number, touch: () => void): Promise<boolean> {
    const headers: Record<string, string> = {
      ...this.headers,
      // Always go to the origin, never an intermediary cache
      'Cache-Control': 'no-cache',
      Pragma: 'no-cache',
    };
    if (resumeOffset > 0) {
      headers['Range'] = `bytes=${resumeOffset}-`;
    }

    const response = await fetch(this.url, {
      headers,
      signal: attempt.controller.signal,
    });
    touch();

    if (attempt.stopReason) {
      discardBody(response);
      return false;
    }

    if (response.status === 416) {
      discardBody(response);
      const serverSize = parseContentRangeTotal(response.headers.get('Content-Range'));
      if (serverSize !== null && serverSize === resumeOffset) {
        // Everything was already on disk
        this.progress = { loaded: resumeOffset, total: serverSize };
        this.setContentInfo(response, serverSize);
        return true;
      }
      throw new ServerError(response.status, response.statusText);
    }

    if (!response.ok) {
      discardBody(response);
      throw new ServerError(response.status, response.statusText);
    }

    if (response.status === 206) {
      const start = parseContentRangeStart(response.headers.get('Content-Range'));
      if (start !== null && start !== resumeOffset) {
        discardBody(response);
        throw new ServerError(response.status, `Content-Range starts at ${start}, expected ${resumeOffset}`);
      }
    }

    let skip = 0;
    if (resumeOffset > 0 && response.status === 200) {
      console.warn(`[Transfer] Server ignored Range header (200 OK). Skipping the first ${resumeOffset} bytes.`);
      skip = resumeOffset;
    }

    const total = expectedTotal(response, resumeOffset);
    this.progress = { loaded: resumeOffset, total };
    this.setContentInfo(response, total);

    const reader = response.body?.getReader();
    if (!reader) throw new TransferFailedError('No response body');
    attempt.reader = reader;
    if (attempt.stopReason) {
      await reader.cancel();
      return false;
    }

    while (true) {
      const { done, value } = await reader.read();
      if (attempt.stopReason) return false;
      if (done) return true;
      touch();

      let chunk = value;
      if (skip > 0) {
        const dropped = Math.min(skip, chunk.byteLength);
        skip -= dropped;
        chunk = chunk.subarray(dropped);
      }
      if (chunk.byteLength === 0) continue;

      this.pendingChunks.push(chunk);
      this.pendingSize += chunk.byteLength;
      this.progress.loaded += chunk.byteLength;
      if (this.live) this.callbacks.onBytesReceived?.(chunk, { ...this.progress });

      if (this.pendingSize >= this.config.downloadBufferFlushThreshold) {
        await this.flush();
      }
    }
  }

  private setContentInfo(response: Response, contentLength: number | null) {
    this.contentInfo = {
      contentType: response.headers.get('Content-Type'),
      contentLength,
      byteRangeAccessSupported: response.status === 206 || response.headers.get('Accept-Ranges') === 'bytes',
    };
    if (this.live) this.callbacks.onResponse?.(this.contentInfo);
  }

  private async flush(): Promise<void> {
    if (this.pendingSize === 0) return;
    const data = concatBytes(this.pendingChunks, this.pendingSize);
    this.pendingChunks = [];
    this.pendingSize = 0;

    await this.store.append(data);
    const persisted = await this.store.size();
    if (this.live) this.callbacks.onFlushed?.(persisted);
  }

  private async verify(): Promise<void> {
    const size = await this.store.size();
    const expected = this.progress.total;
    if (this.config.verifyDownloadedFileSize && expected !== null && expected !== size) {
      throw new SizeMismatchError(expected, size, 'expected');
    }
    const minimum = this.config.minimumExpectedFileSize;
    if (minimum > 0 && size < minimum) {
      throw new SizeMismatchError(minimum, size, 'minimum');
    }
  }

  private interrupt(cause: unknown) {
    if (this.state !== 'active') return;
    const error = new TransientConnectivityLossError(`Connection lost while downloading ${this.url}`, { cause });
    console.warn(`[Transfer] ${error.message}. Waiting for connectivity.`);
    this.setState('suspended');
    if (this.live) this.callbacks.onInterrupted?.(error);
  }

  private async fail(error: StreamCacheError): Promise<void> {
    if (this.state === 'completed' || this.state === 'failed') return;
    this.error = error;
    this.pendingChunks = [];
    this.pendingSize = 0;
    console.error(`[Transfer] Download failed: ${this.url}`, error);
    this.setState('failed');

    try {
      await this.store.delete();
    } catch (e: unknown) {
      console.warn('[Transfer] Failed to remove partial file', e);
    }
    if (this.live) this.callbacks.onFailed?.(error);
  }
}
