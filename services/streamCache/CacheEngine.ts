import { BackingStore } from './BackingStore';
import { resolveConfig, type StreamCacheConfig } from './config';
import { ConnectivityMonitor, createDnsProbe, type ConnectivityProbe } from './ConnectivityMonitor';
import { CacheDisposedError, StreamCacheError, toStreamCacheError } from './errors';
import { RequestFulfiller, type ReadDelivery, type ReadRequestHandle } from './RequestFulfiller';
import { TransferController, type ContentInformation, type TransferState } from './TransferController';
import { concatBytes } from './utils/bytes';

export interface CacheEngineOptions {
  url: string;
  /** Where the downloaded bytes are kept. A partial file there is resumed. */
  filePath: string;
  /** Extra request headers sent with every attempt. */
  headers?: Record<string, string>;
  config?: Partial<StreamCacheConfig>;
  /** Defaults to resolving the stream's host through DNS. */
  connectivityProbe?: ConnectivityProbe;
}

export type CacheState = TransferState;

export interface CacheProgress {
  bytesDownloaded: number;
  bytesExpected: number | null;
}

export type CacheEvent =
  | ({ type: 'progress' } & CacheProgress)
  | { type: 'contentInformation'; info: ContentInformation }
  | { type: 'stateChanged'; state: CacheState }
  | { type: 'connectivityChanged'; connected: boolean }
  | { type: 'completed'; filePath: string }
  | { type: 'failed'; error: StreamCacheError };

export type CacheEventListener = (event: CacheEvent) => void;

export interface DisposeOptions {
  /** Delete the backing file unless the download completed. */
  removeIncomplete?: boolean;
}

/**
 * Progressive download cache for a single URL / file pair.
 *
 * Byte-range reads are answered from the backing file as the download fills
 * it; the first read starts the transfer. Connectivity changes suspend and
 * resume the transfer. `completed` and `failed` are emitted at most once and
 * nothing is emitted after them.
 */
export class CacheEngine {
  public readonly url: string;
  public readonly filePath: string;
  public readonly config: StreamCacheConfig;
  public readonly connectivity: ConnectivityMonitor;

  private readonly headers: Record<string, string>;
  private readonly store: BackingStore;
  private readonly transfer: TransferController;
  private readonly fulfiller: RequestFulfiller;
  private listeners = new Set<CacheEventListener>();

  private started = false;
  private terminal = false;
  private disposed = false;
  private failure: StreamCacheError | null = null;
  private initialSize = 0;

  constructor(options: CacheEngineOptions) {
    this.url = options.url;
    this.filePath = options.filePath;
    this.headers = { ...options.headers };
    this.config = resolveConfig(options.config);

    this.store = new BackingStore(options.filePath);
    this.transfer = new TransferController(this.store, this.config);
    this.fulfiller = new RequestFulfiller(this.store, this.config.maxInMemoryReadChunk);
    this.connectivity = new ConnectivityMonitor(
      options.connectivityProbe ?? createDnsProbe(new URL(options.url).hostname),
      this.config.connectivityPollIntervalMs
    );

    this.transfer.setCallbacks({
      onResponse: (info) => this.emit({ type: 'contentInformation', info }),
      onBytesReceived: (_chunk, progress) => this.emit({
        type: 'progress',
        bytesDownloaded: progress.loaded,
        bytesExpected: progress.total,
      }),
      onFlushed: () => this.runFulfillment(),
      onStateChange: (state) => {
        if (state === 'active' || state === 'suspended') this.emit({ type: 'stateChanged', state });
      },
      onInterrupted: () => this.connectivity.reportUnreachable(),
      onCompleted: () => {
        void this.handleCompletion();
      },
      onFailed: (error) => {
        void this.handleFailure(error);
      },
    });

    this.connectivity.onChange((connected) => this.handleConnectivity(connected));
    this.connectivity.start();

    // Allocate the backing file now; an existing partial file is picked up here
    void this.store.size().then(
      (size) => {
        this.initialSize = size;
      },
      (e: unknown) => this.handleFailure(toStreamCacheError(e))
    );
  }

  public get state(): CacheState {
    return this.failure ? 'failed' : this.transfer.state;
  }

  public get pendingReadCount(): number {
    return this.fulfiller.pendingCount;
  }

  public subscribe(listener: CacheEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Queues a read of `length` bytes at `offset`. Bytes are handed to
   * `delivery.onData` in order as they reach the disk.
   */
  public submitReadRequest(offset: number, length: number, delivery: ReadDelivery): ReadRequestHandle {
    const handle = this.fulfiller.add(offset, length, delivery);

    if (this.failure || this.disposed) {
      this.fulfiller.rejectAll(this.failure ?? new CacheDisposedError());
      return handle;
    }

    if (!this.started) {
      this.startTransfer();
    }

    if (this.transfer.state === 'completed') {
      void this.fulfiller.finish().catch((e: unknown) => this.handleFulfillmentError(e));
    } else {
      this.runFulfillment();
    }
    return handle;
  }

  public cancelReadRequest(handle: ReadRequestHandle) {
    this.fulfiller.cancel(handle);
  }

  /** Reads a whole range, resolving once every byte of it is on disk. */
  public read(offset: number, length: number, signal?: AbortSignal): Promise<Uint8Array> {
    return new Promise<Uint8Array>((resolve, reject) => {
      if (signal?.aborted) {
        reject(signal.reason);
        return;
      }

      const chunks: Uint8Array[] = [];
      const onAbort = () => {
        this.cancelReadRequest(handle);
        reject(signal?.reason);
      };
      const handle = this.submitReadRequest(offset, length, {
        onData: (chunk) => {
          chunks.push(chunk);
        },
        onComplete: () => {
          signal?.removeEventListener('abort', onAbort);
          resolve(concatBytes(chunks));
        },
        onError: (error) => {
          signal?.removeEventListener('abort', onAbort);
          reject(error);
        },
      });
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  public currentProgress(): CacheProgress {
    if (this.transfer.state === 'idle') {
      return { bytesDownloaded: this.initialSize, bytesExpected: null };
    }
    return {
      bytesDownloaded: this.transfer.progress.loaded,
      bytesExpected: this.transfer.progress.total,
    };
  }

  public contentInformation(): ContentInformation | null {
    return this.transfer.contentInfo;
  }

  /** Explicit cancellation: terminal, the partial file is removed. */
  public cancel() {
    this.transfer.cancel();
  }

  /**
   * Tears the engine down. A completed file always stays on disk; a partial
   * one stays too (a later engine resumes it) unless `removeIncomplete` is set.
   */
  public async dispose(options: DisposeOptions = {}): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;
    this.terminal = true;
    this.listeners.clear();
    this.connectivity.stop();

    await this.transfer.invalidate();
    this.fulfiller.rejectAll(new CacheDisposedError());

    if (options.removeIncomplete && this.transfer.state !== 'completed') {
      console.log(`[Cache] Removing incomplete download ${this.filePath}`);
      await this.store.delete();
    } else {
      await this.store.close();
    }
  }

  private startTransfer() {
    this.started = true;
    void this.store.size().then(
      (resumeOffset) => this.transfer.start(this.url, resumeOffset, this.headers),
      (e: unknown) => this.handleFailure(toStreamCacheError(e))
    );
  }

  private runFulfillment() {
    void this.fulfiller.fulfill().catch((e: unknown) => this.handleFulfillmentError(e));
  }

  private async handleFulfillmentError(e: unknown): Promise<void> {
    // A failing transfer removes the file under in-flight reads; its own error is reported
    if (this.transfer.state === 'failed') return;
    await this.handleFailure(toStreamCacheError(e));
  }

  private handleConnectivity(connected: boolean) {
    this.emit({ type: 'connectivityChanged', connected });
    if (!this.started || this.terminal || this.failure) return;

    if (connected) {
      void this.transfer.resume();
    } else {
      this.transfer.suspend();
    }
  }

  private async handleCompletion(): Promise<void> {
    try {
      await this.fulfiller.finish();
    } catch (e: unknown) {
      // The file is complete and verified; only the reads still waiting fail
      console.error('[Cache] Final read pass failed', e);
      this.fulfiller.rejectAll(toStreamCacheError(e));
    }
    this.emitTerminal({ type: 'completed', filePath: this.filePath });
  }

  private async handleFailure(error: StreamCacheError): Promise<void> {
    if (this.terminal || this.failure) {
      // Nothing left to download; just don't leave readers hanging
      this.fulfiller.rejectAll(error);
      return;
    }
    this.failure = error;
    this.fulfiller.rejectAll(error);

    if (this.transfer.state !== 'failed') {
      await this.transfer.invalidate();
    }
    try {
      await this.store.delete();
    } catch (e: unknown) {
      console.warn('[Cache] Failed to remove partial file', e);
    }
    this.emitTerminal({ type: 'failed', error });
  }

  private emit(event: CacheEvent) {
    if (this.terminal) return;
    this.notify(event);
  }

  private emitTerminal(event: CacheEvent) {
    if (this.terminal) return;
    this.terminal = true;
    this.notify(event);
  }

  private notify(event: CacheEvent) {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (e: unknown) {
        console.error(`[Cache] Listener for '${event.type}' threw`, e);
      }
    }
  }
}
