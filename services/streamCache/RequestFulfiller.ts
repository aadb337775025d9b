import type { BackingStore } from './BackingStore';
import { OutOfRangeError } from './errors';
import { Mutex } from './utils/Mutex';

export interface ReadDelivery {
  /** Next slice of the requested range, in order. */
  onData: (chunk: Uint8Array) => void;
  /** The range has been delivered, or the file ended before it. */
  onComplete: () => void;
  onError: (error: Error) => void;
}

export interface ReadRequestHandle {
  readonly id: number;
  readonly offset: number;
  readonly length: number;
}

export type ReadRequestStatus = 'pending' | 'fulfilled' | 'cancelled' | 'rejected';

interface PendingReadRequest extends ReadRequestHandle {
  currentOffset: number;
  status: ReadRequestStatus;
  delivery: ReadDelivery;
}

/**
 * Holds outstanding byte-range reads and serves them from the backing store
 * as bytes become available.
 */
export class RequestFulfiller {
  private pending = new Map<number, PendingReadRequest>();
  private readonly lock = new Mutex();
  private nextId = 1;

  constructor(
    private readonly store: BackingStore,
    private readonly maxInMemoryReadChunk: number
  ) { }

  public get pendingCount(): number {
    return this.pending.size;
  }

  public add(offset: number, length: number, delivery: ReadDelivery): ReadRequestHandle {
    if (!Number.isInteger(offset) || offset < 0) {
      throw new RangeError(`Invalid read offset ${offset}`);
    }
    if (!Number.isInteger(length) || length < 0) {
      throw new RangeError(`Invalid read length ${length}`);
    }

    const request: PendingReadRequest = {
      id: this.nextId++,
      offset,
      length,
      currentOffset: offset,
      status: 'pending',
      delivery,
    };
    this.pending.set(request.id, request);
    return { id: request.id, offset, length };
  }

  /** Returns false when the request was no longer pending. */
  public cancel(handle: ReadRequestHandle): boolean {
    const request = this.pending.get(handle.id);
    if (!request) return false;
    request.status = 'cancelled';
    this.pending.delete(handle.id);
    return true;
  }

  /** One fulfillment pass over every pending request. */
  public fulfill(): Promise<void> {
    return this.lock.runExclusive(() => this.pass(false));
  }

  /**
   * Final pass once the download has completed: whatever is still pending
   * after it asks for bytes past the end of the file, so it completes short.
   */
  public finish(): Promise<void> {
    return this.lock.runExclusive(() => this.pass(true));
  }

  public rejectAll(error: Error) {
    const requests = [...this.pending.values()];
    this.pending.clear();
    for (const request of requests) {
      request.status = 'rejected';
      try {
        request.delivery.onError(error);
      } catch (e: unknown) {
        console.error(`[Fulfiller] Error handler of request ${request.id} threw`, e);
      }
    }
  }

  private async pass(endOfFile: boolean): Promise<void> {
    if (this.pending.size === 0) return;
    const size = await this.store.size();

    for (const request of [...this.pending.values()]) {
      await this.serve(request, size);
      if (endOfFile && request.status === 'pending') {
        this.settle(request);
      }
    }
  }

  private async serve(request: PendingReadRequest, size: number): Promise<void> {
    const end = request.offset + request.length;

    while (request.status === 'pending') {
      if (request.currentOffset >= end) {
        this.settle(request);
        return;
      }

      const available = size - request.currentOffset;
      if (available <= 0) return;

      const deliverable = Math.min(available, end - request.currentOffset, this.maxInMemoryReadChunk);
      let bytes: Uint8Array;
      try {
        bytes = await this.store.read(request.currentOffset, deliverable);
      } catch (e: unknown) {
        if (e instanceof OutOfRangeError) return;
        throw e;
      }

      // Cancelled while the read was in flight
      if (request.status !== 'pending' || bytes.byteLength === 0) return;

      request.currentOffset += bytes.byteLength;
      try {
        request.delivery.onData(bytes);
      } catch (e: unknown) {
        console.error(`[Fulfiller] Data handler of request ${request.id} threw, dropping it`, e);
        request.status = 'rejected';
        this.pending.delete(request.id);
        return;
      }
    }
  }

  private settle(request: PendingReadRequest) {
    request.status = 'fulfilled';
    this.pending.delete(request.id);
    try {
      request.delivery.onComplete();
    } catch (e: unknown) {
      console.error(`[Fulfiller] Completion handler of request ${request.id} threw`, e);
    }
  }
}
