import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

/** Deterministic, non-repeating-looking payload. */
export function makeBytes(length: number) {
  return Uint8Array.from({ length }, (_, i) => (i * 7 + 3) % 251);
}

export function makeTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'stream-cache-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/** A response body the test feeds by hand. */
export class ControlledBody {
  public cancelled = false;
  private controller: ReadableStreamDefaultController<Uint8Array> | null = null;

  public readonly stream = new ReadableStream<Uint8Array>({
    start: (controller) => {
      this.controller = controller;
    },
    cancel: () => {
      this.cancelled = true;
    },
  });

  /** Ignored once the reader has cancelled the stream. */
  public push(bytes: Uint8Array) {
    if (this.cancelled) return;
    this.controller?.enqueue(bytes);
  }

  public close() {
    this.controller?.close();
  }

  public fail(error: unknown) {
    this.controller?.error(error);
  }
}

/** Pushes `data` in slices of `size` bytes. */
export function pushInSlices(body: ControlledBody, data: Uint8Array, size: number) {
  for (let offset = 0; offset < data.byteLength; offset += size) {
    body.push(data.slice(offset, offset + size));
  }
}

export function socketError(code: string): TypeError {
  return new TypeError('terminated', { cause: Object.assign(new Error('other side closed'), { code }) });
}
