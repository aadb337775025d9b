import { mkdir, open, rm, type FileHandle } from 'node:fs/promises';
import { dirname } from 'node:path';
import { FilesystemError, OutOfRangeError } from './errors';
import { Mutex } from './utils/Mutex';

/**
 * Append-only file with random reads, used as the on-disk copy of one stream.
 *
 * Every operation runs under a single mutex so a reader never sees a size
 * larger than what has actually been written.
 */
export class BackingStore {
  private handle: FileHandle | null = null;
  private persisted = 0;
  private deleted = false;
  private readonly lock = new Mutex();

  constructor(public readonly filePath: string) { }

  public size(): Promise<number> {
    return this.lock.runExclusive(async () => {
      await this.ensureOpen();
      return this.persisted;
    });
  }

  public append(bytes: Uint8Array): Promise<void> {
    return this.lock.runExclusive(async () => {
      const handle = await this.ensureOpen();
      let written = 0;
      try {
        while (written < bytes.byteLength) {
          const { bytesWritten } = await handle.write(bytes, written, bytes.byteLength - written);
          written += bytesWritten;
        }
      } catch (e: unknown) {
        throw new FilesystemError(`Failed to append ${bytes.byteLength} bytes to ${this.filePath}`, { cause: e });
      } finally {
        // Whatever reached the file counts; the next append continues after it
        this.persisted += written;
      }
    });
  }

  /**
   * Reads up to `length` bytes at `offset`. The result is shorter when the
   * range runs past what has been persisted.
   */
  public read(offset: number, length: number): Promise<Uint8Array> {
    return this.lock.runExclusive(async () => {
      const handle = await this.ensureOpen();
      if (offset >= this.persisted) {
        throw new OutOfRangeError(offset, this.persisted);
      }

      const wanted = Math.min(length, this.persisted - offset);
      const buffer = new Uint8Array(wanted);
      let filled = 0;
      try {
        while (filled < wanted) {
          const { bytesRead } = await handle.read(buffer, filled, wanted - filled, offset + filled);
          if (bytesRead === 0) break;
          filled += bytesRead;
        }
      } catch (e: unknown) {
        throw new FilesystemError(`Failed to read ${wanted} bytes at ${offset} from ${this.filePath}`, { cause: e });
      }

      return filled === wanted ? buffer : buffer.subarray(0, filled);
    });
  }

  /** Removes the backing file. Safe to call more than once. */
  public delete(): Promise<void> {
    return this.lock.runExclusive(async () => {
      this.deleted = true;
      await this.closeHandle();
      try {
        await rm(this.filePath, { force: true });
      } catch (e: unknown) {
        throw new FilesystemError(`Failed to delete ${this.filePath}`, { cause: e });
      }
    });
  }

  /** Releases the file handle; the file stays on disk. */
  public close(): Promise<void> {
    return this.lock.runExclusive(() => this.closeHandle());
  }

  private async ensureOpen(): Promise<FileHandle> {
    if (this.deleted) {
      throw new FilesystemError(`Backing file ${this.filePath} has been deleted`);
    }
    if (this.handle) return this.handle;

    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      // a+ creates the file when missing, appends on write and allows positional reads
      const handle = await open(this.filePath, 'a+');
      const stats = await handle.stat();
      this.handle = handle;
      this.persisted = stats.size;
      if (stats.size > 0) {
        console.log(`[Store] Reusing ${stats.size} bytes already in ${this.filePath}`);
      }
      return handle;
    } catch (e: unknown) {
      throw new FilesystemError(`Failed to open ${this.filePath}`, { cause: e });
    }
  }

  private async closeHandle(): Promise<void> {
    const handle = this.handle;
    this.handle = null;
    if (!handle) return;
    try {
      await handle.close();
    } catch (e: unknown) {
      throw new FilesystemError(`Failed to close ${this.filePath}`, { cause: e });
    }
  }
}
