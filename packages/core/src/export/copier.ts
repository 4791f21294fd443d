import { createReadStream } from 'node:fs';
import fs from 'node:fs/promises';
import { pipeline } from 'node:stream/promises';
import { ensureDir } from 'fs-extra';
import type { FileRecord } from '../scanner';
import type { FileCopier } from './types';

export interface StreamCopierOptions {
  /** Stream chunk size in bytes */
  highWaterMark?: number;
  /** Set the copy's modification time to the source's. Default: true */
  preserveTimestamps?: boolean;
}

/**
 * Copies through a read/write stream pair. The destination is opened with
 * `wx`, so an existing file is never touched; a copy that fails after the
 * destination was created removes what it wrote.
 */
export class StreamCopier implements FileCopier {
  private readonly highWaterMark?: number;
  private readonly preserveTimestamps: boolean;

  constructor(options: StreamCopierOptions = {}) {
    this.highWaterMark = options.highWaterMark;
    this.preserveTimestamps = options.preserveTimestamps ?? true;
  }

  async copy(record: FileRecord, destination: string): Promise<number> {
    const handle = await fs.open(destination, 'wx');
    const output = handle.createWriteStream({ highWaterMark: this.highWaterMark });

    try {
      await pipeline(
        createReadStream(record.sourcePath, { highWaterMark: this.highWaterMark }),
        output,
      );
      if (this.preserveTimestamps) {
        const mtime = new Date(record.mtimeMs);
        await fs.utimes(destination, mtime, mtime);
      }
    } catch (error) {
      await fs.rm(destination, { force: true });
      throw error;
    }

    return output.bytesWritten;
  }
}

/**
 * Creates directories at most once each. Concurrent callers for the same
 * directory share one pending creation; a failed creation is retried by the
 * next caller.
 */
export class DirectoryCache {
  private readonly created = new Map<string, Promise<void>>();

  ensure(dir: string): Promise<void> {
    let pending = this.created.get(dir);
    if (!pending) {
      pending = ensureDir(dir).then(
        () => undefined,
        (error: unknown) => {
          this.created.delete(dir);
          throw error;
        },
      );
      this.created.set(dir, pending);
    }
    return pending;
  }

  get size(): number {
    return this.created.size;
  }
}
