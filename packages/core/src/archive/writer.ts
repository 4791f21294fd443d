import { createWriteStream, type WriteStream } from 'node:fs';
import fs from 'node:fs/promises';
import { once } from 'node:events';
import type { Readable } from 'node:stream';
import archiver from 'archiver';
import { ArchiveError, errnoCode, errorMessage, siblingTempPath } from '@drivesort/shared';

export interface ArchiveWriterOptions {
  /** Final location of the zip */
  path: string;
  compressionLevel: number;
  bufferSizeBytes: number;
}

export interface ArchiveSummary {
  path: string;
  entries: number;
}

interface PendingEntry {
  resolve(): void;
  reject(error: ArchiveError): void;
}

interface OpenArchive {
  archive: archiver.Archiver;
  output: WriteStream;
  tempPath: string;
}

/**
 * Streams entries into a zip written beside its target under a temporary
 * name. The target only appears once `finalize` succeeds; any failed entry
 * fails the whole archive and removes the temporary file.
 */
export class ArchiveWriter {
  private current?: OpenArchive;
  private pending: Array<PendingEntry | undefined> = [];
  private entryCount = 0;
  private failure?: ArchiveError;
  private closed = false;
  private readonly failed: Promise<void>;
  private markFailed: () => void = () => undefined;

  constructor(private readonly options: ArchiveWriterOptions) {
    this.failed = new Promise<void>((resolve) => {
      this.markFailed = resolve;
    });
  }

  get path(): string {
    return this.options.path;
  }

  /** Entries fully written so far */
  get entries(): number {
    return this.entryCount;
  }

  get error(): ArchiveError | undefined {
    return this.failure;
  }

  async open(): Promise<void> {
    if (this.current) {
      throw new ArchiveError(`Archive ${this.options.path} is already open`);
    }

    let tempPath: string;
    let output: WriteStream;
    try {
      tempPath = await siblingTempPath(this.options.path, '.zip.partial');
      output = createWriteStream(tempPath, { highWaterMark: this.options.bufferSizeBytes });
      await once(output, 'open');
    } catch (error) {
      throw this.wrap(error, `Cannot create archive ${this.options.path}`);
    }

    const archive = archiver('zip', {
      zlib: { level: this.options.compressionLevel },
      highWaterMark: this.options.bufferSizeBytes,
    });

    archive.on('entry', () => {
      this.entryCount++;
      this.pending.shift()?.resolve();
    });
    // Unreadable files arrive as warnings. A skipped entry is a failed archive.
    archive.on('warning', (error) => this.fail(error));
    archive.on('error', (error) => this.fail(error));
    output.on('error', (error) => this.fail(error));

    archive.pipe(output);
    this.current = { archive, output, tempPath };
  }

  /**
   * Queues a file on disk. Archiver reads it when its turn comes.
   */
  addFile(entryName: string, filePath: string): void {
    const { archive } = this.assertWritable();
    this.pending.push(undefined);
    archive.file(filePath, { name: entryName });
  }

  /**
   * Writes a stream as one entry. Resolves once the entry is complete, so
   * callers that await it feed the archive one source at a time.
   */
  addStream(entryName: string, source: Readable): Promise<void> {
    const { archive } = this.assertWritable();
    return new Promise<void>((resolve, reject) => {
      this.pending.push({ resolve, reject });
      source.once('error', (error) => this.fail(error));
      archive.append(source, { name: entryName });
    });
  }

  /**
   * Completes the archive and moves it into place.
   */
  async finalize(): Promise<ArchiveSummary> {
    const { archive, output, tempPath } = this.assertOpen();

    if (!this.failure) {
      const written = once(output, 'close').then(
        () => undefined,
        (error: unknown) => this.fail(error),
      );
      const finished = archive.finalize().catch((error: unknown) => this.fail(error));
      await Promise.race([Promise.all([finished, written]), this.failed]);
    }

    if (!this.failure) {
      try {
        await fs.rename(tempPath, this.options.path);
        this.closed = true;
        return { path: this.options.path, entries: this.entryCount };
      } catch (error) {
        this.fail(error);
      }
    }

    await this.abort();
    throw this.failure ?? new ArchiveError(`Archive ${this.options.path} failed`);
  }

  /**
   * Stops writing and deletes the temporary file. Safe to call more than once.
   */
  async abort(): Promise<void> {
    if (this.closed || !this.current) return;
    this.closed = true;

    const { archive, output, tempPath } = this.current;
    archive.abort();
    if (!output.closed) {
      await new Promise<void>((resolve) => {
        output.once('close', () => resolve());
        output.destroy();
      });
    }

    const aborted = this.failure ?? new ArchiveError(`Archive ${this.options.path} was aborted`);
    for (const entry of this.pending.splice(0)) entry?.reject(aborted);

    await fs.rm(tempPath, { force: true });
  }

  private fail(error: unknown): void {
    if (this.failure) return;
    this.failure = this.wrap(error, `Archive ${this.options.path} failed`);
    for (const entry of this.pending.splice(0)) entry?.reject(this.failure);
    this.markFailed();
  }

  private wrap(error: unknown, context: string): ArchiveError {
    if (error instanceof ArchiveError) return error;
    return new ArchiveError(`${context}: ${errorMessage(error)}`, {
      cause: error,
      details: { path: this.options.path, code: errnoCode(error) },
    });
  }

  private assertOpen(): OpenArchive {
    if (!this.current || this.closed) {
      throw new ArchiveError(`Archive ${this.options.path} is not open`);
    }
    return this.current;
  }

  private assertWritable(): OpenArchive {
    const current = this.assertOpen();
    if (this.failure) throw this.failure;
    return current;
  }
}
