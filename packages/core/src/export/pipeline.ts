import { constants } from 'node:fs';
import fs, { type FileHandle } from 'node:fs/promises';
import path from 'node:path';
import { randomUUID } from 'node:crypto';
import { performance } from 'node:perf_hooks';
import { ensureDir } from 'fs-extra';
import {
  CopyError,
  EventQueue,
  FatalIOError,
  SilentLogger,
  createEvent,
  errnoCode,
  errorMessage,
  type ArchiveFailed,
  type ArchiveFinished,
  type CopyFailed,
  type ExportAborted,
  type Logger,
  type RunFinished,
  type ScanError,
  type ScanStarted,
  type ScanWarningEvent,
} from '@drivesort/shared';
import type { CategoryTable } from '../categories';
import { Scanner, ExclusionRules, type FileRecord, type ScanFs, type ScanWarning } from '../scanner';
import { CategoryTotals, toScanWarning } from '../aggregate';
import { ArchiveWriter } from '../archive';
import { DirectoryCache, StreamCopier } from './copier';
import { DestinationNamer, destinationPath } from './namer';
import { WorkerPool } from './pool';
import { exportStatus } from './status';
import type { ArchiveOutcome, CopyResult, ExportJob, ExportReport, FileCopier } from './types';

/** Error codes that mean nothing more can be written to the destination. */
const FATAL_DESTINATION_CODES = new Set(['EROFS']);

/** Give up on a file whose name keeps colliding with files already on disk. */
const MAX_RENAME_ATTEMPTS = 1000;

export interface ExportPipelineOptions {
  table: CategoryTable;
  exclude?: readonly string[] | ExclusionRules;
  /** Defaults to a StreamCopier using the job's archive buffer size */
  copier?: FileCopier;
  logger?: Logger;
  runId?: string;
  /** Filesystem used by the scanner */
  scanFs?: ScanFs;
  /** Aborting stops submission; copies already running finish */
  signal?: AbortSignal;
  onResult?: (result: CopyResult) => void;
  onWarning?: (warning: ScanWarning) => void;
}

/**
 * Scans a root and exports every record into per-category directories,
 * a zip archive, or both.
 *
 * @example
 * ```typescript
 * const pipeline = new ExportPipeline({ table, exclude: DEFAULT_EXCLUDES });
 * const report = await pipeline.run(createExportJob({ root: '/mnt/usb', destination: '/tmp/out' }));
 * ```
 */
export class ExportPipeline {
  constructor(private readonly options: ExportPipelineOptions) {}

  run(job: ExportJob): Promise<ExportReport> {
    return new ExportRun(job, this.options).execute();
  }
}

class ExportRun {
  private readonly scanner: Scanner;
  private readonly copier: FileCopier;
  private readonly logger: Logger;
  private readonly runId: string;
  private readonly writesDirectory: boolean;

  private readonly pool: WorkerPool;
  private readonly namer: DestinationNamer;
  private readonly dirs = new DirectoryCache();
  private readonly controller = new AbortController();

  private readonly totals = new CategoryTotals();
  private readonly copied = new CategoryTotals();
  private readonly failures: CopyResult[] = [];
  private readonly scanWarnings: ScanWarning[] = [];
  private archive?: ArchiveWriter;
  private archiveOutcome?: ArchiveOutcome;
  private aborted?: { reason: string };
  private readonly events: EventQueue;

  constructor(
    private readonly job: ExportJob,
    private readonly options: ExportPipelineOptions,
  ) {
    this.scanner = new Scanner(options.table, options.scanFs);
    this.copier =
      options.copier ?? new StreamCopier({ highWaterMark: job.archive?.bufferSizeBytes });
    this.runId = options.runId ?? randomUUID();
    this.logger = (options.logger ?? new SilentLogger()).child({ runId: this.runId });
    this.events = new EventQueue(this.logger);
    this.writesDirectory = job.archive?.keepDirectory ?? true;
    this.pool = new WorkerPool(job.concurrencyLimit);
    this.namer = new DestinationNamer(job.layout === 'flat');
  }

  async execute(): Promise<ExportReport> {
    const started = performance.now();
    const detach = this.linkSignal();

    try {
      await this.scanner.checkRoot(this.job.root);
      if (this.writesDirectory) await this.prepareDestination();
      if (this.job.archive) await this.openArchive();

      // From here on, work already done is reported rather than thrown away.
      let failure: { error: unknown } | undefined;
      try {
        await this.produce();
      } catch (error) {
        failure = { error };
      }
      try {
        await this.pool.drain();
      } catch (error) {
        failure ??= { error };
      }

      if (failure) {
        await this.stop(failure.error);
      } else {
        await this.closeArchive();
      }
    } finally {
      detach();
    }

    const report: ExportReport = {
      job: this.job,
      totals: this.totals,
      copied: this.copied,
      failures: this.failures,
      scanWarnings: this.scanWarnings,
      peakConcurrency: this.pool.peak,
      elapsedMs: performance.now() - started,
    };
    if (this.archiveOutcome) report.archive = this.archiveOutcome;
    if (this.aborted) report.aborted = this.aborted;

    this.events.push(
      createEvent<RunFinished>(this.runId, 'RunFinished', {
        mode: 'export',
        status: exportStatus(report),
        files: this.totals.totalFiles,
        bytes: this.totals.totalBytes,
        failed: this.failures.length,
        elapsedMs: Math.round(report.elapsedMs),
      }),
    );
    await this.events.flush();
    return report;
  }

  /**
   * The single producer: one record at a time, held back by the pool.
   */
  private async produce(): Promise<void> {
    const rules = ExclusionRules.from(this.options.exclude);
    this.events.push(
      createEvent<ScanStarted>(this.runId, 'ScanStarted', {
        root: this.job.root,
        exclude: [...rules.patterns],
      }),
    );

    const records = this.scanner.scan(this.job.root, {
      exclude: rules,
      signal: this.controller.signal,
      onWarning: (error) => this.recordWarning(error),
    });

    for await (const record of records) {
      if (this.aborted) break;
      this.totals.add(record.category, record.sizeBytes);
      const entry = this.namer.reserve(destinationPath(record, this.job.layout));

      if (this.writesDirectory) {
        await this.pool.submit(() => this.copyToDirectory(record, entry));
      } else {
        await this.copyToArchive(record, entry);
      }
    }
  }

  private async copyToDirectory(record: FileRecord, entry: string): Promise<void> {
    let relative = entry;

    for (let attempt = 1; ; attempt++) {
      const target = path.join(this.job.destination, ...relative.split('/'));
      try {
        await this.dirs.ensure(path.dirname(target));
        const bytes = await this.copier.copy(record, target);
        this.succeed(record, relative, bytes);
        if (this.archive && !this.archive.error) {
          this.archive.addFile(relative, target);
        }
        return;
      } catch (error) {
        if (errnoCode(error) === 'EEXIST' && attempt < MAX_RENAME_ATTEMPTS) {
          // Something already sits at this name on disk; take the next one.
          relative = this.namer.retry(entry, attempt);
          continue;
        }
        await this.failCopy(record, error);
        return;
      }
    }
  }

  /**
   * Archive-only mode: stream the source straight into the zip.
   */
  private async copyToArchive(record: FileRecord, entry: string): Promise<void> {
    const archive = this.archive;
    if (!archive || archive.error) return;

    let source: FileHandle;
    try {
      source = await fs.open(record.sourcePath, 'r');
    } catch (error) {
      await this.failCopy(record, error);
      return;
    }

    const stream = source.createReadStream({ highWaterMark: this.job.archive?.bufferSizeBytes });
    try {
      await archive.addStream(entry, stream);
      this.succeed(record, entry, stream.bytesRead);
    } catch (error) {
      stream.destroy();
      this.abort(`Archive failed while writing ${entry}: ${errorMessage(error)}`);
    }
  }

  private succeed(record: FileRecord, destination: string, bytesCopied: number): void {
    this.copied.add(record.category, bytesCopied);
    this.options.onResult?.({ record, outcome: { status: 'copied', destination }, bytesCopied });
  }

  private async failCopy(record: FileRecord, cause: unknown): Promise<void> {
    const code = errnoCode(cause);
    const reason = errorMessage(cause);
    const error = new CopyError(record.sourcePath, `Failed to copy ${record.relativePath}: ${reason}`, {
      cause,
      details: { code },
    });

    const result: CopyResult = {
      record,
      outcome: code ? { status: 'failed', reason, code } : { status: 'failed', reason },
      bytesCopied: 0,
    };
    this.failures.push(result);
    this.options.onResult?.(result);
    await this.logger.debug(error.message);
    this.events.push(
      createEvent<CopyFailed>(this.runId, 'CopyFailed', {
        sourcePath: record.sourcePath,
        category: record.category,
        reason,
        ...(code ? { code } : {}),
      }),
    );

    if (code && FATAL_DESTINATION_CODES.has(code)) {
      this.abort(`Destination ${this.job.destination} is read-only`);
    } else if (this.writesDirectory && !(await this.destinationWritable())) {
      this.abort(`Destination ${this.job.destination} is no longer accessible`);
    }
  }

  /**
   * Stops submission. Copies already running are left to finish.
   */
  private abort(reason: string): void {
    if (this.aborted) return;
    this.aborted = { reason };
    this.controller.abort();
    this.events.push(
      createEvent<ExportAborted>(this.runId, 'ExportAborted', {
        reason,
        inFlight: this.pool.active,
      }),
    );
  }

  /**
   * Ends a run that broke off unexpectedly. The archive is discarded; the
   * files already copied stay and are reported.
   */
  private async stop(error: unknown): Promise<void> {
    const reason = `Export stopped: ${errorMessage(error)}`;
    this.abort(reason);
    await this.logger.error(error instanceof Error ? error : new Error(reason), reason);

    const archive = this.archive;
    if (archive) {
      await archive.abort();
      this.recordArchiveFailure(archive.path, `Archive discarded: ${errorMessage(error)}`);
    }
  }

  private recordWarning(error: ScanError): void {
    const warning = toScanWarning(error);
    this.scanWarnings.push(warning);
    this.options.onWarning?.(warning);
    this.events.push(createEvent<ScanWarningEvent>(this.runId, 'ScanWarning', warning));
  }

  private async prepareDestination(): Promise<void> {
    const destination = this.job.destination;
    try {
      await ensureDir(destination);
      await fs.access(destination, constants.W_OK);
    } catch (error) {
      throw new FatalIOError(`Cannot write to destination ${destination}: ${errorMessage(error)}`, {
        cause: error,
        details: { destination, code: errnoCode(error) },
      });
    }
  }

  private async destinationWritable(): Promise<boolean> {
    try {
      await fs.access(this.job.destination, constants.W_OK);
      return true;
    } catch {
      return false;
    }
  }

  private async openArchive(): Promise<void> {
    const settings = this.job.archive;
    if (!settings) return;

    const writer = new ArchiveWriter({
      path: settings.path,
      compressionLevel: settings.compressionLevel,
      bufferSizeBytes: settings.bufferSizeBytes,
    });
    try {
      await writer.open();
      this.archive = writer;
    } catch (error) {
      // Without a directory tree there is nothing left to produce.
      if (!this.writesDirectory) throw error;
      this.recordArchiveFailure(settings.path, error);
    }
  }

  private async closeArchive(): Promise<void> {
    const archive = this.archive;
    if (!archive) return;

    try {
      const summary = await archive.finalize();
      this.archiveOutcome = summary;
      this.events.push(createEvent<ArchiveFinished>(this.runId, 'ArchiveFinished', summary));
    } catch (error) {
      this.recordArchiveFailure(archive.path, error);
    }
  }

  private recordArchiveFailure(archivePath: string, error: unknown): void {
    const reason = errorMessage(error);
    this.archiveOutcome = { path: archivePath, error: reason };
    this.events.push(
      createEvent<ArchiveFailed>(this.runId, 'ArchiveFailed', { path: archivePath, reason }),
    );
  }

  private linkSignal(): () => void {
    const signal = this.options.signal;
    if (!signal) return () => undefined;

    const onAbort = () => this.abort('Cancelled');
    if (signal.aborted) {
      onAbort();
      return () => undefined;
    }
    signal.addEventListener('abort', onAbort, { once: true });
    return () => signal.removeEventListener('abort', onAbort);
  }
}
