import type { FileRecord, ScanWarning } from '../scanner';
import type { CategoryTotals } from '../aggregate';

/** `mirror` keeps each file's relative path; `flat` keeps only its base name. */
export type Layout = 'mirror' | 'flat';

export interface ArchiveSettings {
  /** Where the finished zip is placed */
  readonly path: string;
  /** zlib level, 0 (store) to 9 */
  readonly compressionLevel: number;
  /** High-water mark for the streams feeding the archive */
  readonly bufferSizeBytes: number;
  /** Also write the categorized directory tree */
  readonly keepDirectory: boolean;
}

export interface ExportJob {
  readonly root: string;
  readonly destination: string;
  readonly concurrencyLimit: number;
  readonly layout: Layout;
  /** Present when an archive is requested */
  readonly archive?: Readonly<ArchiveSettings>;
}

export type CopyOutcome =
  | { status: 'copied'; destination: string }
  | { status: 'failed'; reason: string; code?: string };

export interface CopyResult {
  record: FileRecord;
  outcome: CopyOutcome;
  bytesCopied: number;
}

export type ArchiveOutcome = { path: string; entries: number } | { path: string; error: string };

export interface ExportReport {
  job: ExportJob;
  /** Every file scanned, per category */
  totals: CategoryTotals;
  /** Files that reached the destination, per category */
  copied: CategoryTotals;
  failures: CopyResult[];
  scanWarnings: ScanWarning[];
  archive?: ArchiveOutcome;
  aborted?: { reason: string };
  /** Highest number of copies that ran at once */
  peakConcurrency: number;
  elapsedMs: number;
}

export type ExportStatus = 'success' | 'partial' | 'aborted';

/**
 * Interface for the component that moves one file into the destination.
 * Implementations must create `destination` exclusively and fail with
 * `EEXIST` if it is already there.
 */
export interface FileCopier {
  /** Resolves to the number of bytes written */
  copy(record: FileRecord, destination: string): Promise<number>;
}
