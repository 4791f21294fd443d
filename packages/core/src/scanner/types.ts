import type { Dirent, Stats } from 'node:fs';
import type { ScanError } from '@drivesort/shared';
import type { ExclusionRules } from './exclusions';

/**
 * One regular file found under the scan root. Frozen once created.
 */
export interface FileRecord {
  readonly sourcePath: string;
  /** Path relative to the scan root, `/`-separated */
  readonly relativePath: string;
  readonly sizeBytes: number;
  readonly category: string;
  readonly mtimeMs: number;
}

export type SkipReason = 'excluded' | 'symlink' | 'special';

export interface ScanSkip {
  relativePath: string;
  reason: SkipReason;
}

/** Plain form of a ScanError, kept in reports. */
export interface ScanWarning {
  path: string;
  message: string;
  code?: string;
}

export interface ScanOptions {
  /** Gitignore-style patterns, or prebuilt rules */
  exclude?: readonly string[] | ExclusionRules;
  signal?: AbortSignal;
  /** Called for every unreadable directory or vanished entry; the scan continues */
  onWarning?: (error: ScanError) => void;
  onSkip?: (skip: ScanSkip) => void;
}

/**
 * The subset of `fs/promises` the scanner needs.
 */
export interface ScanFs {
  readdir(path: string, options: { withFileTypes: true }): Promise<Dirent[]>;
  lstat(path: string): Promise<Stats>;
  stat(path: string): Promise<Stats>;
}
