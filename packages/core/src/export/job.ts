import path from 'node:path';
import { UsageError, isWithin } from '@drivesort/shared';
import type { ArchiveSettings, ExportJob, Layout } from './types';

export const DEFAULT_CONCURRENCY = 10;
export const MAX_CONCURRENCY = 256;

export interface ExportJobInput {
  root: string;
  destination: string;
  concurrencyLimit?: number;
  layout?: Layout;
  archive?: Partial<ArchiveSettings>;
}

/**
 * Validates and freezes an export job. Paths are resolved to absolute form.
 */
export function createExportJob(input: ExportJobInput): ExportJob {
  const root = path.resolve(input.root);
  const destination = path.resolve(input.destination);
  const concurrencyLimit = input.concurrencyLimit ?? DEFAULT_CONCURRENCY;

  if (!Number.isInteger(concurrencyLimit) || concurrencyLimit < 1 || concurrencyLimit > MAX_CONCURRENCY) {
    throw new UsageError(
      `Concurrency must be an integer between 1 and ${MAX_CONCURRENCY}, got ${concurrencyLimit}`,
    );
  }
  if (isWithin(root, destination)) {
    throw new UsageError(`Destination ${destination} must not be inside the source ${root}`);
  }
  if (isWithin(destination, root)) {
    throw new UsageError(`Source ${root} must not be inside the destination ${destination}`);
  }

  let archive: ArchiveSettings | undefined;
  if (input.archive) {
    const level = input.archive.compressionLevel ?? 6;
    if (!Number.isInteger(level) || level < 0 || level > 9) {
      throw new UsageError(`Compression level must be between 0 and 9, got ${level}`);
    }
    const archivePath = path.resolve(input.archive.path ?? `${destination}.zip`);
    if (isWithin(root, archivePath)) {
      throw new UsageError(`Archive ${archivePath} must not be inside the source ${root}`);
    }
    archive = Object.freeze({
      path: archivePath,
      compressionLevel: level,
      bufferSizeBytes: input.archive.bufferSizeBytes ?? 256 * 1024,
      keepDirectory: input.archive.keepDirectory ?? true,
    });
  }

  return Object.freeze({
    root,
    destination,
    concurrencyLimit,
    layout: input.layout ?? 'mirror',
    ...(archive ? { archive } : {}),
  });
}
