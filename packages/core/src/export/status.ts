import type { ExportReport, ExportStatus } from './types';

/**
 * Overall outcome of an export.
 *
 * A run is `aborted` when it stopped early, or when its only output was an
 * archive that failed. Per-file failures, or a failed archive next to a
 * complete directory tree, make it `partial`.
 */
export function exportStatus(
  report: Pick<ExportReport, 'job' | 'failures' | 'archive' | 'aborted'>,
): ExportStatus {
  const archiveFailed = report.archive !== undefined && 'error' in report.archive;
  const keepsDirectory = report.job.archive?.keepDirectory ?? true;

  if (report.aborted || (archiveFailed && !keepsDirectory)) return 'aborted';
  if (report.failures.length > 0 || archiveFailed) return 'partial';
  return 'success';
}
