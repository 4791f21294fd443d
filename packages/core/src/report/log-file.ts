import { atomicWrite, formatBytes, formatDuration } from '@drivesort/shared';
import type { CategoryTotals, InspectReport } from '../aggregate';
import { exportStatus, type ExportReport } from '../export';
import type { ScanWarning } from '../scanner';

const RULE = '═'.repeat(70);
const SECTION_RULE = '─'.repeat(70);

const pad = (n: number) => String(n).padStart(2, '0');

/** Local time as `YYYY-MM-DD HH:mm:ss`. */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

function header(title: string, source: string, now: Date): string[] {
  return [title, RULE, '', `Source: ${source}`, `Timestamp: ${formatTimestamp(now)}`, ''];
}

function totalsSection(totals: CategoryTotals): string[] {
  const lines = [
    `Total files scanned: ${totals.totalFiles}`,
    `Total size: ${formatBytes(totals.totalBytes)}`,
    '',
    'FILES BY CATEGORY',
    SECTION_RULE,
  ];
  for (const { category, count, bytes } of totals.entries()) {
    lines.push(`${category}: ${count} files (${formatBytes(bytes)})`);
  }
  return lines;
}

function listSection(title: string, items: string[]): string[] {
  if (items.length === 0) return [];
  return ['', title, SECTION_RULE, ...items];
}

function describeWarning(warning: ScanWarning): string {
  return `${warning.path}: ${warning.message}`;
}

export function renderInspectLog(report: InspectReport, now: Date = new Date()): string {
  const lines = [
    ...header('DRIVESORT INSPECTION LOG', report.root, now),
    ...totalsSection(report.totals),
    ...listSection('SCAN ERRORS', report.scanWarnings.map(describeWarning)),
    '',
    `Elapsed: ${formatDuration(report.elapsedMs)}`,
    RULE,
    'End of log',
  ];
  return `${lines.join('\n')}\n`;
}

export function renderExportLog(report: ExportReport, now: Date = new Date()): string {
  const { job } = report;
  const lines = [
    ...header('DRIVESORT EXPORT LOG', job.root, now),
    `Destination: ${job.archive && !job.archive.keepDirectory ? '(archive only)' : job.destination}`,
    `Layout: ${job.layout}`,
    `Concurrency: ${job.concurrencyLimit}`,
    '',
    ...totalsSection(report.totals),
    '',
    `Files copied: ${report.copied.totalFiles}`,
    `Files failed: ${report.failures.length}`,
  ];

  if (report.archive) {
    lines.push(
      'error' in report.archive
        ? `Archive: FAILED (${report.archive.error})`
        : `Archive: ${report.archive.path} (${report.archive.entries} entries)`,
    );
  }
  lines.push(`Status: ${exportStatus(report)}`);
  if (report.aborted) {
    lines.push(`Aborted: ${report.aborted.reason}`);
  }

  lines.push(
    ...listSection('SCAN ERRORS', report.scanWarnings.map(describeWarning)),
    ...listSection(
      'EXPORT ERRORS',
      report.failures.map(({ record, outcome }) =>
        outcome.status === 'failed' ? `${record.sourcePath}: ${outcome.reason}` : record.sourcePath,
      ),
    ),
    '',
    `Elapsed: ${formatDuration(report.elapsedMs)}`,
    RULE,
    'End of log',
  );
  return `${lines.join('\n')}\n`;
}

export async function writeInspectLog(filePath: string, report: InspectReport): Promise<void> {
  await atomicWrite(filePath, renderInspectLog(report));
}

export async function writeExportLog(filePath: string, report: ExportReport): Promise<void> {
  await atomicWrite(filePath, renderExportLog(report));
}
