import pc from 'picocolors';
import { formatBytes, formatDuration } from '@drivesort/shared';
import {
  exportStatus,
  type CategoryConflict,
  type CategoryTotals,
  type ExportReport,
  type InspectReport,
  type ScanWarning,
} from '@drivesort/core';
import { printTable } from './index';

/** How many failures or warnings are listed before the rest are summarised. */
const MAX_LISTED = 10;

export interface RenderExtras {
  logPath?: string;
}

export function inspectJson(report: InspectReport, extras: RenderExtras = {}) {
  return {
    root: report.root,
    ...report.totals.toJSON(),
    scanWarnings: report.scanWarnings,
    elapsedMs: Math.round(report.elapsedMs),
    logPath: extras.logPath,
  };
}

export function exportJson(report: ExportReport, extras: RenderExtras = {}) {
  const { job } = report;
  return {
    status: exportStatus(report),
    root: job.root,
    destination: job.archive?.keepDirectory === false ? undefined : job.destination,
    layout: job.layout,
    concurrency: job.concurrencyLimit,
    totals: report.totals.toJSON(),
    copied: report.copied.toJSON(),
    failures: report.failures.map(({ record, outcome }) => ({
      sourcePath: record.sourcePath,
      category: record.category,
      reason: outcome.status === 'failed' ? outcome.reason : undefined,
      code: outcome.status === 'failed' ? outcome.code : undefined,
    })),
    scanWarnings: report.scanWarnings,
    archive: report.archive,
    aborted: report.aborted,
    peakConcurrency: report.peakConcurrency,
    elapsedMs: Math.round(report.elapsedMs),
    logPath: extras.logPath,
  };
}

export class OutputRenderer {
  constructor(private isJson: boolean) {}

  renderInspect(report: InspectReport, extras: RenderExtras = {}): void {
    if (this.isJson) {
      console.log(JSON.stringify(inspectJson(report, extras), null, 2));
      return;
    }

    console.log(pc.bold(`\nSource: ${report.root}`));
    this.renderTotals(report.totals);
    console.log(
      `\n${pc.bold('Total:')} ${report.totals.totalFiles} files, ` +
        `${formatBytes(report.totals.totalBytes)} in ${formatDuration(report.elapsedMs)}`,
    );
    this.renderWarnings(report.scanWarnings);
    if (extras.logPath) {
      console.log(`\nLog: ${extras.logPath}`);
    }
  }

  renderExport(report: ExportReport, extras: RenderExtras = {}): void {
    if (this.isJson) {
      console.log(JSON.stringify(exportJson(report, extras), null, 2));
      return;
    }

    const status = exportStatus(report);
    if (status === 'success') {
      console.log(`\n${pc.green('✅ Export complete.')}`);
    } else if (status === 'partial') {
      console.log(`\n${pc.yellow('⚠️  Export finished with problems.')}`);
    } else {
      const reason = report.aborted?.reason ?? 'the archive could not be written';
      console.log(`\n${pc.red(`❌ Export aborted: ${reason}`)}`);
    }

    this.renderTotals(report.totals);
    console.log(
      `\n${pc.bold('Copied:')} ${report.copied.totalFiles} of ${report.totals.totalFiles} files ` +
        `(${formatBytes(report.copied.totalBytes)}) in ${formatDuration(report.elapsedMs)}`,
    );

    const { job } = report;
    if (job.archive?.keepDirectory !== false) {
      console.log(`  Directory: ${job.destination}`);
    }
    if (report.archive) {
      if ('error' in report.archive) {
        console.log(`  Archive: ${pc.red(`failed (${report.archive.error})`)}`);
      } else {
        console.log(`  Archive: ${report.archive.path} (${report.archive.entries} entries)`);
      }
    }

    if (report.failures.length > 0) {
      console.log(pc.bold(`\nFailed files (${report.failures.length}):`));
      this.renderList(
        report.failures.map(({ record, outcome }) =>
          outcome.status === 'failed'
            ? `${record.relativePath}: ${outcome.reason}`
            : record.relativePath,
        ),
      );
    }
    this.renderWarnings(report.scanWarnings);
    if (extras.logPath) {
      console.log(`\nLog: ${extras.logPath}`);
    }
  }

  renderConflicts(conflicts: readonly CategoryConflict[]): void {
    for (const conflict of conflicts) {
      this.warn(
        `Extension ${conflict.extension} is listed in "${conflict.keptIn}" and ` +
          `"${conflict.droppedFrom}"; files go to "${conflict.keptIn}".`,
      );
    }
  }

  private renderTotals(totals: CategoryTotals): void {
    const rows = totals.entries().map(({ category, count, bytes }) => ({
      Category: category,
      Files: count,
      Size: formatBytes(bytes),
    }));
    if (rows.length === 0) {
      console.log(pc.gray('\nNo files found.'));
      return;
    }
    printTable(rows, { colAligns: ['left', 'right', 'right'] });
  }

  private renderWarnings(warnings: ScanWarning[]): void {
    if (warnings.length === 0) return;
    console.log(pc.bold(`\nUnreadable entries (${warnings.length}):`));
    this.renderList(warnings.map((w) => `${w.path}: ${w.message}`));
  }

  private renderList(items: string[]): void {
    items.slice(0, MAX_LISTED).forEach((item) => console.log(`  - ${item}`));
    if (items.length > MAX_LISTED) {
      console.log(`  ... and ${items.length - MAX_LISTED} more.`);
    }
  }

  log(message: string): void {
    if (!this.isJson) {
      console.log(pc.gray(message));
    }
  }

  warn(message: string): void {
    console.error(this.isJson ? JSON.stringify({ warning: message }) : pc.yellow(`⚠️  ${message}`));
  }

  error(message: string | Error): void {
    const msg = message instanceof Error ? message.message : message;
    if (this.isJson) {
      console.error(JSON.stringify({ error: msg }));
    } else {
      console.error(pc.red(msg));
    }
  }
}
