import { Command } from 'commander';
import path from 'path';
import { randomUUID } from 'crypto';
import {
  EventQueue,
  createEvent,
  type RunFinished,
  type ScanStarted,
  type ScanWarningEvent,
} from '@drivesort/shared';
import { ConfigLoader, buildCategoryTable, inspect, writeInspectLog } from '@drivesort/core';
import { OutputRenderer } from '../output/renderer';
import { EXIT_CODES } from '../exit-codes';
import { createRunLogger, type CliContext, type GlobalOptions } from '../options';

interface InspectOptions {
  exclude?: string[];
  log?: string;
}

export function registerInspectCommand(program: Command, context: CliContext) {
  program
    .command('inspect')
    .argument('<root>', 'Directory or mount point to scan')
    .description('Count files and bytes per category without copying anything')
    .option('--exclude <pattern...>', 'Exclusion patterns (replace the configured list)')
    .option('--log <file>', 'Also write a plain-text report to this file')
    .action(async (root: string, options: InspectOptions) => {
      const globalOpts = program.opts<GlobalOptions>();
      const renderer = new OutputRenderer(!!globalOpts.json);

      const config = ConfigLoader.load({
        configPath: globalOpts.config,
        flags: { scan: { exclude: options.exclude } },
      });
      const table = buildCategoryTable(config);
      renderer.renderConflicts(table.conflicts);

      const runId = randomUUID();
      const logger = createRunLogger(globalOpts).child({ runId });
      const events = new EventQueue(logger);
      const absRoot = path.resolve(root);

      events.push(
        createEvent<ScanStarted>(runId, 'ScanStarted', {
          root: absRoot,
          exclude: config.scan.exclude,
        }),
      );
      if (globalOpts.verbose) renderer.log(`Scanning ${absRoot}`);

      const report = await inspect(absRoot, table, {
        exclude: config.scan.exclude,
        signal: context.signal,
        onWarning: (warning) => {
          events.push(createEvent<ScanWarningEvent>(runId, 'ScanWarning', warning));
        },
      });
      const cancelled = context.signal?.aborted ?? false;

      events.push(
        createEvent<RunFinished>(runId, 'RunFinished', {
          mode: 'inspect',
          status: cancelled ? 'aborted' : 'success',
          files: report.totals.totalFiles,
          bytes: report.totals.totalBytes,
          failed: 0,
          elapsedMs: Math.round(report.elapsedMs),
        }),
      );
      await events.flush();

      const logPath = options.log ? path.resolve(options.log) : undefined;
      if (logPath) {
        await writeInspectLog(logPath, report);
      }

      renderer.renderInspect(report, { logPath });
      if (cancelled) {
        renderer.warn('Scan cancelled; totals cover only what was scanned.');
      }
      context.exitCode = cancelled ? EXIT_CODES.error : EXIT_CODES.success;
    });
}
