import { Command } from 'commander';
import path from 'path';
import { randomUUID } from 'crypto';
import { errorMessage } from '@drivesort/shared';
import {
  ConfigLoader,
  ExportPipeline,
  buildCategoryTable,
  buildExportJob,
  exportStatus,
  writeExportLog,
  type Layout,
} from '@drivesort/core';
import { OutputRenderer } from '../output/renderer';
import { exitCodeForStatus } from '../exit-codes';
import {
  createRunLogger,
  parseInteger,
  parseLayout,
  type CliContext,
  type GlobalOptions,
} from '../options';

interface ExportOptions {
  output: string;
  zip?: boolean;
  zipOnly?: boolean;
  archivePath?: string;
  concurrency?: number;
  layout?: Layout;
  compression?: number;
  exclude?: string[];
  /** `false` after `--no-log` */
  log?: string | false;
}

export function registerExportCommand(program: Command, context: CliContext) {
  program
    .command('export')
    .argument('<root>', 'Directory or mount point to export')
    .description('Copy every file into per-category folders, a zip archive, or both')
    .requiredOption('-o, --output <dir>', 'Destination directory')
    .option('--zip', 'Also write a zip archive of the export')
    .option('--zip-only', 'Write only the zip archive, no directory tree')
    .option('--archive-path <file>', 'Where to write the archive (default: <output>.zip)')
    .option('--concurrency <n>', 'Maximum number of copies in flight', parseInteger)
    .option('--layout <layout>', 'mirror keeps sub-folders, flat keeps file names only', parseLayout)
    .option('--compression <level>', 'Zip compression level, 0 to 9', parseInteger)
    .option('--exclude <pattern...>', 'Exclusion patterns (replace the configured list)')
    .option('--log <file>', 'Report file (default: <output>.log)')
    .option('--no-log', 'Do not write a report file')
    .action(async (root: string, options: ExportOptions) => {
      const globalOpts = program.opts<GlobalOptions>();
      const renderer = new OutputRenderer(!!globalOpts.json);
      const archiveRequested = options.zip || options.zipOnly;

      const config = ConfigLoader.load({
        configPath: globalOpts.config,
        flags: {
          scan: { exclude: options.exclude },
          export: { concurrency: options.concurrency, layout: options.layout },
          archive: {
            enabled: archiveRequested ? true : undefined,
            keepDirectory: options.zipOnly ? false : undefined,
            compressionLevel: options.compression,
            path: options.archivePath,
          },
        },
      });
      const table = buildCategoryTable(config);
      renderer.renderConflicts(table.conflicts);
      const job = buildExportJob(config, { root, destination: options.output });

      const runId = randomUUID();
      const logger = createRunLogger(globalOpts);
      if (globalOpts.verbose) {
        renderer.log(
          `Exporting ${job.root} to ${job.destination} (concurrency ${job.concurrencyLimit})`,
        );
      }

      const pipeline = new ExportPipeline({
        table,
        exclude: config.scan.exclude,
        logger,
        runId,
        signal: context.signal,
      });
      const report = await pipeline.run(job);

      let logPath: string | undefined;
      if (options.log !== false) {
        logPath =
          typeof options.log === 'string' ? path.resolve(options.log) : `${job.destination}.log`;
        try {
          await writeExportLog(logPath, report);
        } catch (error) {
          renderer.warn(`Could not write the report file ${logPath}: ${errorMessage(error)}`);
          logPath = undefined;
        }
      }

      renderer.renderExport(report, { logPath });
      context.exitCode = exitCodeForStatus(exportStatus(report));
    });
}
