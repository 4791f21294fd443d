import { Command, CommanderError } from 'commander';
import { AppError } from '@drivesort/shared';
import { version } from '../package.json';
import { registerInspectCommand } from './commands/inspect';
import { registerExportCommand } from './commands/export';
import { registerConfigCommand } from './commands/config';
import { EXIT_CODES, exitCodeForError } from './exit-codes';
import type { CliContext, GlobalOptions } from './options';

export const name = '@drivesort/cli';

export function createProgram(context: CliContext): Command {
  const program = new Command();

  program
    .name('drivesort')
    .description('Sort the files on a drive into categories and export them')
    .version(version)
    .option('--json', 'Output results as JSON')
    .option('--config <path>', 'Path to configuration file')
    .option('--verbose', 'Enable verbose logging')
    .option('--events <file>', 'Append run events to a JSON-lines file')
    .exitOverride();

  registerInspectCommand(program, context);
  registerExportCommand(program, context);
  registerConfigCommand(program);

  return program;
}

function reportError(e: unknown, opts: GlobalOptions): void {
  if (opts.json) {
    if (e instanceof AppError) {
      console.log(
        JSON.stringify({
          error: {
            code: e.code,
            message: e.message,
            details: e.details,
          },
        }),
      );
    } else {
      console.log(
        JSON.stringify({
          error: {
            code: 'UnknownError',
            message: e instanceof Error ? e.message : String(e),
          },
        }),
      );
    }
    return;
  }

  // Human-readable output
  console.error(`❌ Error: ${(e instanceof Error && e.message) || String(e)}`);
  if (e instanceof AppError && e.details) {
    console.error(
      `  Details: ${typeof e.details === 'string' ? e.details : JSON.stringify(e.details, null, 2)}`,
    );
  }
  if (opts.verbose && e instanceof Error && e.stack) {
    console.error(`\nStack Trace:\n${e.stack}`);
  } else {
    console.error(`\nFor more details, run with the --verbose flag.`);
  }
}

/**
 * Runs the CLI and resolves to the process exit code.
 */
export async function runCli(argv: readonly string[], signal?: AbortSignal): Promise<number> {
  const context: CliContext = { exitCode: EXIT_CODES.success, signal };
  const program = createProgram(context);

  try {
    await program.parseAsync([...argv]);
    return context.exitCode;
  } catch (e) {
    if (e instanceof CommanderError) {
      // Commander has already printed help, the version or the usage problem.
      return e.exitCode === 0 ? EXIT_CODES.success : EXIT_CODES.usage;
    }
    reportError(e, program.opts<GlobalOptions>());
    return exitCodeForError(e);
  }
}
