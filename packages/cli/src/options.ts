import path from 'path';
import { InvalidArgumentError } from 'commander';
import { ConsoleLogger, JsonlLogger, SilentLogger, type Logger } from '@drivesort/shared';
import type { Layout } from '@drivesort/core';

/** Options every command reads from the root program. */
export interface GlobalOptions {
  json?: boolean;
  config?: string;
  verbose?: boolean;
  events?: string;
}

/** State shared between `runCli` and the command actions. */
export interface CliContext {
  exitCode: number;
  /** Cancels a running scan or export */
  signal?: AbortSignal;
}

export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Must be an integer.');
  }
  return parsed;
}

export function parseLayout(value: string): Layout {
  if (value === 'mirror' || value === 'flat') {
    return value;
  }
  throw new InvalidArgumentError('Must be "mirror" or "flat".');
}

/**
 * `--events <file>` selects the JSON-lines logger. Otherwise events only reach
 * the console with `--verbose`, and never in `--json` mode, where stdout
 * carries the result.
 */
export function createRunLogger(options: GlobalOptions): Logger {
  if (options.events) {
    return new JsonlLogger(path.resolve(options.events), {}, !!options.verbose);
  }
  if (options.json) {
    return new SilentLogger();
  }
  return new ConsoleLogger({ verbose: options.verbose });
}
