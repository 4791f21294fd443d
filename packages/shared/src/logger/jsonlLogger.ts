import * as fs from 'fs/promises';
import type { RunEvent } from '../types/events';
import type { Logger } from './types';

/**
 * Appends run events to a JSON-lines file and mirrors messages to the console.
 */
export class JsonlLogger implements Logger {
  private filePath: string;
  private readonly bindings: Record<string, unknown>;
  private readonly verbose: boolean;

  constructor(filePath: string, bindings: Record<string, unknown> = {}, verbose = false) {
    this.filePath = filePath;
    this.bindings = bindings;
    this.verbose = verbose;
  }

  async log(event: RunEvent): Promise<void> {
    const line = JSON.stringify({ ...this.bindings, ...event }) + '\n';
    try {
      await fs.appendFile(this.filePath, line, 'utf8');
    } catch (error) {
      console.error(`Failed to write to event log at ${this.filePath}`, error);
    }
  }

  debug(message: string): void {
    if (this.verbose) {
      console.debug(this.withPrefix(message));
    }
  }

  info(message: string): void {
    console.info(this.withPrefix(message));
  }

  warn(message: string): void {
    console.warn(this.withPrefix(message));
  }

  error(error: Error, message?: string): void {
    if (message) {
      console.error(this.withPrefix(message), error);
    } else {
      console.error(error);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new JsonlLogger(this.filePath, { ...this.bindings, ...bindings }, this.verbose);
  }

  private withPrefix(message: string): string {
    const prefix = Object.entries(this.bindings)
      .map(([k, v]) => `${k}=${String(v)}`)
      .join(' ');
    return prefix ? `[${prefix}] ${message}` : message;
  }
}
