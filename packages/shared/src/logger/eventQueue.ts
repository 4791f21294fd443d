import type { RunEvent } from '../types/events';
import type { Logger } from './types';

/**
 * Hands events to a logger one at a time, in the order they were pushed,
 * without making the caller wait for each write.
 */
export class EventQueue {
  private tail: Promise<void> = Promise.resolve();

  constructor(private readonly logger: Logger) {}

  push(event: RunEvent): void {
    this.tail = this.tail.then(() => this.logger.log(event));
  }

  /** Resolves once every pushed event has been written. */
  flush(): Promise<void> {
    return this.tail;
  }
}
