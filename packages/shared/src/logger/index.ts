import { ConsoleLogger, ScopedLogger, SilentLogger } from './consoleLogger';
import { JsonlLogger } from './jsonlLogger';
import { EventQueue } from './eventQueue';
export type { Logger, MaybePromise } from './types';
export type { ConsoleLoggerOptions } from './consoleLogger';

export const logger = new ConsoleLogger();
export { ConsoleLogger, ScopedLogger, SilentLogger, JsonlLogger, EventQueue };
