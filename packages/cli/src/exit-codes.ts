import { AppError } from '@drivesort/shared';
import type { ExportStatus } from '@drivesort/core';

export const EXIT_CODES = {
  success: 0,
  error: 1,
  usage: 2,
  partial: 3,
} as const;

const USER_ERROR_CODES = new Set(['ConfigError', 'UsageError', 'ClassificationConfigError']);

export function exitCodeForStatus(status: ExportStatus): number {
  switch (status) {
    case 'success':
      return EXIT_CODES.success;
    case 'partial':
      return EXIT_CODES.partial;
    case 'aborted':
      return EXIT_CODES.error;
  }
}

/**
 * Configuration and usage mistakes exit with 2; everything else with 1.
 */
export function exitCodeForError(error: unknown): number {
  if (error instanceof AppError && USER_ERROR_CODES.has(error.code)) {
    return EXIT_CODES.usage;
  }
  return EXIT_CODES.error;
}
