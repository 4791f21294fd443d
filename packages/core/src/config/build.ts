import type { Config } from '@drivesort/shared';
import {
  CategoryTable,
  defaultCategoryDefinitions,
  mergeWithDefaults,
  type CategoryDefinition,
} from '../categories';
import { createExportJob, type ExportJob } from '../export';

/**
 * Builds the category table a config describes. Throws
 * `ClassificationConfigError` for ambiguous or malformed categories.
 */
export function buildCategoryTable(config: Config): CategoryTable {
  const written = config.categories.definitions;
  const user: CategoryDefinition[] = Array.isArray(written)
    ? written.map(({ name, extensions }) => ({ name, extensions }))
    : Object.entries(written).map(([name, extensions]) => ({ name, extensions }));
  const definitions =
    config.categories.mode === 'replace'
      ? user
      : mergeWithDefaults(user, defaultCategoryDefinitions());

  return new CategoryTable(definitions, {
    fallback: config.categories.fallback,
    strict: config.categories.strict,
  });
}

export function buildExportJob(
  config: Config,
  target: { root: string; destination: string },
): ExportJob {
  const { archive } = config;
  return createExportJob({
    root: target.root,
    destination: target.destination,
    concurrencyLimit: config.export.concurrency,
    layout: config.export.layout,
    archive: archive.enabled
      ? {
          path: archive.path,
          compressionLevel: archive.compressionLevel,
          bufferSizeBytes: archive.bufferSizeKb * 1024,
          keepDirectory: archive.keepDirectory,
        }
      : undefined,
  });
}
