import { performance } from 'node:perf_hooks';
import type { ScanError } from '@drivesort/shared';
import type { CategoryTable } from '../categories';
import { Scanner, type FileRecord, type ScanFs, type ScanOptions, type ScanWarning } from '../scanner';
import { CategoryTotals } from './totals';

export * from './totals';

/**
 * Drains a record stream into per-category totals.
 */
export async function aggregate(
  records: AsyncIterable<FileRecord> | Iterable<FileRecord>,
  totals: CategoryTotals = new CategoryTotals(),
): Promise<CategoryTotals> {
  for await (const record of records) {
    totals.add(record.category, record.sizeBytes);
  }
  return totals;
}

async function* tap(
  records: AsyncIterable<FileRecord>,
  onRecord: (record: FileRecord) => void,
): AsyncGenerator<FileRecord> {
  for await (const record of records) {
    onRecord(record);
    yield record;
  }
}

export function toScanWarning(error: ScanError): ScanWarning {
  const code =
    typeof error.details === 'object' && typeof error.details.code === 'string'
      ? error.details.code
      : undefined;
  const warning: ScanWarning = { path: error.path, message: error.message };
  if (code) warning.code = code;
  return warning;
}

export interface InspectOptions extends Omit<ScanOptions, 'onWarning'> {
  fs?: ScanFs;
  onRecord?: (record: FileRecord) => void;
  onWarning?: (warning: ScanWarning) => void;
}

export interface InspectReport {
  root: string;
  totals: CategoryTotals;
  scanWarnings: ScanWarning[];
  elapsedMs: number;
}

/**
 * Scans a root and counts what it holds, without copying anything.
 */
export async function inspect(
  root: string,
  table: CategoryTable,
  options: InspectOptions = {},
): Promise<InspectReport> {
  const started = performance.now();
  const scanWarnings: ScanWarning[] = [];
  const { fs, onRecord, onWarning, ...scanOptions } = options;
  const scanner = new Scanner(table, fs);

  const records = scanner.scan(root, {
    ...scanOptions,
    onWarning: (error) => {
      const warning = toScanWarning(error);
      scanWarnings.push(warning);
      onWarning?.(warning);
    },
  });

  const totals = await aggregate(onRecord ? tap(records, onRecord) : records);

  return { root, totals, scanWarnings, elapsedMs: performance.now() - started };
}
