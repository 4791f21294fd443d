import path from 'node:path';
import type { FileRecord } from '../scanner';
import type { Layout } from './types';

/**
 * Destination path of a record relative to the export root, before
 * collision handling.
 */
export function destinationPath(record: FileRecord, layout: Layout): string {
  const relative = layout === 'flat' ? path.posix.basename(record.relativePath) : record.relativePath;
  return `${record.category}/${relative}`;
}

/**
 * Inserts a `__N` marker before the last extension: `a/report.pdf` becomes
 * `a/report__2.pdf`. Names without an extension get the marker at the end.
 */
export function withSuffix(relativePath: string, n: number): string {
  const dir = path.posix.dirname(relativePath);
  const base = path.posix.basename(relativePath);
  const ext = path.posix.extname(base);
  const stem = base.slice(0, base.length - ext.length);
  const renamed = `${stem}__${n}${ext}`;
  return dir === '.' ? renamed : `${dir}/${renamed}`;
}

/**
 * Hands out unique destination paths. The first claim of a path gets it
 * unchanged; later claims get `stem__2.ext`, `stem__3.ext` and so on.
 *
 * With `track` off nothing is remembered and every claim gets its path
 * unchanged. Callers then find clashes through exclusive create (`EEXIST`)
 * and ask `retry` for the next name. The mirror layout runs this way, since
 * each record already has a distinct path there.
 */
export class DestinationNamer {
  private readonly reserved = new Set<string>();
  private readonly lastSuffix = new Map<string, number>();

  constructor(private readonly track = true) {}

  reserve(desired: string): string {
    if (!this.track) return desired;

    const key = desired.toLowerCase();
    if (!this.reserved.has(key)) {
      this.reserved.add(key);
      return desired;
    }

    let n = this.lastSuffix.get(key) ?? 1;
    let candidate: string;
    do {
      n++;
      candidate = withSuffix(desired, n);
    } while (this.reserved.has(candidate.toLowerCase()));

    this.lastSuffix.set(key, n);
    this.reserved.add(candidate.toLowerCase());
    return candidate;
  }

  /**
   * Next name to try after `desired` was found on disk `attempt` times.
   */
  retry(desired: string, attempt: number): string {
    return this.track ? this.reserve(desired) : withSuffix(desired, attempt + 1);
  }

  get size(): number {
    return this.reserved.size;
  }
}
