import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { ScanError } from '@drivesort/shared';
import { CategoryTable, defaultCategoryDefinitions } from '../categories';
import type { FileRecord } from '../scanner';
import { aggregate, inspect, toScanWarning } from './index';

function record(relativePath: string, category: string, sizeBytes: number): FileRecord {
  return { sourcePath: `/src/${relativePath}`, relativePath, sizeBytes, category, mtimeMs: 0 };
}

describe('aggregate', () => {
  it('totals a synchronous or asynchronous stream', async () => {
    const records = [record('a.pdf', 'documents', 4), record('b.jpg', 'images', 6)];

    async function* stream() {
      yield* records;
    }

    const fromArray = await aggregate(records);
    const fromStream = await aggregate(stream());

    expect(fromArray.toJSON()).toEqual(fromStream.toJSON());
    expect(fromArray.totalFiles).toBe(2);
    expect(fromArray.totalBytes).toBe(10);
  });
});

describe('toScanWarning', () => {
  it('keeps the errno code when present', () => {
    const error = new ScanError('/x', 'Cannot read directory', { details: { code: 'EACCES' } });
    expect(toScanWarning(error)).toEqual({ path: '/x', message: 'Cannot read directory', code: 'EACCES' });
    expect(toScanWarning(new ScanError('/y', 'gone'))).toEqual({ path: '/y', message: 'gone' });
  });
});

describe('inspect', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'drivesort-inspect-test-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('counts the documents/images/misc example and ignores node_modules', async () => {
    for (let i = 0; i < 10; i++) {
      await fs.mkdir(path.join(tmpDir, 'docs'), { recursive: true });
      await fs.writeFile(path.join(tmpDir, 'docs', `a${i}.pdf`), 'pdf');
    }
    for (let i = 0; i < 5; i++) {
      await fs.writeFile(path.join(tmpDir, `b${i}.jpg`), 'jpeg!');
    }
    await fs.writeFile(path.join(tmpDir, 'c.xyz'), '?');
    await fs.mkdir(path.join(tmpDir, 'node_modules', 'lib'), { recursive: true });
    await fs.writeFile(path.join(tmpDir, 'node_modules', 'lib', 'manual.pdf'), 'pdf');
    await fs.writeFile(path.join(tmpDir, 'node_modules', 'lib', 'logo.jpg'), 'jpg');

    const seen: string[] = [];
    const report = await inspect(tmpDir, new CategoryTable(defaultCategoryDefinitions()), {
      exclude: ['node_modules/'],
      onRecord: (r) => seen.push(r.relativePath),
    });

    expect(report.totals.entries()).toEqual([
      { category: 'documents', count: 10, bytes: 30 },
      { category: 'images', count: 5, bytes: 25 },
      { category: 'misc', count: 1, bytes: 1 },
    ]);
    expect(report.totals.totalFiles).toBe(16);
    expect(seen).toHaveLength(16);
    expect(seen.some((p) => p.startsWith('node_modules'))).toBe(false);
    expect(report.scanWarnings).toEqual([]);
    expect(report.elapsedMs).toBeGreaterThanOrEqual(0);
  });
});
