import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import nodeFs from 'node:fs/promises';
import * as path from 'path';
import * as os from 'os';
import { DEFAULT_EXCLUDES, FatalIOError, type ScanError } from '@drivesort/shared';
import { CategoryTable, defaultCategoryDefinitions } from '../categories';
import { Scanner, scan, type FileRecord, type ScanFs, type ScanSkip } from './index';

async function collect(iterable: AsyncIterable<FileRecord>): Promise<FileRecord[]> {
  const out: FileRecord[] = [];
  for await (const record of iterable) out.push(record);
  return out;
}

describe('Scanner', () => {
  let tmpDir: string;
  const table = new CategoryTable(defaultCategoryDefinitions());

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'drivesort-scanner-test-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  async function createFiles(files: Record<string, string>) {
    for (const [filePath, content] of Object.entries(files)) {
      const fullPath = path.join(tmpDir, filePath);
      await fs.mkdir(path.dirname(fullPath), { recursive: true });
      await fs.writeFile(fullPath, content);
    }
  }

  it('emits classified records with sizes from metadata', async () => {
    await createFiles({
      'docs/report.pdf': '12345',
      'photo.JPG': 'abc',
      'unknown.xyz': '',
    });

    const records = await collect(new Scanner(table).scan(tmpDir));

    expect(records.map((r) => [r.relativePath, r.category, r.sizeBytes])).toEqual([
      ['photo.JPG', 'images', 3],
      ['unknown.xyz', 'misc', 0],
      ['docs/report.pdf', 'documents', 5],
    ]);
    expect(records[2].sourcePath).toBe(path.join(tmpDir, 'docs', 'report.pdf'));
    expect(Object.isFrozen(records[0])).toBe(true);
    expect(records[0].mtimeMs).toBeGreaterThan(0);
  });

  it('scans root-level entries named only with dots', async () => {
    await createFiles({ 'a.pdf': 'a', '...': 'dots', '..../b.pdf': 'b' });

    const kept = await collect(new Scanner(table).scan(tmpDir, { exclude: ['node_modules'] }));
    expect(kept.map((r) => [r.relativePath, r.category])).toEqual([
      ['...', 'misc'],
      ['a.pdf', 'documents'],
      ['..../b.pdf', 'documents'],
    ]);

    const hidden = await collect(new Scanner(table).scan(tmpDir, { exclude: DEFAULT_EXCLUDES }));
    expect(hidden.map((r) => r.relativePath)).toEqual(['a.pdf']);
  });

  it('visits a fixed tree in the same order every time', async () => {
    await createFiles({
      'b/2.txt': 'x',
      'a/1.txt': 'x',
      'c.txt': 'x',
      'a/z/3.txt': 'x',
    });

    const first = (await collect(scan(tmpDir, table))).map((r) => r.relativePath);
    const second = (await collect(scan(tmpDir, table))).map((r) => r.relativePath);

    expect(first).toEqual(['c.txt', 'a/1.txt', 'a/z/3.txt', 'b/2.txt']);
    expect(second).toEqual(first);
  });

  it('never emits anything beneath an excluded directory', async () => {
    await createFiles({
      'node_modules/pkg/index.js': 'x',
      'app/node_modules/deep/readme.pdf': 'x',
      'app/main.js': 'x',
      '.hidden/secret.pdf': 'x',
      '.env': 'x',
    });
    const skips: ScanSkip[] = [];

    const records = await collect(
      scan(tmpDir, table, { exclude: ['.*', 'node_modules'], onSkip: (s) => skips.push(s) }),
    );

    expect(records.map((r) => r.relativePath)).toEqual(['app/main.js']);
    expect(skips).toEqual([
      { relativePath: '.env', reason: 'excluded' },
      { relativePath: '.hidden', reason: 'excluded' },
      { relativePath: 'node_modules', reason: 'excluded' },
      { relativePath: 'app/node_modules', reason: 'excluded' },
    ]);
  });

  it('skips symbolic links to files and directories', async () => {
    await createFiles({ 'real/a.pdf': 'x' });
    await fs.symlink(path.join(tmpDir, 'real', 'a.pdf'), path.join(tmpDir, 'link.pdf'));
    await fs.symlink(path.join(tmpDir, 'real'), path.join(tmpDir, 'loop'));
    const skips: ScanSkip[] = [];

    const records = await collect(scan(tmpDir, table, { onSkip: (s) => skips.push(s) }));

    expect(records.map((r) => r.relativePath)).toEqual(['real/a.pdf']);
    expect(skips).toEqual([
      { relativePath: 'link.pdf', reason: 'symlink' },
      { relativePath: 'loop', reason: 'symlink' },
    ]);
  });

  it('reports unreadable directories and keeps scanning', async () => {
    await createFiles({ 'locked/a.pdf': 'x', 'open/b.pdf': 'x' });
    const lockedDir = path.join(tmpDir, 'locked');
    const failingFs: ScanFs = {
      stat: (p) => nodeFs.stat(p),
      lstat: (p) => nodeFs.lstat(p),
      readdir: async (p, options) => {
        if (p === lockedDir) {
          throw Object.assign(new Error('EACCES: permission denied'), { code: 'EACCES' });
        }
        return nodeFs.readdir(p, options);
      },
    };
    const warnings: ScanError[] = [];

    const records = await collect(
      new Scanner(table, failingFs).scan(tmpDir, { onWarning: (w) => warnings.push(w) }),
    );

    expect(records.map((r) => r.relativePath)).toEqual(['open/b.pdf']);
    expect(warnings).toHaveLength(1);
    expect(warnings[0].path).toBe(lockedDir);
    expect(warnings[0].message).toBe('Cannot read directory: EACCES: permission denied');
    expect(warnings[0].details).toEqual({ code: 'EACCES' });
  });

  it('reports entries that vanish between listing and stat', async () => {
    await createFiles({ 'a.pdf': 'x', 'b.pdf': 'x' });
    const vanished = path.join(tmpDir, 'a.pdf');
    const racingFs: ScanFs = {
      stat: (p) => nodeFs.stat(p),
      readdir: (p, options) => nodeFs.readdir(p, options),
      lstat: async (p) => {
        if (p === vanished) {
          throw Object.assign(new Error('ENOENT: no such file'), { code: 'ENOENT' });
        }
        return nodeFs.lstat(p);
      },
    };
    const warnings: ScanError[] = [];

    const records = await collect(
      new Scanner(table, racingFs).scan(tmpDir, { onWarning: (w) => warnings.push(w) }),
    );

    expect(records.map((r) => r.relativePath)).toEqual(['b.pdf']);
    expect(warnings.map((w) => w.path)).toEqual([vanished]);
  });

  it('fails before emitting when the root is missing or not a directory', async () => {
    await createFiles({ 'file.txt': 'x' });

    await expect(collect(scan(path.join(tmpDir, 'missing'), table))).rejects.toBeInstanceOf(
      FatalIOError,
    );
    await expect(collect(scan(path.join(tmpDir, 'file.txt'), table))).rejects.toThrow(
      /is not a directory/,
    );
  });

  it('stops when the signal is aborted', async () => {
    await createFiles({ 'a.txt': 'x', 'b.txt': 'x', 'c.txt': 'x' });
    const controller = new AbortController();
    const seen: string[] = [];

    for await (const record of scan(tmpDir, table, { signal: controller.signal })) {
      seen.push(record.relativePath);
      controller.abort();
    }

    expect(seen).toEqual(['a.txt']);
  });
});
