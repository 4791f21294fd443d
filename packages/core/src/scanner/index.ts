import nodeFs from 'node:fs/promises';
import path from 'node:path';
import type { Dirent, Stats } from 'node:fs';
import { FatalIOError, ScanError, errnoCode, errorMessage } from '@drivesort/shared';
import type { CategoryTable } from '../categories';
import { ExclusionRules } from './exclusions';
import type { FileRecord, ScanFs, ScanOptions } from './types';

export * from './types';
export * from './exclusions';

interface PendingDir {
  absPath: string;
  relativePath: string;
}

type EntryKind = 'file' | 'directory' | 'symlink' | 'special';

function kindOf(entry: Dirent | Stats): EntryKind | undefined {
  if (entry.isSymbolicLink()) return 'symlink';
  if (entry.isFile()) return 'file';
  if (entry.isDirectory()) return 'directory';
  if (entry.isBlockDevice() || entry.isCharacterDevice() || entry.isFIFO() || entry.isSocket()) {
    return 'special';
  }
  return undefined;
}

function byName(a: Dirent, b: Dirent): number {
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

/**
 * Walks a directory tree and yields one classified record per regular file.
 *
 * The walk is iterative and lazy: only the stack of directories still to visit
 * is held in memory. Entries are visited in name order, so an unchanged tree
 * always produces the same sequence. Symbolic links are never followed or
 * emitted; devices, FIFOs and sockets are skipped.
 */
export class Scanner {
  private fs: ScanFs;

  constructor(
    private readonly table: CategoryTable,
    fs: ScanFs = nodeFs,
  ) {
    this.fs = fs;
  }

  /**
   * Resolves `root` and checks that it is a readable directory.
   */
  async checkRoot(root: string): Promise<string> {
    const absRoot = path.resolve(root);

    let rootStat: Stats;
    try {
      rootStat = await this.fs.stat(absRoot);
    } catch (error) {
      throw new FatalIOError(`Cannot read source root ${absRoot}: ${errorMessage(error)}`, {
        cause: error,
        details: { root: absRoot, code: errnoCode(error) },
      });
    }
    if (!rootStat.isDirectory()) {
      throw new FatalIOError(`Source root ${absRoot} is not a directory`, {
        details: { root: absRoot },
      });
    }
    return absRoot;
  }

  async *scan(root: string, options: ScanOptions = {}): AsyncGenerator<FileRecord> {
    const rules = ExclusionRules.from(options.exclude);
    const absRoot = await this.checkRoot(root);

    const stack: PendingDir[] = [{ absPath: absRoot, relativePath: '' }];

    while (stack.length > 0) {
      if (options.signal?.aborted) return;
      const dir = stack.pop();
      if (!dir) break;

      let entries: Dirent[];
      try {
        entries = await this.fs.readdir(dir.absPath, { withFileTypes: true });
      } catch (error) {
        this.warn(options, dir.absPath, `Cannot read directory: ${errorMessage(error)}`, error);
        continue;
      }
      entries.sort(byName);

      const subdirs: PendingDir[] = [];

      for (const entry of entries) {
        if (options.signal?.aborted) return;

        const absPath = path.join(dir.absPath, entry.name);
        const relativePath = dir.relativePath ? `${dir.relativePath}/${entry.name}` : entry.name;

        let kind = kindOf(entry);
        let stats: Stats | undefined;
        if (kind === undefined || kind === 'file') {
          if (kind === 'file' && rules.excludes(relativePath, false)) {
            options.onSkip?.({ relativePath, reason: 'excluded' });
            continue;
          }
          // Size comes from metadata; lstat also settles entries whose type readdir could not tell.
          try {
            stats = await this.fs.lstat(absPath);
          } catch (error) {
            this.warn(options, absPath, `Cannot stat entry: ${errorMessage(error)}`, error);
            continue;
          }
          kind = kindOf(stats);
        }

        if (kind === 'symlink' || kind === 'special' || kind === undefined) {
          options.onSkip?.({ relativePath, reason: kind === 'symlink' ? 'symlink' : 'special' });
          continue;
        }

        if (rules.excludes(relativePath, kind === 'directory')) {
          options.onSkip?.({ relativePath, reason: 'excluded' });
          continue;
        }

        if (kind === 'directory') {
          subdirs.push({ absPath, relativePath });
          continue;
        }

        if (!stats) continue;
        const record: FileRecord = Object.freeze({
          sourcePath: absPath,
          relativePath,
          sizeBytes: stats.size,
          category: this.table.classify(entry.name),
          mtimeMs: stats.mtimeMs,
        });
        yield record;
      }

      // Reverse so the stack pops subdirectories in name order.
      for (let i = subdirs.length - 1; i >= 0; i--) {
        stack.push(subdirs[i]);
      }
    }
  }

  private warn(options: ScanOptions, entryPath: string, message: string, cause: unknown): void {
    options.onWarning?.(
      new ScanError(entryPath, message, { cause, details: { code: errnoCode(cause) } }),
    );
  }
}

/**
 * Convenience wrapper around `Scanner.scan`.
 */
export function scan(
  root: string,
  table: CategoryTable,
  options: ScanOptions = {},
): AsyncGenerator<FileRecord> {
  return new Scanner(table).scan(root, options);
}
