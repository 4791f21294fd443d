import path from 'node:path';
import { ClassificationConfigError } from '@drivesort/shared';
import type { CategoryConflict, CategoryDefinition, CategoryTableOptions } from './types';

export const FALLBACK_CATEGORY = 'misc';

/**
 * Lowercases an extension and makes sure it starts with a dot.
 * Throws for values that cannot be a file suffix.
 */
export function normalizeExtension(raw: string): string {
  const trimmed = raw.trim().toLowerCase();
  const ext = trimmed.startsWith('.') ? trimmed : `.${trimmed}`;
  if (ext === '.' || /[\\/]/.test(ext)) {
    throw new ClassificationConfigError(`Invalid extension "${raw}"`);
  }
  return ext;
}

function validateCategoryName(name: string): void {
  if (!name.trim() || name === '.' || name === '..' || /[\\/]/.test(name)) {
    throw new ClassificationConfigError(
      `Invalid category name "${name}": it must be usable as a single directory name`,
    );
  }
}

/**
 * Candidate lookup keys for a file name, longest first:
 * `archive.TAR.GZ` → `.tar.gz`, `.gz`; `.gitignore` → `.gitignore`.
 */
export function extensionCandidates(fileName: string): string[] {
  const lower = fileName.toLowerCase();
  const candidates: string[] = [];
  for (let i = 0; i < lower.length - 1; i++) {
    if (lower[i] === '.') {
      candidates.push(lower.slice(i));
    }
  }
  return candidates;
}

/**
 * Immutable extension → category lookup.
 *
 * Definitions are resolved in the order given. An extension listed twice in one
 * category is a configuration error. An extension listed in several categories
 * stays with the first one and the later claims are kept in `conflicts`, unless
 * `strict` is set, in which case they are an error too.
 */
export class CategoryTable {
  readonly fallback: string;
  readonly conflicts: readonly CategoryConflict[];
  private readonly byExtension: ReadonlyMap<string, string>;
  private readonly names: readonly string[];

  constructor(definitions: CategoryDefinition[], options: CategoryTableOptions = {}) {
    this.fallback = options.fallback ?? FALLBACK_CATEGORY;
    validateCategoryName(this.fallback);

    const byExtension = new Map<string, string>();
    const conflicts: CategoryConflict[] = [];
    const seenNames = new Set<string>();

    for (const definition of definitions) {
      validateCategoryName(definition.name);
      if (seenNames.has(definition.name)) {
        throw new ClassificationConfigError(`Category "${definition.name}" is defined twice`);
      }
      seenNames.add(definition.name);

      const own = new Set<string>();
      for (const raw of definition.extensions) {
        const ext = normalizeExtension(raw);
        if (own.has(ext)) {
          throw new ClassificationConfigError(
            `Extension "${ext}" is listed more than once in category "${definition.name}"`,
          );
        }
        own.add(ext);

        const owner = byExtension.get(ext);
        if (owner === undefined) {
          byExtension.set(ext, definition.name);
          continue;
        }
        if (options.strict) {
          throw new ClassificationConfigError(
            `Extension "${ext}" is claimed by both "${owner}" and "${definition.name}"`,
            { details: { extension: ext, keptIn: owner, droppedFrom: definition.name } },
          );
        }
        conflicts.push({ extension: ext, keptIn: owner, droppedFrom: definition.name });
      }
    }

    this.byExtension = byExtension;
    this.conflicts = Object.freeze(conflicts);
    this.names = Object.freeze(
      seenNames.has(this.fallback) ? [...seenNames] : [...seenNames, this.fallback],
    );
  }

  /**
   * Category for a path. Total: unmapped extensions fall into `fallback`.
   */
  classify(filePath: string): string {
    for (const candidate of extensionCandidates(path.basename(filePath))) {
      const category = this.byExtension.get(candidate);
      if (category !== undefined) {
        return category;
      }
    }
    return this.fallback;
  }

  /** Category that owns a single extension, if any. */
  lookup(extension: string): string | undefined {
    return this.byExtension.get(normalizeExtension(extension));
  }

  /** All category names in definition order, the fallback last unless defined. */
  categories(): readonly string[] {
    return this.names;
  }

  get size(): number {
    return this.byExtension.size;
  }
}
