import defaultCategories from './default-categories.json';
import { normalizeExtension } from './table';
import type { CategoryDefinition } from './types';

/**
 * The built-in taxonomy, in precedence order.
 */
export function defaultCategoryDefinitions(): CategoryDefinition[] {
  return defaultCategories.map((entry) => ({
    name: entry.name,
    extensions: [...entry.extensions],
  }));
}

/**
 * Layers user categories over the built-in taxonomy.
 *
 * User categories come first. A user category named like a built-in one
 * replaces it, and built-in extensions a user category claims are taken out of
 * the built-in categories, so overriding `.pdf` is not reported as a conflict.
 */
export function mergeWithDefaults(
  user: CategoryDefinition[],
  defaults: CategoryDefinition[] = defaultCategoryDefinitions(),
): CategoryDefinition[] {
  const userNames = new Set(user.map((c) => c.name));
  const claimed = new Set<string>();
  for (const category of user) {
    for (const ext of category.extensions) {
      claimed.add(normalizeExtension(ext));
    }
  }

  const remaining = defaults
    .filter((c) => !userNames.has(c.name))
    .map((c) => ({
      name: c.name,
      extensions: c.extensions.filter((ext) => !claimed.has(normalizeExtension(ext))),
    }));

  return [...user, ...remaining];
}
