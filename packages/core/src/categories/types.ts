export interface CategoryDefinition {
  name: string;
  extensions: string[];
}

/**
 * An extension claimed by more than one category. The first claim is kept.
 */
export interface CategoryConflict {
  extension: string;
  keptIn: string;
  droppedFrom: string;
}

export interface CategoryTableOptions {
  /** Category for files whose extension is not mapped. Defaults to `misc`. */
  fallback?: string;
  /** Reject cross-category conflicts instead of keeping the first claim */
  strict?: boolean;
}
