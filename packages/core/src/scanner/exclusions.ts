import ignore from 'ignore';

/**
 * Ordered exclusion patterns with gitignore semantics.
 *
 * A pattern without a slash (`node_modules`, `.*`) matches a base name at any
 * depth; a pattern with a slash (`photos/raw`) matches the path relative to the
 * scan root. Excluding a directory excludes everything beneath it.
 */
export class ExclusionRules {
  readonly patterns: readonly string[];
  private readonly ig: ReturnType<typeof ignore>;

  constructor(patterns: readonly string[] = []) {
    this.patterns = Object.freeze(patterns.map((p) => p.trim()).filter((p) => p.length > 0));
    // Names made only of dots (`...`) are legal but fail the library's own path check.
    this.ig = ignore({ allowRelativePaths: true }).add([...this.patterns]);
  }

  /**
   * @param relativePath `/`-separated path relative to the root, never empty
   */
  excludes(relativePath: string, isDirectory: boolean): boolean {
    if (this.patterns.length === 0) return false;
    // Directory-only patterns (`cache/`) need the trailing slash to match.
    return this.ig.ignores(isDirectory ? `${relativePath}/` : relativePath);
  }

  static from(exclude: readonly string[] | ExclusionRules | undefined): ExclusionRules {
    if (exclude instanceof ExclusionRules) return exclude;
    return new ExclusionRules(exclude ?? []);
  }
}
