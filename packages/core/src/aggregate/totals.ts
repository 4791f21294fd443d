export interface CategoryCount {
  category: string;
  count: number;
  bytes: number;
}

/**
 * Per-category file counts and byte totals.
 *
 * Memory grows with the number of distinct categories, never with the number
 * of files. `add` is commutative, so the order results arrive in does not
 * change the totals.
 */
export class CategoryTotals {
  private readonly counts = new Map<string, { count: number; bytes: number }>();
  private files = 0;
  private bytes = 0;

  add(category: string, sizeBytes: number): void {
    const entry = this.counts.get(category);
    if (entry) {
      entry.count++;
      entry.bytes += sizeBytes;
    } else {
      this.counts.set(category, { count: 1, bytes: sizeBytes });
    }
    this.files++;
    this.bytes += sizeBytes;
  }

  merge(other: CategoryTotals): void {
    for (const { category, count, bytes } of other.entries()) {
      const entry = this.counts.get(category);
      if (entry) {
        entry.count += count;
        entry.bytes += bytes;
      } else {
        this.counts.set(category, { count, bytes });
      }
      this.files += count;
      this.bytes += bytes;
    }
  }

  get(category: string): CategoryCount {
    const entry = this.counts.get(category);
    return { category, count: entry?.count ?? 0, bytes: entry?.bytes ?? 0 };
  }

  /**
   * Sorted by count descending, then by name.
   */
  entries(): CategoryCount[] {
    return [...this.counts.entries()]
      .map(([category, { count, bytes }]) => ({ category, count, bytes }))
      .sort((a, b) => b.count - a.count || (a.category < b.category ? -1 : 1));
  }

  get totalFiles(): number {
    return this.files;
  }

  get totalBytes(): number {
    return this.bytes;
  }

  get categoryCount(): number {
    return this.counts.size;
  }

  toJSON(): { totalFiles: number; totalBytes: number; categories: CategoryCount[] } {
    return { totalFiles: this.files, totalBytes: this.bytes, categories: this.entries() };
  }
}
