/**
 * Bounded pool of concurrent async tasks.
 *
 * `submit` resolves once the task has *started*; while `limit` tasks are in
 * flight it waits for one of them to finish, so a producer that awaits
 * `submit` is held back by the pool. The limit is a hard ceiling.
 */
export class WorkerPool {
  readonly limit: number;
  private activeCount = 0;
  private peakCount = 0;
  private waiters: Array<() => void> = [];
  private readonly running = new Set<Promise<void>>();
  private failure: { error: unknown } | undefined;

  constructor(limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`Worker pool limit must be a positive integer, got ${limit}`);
    }
    this.limit = limit;
  }

  async submit(task: () => Promise<void>): Promise<void> {
    while (this.activeCount >= this.limit) {
      await new Promise<void>((resolve) => this.waiters.push(resolve));
    }

    // Claim the slot before starting, so concurrent submitters see it taken.
    this.activeCount++;
    this.peakCount = Math.max(this.peakCount, this.activeCount);

    const run = this.execute(task).finally(() => this.running.delete(run));
    this.running.add(run);
  }

  /**
   * Waits for every in-flight task. Rethrows the first error a task threw.
   */
  async drain(): Promise<void> {
    while (this.running.size > 0) {
      await Promise.all([...this.running]);
    }
    if (this.failure) {
      throw this.failure.error;
    }
  }

  get active(): number {
    return this.activeCount;
  }

  /** Highest number of tasks that were in flight at once. */
  get peak(): number {
    return this.peakCount;
  }

  private async execute(task: () => Promise<void>): Promise<void> {
    try {
      await task();
    } catch (error) {
      this.failure ??= { error };
    } finally {
      this.activeCount--;
      this.waiters.shift()?.();
    }
  }
}
