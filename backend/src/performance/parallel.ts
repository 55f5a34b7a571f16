/**
 * Parallel Executor
 *
 * Runs async tasks with an optional concurrency ceiling and returns their
 * results in input order, whatever order they settle in.
 */

export interface ParallelOptions {
  concurrency?: number;
}

export class ParallelExecutor {
  /**
   * Run every task. Without a concurrency ceiling all tasks start at once.
   */
  async execute<T>(fns: (() => Promise<T>)[], options?: ParallelOptions): Promise<T[]> {
    const concurrency = options?.concurrency;
    if (!concurrency || concurrency >= fns.length) {
      return Promise.all(fns.map(fn => fn()));
    }
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
    }

    const results: T[] = new Array<T>(fns.length);
    let next = 0;
    let failed = false;

    // Each worker claims the next unstarted task until none are left.
    const worker = async (): Promise<void> => {
      while (!failed && next < fns.length) {
        const index = next++;
        try {
          results[index] = await fns[index]();
        } catch (error) {
          failed = true;
          throw error;
        }
      }
    };

    await Promise.all(Array.from({ length: concurrency }, worker));
    return results;
  }

  /**
   * Map items through an async mapper under the same concurrency rules.
   */
  async map<T, R>(
    items: readonly T[],
    mapper: (item: T, index: number) => Promise<R>,
    options?: ParallelOptions,
  ): Promise<R[]> {
    const fns = items.map((item, index) => () => mapper(item, index));
    return this.execute(fns, options);
  }
}
