export interface PoolOptions {
  concurrency: number;
  shouldContinue?: () => boolean;
}

// A worker that resolves `false` retires; the remaining workers keep draining the items.
export type PoolWorker<T> = (item: T, index: number, workerId: number) => Promise<void | boolean>;

export async function runPool<T>(items: readonly T[], options: PoolOptions, worker: PoolWorker<T>): Promise<void> {
  const size = Math.max(1, Math.min(Math.floor(options.concurrency), items.length));
  let next = 0;

  const loop = async (workerId: number): Promise<void> => {
    while (next < items.length) {
      if (options.shouldContinue && !options.shouldContinue()) {
        return;
      }
      const index = next;
      next += 1;
      if ((await worker(items[index], index, workerId)) === false) {
        return;
      }
    }
  };

  const workers: Promise<void>[] = [];
  for (let id = 0; id < size; id += 1) {
    workers.push(loop(id));
  }

  // Every worker settles before the first failure is rethrown, so callers never clean up under running work.
  const results = await Promise.allSettled(workers);
  for (const result of results) {
    if (result.status === "rejected") {
      throw result.reason;
    }
  }
}
