export interface PoolOptions {
  concurrency: number;
  onProgress?: (completed: number, total: number) => void;
}

/**
 * Run worker over every item with at most `concurrency` calls in flight.
 * A rejected call does not stop the others; each outcome is returned at the
 * index of its item.
 */
export async function runPool<T, R>(
  items: readonly T[],
  worker: (item: T, index: number) => Promise<R>,
  options: PoolOptions,
): Promise<PromiseSettledResult<R>[]> {
  const limit = Math.max(1, Math.floor(options.concurrency));
  const total = items.length;
  const outcomes = new Array<PromiseSettledResult<R>>(total);
  let next = 0;
  let completed = 0;

  async function drain(): Promise<void> {
    while (next < total) {
      const index = next++;
      const item = items[index];
      try {
        outcomes[index] = { status: "fulfilled", value: await worker(item, index) };
      } catch (reason) {
        outcomes[index] = { status: "rejected", reason };
      }
      completed += 1;
      options.onProgress?.(completed, total);
    }
  }

  const runners = Array.from({ length: Math.min(limit, total) }, () => drain());
  await Promise.all(runners);
  return outcomes;
}

/** Reject with onTimeout() if promise has not settled within ms. */
export function withTimeout<T>(promise: Promise<T>, ms: number, onTimeout: () => Error): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(onTimeout()), ms);
    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (reason: unknown) => {
        clearTimeout(timer);
        reject(reason);
      },
    );
  });
}
