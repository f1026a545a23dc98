import { setImmediate as yieldToEventLoop } from 'node:timers/promises';

export interface MapOptions {
  /** Run tasks concurrently; otherwise strictly one after another */
  parallel: boolean;
  /** Maximum tasks in flight when parallel */
  concurrency: number;
}

/**
 * Maps items through an async task, returning results in input order no
 * matter which task finishes first.
 *
 * When a task rejects, no further items are started and the returned
 * promise rejects with that error once the tasks already in flight settle.
 */
export async function mapUnits<T, R>(
  items: readonly T[],
  options: MapOptions,
  task: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);

  if (!options.parallel) {
    for (const [index, item] of items.entries()) {
      results[index] = await task(item, index);
    }
    return results;
  }

  let next = 0;
  let cancelled = false;

  const worker = async (): Promise<void> => {
    while (!cancelled && next < items.length) {
      const index = next;
      next += 1;
      const item = items[index];
      if (item === undefined) continue;

      await yieldToEventLoop();
      try {
        results[index] = await task(item, index);
      } catch (error) {
        cancelled = true;
        throw error;
      }
    }
  };

  const workerCount = Math.max(1, Math.min(options.concurrency, items.length));
  const settled = await Promise.allSettled(Array.from({ length: workerCount }, () => worker()));

  const failure = settled.find(
    (outcome): outcome is PromiseRejectedResult => outcome.status === 'rejected'
  );
  if (failure !== undefined) {
    throw failure.reason;
  }

  return results;
}
