/**
 * @module @docsync/core/utils/concurrency
 * Bounded worker pool with first-error-wins cancellation
 */

export interface PoolOptions {
  /** Maximum number of workers running at once */
  concurrency: number;
  /** External cancellation; aborting stops new work from starting */
  signal?: AbortSignal;
}

/**
 * Run `worker` over `items` with at most `concurrency` in flight.
 *
 * Results keep the input order. The first rejection aborts the signal handed
 * to every worker, no further item is started, and once in-flight workers have
 * settled the pool rejects with that first error.
 */
export async function runWithConcurrency<T, R>(
  items: readonly T[],
  worker: (item: T, index: number, signal: AbortSignal) => Promise<R>,
  options: PoolOptions,
): Promise<R[]> {
  const concurrency = Math.max(1, Math.floor(options.concurrency));
  const controller = new AbortController();
  const onAbort = (): void => controller.abort(options.signal?.reason);

  if (options.signal?.aborted) {
    throw options.signal.reason ?? new Error('Aborted');
  }
  options.signal?.addEventListener('abort', onAbort, { once: true });

  const results: R[] = new Array<R>(items.length);
  let next = 0;
  let failed = false;
  let firstError: unknown;

  const runLane = async (): Promise<void> => {
    while (!controller.signal.aborted && next < items.length) {
      const index = next++;
      const item = items[index];
      if (item === undefined) {continue;}
      try {
        results[index] = await worker(item, index, controller.signal);
      } catch (error) {
        if (!failed) {
          failed = true;
          firstError = error;
          controller.abort(error);
        }
      }
    }
  };

  try {
    const lanes = Array.from({ length: Math.min(concurrency, items.length) }, () => runLane());
    await Promise.all(lanes);
  } finally {
    options.signal?.removeEventListener('abort', onAbort);
  }

  if (failed) {
    throw firstError;
  }
  if (controller.signal.aborted) {
    throw controller.signal.reason ?? new Error('Aborted');
  }
  return results;
}

export function chunk<T>(items: readonly T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason ?? new Error('Aborted'));
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason ?? new Error('Aborted'));
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
