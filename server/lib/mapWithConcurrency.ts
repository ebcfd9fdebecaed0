import { buildAbortError } from './errors.js';

/**
 * Run `worker` over `items` with at most `concurrency` in flight, preserving
 * input order in the result (shaped like `Promise.allSettled`). Once
 * `shouldStop()` returns true no further items start; items that never
 * started are rejected with an AbortError.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
  shouldStop?: () => boolean,
): Promise<Array<PromiseSettledResult<R>>> {
  const list = Array.isArray(items) ? items : [];
  if (list.length === 0) return [];
  const maxConcurrency = Math.max(1, Math.min(list.length, Math.floor(Number(concurrency)) || 1));
  const results = new Array<PromiseSettledResult<R>>(list.length);
  let cursor = 0;
  let stopped = false;

  async function runOneWorker(): Promise<void> {
    while (cursor < list.length) {
      if (stopped || (shouldStop && shouldStop())) {
        stopped = true;
        break;
      }
      const currentIndex = cursor;
      cursor += 1;
      try {
        results[currentIndex] = { status: 'fulfilled', value: await worker(list[currentIndex], currentIndex) };
      } catch (err: unknown) {
        results[currentIndex] = { status: 'rejected', reason: err };
      }
    }
  }

  const workers: Promise<void>[] = [];
  for (let i = 0; i < maxConcurrency; i++) {
    workers.push(runOneWorker());
  }
  await Promise.all(workers);

  for (let i = 0; i < list.length; i++) {
    if (!(i in results)) {
      results[i] = { status: 'rejected', reason: buildAbortError('Stopped before processing') };
    }
  }
  return results;
}
