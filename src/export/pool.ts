/**
 * Concurrency helpers for the export
 */

const settle = () => {};

/**
 * Serialise async tasks: each task starts after the previous one settled.
 * The returned promise carries the task's own result or error.
 */
export function createSerialQueue() {
  let tail: Promise<void> = Promise.resolve();

  return function enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = tail.then(task);
    tail = run.then(settle, settle);
    return run;
  };
}

/**
 * Run `worker` over `items` with at most `limit` in flight. Items are taken in
 * order; once `signal` is aborted no further item is started. Workers are
 * expected to handle their own errors.
 */
export async function runPool<T>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<void>,
  signal?: AbortSignal,
): Promise<void> {
  let next = 0;

  const lane = async () => {
    while (next < items.length && !signal?.aborted) {
      const index = next;
      next += 1;
      await worker(items[index], index);
    }
  };

  const lanes = Math.max(1, Math.min(limit, items.length));
  await Promise.all(Array.from({ length: lanes }, lane));
}
