/**
 * Promise helpers
 */

import { TransientRemoteError } from './errors';

export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Run an abortable task with a deadline. On expiry the signal is aborted and
 * the returned promise rejects with a timeout error, whatever the task does.
 */
export async function withTimeout<T>(
  timeoutMs: number,
  label: string,
  task: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new TransientRemoteError(`${label} timed out after ${timeoutMs}ms`, 'timeout'));
    }, timeoutMs);
  });

  try {
    return await Promise.race([task(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Run a worker over items with at most `concurrency` in flight. Each worker
 * pulls the next item until the list is drained.
 */
export async function runPool<T>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, workerId: number) => Promise<void>
): Promise<void> {
  let nextIndex = 0;
  const takeNext = (): T | undefined => (nextIndex < items.length ? items[nextIndex++] : undefined);

  const workerCount = Math.min(Math.max(1, Math.floor(concurrency)), items.length);
  const workers = Array.from({ length: workerCount }, async (_, workerId) => {
    for (let item = takeNext(); item !== undefined; item = takeNext()) {
      await worker(item, workerId);
    }
  });

  await Promise.all(workers);
}
