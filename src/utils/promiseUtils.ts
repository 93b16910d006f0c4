/**
 * Runs the tasks with at most `maxConcurrency` of them in flight. Results keep the
 * order of the tasks, not the order in which they settled.
 */
export async function promiseQueue<T>(maxConcurrency: number, ...tasks: Array<() => Promise<T>>): Promise<Array<T>> {
  const results = new Array<T>(tasks.length);
  let next = 0;

  const worker = async () => {
    while (next < tasks.length) {
      const index = next;
      next += 1;
      results[index] = await tasks[index]();
    }
  };

  const workers = Math.max(1, Math.min(maxConcurrency, tasks.length));
  await Promise.all(Array.from({ length: workers }, () => worker()));
  return results;
}

/** Resolves after `ms`, or as soon as `signal` aborts. Never rejects. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0 || signal?.aborted) {
    return Promise.resolve();
  }
  return new Promise<void>(resolve => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
