/**
 * Run `worker` over `items` with at most `limit` in flight. Results keep
 * input order; items never started (because `shouldStop` turned true)
 * stay undefined.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
  shouldStop: () => boolean = () => false,
): Promise<Array<R | undefined>> {
  const results: Array<R | undefined> = Array.from({ length: items.length }, () => undefined);
  const maxConcurrency = Math.max(1, Math.min(Math.floor(limit) || 1, items.length));
  let nextIndex = 0;

  const workers = Array.from({ length: maxConcurrency }, async () => {
    while (true) {
      if (shouldStop()) break;
      const currentIndex = nextIndex;
      nextIndex++;
      if (currentIndex >= items.length) break;
      results[currentIndex] = await worker(items[currentIndex], currentIndex);
    }
  });

  await Promise.all(workers);
  return results;
}

export type Settled<T> =
  | { status: 'done'; value: T }
  | { status: 'failed'; error: unknown }
  | { status: 'cancelled' };

/**
 * Wait for `work`. Once `signal` aborts, `graceMs` more are allowed before
 * giving up on it; the work itself is left to finish in the background and
 * its outcome is ignored.
 */
export function settleWithGrace<T>(work: Promise<T>, signal: AbortSignal | undefined, graceMs: number): Promise<Settled<T>> {
  return new Promise(resolve => {
    let timer: ReturnType<typeof setTimeout> | undefined;
    let settled = false;

    const finish = (outcome: Settled<T>) => {
      if (settled) return;
      settled = true;
      if (timer) clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
      resolve(outcome);
    };

    const onAbort = () => {
      timer = setTimeout(() => finish({ status: 'cancelled' }), Math.max(0, graceMs));
    };

    work.then(
      value => finish({ status: 'done', value }),
      error => finish({ status: 'failed', error }),
    );

    if (signal?.aborted) {
      onAbort();
    } else {
      signal?.addEventListener('abort', onAbort, { once: true });
    }
  });
}

/** One signal that aborts when `signal` does or after `timeoutMs`. */
export function linkSignals(signal?: AbortSignal, timeoutMs?: number): { signal?: AbortSignal; dispose: () => void } {
  if (timeoutMs === undefined) return { signal, dispose: () => {} };

  const controller = new AbortController();
  const abort = () => controller.abort();
  const timer = setTimeout(abort, timeoutMs);

  if (signal?.aborted) abort();
  signal?.addEventListener('abort', abort, { once: true });

  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', abort);
    },
  };
}
