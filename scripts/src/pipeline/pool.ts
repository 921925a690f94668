/**
 * Runs `worker` over `items` with at most `concurrency` calls in flight. Each item goes to
 * exactly one call. The first rejection stops new items from starting and is rethrown
 * once the calls already in flight have settled.
 */
export async function runPool<T>(
  items: AsyncIterable<T> | Iterable<T>,
  concurrency: number,
  worker: (item: T, index: number) => Promise<void>
): Promise<void> {
  const iterator = toAsyncIterator(items);
  let index = 0;
  let failed = false;
  let failure: unknown = null;

  async function lane(): Promise<void> {
    while (!failed) {
      try {
        const next = await iterator.next();
        if (next.done) {
          return;
        }
        const current = index;
        index += 1;
        await worker(next.value, current);
      } catch (error) {
        if (!failed) {
          failed = true;
          failure = error;
        }
      }
    }
  }

  const lanes = Array.from({ length: Math.max(1, concurrency) }, () => lane());
  await Promise.all(lanes);
  if (failed) {
    throw failure;
  }
}

function isAsyncIterable<T>(items: AsyncIterable<T> | Iterable<T>): items is AsyncIterable<T> {
  return Symbol.asyncIterator in items;
}

function toAsyncIterator<T>(items: AsyncIterable<T> | Iterable<T>): AsyncIterator<T> {
  if (isAsyncIterable(items)) {
    return items[Symbol.asyncIterator]();
  }
  const sync = items[Symbol.iterator]();
  return {
    next: async () => sync.next()
  };
}
