import { throwIfAborted } from "./errors.js";

export async function mapWithConcurrency<TItem, TResult>(params: {
  items: readonly TItem[];
  concurrency: number;
  signal?: AbortSignal;
  fn: (item: TItem, index: number) => Promise<TResult>;
}): Promise<TResult[]> {
  const items = params.items;
  const max = Math.max(1, Math.floor(params.concurrency || 1));
  const out: TResult[] = [];

  let nextIndex = 0;
  const workers = Array.from({ length: Math.min(max, items.length) }, async () => {
    while (!params.signal?.aborted) {
      const idx = nextIndex;
      nextIndex += 1;
      if (idx >= items.length) return;
      const item = items[idx];
      if (item === undefined) continue;
      out[idx] = await params.fn(item, idx);
    }
  });

  await Promise.all(workers);
  throwIfAborted(params.signal);
  return out;
}

/**
 * Drains an (async) iterable through a fixed number of workers. Items are pulled
 * lazily, so a filesystem walk never has to be materialized in memory.
 */
export async function forEachWithConcurrency<TItem>(params: {
  items: AsyncIterable<TItem> | Iterable<TItem>;
  concurrency: number;
  signal?: AbortSignal;
  fn: (item: TItem) => Promise<void>;
}): Promise<number> {
  const max = Math.max(1, Math.floor(params.concurrency || 1));
  const items = params.items;
  const iterator = isAsyncIterable(items) ? items[Symbol.asyncIterator]() : toAsyncIterator(items[Symbol.iterator]());

  let processed = 0;
  let done = false;
  const workers = Array.from({ length: max }, async () => {
    while (!done && !params.signal?.aborted) {
      const next = await iterator.next();
      if (next.done) {
        done = true;
        return;
      }
      await params.fn(next.value);
      processed += 1;
    }
  });

  try {
    await Promise.all(workers);
  } finally {
    if (!done) await iterator.return?.();
  }
  throwIfAborted(params.signal);
  return processed;
}

function isAsyncIterable<T>(value: AsyncIterable<T> | Iterable<T>): value is AsyncIterable<T> {
  return Symbol.asyncIterator in value;
}

function toAsyncIterator<T>(it: Iterator<T>): AsyncIterator<T> {
  return {
    next: async () => it.next(),
    return: async () => it.return?.() ?? { done: true, value: undefined },
  };
}
