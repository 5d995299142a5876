/**
 * Process items from an async source with at most `concurrency` handlers in
 * flight. Items are pulled only as workers free up, so a long listing is
 * never buffered in memory.
 *
 * A failing handler (or a failing source) stops new items from being pulled;
 * handlers already running are awaited, then the first error is thrown.
 * An aborted signal also stops the pull, without an error.
 *
 * @param items - Source of items, consumed lazily
 * @param concurrency - Max number of handlers running at once
 * @param fn - Async handler for each item
 * @param signal - Stops pulling new items once aborted
 */
export async function forEachBounded<T>(
  items: AsyncIterable<T>,
  concurrency: number,
  fn: (item: T) => Promise<void>,
  signal?: AbortSignal
): Promise<void> {
  if (!(Number.isInteger(concurrency) && concurrency > 0)) {
    throw new TypeError('Expected `concurrency` to be a number from 1 and up');
  }

  const iterator = items[Symbol.asyncIterator]();
  let failure: { error: unknown } | undefined;

  const worker = async (): Promise<void> => {
    while (!failure && !signal?.aborted) {
      let next: IteratorResult<T>;
      try {
        next = await iterator.next();
      } catch (error) {
        failure ??= { error };
        return;
      }
      // Another worker may have failed, or the signal fired, while this pull was pending
      if (next.done || failure || signal?.aborted) {
        return;
      }
      try {
        await fn(next.value);
      } catch (error) {
        failure ??= { error };
      }
    }
  };

  await Promise.all(Array.from({ length: concurrency }, () => worker()));

  if (failure) {
    // Release the source (e.g. an open listing) when we stopped early
    await iterator.return?.();
    throw failure.error;
  }
  if (signal?.aborted) {
    await iterator.return?.();
  }
}
