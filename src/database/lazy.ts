/**
 * Restartable lazy sequences over query results
 */

/**
 * Wraps a loader so every `for await` over the result calls it again.
 * Nothing is cached between iterations.
 */
export function lazySequence<T>(load: () => Promise<T[]>): AsyncIterable<T> {
  return {
    async *[Symbol.asyncIterator]() {
      const items = await load();
      yield* items;
    }
  };
}

export async function collect<T>(sequence: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of sequence) {
    items.push(item);
  }
  return items;
}
