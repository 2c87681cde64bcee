/**
 * Runs `processor` over `items` with at most `concurrency` in flight.
 * Result order follows completion order. Processors are expected to
 * handle their own failures; a rejection aborts the whole batch.
 */
export async function runWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  processor: (item: T) => Promise<R>,
): Promise<R[]> {
  const results: R[] = [];
  const executing: Promise<void>[] = [];
  const limit = Math.max(1, concurrency);

  for (const item of items) {
    if (executing.length >= limit) {
      await Promise.race(executing);
    }

    const promise: Promise<void> = processor(item)
      .then((result) => {
        results.push(result);
      })
      .finally(() => {
        const index = executing.indexOf(promise);
        if (index > -1) executing.splice(index, 1);
      });

    executing.push(promise);
  }

  await Promise.all(executing);
  return results;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
