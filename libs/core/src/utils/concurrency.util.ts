/**
 * Runs `handler` over `items` with at most `concurrency` handlers in flight.
 * Handlers are expected to contain their own failures; a rejection stops the
 * worker that hit it and rejects the returned promise.
 */
export const runWithConcurrency = async <T>(
  items: readonly T[],
  concurrency: number,
  handler: (item: T) => Promise<void>,
): Promise<void> => {
  if (items.length === 0) return;

  let index = 0;
  const limit = Math.max(1, Math.min(concurrency, items.length));

  const workers = Array.from({ length: limit }, async () => {
    while (index < items.length) {
      const currentIndex = index;
      index += 1;
      await handler(items[currentIndex]);
    }
  });

  await Promise.all(workers);
};
