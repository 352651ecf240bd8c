export type Settled<R> = {
  index: number;
  value: R;
};

// Runs `fn` over `items` with at most `limit` in flight. Results come back in
// completion order. After a rejection no new item starts; the first error is
// rethrown once in-flight work has settled.
export async function runShards<S, R>(
  items: readonly S[],
  limit: number,
  fn: (item: S, index: number) => Promise<R>,
): Promise<Settled<R>[]> {
  const settled: Settled<R>[] = [];
  const errors: unknown[] = [];
  const width = Math.max(1, Math.min(Math.floor(limit) || 1, items.length));
  let next = 0;

  const worker = async (): Promise<void> => {
    while (errors.length === 0 && next < items.length) {
      const index = next;
      next += 1;
      const item = items[index];
      if (item === undefined) continue;

      try {
        settled.push({ index, value: await fn(item, index) });
      } catch (error) {
        errors.push(error);
      }
    }
  };

  await Promise.all(Array.from({ length: width }, () => worker()));

  if (errors.length > 0) throw errors[0];
  return settled;
}
