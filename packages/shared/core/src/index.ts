export type Brand<T, B extends string> = T & { readonly __brand: B };

export const chunk = <T>(input: readonly T[], size: number): T[][] => {
  const sizeOrOne = Math.max(1, Math.floor(size));
  const out: T[][] = [];
  for (let i = 0; i < input.length; i += sizeOrOne) {
    out.push([...input.slice(i, i + sizeOrOne)]);
  }
  return out;
};

export const uniqueInOrder = <T>(input: Iterable<T>): T[] => [...new Set(input)];

/**
 * Maps `items` through `run` with at most `limit` calls in flight.
 * Every task writes only its own slot, so results keep the input order
 * no matter which task settles first. A rejected task rejects the whole map;
 * callers that need per-item isolation return a Result from `run`.
 */
export const mapBounded = async <T, R>(
  items: readonly T[],
  limit: number,
  run: (item: T, index: number) => Promise<R>,
): Promise<R[]> => {
  const results = new Array<R>(items.length);
  const requested = Number.isNaN(limit) ? 1 : Math.floor(limit);
  const width = Math.max(1, Math.min(requested, items.length));
  let cursor = 0;

  const worker = async (): Promise<void> => {
    while (cursor < items.length) {
      const index = cursor;
      cursor += 1;
      results[index] = await run(items[index], index);
    }
  };

  await Promise.all(Array.from({ length: width }, () => worker()));
  return results;
};
