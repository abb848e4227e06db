import os from "os";

export function defaultParallelism(): number {
  return Math.max(1, os.availableParallelism());
}

/**
 * Runs `fn` over `items` with at most `limit` calls in flight.
 * Results come back in input order whatever order the calls settle in.
 * The first rejection is rethrown after in-flight calls settle.
 */
export async function mapBounded<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const width = Math.max(1, Math.min(limit, items.length));
  const queue = items.entries();
  const failures: unknown[] = [];

  async function worker(): Promise<void> {
    for (const [i, item] of queue) {
      if (failures.length > 0) return;
      try {
        results[i] = await fn(item, i);
      } catch (err) {
        failures.push(err);
      }
    }
  }

  await Promise.all(Array.from({ length: width }, () => worker()));
  if (failures.length > 0) throw failures[0];
  return results;
}
