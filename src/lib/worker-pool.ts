// Bounded fan-out: at most `size` tasks in flight, batch by batch.

export function chunk<T>(arr: T[], size: number) {
  const out: T[][] = [];
  for (let i = 0; i < arr.length; i += size) out.push(arr.slice(i, i + size));
  return out;
}

/**
 * Runs `task` over `items` in batches of `size`. Results keep input order.
 * A rejected task rejects the whole run, so callers wrap their own failures.
 */
export async function runPool<T, R>(items: T[], size: number, task: (item: T, index: number) => Promise<R>): Promise<R[]> {
  const width = Math.max(1, Math.floor(size));
  const out: R[] = [];
  let offset = 0;
  for (const batch of chunk(items, width)) {
    const base = offset;
    out.push(...(await Promise.all(batch.map((item, i) => task(item, base + i)))));
    offset += batch.length;
  }
  return out;
}
