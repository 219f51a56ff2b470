// src/utils/concurrency.ts

/**
 * Splits an array into consecutive chunks of at most `size` elements
 */
export function chunkArray<T>(items: T[], size: number): T[][] {
  const chunkSize = Math.max(1, Math.floor(size));
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += chunkSize) {
    chunks.push(items.slice(i, i + chunkSize));
  }
  return chunks;
}

/**
 * Maps items through `task` with at most `concurrency` tasks in flight per round.
 * Results come back in input order. `task` is expected to settle every item
 * itself; a rejection propagates.
 *
 * Once `signal` aborts, items of later rounds are handed to `onSkipped` instead
 * of being started.
 */
export async function mapInChunks<T, R>(
  items: T[],
  concurrency: number,
  task: (item: T, index: number) => Promise<R>,
  options: { signal?: AbortSignal; onSkipped?: (item: T, index: number) => R } = {},
): Promise<R[]> {
  const results: R[] = [];
  let offset = 0;

  for (const chunk of chunkArray(items, concurrency)) {
    const base = offset;
    const { signal, onSkipped } = options;

    if (signal?.aborted && onSkipped) {
      results.push(...chunk.map((item, i) => onSkipped(item, base + i)));
    } else {
      const chunkResults = await Promise.all(chunk.map((item, i) => task(item, base + i)));
      results.push(...chunkResults);
    }

    offset += chunk.length;
  }

  return results;
}
