/**
 * Sequential batching helpers. Shopify caps list inputs (metafieldsSet takes 25 per call).
 */

import { sleep } from "./retry.js";

/**
 * @example
 * chunkArray([1, 2, 3, 4, 5], 2) // [[1, 2], [3, 4], [5]]
 */
export function chunkArray<T>(array: readonly T[], chunkSize: number): T[][] {
  if (chunkSize <= 0) {
    throw new Error("Chunk size must be greater than 0");
  }

  const chunks: T[][] = [];
  for (let i = 0; i < array.length; i += chunkSize) {
    chunks.push(array.slice(i, i + chunkSize));
  }
  return chunks;
}

/**
 * Process items one at a time, pausing `delayMs` between them (not after the last).
 */
export async function processSequentially<T, R>(
  items: readonly T[],
  delayMs: number,
  processFn: (item: T, index: number) => Promise<R>,
  pause: (ms: number) => Promise<void> = sleep
): Promise<R[]> {
  const results: R[] = [];

  for (let i = 0; i < items.length; i++) {
    if (i > 0 && delayMs > 0) {
      await pause(delayMs);
    }
    results.push(await processFn(items[i], i));
  }

  return results;
}
