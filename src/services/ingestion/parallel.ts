/**
 * Parallel Processing Utility
 * Provides controlled concurrent execution for API calls to avoid rate limits
 * Uses native Promise-based implementation (no external dependencies)
 */

import { errorMessage } from "./utils";

// Upper bound for organization alias probes sharing one rate-limited client
export const MAX_PROBE_CONCURRENCY = 3;

/**
 * Clamps a requested worker count into [1, max]
 */
export function boundedConcurrency(requested: number, max: number = MAX_PROBE_CONCURRENCY): number {
  if (!Number.isFinite(requested) || requested < 1) return 1;
  return Math.min(Math.floor(requested), max);
}

/**
 * Result of parallel processing operation
 */
export interface ParallelResult<T> {
  successful: T[];
  failed: Array<{ id: string; error: string }>;
}

/**
 * Processes items in parallel with controlled concurrency
 * Native implementation using Promise pooling (no external dependencies)
 *
 * Results arrive in completion order, not input order.
 *
 * @param getId - Function to extract a unique identifier from each item
 * @param processor - Async function to process each item (return null to skip)
 * @param concurrency - Maximum number of concurrent operations
 */
export async function processInParallel<TItem, TResult>(
  items: readonly TItem[],
  getId: (item: TItem) => string,
  processor: (item: TItem, index: number) => Promise<TResult | null>,
  concurrency: number = MAX_PROBE_CONCURRENCY
): Promise<ParallelResult<TResult>> {
  const successful: TResult[] = [];
  const failed: Array<{ id: string; error: string }> = [];
  const limit = Math.max(1, Math.floor(concurrency));

  // Process items with controlled concurrency using a pool
  let activeCount = 0;
  let currentIndex = 0;

  await new Promise<void>((resolve) => {
    const processNext = () => {
      // Check if we're done
      if (currentIndex >= items.length && activeCount === 0) {
        resolve();
        return;
      }

      // Start new tasks up to concurrency limit
      while (activeCount < limit && currentIndex < items.length) {
        const index = currentIndex;
        const item = items[index];
        currentIndex++;
        activeCount++;

        Promise.resolve()
          .then(() => processor(item, index))
          .then((result) => {
            if (result !== null) {
              successful.push(result);
            }
          })
          .catch((error: unknown) => {
            failed.push({ id: getId(item), error: errorMessage(error) });
          })
          .finally(() => {
            activeCount--;
            processNext();
          });
      }
    };

    processNext();
  });

  return { successful, failed };
}
