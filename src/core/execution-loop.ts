/**
 * Parse comma-separated CLI identifiers into a normalized list.
 * Empty/whitespace input returns `undefined` so callers can distinguish
 * "no filter" from "explicit empty filter."
 */
export function parseCsvArgument(raw: string | undefined): string[] | undefined {
  if (!raw) {
    return undefined;
  }

  const values = raw
    .split(',')
    .map((token) => token.trim())
    .filter((token) => token.length > 0);

  return values.length > 0 ? values : undefined;
}

/**
 * Execute asynchronous work with bounded concurrency while preserving the input
 * ordering in the returned result array.
 */
export async function runWithConcurrency<TInput, TOutput>(
  items: readonly TInput[],
  requestedConcurrency: number,
  worker: (item: TInput, index: number) => Promise<TOutput>
): Promise<TOutput[]> {
  if (items.length === 0) {
    return [];
  }

  const concurrency = normalizeConcurrency(requestedConcurrency, items.length);
  const results = new Array<TOutput>(items.length);
  let nextIndex = 0;

  async function runWorker(): Promise<void> {
    while (true) {
      const index = nextIndex;
      nextIndex += 1;
      if (index >= items.length) {
        return;
      }

      const item = items[index] as TInput;
      results[index] = await worker(item, index);
    }
  }

  const workers = Array.from({ length: concurrency }, () => runWorker());
  await Promise.all(workers);
  return results;
}

/**
 * Clamp caller-provided concurrency to a positive integer no larger than the
 * number of items.
 */
export function normalizeConcurrency(requestedConcurrency: number, maxItems: number): number {
  const fallback = 1;
  if (!Number.isFinite(requestedConcurrency)) {
    return fallback;
  }

  const rounded = Math.floor(requestedConcurrency);
  if (rounded <= 0) {
    return fallback;
  }

  return Math.min(rounded, Math.max(1, maxItems));
}
