/**
 * Batch fan-out for a single stage: split records, process batches with
 * bounded concurrency, gather results back in input order.
 *
 * The whole fan-out is one stage to the status protocol. The first batch
 * that throws aborts the rest, and the stage fails with that error.
 */

export interface BatchOptions {
  batchSize: number;
  /** Maximum number of batches in flight. */
  concurrency: number;
  signal?: AbortSignal;
}

export interface BatchRunResult<R> {
  results: R[];
  batches: number;
  totalRecords: number;
}

export type BatchWorker<T, R> = (batch: T[], index: number, signal: AbortSignal) => Promise<R[]>;

export function splitIntoBatches<T>(items: readonly T[], size: number): T[][] {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`Batch size must be a positive integer (got ${size})`);
  }
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

export async function runBatches<T, R>(
  items: readonly T[],
  options: BatchOptions,
  worker: BatchWorker<T, R>
): Promise<BatchRunResult<R>> {
  const batches = splitIntoBatches(items, options.batchSize);
  if (batches.length === 0) {
    return { results: [], batches: 0, totalRecords: 0 };
  }

  const controller = new AbortController();
  const onParentAbort = () => controller.abort();
  if (options.signal?.aborted) {
    controller.abort();
  } else {
    options.signal?.addEventListener('abort', onParentAbort, { once: true });
  }

  const slots: R[][] = new Array<R[]>(batches.length);
  let nextIndex = 0;
  const failure: { failed: boolean; error: unknown } = { failed: false, error: null };

  const lane = async (): Promise<void> => {
    while (nextIndex < batches.length && !failure.failed && !controller.signal.aborted) {
      const index = nextIndex++;
      try {
        slots[index] = await worker(batches[index] ?? [], index, controller.signal);
      } catch (error) {
        if (!failure.failed) {
          failure.failed = true;
          failure.error = error;
        }
        controller.abort();
      }
    }
  };

  const laneCount = Math.max(1, Math.min(options.concurrency, batches.length));
  try {
    await Promise.all(Array.from({ length: laneCount }, lane));
  } finally {
    options.signal?.removeEventListener('abort', onParentAbort);
  }

  if (failure.failed) throw failure.error;
  if (controller.signal.aborted) {
    throw new Error('Batch processing aborted');
  }

  const results = slots.flat();
  return { results, batches: batches.length, totalRecords: results.length };
}
