import { createSubsystemLogger } from "../logging/subsystem.js";

const log = createSubsystemLogger("ingest/batch");

export const DEFAULT_BATCH_SIZE = 1000;
const MIN_BATCH_SIZE = 10;
const MAX_BATCH_SIZE = 10_000;

/**
 * Clamps a requested batch size into the supported range; non-positive or
 * non-finite sizes fall back to the default.
 */
export function normalizeBatchSize(batchSize: number | undefined): number {
  if (batchSize === undefined || !Number.isFinite(batchSize) || batchSize <= 0) {
    return DEFAULT_BATCH_SIZE;
  }
  return Math.min(MAX_BATCH_SIZE, Math.max(MIN_BATCH_SIZE, Math.floor(batchSize)));
}

/**
 * Groups an async sequence into arrays of up to `batchSize` items. The last
 * batch may be shorter; nothing is yielded for an empty source.
 */
export async function* batchRecords<T>(
  source: AsyncIterable<T>,
  batchSize?: number,
): AsyncGenerator<T[]> {
  const size = normalizeBatchSize(batchSize);
  let batch: T[] = [];
  let total = 0;

  for await (const item of source) {
    batch.push(item);
    total++;
    if (batch.length >= size) {
      yield batch;
      batch = [];
    }
  }

  if (batch.length > 0) {
    yield batch;
  }
  log.debug("Batching complete", { total, batchSize: size });
}
