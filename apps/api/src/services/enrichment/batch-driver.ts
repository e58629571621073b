import type { BatchProgress } from '@taxi-analytics/domain';

export type BatchProcessor<TIn, TOut> = (
  batch: readonly TIn[],
  batchIndex: number,
) => Promise<TOut[]>;

/**
 * Splits records into contiguous, non-overlapping batches of `batchSize`
 * (the last may be shorter) and processes them strictly in order.
 */
export class BatchDriver {
  constructor(readonly batchSize: number) {
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new RangeError(`batchSize must be a positive integer, got ${batchSize}`);
    }
  }

  countBatches(recordCount: number): number {
    return Math.ceil(recordCount / this.batchSize);
  }

  /**
   * `progress` is owned by the caller and updated in place once per completed
   * batch, right before `onProgress` is called with it.
   */
  async run<TIn, TOut>(
    records: readonly TIn[],
    processBatch: BatchProcessor<TIn, TOut>,
    progress: BatchProgress,
    onProgress?: (progress: Readonly<BatchProgress>) => void,
  ): Promise<TOut[]> {
    const totalBatches = this.countBatches(records.length);
    progress.batchIndex = 0;
    progress.totalBatches = totalBatches;
    progress.processedRecords = 0;
    progress.totalRecords = records.length;

    const results: TOut[] = [];
    for (let i = 0; i < totalBatches; i++) {
      const batch = records.slice(i * this.batchSize, (i + 1) * this.batchSize);
      const enriched = await processBatch(batch, i);
      results.push(...enriched);

      progress.batchIndex = i + 1;
      progress.processedRecords += batch.length;
      onProgress?.(progress);
    }
    return results;
  }
}
