export type ProcessingStage =
  | 'idle'
  | 'loading_data'
  | 'enriching'
  | 'saving_to_database'
  | 'calculating_metrics'
  | 'completed'
  | 'error';

/** Updated in place by the batch driver after every completed batch. */
export interface BatchProgress {
  batchIndex: number;
  totalBatches: number;
  processedRecords: number;
  totalRecords: number;
}

/**
 * Caller-owned snapshot of a processing run.
 * A single writer (the pipeline) mutates it; HTTP handlers read it.
 */
export interface ProcessingStatus {
  isProcessing: boolean;
  /** 0–100 */
  progress: number;
  status: ProcessingStage;
  lastUpdated: Date | null;
  recordKind?: 'gps' | 'taxi';
  batch?: BatchProgress;
  gpsSaved?: number;
  taxiSaved?: number;
  error?: string;
}

export function createProcessingStatus(): ProcessingStatus {
  return { isProcessing: false, progress: 0, status: 'idle', lastUpdated: null };
}

export function createBatchProgress(): BatchProgress {
  return { batchIndex: 0, totalBatches: 0, processedRecords: 0, totalRecords: 0 };
}
