/**
 * Read-only view of run metrics, as returned to callers
 */
export interface MetricsSnapshot {
  startedAt: Date;
  totalDurationMs: number;
  totalRowsProcessed: number;
  differencesFound: number;
  partitionsProcessed: number;
  errorMessages: string[];
  partitionDurations: Record<string, number>;
}

/** Aggregated rows as stored by the result store, grouped by status */
export interface StatusSummary {
  status: string;
  count: number;
  avgSeconds: number;
}

/** Latest mismatching rows for a reporting query */
export interface DifferenceSummary {
  table: string;
  partition: string;
  baseRowCount: number;
  targetRowCount: number;
  differencesFound: number;
  sample: string;
}
