import type { ComparisonOutcome, CorrelationIds } from '../types/index.js';

/** Rows of sample text kept in one stored record */
export const MAX_STORED_SAMPLE_ROWS = 10;

/** One row of the result store, column names as stored */
export interface ResultRecord {
  table_name: string;
  base_database_name: string;
  target_database_name: string;
  partition_key: string;
  execution_status: string;
  sample_data: string;
  start_time: Date;
  end_time: Date;
  processing_time_ms: number;
  base_row_count: number;
  target_row_count: number;
  differences_found: number;
  where_condition: string;
  verification_mode: string;
  odate: string;
  mid: string;
}

export const RESULT_RECORD_COLUMNS = [
  'table_name',
  'base_database_name',
  'target_database_name',
  'partition_key',
  'execution_status',
  'sample_data',
  'start_time',
  'end_time',
  'processing_time_ms',
  'base_row_count',
  'target_row_count',
  'differences_found',
  'where_condition',
  'verification_mode',
  'odate',
  'mid',
] as const satisfies readonly (keyof ResultRecord)[];

/**
 * Message followed by up to MAX_STORED_SAMPLE_ROWS sample rows
 */
export function formatSampleText(message: string, samples: readonly string[]): string {
  if (samples.length === 0) return message;

  let text = `${message}\n\nSample differences:\n`;
  for (const row of samples.slice(0, MAX_STORED_SAMPLE_ROWS)) {
    text += `${row}\n`;
  }
  if (samples.length > MAX_STORED_SAMPLE_ROWS) {
    text += '... (truncated)';
  }
  return text;
}

export function toResultRecord(outcome: ComparisonOutcome, correlation: CorrelationIds): ResultRecord {
  return {
    table_name: outcome.table,
    base_database_name: outcome.baseDatabase,
    target_database_name: outcome.targetDatabase,
    partition_key: outcome.partition,
    execution_status: outcome.status,
    sample_data: formatSampleText(outcome.message, outcome.sampleDifferences),
    start_time: outcome.startedAt,
    end_time: outcome.endedAt,
    processing_time_ms: outcome.durationMs,
    base_row_count: outcome.baseRowCount,
    target_row_count: outcome.targetRowCount,
    differences_found: outcome.differencesFound,
    where_condition: outcome.whereCondition,
    verification_mode: outcome.mode,
    odate: correlation.operationDate,
    mid: correlation.migrationId,
  };
}
