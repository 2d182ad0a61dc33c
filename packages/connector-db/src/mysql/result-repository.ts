/**
 * MySQL Result Store
 *
 * Persists one row per comparison outcome and answers the reporting
 * queries of the CLI.
 */

import {
  RESULT_RECORD_COLUMNS,
  VerificationError,
  errorMessage,
  toResultRecord,
  validateIdentifier,
  type ComparisonOutcome,
  type CorrelationIds,
  type DifferenceSummary,
  type Logger,
  type ResultSink,
  type StatusSummary,
} from '@tableparity/core';
import type { MySQLClient, MySQLRow, SqlValue } from './client.js';

export const DEFAULT_RESULT_TABLE = 'verification_result';

/** Characters of sample text returned by listDifferences */
const SAMPLE_PREVIEW_LENGTH = 100;

function toNumber(value: unknown): number {
  const n = typeof value === 'number' ? value : Number(value ?? 0);
  return Number.isFinite(n) ? n : 0;
}

function toText(value: unknown): string {
  return value === null || value === undefined ? '' : String(value);
}

export class MySQLResultSink implements ResultSink {
  private readonly table: string;
  private readonly logger?: Logger;

  constructor(
    private readonly client: MySQLClient,
    options: { table?: string; logger?: Logger } = {}
  ) {
    this.table = options.table ?? DEFAULT_RESULT_TABLE;
    validateIdentifier(this.table, 'table');
    this.logger = options.logger;
  }

  async save(outcome: ComparisonOutcome, correlation: CorrelationIds): Promise<void> {
    const record = toResultRecord(outcome, correlation);
    const params: SqlValue[] = RESULT_RECORD_COLUMNS.map((column) => record[column]);
    const placeholders = RESULT_RECORD_COLUMNS.map(() => '?').join(', ');

    const sql = `INSERT INTO \`${this.table}\` (${RESULT_RECORD_COLUMNS.map((c) => `\`${c}\``).join(', ')}) VALUES (${placeholders})`;

    try {
      const affected = await this.client.execute(sql, params);
      this.logger?.debug('Saved verification result', {
        table: outcome.table,
        partition: outcome.partition,
        affected,
      });
    } catch (error) {
      throw new VerificationError({
        code: 'PERSISTENCE_FAILED',
        message: `Failed to save result for ${outcome.table} (${outcome.partition}): ${errorMessage(error)}`,
        context: { table: outcome.table, partition: outcome.partition },
      });
    }
  }

  /**
   * Create the result table if it does not exist yet
   */
  async ensureTable(): Promise<void> {
    const sql = `
      CREATE TABLE IF NOT EXISTS \`${this.table}\` (
        id BIGINT AUTO_INCREMENT PRIMARY KEY,
        table_name VARCHAR(255) NOT NULL,
        base_database_name VARCHAR(255) NOT NULL,
        target_database_name VARCHAR(255) NOT NULL,
        partition_key VARCHAR(500),
        execution_status VARCHAR(50) NOT NULL,
        sample_data TEXT,
        start_time DATETIME NOT NULL,
        end_time DATETIME,
        processing_time_ms BIGINT,
        base_row_count BIGINT,
        target_row_count BIGINT,
        differences_found BIGINT,
        where_condition TEXT,
        verification_mode VARCHAR(50),
        odate VARCHAR(50),
        mid VARCHAR(100),
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        INDEX idx_table_odate (table_name, odate),
        INDEX idx_status (execution_status),
        INDEX idx_created (created_at)
      )
    `;

    await this.client.execute(sql);
    this.logger?.info(`Verified ${this.table} table exists`);
  }

  /**
   * Count and average duration per status for one operation date
   */
  async summarizeByStatus(operationDate: string): Promise<StatusSummary[]> {
    const sql = `
      SELECT
        execution_status AS status,
        COUNT(*) AS count,
        ROUND(AVG(processing_time_ms) / 1000, 2) AS avg_seconds
      FROM \`${this.table}\`
      WHERE odate = ?
      GROUP BY execution_status
      ORDER BY execution_status
    `;

    const rows = await this.client.query(sql, [operationDate]);
    return rows.map((row: MySQLRow) => ({
      status: toText(row.status),
      count: toNumber(row.count),
      avgSeconds: toNumber(row.avg_seconds),
    }));
  }

  /**
   * Latest mismatching records for one operation date
   */
  async listDifferences(operationDate: string, limit = 10): Promise<DifferenceSummary[]> {
    const safeLimit = Math.max(1, Math.floor(limit));
    const sql = `
      SELECT
        table_name,
        partition_key,
        base_row_count,
        target_row_count,
        differences_found,
        LEFT(sample_data, ${SAMPLE_PREVIEW_LENGTH}) AS sample
      FROM \`${this.table}\`
      WHERE odate = ?
        AND execution_status = 'MISMATCH'
      ORDER BY created_at DESC
      LIMIT ${safeLimit}
    `;

    const rows = await this.client.query(sql, [operationDate]);
    return rows.map((row) => ({
      table: toText(row.table_name),
      partition: toText(row.partition_key),
      baseRowCount: toNumber(row.base_row_count),
      targetRowCount: toNumber(row.target_row_count),
      differencesFound: toNumber(row.differences_found),
      sample: toText(row.sample),
    }));
  }
}
