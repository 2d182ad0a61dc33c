/**
 * Batch verification
 *
 * Verifies several tables one after another in FAST mode. A table with
 * differences is verified again in DETAILED mode under `<mid>_detailed`
 * so the stored samples show the literal rows.
 */

import {
  errorMessage,
  type Logger,
  type MetricsSnapshot,
  type VerificationRequestInput,
} from '@tableparity/core';
import type { VerificationMetrics } from '../metrics/index.js';

export type TableVerdict = 'PASSED' | 'DIFFERENCES' | 'FAILED';

/** What the batch needs from an orchestrator */
export interface TableVerifier {
  verifyTable(request: VerificationRequestInput): Promise<VerificationMetrics>;
}

export interface BatchOptions {
  tables: string[];
  baseDatabase: string;
  targetDatabase: string;
  operationDate: string;
  migrationId: string;
  whereCondition?: string;
  excludeColumns?: string[];
}

export interface BatchTableResult {
  table: string;
  verdict: TableVerdict;
  fast?: MetricsSnapshot;
  detailed?: MetricsSnapshot;
  error?: string;
}

export interface BatchSummary {
  total: number;
  passed: number;
  differences: number;
  failed: number;
  failedTables: string[];
  results: BatchTableResult[];
}

export const DETAILED_MIGRATION_SUFFIX = '_detailed';

function verdictOf(metrics: VerificationMetrics): TableVerdict {
  if (metrics.hasErrors) return 'FAILED';
  if (metrics.differencesFound > 0) return 'DIFFERENCES';
  return 'PASSED';
}

async function verifyOneTable(
  verifier: TableVerifier,
  options: BatchOptions,
  table: string,
  logger?: Logger
): Promise<BatchTableResult> {
  const base = {
    table,
    baseDatabase: options.baseDatabase,
    targetDatabase: options.targetDatabase,
    operationDate: options.operationDate,
    whereCondition: options.whereCondition,
    excludeColumns: options.excludeColumns,
  };

  let fast: VerificationMetrics;
  try {
    fast = await verifier.verifyTable({ ...base, migrationId: options.migrationId, mode: 'FAST' });
  } catch (error) {
    logger?.error(`${table} verification failed with error`, { error: errorMessage(error) });
    return { table, verdict: 'FAILED', error: errorMessage(error) };
  }

  const fastVerdict = verdictOf(fast);
  if (fastVerdict !== 'DIFFERENCES') {
    if (fastVerdict === 'PASSED') logger?.info(`${table} verification passed (FAST mode)`);
    else logger?.error(`${table} verification failed with error`);
    return { table, verdict: fastVerdict, fast: fast.snapshot() };
  }

  logger?.warn(`${table} has differences - running DETAILED mode`);
  try {
    const detailed = await verifier.verifyTable({
      ...base,
      migrationId: `${options.migrationId}${DETAILED_MIGRATION_SUFFIX}`,
      mode: 'DETAILED',
    });
    if (detailed.hasErrors) {
      logger?.error(`${table} DETAILED verification failed`);
      return { table, verdict: 'FAILED', fast: fast.snapshot(), detailed: detailed.snapshot() };
    }
    return { table, verdict: 'DIFFERENCES', fast: fast.snapshot(), detailed: detailed.snapshot() };
  } catch (error) {
    logger?.error(`${table} DETAILED verification failed`, { error: errorMessage(error) });
    return { table, verdict: 'FAILED', fast: fast.snapshot(), error: errorMessage(error) };
  }
}

export async function runBatch(
  verifier: TableVerifier,
  options: BatchOptions,
  logger?: Logger
): Promise<BatchSummary> {
  const results: BatchTableResult[] = [];
  for (const table of options.tables) {
    logger?.info(`Verifying ${table}...`);
    results.push(await verifyOneTable(verifier, options, table, logger));
  }

  const failedTables = results.filter((r) => r.verdict === 'FAILED').map((r) => r.table);
  return {
    total: results.length,
    passed: results.filter((r) => r.verdict === 'PASSED').length,
    differences: results.filter((r) => r.verdict === 'DIFFERENCES').length,
    failed: failedTables.length,
    failedTables,
    results,
  };
}
