import type { DifferenceSummary, MetricsSnapshot, StatusSummary } from '@tableparity/core';
import type { BatchSummary } from '@tableparity/verification';

export function formatRunSummary(table: string, metrics: MetricsSnapshot): string[] {
  const lines = [
    `${table}: ${metrics.partitionsProcessed} partition(s), ${metrics.totalRowsProcessed} rows, ` +
      `${metrics.differencesFound} difference(s) in ${(metrics.totalDurationMs / 1000).toFixed(2)}s`,
  ];
  for (const message of metrics.errorMessages) {
    lines.push(`  error: ${message}`);
  }
  return lines;
}

export function formatBatchSummary(summary: BatchSummary): string[] {
  const lines = [
    '=== Batch Summary ===',
    `Total tables: ${summary.total}`,
    `Passed: ${summary.passed}`,
    `With differences: ${summary.differences}`,
    `Failed: ${summary.failed}`,
  ];
  if (summary.failedTables.length > 0) {
    lines.push(`Failed tables: ${summary.failedTables.join(', ')}`);
  }
  return lines;
}

/**
 * Per-status totals and latest mismatches stored for one operation date
 */
export function formatStatusReport(
  operationDate: string,
  statuses: readonly StatusSummary[],
  differences: readonly DifferenceSummary[]
): string[] {
  const lines = [`=== Verification Report for ${operationDate} ===`];

  if (statuses.length === 0) {
    lines.push('No results stored for this date');
    return lines;
  }

  lines.push(`${'STATUS'.padEnd(10)} ${'COUNT'.padStart(6)} ${'AVG_SECONDS'.padStart(12)}`);
  for (const row of statuses) {
    lines.push(
      `${row.status.padEnd(10)} ${String(row.count).padStart(6)} ${row.avgSeconds.toFixed(2).padStart(12)}`
    );
  }

  if (differences.length > 0) {
    lines.push('', 'Latest differences:');
    for (const diff of differences) {
      lines.push(
        `${diff.table} [${diff.partition}] base=${diff.baseRowCount} target=${diff.targetRowCount} ` +
          `differences=${diff.differencesFound}`
      );
      if (diff.sample) lines.push(`  ${diff.sample.replace(/\n/g, ' ')}`);
    }
  }
  return lines;
}
