import { describe, expect, it } from 'vitest';
import { formatBatchSummary, formatRunSummary, formatStatusReport } from '../src/report.js';

describe('formatStatusReport', () => {
  it('renders status totals followed by the latest differences', () => {
    const lines = formatStatusReport(
      '20250101',
      [
        { status: 'MATCH', count: 12, avgSeconds: 1.5 },
        { status: 'MISMATCH', count: 1, avgSeconds: 3 },
      ],
      [
        {
          table: 'orders',
          partition: 'year=2025',
          baseRowCount: 4,
          targetRowCount: 6,
          differencesFound: 2,
          sample: 'Row count mismatch\n\nSample',
        },
      ]
    );

    expect(lines).toEqual([
      '=== Verification Report for 20250101 ===',
      'STATUS      COUNT  AVG_SECONDS',
      'MATCH          12         1.50',
      'MISMATCH        1         3.00',
      '',
      'Latest differences:',
      'orders [year=2025] base=4 target=6 differences=2',
      '  Row count mismatch  Sample',
    ]);
  });

  it('says so when nothing is stored', () => {
    expect(formatStatusReport('20250102', [], [])).toEqual([
      '=== Verification Report for 20250102 ===',
      'No results stored for this date',
    ]);
  });
});

describe('run summaries', () => {
  it('summarizes one table run with its errors', () => {
    expect(
      formatRunSummary('orders', {
        startedAt: new Date(0),
        totalDurationMs: 1234,
        totalRowsProcessed: 40,
        differencesFound: 0,
        partitionsProcessed: 2,
        errorMessages: ['year=2025: Error: boom'],
        partitionDurations: {},
      })
    ).toEqual([
      'orders: 2 partition(s), 40 rows, 0 difference(s) in 1.23s',
      '  error: year=2025: Error: boom',
    ]);
  });

  it('lists failed tables in the batch summary', () => {
    expect(
      formatBatchSummary({
        total: 3,
        passed: 1,
        differences: 1,
        failed: 1,
        failedTables: ['payments'],
        results: [],
      })
    ).toEqual([
      '=== Batch Summary ===',
      'Total tables: 3',
      'Passed: 1',
      'With differences: 1',
      'Failed: 1',
      'Failed tables: payments',
    ]);
  });
});
