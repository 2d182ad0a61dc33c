import { describe, expect, it } from 'vitest';
import { parseVerificationRequest, parseVerificationSettings } from '../src/validation/schemas.js';
import { qualifiedTable, quoteIdent, quoteLiteral } from '../src/utils/sql.js';
import { finalizeOutcome, startOutcome } from '../src/types/index.js';

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

describe('parseVerificationSettings', () => {
  it('fills in defaults', () => {
    expect(parseVerificationSettings({})).toEqual({
      maxParallelPartitions: 100,
      sampleLimit: 5,
      retryAttempts: 3,
      retryDelayMs: 1000,
      fanOutTimeoutMs: 1_800_000,
      shutdownGraceMs: 5000,
    });
  });

  it('rejects a non-positive parallelism', () => {
    expect(() => parseVerificationSettings({ maxParallelPartitions: 0 })).toThrow(
      /maxParallelPartitions/
    );
  });
});

describe('parseVerificationRequest', () => {
  it('applies the default filter, mode and trims excluded columns', () => {
    const request = parseVerificationRequest({
      table: 'orders',
      baseDatabase: 'legacy',
      targetDatabase: 'migrated',
      operationDate: '20250101',
      migrationId: 'mig-1',
      excludeColumns: [' updated_at ', ''],
    });

    expect(request.whereCondition).toBe('1=1');
    expect(request.mode).toBe('FAST');
    expect(request.excludeColumns).toEqual(['updated_at']);
  });

  it('rejects table names that are not plain identifiers', () => {
    const error = thrownBy(() =>
      parseVerificationRequest({
        table: 'orders;drop',
        baseDatabase: 'legacy',
        targetDatabase: 'migrated',
        operationDate: '20250101',
        migrationId: 'mig-1',
      })
    );
    expect(error).toMatchObject({ code: 'CONFIGURATION_ERROR' });
  });
});

describe('SQL quoting', () => {
  it('doubles embedded quotes', () => {
    expect(quoteIdent('odd"name')).toBe('"odd""name"');
    expect(quoteLiteral("O'Brien")).toBe("'O''Brien'");
  });

  it('qualifies valid table references and rejects the rest', () => {
    expect(qualifiedTable('legacy', 'orders')).toBe('"legacy"."orders"');
    expect(thrownBy(() => qualifiedTable('legacy', 'orders x'))).toMatchObject({
      code: 'INVALID_IDENTIFIER',
    });
  });
});

describe('finalizeOutcome', () => {
  it('stamps the duration and zeroes differences on errors', () => {
    const draft = startOutcome(
      {
        table: 'orders',
        baseDatabase: 'legacy',
        targetDatabase: 'migrated',
        partition: 'NO_PARTITION',
        mode: 'FAST',
        whereCondition: '1=1',
      },
      new Date('2025-01-01T00:00:00.000Z')
    );

    const outcome = finalizeOutcome(
      draft,
      { status: 'ERROR', message: 'Error: lost connection', differencesFound: 4 },
      new Date('2025-01-01T00:00:02.000Z')
    );

    expect(outcome.durationMs).toBe(2000);
    expect(outcome.differencesFound).toBe(0);
    expect(outcome.sampleDifferences).toEqual([]);
  });
});
