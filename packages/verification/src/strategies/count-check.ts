import {
  qualifiedTable,
  type ComparisonRequest,
  type EngineConnection,
  type OutcomeResult,
} from '@tableparity/core';

export interface CountCheck {
  baseCount: number;
  targetCount: number;
  /** Set when the counts alone decide the outcome */
  decided?: OutcomeResult;
}

function toCount(value: unknown): number {
  // COUNT(*) is bigint, which pg returns as a string
  const n = Number(value ?? 0);
  return Number.isFinite(n) ? n : 0;
}

/**
 * Count rows on both sides under the request filter. Differing counts and
 * two empty sides are final; anything else needs row-level differencing.
 */
export async function runCountCheck(
  conn: EngineConnection,
  request: ComparisonRequest
): Promise<CountCheck> {
  const base = qualifiedTable(request.baseDatabase, request.table);
  const target = qualifiedTable(request.targetDatabase, request.table);
  const where = request.whereCondition;

  const rows = await conn.query(
    `SELECT (SELECT COUNT(*) FROM ${base} WHERE ${where}) AS base_count, ` +
      `(SELECT COUNT(*) FROM ${target} WHERE ${where}) AS target_count`
  );
  const baseCount = toCount(rows[0]?.base_count);
  const targetCount = toCount(rows[0]?.target_count);

  if (baseCount !== targetCount) {
    return {
      baseCount,
      targetCount,
      decided: {
        status: 'MISMATCH',
        message: 'Row count mismatch',
        baseRowCount: baseCount,
        targetRowCount: targetCount,
        differencesFound: Math.abs(baseCount - targetCount),
      },
    };
  }

  if (baseCount === 0) {
    return {
      baseCount,
      targetCount,
      decided: {
        status: 'MATCH',
        message: 'Both tables are empty',
        baseRowCount: 0,
        targetRowCount: 0,
        differencesFound: 0,
      },
    };
  }

  return { baseCount, targetCount };
}
