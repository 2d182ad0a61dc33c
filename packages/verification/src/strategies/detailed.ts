/**
 * Detailed strategy
 *
 * Two-way EXCEPT over the compared projection. Each direction returns up to
 * `sampleLimit` literal rows, labelled by the side that owns them.
 */

import {
  NO_PARTITION,
  finalizeOutcome,
  qualifiedTable,
  quoteIdent,
  startOutcome,
  type ComparisonOutcome,
  type ComparisonRequest,
  type EngineConnection,
  type Logger,
} from '@tableparity/core';
import { runCountCheck } from './count-check.js';
import { formatRow } from './row-format.js';

/** Rows of `from` missing in `other`, ordered by the first compared column */
export function buildExceptSql(request: ComparisonRequest, from: string, other: string): string {
  const cols = request.columns.map(quoteIdent);
  const projection = cols.join(', ');
  const left = qualifiedTable(from, request.table);
  const right = qualifiedTable(other, request.table);

  return (
    `SELECT ${projection} FROM ${left} WHERE ${request.whereCondition} ` +
    `EXCEPT SELECT ${projection} FROM ${right} WHERE ${request.whereCondition} ` +
    `ORDER BY ${cols[0] ?? '1'} LIMIT ${request.sampleLimit}`
  );
}

export async function verifyDetailed(
  conn: EngineConnection,
  request: ComparisonRequest,
  logger?: Logger
): Promise<ComparisonOutcome> {
  const draft = startOutcome({
    table: request.table,
    baseDatabase: request.baseDatabase,
    targetDatabase: request.targetDatabase,
    partition: request.partition ?? NO_PARTITION,
    mode: 'DETAILED',
    whereCondition: request.whereCondition,
  });

  const counts = await runCountCheck(conn, request);
  if (counts.decided) {
    return finalizeOutcome(draft, counts.decided);
  }

  logger?.debug('Running EXCEPT comparison', { table: request.table, partition: draft.partition });
  const baseOnly = await conn.query(buildExceptSql(request, request.baseDatabase, request.targetDatabase));
  const targetOnly = await conn.query(
    buildExceptSql(request, request.targetDatabase, request.baseDatabase)
  );

  if (baseOnly.length === 0 && targetOnly.length === 0) {
    return finalizeOutcome(draft, {
      status: 'MATCH',
      message: 'All rows are identical',
      baseRowCount: counts.baseCount,
      targetRowCount: counts.targetCount,
      differencesFound: 0,
    });
  }

  const total = baseOnly.length + targetOnly.length;
  return finalizeOutcome(draft, {
    status: 'MISMATCH',
    message: `Found ${total} differences (${baseOnly.length} in base, ${targetOnly.length} in target)`,
    baseRowCount: counts.baseCount,
    targetRowCount: counts.targetCount,
    differencesFound: total,
    sampleDifferences: [
      ...baseOnly.map((row) => `[BASE ONLY] ${formatRow(row, request.columns)}`),
      ...targetOnly.map((row) => `[TARGET ONLY] ${formatRow(row, request.columns)}`),
    ],
  });
}
