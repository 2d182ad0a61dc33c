/**
 * Fast strategy
 *
 * Hashes every row on both sides and joins on the hash; rows without a
 * partner are the differences. Only `sampleLimit` of them are fetched.
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

const FINGERPRINT = '__tp_fingerprint';
const SIDE = '__tp_side';

export function buildFingerprintDiffSql(request: ComparisonRequest): string {
  const base = qualifiedTable(request.baseDatabase, request.table);
  const target = qualifiedTable(request.targetDatabase, request.table);
  const cols = request.columns.map(quoteIdent);
  const fingerprint = `encode(sha256(convert_to(concat_ws('', ${cols.join(', ')}), 'UTF8')), 'hex') AS ${FINGERPRINT}`;
  const merged = cols.map((c) => `COALESCE(b.${c}, t.${c}) AS ${c}`).join(', ');

  return [
    `WITH base_rows AS (SELECT ${cols.join(', ')}, ${fingerprint} FROM ${base} WHERE ${request.whereCondition}),`,
    `target_rows AS (SELECT ${cols.join(', ')}, ${fingerprint} FROM ${target} WHERE ${request.whereCondition})`,
    `SELECT CASE WHEN t.${FINGERPRINT} IS NULL THEN 'BASE' ELSE 'TARGET' END AS ${SIDE}, ${merged}`,
    `FROM base_rows b FULL OUTER JOIN target_rows t ON b.${FINGERPRINT} = t.${FINGERPRINT}`,
    `WHERE b.${FINGERPRINT} IS NULL OR t.${FINGERPRINT} IS NULL`,
    `LIMIT ${request.sampleLimit}`,
  ].join(' ');
}

export async function verifyFast(
  conn: EngineConnection,
  request: ComparisonRequest,
  logger?: Logger
): Promise<ComparisonOutcome> {
  const draft = startOutcome({
    table: request.table,
    baseDatabase: request.baseDatabase,
    targetDatabase: request.targetDatabase,
    partition: request.partition ?? NO_PARTITION,
    mode: 'FAST',
    whereCondition: request.whereCondition,
  });

  const counts = await runCountCheck(conn, request);
  if (counts.decided) {
    return finalizeOutcome(draft, counts.decided);
  }

  logger?.debug('Running fingerprint comparison', { table: request.table, partition: draft.partition });
  const rows = await conn.query(buildFingerprintDiffSql(request));

  if (rows.length === 0) {
    return finalizeOutcome(draft, {
      status: 'MATCH',
      message: 'All rows match (fingerprint comparison)',
      baseRowCount: counts.baseCount,
      targetRowCount: counts.targetCount,
      differencesFound: 0,
    });
  }

  const samples = rows.map((row) => {
    const label = row[SIDE] === 'BASE' ? '[BASE ONLY]' : '[TARGET ONLY]';
    return `${label} ${formatRow(row, request.columns)}`;
  });

  return finalizeOutcome(draft, {
    status: 'MISMATCH',
    message: `Found ${rows.length} sample differences`,
    baseRowCount: counts.baseCount,
    targetRowCount: counts.targetCount,
    differencesFound: rows.length,
    sampleDifferences: samples,
  });
}
