/**
 * Partition descriptors
 *
 * A descriptor is the canonical string `k1=v1/k2=v2` naming one partition,
 * with keys in discovered level order.
 */

import {
  NO_PARTITION,
  VALID_IDENTIFIER,
  VerificationError,
  quoteIdent,
  quoteLiteral,
} from '@tableparity/core';

/** Rendering of a SQL NULL partition value inside a descriptor */
export const NULL_PARTITION_VALUE = '__NULL__';

/** Identifiers PostgreSQL reads the same with or without quotes */
const FOLDED_IDENTIFIER = /^[a-z_][a-z0-9_]*$/;

const VALUE_ESCAPES: Record<string, string> = { '%': '%25', '/': '%2F', '=': '%3D' };
const VALUE_UNESCAPES: Record<string, string> = { '%25': '%', '%2F': '/', '%3D': '=' };

/** Percent-encode the characters that delimit descriptor segments */
export function escapePartitionValue(value: string): string {
  return value.replace(/[%/=]/g, (ch) => VALUE_ESCAPES[ch] ?? ch);
}

export function unescapePartitionValue(value: string): string {
  return value.replace(/%(25|2F|3D)/gi, (match) => VALUE_UNESCAPES[match.toUpperCase()] ?? match);
}

function filterColumn(key: string): string {
  return FOLDED_IDENTIFIER.test(key) ? key : quoteIdent(key);
}

export interface PartitionSegment {
  key: string;
  value: string;
}

/**
 * Split a descriptor into key/value segments, decoding escaped values.
 * Segments without `=` are skipped; the value is everything after the first `=`.
 */
export function parsePartitionDescriptor(descriptor: string): PartitionSegment[] {
  if (!descriptor || descriptor === NO_PARTITION) return [];

  const segments: PartitionSegment[] = [];
  for (const part of descriptor.split('/')) {
    const eq = part.indexOf('=');
    if (eq <= 0) continue;
    segments.push({ key: part.slice(0, eq), value: unescapePartitionValue(part.slice(eq + 1)) });
  }
  return segments;
}

export function formatPartitionDescriptor(segments: readonly PartitionSegment[]): string {
  return segments.map((s) => `${s.key}=${escapePartitionValue(s.value)}`).join('/');
}

/**
 * Turn a descriptor into a predicate ANDed in front of `baseFilter`.
 *
 *   buildPartitionFilter('year=2025/month=01', 'active=1')
 *   // => "year='2025' AND month='01' AND active=1"
 */
export function buildPartitionFilter(descriptor: string, baseFilter: string): string {
  const segments = parsePartitionDescriptor(descriptor);
  if (segments.length === 0) return baseFilter;

  const conditions = segments.map(({ key, value }) => {
    if (!VALID_IDENTIFIER.test(key)) {
      throw new VerificationError({
        code: 'INVALID_PARTITION',
        message: `Invalid partition key "${key}" in descriptor "${descriptor}"`,
        context: { descriptor },
      });
    }
    const column = filterColumn(key);
    return value === NULL_PARTITION_VALUE ? `${column} IS NULL` : `${column}=${quoteLiteral(value)}`;
  });

  return `${conditions.join(' AND ')} AND ${baseFilter}`;
}
