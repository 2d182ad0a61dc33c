import type { EngineRow } from '@tableparity/core';

export const NULL_MARKER = '[NULL]';
export const BLOB_MARKER = '[BLOB]';

export function formatValue(value: unknown): string {
  if (value === null || value === undefined) return NULL_MARKER;
  if (value instanceof Uint8Array) return BLOB_MARKER;
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

/**
 * Tab-separated rendering of `row`, fields in `columns` order
 */
export function formatRow(row: EngineRow, columns: readonly string[]): string {
  return columns.map((column) => formatValue(row[column])).join('\t');
}
