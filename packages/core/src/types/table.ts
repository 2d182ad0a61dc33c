/**
 * Table and request types
 */

import type { VerificationMode } from './outcome.js';

/** Resolved once per table run */
export interface TableMetadata {
  readonly database: string;
  readonly table: string;
  readonly partitioned: boolean;
  /** Compared columns in table order, exclusions already removed */
  readonly columns: readonly string[];
  /** Partition key names in level order */
  readonly partitionKeys: readonly string[];
}

/** What the caller asks to verify */
export interface VerificationRequest {
  table: string;
  baseDatabase: string;
  targetDatabase: string;
  operationDate: string;
  migrationId: string;
  /** SQL predicate applied to both sides (default: 1=1) */
  whereCondition: string;
  excludeColumns: string[];
  mode: VerificationMode;
}

/** Inputs of a single strategy invocation */
export interface ComparisonRequest {
  baseDatabase: string;
  targetDatabase: string;
  table: string;
  columns: readonly string[];
  whereCondition: string;
  sampleLimit: number;
  /** Descriptor recorded on the outcome (default: NO_PARTITION) */
  partition?: string;
}
