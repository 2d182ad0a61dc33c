/**
 * Comparison Outcome Types
 *
 * One outcome is produced per partition (or once for a non-partitioned
 * table), persisted to the result store and folded into run metrics.
 */

/** Differencing algorithm used after the count check */
export type VerificationMode =
  | 'FAST'      // fingerprint + full outer join, sample rows only
  | 'DETAILED'; // two-way EXCEPT, literal rows labelled by side

/** Result status of a single comparison */
export type VerificationStatus = 'MATCH' | 'MISMATCH' | 'ERROR';

/** Reserved descriptor for tables without partitions */
export const NO_PARTITION = 'NO_PARTITION';

/** Caller-supplied identifiers attached to every persisted outcome */
export interface CorrelationIds {
  /** Operation date, usually YYYYMMDD */
  operationDate: string;
  /** Migration or batch identifier */
  migrationId: string;
}

/** Outcome of comparing one partition (or a whole table) */
export interface ComparisonOutcome {
  table: string;
  baseDatabase: string;
  targetDatabase: string;
  /** Canonical partition descriptor, or NO_PARTITION */
  partition: string;
  status: VerificationStatus;
  message: string;
  baseRowCount: number;
  targetRowCount: number;
  /** Meaningful only when status is not ERROR; capped by the sample limit in phase 2 */
  differencesFound: number;
  sampleDifferences: string[];
  startedAt: Date;
  endedAt: Date;
  durationMs: number;
  mode: VerificationMode;
  whereCondition: string;
}

/** Outcome fields known once the comparison has started */
export interface OutcomeDraft {
  table: string;
  baseDatabase: string;
  targetDatabase: string;
  partition: string;
  mode: VerificationMode;
  whereCondition: string;
  startedAt: Date;
}

/** Fields decided when the comparison finishes */
export interface OutcomeResult {
  status: VerificationStatus;
  message: string;
  baseRowCount?: number;
  targetRowCount?: number;
  differencesFound?: number;
  sampleDifferences?: string[];
}

export function startOutcome(fields: Omit<OutcomeDraft, 'startedAt'>, now: Date = new Date()): OutcomeDraft {
  return { ...fields, startedAt: now };
}

/**
 * Stamp end time and duration onto a draft
 */
export function finalizeOutcome(
  draft: OutcomeDraft,
  result: OutcomeResult,
  now: Date = new Date()
): ComparisonOutcome {
  return {
    ...draft,
    status: result.status,
    message: result.message,
    baseRowCount: result.baseRowCount ?? 0,
    targetRowCount: result.targetRowCount ?? 0,
    differencesFound: result.status === 'ERROR' ? 0 : result.differencesFound ?? 0,
    sampleDifferences: result.sampleDifferences ?? [],
    endedAt: now,
    durationMs: Math.max(0, now.getTime() - draft.startedAt.getTime()),
  };
}
