/**
 * Type exports for core
 */

export type {
  VerificationMode,
  VerificationStatus,
  CorrelationIds,
  ComparisonOutcome,
  OutcomeDraft,
  OutcomeResult,
} from './outcome.js';
export { NO_PARTITION, startOutcome, finalizeOutcome } from './outcome.js';

export type { TableMetadata, VerificationRequest, ComparisonRequest } from './table.js';

export type { MetricsSnapshot, StatusSummary, DifferenceSummary } from './metrics.js';
