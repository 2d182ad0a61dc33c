/**
 * Result Sink Interface
 *
 * Durable store receiving one record per comparison outcome.
 */

import type { ComparisonOutcome, CorrelationIds } from '../types/index.js';

export interface ResultSink {
  /**
   * Persist one outcome
   * @throws VerificationError with code PERSISTENCE_FAILED
   */
  save(outcome: ComparisonOutcome, correlation: CorrelationIds): Promise<void>;
}
