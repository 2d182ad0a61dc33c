export {
  withRetries,
  sleep,
  isRetryableError,
  computeBackoffDelayMs,
} from './retry.js';
export type { RetryConfig, RetryContext, RetryOptions, SleepFn } from './retry.js';
export { Semaphore } from './semaphore.js';
export { withTimeout, settlesWithin } from './timeout.js';
export {
  VALID_IDENTIFIER,
  validateIdentifier,
  quoteIdent,
  qualifiedTable,
  quoteLiteral,
} from './sql.js';
export {
  MAX_STORED_SAMPLE_ROWS,
  RESULT_RECORD_COLUMNS,
  formatSampleText,
  toResultRecord,
} from './result-record.js';
export type { ResultRecord } from './result-record.js';
