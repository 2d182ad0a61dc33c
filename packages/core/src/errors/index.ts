/**
 * Error exports for core
 */

export {
  VerificationError,
  RetryExhaustedError,
  isVerificationError,
  wrapError,
  cancelledError,
  errorMessage,
} from './verification-error.js';
export type { ErrorCode, VerificationErrorDetails } from './verification-error.js';
