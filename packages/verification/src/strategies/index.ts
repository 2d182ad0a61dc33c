import type {
  ComparisonOutcome,
  ComparisonRequest,
  EngineConnection,
  Logger,
  VerificationMode,
} from '@tableparity/core';
import { verifyDetailed } from './detailed.js';
import { verifyFast } from './fast.js';

export type ComparisonStrategy = (
  conn: EngineConnection,
  request: ComparisonRequest,
  logger?: Logger
) => Promise<ComparisonOutcome>;

export function strategyFor(mode: VerificationMode): ComparisonStrategy {
  switch (mode) {
    case 'FAST':
      return verifyFast;
    case 'DETAILED':
      return verifyDetailed;
    default: {
      const exhaustive: never = mode;
      throw new Error(`Unsupported verification mode: ${String(exhaustive)}`);
    }
  }
}

export function runComparison(
  mode: VerificationMode,
  conn: EngineConnection,
  request: ComparisonRequest,
  logger?: Logger
): Promise<ComparisonOutcome> {
  return strategyFor(mode)(conn, request, logger);
}

export { verifyFast, buildFingerprintDiffSql } from './fast.js';
export { verifyDetailed, buildExceptSql } from './detailed.js';
export { runCountCheck } from './count-check.js';
export type { CountCheck } from './count-check.js';
export { formatRow, formatValue, NULL_MARKER, BLOB_MARKER } from './row-format.js';
