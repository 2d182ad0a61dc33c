export { runBatch, DETAILED_MIGRATION_SUFFIX } from './batch-runner.js';
export type {
  BatchOptions,
  BatchSummary,
  BatchTableResult,
  TableVerdict,
  TableVerifier,
} from './batch-runner.js';
