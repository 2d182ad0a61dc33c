/**
 * @tableparity/verification
 *
 * Partition discovery, comparison strategies and the verification orchestrator
 */

export * from './metadata/index.js';
export * from './strategies/index.js';
export * from './metrics/index.js';
export * from './orchestrator/index.js';
export * from './batch/index.js';
