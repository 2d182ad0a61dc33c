/**
 * Interface exports for core
 */

export type { EngineRow, EngineConnection, EngineConnectionProvider } from './engine.js';
export type { ResultSink } from './result-sink.js';
