export { Logger, createRunId, redactSecrets } from './logger.js';
export type { LogLevel, LogFormat, LoggerOptions } from './logger.js';
