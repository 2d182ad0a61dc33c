/**
 * MySQL result store
 */

export { MySQLClient } from './client.js';
export type { MySQLClientConfig, MySQLRow, SqlValue } from './client.js';

export { MySQLResultSink, DEFAULT_RESULT_TABLE } from './result-repository.js';
