/**
 * PostgreSQL engine access
 */

export { PostgresEngineClient } from './client.js';
export type { PostgresEngineConfig } from './client.js';
