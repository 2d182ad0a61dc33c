/**
 * @tableparity/connector-db
 *
 * PostgreSQL engine pool and MySQL result store
 */

export * from './postgresql/index.js';
export * from './mysql/index.js';
export { PoolManager } from './pool-manager.js';
export type { PoolManagerConfig } from './pool-manager.js';
