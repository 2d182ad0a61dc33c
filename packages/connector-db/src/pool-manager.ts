/**
 * Pool Manager
 *
 * Owns the engine pool and the result-store pool for the lifetime of one
 * run. Created at start-up and closed once verification is finished.
 */

import { errorMessage, type Logger } from '@tableparity/core';
import { PostgresEngineClient, type PostgresEngineConfig } from './postgresql/client.js';
import { MySQLClient, type MySQLClientConfig } from './mysql/client.js';
import { MySQLResultSink } from './mysql/result-repository.js';

export interface PoolManagerConfig {
  engine: PostgresEngineConfig;
  resultStore: MySQLClientConfig & { table?: string };
}

export class PoolManager {
  readonly engine: PostgresEngineClient;
  readonly resultStore: MySQLClient;
  readonly sink: MySQLResultSink;
  private closed = false;

  constructor(config: PoolManagerConfig, private readonly logger?: Logger) {
    this.engine = new PostgresEngineClient(config.engine, logger);
    this.resultStore = new MySQLClient(config.resultStore);
    this.sink = new MySQLResultSink(this.resultStore, {
      table: config.resultStore.table,
      logger,
    });
    logger?.debug('Connection pools created', {
      engineMax: config.engine.max ?? 10,
      resultStoreLimit: config.resultStore.connectionLimit ?? 10,
    });
  }

  /**
   * Close both pools. Later calls are no-ops.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    const results = await Promise.allSettled([this.engine.close(), this.resultStore.disconnect()]);
    for (const result of results) {
      if (result.status === 'rejected') {
        this.logger?.warn('Failed to close connection pool', { error: errorMessage(result.reason) });
      }
    }
    this.logger?.debug('Connection pools closed');
  }
}
