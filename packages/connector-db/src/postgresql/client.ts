/**
 * PostgreSQL Engine Client
 *
 * Pooled access to the SQL engine holding both the base and the target
 * datasets. Each checkout is handed out as an EngineConnection owned by a
 * single task.
 */

import pg from 'pg';
import {
  VerificationError,
  errorMessage,
  type EngineConnection,
  type EngineConnectionProvider,
  type EngineRow,
  type Logger,
} from '@tableparity/core';

const { Pool } = pg;

export interface PostgresEngineConfig {
  /** Connection string or individual params */
  connectionString?: string;
  host?: string;
  port?: number;
  database?: string;
  user?: string;
  password?: string;
  /** SSL mode */
  ssl?: boolean | { rejectUnauthorized?: boolean };
  /** Connection pool size */
  max?: number;
  /** Server-side statement timeout applied to every session */
  statementTimeoutMs?: number;
  /** How long a checkout may wait for a new connection */
  connectionTimeoutMs?: number;
}

class PooledEngineConnection implements EngineConnection {
  private done = false;

  constructor(private readonly client: pg.PoolClient) {}

  async query(sql: string, params?: unknown[]): Promise<EngineRow[]> {
    if (this.done) {
      throw new VerificationError({
        code: 'QUERY_FAILED',
        message: 'Query issued on a released connection',
      });
    }

    try {
      const result = await this.client.query(sql, params);
      return result.rows;
    } catch (error) {
      throw new VerificationError({
        code: 'QUERY_FAILED',
        message: `Query failed: ${errorMessage(error)}`,
        cause: error instanceof Error ? error : undefined,
      });
    }
  }

  release(): void {
    if (this.done) return;
    this.done = true;
    this.client.release();
  }

  destroy(): void {
    if (this.done) return;
    this.done = true;
    // Passing true makes the pool end the socket instead of reusing it
    this.client.release(true);
  }
}

export class PostgresEngineClient implements EngineConnectionProvider {
  private pool: pg.Pool;

  constructor(
    config: PostgresEngineConfig,
    private readonly logger?: Logger
  ) {
    this.pool = new Pool({
      connectionString: config.connectionString,
      host: config.host,
      port: config.port ?? 5432,
      database: config.database,
      user: config.user,
      password: config.password,
      ssl: config.ssl,
      max: config.max ?? 10,
      statement_timeout: config.statementTimeoutMs,
      connectionTimeoutMillis: config.connectionTimeoutMs,
      application_name: 'tableparity',
    });

    // Idle clients can fail when the server restarts; the pool discards them
    this.pool.on('error', (error) => {
      this.logger?.warn('Idle engine connection failed', { error: error.message });
    });
  }

  async acquire(): Promise<EngineConnection> {
    try {
      const client = await this.pool.connect();
      return new PooledEngineConnection(client);
    } catch (error) {
      throw new VerificationError({
        code: 'CONNECTION_FAILED',
        message: `Engine connection failed: ${errorMessage(error)}`,
        suggestion: 'Check host, port, database, user, and password.',
        cause: error instanceof Error ? error : undefined,
      });
    }
  }

  /**
   * Close all connections
   */
  async close(): Promise<void> {
    await this.pool.end();
  }
}
