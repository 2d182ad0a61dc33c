/**
 * MySQL Client
 *
 * Wrapper around mysql2/promise for the result store.
 * Uses mysql2 v3.11+ with native ESM and Promise support.
 */

import mysql from 'mysql2/promise';
import { VerificationError, errorMessage } from '@tableparity/core';

export interface MySQLClientConfig {
  /** Connection string (alternative to individual params) */
  uri?: string;
  /** Database host */
  host?: string;
  /** Database port */
  port?: number;
  /** Database name */
  database?: string;
  /** Username */
  user?: string;
  /** Password */
  password?: string;
  /** SSL configuration */
  ssl?: boolean | { rejectUnauthorized?: boolean };
  /** Connection pool size */
  connectionLimit?: number;
}

export type SqlValue = string | number | boolean | Date | null;

export type MySQLRow = Record<string, unknown>;

export class MySQLClient {
  private pool: mysql.Pool;

  constructor(config: MySQLClientConfig) {
    this.pool = mysql.createPool({
      uri: config.uri,
      host: config.host,
      port: config.port ?? 3306,
      database: config.database,
      user: config.user,
      password: config.password,
      ssl: config.ssl ? (typeof config.ssl === 'object' ? config.ssl : {}) : undefined,
      connectionLimit: config.connectionLimit ?? 10,
      waitForConnections: true,
    });
  }

  /**
   * Close all connections
   */
  async disconnect(): Promise<void> {
    await this.pool.end();
  }

  /**
   * Run a SELECT and return its rows
   */
  async query(sql: string, params: SqlValue[] = []): Promise<MySQLRow[]> {
    try {
      const [rows] = await this.pool.execute<mysql.RowDataPacket[]>(sql, params);
      return rows.map((row) => ({ ...row }));
    } catch (error) {
      throw new VerificationError({
        code: 'QUERY_FAILED',
        message: `Query failed: ${errorMessage(error)}`,
      });
    }
  }

  /**
   * Run an INSERT/UPDATE/DDL statement and return affected rows
   */
  async execute(sql: string, params: SqlValue[] = []): Promise<number> {
    try {
      const [result] = await this.pool.execute<mysql.ResultSetHeader>(sql, params);
      return result.affectedRows;
    } catch (error) {
      throw new VerificationError({
        code: 'PERSISTENCE_FAILED',
        message: `Statement failed: ${errorMessage(error)}`,
      });
    }
  }
}
