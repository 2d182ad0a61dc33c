/**
 * Query Engine Interface
 *
 * The source and target datasets live on one SQL engine and differ only by
 * schema qualifier. The orchestrator and strategies only see these
 * interfaces; the pg-backed implementation lives in connector-db.
 */

/** A row as returned by the engine, keyed by column label */
export type EngineRow = Record<string, unknown>;

/**
 * One checked-out connection. Never shared between concurrent tasks.
 */
export interface EngineConnection {
  /**
   * Execute a statement and return its rows
   * @throws VerificationError with code QUERY_FAILED
   */
  query(sql: string, params?: unknown[]): Promise<EngineRow[]>;

  /** Return the connection to the pool. Safe to call more than once. */
  release(): void;

  /**
   * Tear the connection down, interrupting any statement in flight.
   * The connection is not returned to the pool.
   */
  destroy(): void;
}

/**
 * Pooled access to the engine
 */
export interface EngineConnectionProvider {
  /**
   * Check out a connection, waiting if the pool is saturated
   * @throws VerificationError with code CONNECTION_FAILED
   */
  acquire(): Promise<EngineConnection>;

  /** Close every pooled connection */
  close(): Promise<void>;
}
