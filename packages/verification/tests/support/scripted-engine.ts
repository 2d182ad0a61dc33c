import {
  Logger,
  VerificationError,
  type ComparisonOutcome,
  type CorrelationIds,
  type EngineConnection,
  type EngineConnectionProvider,
  type EngineRow,
  type ResultSink,
} from '@tableparity/core';
import { NULL_PARTITION_VALUE, formatPartitionDescriptor } from '../../src/metadata/index.js';

export type QueryHandler = (sql: string, params?: unknown[]) => EngineRow[] | Promise<EngineRow[]>;

/**
 * In-process engine answering each statement through a handler.
 * Tracks checkouts so tests can assert on pool usage.
 */
export class ScriptedEngine implements EngineConnectionProvider {
  readonly queries: string[] = [];
  acquired = 0;
  released = 0;
  destroyed = 0;
  inUse = 0;
  peakInUse = 0;

  constructor(readonly handler: QueryHandler) {}

  /** Delay before each checkout resolves, as when the pool is saturated */
  checkoutDelayMs = 0;

  async acquire(): Promise<EngineConnection> {
    if (this.checkoutDelayMs > 0) await delay(this.checkoutDelayMs);
    this.acquired++;
    this.inUse++;
    this.peakInUse = Math.max(this.peakInUse, this.inUse);
    return new ScriptedConnection(this);
  }

  async close(): Promise<void> {}

  queriesMatching(fragment: string): string[] {
    return this.queries.filter((sql) => sql.includes(fragment));
  }
}

class ScriptedConnection implements EngineConnection {
  private done = false;
  private onDestroy?: () => void;

  constructor(private readonly engine: ScriptedEngine) {}

  query(sql: string, params?: unknown[]): Promise<EngineRow[]> {
    this.engine.queries.push(sql);
    return new Promise((resolve, reject) => {
      this.onDestroy = () =>
        reject(new VerificationError({ code: 'QUERY_FAILED', message: 'Connection terminated' }));
      Promise.resolve()
        .then(() => this.engine.handler(sql, params))
        .then(resolve, (error: unknown) =>
          reject(
            error instanceof VerificationError
              ? error
              : new VerificationError({
                  code: 'QUERY_FAILED',
                  message: `Query failed: ${error instanceof Error ? error.message : String(error)}`,
                })
          )
        );
    });
  }

  release(): void {
    if (this.done) return;
    this.done = true;
    this.engine.released++;
    this.engine.inUse--;
  }

  destroy(): void {
    if (this.done) return;
    this.done = true;
    this.engine.destroyed++;
    this.engine.inUse--;
    this.onDestroy?.();
  }
}

export class MemorySink implements ResultSink {
  readonly saved: { outcome: ComparisonOutcome; correlation: CorrelationIds }[] = [];
  failWith?: Error;

  async save(outcome: ComparisonOutcome, correlation: CorrelationIds): Promise<void> {
    if (this.failWith) throw this.failWith;
    this.saved.push({ outcome, correlation });
  }

  get outcomes(): ComparisonOutcome[] {
    return this.saved.map((entry) => entry.outcome);
  }
}

export interface TableScript {
  columns: string[];
  /** Declared partition keys; empty means not partitioned */
  partitionKeys?: string[];
  /** Rows returned by the partition enumeration query (k1, k2) */
  partitionRows?: EngineRow[];
  /** Descriptors returned by the partition listing (default: derived from partitionRows) */
  listing?: string[];
  counts?: (sql: string) => [number | string, number | string] | Promise<[number | string, number | string]>;
  fingerprintRows?: (sql: string) => EngineRow[];
  exceptRows?: (sql: string) => EngineRow[];
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Route the statements issued by the metadata service and strategies
 */
export function tableHandler(script: TableScript): QueryHandler {
  const keys = script.partitionKeys ?? [];
  const rows = script.partitionRows ?? [];
  const listing =
    script.listing ??
    rows.map((row) =>
      formatPartitionDescriptor(
        keys.slice(0, 2).map((key, i) => ({ key, value: String(row[`k${i + 1}`] ?? NULL_PARTITION_VALUE) }))
      )
    );

  return async (sql) => {
    if (sql.includes('pg_partitioned_table')) return keys.map((key) => ({ key_name: key }));
    if (sql.includes('information_schema.columns')) {
      return script.columns.map((name) => ({ column_name: name }));
    }
    if (sql.includes('AS base_count')) {
      const [base, target] = await (script.counts ?? (() => [0, 0]))(sql);
      return [{ base_count: base, target_count: target }];
    }
    if (sql.includes('FULL OUTER JOIN')) return script.fingerprintRows?.(sql) ?? [];
    if (sql.includes('EXCEPT')) return script.exceptRows?.(sql) ?? [];
    if (sql.includes("concat_ws('/'")) return listing.map((partition) => ({ partition }));
    if (sql.startsWith('SELECT DISTINCT')) return rows;
    throw new Error(`Unexpected statement: ${sql}`);
  };
}

export function silentLogger(): Logger {
  return new Logger({ level: 'error', write: () => {} });
}
