/**
 * TableMetadataService
 *
 * Resolves compared columns, partition keys and partition descriptors from
 * the engine catalog.
 */

import {
  VerificationError,
  isVerificationError,
  qualifiedTable,
  quoteIdent,
  quoteLiteral,
  validateIdentifier,
  type EngineConnection,
  type Logger,
  type TableMetadata,
} from '@tableparity/core';
import {
  NULL_PARTITION_VALUE,
  formatPartitionDescriptor,
  parsePartitionDescriptor,
} from './partition-filter.js';

/** Partition levels used when enumerating partitions */
const MAX_PARTITION_LEVELS = 2;

/** Descriptor value of `column` in SQL, escaped the way formatPartitionDescriptor escapes it */
function descriptorValue(column: string): string {
  const text = `COALESCE(${quoteIdent(column)}::text, '${NULL_PARTITION_VALUE}')`;
  return `replace(replace(replace(${text}, '%', '%25'), '/', '%2F'), '=', '%3D')`;
}

function toText(value: unknown): string {
  return value === null || value === undefined ? NULL_PARTITION_VALUE : String(value);
}

export class TableMetadataService {
  constructor(private readonly logger?: Logger) {}

  /**
   * Resolve compared columns and partitioning of `database.table`
   */
  async analyzeTable(
    conn: EngineConnection,
    database: string,
    table: string,
    excludeColumns: readonly string[] = []
  ): Promise<TableMetadata> {
    this.logger?.info(`Analyzing table: ${database}.${table}`);

    const columns = await this.getColumns(conn, database, table, excludeColumns);
    this.logger?.info(`Found ${columns.length} columns to compare`);

    const partitioned = await this.isPartitioned(conn, database, table);
    this.logger?.info(`Table is ${partitioned ? '' : 'not '}partitioned`);

    const partitionKeys = partitioned ? await this.getPartitionKeys(conn, database, table) : [];
    if (partitioned) {
      this.logger?.info(`Partition keys: ${partitionKeys.join(', ')}`);
    }

    return Object.freeze({
      database,
      table,
      partitioned,
      columns: Object.freeze([...columns]),
      partitionKeys: Object.freeze([...partitionKeys]),
    });
  }

  /**
   * Declared partition key columns, in level order.
   * @throws VerificationError NOT_PARTITIONED when the table declares none
   */
  private async getDeclaredPartitionKeys(
    conn: EngineConnection,
    database: string,
    table: string
  ): Promise<string[]> {
    const rows = await conn.query(
      `SELECT a.attname AS key_name
       FROM pg_catalog.pg_partitioned_table pt
       JOIN pg_catalog.pg_class c ON c.oid = pt.partrelid
       JOIN pg_catalog.pg_namespace n ON n.oid = c.relnamespace
       CROSS JOIN LATERAL unnest(pt.partattrs::int2[]) WITH ORDINALITY AS k(attnum, position)
       JOIN pg_catalog.pg_attribute a ON a.attrelid = c.oid AND a.attnum = k.attnum
       WHERE n.nspname = $1 AND c.relname = $2
       ORDER BY k.position`,
      [database, table]
    );

    const keys = rows.map((row) => String(row.key_name));
    if (keys.length === 0) {
      throw new VerificationError({
        code: 'NOT_PARTITIONED',
        message: `Table ${database}.${table} is not partitioned`,
      });
    }
    return keys;
  }

  /**
   * Distinct populated partitions as canonical descriptors, ordered
   */
  async listPartitions(
    conn: EngineConnection,
    database: string,
    table: string,
    limit?: number
  ): Promise<string[]> {
    const source = qualifiedTable(database, table);
    const keys = await this.getDeclaredPartitionKeys(conn, database, table);

    const parts = keys.map((key) => `${quoteLiteral(`${key}=`)} || ${descriptorValue(key)}`);
    let sql = `SELECT DISTINCT concat_ws('/', ${parts.join(', ')}) AS partition FROM ${source} ORDER BY 1`;
    if (limit !== undefined) {
      sql += ` LIMIT ${Math.max(1, Math.floor(limit))}`;
    }

    const rows = await conn.query(sql);
    return rows.map((row) => String(row.partition));
  }

  async isPartitioned(conn: EngineConnection, database: string, table: string): Promise<boolean> {
    try {
      const partitions = await this.listPartitions(conn, database, table, 1);
      return partitions.length > 0;
    } catch (error) {
      if (isVerificationError(error, 'NOT_PARTITIONED')) {
        this.logger?.debug(`Table is not partitioned: ${error.message}`);
        return false;
      }
      throw error;
    }
  }

  /**
   * Key names parsed from the first listed partition
   */
  async getPartitionKeys(conn: EngineConnection, database: string, table: string): Promise<string[]> {
    const [first] = await this.listPartitions(conn, database, table, 1);
    if (first === undefined) return [];
    return parsePartitionDescriptor(first).map((segment) => segment.key);
  }

  /**
   * Partitions holding rows that match `filter`. Only the first two key
   * levels are enumerated.
   */
  async getPartitions(
    conn: EngineConnection,
    metadata: TableMetadata,
    filter: string
  ): Promise<string[]> {
    const keys = metadata.partitionKeys.slice(0, MAX_PARTITION_LEVELS);
    if (keys.length === 0) return [];

    if (metadata.partitionKeys.length > MAX_PARTITION_LEVELS) {
      this.logger?.warn(
        `Ignoring partition levels beyond ${MAX_PARTITION_LEVELS}: ${metadata.partitionKeys
          .slice(MAX_PARTITION_LEVELS)
          .join(', ')}`
      );
    }
    for (const key of keys) {
      validateIdentifier(key, 'partition key');
    }

    const source = qualifiedTable(metadata.database, metadata.table);
    const projection = keys.map((key, i) => `${quoteIdent(key)}::text AS k${i + 1}`).join(', ');
    const order = keys.map((_key, i) => String(i + 1)).join(', ');
    const sql = `SELECT DISTINCT ${projection} FROM ${source} WHERE ${filter} ORDER BY ${order}`;
    this.logger?.debug(`Fetching ${keys.length}-depth partitions: ${sql}`);

    const rows = await conn.query(sql);
    const partitions = rows.map((row) =>
      formatPartitionDescriptor(keys.map((key, i) => ({ key, value: toText(row[`k${i + 1}`]) })))
    );

    this.logger?.info(`Found ${partitions.length} partitions for ${metadata.database}.${metadata.table}`);
    return partitions;
  }

  /**
   * Ordered column names minus exclusions (case-insensitive, trimmed)
   */
  private async getColumns(
    conn: EngineConnection,
    database: string,
    table: string,
    excludeColumns: readonly string[]
  ): Promise<string[]> {
    validateIdentifier(database, 'database');
    validateIdentifier(table, 'table');

    const rows = await conn.query(
      `SELECT column_name
       FROM information_schema.columns
       WHERE table_schema = $1 AND table_name = $2
       ORDER BY ordinal_position`,
      [database, table]
    );
    const all = rows.map((row) => String(row.column_name));
    if (all.length === 0) {
      throw new VerificationError({
        code: 'TABLE_NOT_FOUND',
        message: `Table ${database}.${table} not found or has no columns`,
        suggestion: 'Check the database and table names.',
      });
    }

    const excluded = new Set(excludeColumns.map((c) => c.trim().toLowerCase()).filter(Boolean));
    const columns = all.filter((col) => {
      const skip = excluded.has(col.trim().toLowerCase());
      if (skip) this.logger?.debug(`Excluding column: ${col}`);
      return !skip;
    });

    if (columns.length === 0) {
      throw new VerificationError({
        code: 'CONFIGURATION_ERROR',
        message: 'No columns to compare after exclusions',
        suggestion: 'Exclude fewer columns.',
      });
    }
    return columns;
  }
}
