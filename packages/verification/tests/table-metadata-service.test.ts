import { describe, expect, it } from 'vitest';
import { Logger, type TableMetadata } from '@tableparity/core';
import { TableMetadataService } from '../src/metadata/table-metadata-service.js';
import { ScriptedEngine, silentLogger, tableHandler } from './support/scripted-engine.js';

describe('TableMetadataService', () => {
  it('resolves columns minus case-insensitive exclusions and partition keys', async () => {
    const engine = new ScriptedEngine(
      tableHandler({
        columns: ['id', 'Name', 'updated_at'],
        partitionKeys: ['year', 'month'],
        listing: ['year=2025/month=01', 'year=2025/month=02'],
      })
    );
    const service = new TableMetadataService(silentLogger());
    const conn = await engine.acquire();

    const metadata = await service.analyzeTable(conn, 'legacy', 'orders', [' UPDATED_AT ']);

    expect(metadata).toEqual({
      database: 'legacy',
      table: 'orders',
      partitioned: true,
      columns: ['id', 'Name'],
      partitionKeys: ['year', 'month'],
    });
    expect(Object.isFrozen(metadata)).toBe(true);
    expect(Object.isFrozen(metadata.columns)).toBe(true);
  });

  it('reports a table without declared keys as not partitioned', async () => {
    const engine = new ScriptedEngine(tableHandler({ columns: ['id'] }));
    const service = new TableMetadataService(silentLogger());
    const conn = await engine.acquire();

    await expect(service.isPartitioned(conn, 'legacy', 'orders')).resolves.toBe(false);
    expect(engine.queriesMatching("concat_ws('/'")).toHaveLength(0);
  });

  it('treats a partitioned table without rows as not partitioned', async () => {
    const engine = new ScriptedEngine(
      tableHandler({ columns: ['id'], partitionKeys: ['year'], listing: [] })
    );
    const service = new TableMetadataService(silentLogger());
    const conn = await engine.acquire();

    await expect(service.isPartitioned(conn, 'legacy', 'orders')).resolves.toBe(false);
  });

  it('lists partitions with a null-safe canonical descriptor', async () => {
    const engine = new ScriptedEngine(
      tableHandler({ columns: ['id'], partitionKeys: ['year', 'month'], listing: ['year=2025/month=01'] })
    );
    const service = new TableMetadataService(silentLogger());
    const conn = await engine.acquire();

    await expect(service.listPartitions(conn, 'legacy', 'orders', 1)).resolves.toEqual([
      'year=2025/month=01',
    ]);
    expect(engine.queriesMatching("concat_ws('/'")).toEqual([
      "SELECT DISTINCT concat_ws('/', " +
        "'year=' || replace(replace(replace(COALESCE(\"year\"::text, '__NULL__'), '%', '%25'), '/', '%2F'), '=', '%3D'), " +
        "'month=' || replace(replace(replace(COALESCE(\"month\"::text, '__NULL__'), '%', '%25'), '/', '%2F'), '=', '%3D')) " +
        'AS partition FROM "legacy"."orders" ORDER BY 1 LIMIT 1',
    ]);
  });

  it('raises NOT_PARTITIONED from the listing of a plain table', async () => {
    const engine = new ScriptedEngine(tableHandler({ columns: ['id'] }));
    const service = new TableMetadataService(silentLogger());
    const conn = await engine.acquire();

    await expect(service.listPartitions(conn, 'legacy', 'orders')).rejects.toMatchObject({
      code: 'NOT_PARTITIONED',
    });
  });

  it('fails with TABLE_NOT_FOUND when the catalog has no columns', async () => {
    const engine = new ScriptedEngine(tableHandler({ columns: [] }));
    const service = new TableMetadataService(silentLogger());
    const conn = await engine.acquire();

    await expect(service.analyzeTable(conn, 'legacy', 'missing')).rejects.toMatchObject({
      code: 'TABLE_NOT_FOUND',
    });
  });

  it('fails with CONFIGURATION_ERROR when every column is excluded', async () => {
    const engine = new ScriptedEngine(tableHandler({ columns: ['id', 'name'] }));
    const service = new TableMetadataService(silentLogger());
    const conn = await engine.acquire();

    await expect(
      service.analyzeTable(conn, 'legacy', 'orders', ['ID', 'name'])
    ).rejects.toMatchObject({ code: 'CONFIGURATION_ERROR', message: 'No columns to compare after exclusions' });
  });

  it('enumerates at most two key levels and warns about the rest', async () => {
    const lines: string[] = [];
    const logger = new Logger({ level: 'warn', write: (line) => lines.push(line) });
    const engine = new ScriptedEngine(
      tableHandler({
        columns: ['id'],
        partitionKeys: ['year', 'month', 'day'],
        partitionRows: [
          { k1: '2025', k2: '01' },
          { k1: '2025', k2: null },
        ],
      })
    );
    const service = new TableMetadataService(logger);
    const conn = await engine.acquire();
    const metadata: TableMetadata = {
      database: 'legacy',
      table: 'orders',
      partitioned: true,
      columns: ['id'],
      partitionKeys: ['year', 'month', 'day'],
    };

    const partitions = await service.getPartitions(conn, metadata, "region='eu'");

    expect(partitions).toEqual(['year=2025/month=01', 'year=2025/month=__NULL__']);
    expect(engine.queries).toEqual([
      'SELECT DISTINCT "year"::text AS k1, "month"::text AS k2 FROM "legacy"."orders" ' +
        "WHERE region='eu' ORDER BY 1, 2",
    ]);
    expect(lines).toHaveLength(1);
    expect(lines[0]).toContain('Ignoring partition levels beyond 2: day');
  });

  it('escapes delimiter characters in enumerated values', async () => {
    const engine = new ScriptedEngine(
      tableHandler({ columns: ['id'], partitionKeys: ['region'], partitionRows: [{ k1: 'EU/West' }] })
    );
    const service = new TableMetadataService(silentLogger());
    const conn = await engine.acquire();
    const metadata = await service.analyzeTable(conn, 'legacy', 'orders');

    await expect(service.getPartitions(conn, metadata, '1=1')).resolves.toEqual(['region=EU%2FWest']);
  });

  it('enumerates single-level partitions', async () => {
    const engine = new ScriptedEngine(
      tableHandler({ columns: ['id'], partitionKeys: ['dt'], partitionRows: [{ k1: '20250101' }] })
    );
    const service = new TableMetadataService(silentLogger());
    const conn = await engine.acquire();
    const metadata = await service.analyzeTable(conn, 'legacy', 'events');

    await expect(service.getPartitions(conn, metadata, '1=1')).resolves.toEqual(['dt=20250101']);
  });
});
