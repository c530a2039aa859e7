/**
 * SqliteRunCatalog integration tests
 *
 * Runs against a real sqlite file in a temporary directory.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { existsSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import type { CatalogRow, DatabaseConfig } from '@stellar-grid/core';
import { CatalogError } from '@stellar-grid/utils';
import { SqliteRunCatalog } from '../../src/catalog/sqlite-run-catalog.js';

function row(id: number, jobId: number): CatalogRow {
  return {
    id,
    runName: `m1_${id}`,
    templateDirectory: '/grid/template',
    runsDirectory: `/grid/runs/m1_${id}`,
    jobId,
    status: 'not computed',
  };
}

describe('SqliteRunCatalog', () => {
  let dir: string;
  let config: DatabaseConfig;
  let catalog: SqliteRunCatalog;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'stellar-grid-catalog-'));
    config = {
      filename: join(dir, 'db', 'grid.db'),
      tableName: 'runs',
      removeDatabase: false,
      dropTable: true,
    };
    catalog = new SqliteRunCatalog(config);
  });

  afterEach(async () => {
    await catalog.close();
    await rm(dir, { recursive: true, force: true });
  });

  it('should create the table and round-trip rows in id order', async () => {
    await catalog.reset();
    await catalog.insertRows([row(1, 0), row(0, 0), row(2, 1)]);

    const rows = await catalog.listRows();

    expect(rows.map((r) => r.id)).toEqual([0, 1, 2]);
    expect(rows[2]).toEqual(row(2, 1));
    expect(existsSync(config.filename)).toBe(true);
  });

  it('should filter by job and status', async () => {
    await catalog.reset();
    await catalog.insertRows([row(0, 0), row(1, 1), row(2, 1)]);

    expect((await catalog.listRows({ jobId: 1 })).map((r) => r.id)).toEqual([1, 2]);
    expect(await catalog.listRows({ status: 'done' })).toEqual([]);
  });

  it('should drop existing rows on reset when drop_table is set', async () => {
    await catalog.reset();
    await catalog.insertRows([row(0, 0)]);

    await catalog.reset();

    expect(await catalog.listRows()).toEqual([]);
  });

  it('should keep rows when drop_table is not set', async () => {
    await catalog.reset();
    await catalog.insertRows([row(0, 0)]);
    await catalog.close();

    catalog = new SqliteRunCatalog({ ...config, dropTable: false });
    await catalog.reset();
    await catalog.reset();

    expect(await catalog.listRows()).toHaveLength(1);
  });

  it('should delete the database file when remove_database is set', async () => {
    await catalog.reset();
    await catalog.insertRows([row(0, 0)]);
    await catalog.close();

    catalog = new SqliteRunCatalog({ ...config, removeDatabase: true, dropTable: false });
    await catalog.reset();

    expect(await catalog.listRows()).toEqual([]);
  });

  it('should reject table names that are not identifiers', () => {
    expect(() => new SqliteRunCatalog({ ...config, tableName: 'runs; DROP TABLE x' })).toThrow(
      CatalogError
    );
  });

  it('should report a missing database in read-only mode', async () => {
    const reader = new SqliteRunCatalog(
      { ...config, filename: join(dir, 'missing.db') },
      { readOnly: true }
    );

    await expect(reader.listRows()).rejects.toThrow('Catalog database not found');
  });

  it('should wrap driver faults in CatalogError', async () => {
    const notADatabase = join(dir, 'plain.txt');
    await writeFile(notADatabase, 'this is not a sqlite file, just text padding it out to a page');
    const broken = new SqliteRunCatalog({ ...config, filename: notADatabase });

    await expect(broken.reset()).rejects.toBeInstanceOf(CatalogError);
    await broken.close();
  });

  it('should wrap a failure to create the database directory in CatalogError', async () => {
    const blocker = join(dir, 'blocker');
    await writeFile(blocker, 'a file where the directory should be');
    const blocked = new SqliteRunCatalog({ ...config, filename: join(blocker, 'grid.db') });

    const failure = blocked.reset();

    await expect(failure).rejects.toBeInstanceOf(CatalogError);
    await expect(failure).rejects.toThrow(/^Catalog open failed: /);
    await blocked.close();
  });

  it('should make close idempotent', async () => {
    await catalog.reset();
    await catalog.close();
    await expect(catalog.close()).resolves.toBeUndefined();
  });
});
