/**
 * SQLite Run Catalog
 *
 * sqlite3 implementation of RunCatalogPort. Table layout:
 *   (id INTEGER, run_name TEXT, template_directory TEXT, runs_directory TEXT,
 *    job_id INTEGER, status TEXT)
 */

import sqlite3 from 'sqlite3';
import type { Database } from 'sqlite3';
import { existsSync } from 'fs';
import { mkdir, rm } from 'fs/promises';
import { dirname } from 'path';
import { z } from 'zod';
import type { CatalogRow, DatabaseConfig } from '@stellar-grid/core';
import { TABLE_NAME_PATTERN } from '@stellar-grid/core';
import { CatalogError, createLogger, errorMessage } from '@stellar-grid/utils';
import type { CatalogRowFilter, RunCatalogPort } from '../ports/RunCatalogPort.js';

const logger = createLogger('@stellar-grid/storage');

const CatalogRecordSchema = z.object({
  id: z.number().int(),
  run_name: z.string(),
  template_directory: z.string(),
  runs_directory: z.string(),
  job_id: z.number().int(),
  status: z.string(),
});

export interface SqliteRunCatalogOptions {
  /** Open without creating the file; reset() and insertRows() then fail */
  readOnly?: boolean;
}

function openDatabase(filename: string, mode: number): Promise<Database> {
  return new Promise((resolve, reject) => {
    const db = new sqlite3.Database(filename, mode, (err: Error | null) => {
      if (err) {
        reject(err);
        return;
      }
      resolve(db);
    });
  });
}

function run(db: Database, sql: string, params: ReadonlyArray<string | number> = []): Promise<void> {
  return new Promise((resolve, reject) => {
    db.run(sql, [...params], (err: Error | null) => {
      if (err) {
        reject(err);
        return;
      }
      resolve();
    });
  });
}

function all(db: Database, sql: string, params: ReadonlyArray<string | number> = []): Promise<unknown[]> {
  return new Promise((resolve, reject) => {
    db.all<unknown>(sql, [...params], (err: Error | null, rows: unknown[]) => {
      if (err) {
        reject(err);
        return;
      }
      resolve(rows);
    });
  });
}

function closeDatabase(db: Database): Promise<void> {
  return new Promise((resolve, reject) => {
    db.close((err: Error | null) => {
      if (err) {
        reject(err);
        return;
      }
      resolve();
    });
  });
}

export class SqliteRunCatalog implements RunCatalogPort {
  private db: Database | null = null;
  private readonly tableName: string;

  constructor(
    private readonly config: DatabaseConfig,
    private readonly options: SqliteRunCatalogOptions = {}
  ) {
    // the name is interpolated into SQL, so it must be a bare identifier
    if (!TABLE_NAME_PATTERN.test(config.tableName)) {
      throw new CatalogError(`Invalid catalog table name: ${config.tableName}`, 'configure', {
        tableName: config.tableName,
      });
    }
    this.tableName = config.tableName;
  }

  private async connection(): Promise<Database> {
    if (this.db) {
      return this.db;
    }
    const filename = this.config.filename;
    if (this.options.readOnly) {
      if (!existsSync(filename)) {
        throw new CatalogError(`Catalog database not found: ${filename}`, 'open', { filename });
      }
      this.db = await this.guard('open', () => openDatabase(filename, sqlite3.OPEN_READONLY));
    } else {
      this.db = await this.guard('open', async () => {
        await mkdir(dirname(filename), { recursive: true });
        return openDatabase(filename, sqlite3.OPEN_READWRITE | sqlite3.OPEN_CREATE);
      });
    }
    logger.debug('Opened run catalog', { filename, readOnly: this.options.readOnly === true });
    return this.db;
  }

  private async guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof CatalogError) {
        throw error;
      }
      throw new CatalogError(`Catalog ${operation} failed: ${errorMessage(error)}`, operation, {
        filename: this.config.filename,
        tableName: this.tableName,
      });
    }
  }

  async reset(): Promise<void> {
    if (this.config.removeDatabase) {
      await this.close();
      await this.guard('remove', () => rm(this.config.filename, { force: true }));
      logger.info('Removed catalog database', { filename: this.config.filename });
    }

    const db = await this.connection();
    await this.guard('reset', async () => {
      if (this.config.dropTable) {
        await run(db, `DROP TABLE IF EXISTS ${this.tableName}`);
      }
      await run(
        db,
        `CREATE TABLE IF NOT EXISTS ${this.tableName} (
          id INTEGER,
          run_name TEXT,
          template_directory TEXT,
          runs_directory TEXT,
          job_id INTEGER,
          status TEXT
        )`
      );
    });
  }

  async insertRows(rows: readonly CatalogRow[]): Promise<void> {
    if (rows.length === 0) {
      return;
    }
    const db = await this.connection();

    await this.guard('insert', async () => {
      await run(db, 'BEGIN TRANSACTION');
      try {
        for (const row of rows) {
          await run(
            db,
            `INSERT INTO ${this.tableName}
              (id, run_name, template_directory, runs_directory, job_id, status)
              VALUES (?, ?, ?, ?, ?, ?)`,
            [row.id, row.runName, row.templateDirectory, row.runsDirectory, row.jobId, row.status]
          );
        }
        await run(db, 'COMMIT');
      } catch (error) {
        await run(db, 'ROLLBACK').catch((rollbackError: unknown) => {
          logger.warn('Rollback after failed insert also failed', {
            error: errorMessage(rollbackError),
          });
        });
        throw error;
      }
    });

    logger.debug('Inserted catalog rows', { count: rows.length, firstId: rows[0]?.id });
  }

  async listRows(filter: CatalogRowFilter = {}): Promise<CatalogRow[]> {
    const db = await this.connection();
    const clauses: string[] = [];
    const params: Array<string | number> = [];
    if (filter.jobId !== undefined) {
      clauses.push('job_id = ?');
      params.push(filter.jobId);
    }
    if (filter.status !== undefined) {
      clauses.push('status = ?');
      params.push(filter.status);
    }
    const where = clauses.length > 0 ? ` WHERE ${clauses.join(' AND ')}` : '';

    const records = await this.guard('list', () =>
      all(
        db,
        `SELECT id, run_name, template_directory, runs_directory, job_id, status
         FROM ${this.tableName}${where} ORDER BY id`,
        params
      )
    );

    return records.map((record) => {
      const parsed = CatalogRecordSchema.safeParse(record);
      if (!parsed.success) {
        throw new CatalogError('Catalog row has an unexpected shape', 'list', {
          record,
          issues: parsed.error.issues,
        });
      }
      return {
        id: parsed.data.id,
        runName: parsed.data.run_name,
        templateDirectory: parsed.data.template_directory,
        runsDirectory: parsed.data.runs_directory,
        jobId: parsed.data.job_id,
        status: parsed.data.status,
      };
    });
  }

  async close(): Promise<void> {
    const db = this.db;
    if (!db) {
      return;
    }
    this.db = null;
    await this.guard('close', () => closeDatabase(db));
  }
}
