/**
 * Run Catalog Port
 *
 * Persistent table with one row per materialized run. Rows are appended by a
 * build and never updated by it; status transitions belong to whatever
 * monitors the runs afterwards.
 */

import type { CatalogRow } from '@stellar-grid/core';

export interface CatalogRowFilter {
  jobId?: number;
  status?: string;
}

export interface RunCatalogPort {
  /**
   * Prepare the table for a new build. Honors remove_database and drop_table,
   * then creates the table if it does not exist. Safe to call repeatedly.
   */
  reset(): Promise<void>;

  /**
   * Append rows. All rows of one call are written or none are.
   */
  insertRows(rows: readonly CatalogRow[]): Promise<void>;

  /**
   * Rows ordered by id.
   */
  listRows(filter?: CatalogRowFilter): Promise<CatalogRow[]>;

  /**
   * Release the connection. Calling it twice is a no-op.
   */
  close(): Promise<void>;
}
