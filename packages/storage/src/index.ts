/**
 * @stellar-grid/storage - run catalog
 */

export type { RunCatalogPort, CatalogRowFilter } from './ports/RunCatalogPort.js';
export { SqliteRunCatalog } from './catalog/sqlite-run-catalog.js';
export type { SqliteRunCatalogOptions } from './catalog/sqlite-run-catalog.js';
