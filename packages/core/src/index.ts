/**
 * @stellar-grid/core - grid expansion, naming, partitioning and configuration
 */

export * from './types.js';
export * from './grid/grid-spec.js';
export * from './grid/parameter-grid.js';
export * from './grid/run-namer.js';
export * from './grid/job-partitioner.js';
export * from './namelist/namelist-format.js';
export * from './manager/manager-backend.js';
export * from './config/schema.js';
