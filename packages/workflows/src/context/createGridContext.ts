import type { GridBuildConfig } from '@stellar-grid/core';
import { SqliteRunCatalog } from '@stellar-grid/storage';
import { createLogger } from '@stellar-grid/utils';
import type { GridContext, WorkflowLogger } from '../types.js';

export type { GridContext } from '../types.js';

export interface GridContextOverrides {
  /**
   * Optional logger override (defaults to the workflows package logger)
   */
  logger?: WorkflowLogger;

  /**
   * Optional clock override (for testing)
   */
  clock?: {
    nowISO: () => string;
  };
}

/**
 * Create a production GridContext: sqlite catalog from the database section,
 * package logger tagged with the output directory, wall clock.
 */
export function createProductionGridContext(
  config: GridBuildConfig,
  overrides: GridContextOverrides = {}
): GridContext {
  return {
    logger:
      overrides.logger ??
      createLogger('@stellar-grid/workflows').child({ outputDirectory: config.runs.outputDirectory }),
    catalog: new SqliteRunCatalog(config.database),
    clock: overrides.clock ?? { nowISO: () => new Date().toISOString() },
  };
}
