/**
 * Workflow types
 */

import type { LogContext } from '@stellar-grid/utils';
import type { RunCatalogPort } from '@stellar-grid/storage';

/**
 * Logger surface the workflows depend on. The utils Logger satisfies it;
 * tests pass a spy.
 */
export type WorkflowLogger = {
  info: (message: string, context?: LogContext) => void;
  warn: (message: string, context?: LogContext) => void;
  error: (message: string, error?: unknown, context?: LogContext) => void;
  debug?: (message: string, context?: LogContext) => void;
};

export type GridContext = {
  logger: WorkflowLogger;
  catalog: RunCatalogPort;
  clock: {
    nowISO: () => string;
  };
};
