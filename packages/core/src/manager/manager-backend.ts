/**
 * Manager resolution
 *
 * The configured `manager` string is mapped once, at configuration time, to a
 * closed backend variant. Script rendering only ever switches on `kind`.
 */

import { ConfigurationError, UnknownManagerError } from '@stellar-grid/utils';
import type { BatchScheduler, HpcDirectives, ManagerBackend } from '../types.js';

export const SUPPORTED_MANAGERS = ['shell', 'local', 'slurm', 'pbs'] as const;

export type ManagerName = (typeof SUPPORTED_MANAGERS)[number];

const BATCH_SCHEDULERS: Readonly<Record<string, BatchScheduler>> = {
  slurm: 'slurm',
  pbs: 'pbs',
};

export function resolveManagerBackend(manager: string, hpc?: HpcDirectives): ManagerBackend {
  const name = manager.trim().toLowerCase();

  if (name === 'shell' || name === 'local') {
    return { kind: 'local' };
  }

  const scheduler = BATCH_SCHEDULERS[name];
  if (scheduler === undefined) {
    throw new UnknownManagerError(manager, SUPPORTED_MANAGERS);
  }
  if (!hpc) {
    throw new ConfigurationError(
      `manager '${name}' needs an hpc section with the batch directives`,
      'manager.hpc',
      { manager: name }
    );
  }
  return { kind: 'batch', scheduler, directives: hpc };
}
