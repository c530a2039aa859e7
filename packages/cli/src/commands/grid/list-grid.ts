import type { ParameterSet } from '@stellar-grid/core';
import { planGrid } from '@stellar-grid/workflows';
import type { CommandContext } from '../../core/command-context.js';
import type { ListGridArgs } from '../../command-defs/grid.js';
import { withJobOverrides } from './job-overrides.js';

export interface ListGridRow {
  ordinal: number;
  runName: string;
  jobId: number;
  slot: number;
  parameters: ParameterSet;
}

/**
 * CLI handler for grid list: the plan only, nothing is written
 */
export async function listGridHandler(args: ListGridArgs, ctx: CommandContext): Promise<ListGridRow[]> {
  const { config } = ctx.services.loadConfig(args.config);
  const plan = planGrid(withJobOverrides(config, args));

  return plan.runs.map((run) => ({
    ordinal: run.ordinal,
    runName: run.runName,
    jobId: run.jobId,
    slot: run.slot,
    parameters: run.parameters,
  }));
}
