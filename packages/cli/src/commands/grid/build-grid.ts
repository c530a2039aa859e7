/**
 * CLI handler for grid build
 *
 * Loads the configuration, runs the build and reports one row per job.
 */

import { buildGrid } from '@stellar-grid/workflows';
import type { CommandContext } from '../../core/command-context.js';
import type { BuildGridArgs } from '../../command-defs/grid.js';
import { withJobOverrides } from './job-overrides.js';

export interface BuildGridRow {
  jobId: number;
  runs: number;
  parallelSlots: number;
  script: string;
  manifest: string;
}

export async function buildGridHandler(
  args: BuildGridArgs,
  ctx: CommandContext
): Promise<BuildGridRow[]> {
  const { config } = ctx.services.loadConfig(args.config);
  const effective = withJobOverrides(config, args);

  const result = await buildGrid(effective, ctx.services.gridContext(effective), {
    overwrite: args.overwrite,
  });

  return result.scripts.map((script) => ({
    jobId: script.jobId,
    runs: script.runCount,
    parallelSlots: script.parallelSlots,
    script: script.scriptPath,
    manifest: script.manifestPath,
  }));
}
