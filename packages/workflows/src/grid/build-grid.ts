/**
 * GridManager - build a grid end to end
 *
 * Orchestrates:
 * 1. Plan (expand, name, partition)
 * 2. Prepare the output directory and reset the catalog
 * 3. Materialize each run in ordinal order, cataloguing it once it exists
 * 4. Write job manifests and scripts
 * 5. Close the catalog, also on failure
 *
 * The build is not transactional: a failure part-way leaves the run
 * directories and catalog rows written so far.
 */

import { mkdir } from 'fs/promises';
import {
  RUN_STATUS_NOT_COMPUTED,
  type CatalogRow,
  type GridBuildConfig,
} from '@stellar-grid/core';
import { materializeRun } from '../materialize/template-materializer.js';
import { writeJobArtifacts, type JobArtifacts } from '../scripts/submission-scripts.js';
import { createProductionGridContext } from '../context/createGridContext.js';
import type { GridContext } from '../types.js';
import { planGrid, type PlanGridOptions } from './plan-grid.js';

export interface BuiltRun {
  readonly ordinal: number;
  readonly runName: string;
  readonly jobId: number;
  readonly slot: number;
  readonly directory: string;
}

/**
 * JSON-serializable build summary
 */
export interface GridBuildResult {
  readonly runs: readonly BuiltRun[];
  readonly scripts: readonly JobArtifacts[];
  readonly catalogRows: number;
  /** Size of the unfiltered product */
  readonly total: number;
  readonly startedAtISO: string;
  readonly completedAtISO: string;
}

export interface BuildGridOptions extends PlanGridOptions {
  /** Overrides runs.overwrite */
  overwrite?: boolean;
}

/**
 * Close the catalog without letting a close fault replace the build error.
 */
async function closeAfterFailure(ctx: GridContext): Promise<void> {
  try {
    await ctx.catalog.close();
  } catch (closeError) {
    ctx.logger.error('[workflows.buildGrid] catalog close failed', closeError);
  }
}

export async function buildGrid(
  config: GridBuildConfig,
  ctx: GridContext = createProductionGridContext(config),
  options: BuildGridOptions = {}
): Promise<GridBuildResult> {
  const startedAtISO = ctx.clock.nowISO();
  const overwrite = options.overwrite ?? config.runs.overwrite;

  const built: BuiltRun[] = [];
  let catalogRows = 0;
  let result: GridBuildResult;

  try {
    const plan = planGrid(config, options);
    ctx.logger.info('[workflows.buildGrid] start', {
      runCount: plan.runs.length,
      total: plan.total,
      jobs: plan.partition.jobs.length,
      outputDirectory: config.runs.outputDirectory,
    });

    await mkdir(config.runs.outputDirectory, { recursive: true });
    await ctx.catalog.reset();

    for (const run of plan.runs) {
      await materializeRun(
        {
          template: config.template,
          run,
          axes: plan.axes,
          destination: run.directory,
          overwrite,
        },
        ctx.logger
      );

      const row: CatalogRow = {
        id: run.ordinal,
        runName: run.runName,
        templateDirectory: config.template.directory,
        runsDirectory: run.directory,
        jobId: run.jobId,
        status: RUN_STATUS_NOT_COMPUTED,
      };
      await ctx.catalog.insertRows([row]);
      catalogRows += 1;

      built.push({
        ordinal: run.ordinal,
        runName: run.runName,
        jobId: run.jobId,
        slot: run.slot,
        directory: run.directory,
      });
    }

    const scripts = await writeJobArtifacts(
      { config, partition: plan.partition, directories: built.map((r) => r.directory) },
      ctx.logger
    );

    const completedAtISO = ctx.clock.nowISO();
    ctx.logger.info('[workflows.buildGrid] done', {
      runCount: built.length,
      scripts: scripts.map((s) => s.scriptPath),
    });

    result = {
      runs: built,
      scripts,
      catalogRows,
      total: plan.total,
      startedAtISO,
      completedAtISO,
    };
  } catch (error) {
    ctx.logger.error('[workflows.buildGrid] failed', error, {
      materialized: built.length,
      catalogRows,
    });
    await closeAfterFailure(ctx);
    throw error;
  }

  await ctx.catalog.close();
  return result;
}
