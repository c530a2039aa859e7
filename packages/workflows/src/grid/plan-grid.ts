/**
 * Grid planning: expand, name, partition. No side effects, so every grid,
 * naming and partition error surfaces before anything is written.
 */

import { join } from 'path';
import {
  expandGrid,
  nameRuns,
  partitionRuns,
  type Axis,
  type GridBuildConfig,
  type GridFilter,
  type JobAssignment,
  type Partition,
  type RunSpec,
} from '@stellar-grid/core';

export interface PlanGridOptions {
  filters?: readonly GridFilter[];
}

export interface PlannedRun extends RunSpec, JobAssignment {
  /** Absolute run directory */
  readonly directory: string;
}

export interface GridPlan {
  readonly axes: readonly Axis[];
  /** Ordinal order */
  readonly runs: readonly PlannedRun[];
  readonly partition: Partition;
  /** Size of the unfiltered product */
  readonly total: number;
}

export function planGrid(config: GridBuildConfig, options: PlanGridOptions = {}): GridPlan {
  const { axes, points, total } = expandGrid(config.axes, {
    maxGridPoints: config.runs.maxGridPoints,
    filters: options.filters,
  });
  const named = nameRuns(axes, points, { precision: config.runs.namingPrecision });
  const partition = partitionRuns(named.length, {
    numberOfJobs: config.manager.numberOfJobs,
    numberOfParallelJobs: config.manager.numberOfParallelJobs,
  });

  const runs = named.map((run, index) => {
    const assignment = partition.assignments[index];
    return {
      ...run,
      jobId: assignment?.jobId ?? 0,
      slot: assignment?.slot ?? 0,
      directory: join(config.runs.outputDirectory, run.runName),
    };
  });

  return { axes, runs, partition, total };
}
