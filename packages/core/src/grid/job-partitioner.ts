/**
 * JobPartitioner
 *
 * Splits N ordered runs into J contiguous blocks whose sizes differ by at most
 * one, larger blocks first: 8 runs over 3 jobs gives sizes 3, 3, 2.
 * Job k starts at k * floor(N / J) + min(k, N mod J).
 */

import { PartitionError } from '@stellar-grid/utils';
import type { JobAssignment, JobPlan, Partition } from '../types.js';

export interface PartitionOptions {
  numberOfJobs: number;
  numberOfParallelJobs: number;
}

function assertPartitionable(runCount: number, numberOfJobs: number): void {
  if (!Number.isInteger(numberOfJobs) || numberOfJobs < 1) {
    throw new PartitionError(`number_of_jobs must be a positive integer, got ${numberOfJobs}`, {
      runCount,
      numberOfJobs,
    });
  }
  if (numberOfJobs > runCount) {
    throw new PartitionError(
      `Cannot split ${runCount} run(s) into ${numberOfJobs} jobs: more jobs than runs`,
      { runCount, numberOfJobs }
    );
  }
}

/**
 * Half-open ordinal range [start, end) of job k.
 */
export function jobBounds(
  jobId: number,
  runCount: number,
  numberOfJobs: number
): { start: number; end: number } {
  const base = Math.floor(runCount / numberOfJobs);
  const remainder = runCount % numberOfJobs;
  const start = jobId * base + Math.min(jobId, remainder);
  const size = base + (jobId < remainder ? 1 : 0);
  return { start, end: start + size };
}

/**
 * Job owning an ordinal, without building the whole plan.
 */
export function jobIdForOrdinal(ordinal: number, runCount: number, numberOfJobs: number): number {
  assertPartitionable(runCount, numberOfJobs);
  if (!Number.isInteger(ordinal) || ordinal < 0 || ordinal >= runCount) {
    throw new PartitionError(`Ordinal ${ordinal} is outside [0, ${runCount})`, {
      ordinal,
      runCount,
    });
  }

  const base = Math.floor(runCount / numberOfJobs);
  const remainder = runCount % numberOfJobs;
  // the first `remainder` jobs hold base + 1 runs each
  const boundary = remainder * (base + 1);
  if (ordinal < boundary) {
    return Math.floor(ordinal / (base + 1));
  }
  return remainder + Math.floor((ordinal - boundary) / base);
}

export function partitionRuns(runCount: number, options: PartitionOptions): Partition {
  const { numberOfJobs, numberOfParallelJobs } = options;
  assertPartitionable(runCount, numberOfJobs);
  if (!Number.isInteger(numberOfParallelJobs) || numberOfParallelJobs < 1) {
    throw new PartitionError(
      `number_of_parallel_jobs must be a positive integer, got ${numberOfParallelJobs}`,
      { numberOfParallelJobs }
    );
  }

  const jobs: JobPlan[] = [];
  const assignments: JobAssignment[] = [];

  for (let jobId = 0; jobId < numberOfJobs; jobId++) {
    const { start, end } = jobBounds(jobId, runCount, numberOfJobs);
    const ordinals: number[] = [];
    for (let ordinal = start; ordinal < end; ordinal++) {
      ordinals.push(ordinal);
    }
    const parallelSlots = Math.min(numberOfParallelJobs, ordinals.length);

    ordinals.forEach((ordinal, index) => {
      assignments.push({ ordinal, jobId, slot: index % parallelSlots });
    });
    jobs.push({ jobId, ordinals, parallelSlots });
  }

  return { jobs, assignments };
}
