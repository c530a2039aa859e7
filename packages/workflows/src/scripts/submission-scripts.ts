/**
 * SubmissionScriptGenerator
 *
 * One manifest and one executable script per job. The manifest lists the
 * job's run directories; the script walks it and runs the external code in
 * each directory, either one at a time or with a bounded number of background
 * runs.
 *
 * Batch-queue scripts carry a scheduler directive block after the shebang;
 * local scripts are plain POSIX sh.
 */

import { existsSync } from 'fs';
import { chmod, mkdir, writeFile } from 'fs/promises';
import { dirname, isAbsolute, join, relative } from 'path';
import type {
  EnvironmentConfig,
  GridBuildConfig,
  HpcDirectives,
  ManagerBackend,
  Partition,
} from '@stellar-grid/core';
import { MaterializationError, createLogger } from '@stellar-grid/utils';
import type { WorkflowLogger } from '../types.js';

export const SCRIPT_MODE = 0o755;

export function jobScriptPath(jobFilePrefix: string, jobId: number, jobFilename: string): string {
  return `${jobFilePrefix}${jobId}_${jobFilename}`;
}

export function jobManifestPath(outputDirectory: string, jobId: number): string {
  return join(outputDirectory, `job_${jobId}.folders`);
}

/**
 * Single-quote a value for sh.
 */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

export function renderDirectives(
  scheduler: 'slurm' | 'pbs',
  directives: HpcDirectives,
  jobId: number
): string[] {
  const jobName = `${directives.name}_${jobId}`;
  if (scheduler === 'slurm') {
    return [
      `#SBATCH --job-name=${jobName}`,
      `#SBATCH --partition=${directives.queue}`,
      `#SBATCH --time=${directives.walltime}`,
      `#SBATCH --nodes=${directives.nodes}`,
      `#SBATCH --cpus-per-task=${directives.coresPerNode}`,
      `#SBATCH --mem=${directives.memoryGb}gb`,
      `#SBATCH --mail-type=${directives.messagePolicy}`,
      `#SBATCH --mail-user=${directives.email}`,
      `#SBATCH --output=${directives.outputFile}`,
      `#SBATCH --error=${directives.errorFile}`,
    ];
  }
  return [
    `#PBS -N ${jobName}`,
    `#PBS -q ${directives.queue}`,
    `#PBS -l walltime=${directives.walltime}`,
    `#PBS -l nodes=${directives.nodes}:ppn=${directives.coresPerNode}`,
    `#PBS -l mem=${directives.memoryGb}gb`,
    `#PBS -M ${directives.email}`,
    `#PBS -m ${directives.messagePolicy}`,
    `#PBS -o ${directives.outputFile}`,
    `#PBS -e ${directives.errorFile}`,
  ];
}

function environmentBlock(environment: EnvironmentConfig): string[] {
  const exports: string[] = [];
  if (environment.mesaDir) exports.push(`export MESA_DIR=${shellQuote(environment.mesaDir)}`);
  if (environment.mesasdkRoot) {
    exports.push(`export MESASDK_ROOT=${shellQuote(environment.mesasdkRoot)}`);
  }
  if (environment.mesaCachesDir) {
    exports.push(`export MESA_CACHES_DIR=${shellQuote(environment.mesaCachesDir)}`);
  }
  if (exports.length === 0) return [];

  const lines = ['# MESA installation', ...exports];
  if (environment.mesasdkRoot) {
    lines.push('. "$MESASDK_ROOT/bin/mesasdk_init.sh"');
  }
  return [...lines, ''];
}

function sequentialLoop(): string[] {
  return [
    'START_DIR="$(pwd)"',
    'while IFS= read -r run_dir; do',
    '  [ -z "$run_dir" ] && continue',
    '  cd "$run_dir" || { echo "cannot enter $run_dir" >&2; continue; }',
    '  "$EXECUTABLE" > log 2>&1 || echo "run failed: $run_dir" >&2',
    '  cd "$START_DIR" || exit 1',
    'done < "$FOLDERS_FILE"',
  ];
}

function parallelLoop(parallelSlots: number): string[] {
  return [
    'running=0',
    'while IFS= read -r run_dir; do',
    '  [ -z "$run_dir" ] && continue',
    '  (',
    '    cd "$run_dir" || exit 1',
    '    "$EXECUTABLE" > log 2>&1 || echo "run failed: $run_dir" >&2',
    '  ) &',
    '  running=$((running + 1))',
    `  if [ "$running" -ge ${parallelSlots} ]; then`,
    '    wait',
    '    running=0',
    '  fi',
    'done < "$FOLDERS_FILE"',
    'wait',
  ];
}

export interface JobScriptInput {
  jobId: number;
  backend: ManagerBackend;
  environment: EnvironmentConfig;
  templateDirectory: string;
  runsDirectory: string;
  manifestPath: string;
  numberOfCores: number;
  parallelSlots: number;
  isBinaryEvolution: boolean;
}

export function renderJobScript(input: JobScriptInput): string {
  const { backend } = input;
  const header =
    backend.kind === 'batch'
      ? ['#!/bin/bash', ...renderDirectives(backend.scheduler, backend.directives, input.jobId)]
      : ['#!/bin/sh'];
  const executable = input.isBinaryEvolution ? 'binary' : 'star';

  const lines = [
    ...header,
    `# stellar-grid job ${input.jobId}: runs listed in ${input.manifestPath}`,
    '',
    ...environmentBlock(input.environment),
    `export OMP_NUM_THREADS=${input.numberOfCores}`,
    `export MESA_TEMPLATE_DIR=${shellQuote(input.templateDirectory)}`,
    `export MESA_RUNS_DIR=${shellQuote(input.runsDirectory)}`,
    `export MESA_INLIST=${shellQuote(join(input.templateDirectory, 'inlist'))}`,
    '',
    `DEFAULT_FOLDERS_FILE=${shellQuote(input.manifestPath)}`,
    'FOLDERS_FILE="${1:-$DEFAULT_FOLDERS_FILE}"',
    `EXECUTABLE="$MESA_TEMPLATE_DIR/${executable}"`,
    '',
    ...(input.parallelSlots > 1 ? parallelLoop(input.parallelSlots) : sequentialLoop()),
  ];
  return `${lines.join('\n')}\n`;
}

export interface WriteJobArtifactsInput {
  config: GridBuildConfig;
  partition: Partition;
  /** Absolute run directory for each ordinal */
  directories: readonly string[];
}

export interface JobArtifacts {
  readonly jobId: number;
  readonly scriptPath: string;
  readonly manifestPath: string;
  readonly runCount: number;
  readonly parallelSlots: number;
}

function isInside(parent: string, child: string): boolean {
  const rel = relative(parent, child);
  return rel !== '' && !rel.startsWith('..') && !isAbsolute(rel);
}

function jobDirectories(
  input: WriteJobArtifactsInput,
  jobId: number,
  ordinals: readonly number[]
): string[] {
  const outputDirectory = input.config.runs.outputDirectory;
  if (ordinals.length === 0) {
    throw new MaterializationError(`Job ${jobId} has no runs`, outputDirectory, { jobId });
  }

  return ordinals.map((ordinal) => {
    const directory = input.directories[ordinal];
    if (directory === undefined) {
      throw new MaterializationError(
        `Job ${jobId} lists ordinal ${ordinal}, which has no run directory`,
        outputDirectory,
        { jobId, ordinal }
      );
    }
    if (!isInside(outputDirectory, directory)) {
      throw new MaterializationError(
        `Run directory ${directory} is outside ${outputDirectory}`,
        directory,
        { jobId, ordinal }
      );
    }
    if (!existsSync(directory)) {
      throw new MaterializationError(`Run directory ${directory} does not exist`, directory, {
        jobId,
        ordinal,
      });
    }
    return directory;
  });
}

/**
 * Write every job's manifest and script. All jobs are checked before the
 * first file is written.
 */
export async function writeJobArtifacts(
  input: WriteJobArtifactsInput,
  log: WorkflowLogger = createLogger('@stellar-grid/workflows')
): Promise<JobArtifacts[]> {
  const { config, partition } = input;
  const checked = partition.jobs.map((job) => ({
    job,
    directories: jobDirectories(input, job.jobId, job.ordinals),
  }));

  const artifacts: JobArtifacts[] = [];
  for (const { job, directories } of checked) {
    const manifestPath = jobManifestPath(config.runs.outputDirectory, job.jobId);
    const scriptPath = jobScriptPath(
      config.manager.jobFilePrefix,
      job.jobId,
      config.manager.jobFilename
    );

    await writeFile(manifestPath, `${directories.join('\n')}\n`);

    const script = renderJobScript({
      jobId: job.jobId,
      backend: config.manager.backend,
      environment: config.environment,
      templateDirectory: config.template.directory,
      runsDirectory: config.runs.outputDirectory,
      manifestPath,
      numberOfCores: config.manager.numberOfCores,
      parallelSlots: job.parallelSlots,
      isBinaryEvolution: config.template.isBinaryEvolution,
    });
    await mkdir(dirname(scriptPath), { recursive: true });
    await writeFile(scriptPath, script);
    await chmod(scriptPath, SCRIPT_MODE);

    log.debug?.('Wrote job script', { jobId: job.jobId, scriptPath, runCount: directories.length });
    artifacts.push({
      jobId: job.jobId,
      scriptPath,
      manifestPath,
      runCount: directories.length,
      parallelSlots: job.parallelSlots,
    });
  }
  return artifacts;
}
