/**
 * Domain types shared by every stage of a grid build.
 */

/**
 * A single parameter value as it appears in a namelist.
 */
export type ParameterValue = number | string | boolean;

/**
 * One concrete combination: axis name to the value chosen for this run.
 */
export type ParameterSet = Readonly<Record<string, ParameterValue>>;

/**
 * A named parameter with the values to explore.
 *
 * `varying` is false for axes declared as a scalar; they contribute their one
 * value to every run but never appear in run names.
 */
export interface Axis {
  readonly name: string;
  readonly values: readonly ParameterValue[];
  readonly varying: boolean;
  /** Namelist group of the external code, when the grid file was grouped */
  readonly namelist?: string;
}

/**
 * Grid before naming: ordinal plus parameters.
 */
export interface GridPoint {
  readonly ordinal: number;
  readonly parameters: ParameterSet;
}

export interface RunSpec extends GridPoint {
  readonly runName: string;
}

export interface JobAssignment {
  readonly ordinal: number;
  readonly jobId: number;
  /** Execution slot inside the job, in [0, parallelSlots) */
  readonly slot: number;
}

export interface JobPlan {
  readonly jobId: number;
  /** Ascending, contiguous */
  readonly ordinals: readonly number[];
  /** How many of this job's runs a script may launch at once */
  readonly parallelSlots: number;
}

export interface Partition {
  readonly jobs: readonly JobPlan[];
  readonly assignments: readonly JobAssignment[];
}

export interface TemplateExtras {
  readonly srcFiles: readonly string[];
  readonly srcDirs: readonly string[];
  readonly templateFiles: readonly string[];
  readonly makefile?: string;
}

export interface TemplateSpec {
  /** Absolute path */
  readonly directory: string;
  readonly isBinaryEvolution: boolean;
  readonly extras: TemplateExtras;
}

export interface HpcDirectives {
  readonly name: string;
  readonly queue: string;
  readonly walltime: string;
  readonly nodes: number;
  readonly coresPerNode: number;
  readonly memoryGb: number;
  readonly email: string;
  readonly messagePolicy: string;
  readonly outputFile: string;
  readonly errorFile: string;
}

export type BatchScheduler = 'slurm' | 'pbs';

export type ManagerBackend =
  | { readonly kind: 'local' }
  | { readonly kind: 'batch'; readonly scheduler: BatchScheduler; readonly directives: HpcDirectives };

export interface ManagerConfig {
  readonly backend: ManagerBackend;
  readonly jobFilePrefix: string;
  readonly jobFilename: string;
  readonly numberOfJobs: number;
  readonly numberOfCores: number;
  readonly numberOfParallelJobs: number;
}

export interface DatabaseConfig {
  readonly filename: string;
  readonly tableName: string;
  readonly removeDatabase: boolean;
  readonly dropTable: boolean;
}

/**
 * Paths of the external code's installation, exported by generated scripts.
 */
export interface EnvironmentConfig {
  readonly mesaDir?: string;
  readonly mesasdkRoot?: string;
  readonly mesaCachesDir?: string;
}

export interface RunsConfig {
  /** Absolute path */
  readonly outputDirectory: string;
  readonly overwrite: boolean;
  readonly maxGridPoints: number;
  /** Significant digits used for numbers in run names; shortest form when unset */
  readonly namingPrecision?: number;
}

export interface GridBuildConfig {
  readonly axes: readonly Axis[];
  readonly runs: RunsConfig;
  readonly template: TemplateSpec;
  readonly environment: EnvironmentConfig;
  readonly manager: ManagerConfig;
  readonly database: DatabaseConfig;
}

export const RUN_STATUS_NOT_COMPUTED = 'not computed';

export interface CatalogRow {
  readonly id: number;
  readonly runName: string;
  readonly templateDirectory: string;
  readonly runsDirectory: string;
  readonly jobId: number;
  readonly status: string;
}
