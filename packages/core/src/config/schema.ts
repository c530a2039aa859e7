/**
 * Configuration file schema
 *
 * The YAML file uses snake_case keys; resolveGridBuildConfig() turns the
 * validated document into the immutable camelCase GridBuildConfig threaded
 * through a build.
 */

import { resolve, sep } from 'path';
import { z } from 'zod';
import { ConfigurationError } from '@stellar-grid/utils';
import type { Axis, EnvironmentConfig, GridBuildConfig, HpcDirectives } from '../types.js';
import { resolveManagerBackend } from '../manager/manager-backend.js';
import { DEFAULT_MAX_GRID_POINTS } from '../grid/parameter-grid.js';

// YAML leaves empty keys as null
const optionalString = z
  .string()
  .nullish()
  .transform((v) => (v === null || v === undefined || v.trim() === '' ? undefined : v));

const stringList = z
  .array(z.string().min(1))
  .nullish()
  .transform((v) => v ?? []);

export const TABLE_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

const DatabaseSchema = z.object({
  filename: z.string().min(1),
  table_name: z
    .string()
    .regex(TABLE_NAME_PATTERN, 'must be a plain SQL identifier')
    .default('runs'),
  remove_database: z.boolean().default(false),
  drop_table: z.boolean().default(true),
});

const RunsSchema = z.object({
  grid_filename: optionalString,
  output_directory: z.string().min(1),
  overwrite: z.boolean().default(false),
  max_grid_points: z.number().int().positive().default(DEFAULT_MAX_GRID_POINTS),
  naming_precision: z.number().int().min(1).max(17).nullish(),
});

const ExtrasSchema = z
  .object({
    src_files: stringList,
    src_dirs: stringList,
    template_files: stringList,
    makefile: optionalString,
  })
  .nullish()
  .transform((v) => v ?? { src_files: [], src_dirs: [], template_files: [], makefile: undefined });

const TemplateSchema = z.object({
  directory: z.string().min(1),
  is_binary_evolution: z.boolean(),
  extras: ExtrasSchema,
});

const MesaSchema = z
  .object({
    mesa_dir: optionalString,
    mesasdk_root: optionalString,
    mesa_caches_dir: optionalString,
  })
  .nullish()
  .transform((v) => v ?? { mesa_dir: undefined, mesasdk_root: undefined, mesa_caches_dir: undefined });

const HpcSchema = z.object({
  name: z.string().min(1).default('stellar-grid'),
  email: z.string().min(1),
  queue: z.string().min(1),
  msg: optionalString,
  nodes: z.number().int().positive().default(1),
  ppn: z.number().int().positive(),
  mem: z.number().positive(),
  walltime: optionalString,
  out_fname: optionalString,
  err_fname: optionalString,
});

const ManagerSchema = z.object({
  manager: z.string().min(1),
  job_file_prefix: z.string().min(1),
  job_filename: z.string().min(1).default('run.sh'),
  hpc: HpcSchema.nullish(),
  number_of_jobs: z.number().int().positive(),
  number_of_cores: z.number().int().positive().default(1),
  number_of_parallel_jobs: z.number().int().positive().default(1),
});

export const GridConfigFileSchema = z.object({
  database: DatabaseSchema,
  runs: RunsSchema,
  grid: z.unknown().optional(),
  template: TemplateSchema,
  mesa: MesaSchema,
  manager: ManagerSchema,
});

export type GridConfigFile = z.infer<typeof GridConfigFileSchema>;

export const DEFAULT_WALLTIME = '168:00:00';
export const DEFAULT_MESSAGE_POLICY = 'ALL';
export const DEFAULT_OUTPUT_FILE = '/dev/null';

/**
 * Validate a parsed YAML document against the configuration schema.
 */
export function parseGridConfigFile(document: unknown, source?: string): GridConfigFile {
  const parsed = GridConfigFileSchema.safeParse(document);
  if (!parsed.success) {
    const messages = parsed.error.issues.map(
      (issue) => `  ${issue.path.join('.') || '<root>'}: ${issue.message}`
    );
    throw new ConfigurationError(
      `Invalid configuration${source ? ` in ${source}` : ''}:\n${messages.join('\n')}`,
      messages.length === 1 ? parsed.error.issues[0]?.path.join('.') : undefined,
      { issues: parsed.error.issues, source }
    );
  }
  return parsed.data;
}

export interface ResolveConfigOptions {
  /** Relative paths resolve against this directory */
  baseDir?: string;
  env?: NodeJS.ProcessEnv;
}

function toDirectives(hpc: NonNullable<GridConfigFile['manager']['hpc']>): HpcDirectives {
  const outputFile = hpc.out_fname ?? DEFAULT_OUTPUT_FILE;
  return {
    name: hpc.name,
    queue: hpc.queue,
    walltime: hpc.walltime ?? DEFAULT_WALLTIME,
    nodes: hpc.nodes,
    coresPerNode: hpc.ppn,
    memoryGb: hpc.mem,
    email: hpc.email,
    messagePolicy: hpc.msg ?? DEFAULT_MESSAGE_POLICY,
    outputFile,
    errorFile: hpc.err_fname ?? outputFile,
  };
}

/**
 * MESA paths from the file, falling back to the usual environment variables.
 */
function resolveEnvironment(
  mesa: GridConfigFile['mesa'],
  env: NodeJS.ProcessEnv
): EnvironmentConfig {
  return {
    mesaDir: mesa.mesa_dir ?? (env.MESA_DIR || undefined),
    mesasdkRoot: mesa.mesasdk_root ?? (env.MESASDK_ROOT || undefined),
    mesaCachesDir: mesa.mesa_caches_dir ?? (env.MESA_CACHES_DIR || undefined),
  };
}

/**
 * Like resolve(), but a prefix naming a directory keeps its trailing separator.
 */
function resolvePrefix(baseDir: string, prefix: string): string {
  const resolved = resolve(baseDir, prefix);
  return prefix.endsWith('/') || prefix.endsWith(sep) ? resolved + sep : resolved;
}

export function resolveGridBuildConfig(
  file: GridConfigFile,
  axes: readonly Axis[],
  options: ResolveConfigOptions = {}
): GridBuildConfig {
  const baseDir = options.baseDir ?? process.cwd();
  const env = options.env ?? process.env;
  const abs = (p: string) => resolve(baseDir, p);

  const hpc = file.manager.hpc ? toDirectives(file.manager.hpc) : undefined;

  return {
    axes,
    runs: {
      outputDirectory: abs(file.runs.output_directory),
      overwrite: file.runs.overwrite,
      maxGridPoints: file.runs.max_grid_points,
      namingPrecision: file.runs.naming_precision ?? undefined,
    },
    template: {
      directory: abs(file.template.directory),
      isBinaryEvolution: file.template.is_binary_evolution,
      extras: {
        srcFiles: file.template.extras.src_files.map(abs),
        srcDirs: file.template.extras.src_dirs.map(abs),
        templateFiles: file.template.extras.template_files.map(abs),
        makefile: file.template.extras.makefile ? abs(file.template.extras.makefile) : undefined,
      },
    },
    environment: resolveEnvironment(file.mesa, env),
    manager: {
      backend: resolveManagerBackend(file.manager.manager, hpc),
      jobFilePrefix: resolvePrefix(baseDir, file.manager.job_file_prefix),
      jobFilename: file.manager.job_filename,
      numberOfJobs: file.manager.number_of_jobs,
      numberOfCores: file.manager.number_of_cores,
      numberOfParallelJobs: file.manager.number_of_parallel_jobs,
    },
    database: {
      filename: abs(file.database.filename),
      tableName: file.database.table_name,
      removeDatabase: file.database.remove_database,
      dropTable: file.database.drop_table,
    },
  };
}
