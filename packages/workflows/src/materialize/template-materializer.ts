/**
 * TemplateMaterializer
 *
 * Produces one run directory from the shared template:
 *   1. check preconditions (destination, manifest entries, extras)
 *   2. copy the manifest into a staging directory beside the destination
 *   3. graft extras over it (src dirs, src files, top-level files, makefile)
 *   4. write the run's namelist inputs
 *   5. resolve the template placeholder in every inlist* file
 *   6. swap the staging directory into place
 *
 * A failure at any step removes the staging directory, so the destination is
 * either untouched or the complete new run.
 */

import { existsSync } from 'fs';
import { mkdir, readFile, readdir, rename, rm, writeFile } from 'fs/promises';
import { basename, dirname, join } from 'path';
import type { Axis, RunSpec, TemplateSpec } from '@stellar-grid/core';
import { AppError, MaterializationError, createLogger, errorMessage } from '@stellar-grid/utils';
import type { WorkflowLogger } from '../types.js';
import { copyEntry } from './copy-tree.js';
import { buildRunInlists } from './run-inlists.js';
import { isInlistFile, substituteTemplatePath } from './placeholder.js';
import { isDirectoryEntry, templateManifest } from './template-manifest.js';

export interface MaterializeRunInput {
  template: TemplateSpec;
  run: RunSpec;
  axes: readonly Axis[];
  /** Absolute path of the run directory */
  destination: string;
  overwrite: boolean;
}

export interface MaterializedRun {
  readonly runName: string;
  readonly directory: string;
  /** Paths relative to the run directory, sorted */
  readonly files: readonly string[];
  /** inlist files whose placeholder was resolved */
  readonly substituted: readonly string[];
}

interface ExtraCopy {
  source: string;
  target: string;
}

/**
 * Extras in application order; later entries win on a name collision.
 */
function plannedExtras(template: TemplateSpec): ExtraCopy[] {
  const { extras } = template;
  const copies: ExtraCopy[] = [
    ...extras.srcDirs.map((source) => ({ source, target: join('src', basename(source)) })),
    ...extras.srcFiles.map((source) => ({ source, target: join('src', basename(source)) })),
    ...extras.templateFiles.map((source) => ({ source, target: basename(source) })),
  ];
  if (extras.makefile) {
    copies.push({ source: extras.makefile, target: join('make', 'makefile') });
  }
  return copies;
}

function checkPreconditions(input: MaterializeRunInput, extras: readonly ExtraCopy[]): void {
  const { template, destination, overwrite } = input;

  if (existsSync(destination) && !overwrite) {
    throw new MaterializationError(
      `Run directory already exists and overwrite is disabled: ${destination}`,
      destination,
      { runName: input.run.runName }
    );
  }

  const missing = templateManifest(template.isBinaryEvolution).filter(
    (entry) => !existsSync(join(template.directory, entry))
  );
  if (missing.length > 0) {
    throw new MaterializationError(
      `Template ${template.directory} is missing required entries: ${missing.join(', ')}`,
      template.directory,
      { missing, isBinaryEvolution: template.isBinaryEvolution }
    );
  }

  const missingExtras = extras.filter((extra) => !existsSync(extra.source)).map((e) => e.source);
  if (missingExtras.length > 0) {
    throw new MaterializationError(
      `Template extras not found: ${missingExtras.join(', ')}`,
      template.directory,
      { missing: missingExtras }
    );
  }
}

async function resolvePlaceholders(directory: string, templateDirectory: string): Promise<string[]> {
  const substituted: string[] = [];
  for (const entry of await readdir(directory, { withFileTypes: true })) {
    if (!entry.isFile() || !isInlistFile(entry.name)) continue;

    const path = join(directory, entry.name);
    const content = await readFile(path, 'utf-8');
    const resolved = substituteTemplatePath(content, templateDirectory);
    if (resolved !== content) {
      await writeFile(path, resolved);
      substituted.push(entry.name);
    }
  }
  return substituted;
}

export async function materializeRun(
  input: MaterializeRunInput,
  log: WorkflowLogger = createLogger('@stellar-grid/workflows')
): Promise<MaterializedRun> {
  const { template, run, axes, destination } = input;
  const extras = plannedExtras(template);
  checkPreconditions(input, extras);

  const staging = join(dirname(destination), `.${basename(destination)}.staging`);
  const written: string[] = [];

  try {
    await rm(staging, { recursive: true, force: true });
    await mkdir(staging, { recursive: true });

    for (const entry of templateManifest(template.isBinaryEvolution)) {
      const relative = isDirectoryEntry(entry) ? entry.slice(0, -1) : entry;
      written.push(...(await copyEntry(join(template.directory, relative), join(staging, relative))));
    }

    for (const extra of extras) {
      written.push(...(await copyEntry(extra.source, join(staging, extra.target))));
    }

    for (const inlist of buildRunInlists(axes, run.parameters, template.isBinaryEvolution)) {
      const path = join(staging, inlist.filename);
      await writeFile(path, inlist.content);
      written.push(path);
    }

    const substituted = await resolvePlaceholders(staging, template.directory);

    if (existsSync(destination)) {
      await rm(destination, { recursive: true, force: true });
    }
    await rename(staging, destination);

    const files = [...new Set(written.map((p) => p.slice(staging.length + 1)))].sort();
    log.debug?.('Materialized run', {
      runName: run.runName,
      ordinal: run.ordinal,
      directory: destination,
      fileCount: files.length,
    });

    return { runName: run.runName, directory: destination, files, substituted };
  } catch (error) {
    await rm(staging, { recursive: true, force: true });
    if (error instanceof AppError) {
      throw error;
    }
    throw new MaterializationError(
      `Failed to materialize run ${run.runName}: ${errorMessage(error)}`,
      destination,
      { runName: run.runName, ordinal: run.ordinal }
    );
  }
}
