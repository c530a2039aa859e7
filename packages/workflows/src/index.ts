/**
 * @stellar-grid/workflows - grid build orchestration
 */

export type { GridContext, WorkflowLogger } from './types.js';

export { planGrid } from './grid/plan-grid.js';
export type { GridPlan, PlannedRun, PlanGridOptions } from './grid/plan-grid.js';
export { buildGrid } from './grid/build-grid.js';
export type { BuildGridOptions, BuiltRun, GridBuildResult } from './grid/build-grid.js';

export { createProductionGridContext } from './context/createGridContext.js';
export type { GridContextOverrides } from './context/createGridContext.js';

export { loadGridConfig, loadGridBuildConfig } from './config/load-grid-config.js';
export type { LoadGridConfigOptions, LoadedGridConfig } from './config/load-grid-config.js';

export { materializeRun } from './materialize/template-materializer.js';
export type { MaterializeRunInput, MaterializedRun } from './materialize/template-materializer.js';
export {
  BINARY_MANIFEST,
  STAR_MANIFEST,
  templateManifest,
} from './materialize/template-manifest.js';
export { buildRunInlists } from './materialize/run-inlists.js';
export type { InlistFile } from './materialize/run-inlists.js';
export { TEMPLATE_PLACEHOLDER, substituteTemplatePath } from './materialize/placeholder.js';

export {
  jobManifestPath,
  jobScriptPath,
  renderDirectives,
  renderJobScript,
  writeJobArtifacts,
} from './scripts/submission-scripts.js';
export type { JobArtifacts, JobScriptInput } from './scripts/submission-scripts.js';
