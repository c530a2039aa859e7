import type { GridBuildConfig } from '@stellar-grid/core';

/**
 * Apply --jobs / --parallel on top of the manager section.
 */
export function withJobOverrides(
  config: GridBuildConfig,
  overrides: { jobs?: number; parallel?: number }
): GridBuildConfig {
  return {
    ...config,
    manager: {
      ...config.manager,
      numberOfJobs: overrides.jobs ?? config.manager.numberOfJobs,
      numberOfParallelJobs: overrides.parallel ?? config.manager.numberOfParallelJobs,
    },
  };
}
