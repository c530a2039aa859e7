import type { CatalogRow } from '@stellar-grid/core';
import type { CommandContext } from '../../core/command-context.js';
import type { ListCatalogArgs } from '../../command-defs/catalog.js';

/**
 * CLI handler for catalog list. The catalog is opened read-only.
 */
export async function listCatalogHandler(
  args: ListCatalogArgs,
  ctx: CommandContext
): Promise<CatalogRow[]> {
  const { config } = ctx.services.loadConfig(args.config);
  const catalog = ctx.services.catalog(config.database, { readOnly: true });
  try {
    return await catalog.listRows({ jobId: args.job, status: args.status });
  } finally {
    await catalog.close();
  }
}
