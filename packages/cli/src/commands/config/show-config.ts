import type { CommandContext } from '../../core/command-context.js';
import type { ShowConfigArgs } from '../../command-defs/config.js';

/**
 * CLI handler for config show: the resolved configuration plus where logs go
 */
export async function showConfigHandler(args: ShowConfigArgs, ctx: CommandContext) {
  const { configPath, config } = ctx.services.loadConfig(args.config);
  return {
    configPath,
    logDirectory: ctx.services.logDirectory(),
    ...config,
  };
}
