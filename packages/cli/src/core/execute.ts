/**
 * Command Executor
 *
 * Runs a command's handler with validated arguments, prints the formatted
 * result to stdout and turns any failure into `Error: <message>` plus the
 * error's exit code.
 */

import type { CommandDefinition, OutputFormat } from '../types/index.js';
import { CommandContext } from './command-context.js';
import { formatOutput, isOutputFormat } from './output-formatter.js';
import { die } from './cliErrors.js';

/**
 * Execute a command definition with pre-validated arguments
 */
export async function executeValidated(
  commandDef: CommandDefinition,
  validatedArgs: Record<string, unknown>,
  ctx: CommandContext = new CommandContext()
): Promise<void> {
  try {
    // format is a CLI concern; handlers ignore it
    const requested = validatedArgs.format;
    const format: OutputFormat = isOutputFormat(requested) ? requested : 'table';
    const result = await commandDef.handler(validatedArgs, ctx);
    console.log(formatOutput(result, format));
  } catch (error) {
    die(error);
  }
}
