/**
 * Standard Command Wrapper
 *
 * Commander owns flags and parsing; the wrapper owns value coercion, schema
 * validation, error formatting and handler invocation.
 *
 * Validation always uses the schema of the registered command definition.
 * Invariant: coercion never renames keys.
 */

import type { Command } from 'commander';
import { NotFoundError } from '@stellar-grid/utils';
import { executeValidated } from './execute.js';
import { commandRegistry } from './command-registry.js';
import { validateAndCoerceArgs } from './validation-pipeline.js';
import type { CommandContext } from './command-context.js';

type CoerceFn<TIn, TOut> = (raw: TIn) => TOut;

export type DefineCommandArgs<TRawOpts> = {
  name: string;
  packageName: string;
  // value coercion only (numbers, booleans), NOT key renaming
  coerce?: CoerceFn<TRawOpts, TRawOpts>;
  onError?: (e: unknown) => never;
  context?: () => CommandContext;
};

export function defineCommand<TRawOpts extends Record<string, unknown>>(
  cmd: Command,
  args: DefineCommandArgs<TRawOpts>
): Command {
  cmd.name(args.name);

  const examples = commandRegistry.getCommand(args.packageName, args.name)?.examples ?? [];
  if (examples.length > 0) {
    cmd.addHelpText('after', `\nExamples:\n${examples.map((e) => `  $ ${e}`).join('\n')}`);
  }

  cmd.action(async () => {
    try {
      const commandDef = commandRegistry.getCommand(args.packageName, args.name);
      if (!commandDef) {
        throw new NotFoundError('Command', `${args.packageName}.${args.name}`);
      }

      // Commander gives camelCase keys already
      const rawOpts = cmd.opts<TRawOpts>();
      const coerced = args.coerce ? args.coerce(rawOpts) : rawOpts;
      const validated = validateAndCoerceArgs(commandDef.schema, coerced);

      await executeValidated(commandDef, validated, args.context?.());
    } catch (e) {
      if (args.onError) {
        args.onError(e);
      }
      throw e;
    }
  });

  return cmd;
}
