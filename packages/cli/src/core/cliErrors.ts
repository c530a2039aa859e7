import { exitCodeFor, handleError } from './error-handler.js';

/**
 * Print `Error: <message>` to stderr and exit with the error's exit code.
 */
export function die(error: unknown): never {
  const message = handleError(error);
  console.error(`Error: ${message}`);
  process.exit(exitCodeFor(error));
}
