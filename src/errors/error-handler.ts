/**
 * CLI error handling: print the error kind and map it to an exit code.
 */

import { fail, dim } from '../utils/ui';
import { isVerbose } from '../utils/logger';
import { ErrorKind, isManagerError, ValidationError } from './manager-errors';

/** Exit codes per error kind; anything unclassified exits with 1 */
export const EXIT_CODES: Record<ErrorKind, number> = {
  network: 3,
  'not-found': 4,
  conflict: 5,
  validation: 6,
  auth: 7,
  process: 8,
  io: 9,
};

export function exitCodeFor(error: unknown): number {
  return isManagerError(error) ? EXIT_CODES[error.kind] : 1;
}

/**
 * Render an error as the lines printed on stderr.
 */
export function formatError(error: unknown): string[] {
  if (!isManagerError(error)) {
    const message = error instanceof Error ? error.message : String(error);
    return [fail(`Error: ${message}`)];
  }

  const lines = [fail(`${error.name}: ${error.message}`)];
  if (error instanceof ValidationError && error.key) {
    lines.push(dim(`    key: ${error.key}`));
  }
  if (isVerbose() && error.cause instanceof Error && error.cause.stack) {
    lines.push(dim(error.cause.stack));
  }
  return lines;
}

/**
 * Report an error and set process.exitCode. Does not exit so pending
 * cleanup (sockets, timers) can still run.
 */
export function handleError(error: unknown): void {
  for (const line of formatError(error)) {
    console.error(line);
  }
  process.exitCode = exitCodeFor(error);
}
