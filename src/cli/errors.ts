import { describeError, WorkflowError } from '../orchestrator/errors';
import { formatError } from './formatters';

/** Prints a command failure and marks the process as failed. */
export function reportCommandError(err: unknown): void {
  const message = err instanceof WorkflowError ? `[${err.code}] ${err.message}` : describeError(err);
  console.error(formatError(message));
  process.exitCode = 1;
}
