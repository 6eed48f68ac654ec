import chalk from 'chalk';
import {
  FileSystemError,
  LockTimeoutError,
  ParseError,
  ValidationError,
  describeError,
} from '@nodeconf/core';
import { ReconcileAbortedError } from '@nodeconf/reconcile';
import { formatValue } from '../report.js';

/** Exit codes for the CLI. */
export const ExitCode = {
  Success: 0,
  GeneralError: 1,
  ValidationError: 2,
  PartialFailure: 3,
  FileSystemError: 4,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/** CLI-specific error with exit code. */
export class CLIError extends Error {
  constructor(
    message: string,
    public readonly exitCode: ExitCode = ExitCode.GeneralError,
  ) {
    super(message);
    this.name = 'CLIError';
  }
}

function isStorageFailure(error: unknown): boolean {
  return error instanceof LockTimeoutError || error instanceof FileSystemError;
}

/** Map any thrown value to the process exit code. */
export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof CLIError) return error.exitCode;
  if (error instanceof ValidationError || error instanceof ParseError) return ExitCode.ValidationError;
  if (isStorageFailure(error)) return ExitCode.FileSystemError;
  // An aborted run exits as its cause would have
  if (error instanceof ReconcileAbortedError && error.cause !== undefined) return exitCodeFor(error.cause);
  return ExitCode.GeneralError;
}

/**
 * Message lines for an error. A ValidationError gets one line per
 * violation. An aborted run lists the changes it had applied and the
 * failures it had collected before it stopped.
 */
export function describeFailure(error: unknown): string[] {
  if (error instanceof ReconcileAbortedError) {
    return [
      error.message,
      ...error.applied.map((c) => `  applied ${c.field}: ${formatValue(c.from)} -> ${formatValue(c.to)}`),
      ...error.failures.map((f) => `  ${f.message}`),
    ];
  }
  if (error instanceof ValidationError && error.violations.length > 0) {
    const noun = error.violations.length === 1 ? 'violation' : 'violations';
    return [
      `Config model has ${error.violations.length} ${noun}:`,
      ...error.violations.map((v) => `  ${v.path}: ${v.message}`),
    ];
  }
  return [describeError(error)];
}

/** Handles errors at the top level and exits with the appropriate code. */
export function handleError(error: unknown): never {
  const [first, ...rest] = describeFailure(error);
  console.error(chalk.red(`Error: ${first}`));
  for (const line of rest) {
    console.error(chalk.red(line));
  }
  if (process.env['NODECONF_VERBOSE'] === '1' && error instanceof Error && error.stack) {
    console.error(chalk.gray(error.stack));
  }
  process.exit(exitCodeFor(error));
}
