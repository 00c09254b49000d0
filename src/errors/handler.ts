/**
 * Error reporting for the stackterm CLI.
 *
 * Every thrown value is reduced to a message, an exit code and an optional
 * hint, then printed as colored text or as JSON. A running session registers
 * a cleanup hook so the terminal is back in normal mode before anything is
 * printed.
 */

import chalk from 'chalk';
import { CLIError } from './types.js';

export interface ErrorHandlerOptions {
  /** Include stack traces */
  verbose?: boolean;
  /** Print JSON instead of text */
  json?: boolean;
  /** Runs before the error is printed, e.g. to restore the terminal */
  cleanup?: () => void;
}

/**
 * Shape of `--json` error output
 */
export interface ErrorOutput {
  error: string;
  code: number;
  hint?: string;
  stack?: string;
}

function summarize(error: unknown): ErrorOutput {
  if (error instanceof CLIError) {
    return { error: error.message, code: error.code, hint: error.hint, stack: error.stack };
  }
  if (error instanceof Error) {
    return { error: error.message, code: 1, stack: error.stack };
  }
  return { error: String(error), code: 1 };
}

/**
 * Format an error for display without printing it.
 */
export function formatError(error: unknown, options: ErrorHandlerOptions = {}): string {
  const { verbose = false, json = false } = options;
  const summary = summarize(error);

  if (json) {
    const output: ErrorOutput = { error: summary.error, code: summary.code };
    if (summary.hint) output.hint = summary.hint;
    if (verbose && summary.stack) output.stack = summary.stack;
    return JSON.stringify(output, null, 2);
  }

  const lines = [chalk.red('Error: ') + summary.error];
  if (summary.hint) {
    lines.push(chalk.dim('Hint: ') + summary.hint);
  }
  if (verbose && summary.stack) {
    lines.push('', chalk.dim('Stack trace:'), chalk.dim(summary.stack));
  } else if (error instanceof Error && !(error instanceof CLIError)) {
    // Not a CLIError: the stack trace is behind --verbose
    lines.push(chalk.dim('Hint: ') + 'Run with --verbose for more details');
  }
  return lines.join('\n');
}

/**
 * Exit code for an error: the CLIError's own code, otherwise 1.
 */
export function getExitCode(error: unknown): number {
  return error instanceof CLIError ? error.code : 1;
}

/**
 * Run the cleanup hook, print the error to stderr and exit with its code.
 */
export function handleError(error: unknown, options: ErrorHandlerOptions = {}): never {
  options.cleanup?.();
  console.error(formatError(error, options));
  process.exit(getExitCode(error));
}

/**
 * Handler for `uncaughtException` and `unhandledRejection`.
 */
export function createGlobalErrorHandler(options: ErrorHandlerOptions = {}): (error: unknown) => never {
  return (error: unknown) => handleError(error, options);
}
