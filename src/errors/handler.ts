/**
 * Error handler for CLI error formatting and display
 *
 * - Colored error output for terminal
 * - JSON output for programmatic use
 * - Verbose mode with stack traces
 */

import chalk from 'chalk';
import { CLIError } from './types.js';

export interface ErrorHandlerOptions {
  /** Show full stack traces */
  verbose?: boolean;
  /** Output as JSON instead of formatted text */
  json?: boolean;
}

/**
 * Structured error for JSON output
 */
export interface ErrorOutput {
  error: string;
  type: string;
  code: number;
  hint?: string;
  stack?: string;
}

/**
 * Normalize anything thrown into a CLIError.
 *
 * Plain Errors keep their message and stack; other values are stringified.
 */
export function toCLIError(error: unknown): CLIError {
  if (error instanceof CLIError) {
    return error;
  }
  if (error instanceof Error) {
    const wrapped = new CLIError(error.message, 'Run with --verbose for more details');
    wrapped.stack = error.stack;
    return wrapped;
  }
  return new CLIError(String(error));
}

/**
 * Format an error for display (separate from handleError so it can be tested
 * without process.exit).
 */
export function formatError(
  error: unknown,
  options: ErrorHandlerOptions = {}
): string {
  const { verbose = false, json = false } = options;
  const cliError = toCLIError(error);
  const type = error instanceof Error ? error.name : typeof error;

  if (json) {
    const output: ErrorOutput = {
      error: cliError.message,
      type,
      code: cliError.code,
      hint: cliError.hint,
      stack: verbose ? cliError.stack : undefined,
    };
    return JSON.stringify(output, null, 2);
  }

  const lines = [chalk.red('Error: ') + cliError.message];

  // Plain Errors only get the --verbose hint when the stack is hidden
  const showHint = error instanceof CLIError || !verbose;
  if (cliError.hint && showHint) {
    lines.push(chalk.dim('Hint: ') + cliError.hint);
  }

  if (verbose && cliError.stack) {
    lines.push('', chalk.dim('Stack trace:'), chalk.dim(cliError.stack));
  }

  return lines.join('\n');
}

/**
 * CLIError carries its own exit code, everything else is 1.
 */
export function getExitCode(error: unknown): number {
  return error instanceof CLIError ? error.code : 1;
}

/**
 * Format an error to stderr and exit with its code.
 */
export function handleError(
  error: unknown,
  options: ErrorHandlerOptions = {}
): never {
  console.error(formatError(error, options));
  process.exit(getExitCode(error));
}

/**
 * Create a handler for process-level events.
 *
 *   process.on('uncaughtException', createGlobalErrorHandler({ verbose: true }));
 */
export function createGlobalErrorHandler(
  options: ErrorHandlerOptions = {}
): (error: unknown) => never {
  return (error: unknown) => handleError(error, options);
}
