/**
 * Error formatting and process-level handling for the CLI.
 *
 * - Colored terminal output with hints
 * - JSON output for --json
 * - Stack traces for --verbose
 */

import chalk from 'chalk';
import { CLIError, UpstreamServiceError } from './types.js';

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
  kind?: string;
  stack?: string;
}

function toErrorOutput(error: unknown, verbose: boolean): ErrorOutput {
  if (error instanceof CLIError) {
    return {
      error: error.message,
      type: error.name,
      code: error.code,
      hint: error.hint,
      kind: error instanceof UpstreamServiceError ? error.kind : undefined,
      stack: verbose ? error.stack : undefined,
    };
  }
  if (error instanceof Error) {
    return {
      error: error.message,
      type: error.name,
      code: 1,
      hint: verbose ? undefined : 'Run with --verbose for more details',
      stack: verbose ? error.stack : undefined,
    };
  }
  return { error: String(error), type: typeof error, code: 1 };
}

/**
 * Format an error for display.
 *
 * Kept separate from handleError so it can be tested without process.exit.
 */
export function formatError(error: unknown, options: ErrorHandlerOptions = {}): string {
  const { verbose = false, json = false } = options;
  const output = toErrorOutput(error, verbose);

  if (json) {
    return JSON.stringify(output, null, 2);
  }

  const lines = [chalk.red('Error: ') + output.error];
  if (output.hint) {
    lines.push(chalk.dim('Hint: ') + output.hint);
  }
  if (output.stack) {
    lines.push('', chalk.dim('Stack trace:'), chalk.dim(output.stack));
  }
  return lines.join('\n');
}

/**
 * CLIError carries its own code, everything else is 1.
 */
export function getExitCode(error: unknown): number {
  return error instanceof CLIError ? error.code : 1;
}

/**
 * Print the error to stderr and exit with its code.
 */
export function handleError(error: unknown, options: ErrorHandlerOptions = {}): never {
  console.error(formatError(error, options));
  process.exit(getExitCode(error));
}

/**
 * Handler for process 'uncaughtException' / 'unhandledRejection' events.
 */
export function createGlobalErrorHandler(
  options: ErrorHandlerOptions = {}
): (error: unknown) => never {
  return (error: unknown) => handleError(error, options);
}
