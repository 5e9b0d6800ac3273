/**
 * Shared error handling utilities for CLI commands.
 *
 * Provides a wrapper function that standardizes error handling
 * across command handlers, reducing code duplication.
 */

import type { CliCommandResult } from '../types.js';

/**
 * Error thrown when the command line itself is wrong.
 */
export class CliUsageError extends Error {
  /**
   * Creates a new CliUsageError.
   *
   * @param message - What is wrong with the arguments.
   */
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

/**
 * Prints an error the way every command reports failures.
 *
 * @param error - The caught value.
 */
export function reportError(error: unknown): void {
  if (error instanceof Error) {
    console.error(`Error: ${error.message}`);
  } else {
    console.error(`Error: ${String(error)}`);
  }
  if (error instanceof CliUsageError) {
    console.error('\nRun "design-mentor help" for usage information.');
  }
}

/**
 * Wraps a command handler with standard error handling.
 *
 * Executes the provided function (sync or async) and handles any errors:
 * - On success: exits with the result's exit code
 * - On error: prints `Error: <message>` and exits with 1
 *
 * @param fn - The function to wrap (sync or async).
 */
export function withErrorHandling(fn: () => CliCommandResult | Promise<CliCommandResult>): void {
  void (async () => {
    try {
      const result = await fn();
      if (result.message !== undefined) {
        console.log(result.message);
      }
      process.exit(result.exitCode);
    } catch (error) {
      reportError(error);
      process.exit(1);
    }
  })();
}
