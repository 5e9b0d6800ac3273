/**
 * Argument parsing helpers shared by the commands.
 */

import { isSuggestionStatus, type SuggestionStatus } from '../../concepts/types.js';
import { CliUsageError } from './errorHandling.js';

/**
 * Returns the positional argument at `index` or fails with a usage error.
 *
 * @param positionals - Positional arguments.
 * @param index - Position to read.
 * @param name - Argument name for the error message.
 */
export function requirePositional(positionals: string[], index: number, name: string): string {
  const value = positionals[index];
  if (value === undefined || value.trim() === '') {
    throw new CliUsageError(`Missing required argument <${name}>`);
  }
  return value;
}

/**
 * Parses a positive integer argument.
 *
 * @param value - Raw argument.
 * @param name - Argument name for the error message.
 */
export function parsePositiveInteger(value: string, name: string): number {
  if (!/^[0-9]+$/.test(value)) {
    throw new CliUsageError(`${name} must be a positive integer, got '${value}'`);
  }
  const parsed = Number(value);
  if (!Number.isSafeInteger(parsed) || parsed < 1) {
    throw new CliUsageError(`${name} must be a positive integer, got '${value}'`);
  }
  return parsed;
}

/**
 * Parses a suggestion status, case-insensitively.
 *
 * @param value - Raw argument.
 */
export function parseStatus(value: string): SuggestionStatus {
  const upper = value.toUpperCase();
  if (!isSuggestionStatus(upper)) {
    throw new CliUsageError(
      `Invalid status '${value}': expected OPEN, ADDRESSED or IGNORED`
    );
  }
  return upper;
}
