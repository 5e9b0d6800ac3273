/**
 * Shared display utilities for CLI commands.
 *
 * Provides formatting for suggestions, versions and box-drawing borders
 * used across multiple CLI commands.
 */

import type { Severity, SuggestionStatus } from '../../concepts/types.js';
import type { DesignVersion, Suggestion } from '../../store/types.js';

export interface DisplayOptions {
  colors: boolean;
  unicode: boolean;
}

export interface BorderChars {
  topLeft: string;
  topRight: string;
  bottomLeft: string;
  bottomRight: string;
  horizontal: string;
  vertical: string;
}

const ANSI_ESCAPE_PATTERN = new RegExp(String.fromCharCode(27) + '\\[[0-9;]*m', 'g');

const RESET = '\x1b[0m';

const SEVERITY_CODES: Record<Severity, string> = {
  CRITICAL: '\x1b[1;31m',
  WARNING: '\x1b[33m',
  INFO: '\x1b[2m',
};

const STATUS_CODES: Record<SuggestionStatus, string> = {
  OPEN: '\x1b[1m',
  ADDRESSED: '\x1b[32m',
  IGNORED: '\x1b[2m',
};

function paint(text: string, code: string, options: DisplayOptions): string {
  return options.colors ? `${code}${text}${RESET}` : text;
}

export function formatSeverity(severity: Severity, options: DisplayOptions): string {
  return paint(`[${severity}]`, SEVERITY_CODES[severity], options);
}

export function formatStatus(status: SuggestionStatus, options: DisplayOptions): string {
  return paint(status, STATUS_CODES[status], options);
}

/**
 * Formats one suggestion as a single line.
 *
 * @example
 * ```
 * #3 [WARNING] Implement Rate Limiting (SECURITY) OPEN
 * ```
 */
export function formatSuggestionLine(suggestion: Suggestion, options: DisplayOptions): string {
  const check = options.unicode ? '✓ ' : '';
  const marker = suggestion.status === 'ADDRESSED' ? check : '';
  const addressed =
    suggestion.status === 'ADDRESSED' && suggestion.addressedInVersion !== null
      ? ` in v${String(suggestion.addressedInVersion)}`
      : '';
  return (
    `#${String(suggestion.id)} ${formatSeverity(suggestion.severity, options)} ` +
    `${marker}${suggestion.title} (${suggestion.category}) ` +
    `${formatStatus(suggestion.status, options)}${addressed}`
  );
}

export function formatVersionLine(version: DesignVersion): string {
  return (
    `v${String(version.versionNumber)}  maturity ${String(version.maturityScore)}/5  ` +
    `open ${String(version.suggestionsCount)}  ${version.createdAt}`
  );
}

export function getBorderChars(options: DisplayOptions): BorderChars {
  if (options.unicode) {
    return {
      topLeft: '┌',
      topRight: '┐',
      bottomLeft: '└',
      bottomRight: '┘',
      horizontal: '─',
      vertical: '│',
    };
  }
  return {
    topLeft: '+',
    topRight: '+',
    bottomLeft: '+',
    bottomRight: '+',
    horizontal: '-',
    vertical: '|',
  };
}

/**
 * Strips ANSI escape sequences from a string to get visible length.
 *
 * @param str - The string potentially containing ANSI codes.
 * @returns The string with ANSI codes removed.
 */
export function stripAnsi(str: string): string {
  return str.replace(ANSI_ESCAPE_PATTERN, '');
}

export function wrapInBox(text: string, options: DisplayOptions): string {
  const border = getBorderChars(options);
  const lines = text.split('\n');
  const maxLength = Math.max(...lines.map((line) => stripAnsi(line).length));
  const horizontalBorder = border.horizontal.repeat(maxLength + 2);

  let result = border.topLeft + horizontalBorder + border.topRight + '\n';
  for (const line of lines) {
    const visibleLength = stripAnsi(line).length;
    const padding = ' '.repeat(maxLength - visibleLength);
    result += border.vertical + ' ' + line + padding + ' ' + border.vertical + '\n';
  }
  result += border.bottomLeft + horizontalBorder + border.bottomRight;

  return result;
}
