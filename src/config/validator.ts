/**
 * Semantic validation for configuration values.
 *
 * Type checks happen in the parser; this module checks ranges and
 * cross-field requirements:
 * - Timeouts, token limits and excerpt limits are positive
 * - Temperature lies within the range providers accept
 * - The HTTP endpoint is an http(s) URL
 * - The command provider has a command when LLM enrichment is enabled
 *
 * @packageDocumentation
 */

import type { Config } from './types.js';

/**
 * Error class for semantic validation errors.
 */
export class ConfigValidationError extends Error {
  /** Array of validation failure details. */
  public readonly errors: ValidationError[];

  /**
   * Creates a new ConfigValidationError.
   *
   * @param message - Summary error message.
   * @param errors - Array of specific validation errors.
   */
  constructor(message: string, errors: ValidationError[]) {
    super(message);
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}

/**
 * Individual validation error details.
 */
export interface ValidationError {
  /** The field path that failed validation. */
  field: string;
  /** The invalid value that was provided. */
  value: unknown;
  /** Human-readable description of the validation failure. */
  message: string;
}

/**
 * Result of a validation operation.
 */
export interface ValidationResult {
  /** Whether validation passed. */
  valid: boolean;
  /** Array of validation errors (empty if valid). */
  errors: ValidationError[];
}

function checkPositive(value: number, field: string, errors: ValidationError[]): void {
  if (!Number.isFinite(value) || value <= 0) {
    errors.push({ field, value, message: `${field} must be a finite positive number` });
  }
}

/** Largest timeout whose millisecond value still fits a Node.js timer. */
export const MAX_TIMEOUT_SECONDS = 2_147_483;

function checkPositiveInteger(value: number, field: string, errors: ValidationError[]): void {
  if (!Number.isInteger(value) || value <= 0) {
    errors.push({ field, value, message: `${field} must be a positive integer` });
  }
}

function checkHttpUrl(value: string, field: string, errors: ValidationError[]): void {
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    errors.push({ field, value, message: `${field} must be a valid URL` });
    return;
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    errors.push({ field, value, message: `${field} must use http or https` });
  }
}

/**
 * Validates a configuration semantically.
 *
 * @param config - The configuration to validate.
 * @returns Validation result with every problem found.
 */
export function validateConfig(config: Config): ValidationResult {
  const errors: ValidationError[] = [];
  const { llm, analysis, store } = config;

  checkPositive(llm.timeout_seconds, 'llm.timeout_seconds', errors);
  if (llm.timeout_seconds > MAX_TIMEOUT_SECONDS) {
    errors.push({
      field: 'llm.timeout_seconds',
      value: llm.timeout_seconds,
      message: `llm.timeout_seconds must not exceed ${String(MAX_TIMEOUT_SECONDS)}`,
    });
  }
  checkPositiveInteger(llm.max_tokens, 'llm.max_tokens', errors);
  if (!Number.isFinite(llm.temperature) || llm.temperature < 0 || llm.temperature > 2) {
    errors.push({
      field: 'llm.temperature',
      value: llm.temperature,
      message: 'llm.temperature must be between 0 and 2',
    });
  }
  checkHttpUrl(llm.base_url, 'llm.base_url', errors);
  if (llm.enabled && llm.provider === 'command' && llm.command.trim() === '') {
    errors.push({
      field: 'llm.command',
      value: llm.command,
      message: "llm.command is required when llm.provider is 'command'",
    });
  }

  checkPositiveInteger(analysis.excerpt_limit, 'analysis.excerpt_limit', errors);

  if (store.path.trim() === '') {
    errors.push({ field: 'store.path', value: store.path, message: 'store.path cannot be empty' });
  }

  return { valid: errors.length === 0, errors };
}

/**
 * Validates a configuration and throws when it is invalid.
 *
 * @param config - The configuration to validate.
 * @throws ConfigValidationError listing every problem.
 */
export function assertConfigValid(config: Config): void {
  const result = validateConfig(config);
  if (!result.valid) {
    const details = result.errors.map((e) => `  - ${e.message}`).join('\n');
    throw new ConfigValidationError(
      `Configuration validation failed:\n${details}`,
      result.errors
    );
  }
}
