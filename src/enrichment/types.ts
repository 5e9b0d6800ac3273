/**
 * Types for LLM enrichment of findings.
 *
 * Defines the text generator capability, its result union and the
 * explanation records produced from generator output.
 *
 * @packageDocumentation
 */

import type { Category } from '../concepts/types.js';

/**
 * A request to a text generator.
 */
export interface GeneratorRequest {
  /** The user prompt. */
  readonly prompt: string;
  /** Instructions sent ahead of the prompt. */
  readonly systemPrompt: string;
  /** Upper bound on the call, in milliseconds. */
  readonly timeoutMs: number;
}

/**
 * Raw output of a successful generator call.
 */
export interface GeneratorResponse {
  /** Generated text, expected to be a JSON document. */
  readonly content: string;
  /** Generator that produced the content (e.g. 'openrouter'). */
  readonly provider: string;
  /** Wall-clock latency in milliseconds. */
  readonly latencyMs: number;
}

/**
 * Discriminant for generator failures.
 */
export type GeneratorErrorKind =
  | 'TimeoutError'
  | 'NetworkError'
  | 'ProviderError'
  | 'EmptyResponseError'
  | 'MalformedOutputError'
  | 'SchemaViolationError'
  | 'UnexpectedError';

/**
 * A generator failure. Failures are values, not exceptions, so that the
 * enricher can log them and fall back to unenriched findings.
 */
export interface GeneratorError {
  readonly kind: GeneratorErrorKind;
  readonly message: string;
  /** Whether repeating the call could succeed. */
  readonly retryable: boolean;
  /** HTTP status or process exit code, when one was received. */
  readonly statusCode?: number;
  /** The underlying error, if any. */
  readonly cause?: Error;
}

/**
 * Result of a generator call.
 */
export type GeneratorResult =
  | { readonly success: true; readonly response: GeneratorResponse }
  | { readonly success: false; readonly error: GeneratorError };

/**
 * A text generator backing the enrichment adapter.
 *
 * Implementations should return failures as results; the enricher also
 * tolerates thrown errors.
 */
export interface Generator {
  /** Short name used in logs. */
  readonly name: string;
  /**
   * Runs one generation.
   *
   * @param request - Prompt, system prompt and timeout.
   * @returns The generated content or a failure.
   */
  generate(request: GeneratorRequest): Promise<GeneratorResult>;
}

const RETRYABLE_KINDS: ReadonlySet<GeneratorErrorKind> = new Set<GeneratorErrorKind>([
  'TimeoutError',
  'NetworkError',
]);

/**
 * Creates a GeneratorError.
 *
 * @param kind - Failure kind.
 * @param message - Human-readable message.
 * @param options - Optional status code and cause.
 * @returns The error value.
 */
export function createGeneratorError(
  kind: GeneratorErrorKind,
  message: string,
  options?: { statusCode?: number; cause?: Error }
): GeneratorError {
  const base: GeneratorError = { kind, message, retryable: RETRYABLE_KINDS.has(kind) };

  // Build conditionally to satisfy exactOptionalPropertyTypes
  const { statusCode, cause } = options ?? {};
  if (statusCode !== undefined && cause !== undefined) {
    return { ...base, statusCode, cause };
  }
  if (statusCode !== undefined) {
    return { ...base, statusCode };
  }
  if (cause !== undefined) {
    return { ...base, cause };
  }
  return base;
}

/**
 * Creates a successful result.
 */
export function createSuccessResult(
  response: GeneratorResponse
): Extract<GeneratorResult, { success: true }> {
  return { success: true, response };
}

/**
 * Creates a failure result.
 */
export function createFailureResult(
  error: GeneratorError
): Extract<GeneratorResult, { success: false }> {
  return { success: false, error };
}

/**
 * Explanation of why a category of gap matters.
 */
export interface Explanation {
  readonly category: Category;
  readonly whyItMatters: string;
  readonly interviewAngle: string;
  readonly productionAngle: string;
}

/**
 * Explanations keyed by category. One entry per category; the last
 * explanation received for a category wins.
 */
export type ExplanationMap = ReadonlyMap<Category, Explanation>;

/**
 * Outcome of an enrichment request.
 *
 * - `skipped`: nothing to do (no generator configured, or no findings)
 * - `enriched`: the generator answered with valid explanations
 * - `failed`: the generator call or its output was unusable
 */
export type EnrichmentResult =
  | { readonly status: 'skipped'; readonly reason: string }
  | { readonly status: 'enriched'; readonly explanations: ExplanationMap }
  | { readonly status: 'failed'; readonly error: GeneratorError };
