/**
 * Optional LLM enrichment of findings.
 *
 * @packageDocumentation
 */

export {
  ExplanationEnricher,
  applyExplanations,
  DEFAULT_ENRICHMENT_TIMEOUT_MS,
} from './enricher.js';
export type { ExplanationEnricherOptions } from './enricher.js';
export { createGenerator, isUsableApiKey } from './factory.js';
export { OpenRouterClient, OPENROUTER_REFERER } from './openrouter-client.js';
export type { OpenRouterClientOptions } from './openrouter-client.js';
export { CommandGenerator } from './command-client.js';
export type { CommandGeneratorOptions } from './command-client.js';
export {
  SYSTEM_PROMPT,
  DEFAULT_EXCERPT_LIMIT,
  TRUNCATION_MARKER,
  buildExcerpt,
  buildExplanationPrompt,
} from './prompts.js';
export type { PromptComponent } from './prompts.js';
export {
  parseExplanations,
  toExplanationMap,
  MIN_FIELD_LENGTH,
  MAX_FIELD_LENGTH,
} from './response-parser.js';
export type { ParseExplanationsResult } from './response-parser.js';
export {
  createGeneratorError,
  createSuccessResult,
  createFailureResult,
} from './types.js';
export type {
  EnrichmentResult,
  Explanation,
  ExplanationMap,
  Generator,
  GeneratorError,
  GeneratorErrorKind,
  GeneratorRequest,
  GeneratorResponse,
  GeneratorResult,
} from './types.js';
