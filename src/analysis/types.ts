/**
 * Types produced by rule analysis and maturity scoring.
 *
 * @packageDocumentation
 */

import type { Category, Severity } from '../concepts/types.js';

/**
 * A gap detected in a design. Findings are not persisted; the suggestion
 * lifecycle turns new ones into suggestions.
 */
export interface Finding {
  readonly title: string;
  readonly description: string;
  readonly category: Category;
  readonly severity: Severity;
  /** The rule's own keyword list, re-checked on later analyses. */
  readonly triggerKeywords: readonly string[];
}

/**
 * Maturity score and its human-readable explanation.
 */
export interface MaturityResult {
  /** Number of maturity groups present, 0 to 5. */
  readonly score: number;
  readonly reason: string;
}
