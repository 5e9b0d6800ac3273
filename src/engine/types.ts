/**
 * Engine result types.
 *
 * @packageDocumentation
 */

import type { Suggestion } from '../store/types.js';

/** Reason reported when a project does not exist. */
export const NO_DESIGN_CONTENT_REASON = 'No design content found';

/**
 * Result of one analysis run.
 */
export interface AnalysisPayload {
  /** Version the analysis belongs to; 0 when the project does not exist. */
  readonly designVersion: number;
  /** Every suggestion of the project, newest first. */
  readonly suggestions: readonly Suggestion[];
  readonly maturityScore: number;
  readonly maturityReason: string;
  /** Suggestions auto-resolved by this run. */
  readonly newlyAddressedCount: number;
  /** Suggestions created by this run. */
  readonly newSuggestionsCount: number;
}

/**
 * Payload returned for a project that does not exist. Nothing is persisted.
 */
export function emptyAnalysisPayload(): AnalysisPayload {
  return {
    designVersion: 0,
    suggestions: [],
    maturityScore: 0,
    maturityReason: NO_DESIGN_CONTENT_REASON,
    newlyAddressedCount: 0,
    newSuggestionsCount: 0,
  };
}
