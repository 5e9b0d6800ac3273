/**
 * Suggestion lifecycle, versioning and evolution history.
 *
 * @packageDocumentation
 */

export { SuggestionLifecycle, statusUpdateFor } from './suggestions.js';
export type { SuggestionLifecycleOptions } from './suggestions.js';
export { VersionReconciler } from './versions.js';
export type { VersionReconcilerOptions } from './versions.js';
export { buildEvolution, summarizeProgress, NO_HISTORY_SUMMARY } from './evolution.js';
export type { DesignEvolution } from './evolution.js';
