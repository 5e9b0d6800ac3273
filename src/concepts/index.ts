/**
 * Concept dictionary and keyword matching.
 *
 * @packageDocumentation
 */

export {
  CATEGORIES,
  MAX_MATURITY_SCORE,
  SEVERITIES,
  SUGGESTION_STATUSES,
  PROJECT_STATUSES,
  isCategory,
  isSuggestionStatus,
} from './types.js';
export type {
  Category,
  Severity,
  SuggestionStatus,
  ProjectStatus,
  ConceptRule,
  DomainRule,
  MaturityGroup,
  ConceptDictionary,
} from './types.js';
export {
  ConceptDictionaryError,
  createConceptDictionary,
  findRuleByTitle,
  getDefaultDictionaryPath,
  loadConceptDictionary,
} from './dictionary.js';
export { findMatchingKeyword, matches } from './matcher.js';
