/**
 * Core vocabulary of the design analysis engine.
 *
 * @packageDocumentation
 */

/**
 * Architectural area a suggestion belongs to.
 */
export type Category =
  | 'CACHING'
  | 'SCALABILITY'
  | 'SECURITY'
  | 'RELIABILITY'
  | 'PERFORMANCE'
  | 'DATABASE'
  | 'API_DESIGN'
  | 'GENERAL';

/**
 * All categories, in display order.
 */
export const CATEGORIES: readonly Category[] = [
  'CACHING',
  'SCALABILITY',
  'SECURITY',
  'RELIABILITY',
  'PERFORMANCE',
  'DATABASE',
  'API_DESIGN',
  'GENERAL',
] as const;

/** Highest maturity score; one point per maturity group. */
export const MAX_MATURITY_SCORE = 5;

/**
 * How urgently a gap should be closed.
 */
export type Severity = 'INFO' | 'WARNING' | 'CRITICAL';

/**
 * All severities, least urgent first.
 */
export const SEVERITIES: readonly Severity[] = ['INFO', 'WARNING', 'CRITICAL'] as const;

/**
 * Lifecycle state of a persisted suggestion.
 *
 * @remarks
 * OPEN suggestions are re-checked on every analysis and move to ADDRESSED
 * when one of their trigger keywords appears. ADDRESSED and IGNORED are only
 * left through a manual status change.
 */
export type SuggestionStatus = 'OPEN' | 'ADDRESSED' | 'IGNORED';

/**
 * All suggestion statuses.
 */
export const SUGGESTION_STATUSES: readonly SuggestionStatus[] = [
  'OPEN',
  'ADDRESSED',
  'IGNORED',
] as const;

/**
 * Status of a project aggregate.
 */
export type ProjectStatus = 'DRAFT' | 'IN_PROGRESS' | 'ANALYZED';

/**
 * All project statuses.
 */
export const PROJECT_STATUSES: readonly ProjectStatus[] = [
  'DRAFT',
  'IN_PROGRESS',
  'ANALYZED',
] as const;

/**
 * Type guard for Category.
 */
export function isCategory(value: unknown): value is Category {
  return CATEGORIES.some((category) => category === value);
}

/**
 * Type guard for SuggestionStatus.
 */
export function isSuggestionStatus(value: unknown): value is SuggestionStatus {
  return SUGGESTION_STATUSES.some((status) => status === value);
}

/**
 * A fixed rule: emits a finding when none of its keywords appear in a design.
 */
export interface ConceptRule {
  /** Keywords whose presence means the concept is covered. Never empty. */
  readonly keywords: readonly string[];
  /** Unique title, also the deduplication key for suggestions. */
  readonly title: string;
  readonly description: string;
  readonly category: Category;
  readonly severity: Severity;
}

/**
 * A domain-conditional rule: fires when a domain hint is present but the
 * concept it depends on is not.
 */
export interface DomainRule {
  /** Name of the domain-hint set, for logging. */
  readonly domain: string;
  /** Any of these marks the design as belonging to the domain. */
  readonly hintKeywords: readonly string[];
  /** Any of these means the requirement is already met. */
  readonly requiredKeywords: readonly string[];
  readonly title: string;
  readonly description: string;
  readonly category: Category;
  readonly severity: Severity;
}

/**
 * One of the five concept groups that make up the maturity score.
 */
export interface MaturityGroup {
  readonly name: string;
  /** Union of the group's keyword buckets. */
  readonly keywords: readonly string[];
  /** Shown in the maturity reason when the group is present. */
  readonly description: string;
}

/**
 * The immutable concept dictionary shared by the analyzer, the scorer and
 * the suggestion lifecycle.
 */
export interface ConceptDictionary {
  /** Named keyword buckets. */
  readonly buckets: Readonly<Record<string, readonly string[]>>;
  /** Named domain-hint sets. */
  readonly domainHints: Readonly<Record<string, readonly string[]>>;
  /** Fixed rules, in evaluation order. */
  readonly rules: readonly ConceptRule[];
  /** Domain-conditional rules, evaluated after the fixed rules. */
  readonly domainRules: readonly DomainRule[];
  /** Maturity groups, in scoring order. */
  readonly maturityGroups: readonly MaturityGroup[];
}
