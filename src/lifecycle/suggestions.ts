/**
 * Suggestion lifecycle: automatic resolution, deduplicated creation and
 * manual status changes.
 *
 * @packageDocumentation
 */

import type { Finding } from '../analysis/types.js';
import { findRuleByTitle } from '../concepts/dictionary.js';
import { findMatchingKeyword } from '../concepts/matcher.js';
import type { ConceptDictionary, SuggestionStatus } from '../concepts/types.js';
import { DuplicateSuggestionError, SuggestionNotFoundError } from '../store/errors.js';
import type { Suggestion, SuggestionStatusUpdate, SuggestionStore } from '../store/types.js';
import { Logger } from '../utils/logger.js';

/**
 * Options for creating a SuggestionLifecycle.
 */
export interface SuggestionLifecycleOptions {
  readonly store: SuggestionStore;
  readonly dictionary: ConceptDictionary;
  /** Optional function to get current time (for testing). */
  readonly now?: (() => Date) | undefined;
  readonly logger?: Logger | undefined;
}

/**
 * Computes the status update for a manual change.
 *
 * ADDRESSED stamps the time and, when a version is given, the version;
 * without a version the previous addressedInVersion stays. OPEN clears
 * both stamps. IGNORED changes the status only.
 *
 * @param current - Suggestion before the change.
 * @param status - Target status.
 * @param at - ISO timestamp for ADDRESSED.
 * @param version - Design version the change belongs to.
 */
export function statusUpdateFor(
  current: Suggestion,
  status: SuggestionStatus,
  at: string,
  version?: number
): SuggestionStatusUpdate {
  switch (status) {
    case 'ADDRESSED':
      return {
        status,
        addressedAt: at,
        addressedInVersion: version ?? current.addressedInVersion,
      };
    case 'OPEN':
      return { status, addressedAt: null, addressedInVersion: null };
    case 'IGNORED':
      return {
        status,
        addressedAt: current.addressedAt,
        addressedInVersion: current.addressedInVersion,
      };
  }
}

/**
 * Manages persisted suggestions for projects.
 */
export class SuggestionLifecycle {
  private readonly store: SuggestionStore;
  private readonly dictionary: ConceptDictionary;
  private readonly now: () => Date;
  private readonly logger: Logger;

  /**
   * Creates a new SuggestionLifecycle.
   *
   * @param options - Store, dictionary, clock and logger.
   */
  constructor(options: SuggestionLifecycleOptions) {
    this.store = options.store;
    this.dictionary = options.dictionary;
    this.now = options.now ?? ((): Date => new Date());
    this.logger = options.logger ?? new Logger({ component: 'SuggestionLifecycle' });
  }

  /**
   * Marks OPEN suggestions ADDRESSED when the content now mentions one of
   * their trigger keywords.
   *
   * Suggestions without stored keywords fall back to the fixed rule with the
   * same title. Suggestions with neither are never auto-resolved.
   *
   * @param projectId - Project to scan.
   * @param content - Current design text.
   * @param newVersion - Version being analysed.
   * @returns Number of suggestions resolved.
   */
  async autoResolve(projectId: string, content: string, newVersion: number): Promise<number> {
    const open = await this.store.listSuggestions(projectId, 'OPEN');
    const addressedAt = this.now().toISOString();
    let resolved = 0;

    for (const suggestion of open) {
      const keywords =
        suggestion.triggerKeywords.length > 0
          ? suggestion.triggerKeywords
          : findRuleByTitle(this.dictionary, suggestion.title)?.keywords;

      if (keywords === undefined) {
        this.logger.debug('auto_resolve_skipped', {
          suggestionId: suggestion.id,
          title: suggestion.title,
        });
        continue;
      }

      const keyword = findMatchingKeyword(content, keywords);
      if (keyword === undefined) {
        continue;
      }

      await this.store.updateSuggestionStatus(suggestion.id, {
        status: 'ADDRESSED',
        addressedAt,
        addressedInVersion: newVersion,
      });
      resolved += 1;
      this.logger.info('suggestion_auto_resolved', {
        suggestionId: suggestion.id,
        title: suggestion.title,
        keyword,
        version: newVersion,
      });
    }

    return resolved;
  }

  /**
   * Persists findings whose title the project has never had, in any status.
   *
   * @param projectId - Project the findings belong to.
   * @param findings - Findings in analysis order.
   * @param version - Version being analysed.
   * @returns Suggestions actually created.
   */
  async createMissing(
    projectId: string,
    findings: readonly Finding[],
    version: number
  ): Promise<Suggestion[]> {
    const existing = await this.store.listSuggestions(projectId);
    const seen = new Set(existing.map((suggestion) => suggestion.title));
    const createdAt = this.now().toISOString();
    const created: Suggestion[] = [];

    for (const finding of findings) {
      if (seen.has(finding.title)) {
        continue;
      }
      seen.add(finding.title);

      try {
        created.push(
          await this.store.insertSuggestion({
            projectId,
            title: finding.title,
            description: finding.description,
            category: finding.category,
            severity: finding.severity,
            designVersion: version,
            triggerKeywords: finding.triggerKeywords,
            createdAt,
          })
        );
      } catch (error) {
        if (!(error instanceof DuplicateSuggestionError)) {
          throw error;
        }
        this.logger.info('suggestion_insert_raced', { projectId, title: finding.title });
      }
    }

    return created;
  }

  /**
   * Changes a suggestion's status on request.
   *
   * @param suggestionId - Suggestion to change.
   * @param status - Target status.
   * @param version - Version to stamp when marking ADDRESSED.
   * @returns The updated suggestion.
   * @throws SuggestionNotFoundError if the id does not exist.
   */
  async manualSetStatus(
    suggestionId: number,
    status: SuggestionStatus,
    version?: number
  ): Promise<Suggestion> {
    const current = await this.store.getSuggestion(suggestionId);
    if (current === null) {
      throw new SuggestionNotFoundError(suggestionId);
    }

    const update = statusUpdateFor(current, status, this.now().toISOString(), version);
    const updated = await this.store.updateSuggestionStatus(suggestionId, update);
    if (updated === null) {
      throw new SuggestionNotFoundError(suggestionId);
    }

    this.logger.info('suggestion_status_changed', {
      suggestionId,
      from: current.status,
      to: status,
    });
    return updated;
  }
}
