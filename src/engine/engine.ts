/**
 * Design Analysis Engine facade.
 *
 * Runs the analysis pipeline for one project: reconcile the version,
 * auto-resolve OPEN suggestions, analyse and score the text, optionally
 * enrich the findings, persist new suggestions, snapshot the version and
 * write the project aggregate.
 *
 * @packageDocumentation
 */

import { analyze, detectDomains } from '../analysis/analyzer.js';
import { score } from '../analysis/scorer.js';
import type { ConceptDictionary, SuggestionStatus } from '../concepts/types.js';
import { ExplanationEnricher, applyExplanations } from '../enrichment/enricher.js';
import { buildEvolution, type DesignEvolution } from '../lifecycle/evolution.js';
import { SuggestionLifecycle } from '../lifecycle/suggestions.js';
import { VersionReconciler } from '../lifecycle/versions.js';
import type { AnalysisStore, DesignVersion, Suggestion } from '../store/types.js';
import { Logger } from '../utils/logger.js';
import { emptyAnalysisPayload, type AnalysisPayload } from './types.js';

/**
 * Options for creating a DesignAnalysisEngine.
 */
export interface DesignAnalysisEngineOptions {
  readonly store: AnalysisStore;
  readonly dictionary: ConceptDictionary;
  /** Enricher for findings; defaults to rule-only mode. */
  readonly enricher?: ExplanationEnricher | undefined;
  readonly logger?: Logger | undefined;
  /** Optional function to get current time (for testing). */
  readonly now?: (() => Date) | undefined;
}

/**
 * Entry point for analysis requests.
 *
 * Analyses of the same project must not run concurrently; the caller
 * serializes them.
 *
 * @example
 * ```typescript
 * const engine = new DesignAnalysisEngine({ store, dictionary });
 * const payload = await engine.runAnalysis('checkout');
 * console.log(payload.maturityReason);
 * ```
 */
export class DesignAnalysisEngine {
  private readonly store: AnalysisStore;
  private readonly dictionary: ConceptDictionary;
  private readonly enricher: ExplanationEnricher;
  private readonly lifecycle: SuggestionLifecycle;
  private readonly versions: VersionReconciler;
  private readonly logger: Logger;
  private readonly now: () => Date;

  /**
   * Creates a new DesignAnalysisEngine.
   *
   * @param options - Store, dictionary, enricher, logger and clock.
   */
  constructor(options: DesignAnalysisEngineOptions) {
    this.store = options.store;
    this.dictionary = options.dictionary;
    this.logger = options.logger ?? new Logger({ component: 'DesignAnalysisEngine' });
    this.now = options.now ?? ((): Date => new Date());
    this.enricher =
      options.enricher ??
      new ExplanationEnricher({
        generator: null,
        logger: this.logger.child('ExplanationEnricher'),
      });
    this.lifecycle = new SuggestionLifecycle({
      store: this.store,
      dictionary: this.dictionary,
      now: this.now,
      logger: this.logger.child('SuggestionLifecycle'),
    });
    this.versions = new VersionReconciler({
      store: this.store,
      now: this.now,
      logger: this.logger.child('VersionReconciler'),
    });
  }

  /**
   * Analyses the project's current design text.
   *
   * A missing project yields the zero payload and writes nothing. Enrichment
   * failures never block the rest of the pipeline.
   *
   * @param projectId - Project to analyse.
   * @returns Version, all suggestions, maturity and counters.
   */
  async runAnalysis(projectId: string): Promise<AnalysisPayload> {
    const project = await this.store.getProject(projectId);
    if (project === null) {
      this.logger.warn('analysis_no_content', { projectId });
      return emptyAnalysisPayload();
    }

    const content = project.content;
    const designVersion = await this.versions.reconcile(projectId, content);
    this.logger.info('analysis_started', {
      projectId,
      version: designVersion,
      previousVersion: project.currentVersion,
      contentLength: content.length,
    });

    const newlyAddressedCount = await this.lifecycle.autoResolve(projectId, content, designVersion);
    const maturity = score(content, this.dictionary);

    const findings = analyze(content, this.dictionary);
    this.logger.debug('analysis_findings', {
      projectId,
      titles: findings.map((finding) => finding.title),
      domains: detectDomains(content, this.dictionary),
    });

    const explanations = await this.enricher.enrich(content, findings);
    const enriched = applyExplanations(findings, explanations);

    const created = await this.lifecycle.createMissing(projectId, enriched, designVersion);

    const open = await this.store.listSuggestions(projectId, 'OPEN');
    await this.versions.snapshot(projectId, content, designVersion, maturity.score, open.length);

    await this.store.updateProjectAnalysis(projectId, {
      status: 'ANALYZED',
      maturityScore: maturity.score,
      maturityReason: maturity.reason,
      currentVersion: designVersion,
      updatedAt: this.now().toISOString(),
    });

    const suggestions = await this.store.listSuggestions(projectId);
    this.logger.info('analysis_completed', {
      projectId,
      version: designVersion,
      addressed: newlyAddressedCount,
      created: created.length,
      open: open.length,
      maturityScore: maturity.score,
    });

    return {
      designVersion,
      suggestions,
      maturityScore: maturity.score,
      maturityReason: maturity.reason,
      newlyAddressedCount,
      newSuggestionsCount: created.length,
    };
  }

  /**
   * Lists a project's suggestions, newest first.
   *
   * @param projectId - Project id.
   * @param status - Optional status filter.
   */
  listSuggestions(projectId: string, status?: SuggestionStatus): Promise<Suggestion[]> {
    return this.store.listSuggestions(projectId, status);
  }

  /**
   * Changes a suggestion's status on request.
   *
   * @param suggestionId - Suggestion to change.
   * @param status - Target status.
   * @param version - Version to stamp when marking ADDRESSED.
   * @throws SuggestionNotFoundError if the id does not exist.
   */
  updateSuggestionStatus(
    suggestionId: number,
    status: SuggestionStatus,
    version?: number
  ): Promise<Suggestion> {
    return this.lifecycle.manualSetStatus(suggestionId, status, version);
  }

  /**
   * Lists a project's snapshots in ascending version order.
   *
   * @param projectId - Project id.
   */
  getVersions(projectId: string): Promise<DesignVersion[]> {
    return this.store.listVersions(projectId);
  }

  /**
   * Returns the project's version history, or null for an unknown project.
   *
   * @param projectId - Project id.
   */
  async getEvolution(projectId: string): Promise<DesignEvolution | null> {
    const project = await this.store.getProject(projectId);
    if (project === null) {
      return null;
    }
    return buildEvolution(project, await this.store.listVersions(projectId));
  }
}
