/**
 * Builds an engine from configuration.
 *
 * @packageDocumentation
 */

import { loadConceptDictionary } from '../concepts/dictionary.js';
import type { Config } from '../config/types.js';
import { ExplanationEnricher } from '../enrichment/enricher.js';
import { createGenerator } from '../enrichment/factory.js';
import type { AnalysisStore } from '../store/types.js';
import { Logger } from '../utils/logger.js';
import { DesignAnalysisEngine } from './engine.js';

/**
 * Options for createEngine.
 */
export interface CreateEngineOptions {
  readonly store: AnalysisStore;
  readonly logger?: Logger | undefined;
  /** Optional function to get current time (for testing). */
  readonly now?: (() => Date) | undefined;
}

/**
 * Loads the configured dictionary, picks a generator and wires the engine.
 *
 * @param config - Effective configuration.
 * @param options - Store, logger and clock.
 * @throws ConceptDictionaryError if the dictionary is unusable.
 */
export async function createEngine(
  config: Config,
  options: CreateEngineOptions
): Promise<DesignAnalysisEngine> {
  const logger =
    options.logger ??
    new Logger({ component: 'DesignAnalysisEngine', debugMode: config.logging.debug });

  const dictionary =
    config.analysis.dictionary_path === ''
      ? await loadConceptDictionary()
      : await loadConceptDictionary(config.analysis.dictionary_path);

  const generator = createGenerator(config.llm, logger);
  const enricher = new ExplanationEnricher({
    generator,
    timeoutMs: config.llm.timeout_seconds * 1000,
    excerptLimit: config.analysis.excerpt_limit,
    logger: logger.child('ExplanationEnricher'),
  });

  logger.debug('engine_created', {
    generator: generator?.name ?? null,
    rules: dictionary.rules.length,
  });

  return new DesignAnalysisEngine({
    store: options.store,
    dictionary,
    enricher,
    logger,
    now: options.now,
  });
}
