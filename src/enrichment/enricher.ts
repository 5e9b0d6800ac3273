/**
 * Best-effort LLM enrichment of findings.
 *
 * @packageDocumentation
 */

import type { Finding } from '../analysis/types.js';
import { Logger, toError } from '../utils/logger.js';
import { DEFAULT_EXCERPT_LIMIT, SYSTEM_PROMPT, buildExplanationPrompt } from './prompts.js';
import { parseExplanations, toExplanationMap } from './response-parser.js';
import {
  createGeneratorError,
  type EnrichmentResult,
  type ExplanationMap,
  type Generator,
  type GeneratorResult,
} from './types.js';

/** Default bound on a generator call. */
export const DEFAULT_ENRICHMENT_TIMEOUT_MS = 30_000;

/**
 * Options for creating an ExplanationEnricher.
 */
export interface ExplanationEnricherOptions {
  /** Generator to call; null runs in rule-only mode. */
  readonly generator: Generator | null;
  /** Bound on the generator call (default 30s). */
  readonly timeoutMs?: number;
  /** Cap on the design excerpt sent in the prompt (default 2000). */
  readonly excerptLimit?: number;
  readonly logger?: Logger | undefined;
}

const EMPTY_EXPLANATIONS: ExplanationMap = new Map();

/**
 * Asks a generator to explain why each finding matters.
 *
 * No failure escapes: without a generator, or on any generator problem, the
 * caller gets an empty map and keeps the rule-based findings as they are.
 */
export class ExplanationEnricher {
  private readonly generator: Generator | null;
  private readonly timeoutMs: number;
  private readonly excerptLimit: number;
  private readonly logger: Logger;

  /**
   * Creates a new ExplanationEnricher.
   *
   * @param options - Generator, timeout and excerpt limit.
   */
  constructor(options: ExplanationEnricherOptions) {
    this.generator = options.generator;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_ENRICHMENT_TIMEOUT_MS;
    this.excerptLimit = options.excerptLimit ?? DEFAULT_EXCERPT_LIMIT;
    this.logger = options.logger ?? new Logger({ component: 'ExplanationEnricher' });
  }

  /** Whether a generator is configured. */
  get isEnabled(): boolean {
    return this.generator !== null;
  }

  /**
   * Requests explanations and reports the outcome as a result value.
   *
   * @param content - Design text.
   * @param findings - Findings to explain.
   * @returns skipped, enriched or failed.
   */
  async requestExplanations(
    content: string,
    findings: readonly Finding[]
  ): Promise<EnrichmentResult> {
    if (this.generator === null) {
      return { status: 'skipped', reason: 'no generator configured' };
    }
    if (findings.length === 0) {
      return { status: 'skipped', reason: 'no findings' };
    }

    const prompt = buildExplanationPrompt(content, findings, this.excerptLimit);
    const result = await this.callWithTimeout(this.generator, prompt);
    if (!result.success) {
      return { status: 'failed', error: result.error };
    }

    const parsed = parseExplanations(result.response.content);
    if (!parsed.success) {
      return { status: 'failed', error: parsed.error };
    }

    return { status: 'enriched', explanations: toExplanationMap(parsed.explanations) };
  }

  /**
   * Returns explanations keyed by category, or an empty map on any failure.
   *
   * @param content - Design text.
   * @param findings - Findings to explain.
   * @returns Explanations by category.
   */
  async enrich(content: string, findings: readonly Finding[]): Promise<ExplanationMap> {
    const result = await this.requestExplanations(content, findings);

    switch (result.status) {
      case 'skipped':
        this.logger.debug('enrichment_skipped', { reason: result.reason });
        return EMPTY_EXPLANATIONS;
      case 'failed':
        this.logger.warn('enrichment_failed', {
          kind: result.error.kind,
          message: result.error.message,
        });
        return EMPTY_EXPLANATIONS;
      case 'enriched':
        this.logger.info('enrichment_succeeded', {
          findings: findings.length,
          explanations: result.explanations.size,
        });
        return result.explanations;
    }
  }

  /**
   * Runs the generator, bounded by the timeout even when the generator
   * ignores it. Thrown errors become UnexpectedError results.
   */
  private async callWithTimeout(generator: Generator, prompt: string): Promise<GeneratorResult> {
    let timeoutId: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<GeneratorResult>((resolve) => {
      timeoutId = setTimeout(() => {
        resolve({
          success: false,
          error: createGeneratorError(
            'TimeoutError',
            `Generator did not answer within ${String(this.timeoutMs)}ms`
          ),
        });
      }, this.timeoutMs);
    });

    const call = Promise.resolve()
      .then(() =>
        generator.generate({ prompt, systemPrompt: SYSTEM_PROMPT, timeoutMs: this.timeoutMs })
      )
      .catch((error: unknown): GeneratorResult => {
        const cause = toError(error);
        return {
          success: false,
          error: createGeneratorError('UnexpectedError', `Generator threw: ${cause.message}`, {
            cause,
          }),
        };
      });

    try {
      return await Promise.race([call, timeout]);
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

/**
 * Appends explanations to the descriptions of matching findings.
 *
 * Findings whose category has no explanation are returned unchanged. Two
 * findings of the same category receive the same text.
 *
 * @param findings - Rule-based findings.
 * @param explanations - Explanations by category.
 * @returns New findings with extended descriptions.
 */
export function applyExplanations(
  findings: readonly Finding[],
  explanations: ExplanationMap
): Finding[] {
  return findings.map((finding) => {
    const explanation = explanations.get(finding.category);
    if (explanation === undefined) {
      return finding;
    }
    return {
      ...finding,
      description:
        `${finding.description}\n\n` +
        `**Why It Matters:** ${explanation.whyItMatters}\n\n` +
        `**Interview Perspective:** ${explanation.interviewAngle}\n\n` +
        `**Production Reality:** ${explanation.productionAngle}`,
    };
  });
}
