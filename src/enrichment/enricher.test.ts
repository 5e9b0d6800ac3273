import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from 'vitest';
import type { Finding } from '../analysis/types.js';
import { Logger } from '../utils/logger.js';
import { ExplanationEnricher, applyExplanations } from './enricher.js';
import { SYSTEM_PROMPT } from './prompts.js';
import {
  createFailureResult,
  createGeneratorError,
  createSuccessResult,
  type Explanation,
  type Generator,
  type GeneratorRequest,
  type GeneratorResult,
} from './types.js';

const cacheFinding: Finding = {
  title: 'Consider Adding Caching Layer',
  description: 'No cache.',
  category: 'CACHING',
  severity: 'WARNING',
  triggerKeywords: ['cache', 'redis'],
};

const authFinding: Finding = {
  title: 'Define Authentication & Authorization',
  description: 'No auth.',
  category: 'SECURITY',
  severity: 'CRITICAL',
  triggerKeywords: ['auth'],
};

function explanationJson(category: string, why = 'Reads get much faster.'): Record<string, string> {
  return {
    category,
    why_it_matters: why,
    interview_angle: 'Asked about invalidation.',
    production_angle: 'Database melts at peak.',
  };
}

type GenerateFn = (request: GeneratorRequest) => Promise<GeneratorResult>;

interface StubGenerator extends Generator {
  readonly generate: Mock<GenerateFn>;
}

function stubGenerator(implementation: GenerateFn): StubGenerator {
  return { name: 'stub', generate: vi.fn(implementation) };
}

function answering(body: unknown): StubGenerator {
  return stubGenerator(() =>
    Promise.resolve(
      createSuccessResult({ content: JSON.stringify(body), provider: 'stub', latencyMs: 1 })
    )
  );
}

function createEnricher(
  generator: Generator | null,
  timeoutMs = 1000,
  excerptLimit = 2000
): ExplanationEnricher {
  return new ExplanationEnricher({
    generator,
    timeoutMs,
    excerptLimit,
    logger: new Logger({ component: 'ExplanationEnricher' }),
  });
}

describe('ExplanationEnricher', () => {
  beforeEach(() => {
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  describe('requestExplanations', () => {
    it('should skip without a generator', async () => {
      const enricher = createEnricher(null);

      expect(enricher.isEnabled).toBe(false);
      expect(await enricher.requestExplanations('design', [cacheFinding])).toEqual({
        status: 'skipped',
        reason: 'no generator configured',
      });
    });

    it('should skip without findings and never call the generator', async () => {
      const generator = answering({ explanations: [] });

      const result = await createEnricher(generator).requestExplanations('design', []);

      expect(result).toEqual({ status: 'skipped', reason: 'no findings' });
      expect(generator.generate).not.toHaveBeenCalled();
    });

    it('should send one prompt with the system prompt, timeout and excerpt', async () => {
      const generator = answering({ explanations: [] });

      await createEnricher(generator, 750, 6).requestExplanations('REST API on Postgres', [
        cacheFinding,
        authFinding,
      ]);

      expect(generator.generate).toHaveBeenCalledTimes(1);
      const sent = generator.generate.mock.calls[0]?.[0];
      expect(sent?.systemPrompt).toBe(SYSTEM_PROMPT);
      expect(sent?.timeoutMs).toBe(750);
      expect(sent?.prompt).toContain('REST A... [truncated]');
      expect(sent?.prompt).toContain(
        '- CACHING: Consider Adding Caching Layer\n- SECURITY: Define Authentication & Authorization'
      );
    });

    it('should key explanations by category with the last one winning', async () => {
      const generator = answering({
        explanations: [
          explanationJson('caching', 'First caching text.'),
          explanationJson('SECURITY'),
          explanationJson('CACHING', 'Second caching text.'),
        ],
      });

      const result = await createEnricher(generator).requestExplanations('d', [cacheFinding]);

      expect(result.status).toBe('enriched');
      if (result.status === 'enriched') {
        expect(result.explanations.size).toBe(2);
        expect(result.explanations.get('CACHING')?.whyItMatters).toBe('Second caching text.');
      }
    });

    it('should report generator failures', async () => {
      const generator = stubGenerator(() =>
        Promise.resolve(
          createFailureResult(createGeneratorError('ProviderError', 'HTTP 500', { statusCode: 500 }))
        )
      );

      const result = await createEnricher(generator).requestExplanations('d', [cacheFinding]);

      expect(result.status === 'failed' && result.error.kind).toBe('ProviderError');
    });

    it('should report unusable output as a failure', async () => {
      const generator = answering({ explanations: [explanationJson('TELEPORTATION')] });

      const result = await createEnricher(generator).requestExplanations('d', [cacheFinding]);

      expect(result.status === 'failed' && result.error.kind).toBe('SchemaViolationError');
    });

    it('should turn thrown errors into UnexpectedError', async () => {
      const generator = stubGenerator(() => Promise.reject(new Error('socket hang up')));

      const result = await createEnricher(generator).requestExplanations('d', [cacheFinding]);

      expect(result).toMatchObject({
        status: 'failed',
        error: { kind: 'UnexpectedError', message: 'Generator threw: socket hang up' },
      });
    });

    it('should give up on a generator that never answers', async () => {
      vi.useFakeTimers();
      const generator = stubGenerator(() => new Promise<GeneratorResult>(() => undefined));

      const pending = createEnricher(generator, 500).requestExplanations('d', [cacheFinding]);
      await vi.advanceTimersByTimeAsync(500);
      const result = await pending;

      expect(result).toMatchObject({
        status: 'failed',
        error: { kind: 'TimeoutError', message: 'Generator did not answer within 500ms' },
      });
      expect(vi.getTimerCount()).toBe(0);
    });

    it('should clear its timer when the generator answers first', async () => {
      vi.useFakeTimers();
      const generator = answering({ explanations: [] });

      await createEnricher(generator, 500).requestExplanations('d', [cacheFinding]);

      expect(vi.getTimerCount()).toBe(0);
    });
  });

  describe('enrich', () => {
    it('should return an empty map on failure', async () => {
      const generator = stubGenerator(() => Promise.reject(new Error('down')));

      const map = await createEnricher(generator).enrich('d', [cacheFinding]);

      expect(map.size).toBe(0);
    });

    it('should return the explanations on success', async () => {
      const generator = answering({ explanations: [explanationJson('CACHING')] });

      const map = await createEnricher(generator).enrich('d', [cacheFinding]);

      expect([...map.keys()]).toEqual(['CACHING']);
    });
  });
});

describe('applyExplanations', () => {
  const explanation: Explanation = {
    category: 'CACHING',
    whyItMatters: 'Reads get much faster.',
    interviewAngle: 'Asked about invalidation.',
    productionAngle: 'Database melts at peak.',
  };

  it('should append the three sections to matching findings', () => {
    const [enriched] = applyExplanations([cacheFinding], new Map([['CACHING', explanation]]));

    expect(enriched?.description).toBe(
      'No cache.\n\n' +
        '**Why It Matters:** Reads get much faster.\n\n' +
        '**Interview Perspective:** Asked about invalidation.\n\n' +
        '**Production Reality:** Database melts at peak.'
    );
    expect(enriched?.title).toBe(cacheFinding.title);
    expect(enriched?.triggerKeywords).toBe(cacheFinding.triggerKeywords);
  });

  it('should return findings without an entry unchanged', () => {
    const result = applyExplanations([cacheFinding, authFinding], new Map([['CACHING', explanation]]));

    expect(result[1]).toBe(authFinding);
    expect(cacheFinding.description).toBe('No cache.');
  });

  it('should return every finding unchanged for an empty map', () => {
    const result = applyExplanations([cacheFinding, authFinding], new Map());
    expect(result).toEqual([cacheFinding, authFinding]);
    expect(result[0]).toBe(cacheFinding);
  });
});
