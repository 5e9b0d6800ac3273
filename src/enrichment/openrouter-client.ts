/**
 * OpenRouter chat-completion generator.
 *
 * Sends an OpenAI-compatible chat completion request with `fetch`, asking for
 * a JSON object response. Failures are returned as {@link GeneratorResult}
 * values; this client never throws.
 *
 * @packageDocumentation
 */

import { Logger, toError } from '../utils/logger.js';
import {
  createFailureResult,
  createGeneratorError,
  createSuccessResult,
  type Generator,
  type GeneratorRequest,
  type GeneratorResult,
} from './types.js';

/** Referer sent with every request. */
export const OPENROUTER_REFERER = 'https://system-design-mentor.local';

/**
 * Options for creating an OpenRouterClient.
 */
export interface OpenRouterClientOptions {
  /** API key sent as a bearer token. */
  readonly apiKey: string;
  /** Model identifier (e.g. 'openai/gpt-3.5-turbo'). */
  readonly model: string;
  /** Chat completions endpoint. */
  readonly baseUrl: string;
  /** Application name sent in the X-Title header. */
  readonly appName: string;
  readonly temperature: number;
  readonly maxTokens: number;
  /** Logger for request and response summaries. */
  readonly logger?: Logger | undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Pulls `choices[0].message.content` out of a completion body.
 *
 * @returns The content, `null` when there are no choices, or '' when the
 * first choice carries no text.
 */
function extractContent(body: unknown): string | null {
  if (!isRecord(body) || !Array.isArray(body.choices) || body.choices.length === 0) {
    return null;
  }
  const first: unknown = body.choices[0];
  if (!isRecord(first) || !isRecord(first.message)) {
    return '';
  }
  const content = first.message.content;
  return typeof content === 'string' ? content : '';
}

/**
 * Generator backed by the OpenRouter chat completions API.
 *
 * @example
 * ```typescript
 * const client = new OpenRouterClient({
 *   apiKey: 'test-secret',
 *   model: 'openai/gpt-3.5-turbo',
 *   baseUrl: 'https://openrouter.ai/api/v1/chat/completions',
 *   appName: 'System Design Mentor',
 *   temperature: 0.3,
 *   maxTokens: 2000,
 * });
 * const result = await client.generate({ prompt, systemPrompt: SYSTEM_PROMPT, timeoutMs: 30000 });
 * ```
 */
export class OpenRouterClient implements Generator {
  readonly name = 'openrouter';

  private readonly options: OpenRouterClientOptions;
  private readonly logger: Logger;

  /**
   * Creates a new OpenRouterClient.
   *
   * @param options - Endpoint, credentials and sampling settings.
   */
  constructor(options: OpenRouterClientOptions) {
    this.options = options;
    this.logger = options.logger ?? new Logger({ component: 'OpenRouterClient' });
  }

  /**
   * Sends one chat completion request.
   *
   * @param request - Prompt, system prompt and timeout.
   * @returns The completion text, or a failure.
   */
  async generate(request: GeneratorRequest): Promise<GeneratorResult> {
    const startTime = Date.now();
    const { apiKey, model, baseUrl, appName, temperature, maxTokens } = this.options;

    const controller = new AbortController();
    const timeoutId = setTimeout(() => {
      controller.abort();
    }, request.timeoutMs);

    this.logger.info('llm_request', {
      model,
      promptLength: request.prompt.length,
      promptPreview: request.prompt.slice(0, 500),
    });

    try {
      const response = await fetch(baseUrl, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${apiKey}`,
          'Content-Type': 'application/json',
          'HTTP-Referer': OPENROUTER_REFERER,
          'X-Title': appName,
        },
        body: JSON.stringify({
          model,
          messages: [
            { role: 'system', content: request.systemPrompt },
            { role: 'user', content: request.prompt },
          ],
          response_format: { type: 'json_object' },
          temperature,
          max_tokens: maxTokens,
        }),
        signal: controller.signal,
      });

      const latencyMs = Date.now() - startTime;
      this.logger.info('llm_response', { status: response.status, latencyMs });

      if (response.status !== 200) {
        const detail = await response.text();
        return createFailureResult(
          createGeneratorError(
            'ProviderError',
            `OpenRouter API returned ${String(response.status)}: ${detail}`,
            { statusCode: response.status }
          )
        );
      }

      const body: unknown = await response.json();
      const content = extractContent(body);
      if (content === null) {
        return createFailureResult(
          createGeneratorError('EmptyResponseError', 'OpenRouter returned empty choices')
        );
      }
      if (content === '') {
        return createFailureResult(
          createGeneratorError('EmptyResponseError', 'OpenRouter returned empty content')
        );
      }

      this.logger.debug('llm_response_content', {
        length: content.length,
        preview: content.slice(0, 1000),
      });

      return createSuccessResult({ content, provider: this.name, latencyMs });
    } catch (error) {
      const cause = toError(error);
      if (cause.name === 'AbortError') {
        return createFailureResult(
          createGeneratorError(
            'TimeoutError',
            `Request timed out after ${String(request.timeoutMs)}ms`,
            { cause }
          )
        );
      }
      if (cause instanceof SyntaxError) {
        return createFailureResult(
          createGeneratorError(
            'MalformedOutputError',
            `OpenRouter returned a non-JSON body: ${cause.message}`,
            { cause }
          )
        );
      }
      return createFailureResult(
        createGeneratorError('NetworkError', `HTTP request failed: ${cause.message}`, { cause })
      );
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
