import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { Logger } from '../utils/logger.js';
import { OPENROUTER_REFERER, OpenRouterClient } from './openrouter-client.js';
import type { GeneratorRequest } from './types.js';

const request: GeneratorRequest = {
  prompt: 'Explain the missing cache.',
  systemPrompt: 'You are a mentor.',
  timeoutMs: 1000,
};

function createClient(): OpenRouterClient {
  return new OpenRouterClient({
    apiKey: 'test-secret',
    model: 'openai/gpt-3.5-turbo',
    baseUrl: 'https://openrouter.test/api/v1/chat/completions',
    appName: 'Mentor Test',
    temperature: 0.3,
    maxTokens: 2000,
    logger: new Logger({ component: 'OpenRouterClient' }),
  });
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('OpenRouterClient', () => {
  const mockFetch = vi.fn<typeof fetch>();

  beforeEach(() => {
    mockFetch.mockReset();
    vi.stubGlobal('fetch', mockFetch);
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it('should send an OpenAI-compatible chat completion request', async () => {
    mockFetch.mockResolvedValueOnce(
      jsonResponse({ choices: [{ message: { content: '{"explanations": []}' } }] })
    );

    await createClient().generate(request);

    expect(mockFetch).toHaveBeenCalledTimes(1);
    const [url, init] = mockFetch.mock.calls[0] ?? [];
    expect(url).toBe('https://openrouter.test/api/v1/chat/completions');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toEqual({
      Authorization: 'Bearer test-secret',
      'Content-Type': 'application/json',
      'HTTP-Referer': OPENROUTER_REFERER,
      'X-Title': 'Mentor Test',
    });
    expect(JSON.parse(String(init?.body))).toEqual({
      model: 'openai/gpt-3.5-turbo',
      messages: [
        { role: 'system', content: 'You are a mentor.' },
        { role: 'user', content: 'Explain the missing cache.' },
      ],
      response_format: { type: 'json_object' },
      temperature: 0.3,
      max_tokens: 2000,
    });
    expect(init?.signal).toBeInstanceOf(AbortSignal);
  });

  it('should return the first choice content', async () => {
    mockFetch.mockResolvedValueOnce(
      jsonResponse({ choices: [{ message: { content: '{"explanations": []}' } }] })
    );

    const result = await createClient().generate(request);

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.response.content).toBe('{"explanations": []}');
      expect(result.response.provider).toBe('openrouter');
    }
  });

  it('should map non-200 statuses to ProviderError', async () => {
    mockFetch.mockResolvedValueOnce(new Response('slow down', { status: 429 }));

    const result = await createClient().generate(request);

    expect(result).toEqual({
      success: false,
      error: {
        kind: 'ProviderError',
        message: 'OpenRouter API returned 429: slow down',
        retryable: false,
        statusCode: 429,
      },
    });
  });

  it('should map empty choices and empty content to EmptyResponseError', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ choices: [] }));
    const noChoices = await createClient().generate(request);
    expect(!noChoices.success && noChoices.error.message).toBe('OpenRouter returned empty choices');

    mockFetch.mockResolvedValueOnce(jsonResponse({ choices: [{ message: { content: '' } }] }));
    const noContent = await createClient().generate(request);
    expect(!noContent.success && noContent.error.message).toBe('OpenRouter returned empty content');

    mockFetch.mockResolvedValueOnce(jsonResponse({ choices: [{}] }));
    const noMessage = await createClient().generate(request);
    expect(!noMessage.success && noMessage.error.kind).toBe('EmptyResponseError');
  });

  it('should map a non-JSON body to MalformedOutputError', async () => {
    mockFetch.mockResolvedValueOnce(new Response('<html>oops</html>', { status: 200 }));

    const result = await createClient().generate(request);

    expect(!result.success && result.error.kind).toBe('MalformedOutputError');
  });

  it('should map transport failures to a retryable NetworkError', async () => {
    mockFetch.mockRejectedValueOnce(new TypeError('fetch failed'));

    const result = await createClient().generate(request);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.kind).toBe('NetworkError');
      expect(result.error.message).toBe('HTTP request failed: fetch failed');
      expect(result.error.retryable).toBe(true);
    }
  });

  it('should abort the request when the timeout elapses', async () => {
    mockFetch.mockImplementationOnce(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => {
            reject(new DOMException('The operation was aborted.', 'AbortError'));
          });
        })
    );

    const result = await createClient().generate({ ...request, timeoutMs: 20 });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.kind).toBe('TimeoutError');
      expect(result.error.message).toBe('Request timed out after 20ms');
    }
  });
});
