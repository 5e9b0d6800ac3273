/**
 * Generator selection from configuration.
 *
 * @packageDocumentation
 */

import type { LlmConfig } from '../config/types.js';
import type { Logger } from '../utils/logger.js';
import { CommandGenerator } from './command-client.js';
import { OpenRouterClient } from './openrouter-client.js';
import type { Generator } from './types.js';

/** Prefix of the placeholder keys shipped in sample configuration. */
const PLACEHOLDER_KEY_PREFIX = 'your-';

/**
 * Checks whether an API key looks real: non-empty and not a `your-...`
 * placeholder.
 *
 * @param apiKey - Configured key.
 * @returns True if the key can be used.
 */
export function isUsableApiKey(apiKey: string): boolean {
  const key = apiKey.trim();
  return key !== '' && !key.startsWith(PLACEHOLDER_KEY_PREFIX);
}

/**
 * Creates the configured generator.
 *
 * @param llm - LLM configuration section.
 * @param logger - Parent logger; each generator logs under its own component.
 * @returns The generator, or null when enrichment is disabled or not
 * configured (rule-only mode).
 */
export function createGenerator(llm: LlmConfig, logger?: Logger): Generator | null {
  if (!llm.enabled) {
    return null;
  }

  switch (llm.provider) {
    case 'openrouter':
      if (!isUsableApiKey(llm.api_key)) {
        return null;
      }
      return new OpenRouterClient({
        apiKey: llm.api_key.trim(),
        model: llm.model,
        baseUrl: llm.base_url,
        appName: llm.app_name,
        temperature: llm.temperature,
        maxTokens: llm.max_tokens,
        logger: logger?.child('OpenRouterClient'),
      });
    case 'command':
      if (llm.command.trim() === '') {
        return null;
      }
      return new CommandGenerator({
        command: llm.command,
        args: llm.command_args,
        logger: logger?.child('CommandGenerator'),
      });
  }
}
