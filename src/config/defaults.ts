/**
 * Default configuration values for design-mentor.toml.
 *
 * @packageDocumentation
 */

import type { AnalysisConfig, Config, LlmConfig, LoggingConfig, StoreConfig } from './types.js';

/**
 * Default LLM settings. Enrichment is switched on but stays inactive until
 * an API key (or a command) is configured.
 */
export const DEFAULT_LLM: Readonly<LlmConfig> = {
  enabled: true,
  provider: 'openrouter',
  api_key: '',
  model: 'openai/gpt-3.5-turbo',
  base_url: 'https://openrouter.ai/api/v1/chat/completions',
  timeout_seconds: 30,
  temperature: 0.3,
  max_tokens: 2000,
  app_name: 'System Design Mentor',
  command: '',
  command_args: [],
};

/**
 * Default analysis settings.
 */
export const DEFAULT_ANALYSIS: Readonly<AnalysisConfig> = {
  excerpt_limit: 2000,
  dictionary_path: '',
};

/**
 * Default store location, relative to the working directory.
 */
export const DEFAULT_STORE: Readonly<StoreConfig> = {
  path: '.design-mentor/store.json',
};

/**
 * Default logging settings.
 */
export const DEFAULT_LOGGING: Readonly<LoggingConfig> = {
  debug: false,
};

/**
 * Complete default configuration.
 */
export const DEFAULT_CONFIG: Readonly<Config> = {
  llm: DEFAULT_LLM,
  analysis: DEFAULT_ANALYSIS,
  store: DEFAULT_STORE,
  logging: DEFAULT_LOGGING,
};

/**
 * Returns a fresh, mutable copy of the default configuration.
 */
export function cloneDefaultConfig(): Config {
  return {
    llm: { ...DEFAULT_LLM, command_args: [...DEFAULT_LLM.command_args] },
    analysis: { ...DEFAULT_ANALYSIS },
    store: { ...DEFAULT_STORE },
    logging: { ...DEFAULT_LOGGING },
  };
}
