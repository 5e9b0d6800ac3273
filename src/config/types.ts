/**
 * Configuration types for design-mentor.toml parsing.
 *
 * @packageDocumentation
 */

/**
 * Backend used to produce LLM explanations.
 * - `openrouter`: OpenAI-compatible chat completion endpoint over HTTP
 * - `command`: a local command that reads the prompt on stdin
 */
export type LlmProvider = 'openrouter' | 'command';

/**
 * LLM enrichment settings.
 */
export interface LlmConfig {
  /** Master switch; false keeps the engine in rule-only mode even with a key. */
  enabled: boolean;
  /** Generator backend. */
  provider: LlmProvider;
  /** API key for the HTTP provider. Empty means not configured. */
  api_key: string;
  /** Model identifier sent to the provider. */
  model: string;
  /** Chat completion endpoint. */
  base_url: string;
  /** Timeout for a single generation request, in seconds. */
  timeout_seconds: number;
  /** Sampling temperature. */
  temperature: number;
  /** Upper bound on generated tokens. */
  max_tokens: number;
  /** Application name sent in the X-Title header. */
  app_name: string;
  /** Executable for the command provider. */
  command: string;
  /** Arguments passed to the command provider. */
  command_args: string[];
}

/**
 * Analysis settings.
 */
export interface AnalysisConfig {
  /** Maximum number of design characters quoted in the enrichment prompt. */
  excerpt_limit: number;
  /** Path to a concept dictionary JSON file; empty uses the bundled one. */
  dictionary_path: string;
}

/**
 * Store settings for the CLI's JSON-file store.
 */
export interface StoreConfig {
  /** Path of the JSON store file. */
  path: string;
}

/**
 * Logging settings.
 */
export interface LoggingConfig {
  /** Whether debug-level entries are written. */
  debug: boolean;
}

/**
 * Complete configuration object parsed from design-mentor.toml.
 */
export interface Config {
  llm: LlmConfig;
  analysis: AnalysisConfig;
  store: StoreConfig;
  logging: LoggingConfig;
}

/**
 * Partial configuration for merging with defaults.
 */
export interface PartialConfig {
  llm?: Partial<LlmConfig>;
  analysis?: Partial<AnalysisConfig>;
  store?: Partial<StoreConfig>;
  logging?: Partial<LoggingConfig>;
}
