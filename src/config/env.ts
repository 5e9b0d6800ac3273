/**
 * Environment variable overrides for configuration.
 *
 * DESIGN_MENTOR_<SECTION>_<FIELD> variables override values from
 * design-mentor.toml. OPENROUTER_API_KEY and OPENROUTER_MODEL are accepted as
 * shortcuts; the DESIGN_MENTOR_* form wins when both are set.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

import type {
  AnalysisConfig,
  Config,
  LlmConfig,
  LoggingConfig,
  PartialConfig,
  StoreConfig,
} from './types.js';
import { ConfigParseError, parseProvider } from './parser.js';

/**
 * Type for environment record (matching process.env structure).
 */
export type EnvRecord = Record<string, string | undefined>;

/**
 * Error class for environment variable coercion errors.
 */
export class EnvCoercionError extends Error {
  /** The environment variable name that failed coercion. */
  public readonly envVar: string;
  /** The raw value from the environment variable. */
  public readonly rawValue: string;
  /** The expected type for the value. */
  public readonly expectedType: string;

  /**
   * Creates a new EnvCoercionError.
   *
   * @param envVar - The environment variable name.
   * @param rawValue - The raw string value from the environment.
   * @param expectedType - The type the value should be coerced to.
   * @param message - Optional detailed error message.
   */
  constructor(envVar: string, rawValue: string, expectedType: string, message?: string) {
    super(
      message ??
        `Cannot coerce environment variable '${envVar}' value '${rawValue}' to ${expectedType}`
    );
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

type EnvValueType = 'string' | 'number' | 'boolean' | 'string[]' | 'provider';

interface EnvVarMapping {
  /** Environment variable name. */
  readonly name: string;
  /** Dotted config path the variable overrides. */
  readonly target: string;
  /** Expected value type. */
  readonly type: EnvValueType;
  /** Coerces the raw value and writes it into the overrides. */
  readonly apply: (overrides: PartialConfig, value: string) => void;
}

function coerceToNumber(value: string, envVar: string): number {
  const trimmed = value.trim();

  if (trimmed === '') {
    throw new EnvCoercionError(envVar, value, 'number', `Empty value for '${envVar}'`);
  }

  const num = Number(trimmed);
  if (Number.isNaN(num)) {
    throw new EnvCoercionError(envVar, value, 'number');
  }

  return num;
}

/**
 * Accepts 'true', '1', 'yes', 'on' and 'false', '0', 'no', 'off', case-insensitively.
 */
function coerceToBoolean(value: string, envVar: string): boolean {
  const trimmed = value.trim().toLowerCase();

  const truthy = ['true', '1', 'yes', 'on'];
  const falsy = ['false', '0', 'no', 'off'];

  if (truthy.includes(trimmed)) {
    return true;
  }
  if (falsy.includes(trimmed)) {
    return false;
  }

  throw new EnvCoercionError(
    envVar,
    value,
    'boolean',
    `Cannot coerce '${envVar}' value '${value}' to boolean. Expected one of: ${[...truthy, ...falsy].join(', ')}`
  );
}

/**
 * Splits a whitespace-separated argument list.
 */
function coerceToArgs(value: string): string[] {
  return value
    .trim()
    .split(/\s+/)
    .filter((part) => part.length > 0);
}

function coerceToProvider(value: string, envVar: string): LlmConfig['provider'] {
  try {
    return parseProvider(value.trim(), envVar);
  } catch (error) {
    if (error instanceof ConfigParseError) {
      throw new EnvCoercionError(envVar, value, 'provider', error.message);
    }
    throw error;
  }
}

function llmSection(overrides: PartialConfig): Partial<LlmConfig> {
  const section = overrides.llm ?? {};
  overrides.llm = section;
  return section;
}

function analysisSection(overrides: PartialConfig): Partial<AnalysisConfig> {
  const section = overrides.analysis ?? {};
  overrides.analysis = section;
  return section;
}

function storeSection(overrides: PartialConfig): Partial<StoreConfig> {
  const section = overrides.store ?? {};
  overrides.store = section;
  return section;
}

function loggingSection(overrides: PartialConfig): Partial<LoggingConfig> {
  const section = overrides.logging ?? {};
  overrides.logging = section;
  return section;
}

/**
 * Supported environment variables, in application order. Later entries win
 * when two variables target the same field.
 */
const ENV_VAR_MAPPINGS: readonly EnvVarMapping[] = [
  // Shortcuts
  {
    name: 'OPENROUTER_API_KEY',
    target: 'llm.api_key',
    type: 'string',
    apply: (o, v) => {
      llmSection(o).api_key = v;
    },
  },
  {
    name: 'OPENROUTER_MODEL',
    target: 'llm.model',
    type: 'string',
    apply: (o, v) => {
      llmSection(o).model = v;
    },
  },
  {
    name: 'DESIGN_MENTOR_DEBUG',
    target: 'logging.debug',
    type: 'boolean',
    apply: (o, v) => {
      loggingSection(o).debug = coerceToBoolean(v, 'DESIGN_MENTOR_DEBUG');
    },
  },

  // LLM
  {
    name: 'DESIGN_MENTOR_LLM_ENABLED',
    target: 'llm.enabled',
    type: 'boolean',
    apply: (o, v) => {
      llmSection(o).enabled = coerceToBoolean(v, 'DESIGN_MENTOR_LLM_ENABLED');
    },
  },
  {
    name: 'DESIGN_MENTOR_LLM_PROVIDER',
    target: 'llm.provider',
    type: 'provider',
    apply: (o, v) => {
      llmSection(o).provider = coerceToProvider(v, 'DESIGN_MENTOR_LLM_PROVIDER');
    },
  },
  {
    name: 'DESIGN_MENTOR_LLM_API_KEY',
    target: 'llm.api_key',
    type: 'string',
    apply: (o, v) => {
      llmSection(o).api_key = v;
    },
  },
  {
    name: 'DESIGN_MENTOR_LLM_MODEL',
    target: 'llm.model',
    type: 'string',
    apply: (o, v) => {
      llmSection(o).model = v;
    },
  },
  {
    name: 'DESIGN_MENTOR_LLM_BASE_URL',
    target: 'llm.base_url',
    type: 'string',
    apply: (o, v) => {
      llmSection(o).base_url = v;
    },
  },
  {
    name: 'DESIGN_MENTOR_LLM_TIMEOUT_SECONDS',
    target: 'llm.timeout_seconds',
    type: 'number',
    apply: (o, v) => {
      llmSection(o).timeout_seconds = coerceToNumber(v, 'DESIGN_MENTOR_LLM_TIMEOUT_SECONDS');
    },
  },
  {
    name: 'DESIGN_MENTOR_LLM_TEMPERATURE',
    target: 'llm.temperature',
    type: 'number',
    apply: (o, v) => {
      llmSection(o).temperature = coerceToNumber(v, 'DESIGN_MENTOR_LLM_TEMPERATURE');
    },
  },
  {
    name: 'DESIGN_MENTOR_LLM_MAX_TOKENS',
    target: 'llm.max_tokens',
    type: 'number',
    apply: (o, v) => {
      llmSection(o).max_tokens = coerceToNumber(v, 'DESIGN_MENTOR_LLM_MAX_TOKENS');
    },
  },
  {
    name: 'DESIGN_MENTOR_LLM_APP_NAME',
    target: 'llm.app_name',
    type: 'string',
    apply: (o, v) => {
      llmSection(o).app_name = v;
    },
  },
  {
    name: 'DESIGN_MENTOR_LLM_COMMAND',
    target: 'llm.command',
    type: 'string',
    apply: (o, v) => {
      llmSection(o).command = v;
    },
  },
  {
    name: 'DESIGN_MENTOR_LLM_COMMAND_ARGS',
    target: 'llm.command_args',
    type: 'string[]',
    apply: (o, v) => {
      llmSection(o).command_args = coerceToArgs(v);
    },
  },

  // Analysis
  {
    name: 'DESIGN_MENTOR_ANALYSIS_EXCERPT_LIMIT',
    target: 'analysis.excerpt_limit',
    type: 'number',
    apply: (o, v) => {
      analysisSection(o).excerpt_limit = coerceToNumber(v, 'DESIGN_MENTOR_ANALYSIS_EXCERPT_LIMIT');
    },
  },
  {
    name: 'DESIGN_MENTOR_ANALYSIS_DICTIONARY_PATH',
    target: 'analysis.dictionary_path',
    type: 'string',
    apply: (o, v) => {
      analysisSection(o).dictionary_path = v;
    },
  },

  // Store and logging
  {
    name: 'DESIGN_MENTOR_STORE_PATH',
    target: 'store.path',
    type: 'string',
    apply: (o, v) => {
      storeSection(o).path = v;
    },
  },
  {
    name: 'DESIGN_MENTOR_LOGGING_DEBUG',
    target: 'logging.debug',
    type: 'boolean',
    apply: (o, v) => {
      loggingSection(o).debug = coerceToBoolean(v, 'DESIGN_MENTOR_LOGGING_DEBUG');
    },
  },
];

/**
 * Result of reading environment variable overrides.
 */
export interface EnvOverrideResult {
  /** Partial configuration with values from environment variables. */
  overrides: PartialConfig;
  /** Environment variables that were applied, in application order. */
  appliedVars: string[];
  /** Coercion errors, collected only when `collectErrors` is set. */
  errors: EnvCoercionError[];
}

/**
 * Reads environment variables and returns configuration overrides.
 *
 * Unset and empty variables are ignored.
 *
 * @param env - The environment object to read from (defaults to process.env).
 * @param options - Set `collectErrors` to gather coercion errors instead of throwing.
 * @returns Overrides, applied variable names and collected errors.
 * @throws EnvCoercionError if a value cannot be coerced and `collectErrors` is not set.
 */
export function readEnvOverrides(
  env: EnvRecord = process.env,
  options: { collectErrors?: boolean } = {}
): EnvOverrideResult {
  const { collectErrors = false } = options;

  const overrides: PartialConfig = {};
  const appliedVars: string[] = [];
  const errors: EnvCoercionError[] = [];

  for (const mapping of ENV_VAR_MAPPINGS) {
    const value = env[mapping.name];
    if (value === undefined || value === '') {
      continue;
    }

    try {
      mapping.apply(overrides, value);
      appliedVars.push(mapping.name);
    } catch (error) {
      if (error instanceof EnvCoercionError && collectErrors) {
        errors.push(error);
      } else {
        throw error;
      }
    }
  }

  return { overrides, appliedVars, errors };
}

/**
 * Merges partial overrides into a configuration, returning a new object.
 *
 * @param config - Base configuration.
 * @param overrides - Values that take precedence.
 * @returns The merged configuration.
 */
export function mergeConfig(config: Config, overrides: PartialConfig): Config {
  return {
    llm: { ...config.llm, ...overrides.llm },
    analysis: { ...config.analysis, ...overrides.analysis },
    store: { ...config.store, ...overrides.store },
    logging: { ...config.logging, ...overrides.logging },
  };
}

/**
 * Applies environment variable overrides to a configuration.
 *
 * @param config - The base configuration to override.
 * @param env - The environment object to read from (defaults to process.env).
 * @returns The configuration with environment overrides applied.
 * @throws EnvCoercionError if an environment variable cannot be coerced.
 *
 * @example
 * ```typescript
 * const config = applyEnvOverrides(parseConfig(toml), { DESIGN_MENTOR_LLM_TIMEOUT_SECONDS: '10' });
 * console.log(config.llm.timeout_seconds); // 10
 * ```
 */
export function applyEnvOverrides(config: Config, env: EnvRecord = process.env): Config {
  const { overrides } = readEnvOverrides(env);
  return mergeConfig(config, overrides);
}

/**
 * Lists the supported environment variables for help output.
 *
 * @returns One entry per variable with its target field and type.
 */
export function getEnvVarDocumentation(): { name: string; target: string; type: string }[] {
  return ENV_VAR_MAPPINGS.map(({ name, target, type }) => ({ name, target, type }));
}
