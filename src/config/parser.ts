/**
 * TOML configuration parser for design-mentor.toml.
 *
 * @packageDocumentation
 */

import * as TOML from '@iarna/toml';
import { cloneDefaultConfig } from './defaults.js';
import type {
  AnalysisConfig,
  Config,
  LlmConfig,
  LlmProvider,
  LoggingConfig,
  StoreConfig,
} from './types.js';
import { safeExists, safeReadFile } from '../utils/safe-fs.js';
import { toError } from '../utils/logger.js';

/**
 * Error class for configuration parsing errors.
 */
export class ConfigParseError extends Error {
  /** The original error that caused the parse failure, if any. */
  public readonly cause: Error | undefined;

  /**
   * Creates a new ConfigParseError.
   *
   * @param message - Descriptive error message.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'ConfigParseError';
    this.cause = cause;
  }
}

/**
 * Name of the configuration file looked up in the working directory.
 */
export const CONFIG_FILE_NAME = 'design-mentor.toml';

const LLM_PROVIDERS: readonly LlmProvider[] = ['openrouter', 'command'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads a TOML table, rejecting scalars where a table is expected.
 */
function readSection(
  parsed: Record<string, unknown>,
  name: string
): Record<string, unknown> | undefined {
  const raw = parsed[name];
  if (raw === undefined) {
    return undefined;
  }
  if (!isRecord(raw)) {
    throw new ConfigParseError(`Invalid type for '${name}': expected table, got ${typeof raw}`);
  }
  return raw;
}

function validateString(value: unknown, fieldPath: string): string {
  if (typeof value !== 'string') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected string, got ${typeof value}`
    );
  }
  return value;
}

function validateNumber(value: unknown, fieldPath: string): number {
  if (typeof value !== 'number') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected number, got ${typeof value}`
    );
  }
  return value;
}

function validateBoolean(value: unknown, fieldPath: string): boolean {
  if (typeof value !== 'boolean') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected boolean, got ${typeof value}`
    );
  }
  return value;
}

function validateStringArray(value: unknown, fieldPath: string): string[] {
  if (!Array.isArray(value) || !value.every((item) => typeof item === 'string')) {
    throw new ConfigParseError(`Invalid type for '${fieldPath}': expected array of strings`);
  }
  return value.map(String);
}

/**
 * Narrows a string to a known LLM provider.
 *
 * @param value - Raw provider name.
 * @param fieldPath - Field path for error messages.
 * @returns The provider.
 * @throws ConfigParseError for unknown providers.
 */
export function parseProvider(value: string, fieldPath: string): LlmProvider {
  const provider = LLM_PROVIDERS.find((candidate) => candidate === value);
  if (provider === undefined) {
    throw new ConfigParseError(
      `Invalid value for '${fieldPath}': expected ${LLM_PROVIDERS.map((p) => `'${p}'`).join(' or ')}, got '${value}'`
    );
  }
  return provider;
}

function parseLlm(raw: Record<string, unknown> | undefined, base: LlmConfig): LlmConfig {
  const result: LlmConfig = { ...base, command_args: [...base.command_args] };
  if (raw === undefined) {
    return result;
  }

  if ('enabled' in raw) {
    result.enabled = validateBoolean(raw.enabled, 'llm.enabled');
  }
  if ('provider' in raw) {
    result.provider = parseProvider(validateString(raw.provider, 'llm.provider'), 'llm.provider');
  }
  if ('api_key' in raw) {
    result.api_key = validateString(raw.api_key, 'llm.api_key');
  }
  if ('model' in raw) {
    result.model = validateString(raw.model, 'llm.model');
  }
  if ('base_url' in raw) {
    result.base_url = validateString(raw.base_url, 'llm.base_url');
  }
  if ('timeout_seconds' in raw) {
    result.timeout_seconds = validateNumber(raw.timeout_seconds, 'llm.timeout_seconds');
  }
  if ('temperature' in raw) {
    result.temperature = validateNumber(raw.temperature, 'llm.temperature');
  }
  if ('max_tokens' in raw) {
    result.max_tokens = validateNumber(raw.max_tokens, 'llm.max_tokens');
  }
  if ('app_name' in raw) {
    result.app_name = validateString(raw.app_name, 'llm.app_name');
  }
  if ('command' in raw) {
    result.command = validateString(raw.command, 'llm.command');
  }
  if ('command_args' in raw) {
    result.command_args = validateStringArray(raw.command_args, 'llm.command_args');
  }

  return result;
}

function parseAnalysis(
  raw: Record<string, unknown> | undefined,
  base: AnalysisConfig
): AnalysisConfig {
  const result: AnalysisConfig = { ...base };
  if (raw === undefined) {
    return result;
  }

  if ('excerpt_limit' in raw) {
    result.excerpt_limit = validateNumber(raw.excerpt_limit, 'analysis.excerpt_limit');
  }
  if ('dictionary_path' in raw) {
    result.dictionary_path = validateString(raw.dictionary_path, 'analysis.dictionary_path');
  }

  return result;
}

function parseStore(raw: Record<string, unknown> | undefined, base: StoreConfig): StoreConfig {
  const result: StoreConfig = { ...base };
  if (raw !== undefined && 'path' in raw) {
    result.path = validateString(raw.path, 'store.path');
  }
  return result;
}

function parseLogging(
  raw: Record<string, unknown> | undefined,
  base: LoggingConfig
): LoggingConfig {
  const result: LoggingConfig = { ...base };
  if (raw !== undefined && 'debug' in raw) {
    result.debug = validateBoolean(raw.debug, 'logging.debug');
  }
  return result;
}

/**
 * Parses a TOML string into a validated Config object.
 *
 * Missing sections and fields take their default values. Unknown keys are
 * ignored.
 *
 * @param tomlContent - Raw TOML content as a string.
 * @returns Configuration object with defaults applied for missing fields.
 * @throws ConfigParseError for invalid TOML syntax or invalid field types.
 *
 * @example
 * ```typescript
 * const config = parseConfig(`
 * [llm]
 * model = "anthropic/claude-3.5-haiku"
 * timeout_seconds = 20
 * `);
 * console.log(config.llm.timeout_seconds); // 20
 * ```
 */
export function parseConfig(tomlContent: string): Config {
  let parsed: Record<string, unknown>;

  try {
    parsed = TOML.parse(tomlContent);
  } catch (error) {
    const tomlError = toError(error);
    throw new ConfigParseError(`Invalid TOML syntax: ${tomlError.message}`, tomlError);
  }

  const defaults = cloneDefaultConfig();

  return {
    llm: parseLlm(readSection(parsed, 'llm'), defaults.llm),
    analysis: parseAnalysis(readSection(parsed, 'analysis'), defaults.analysis),
    store: parseStore(readSection(parsed, 'store'), defaults.store),
    logging: parseLogging(readSection(parsed, 'logging'), defaults.logging),
  };
}

/**
 * Returns the default configuration, as parsed from an empty file.
 */
export function getDefaultConfig(): Config {
  return cloneDefaultConfig();
}

/**
 * Reads and parses a configuration file. A missing file yields the defaults.
 *
 * @param filePath - Path of the TOML file.
 * @returns The parsed configuration.
 * @throws ConfigParseError when the file exists but cannot be read or parsed.
 */
export async function readConfigFile(filePath: string): Promise<Config> {
  if (!(await safeExists(filePath))) {
    return getDefaultConfig();
  }

  let content: string;
  try {
    content = await safeReadFile(filePath);
  } catch (error) {
    const readError = toError(error);
    throw new ConfigParseError(
      `Failed to read config file "${filePath}": ${readError.message}`,
      readError
    );
  }

  return parseConfig(content);
}
