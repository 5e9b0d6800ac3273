/**
 * Configuration module for design-mentor.toml parsing and validation.
 *
 * Provides typed configuration parsing with defaults, semantic validation,
 * and environment variable overrides.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

import { applyEnvOverrides, type EnvRecord } from './env.js';
import { readConfigFile } from './parser.js';
import type { Config } from './types.js';
import { assertConfigValid } from './validator.js';

export {
  CONFIG_FILE_NAME,
  ConfigParseError,
  getDefaultConfig,
  parseConfig,
  parseProvider,
  readConfigFile,
} from './parser.js';
export type {
  AnalysisConfig,
  Config,
  LlmConfig,
  LlmProvider,
  LoggingConfig,
  PartialConfig,
  StoreConfig,
} from './types.js';
export {
  DEFAULT_ANALYSIS,
  DEFAULT_CONFIG,
  DEFAULT_LLM,
  DEFAULT_LOGGING,
  DEFAULT_STORE,
  cloneDefaultConfig,
} from './defaults.js';
export {
  ConfigValidationError,
  MAX_TIMEOUT_SECONDS,
  validateConfig,
  assertConfigValid,
} from './validator.js';
export type { ValidationError, ValidationResult } from './validator.js';
export {
  EnvCoercionError,
  readEnvOverrides,
  applyEnvOverrides,
  mergeConfig,
  getEnvVarDocumentation,
} from './env.js';
export type { EnvOverrideResult, EnvRecord } from './env.js';

/**
 * Loads configuration from a TOML file, applies environment overrides and
 * validates the result.
 *
 * @param filePath - Path of the TOML file; a missing file yields the defaults.
 * @param env - Environment to read overrides from.
 * @returns The effective configuration.
 * @throws ConfigParseError, EnvCoercionError or ConfigValidationError.
 */
export async function loadConfig(filePath: string, env: EnvRecord = process.env): Promise<Config> {
  const fileConfig = await readConfigFile(filePath);
  const config = applyEnvOverrides(fileConfig, env);
  assertConfigValid(config);
  return config;
}
