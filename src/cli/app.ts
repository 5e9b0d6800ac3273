/**
 * Application wiring for the design-mentor CLI.
 */

import { CONFIG_FILE_NAME, loadConfig, type EnvRecord } from '../config/index.js';
import { createEngine } from '../engine/factory.js';
import type { DesignAnalysisEngine } from '../engine/engine.js';
import { JsonFileStore } from '../store/json-store.js';
import { Logger } from '../utils/logger.js';
import type { CliContext } from './types.js';
import type { DisplayOptions } from './utils/displayUtils.js';

/**
 * Options for creating the CLI context.
 */
export interface CliAppOptions {
  /** Configuration file to read (default: design-mentor.toml in the working directory). */
  configPath?: string | undefined;
  /** Environment for overrides and color detection. */
  env?: EnvRecord | undefined;
  /** Output styling overrides. */
  display?: Partial<DisplayOptions> | undefined;
  /** Optional function to get current time (for testing). */
  now?: (() => Date) | undefined;
}

/**
 * Creates and initializes CLI application context.
 *
 * @param args - Arguments after the command name.
 * @param options - Config path, environment and display overrides.
 * @returns The CLI context.
 * @throws ConfigParseError, EnvCoercionError or ConfigValidationError.
 */
export async function createCliApp(
  args: string[],
  options: CliAppOptions = {}
): Promise<CliContext> {
  const env = options.env ?? process.env;
  const config = await loadConfig(options.configPath ?? CONFIG_FILE_NAME, env);

  return {
    args,
    config,
    display: {
      colors: options.display?.colors ?? (process.stdout.isTTY === true && env.NO_COLOR === undefined),
      unicode: options.display?.unicode ?? true,
    },
    logger: new Logger({ component: 'DesignAnalysisEngine', debugMode: config.logging.debug }),
    now: options.now,
  };
}

/**
 * Store and engine for one command invocation.
 */
export interface CliServices {
  store: JsonFileStore;
  engine: DesignAnalysisEngine;
}

/**
 * Opens the configured store and builds the engine on it.
 *
 * @param context - The CLI context.
 */
export async function openServices(context: CliContext): Promise<CliServices> {
  const store = new JsonFileStore({
    path: context.config.store.path,
    now: context.now,
    logger: context.logger.child('JsonFileStore'),
  });
  const engine = await createEngine(context.config, {
    store,
    logger: context.logger,
    now: context.now,
  });
  return { store, engine };
}
