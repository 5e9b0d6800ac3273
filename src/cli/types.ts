/**
 * CLI types and interfaces for the design-mentor CLI.
 */

import type { Config } from '../config/types.js';
import type { Logger } from '../utils/logger.js';
import type { DisplayOptions } from './utils/displayUtils.js';

/**
 * CLI command context.
 */
export interface CliContext {
  /**
   * Arguments after the command name.
   */
  args: string[];

  /**
   * Effective configuration.
   */
  config: Config;

  /**
   * Output styling.
   */
  display: DisplayOptions;

  /**
   * Logger shared by the engine and its collaborators.
   */
  logger: Logger;

  /**
   * Clock used for timestamps (for testing).
   */
  now?: (() => Date) | undefined;
}

/**
 * Result of a CLI command execution.
 */
export interface CliCommandResult {
  /**
   * Exit code (0 for success, non-zero for error).
   */
  exitCode: number;

  /**
   * Optional message to display.
   */
  message?: string;
}

/**
 * CLI command handler function.
 */
export type CliCommandHandler = (context: CliContext) => Promise<CliCommandResult>;
