/**
 * Command dispatch for the design-mentor CLI.
 */

import { createCliApp, type CliAppOptions } from './app.js';
import { handleAnalyzeCommand } from './commands/analyze.js';
import { handleHelpCommand } from './commands/help.js';
import { handleHistoryCommand } from './commands/history.js';
import { handleSetStatusCommand } from './commands/set-status.js';
import { handleSuggestionsCommand } from './commands/suggestions.js';
import { handleVersionCommand } from './commands/version.js';
import type { CliCommandHandler, CliCommandResult } from './types.js';
import { CliUsageError } from './utils/errorHandling.js';

const COMMANDS: ReadonlyMap<string, CliCommandHandler> = new Map([
  ['analyze', handleAnalyzeCommand],
  ['suggestions', handleSuggestionsCommand],
  ['set-status', handleSetStatusCommand],
  ['history', handleHistoryCommand],
]);

/**
 * Runs one CLI invocation.
 *
 * @param argv - Arguments after the executable name.
 * @param options - Config path, environment and display overrides.
 * @returns The command result.
 * @throws CliUsageError for unknown commands; command errors propagate.
 */
export async function runCli(argv: string[], options: CliAppOptions = {}): Promise<CliCommandResult> {
  const [command, ...commandArgs] = argv;
  if (command === undefined) {
    return handleHelpCommand([]);
  }

  switch (command) {
    case 'help':
    case '--help':
    case '-h':
      return handleHelpCommand(commandArgs);
    case 'version':
    case '--version':
    case '-v':
      return handleVersionCommand();
    default:
      break;
  }

  const handler = COMMANDS.get(command);
  if (handler === undefined) {
    throw new CliUsageError(`Unknown command: ${command}`);
  }
  if (commandArgs.includes('--help') || commandArgs.includes('-h')) {
    return handleHelpCommand([command]);
  }

  const context = await createCliApp(commandArgs, options);
  return handler(context);
}
