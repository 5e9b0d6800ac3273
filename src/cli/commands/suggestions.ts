/**
 * Suggestions command handler for the design-mentor CLI.
 */

import { parseArgs } from 'node:util';
import { openServices } from '../app.js';
import type { CliCommandResult, CliContext } from '../types.js';
import { parseStatus, requirePositional } from '../utils/args.js';
import { formatSuggestionLine } from '../utils/displayUtils.js';

/**
 * Handles `design-mentor suggestions <projectId> [--status <status>] [--json]`.
 *
 * @param context - The CLI context.
 * @returns The command result.
 */
export async function handleSuggestionsCommand(context: CliContext): Promise<CliCommandResult> {
  const { values, positionals } = parseArgs({
    args: context.args,
    allowPositionals: true,
    options: {
      status: { type: 'string', short: 's' },
      json: { type: 'boolean', default: false },
    },
  });
  const projectId = requirePositional(positionals, 0, 'projectId');
  const status = values.status === undefined ? undefined : parseStatus(values.status);

  const { engine } = await openServices(context);
  const suggestions = await engine.listSuggestions(projectId, status);

  if (values.json === true) {
    return { exitCode: 0, message: JSON.stringify(suggestions, null, 2) };
  }
  if (suggestions.length === 0) {
    return { exitCode: 0, message: 'No suggestions.' };
  }
  return {
    exitCode: 0,
    message: suggestions.map((s) => formatSuggestionLine(s, context.display)).join('\n'),
  };
}
