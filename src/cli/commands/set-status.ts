/**
 * Set-status command handler for the design-mentor CLI.
 */

import { parseArgs } from 'node:util';
import { openServices } from '../app.js';
import type { CliCommandResult, CliContext } from '../types.js';
import { parsePositiveInteger, parseStatus, requirePositional } from '../utils/args.js';
import { formatSuggestionLine } from '../utils/displayUtils.js';

/**
 * Handles `design-mentor set-status <suggestionId> <status> [--version <n>] [--json]`.
 *
 * @param context - The CLI context.
 * @returns The command result.
 * @throws SuggestionNotFoundError for unknown ids.
 */
export async function handleSetStatusCommand(context: CliContext): Promise<CliCommandResult> {
  const { values, positionals } = parseArgs({
    args: context.args,
    allowPositionals: true,
    options: {
      version: { type: 'string' },
      json: { type: 'boolean', default: false },
    },
  });
  const suggestionId = parsePositiveInteger(
    requirePositional(positionals, 0, 'suggestionId'),
    'suggestionId'
  );
  const status = parseStatus(requirePositional(positionals, 1, 'status'));
  const version =
    values.version === undefined ? undefined : parsePositiveInteger(values.version, 'version');

  const { engine } = await openServices(context);
  const updated = await engine.updateSuggestionStatus(suggestionId, status, version);

  return {
    exitCode: 0,
    message:
      values.json === true
        ? JSON.stringify(updated, null, 2)
        : formatSuggestionLine(updated, context.display),
  };
}
