/**
 * History command handler for the design-mentor CLI.
 */

import { parseArgs } from 'node:util';
import { ProjectNotFoundError } from '../../store/errors.js';
import { openServices } from '../app.js';
import type { CliCommandResult, CliContext } from '../types.js';
import { requirePositional } from '../utils/args.js';
import { formatVersionLine } from '../utils/displayUtils.js';

/**
 * Handles `design-mentor history <projectId> [--json]`.
 *
 * @param context - The CLI context.
 * @returns The command result.
 * @throws ProjectNotFoundError for unknown projects.
 */
export async function handleHistoryCommand(context: CliContext): Promise<CliCommandResult> {
  const { values, positionals } = parseArgs({
    args: context.args,
    allowPositionals: true,
    options: {
      json: { type: 'boolean', default: false },
    },
  });
  const projectId = requirePositional(positionals, 0, 'projectId');

  const { engine } = await openServices(context);
  const evolution = await engine.getEvolution(projectId);
  if (evolution === null) {
    throw new ProjectNotFoundError(projectId);
  }

  if (values.json === true) {
    return { exitCode: 0, message: JSON.stringify(evolution, null, 2) };
  }
  return {
    exitCode: 0,
    message: [...evolution.versions.map(formatVersionLine), evolution.progressSummary].join('\n'),
  };
}
