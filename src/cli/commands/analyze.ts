/**
 * Analyze command handler for the design-mentor CLI.
 */

import { parseArgs } from 'node:util';
import type { AnalysisPayload } from '../../engine/types.js';
import { safeReadFile } from '../../utils/safe-fs.js';
import { openServices } from '../app.js';
import type { CliCommandResult, CliContext } from '../types.js';
import { requirePositional } from '../utils/args.js';
import { formatSuggestionLine, wrapInBox, type DisplayOptions } from '../utils/displayUtils.js';

/**
 * Renders an analysis payload for the terminal.
 *
 * @param projectId - Analysed project.
 * @param payload - Analysis result.
 * @param options - Output styling.
 */
export function renderAnalysis(
  projectId: string,
  payload: AnalysisPayload,
  options: DisplayOptions
): string {
  if (payload.designVersion === 0) {
    return `Project '${projectId}': ${payload.maturityReason}`;
  }

  const open = payload.suggestions.filter((s) => s.status === 'OPEN').length;
  const header = wrapInBox(
    [
      `Project ${projectId}  v${String(payload.designVersion)}`,
      `Maturity ${String(payload.maturityScore)}/5`,
      `Addressed ${String(payload.newlyAddressedCount)}  New ${String(payload.newSuggestionsCount)}  Open ${String(open)}`,
    ].join('\n'),
    options
  );

  const lines = payload.suggestions.map((s) => formatSuggestionLine(s, options));
  return [header, payload.maturityReason, '', ...lines].join('\n');
}

/**
 * Handles `design-mentor analyze <projectId> [--file <path>] [--title <title>] [--json]`.
 *
 * @param context - The CLI context.
 * @returns The command result.
 */
export async function handleAnalyzeCommand(context: CliContext): Promise<CliCommandResult> {
  const { values, positionals } = parseArgs({
    args: context.args,
    allowPositionals: true,
    options: {
      file: { type: 'string', short: 'f' },
      title: { type: 'string', short: 't' },
      json: { type: 'boolean', default: false },
    },
  });
  const projectId = requirePositional(positionals, 0, 'projectId');

  const { store, engine } = await openServices(context);
  if (values.file !== undefined) {
    const content = await safeReadFile(values.file);
    await store.putProjectContent(projectId, content, values.title);
  }

  const payload = await engine.runAnalysis(projectId);
  const message =
    values.json === true
      ? JSON.stringify(payload, null, 2)
      : renderAnalysis(projectId, payload, context.display);
  return { exitCode: 0, message };
}
