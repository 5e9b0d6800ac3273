/**
 * Help text for the design-mentor CLI.
 */

import type { CliCommandResult } from '../types.js';
import { getVersionFromPackageJson } from './version.js';

const COMMAND_HELP: ReadonlyMap<string, string> = new Map([
  [
    'analyze',
    `
USAGE: design-mentor analyze <projectId> [options]

Analyses the project's design: versions it, resolves suggestions whose
concepts now appear, scores maturity and records new suggestions.

OPTIONS:
  --file, -f <path>    Load the design text from a file first
  --title, -t <title>  Project title when the project is created
  --json               Print the analysis payload as JSON

EXAMPLES:
  design-mentor analyze checkout --file docs/checkout.md
  design-mentor analyze checkout --json
`,
  ],
  [
    'suggestions',
    `
USAGE: design-mentor suggestions <projectId> [options]

Lists the project's suggestions, newest first.

OPTIONS:
  --status, -s <status>  Only OPEN, ADDRESSED or IGNORED suggestions
  --json                 Print JSON

EXAMPLES:
  design-mentor suggestions checkout --status open
`,
  ],
  [
    'set-status',
    `
USAGE: design-mentor set-status <suggestionId> <status> [options]

Changes a suggestion's status to OPEN, ADDRESSED or IGNORED.

OPTIONS:
  --version <n>  Design version to record when marking ADDRESSED
  --json         Print JSON

EXAMPLES:
  design-mentor set-status 12 ignored
  design-mentor set-status 3 addressed --version 4
`,
  ],
  [
    'history',
    `
USAGE: design-mentor history <projectId> [--json]

Shows the project's version snapshots and a progress summary.
`,
  ],
]);

/**
 * Returns the general usage text.
 */
export function getHelpText(): string {
  return `
design-mentor v${getVersionFromPackageJson()}

USAGE:
  design-mentor <command> [options]

COMMANDS:
  analyze       Analyse a project's design
  suggestions   List a project's suggestions
  set-status    Change a suggestion's status
  history       Show version history and progress
  help          Show this help message
  version       Show version information

CONFIGURATION:
  design-mentor.toml in the working directory, overridden by
  DESIGN_MENTOR_<SECTION>_<FIELD> environment variables.
`;
}

/**
 * Handles `design-mentor help [command]`.
 *
 * @param args - Optional command name.
 * @returns The command result.
 */
export function handleHelpCommand(args: string[]): CliCommandResult {
  const commandName = args[0];
  if (commandName === undefined) {
    return { exitCode: 0, message: getHelpText() };
  }
  const help = COMMAND_HELP.get(commandName);
  if (help === undefined) {
    return {
      exitCode: 1,
      message: `Unknown command: ${commandName}\n\nRun "design-mentor help" to see all available commands.`,
    };
  }
  return { exitCode: 0, message: help };
}
