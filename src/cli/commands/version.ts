/**
 * Version command handler for the design-mentor CLI.
 *
 * Displays the CLI version by reading it from the package's package.json.
 */

import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { existsSync, readFileSync } from 'node:fs';
import type { CliCommandResult } from '../types.js';

const PACKAGE_NAME = 'design-mentor';

/**
 * Reads the version from package.json, searching upwards from this module
 * so the lookup works from both the sources and the build output.
 *
 * @returns The version string, or '(unknown)' if not found.
 */
export function getVersionFromPackageJson(): string {
  let directory = dirname(fileURLToPath(import.meta.url));
  for (;;) {
    const candidate = join(directory, 'package.json');
    if (existsSync(candidate)) {
      const packageJson: unknown = JSON.parse(readFileSync(candidate, 'utf-8'));
      if (
        typeof packageJson === 'object' &&
        packageJson !== null &&
        'name' in packageJson &&
        packageJson.name === PACKAGE_NAME &&
        'version' in packageJson &&
        typeof packageJson.version === 'string'
      ) {
        return packageJson.version;
      }
    }
    const parent = dirname(directory);
    if (parent === directory) {
      return '(unknown)';
    }
    directory = parent;
  }
}

/**
 * Handles the version command.
 *
 * @returns The command result.
 */
export function handleVersionCommand(): CliCommandResult {
  return { exitCode: 0, message: `${PACKAGE_NAME} v${getVersionFromPackageJson()}` };
}
