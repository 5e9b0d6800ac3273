#!/usr/bin/env node

/**
 * design-mentor CLI entry point.
 */

import { runCli } from './run.js';
import { withErrorHandling } from './utils/errorHandling.js';

withErrorHandling(() => runCli(process.argv.slice(2)));
