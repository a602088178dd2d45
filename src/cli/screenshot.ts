#!/usr/bin/env node
/**
 * CLI: Screenshot Capture
 *
 * Usage:
 *   pagesnap (-u <url> | -f <file>) [options]
 *
 * Example:
 *   pagesnap -f urls.txt --output ./screenshots --format jpeg --quality 85
 */

import { runCli } from '../lib/cli/index.js';

runCli(process.argv.slice(2)).then(
  (exitCode) => process.exit(exitCode),
  (error: unknown) => {
    console.error('❌ Error:', error instanceof Error ? error.message : error);
    process.exit(1);
  }
);
