#!/usr/bin/env node
/**
 * @fileoverview Tether CLI entry point
 *
 * Sets up global error handlers and invokes the CLI parser.
 *
 * @module index
 */

import { program } from './cli.js';

// `watch` is long-lived: log and continue on transient errors
const isWatchMode = process.argv.includes('watch');

process.on('uncaughtException', (err) => {
  console.error('Uncaught exception:', err.message);
  if (isWatchMode) {
    console.error('[RECOVERED] Watcher continuing after uncaught exception:', err.stack);
  } else {
    process.exit(1);
  }
});

process.on('unhandledRejection', (reason) => {
  console.error('Unhandled rejection:', reason);
  if (!isWatchMode) {
    process.exit(1);
  }
});

program.parseAsync().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
});
