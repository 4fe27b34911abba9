#!/usr/bin/env tsx
/*
 * Headless market simulation. Submits one search per consumer, advances the
 * requested number of days and prints a single-line JSON summary to stdout.
 */

import process from 'node:process';

import { ConfigurationError } from '@agent-market/core';

import { USAGE, parseArgs } from './src/args.js';
import { runSimulation } from './src/simulate.js';

function printHelpAndExit(code: number): never {
  // Keep stdout clean for JSON consumers; print help on stderr.
  console.error(USAGE);
  // eslint-disable-next-line no-process-exit
  process.exit(code);
}

function main(): void {
  const parsed = parseArgs(process.argv.slice(2));
  if (parsed.kind === 'help') {
    printHelpAndExit(0);
  }
  if (parsed.kind === 'error') {
    console.error(`Error: ${parsed.message}`);
    printHelpAndExit(2);
  }

  try {
    const summary = runSimulation(parsed.args);
    process.stdout.write(JSON.stringify(summary) + '\n');
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(`Error: ${error.message}`);
      printHelpAndExit(2);
    }
    throw error;
  }
}

try {
  main();
} catch (error) {
  console.error('market-sim failed:', error instanceof Error ? error.message : String(error));
  // eslint-disable-next-line no-process-exit
  process.exit(1);
}
