#!/usr/bin/env node

// Must stay first: modules below read the environment as they load
import 'dotenv/config';

import { runCli } from './control-plane/cli.js';

/**
 * Main entry point for the bridgeline CLI.
 */
async function main(): Promise<void> {
  try {
    await runCli();
  } catch (error) {
    console.error('Fatal error:', error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  }
}

void main();
