#!/usr/bin/env node

import { Command } from 'commander';

import { commandRegistry } from '@/commandRegistry.js';
import { enableDebugLogging } from '@/ui/logging/index.js';
import { VERSION } from '@/utils/version.js';

// Commander Configuration
const CLI_NAME = 'relayctl';
const CLI_DESCRIPTION = 'Supervise a local relay node and distribute encrypted payloads over IPC';

/**
 * Main entry point.
 *
 * 1. Enable debug logging early so option parsing is traced too
 * 2. Register command handlers
 * 3. Parse arguments and route to the command; every command exits the process itself
 */
async function main(): Promise<void> {
  if (process.argv.includes('--debug')) {
    enableDebugLogging();
  }

  const program = new Command()
    .name(CLI_NAME)
    .description(CLI_DESCRIPTION)
    .version(VERSION)
    .option('--debug', 'Enable debug logging (verbose output)');

  commandRegistry.forEach((register) => register(program));

  await program.parseAsync();
}

void main();
