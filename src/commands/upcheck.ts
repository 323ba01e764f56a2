import type { Command } from 'commander';

import { createClient } from '@/client/PayloadClient.js';
import { runCommand, type BaseCommandOptions } from '@/commands/shared/CommandRunner.js';
import {
  jsonOption,
  resolveSocketPath,
  socketOption,
  type SocketCommandOptions,
} from '@/commands/shared/commonOptions.js';
import type { UpcheckResult } from '@/commands/types.js';

interface UpcheckOptions extends BaseCommandOptions, SocketCommandOptions {}

function formatUpcheck(data: UpcheckResult): string {
  return `Node is up (${data.socketPath}, ${data.latencyMs}ms)`;
}

/**
 * Register upcheck command
 */
export function registerUpcheckCommand(program: Command): void {
  program
    .command('upcheck')
    .description('Check that the node is accepting requests')
    .addOption(socketOption)
    .addOption(jsonOption)
    .action(async (options: UpcheckOptions) => {
      await runCommand(
        async (opts) => {
          const socketPath = resolveSocketPath(opts);
          const client = createClient(socketPath);
          const startedAt = Date.now();
          try {
            await client.upcheck();
          } finally {
            client.close();
          }
          return { data: { socketPath, latencyMs: Date.now() - startedAt } };
        },
        options,
        formatUpcheck
      );
    });
}
