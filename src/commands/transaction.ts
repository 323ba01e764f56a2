import type { Command } from 'commander';

import { createClient } from '@/client/PayloadClient.js';
import { runCommand, type BaseCommandOptions } from '@/commands/shared/CommandRunner.js';
import {
  jsonOption,
  parseHashArgument,
  resolveSocketPath,
  socketOption,
  type SocketCommandOptions,
} from '@/commands/shared/commonOptions.js';
import type { IsSenderResult, ParticipantsResult } from '@/commands/types.js';
import { joinLines } from '@/ui/formatting.js';

type TransactionOptions = BaseCommandOptions & SocketCommandOptions;

function formatIsSender(data: IsSenderResult): string {
  return String(data.isSender);
}

/**
 * One key per line. The node's empty answer (`[""]`) prints nothing.
 */
function formatParticipants(data: ParticipantsResult): string | null {
  const keys = data.participants.filter((key) => key.length > 0);
  return keys.length > 0 ? joinLines(...keys) : null;
}

/**
 * Register is-sender and participants commands
 */
export function registerTransactionCommands(program: Command): void {
  program
    .command('is-sender')
    .description('Print whether this node sent a transaction')
    .argument('<hash>', 'Transaction hash (base64)')
    .addOption(socketOption)
    .addOption(jsonOption)
    .action(async (hashText: string, options: TransactionOptions) => {
      await runCommand(
        async (opts) => {
          const socketPath = resolveSocketPath(opts);
          const hash = parseHashArgument(hashText);
          const client = createClient(socketPath);
          try {
            const isSender = await client.isSender(hash);
            return { data: { hash: hash.toBase64(), isSender } };
          } finally {
            client.close();
          }
        },
        options,
        formatIsSender
      );
    });

  program
    .command('participants')
    .description('List the participants of a transaction')
    .argument('<hash>', 'Transaction hash (base64)')
    .addOption(socketOption)
    .addOption(jsonOption)
    .action(async (hashText: string, options: TransactionOptions) => {
      await runCommand(
        async (opts) => {
          const socketPath = resolveSocketPath(opts);
          const hash = parseHashArgument(hashText);
          const client = createClient(socketPath);
          try {
            const participants = await client.getParticipants(hash);
            return { data: { hash: hash.toBase64(), participants } };
          } finally {
            client.close();
          }
        },
        options,
        formatParticipants
      );
    });
}
