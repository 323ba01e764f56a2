import { readFile } from 'fs/promises';
import { buffer } from 'stream/consumers';

import { Option, type Command } from 'commander';

import { createClient } from '@/client/PayloadClient.js';
import { encodeBase64 } from '@/client/encoding.js';
import { runCommand, type BaseCommandOptions } from '@/commands/shared/CommandRunner.js';
import {
  jsonOption,
  normalizeRecipients,
  recipientsOption,
  resolveSocketPath,
  socketOption,
  type SocketCommandOptions,
} from '@/commands/shared/commonOptions.js';
import type { SendResult } from '@/commands/types.js';
import { CommandError } from '@/ui/errors/index.js';
import { getErrorCode } from '@/utils/errors.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

const STDIN_MARKER = '-';

interface SendOptions extends BaseCommandOptions, SocketCommandOptions {
  to: string[];
  from?: string;
}

type SendSignedOptions = Omit<SendOptions, 'from'>;

const senderOption = new Option(
  '-f, --from <key>',
  'Sender public key (base64); omitted means the node default key'
);

/**
 * Read the payload from a file, or from stdin when the path is `-`.
 */
export async function readPayload(file: string): Promise<Buffer> {
  if (file === STDIN_MARKER) {
    return buffer(process.stdin);
  }

  try {
    return await readFile(file);
  } catch (error) {
    if (getErrorCode(error) === 'ENOENT') {
      throw new CommandError(
        `Payload file not found: ${file}`,
        { suggestion: `Pass ${STDIN_MARKER} to read the payload from stdin` },
        EXIT_CODES.RESOURCE_NOT_FOUND
      );
    }
    throw error;
  }
}

function formatSend(data: SendResult): string {
  return data.key;
}

function requireRecipients(values: readonly string[]): string[] {
  const recipients = normalizeRecipients(values);
  if (recipients.length === 0) {
    throw new CommandError(
      'At least one recipient is required',
      { suggestion: 'relayctl send tx.bin --to <base64 key>' },
      EXIT_CODES.INVALID_ARGUMENTS
    );
  }
  return recipients;
}

/**
 * Register send and send-signed commands
 */
export function registerSendCommands(program: Command): void {
  program
    .command('send')
    .description('Distribute a raw payload and print the key it is stored under')
    .argument('<file>', `Payload file (${STDIN_MARKER} for stdin)`)
    .addOption(senderOption)
    .addOption(recipientsOption)
    .addOption(socketOption)
    .addOption(jsonOption)
    .action(async (file: string, options: SendOptions) => {
      await runCommand(
        async (opts) => {
          const socketPath = resolveSocketPath(opts);
          const recipients = requireRecipients(opts.to);
          const payload = await readPayload(file);
          const client = createClient(socketPath);
          try {
            const key = await client.sendPayload(payload, opts.from, recipients);
            return {
              data: { key: encodeBase64(key), bytes: payload.byteLength, recipients, signed: false },
            };
          } finally {
            client.close();
          }
        },
        options,
        formatSend
      );
    });

  program
    .command('send-signed')
    .description('Distribute a signed payload and print the key it is stored under')
    .argument('<file>', `Signed payload file (${STDIN_MARKER} for stdin)`)
    .addOption(recipientsOption)
    .addOption(socketOption)
    .addOption(jsonOption)
    .action(async (file: string, options: SendSignedOptions) => {
      await runCommand(
        async (opts) => {
          const socketPath = resolveSocketPath(opts);
          const recipients = requireRecipients(opts.to);
          const payload = await readPayload(file);
          const client = createClient(socketPath);
          try {
            const key = await client.sendSignedPayload(payload, recipients);
            return {
              data: { key: encodeBase64(key), bytes: payload.byteLength, recipients, signed: true },
            };
          } finally {
            client.close();
          }
        },
        options,
        formatSend
      );
    });
}
