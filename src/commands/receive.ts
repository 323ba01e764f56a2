import { writeFile } from 'fs/promises';

import { Option, type Command } from 'commander';

import { createClient } from '@/client/PayloadClient.js';
import { encodeBase64 } from '@/client/encoding.js';
import { runCommand, type BaseCommandOptions } from '@/commands/shared/CommandRunner.js';
import {
  jsonOption,
  parseKeyArgument,
  resolveSocketPath,
  socketOption,
  type SocketCommandOptions,
} from '@/commands/shared/commonOptions.js';
import type { ReceiveResult } from '@/commands/types.js';
import { formatBytes } from '@/ui/formatting.js';

interface ReceiveOptions extends BaseCommandOptions, SocketCommandOptions {
  out?: string;
}

const outOption = new Option('-o, --out <file>', 'Write the payload to a file instead of stdout');

function formatReceive(data: ReceiveResult): string | null {
  if (data.out === undefined) {
    return null;
  }
  return `Wrote ${formatBytes(data.bytes)} to ${data.out}`;
}

function writeStdout(payload: Buffer): Promise<void> {
  return new Promise((resolve, reject) => {
    process.stdout.write(payload, (error) => {
      if (error) {
        reject(error);
      } else {
        resolve();
      }
    });
  });
}

/**
 * Register receive command
 */
export function registerReceiveCommand(program: Command): void {
  program
    .command('receive')
    .description('Fetch the payload stored under a key')
    .argument('<key>', 'Payload key (base64), as printed by send')
    .addOption(outOption)
    .addOption(socketOption)
    .addOption(jsonOption)
    .action(async (keyText: string, options: ReceiveOptions) => {
      await runCommand(
        async (opts) => {
          const socketPath = resolveSocketPath(opts);
          const key = parseKeyArgument(keyText, 'payload key');
          const client = createClient(socketPath);
          const payload = await client.receivePayload(key).finally(() => client.close());

          const result: ReceiveResult = { bytes: payload.byteLength };
          if (opts.out !== undefined) {
            await writeFile(opts.out, payload);
            result.out = opts.out;
          } else if (opts.json) {
            result.payload = encodeBase64(payload);
          } else {
            await writeStdout(payload);
          }
          return { data: result };
        },
        options,
        formatReceive
      );
    });
}
