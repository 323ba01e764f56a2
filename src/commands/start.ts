import { Option, type Command } from 'commander';

import type { ChildProcess } from 'child_process';

import { runCommand, type BaseCommandOptions } from '@/commands/shared/CommandRunner.js';
import {
  jsonOption,
  resolveSocketPath,
  socketOption,
  type SocketCommandOptions,
} from '@/commands/shared/commonOptions.js';
import type { StartResult } from '@/commands/types.js';
import { launchNode, stopNode, type LaunchOptions } from '@/node/supervisor.js';
import { NodeExitError } from '@/transport/RelayError.js';
import { createLogger } from '@/ui/logging/index.js';
import { joinLines } from '@/ui/formatting.js';

const log = createLogger('relayctl');

interface StartOptions extends BaseCommandOptions, SocketCommandOptions {
  binary?: string;
  wait?: boolean;
  timeout?: number;
}

const binaryOption = new Option(
  '-b, --binary <path>',
  'Node executable (default: $RELAYCTL_NODE_BINARY or constellation-node)'
);

const waitOption = new Option('-w, --wait', 'Poll /upcheck until the node is ready').default(
  false
);

const timeoutOption = new Option('--timeout <ms>', 'Readiness timeout in milliseconds')
  .default(5000)
  .argParser((value) => parseInt(value, 10));

function formatStart(data: StartResult): string {
  return joinLines(
    `Node exited (PID ${data.pid ?? 'unknown'})`,
    data.exitCode !== null && `  Exit code: ${data.exitCode}`,
    data.signal !== null && `  Signal:    ${data.signal}`
  );
}

/**
 * Wait for the node to exit, stopping it first if this process is asked to quit.
 *
 * A node stopped on request may exit however it likes. Otherwise only a clean
 * exit (status 0) resolves; anything else rejects with NodeExitError.
 */
export function superviseUntilExit(child: ChildProcess): Promise<StartResult> {
  return new Promise((resolve, reject) => {
    let stopRequested = false;

    const onSignal = (signal: NodeJS.Signals): void => {
      log.debug(`Received ${signal}, stopping node`);
      stopRequested = true;
      void stopNode(child);
    };

    process.once('SIGINT', onSignal);
    process.once('SIGTERM', onSignal);

    const finish = (): void => {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);

      const pid = child.pid ?? null;
      const status = child.exitCode;
      const signal = child.signalCode;
      const failed = signal !== null || (status !== null && status !== 0);
      if (failed && !stopRequested) {
        reject(new NodeExitError(pid, status, signal));
        return;
      }
      resolve({ pid, exitCode: status, signal });
    };

    if (child.exitCode !== null || child.signalCode !== null) {
      finish();
      return;
    }
    child.once('exit', finish);
  });
}

/**
 * Register start command
 */
export function registerStartCommand(program: Command): void {
  program
    .command('start')
    .description('Launch the node and stay attached, forwarding its diagnostics')
    .argument('<config>', 'Node configuration file')
    .addOption(binaryOption)
    .addOption(waitOption)
    .addOption(timeoutOption)
    .addOption(socketOption)
    .addOption(jsonOption)
    .action(async (configPath: string, options: StartOptions) => {
      await runCommand(
        async (opts) => {
          const launchOptions: LaunchOptions = {};
          if (opts.binary !== undefined) {
            launchOptions.binary = opts.binary;
          }
          if (opts.wait) {
            launchOptions.readiness = { socketPath: resolveSocketPath(opts) };
            if (opts.timeout !== undefined && !Number.isNaN(opts.timeout)) {
              launchOptions.readiness.timeoutMs = opts.timeout;
            }
          }

          const child = await launchNode(configPath, launchOptions);
          log.info(`Node started (PID ${child.pid ?? 'unknown'})`);

          return { data: await superviseUntilExit(child) };
        },
        options,
        formatStart
      );
    });
}
