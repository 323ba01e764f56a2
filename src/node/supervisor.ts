/**
 * Process Supervisor - starts and stops the relay node
 *
 * This module handles:
 * - Spawning the node with its configuration file
 * - Forwarding the node's stderr for the life of the process
 * - Waiting for the node to settle (and, optionally, to answer /upcheck)
 */

import { spawn } from 'child_process';

import type { ChildProcess } from 'child_process';

import { probe } from '@/client/health.js';
import {
  getNodeBinary,
  NODE_SETTLE_MS,
  NODE_STOP_TIMEOUT_MS,
  READINESS_INTERVAL_MS,
  READINESS_TIMEOUT_MS,
} from '@/constants.js';
import { LaunchError } from '@/transport/RelayError.js';
import { UnixSocketTransport } from '@/transport/UnixSocketTransport.js';
import { createLogger } from '@/ui/logging/index.js';
import { getErrorCode, getErrorMessage } from '@/utils/errors.js';

const log = createLogger('supervisor');

/**
 * Poll the node's health endpoint after launch instead of trusting the settle delay alone.
 */
export interface ReadinessOptions {
  /** Socket the node was configured to listen on */
  socketPath: string;
  /** Give up (and kill the node) after this long. Default 5000ms. */
  timeoutMs?: number;
  /** Pause between probes. Default 100ms. */
  intervalMs?: number;
}

export interface LaunchOptions {
  /** Executable to run. Defaults to RELAYCTL_NODE_BINARY or `constellation-node`. */
  binary?: string;
  /** Where the node's stderr goes. Defaults to this process's stderr. */
  diagnostics?: NodeJS.WritableStream;
  /** Pause after spawn before returning. Default 100ms. */
  settleMs?: number;
  readiness?: ReadinessOptions;
}

/**
 * Launch the node process.
 *
 * This function:
 * 1. Spawns `<binary> <configPath>` with stderr piped
 * 2. Starts forwarding stderr to the diagnostics stream
 * 3. Waits for the spawn to succeed, then keeps an `error` listener so later
 *    failures (a kill() refused with EPERM) are logged instead of thrown
 * 4. Sleeps for the settle interval
 * 5. If requested, polls /upcheck until the node answers
 *
 * The settle interval alone does not guarantee the socket is bound; callers
 * that skip readiness polling must probe before relying on the node.
 *
 * @returns The running child process
 * @throws LaunchError if the executable cannot be started, exits early, or never becomes ready
 */
export async function launchNode(
  configPath: string,
  options: LaunchOptions = {}
): Promise<ChildProcess> {
  const binary = options.binary ?? getNodeBinary();
  const settleMs = options.settleMs ?? NODE_SETTLE_MS;

  log.debug(`Starting node: ${binary} ${configPath}`);

  const child = spawn(binary, [configPath], {
    stdio: ['ignore', 'ignore', 'pipe'],
  });

  forwardDiagnostics(child, options.diagnostics ?? process.stderr);

  await waitForSpawn(child, binary, configPath);
  child.on('error', (error: Error) => {
    log.debug(`Node (PID ${child.pid ?? 'unknown'}) process error: ${error.message}`);
  });
  log.debug(`Node spawned (PID ${child.pid ?? 'unknown'}), settling for ${settleMs}ms`);

  await sleep(settleMs);

  if (options.readiness) {
    await waitForReady(child, binary, configPath, options.readiness);
  }

  return child;
}

/**
 * Stop the node: SIGTERM, then SIGKILL if it is still running after `timeoutMs`.
 *
 * Resolves once the process has exited.
 */
export async function stopNode(
  child: ChildProcess,
  timeoutMs: number = NODE_STOP_TIMEOUT_MS
): Promise<void> {
  if (hasExited(child)) {
    return;
  }

  await new Promise<void>((resolve) => {
    const killTimer = setTimeout(() => {
      log.debug(`Node (PID ${child.pid ?? 'unknown'}) ignored SIGTERM, sending SIGKILL`);
      child.kill('SIGKILL');
    }, timeoutMs);

    child.once('exit', () => {
      clearTimeout(killTimer);
      resolve();
    });

    child.kill('SIGTERM');
  });

  log.debug(`Node stopped (exit code ${child.exitCode ?? child.signalCode ?? 'unknown'})`);
}

/**
 * Copy the node's stderr to `destination` in the background.
 *
 * Nothing waits on this copy. Stream errors are logged at debug level only.
 */
function forwardDiagnostics(child: ChildProcess, destination: NodeJS.WritableStream): void {
  const stderr = child.stderr;
  if (!stderr) {
    return;
  }

  stderr.on('error', (error: Error) => {
    log.debug(`Node stderr forwarding stopped: ${error.message}`);
  });
  stderr.pipe(destination, { end: false });
}

function waitForSpawn(child: ChildProcess, binary: string, configPath: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const onSpawn = (): void => {
      child.off('error', onError);
      resolve();
    };

    const onError = (error: Error): void => {
      child.off('spawn', onSpawn);
      reject(
        new LaunchError(
          `Failed to start ${binary} with ${configPath}: ${error.message}`,
          binary,
          configPath,
          getErrorCode(error)
        )
      );
    };

    child.once('spawn', onSpawn);
    child.once('error', onError);
  });
}

async function waitForReady(
  child: ChildProcess,
  binary: string,
  configPath: string,
  readiness: ReadinessOptions
): Promise<void> {
  const timeoutMs = readiness.timeoutMs ?? READINESS_TIMEOUT_MS;
  const intervalMs = readiness.intervalMs ?? READINESS_INTERVAL_MS;
  const transport = new UnixSocketTransport(readiness.socketPath);
  const startTime = Date.now();
  let lastError = 'no probe attempted';

  log.debug(`Waiting up to ${timeoutMs}ms for node at ${readiness.socketPath}...`);

  try {
    while (Date.now() - startTime < timeoutMs) {
      if (hasExited(child)) {
        throw new LaunchError(
          `${binary} exited (${describeExit(child)}) before becoming ready`,
          binary,
          configPath
        );
      }

      try {
        await probe(transport);
        log.debug(`Node ready after ${Date.now() - startTime}ms`);
        return;
      } catch (error) {
        lastError = getErrorMessage(error);
      }

      await sleep(intervalMs);
    }
  } finally {
    transport.close();
  }

  child.kill();
  throw new LaunchError(
    `Node failed to become ready within ${timeoutMs}ms: ${lastError}`,
    binary,
    configPath
  );
}

function hasExited(child: ChildProcess): boolean {
  return child.exitCode !== null || child.signalCode !== null;
}

function describeExit(child: ChildProcess): string {
  if (child.signalCode !== null) {
    return `signal ${child.signalCode}`;
  }
  return `code ${child.exitCode ?? 'unknown'}`;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
