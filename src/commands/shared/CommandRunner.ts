import { RelayError, TransportError } from '@/transport/RelayError.js';
import { isConnectionError } from '@/transport/errors.js';
import { CommandError, type ErrorMetadata } from '@/ui/errors/index.js';
import { genericError, nodeNotRunningError } from '@/ui/messages/errors.js';
import { OutputBuilder } from '@/ui/OutputBuilder.js';
import { getErrorMessage } from '@/utils/errors.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

/**
 * Standard options supported by CommandRunner.
 * All commands that use CommandRunner must extend this interface.
 */
export interface BaseCommandOptions {
  /** Output as JSON instead of human-readable format */
  json?: boolean;
}

/**
 * Result from a command handler. Failures are thrown, never returned.
 */
export interface CommandResult<T = unknown> {
  /** Data to output */
  data: T;
}

export type CommandHandler<TOptions extends BaseCommandOptions, TResult = unknown> = (
  options: TOptions
) => Promise<CommandResult<TResult>>;

/**
 * Formatter for human-readable output. Returning null prints nothing, for
 * commands that already wrote their output (raw payload bytes).
 */
export type CommandFormatter<TResult = unknown> = (data: TResult) => string | null;

/**
 * A thrown error reduced to what the CLI prints and the code it exits with.
 */
export interface CommandFailure {
  message: string;
  exitCode: number;
  metadata: ErrorMetadata;
  /** Set when the node's socket is missing or refusing connections */
  nodeNotRunning: boolean;
}

/**
 * Map any thrown value to a CommandFailure.
 *
 * - CommandError keeps its message, metadata and exit code
 * - ENOENT/ECONNREFUSED transport errors mean the node is not running (83)
 * - Other RelayErrors use their own exit code (100-104)
 * - Anything else is an unhandled exception (105)
 */
export function classifyError(error: unknown): CommandFailure {
  if (error instanceof CommandError) {
    return {
      message: error.message,
      exitCode: error.exitCode,
      metadata: error.metadata,
      nodeNotRunning: false,
    };
  }

  if (error instanceof TransportError && isConnectionError(error)) {
    return {
      message: 'Node not running',
      exitCode: EXIT_CODES.RESOURCE_NOT_FOUND,
      metadata: {
        suggestion: 'Start it with: relayctl start <config> --socket <path> --wait',
        note: `Socket: ${error.socketPath}`,
      },
      nodeNotRunning: true,
    };
  }

  if (error instanceof RelayError) {
    return {
      message: error.message,
      exitCode: error.exitCode,
      metadata: {},
      nodeNotRunning: false,
    };
  }

  return {
    message: getErrorMessage(error),
    exitCode: EXIT_CODES.UNHANDLED_EXCEPTION,
    metadata: {},
    nodeNotRunning: false,
  };
}

/**
 * Run a command with consistent error handling, output formatting, and exit codes.
 *
 * This helper:
 * - Wraps command logic in try-catch
 * - Reports "node not running" for missing or refusing sockets
 * - Formats output as JSON or human-readable based on --json flag
 * - Calls process.exit() with the matching exit code
 *
 * @param formatter - Optional human-readable formatter (if not provided, outputs raw JSON)
 *
 * @example
 * ```typescript
 * await runCommand(
 *   async (opts) => {
 *     const client = createClient(resolveSocketPath(opts));
 *     await client.upcheck();
 *     return { data: { up: true } };
 *   },
 *   options,
 *   () => 'Node is up'
 * );
 * ```
 */
export async function runCommand<TOptions extends BaseCommandOptions, TResult = unknown>(
  handler: CommandHandler<TOptions, TResult>,
  options: TOptions,
  formatter?: CommandFormatter<TResult>
): Promise<void> {
  try {
    const result = await handler(options);

    if (options.json) {
      console.log(JSON.stringify(OutputBuilder.buildJsonSuccess({ data: result.data }), null, 2));
    } else if (formatter) {
      const formattedOutput = formatter(result.data);
      if (formattedOutput !== null) {
        console.log(formattedOutput);
      }
    } else {
      console.log(JSON.stringify(result.data, null, 2));
    }

    process.exit(EXIT_CODES.SUCCESS);
  } catch (error) {
    const failure = classifyError(error);

    if (options.json) {
      console.log(
        JSON.stringify(
          OutputBuilder.buildJsonError(failure.message, {
            exitCode: failure.exitCode,
            ...failure.metadata,
          }),
          null,
          2
        )
      );
    } else if (failure.nodeNotRunning && error instanceof TransportError) {
      console.error(
        nodeNotRunningError({ socketPath: error.socketPath, lastError: error.message })
      );
    } else {
      console.error(genericError(failure.message));
      for (const value of Object.values(failure.metadata)) {
        console.error(value);
      }
    }
    process.exit(failure.exitCode);
  }
}
