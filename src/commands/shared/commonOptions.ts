import { Option } from 'commander';

import { TransactionHash } from '@/client/TransactionHash.js';
import { decodeBase64 } from '@/client/encoding.js';
import { getSocketPathFromEnv } from '@/constants.js';
import { DecodingError } from '@/transport/RelayError.js';
import { CommandError } from '@/ui/errors/index.js';
import { missingSocketError } from '@/ui/messages/errors.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

const SOCKET_ENV_VAR = 'RELAYCTL_SOCKET';

/**
 * Options shared by every command that talks to the node.
 */
export interface SocketCommandOptions {
  socket?: string;
}

/**
 * Shared --json flag for all commands that support JSON output.
 */
export const jsonOption = new Option('-j, --json', 'Output as JSON').default(false);

/**
 * Shared --socket option. Falls back to RELAYCTL_SOCKET when omitted.
 */
export const socketOption = new Option(
  '-s, --socket <path>',
  `Node IPC socket path (default: $${SOCKET_ENV_VAR})`
);

/**
 * Repeatable --to option collecting base64 recipient keys.
 * Accepts `--to a --to b` as well as `--to a,b`.
 */
export const recipientsOption = new Option(
  '-t, --to <key...>',
  'Recipient public key (base64), repeatable'
).makeOptionMandatory();

/**
 * Resolve the node socket: --socket first, then RELAYCTL_SOCKET.
 *
 * @throws CommandError (INVALID_ARGUMENTS) when neither is set
 */
export function resolveSocketPath(options: SocketCommandOptions): string {
  const fromFlag = options.socket?.trim();
  if (fromFlag) {
    return fromFlag;
  }

  const fromEnv = getSocketPathFromEnv();
  if (fromEnv) {
    return fromEnv;
  }

  throw new CommandError(
    missingSocketError(SOCKET_ENV_VAR),
    { suggestion: 'relayctl upcheck --socket /path/to/node.ipc' },
    EXIT_CODES.INVALID_ARGUMENTS
  );
}

/**
 * Flatten `--to a,b --to c` into `['a', 'b', 'c']`, dropping blanks.
 */
export function normalizeRecipients(values: readonly string[]): string[] {
  return values
    .flatMap((value) => value.split(','))
    .map((value) => value.trim())
    .filter((value) => value.length > 0);
}

/**
 * Parse a base64 key argument.
 *
 * @throws CommandError (INVALID_ARGUMENTS) for malformed base64
 */
export function parseKeyArgument(text: string, label: string): Buffer {
  try {
    return decodeBase64(text.trim(), label);
  } catch (error) {
    throw asInvalidArgument(error, label);
  }
}

/**
 * Parse a base64 transaction hash argument.
 *
 * @throws CommandError (INVALID_ARGUMENTS) for malformed base64 or wrong length
 */
export function parseHashArgument(text: string): TransactionHash {
  try {
    return TransactionHash.fromBase64(text);
  } catch (error) {
    throw asInvalidArgument(error, 'transaction hash');
  }
}

function asInvalidArgument(error: unknown, label: string): unknown {
  if (!(error instanceof DecodingError)) {
    return error;
  }
  return new CommandError(
    error.message,
    { suggestion: `Pass the ${label} as standard base64 (quote it if it contains + or /)` },
    EXIT_CODES.INVALID_ARGUMENTS
  );
}
