/**
 * Transport Error Formatting
 *
 * Turns raw socket/HTTP failures into TransportError with context.
 */

import { getErrorCode } from '@/utils/errors.js';

import { TransportError } from './RelayError.js';

/**
 * Which transport timeout elapsed.
 */
export type TimeoutPhase = 'dial' | 'response header' | 'request';

export function formatConnectionError(
  requestName: string,
  socketPath: string,
  error: Error
): TransportError {
  const code = getErrorCode(error);
  const message = [
    `IPC ${requestName} connection error`,
    `Socket: ${socketPath}`,
    ...(code ? [`Code: ${code}`] : []),
    `Details: ${error.message}`,
  ].join(' | ');
  return new TransportError(message, socketPath, code, error);
}

export function formatTimeoutError(
  requestName: string,
  socketPath: string,
  phase: TimeoutPhase,
  timeoutMs: number
): TransportError {
  return new TransportError(
    `${requestName} ${phase} timeout after ${timeoutMs / 1000}s (socket ${socketPath})`,
    socketPath,
    'ETIMEDOUT'
  );
}

export function formatUnknownLocationError(url: string, socketPath: string): TransportError {
  return new TransportError(
    `No socket registered for ${url}`,
    socketPath,
    'EUNKNOWNLOCATION'
  );
}

/**
 * Narrow an unknown thrown value to a transport failure.
 */
export function isTransportError(error: unknown): error is TransportError {
  return error instanceof TransportError;
}

/**
 * Detect whether an error means the node is not running:
 * ENOENT (no socket file) or ECONNREFUSED (nothing listening).
 *
 * @example
 * ```typescript
 * try {
 *   await client.upcheck();
 * } catch (error) {
 *   if (isConnectionError(error)) {
 *     console.error('Node not running. Start it with: relayctl start <config>');
 *   }
 * }
 * ```
 */
export function isConnectionError(error: unknown): boolean {
  if (!isTransportError(error)) {
    return false;
  }
  return error.code === 'ENOENT' || error.code === 'ECONNREFUSED';
}
