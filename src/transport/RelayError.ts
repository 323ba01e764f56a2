/**
 * Structured error classes for node supervision and IPC.
 *
 * Callers can tell "could not reach the node" (TransportError) from
 * "node rejected the request" (UnexpectedStatusError) from
 * "node accepted but answered garbage" (DecodingError).
 */

import type { IncomingHttpHeaders } from 'http';

import { EXIT_CODES } from '@/utils/exitCodes.js';

/**
 * Base class for all relayctl errors.
 *
 * Carries an exit code so the CLI can map failures without inspecting messages.
 */
export class RelayError extends Error {
  public readonly exitCode: number;

  constructor(message: string, exitCode: number = EXIT_CODES.SOFTWARE_ERROR) {
    super(message);
    this.name = 'RelayError';
    this.exitCode = exitCode;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, RelayError);
    }
  }
}

/**
 * Error thrown when the node process cannot be started, or exits or stays
 * unresponsive before it becomes ready.
 *
 * @example
 * ```typescript
 * throw new LaunchError('spawn constellation-node ENOENT', 'constellation-node', './node.conf', 'ENOENT');
 * ```
 */
export class LaunchError extends RelayError {
  public override readonly name = 'LaunchError';
  public readonly binary: string;
  public readonly configPath: string;
  public readonly code?: string;

  constructor(message: string, binary: string, configPath: string, code?: string) {
    super(message, EXIT_CODES.NODE_LAUNCH_FAILURE);
    this.binary = binary;
    this.configPath = configPath;
    if (code !== undefined) {
      this.code = code;
    }
  }
}

/**
 * Error thrown when a supervised node stops on its own with a failure:
 * a non-zero exit status, or a signal this process did not send.
 */
export class NodeExitError extends RelayError {
  public override readonly name = 'NodeExitError';
  public readonly pid: number | null;
  public readonly status: number | null;
  public readonly signal: NodeJS.Signals | null;

  constructor(pid: number | null, status: number | null, signal: NodeJS.Signals | null) {
    super(
      signal !== null
        ? `Node (PID ${pid ?? 'unknown'}) was killed by ${signal}`
        : `Node (PID ${pid ?? 'unknown'}) exited with code ${status ?? 'unknown'}`,
      EXIT_CODES.NODE_UNEXPECTED_EXIT
    );
    this.pid = pid;
    this.status = status;
    this.signal = signal;
  }
}

/**
 * Error thrown when the node's socket cannot be used: missing socket file,
 * connection refused or reset, or one of the transport timeouts elapsed.
 */
export class TransportError extends RelayError {
  public override readonly name = 'TransportError';
  public readonly socketPath: string;
  public readonly code?: string;
  public override readonly cause?: Error;

  constructor(message: string, socketPath: string, code?: string, cause?: Error) {
    super(
      message,
      code === 'ETIMEDOUT' ? EXIT_CODES.NODE_TIMEOUT : EXIT_CODES.NODE_CONNECTION_FAILURE
    );
    this.socketPath = socketPath;
    if (code !== undefined) {
      this.code = code;
    }
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

/**
 * Error thrown when the node answers with anything but 200.
 *
 * The response body is never decoded; status and headers are kept for diagnostics.
 *
 * @example
 * ```typescript
 * throw new UnexpectedStatusError('receivePayload', 404, 'Not Found', {});
 * ```
 */
export class UnexpectedStatusError extends RelayError {
  public override readonly name = 'UnexpectedStatusError';
  public readonly operation: string;
  public readonly status: number;
  public readonly statusText: string;
  public readonly headers: IncomingHttpHeaders;

  constructor(
    operation: string,
    status: number,
    statusText: string,
    headers: IncomingHttpHeaders,
    message: string = `${operation}: non-200 status code: ${status} ${statusText}`.trimEnd()
  ) {
    super(message, EXIT_CODES.NODE_REJECTED_REQUEST);
    this.operation = operation;
    this.status = status;
    this.statusText = statusText;
    this.headers = headers;
  }
}

/**
 * Error thrown when a 200 response body, or a value handed to the client,
 * is not in the expected encoding.
 *
 * @example
 * ```typescript
 * throw new DecodingError('sendPayload response', 'invalid base64');
 * // → "Failed to decode sendPayload response: invalid base64"
 * ```
 */
export class DecodingError extends RelayError {
  public override readonly name = 'DecodingError';
  public readonly subject: string;

  constructor(subject: string, message: string) {
    super(`Failed to decode ${subject}: ${message}`, EXIT_CODES.NODE_RESPONSE_MALFORMED);
    this.subject = subject;
  }
}
