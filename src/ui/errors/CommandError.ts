/**
 * Structured error for CLI commands: a message plus suggestions and an exit code.
 */

import { EXIT_CODES } from '@/utils/exitCodes.js';

/**
 * Extra lines shown under a command error.
 */
export interface ErrorMetadata {
  /** How to fix the invocation */
  suggestion?: string;
  /** Technical detail */
  note?: string;
}

/**
 * Error thrown by command handlers for invalid input and missing resources.
 *
 * @example
 * ```typescript
 * throw new CommandError(
 *   'Payload file not found: ./tx.bin',
 *   { suggestion: 'Pass - to read the payload from stdin' },
 *   EXIT_CODES.RESOURCE_NOT_FOUND
 * );
 * ```
 */
export class CommandError extends Error {
  public readonly metadata: ErrorMetadata;
  public readonly exitCode: number;

  constructor(
    message: string,
    metadata: ErrorMetadata = {},
    exitCode: number = EXIT_CODES.GENERIC_FAILURE
  ) {
    super(message);
    this.name = 'CommandError';
    this.metadata = metadata;
    this.exitCode = exitCode;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CommandError);
    }
  }
}
