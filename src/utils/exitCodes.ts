/**
 * Semantic exit codes for script-friendly error handling.
 *
 * **STABILITY: These exit codes are part of relayctl's public API.**
 *
 * Exit codes follow semantic ranges:
 * - **0**: Success
 * - **1**: Generic failure (avoid in new code)
 * - **80-99**: User errors (invalid input, missing resources)
 * - **100-119**: Node and software errors (launch failures, IPC failures, timeouts)
 *
 * Scripts can branch on the range: 80-99 means "fix the invocation",
 * 100-119 means "the node is unreachable or misbehaving".
 */

/**
 * Exit code constants following semantic ranges.
 */
export const EXIT_CODES = {
  /** Command completed successfully */
  SUCCESS: 0,

  /** Generic failure (use specific codes when possible) */
  GENERIC_FAILURE: 1,

  // User Errors (80-99)

  /** Invalid command-line arguments or options */
  INVALID_ARGUMENTS: 81,

  /** Requested resource not found (socket, payload file) */
  RESOURCE_NOT_FOUND: 83,

  // Node Errors (100-119)

  /** Node process could not be started or never became ready */
  NODE_LAUNCH_FAILURE: 100,

  /** Node socket unreachable (missing, refused, reset) */
  NODE_CONNECTION_FAILURE: 101,

  /** Node did not answer within the transport timeouts */
  NODE_TIMEOUT: 102,

  /** Node answered with a status other than 200 */
  NODE_REJECTED_REQUEST: 103,

  /** Node answered 200 but the body could not be decoded */
  NODE_RESPONSE_MALFORMED: 104,

  /** Unhandled exception in code */
  UNHANDLED_EXCEPTION: 105,

  /** Supervised node exited non-zero or was killed by a signal nobody sent it */
  NODE_UNEXPECTED_EXIT: 106,

  /** Generic software error (use specific codes when possible) */
  SOFTWARE_ERROR: 110,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];
