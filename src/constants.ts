/**
 * Centralized configuration constants for relayctl
 *
 * Timing values, wire names and environment overrides used throughout the
 * package live here so the transport, client and supervisor agree on them.
 */

// ============================================================================
// LOCAL TRANSPORT
// ============================================================================

/**
 * URL scheme for requests addressed over a Unix domain socket.
 */
export const UNIX_URL_SCHEME = 'http+unix:';

/**
 * Virtual host routed to the node's socket.
 * Every request URL is `http+unix://relay/<path>`.
 */
export const VIRTUAL_HOST = 'relay';

/**
 * Connection establishment timeout (1 second)
 * The node is a local process; a slow connect means it is not listening.
 */
export const DIAL_TIMEOUT_MS = 1000;

/**
 * Full request timeout (5 seconds), from dispatch until the body is read.
 */
export const REQUEST_TIMEOUT_MS = 5000;

/**
 * Response header timeout (5 seconds), from the end of the request write
 * until the status line and headers arrive.
 */
export const RESPONSE_HEADER_TIMEOUT_MS = 5000;

// ============================================================================
// NODE ENDPOINTS & HEADERS
// ============================================================================

export const ENDPOINTS = {
  UPCHECK: 'upcheck',
  SEND_RAW: 'sendraw',
  SEND_SIGNED_TX: 'sendsignedtx',
  RECEIVE_RAW: 'receiveraw',
  TRANSACTION: 'transaction',
} as const;

export const HEADERS = {
  FROM: 'c11n-from',
  TO: 'c11n-to',
  KEY: 'c11n-key',
  CONTENT_TYPE: 'Content-Type',
} as const;

export const CONTENT_TYPES = {
  JSON: 'application/json',
  OCTET_STREAM: 'application/octet-stream',
} as const;

/**
 * Separator between base64 identifiers in `c11n-to` and participant lists.
 */
export const PARTICIPANT_SEPARATOR = ',';

/**
 * Size in bytes of an encrypted payload hash (SHA3-512 digest).
 */
export const TRANSACTION_HASH_BYTES = 64;

// ============================================================================
// PROCESS SUPERVISION
// ============================================================================

/**
 * Node executable, looked up on PATH.
 */
export const DEFAULT_NODE_BINARY = 'constellation-node';

/**
 * Pause after spawning the node before returning (100ms)
 * Gives the node time to bind its socket. Callers still probe health.
 */
export const NODE_SETTLE_MS = 100;

/**
 * Readiness polling defaults used when the caller opts into polling.
 */
export const READINESS_TIMEOUT_MS = 5000;
export const READINESS_INTERVAL_MS = 100;

/**
 * Grace period between SIGTERM and SIGKILL when stopping the node.
 */
export const NODE_STOP_TIMEOUT_MS = 5000;

// ============================================================================
// ENVIRONMENT OVERRIDES
// ============================================================================

const SOCKET_PATH_ENV = 'RELAYCTL_SOCKET';
const NODE_BINARY_ENV = 'RELAYCTL_NODE_BINARY';

/**
 * Socket path from RELAYCTL_SOCKET, if set to a non-blank value.
 */
export function getSocketPathFromEnv(): string | undefined {
  const value = process.env[SOCKET_PATH_ENV];
  return value !== undefined && value.trim().length > 0 ? value : undefined;
}

/**
 * Node executable, overridable via RELAYCTL_NODE_BINARY.
 */
export function getNodeBinary(): string {
  const value = process.env[NODE_BINARY_ENV];
  return value !== undefined && value.trim().length > 0 ? value : DEFAULT_NODE_BINARY;
}
