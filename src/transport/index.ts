/**
 * Local Transport
 *
 * HTTP over the node's Unix domain socket, plus the structured errors every
 * layer above it throws.
 */

export {
  DEFAULT_TIMEOUTS,
  nodeUrl,
  UnixSocketTransport,
  type HttpMethod,
  type TransportRequestInit,
  type TransportResponse,
  type TransportTimeouts,
} from './UnixSocketTransport.js';

export {
  DecodingError,
  LaunchError,
  NodeExitError,
  RelayError,
  TransportError,
  UnexpectedStatusError,
} from './RelayError.js';

export { isConnectionError, isTransportError } from './errors.js';
