/**
 * Health Prober
 *
 * One idempotent liveness call against the node. No retries; callers that
 * want to wait for a node use the supervisor's readiness polling or their own
 * backoff.
 */

import { ENDPOINTS } from '@/constants.js';
import { UnexpectedStatusError } from '@/transport/RelayError.js';
import { nodeUrl, type UnixSocketTransport } from '@/transport/UnixSocketTransport.js';
import { createLogger } from '@/ui/logging/index.js';

const log = createLogger('health');

const UPCHECK_OPERATION = 'upcheck';

/**
 * Confirm the node accepts connections and answers `GET /upcheck` with 200.
 *
 * @throws TransportError if the socket is missing, refuses the connection or times out
 * @throws UnexpectedStatusError if the node answers with any other status
 */
export async function probe(transport: UnixSocketTransport): Promise<void> {
  const res = await transport.request(nodeUrl(ENDPOINTS.UPCHECK), {
    method: 'GET',
    requestName: UPCHECK_OPERATION,
  });

  if (res.status !== 200) {
    throw new UnexpectedStatusError(
      UPCHECK_OPERATION,
      res.status,
      res.statusText,
      res.headers,
      `Node API did not respond to upcheck request (status ${res.status})`
    );
  }

  log.debug(`Node at ${transport.socketPath} is up`);
}
