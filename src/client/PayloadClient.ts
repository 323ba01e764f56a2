/**
 * Payload Client
 *
 * Request/response contracts for distributing opaque encrypted payloads
 * through a locally running node. Every operation is one independent request:
 * transport failures propagate unchanged, any status other than 200 becomes
 * UnexpectedStatusError, and only then is the body decoded.
 */

import { CONTENT_TYPES, ENDPOINTS, HEADERS } from '@/constants.js';
import { UnexpectedStatusError } from '@/transport/RelayError.js';
import {
  nodeUrl,
  UnixSocketTransport,
  type TransportRequestInit,
  type TransportResponse,
  type TransportTimeouts,
} from '@/transport/UnixSocketTransport.js';
import { createLogger } from '@/ui/logging/index.js';

import {
  decodeBase64,
  encodeBase64,
  escapePathSegment,
  isEmptyParticipant,
  joinRecipients,
  participantToBase64,
  splitParticipants,
  toJSONBody,
  type ParticipantKey,
} from './encoding.js';
import { probe } from './health.js';
import type { TransactionHash } from './TransactionHash.js';

const log = createLogger('client');

export class PayloadClient {
  private readonly transport: UnixSocketTransport;

  constructor(transport: UnixSocketTransport) {
    this.transport = transport;
  }

  get socketPath(): string {
    return this.transport.socketPath;
  }

  /**
   * Liveness check, see {@link probe}.
   */
  upcheck(): Promise<void> {
    return probe(this.transport);
  }

  /**
   * POST a JSON-encoded request to `path` and hand back the raw response.
   */
  async sendJSON(path: string, request: unknown): Promise<TransportResponse> {
    return this.execute(path, {
      method: 'POST',
      headers: { [HEADERS.CONTENT_TYPE]: CONTENT_TYPES.JSON },
      body: toJSONBody(request),
      requestName: `sendJSON ${path}`,
    });
  }

  /**
   * Distribute a payload to `recipients` and return the key the node stored it under.
   *
   * An empty `sender` omits `c11n-from`; the node then uses its own default key.
   */
  async sendPayload(
    payload: Uint8Array,
    sender: ParticipantKey | undefined,
    recipients: readonly ParticipantKey[]
  ): Promise<Buffer> {
    const headers: Record<string, string> = {
      [HEADERS.CONTENT_TYPE]: CONTENT_TYPES.OCTET_STREAM,
      [HEADERS.TO]: joinRecipients(recipients),
    };
    if (sender !== undefined && !isEmptyParticipant(sender)) {
      headers[HEADERS.FROM] = participantToBase64(sender);
    }

    const res = await this.execute(ENDPOINTS.SEND_RAW, {
      method: 'POST',
      headers,
      body: payload,
      requestName: 'sendPayload',
    });
    return decodeBase64(res.body.toString('utf8'), 'sendPayload response');
  }

  /**
   * Distribute an already signed payload. The signature identifies the sender,
   * so no `c11n-from` header is sent.
   */
  async sendSignedPayload(
    signedPayload: Uint8Array,
    recipients: readonly ParticipantKey[]
  ): Promise<Buffer> {
    const res = await this.execute(ENDPOINTS.SEND_SIGNED_TX, {
      method: 'POST',
      headers: {
        [HEADERS.CONTENT_TYPE]: CONTENT_TYPES.OCTET_STREAM,
        [HEADERS.TO]: joinRecipients(recipients),
      },
      body: signedPayload,
      requestName: 'sendSignedPayload',
    });
    return decodeBase64(res.body.toString('utf8'), 'sendSignedPayload response');
  }

  /**
   * Fetch the decrypted payload stored under `key`. The body is returned as is.
   */
  async receivePayload(key: Uint8Array): Promise<Buffer> {
    const res = await this.execute(ENDPOINTS.RECEIVE_RAW, {
      method: 'GET',
      headers: { [HEADERS.KEY]: encodeBase64(key) },
      requestName: 'receivePayload',
    });
    return res.body;
  }

  /**
   * Whether this node sent the transaction. Only the exact body `true` counts.
   */
  async isSender(txHash: TransactionHash): Promise<boolean> {
    const res = await this.execute(transactionPath(txHash, 'isSender'), {
      method: 'GET',
      requestName: 'isSender',
    });
    return res.body.toString('utf8') === 'true';
  }

  /**
   * Base64 keys of the transaction's participants, in the node's order.
   *
   * An empty body yields `['']`.
   */
  async getParticipants(txHash: TransactionHash): Promise<string[]> {
    const res = await this.execute(transactionPath(txHash, 'participants'), {
      method: 'GET',
      requestName: 'getParticipants',
    });
    return splitParticipants(res.body.toString('utf8'));
  }

  /**
   * Release the transport's pooled connections.
   */
  close(): void {
    this.transport.close();
  }

  private async execute(path: string, init: TransportRequestInit): Promise<TransportResponse> {
    const res = await this.transport.request(nodeUrl(path), init);
    if (res.status !== 200) {
      const operation = init.requestName ?? path;
      log.debug(`${operation} rejected with status ${res.status}`);
      throw new UnexpectedStatusError(operation, res.status, res.statusText, res.headers);
    }
    return res;
  }
}

function transactionPath(txHash: TransactionHash, query: 'isSender' | 'participants'): string {
  return `${ENDPOINTS.TRANSACTION}/${escapePathSegment(txHash.toBase64())}/${query}`;
}

/**
 * Create a client bound to the node socket at `socketPath`.
 *
 * Each call returns an independent client; several may target different
 * sockets at once.
 */
export function createClient(
  socketPath: string,
  timeouts: Partial<TransportTimeouts> = {}
): PayloadClient {
  return new PayloadClient(new UnixSocketTransport(socketPath, timeouts));
}
