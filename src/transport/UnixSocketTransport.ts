/**
 * Local Transport
 *
 * HTTP/1.1 over a Unix domain socket. Request URLs use a virtual host
 * (`http+unix://relay/<path>`) that is mapped to the node's socket once, at
 * construction, so callers build ordinary URLs and never see the socket path.
 */

import http from 'http';

import type { IncomingHttpHeaders, IncomingMessage, OutgoingHttpHeaders } from 'http';
import type { Socket } from 'net';

import {
  DIAL_TIMEOUT_MS,
  REQUEST_TIMEOUT_MS,
  RESPONSE_HEADER_TIMEOUT_MS,
  UNIX_URL_SCHEME,
  VIRTUAL_HOST,
} from '@/constants.js';
import { createLogger } from '@/ui/logging/index.js';

import {
  formatConnectionError,
  formatTimeoutError,
  formatUnknownLocationError,
  type TimeoutPhase,
} from './errors.js';
import type { TransportError } from './RelayError.js';

const log = createLogger('transport');

export type HttpMethod = 'GET' | 'POST';

export interface TransportRequestInit {
  method: HttpMethod;
  headers?: Record<string, string>;
  body?: Uint8Array | string;
  /** Label used in logs and error messages. Defaults to `METHOD path`. */
  requestName?: string;
}

/**
 * A fully read node response. The socket has already been released.
 */
export interface TransportResponse {
  status: number;
  statusText: string;
  headers: IncomingHttpHeaders;
  body: Buffer;
}

export interface TransportTimeouts {
  /** Connection establishment */
  dialTimeoutMs: number;
  /** Dispatch until the whole body is read */
  requestTimeoutMs: number;
  /** End of request write until status line and headers arrive */
  responseHeaderTimeoutMs: number;
}

export const DEFAULT_TIMEOUTS: Readonly<TransportTimeouts> = {
  dialTimeoutMs: DIAL_TIMEOUT_MS,
  requestTimeoutMs: REQUEST_TIMEOUT_MS,
  responseHeaderTimeoutMs: RESPONSE_HEADER_TIMEOUT_MS,
};

interface ResolvedLocation {
  socketPath: string;
  path: string;
}

/**
 * Build a request URL on the node's virtual host.
 *
 * @example
 * ```typescript
 * nodeUrl('upcheck') // → 'http+unix://relay/upcheck'
 * ```
 */
export function nodeUrl(path: string): string {
  return `${UNIX_URL_SCHEME}//${VIRTUAL_HOST}/${path.replace(/^\/+/, '')}`;
}

/**
 * HTTP transport bound to exactly one Unix domain socket.
 *
 * Immutable after construction and safe to share between concurrent callers;
 * each request takes its own connection from the keep-alive pool.
 */
export class UnixSocketTransport {
  public readonly socketPath: string;
  public readonly timeouts: Readonly<TransportTimeouts>;

  private readonly locations = new Map<string, string>();
  private readonly agent: http.Agent;

  /**
   * @param timeouts - Overrides for tests; production code uses the defaults
   */
  constructor(socketPath: string, timeouts: Partial<TransportTimeouts> = {}) {
    this.socketPath = socketPath;
    this.timeouts = { ...DEFAULT_TIMEOUTS, ...timeouts };
    this.agent = new http.Agent({ keepAlive: true });
    this.registerLocation(VIRTUAL_HOST, socketPath);
  }

  /**
   * Issue a request and read the whole response body.
   *
   * Rejects with TransportError on unknown locations, socket failures and
   * timeouts. Never inspects the status code.
   */
  request(url: string, init: TransportRequestInit): Promise<TransportResponse> {
    const location = this.resolve(url);
    if (!location) {
      return Promise.reject(formatUnknownLocationError(url, this.socketPath));
    }

    const requestName = init.requestName ?? `${init.method} ${location.path}`;
    const body = typeof init.body === 'string' ? Buffer.from(init.body, 'utf8') : init.body;
    const headers: OutgoingHttpHeaders = { Host: VIRTUAL_HOST, ...init.headers };
    if (body !== undefined) {
      headers['Content-Length'] = body.byteLength;
    }

    const { dialTimeoutMs, requestTimeoutMs, responseHeaderTimeoutMs } = this.timeouts;
    const startedAt = Date.now();

    return new Promise((resolve, reject) => {
      let settled = false;
      const timers = new Set<NodeJS.Timeout>();

      const startTimer = (phase: TimeoutPhase, timeoutMs: number): NodeJS.Timeout => {
        const timer = setTimeout(() => {
          fail(formatTimeoutError(requestName, location.socketPath, phase, timeoutMs));
        }, timeoutMs);
        timers.add(timer);
        return timer;
      };

      const stopTimer = (timer: NodeJS.Timeout | null): void => {
        if (timer) {
          clearTimeout(timer);
          timers.delete(timer);
        }
      };

      const settle = (): boolean => {
        if (settled) return false;
        settled = true;
        timers.forEach((timer) => clearTimeout(timer));
        timers.clear();
        return true;
      };

      const fail = (error: TransportError): void => {
        if (!settle()) return;
        req.destroy();
        log.debug(`${requestName} failed: ${error.message}`);
        reject(error);
      };

      const req = http.request({
        agent: this.agent,
        socketPath: location.socketPath,
        method: init.method,
        path: location.path,
        headers,
      });

      startTimer('request', requestTimeoutMs);

      req.once('socket', (socket: Socket) => {
        if (!socket.connecting) {
          return;
        }
        const dialTimer = startTimer('dial', dialTimeoutMs);
        socket.once('connect', () => {
          stopTimer(dialTimer);
          log.debug(`Connected to node for ${requestName} request`);
        });
      });

      let headerTimer: NodeJS.Timeout | null = null;
      req.once('finish', () => {
        if (!settled) {
          headerTimer = startTimer('response header', responseHeaderTimeoutMs);
        }
      });

      req.once('response', (res: IncomingMessage) => {
        stopTimer(headerTimer);
        const chunks: Buffer[] = [];

        res.on('data', (chunk: Buffer) => {
          chunks.push(chunk);
        });

        res.once('error', (err: Error) => {
          fail(formatConnectionError(requestName, location.socketPath, err));
        });

        res.once('end', () => {
          if (!settle()) return;
          const status = res.statusCode ?? 0;
          log.debug(`${requestName} → ${status} in ${Date.now() - startedAt}ms`);
          resolve({
            status,
            statusText: res.statusMessage ?? '',
            headers: res.headers,
            body: Buffer.concat(chunks),
          });
        });
      });

      req.on('error', (err: Error) => {
        fail(formatConnectionError(requestName, location.socketPath, err));
      });

      if (body !== undefined) {
        req.end(body);
      } else {
        req.end();
      }
    });
  }

  /**
   * Release pooled keep-alive connections.
   */
  close(): void {
    this.agent.destroy();
  }

  private registerLocation(host: string, socketPath: string): void {
    this.locations.set(host, socketPath);
  }

  private resolve(url: string): ResolvedLocation | null {
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      return null;
    }

    if (parsed.protocol !== UNIX_URL_SCHEME) {
      return null;
    }

    const socketPath = this.locations.get(parsed.hostname);
    if (socketPath === undefined) {
      return null;
    }

    return { socketPath, path: `${parsed.pathname}${parsed.search}` };
  }
}
