/**
 * StubNode - in-process stand-in for the relay node's IPC API
 *
 * Listens for HTTP on a Unix socket in a fresh temp directory, records every
 * request, and answers from routes registered by the test. Unrouted requests
 * get 404.
 *
 * Usage:
 * ```typescript
 * const stub = await StubNode.start();
 * stub.route('GET', '/upcheck', { body: "I'm up!" });
 * // ... exercise a client bound to stub.socketPath ...
 * await stub.stop(); // REQUIRED in afterEach
 * ```
 */

import * as fs from 'node:fs';
import * as http from 'node:http';
import * as os from 'node:os';
import * as path from 'node:path';

import type { IncomingHttpHeaders } from 'node:http';

export interface RecordedRequest {
  method: string;
  /** Raw path as sent, percent-escapes intact */
  path: string;
  /** Path segments after percent-decoding */
  segments: string[];
  headers: IncomingHttpHeaders;
  body: Buffer;
}

export interface StubReply {
  status?: number;
  headers?: Record<string, string>;
  body?: string | Buffer;
  /** Never answer (response header timeout) */
  hang?: boolean;
  /** Send status, headers and body, then never finish the response */
  stallBody?: boolean;
}

export type StubHandler = (request: RecordedRequest) => StubReply;

interface Route {
  method: string;
  path: string | RegExp;
  handler: StubHandler;
}

export class StubNode {
  public readonly socketPath: string;
  public readonly requests: RecordedRequest[] = [];

  private readonly tmpDir: string;
  private readonly routes: Route[] = [];
  private readonly server: http.Server;

  private constructor(tmpDir: string) {
    this.tmpDir = tmpDir;
    this.socketPath = path.join(tmpDir, 'node.ipc');
    this.server = http.createServer((req, res) => {
      const chunks: Buffer[] = [];
      req.on('data', (chunk: Buffer) => chunks.push(chunk));
      req.on('end', () => {
        const rawPath = (req.url ?? '/').split('?')[0] ?? '/';
        const recorded: RecordedRequest = {
          method: req.method ?? 'GET',
          path: rawPath,
          segments: rawPath
            .split('/')
            .filter((segment) => segment.length > 0)
            .map((segment) => decodeURIComponent(segment)),
          headers: req.headers,
          body: Buffer.concat(chunks),
        };
        this.requests.push(recorded);
        this.respond(res, this.match(recorded)(recorded));
      });
    });
  }

  /**
   * Start a stub node on a fresh socket.
   */
  static async start(): Promise<StubNode> {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'relayctl-stub-'));
    const stub = new StubNode(tmpDir);
    await new Promise<void>((resolve, reject) => {
      stub.server.once('error', reject);
      stub.server.listen(stub.socketPath, () => {
        stub.server.off('error', reject);
        resolve();
      });
    });
    return stub;
  }

  /**
   * Answer `method path` with a fixed reply or a handler.
   * Later routes win over earlier ones.
   */
  route(method: string, routePath: string | RegExp, reply: StubReply | StubHandler): this {
    const handler: StubHandler = typeof reply === 'function' ? reply : () => reply;
    this.routes.unshift({ method, path: routePath, handler });
    return this;
  }

  get lastRequest(): RecordedRequest | undefined {
    return this.requests[this.requests.length - 1];
  }

  /**
   * Stop listening, drop open connections and remove the temp directory.
   */
  async stop(): Promise<void> {
    this.server.closeAllConnections();
    await new Promise<void>((resolve) => {
      this.server.close(() => resolve());
    });
    fs.rmSync(this.tmpDir, { recursive: true, force: true });
  }

  private match(request: RecordedRequest): StubHandler {
    const route = this.routes.find(
      (candidate) =>
        candidate.method === request.method &&
        (typeof candidate.path === 'string'
          ? candidate.path === request.path
          : candidate.path.test(request.path))
    );
    return route?.handler ?? (() => ({ status: 404, body: 'Not Found' }));
  }

  private respond(res: http.ServerResponse, reply: StubReply): void {
    if (reply.hang) {
      return;
    }

    res.writeHead(reply.status ?? 200, reply.headers ?? {});
    if (reply.stallBody) {
      res.write(reply.body ?? '');
      return;
    }
    res.end(reply.body ?? '');
  }
}
