/**
 * Payload Client Contract Tests
 *
 * Tests each operation against an in-process stub node over a real Unix socket.
 *
 * Contract:
 * - Input: payloads, participant keys, transaction hashes
 * - Output: decoded results, or typed errors
 * - Behavior: request shape (path, headers, body), strict 200 check before decoding
 */

import assert from 'node:assert/strict';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, it } from 'node:test';

import { StubNode, type RecordedRequest } from '@/__testutils__/index.js';
import { createClient, type PayloadClient } from '@/client/PayloadClient.js';
import { TransactionHash } from '@/client/TransactionHash.js';
import {
  DecodingError,
  TransportError,
  UnexpectedStatusError,
} from '@/transport/RelayError.js';

const RECIPIENT_ONE = 'cmVjaXBpZW50LW9uZQ==';
const RECIPIENT_TWO = 'cmVjaXBpZW50LXR3bw==';
const SENDER = 'c2VuZGVyLWtleQ==';

const SLASH_HASH = TransactionHash.fromBytes(new Uint8Array(64).fill(0xff));
const SLASH_HASH_BASE64 = `${'/'.repeat(85)}w==`;
const PLUS_HASH = TransactionHash.fromBytes(Uint8Array.from({ length: 64 }, (_, i) => i));
const PLUS_HASH_BASE64 =
  'AAECAwQFBgcICQoLDA0ODxAREhMUFRYXGBkaGxwdHh8gISIjJCUmJygpKissLS4vMDEyMzQ1Njc4OTo7PD0+Pw==';

const IS_SENDER_PATH = /^\/transaction\/[^/]+\/isSender$/;
const PARTICIPANTS_PATH = /^\/transaction\/[^/]+\/participants$/;

function requireLastRequest(stub: StubNode): RecordedRequest {
  const request = stub.lastRequest;
  assert.ok(request, 'stub received no request');
  return request;
}

void describe('PayloadClient', () => {
  let stub: StubNode;
  let client: PayloadClient;

  beforeEach(async () => {
    stub = await StubNode.start();
    client = createClient(stub.socketPath);
  });

  afterEach(async () => {
    client.close();
    await stub.stop();
  });

  void describe('sendPayload', () => {
    void it('posts the raw payload with participant headers and decodes the key', async () => {
      stub.route('POST', '/sendraw', { body: 'cGF5bG9hZC1rZXk=' });
      const payload = Buffer.from([0x00, 0x01, 0xfe, 0xff]);

      const key = await client.sendPayload(payload, SENDER, [RECIPIENT_ONE, RECIPIENT_TWO]);

      assert.deepEqual(key, Buffer.from('payload-key'));
      const request = requireLastRequest(stub);
      assert.equal(request.method, 'POST');
      assert.equal(request.path, '/sendraw');
      assert.equal(request.headers['content-type'], 'application/octet-stream');
      assert.equal(request.headers['c11n-from'], SENDER);
      assert.equal(request.headers['c11n-to'], `${RECIPIENT_ONE},${RECIPIENT_TWO}`);
      assert.deepEqual(request.body, payload);
    });

    void it('base64-encodes participant keys given as bytes', async () => {
      stub.route('POST', '/sendraw', { body: 'AQID' });

      await client.sendPayload(Buffer.from('tx'), Buffer.from('sender-key'), [
        Buffer.from('recipient-one'),
      ]);

      const request = requireLastRequest(stub);
      assert.equal(request.headers['c11n-from'], SENDER);
      assert.equal(request.headers['c11n-to'], RECIPIENT_ONE);
    });

    void it('omits c11n-from entirely for an empty sender', async () => {
      stub.route('POST', '/sendraw', { body: 'AQID' });

      for (const sender of ['', undefined, new Uint8Array(0)]) {
        await client.sendPayload(Buffer.from('tx'), sender, [RECIPIENT_ONE]);
        const request = requireLastRequest(stub);
        assert.equal('c11n-from' in request.headers, false);
        assert.equal(request.headers['c11n-to'], RECIPIENT_ONE);
      }
      assert.equal(stub.requests.length, 3);
    });

    void it('rejects a malformed key with DecodingError', async () => {
      stub.route('POST', '/sendraw', { body: 'not base64!' });

      await assert.rejects(
        client.sendPayload(Buffer.from('tx'), SENDER, [RECIPIENT_ONE]),
        (error: unknown) => {
          assert.ok(error instanceof DecodingError);
          assert.equal(error.subject, 'sendPayload response');
          return true;
        }
      );
    });
  });

  void describe('sendSignedPayload', () => {
    void it('posts to sendsignedtx without a sender header', async () => {
      stub.route('POST', '/sendsignedtx', { body: 'cGF5bG9hZC1rZXk=' });
      const signed = Buffer.from('signed-payload');

      const key = await client.sendSignedPayload(signed, [RECIPIENT_ONE, RECIPIENT_TWO]);

      assert.deepEqual(key, Buffer.from('payload-key'));
      const request = requireLastRequest(stub);
      assert.equal(request.path, '/sendsignedtx');
      assert.equal(request.headers['content-type'], 'application/octet-stream');
      assert.equal('c11n-from' in request.headers, false);
      assert.equal(request.headers['c11n-to'], `${RECIPIENT_ONE},${RECIPIENT_TWO}`);
      assert.deepEqual(request.body, signed);
    });
  });

  void describe('receivePayload', () => {
    void it('sends the key as base64 and returns the body untouched', async () => {
      stub.route('GET', '/receiveraw', { body: Buffer.from([0xde, 0xad, 0xbe, 0xef]) });

      const payload = await client.receivePayload(new Uint8Array([1, 2, 3]));

      assert.deepEqual(payload, Buffer.from([0xde, 0xad, 0xbe, 0xef]));
      const request = requireLastRequest(stub);
      assert.equal(request.method, 'GET');
      assert.equal(request.headers['c11n-key'], 'AQID');
      assert.equal(request.headers['content-type'], undefined);
      assert.equal(request.body.byteLength, 0);
    });

    void it('round-trips a payload sent through the node', async () => {
      const stored = new Map<string, Buffer>();
      stub.route('POST', '/sendraw', (request) => {
        const key = Buffer.from(`key-${stored.size}`);
        stored.set(key.toString('base64'), request.body);
        return { body: key.toString('base64') };
      });
      stub.route('GET', '/receiveraw', (request) => {
        const payload = stored.get(String(request.headers['c11n-key']));
        return payload ? { body: payload } : { status: 404 };
      });
      const payload = Buffer.from(Array.from({ length: 300 }, (_, i) => i % 256));

      const key = await client.sendPayload(payload, undefined, [RECIPIENT_ONE]);
      const received = await client.receivePayload(key);

      assert.deepEqual(key, Buffer.from('key-0'));
      assert.deepEqual(received, payload);
    });
  });

  void describe('isSender', () => {
    const cases: Array<[string, boolean]> = [
      ['true', true],
      ['false', false],
      ['', false],
      ['TRUE', false],
      ['true\n', false],
      [' true', false],
      ['yes', false],
    ];

    for (const [body, expected] of cases) {
      void it(`returns ${expected} for body ${JSON.stringify(body)}`, async () => {
        stub.route('GET', IS_SENDER_PATH, { body });

        assert.equal(await client.isSender(PLUS_HASH), expected);
      });
    }

    void it('escapes "/" in the hash and the node sees the original hash', async () => {
      stub.route('GET', IS_SENDER_PATH, { body: 'true' });

      await client.isSender(SLASH_HASH);

      const request = requireLastRequest(stub);
      assert.equal(request.path, `/transaction/${'%2F'.repeat(85)}w%3D%3D/isSender`);
      assert.deepEqual(request.segments, ['transaction', SLASH_HASH_BASE64, 'isSender']);
    });
  });

  void describe('getParticipants', () => {
    void it('splits the body into identifiers in node order', async () => {
      stub.route('GET', PARTICIPANTS_PATH, { body: 'a,b,c' });

      assert.deepEqual(await client.getParticipants(PLUS_HASH), ['a', 'b', 'c']);
    });

    void it('returns a single empty string for an empty body', async () => {
      stub.route('GET', PARTICIPANTS_PATH, { body: '' });

      assert.deepEqual(await client.getParticipants(PLUS_HASH), ['']);
    });

    void it('escapes "+" in the hash and the node sees the original hash', async () => {
      stub.route('GET', PARTICIPANTS_PATH, { body: `${SENDER},${RECIPIENT_ONE}` });

      const participants = await client.getParticipants(PLUS_HASH);

      assert.deepEqual(participants, [SENDER, RECIPIENT_ONE]);
      const request = requireLastRequest(stub);
      assert.ok(request.path.includes('PD0%2BPw%3D%3D'));
      assert.deepEqual(request.segments, ['transaction', PLUS_HASH_BASE64, 'participants']);
    });
  });

  void describe('sendJSON', () => {
    void it('posts a JSON body and returns the raw response', async () => {
      stub.route('POST', '/partyinfo', { body: '{"ok":true}' });

      const res = await client.sendJSON('partyinfo', { keys: [RECIPIENT_ONE] });

      assert.equal(res.status, 200);
      assert.equal(res.body.toString('utf8'), '{"ok":true}');
      const request = requireLastRequest(stub);
      assert.equal(request.method, 'POST');
      assert.equal(request.headers['content-type'], 'application/json');
      assert.equal(request.body.toString('utf8'), `{"keys":["${RECIPIENT_ONE}"]}\n`);
    });
  });

  void describe('non-200 responses', () => {
    const operations: Array<[string, (c: PayloadClient) => Promise<unknown>]> = [
      ['sendJSON', (c) => c.sendJSON('partyinfo', {})],
      ['sendPayload', (c) => c.sendPayload(Buffer.from('tx'), SENDER, [RECIPIENT_ONE])],
      ['sendSignedPayload', (c) => c.sendSignedPayload(Buffer.from('tx'), [RECIPIENT_ONE])],
      ['receivePayload', (c) => c.receivePayload(Buffer.from('key'))],
      ['isSender', (c) => c.isSender(PLUS_HASH)],
      ['getParticipants', (c) => c.getParticipants(PLUS_HASH)],
      ['upcheck', (c) => c.upcheck()],
    ];

    for (const [name, call] of operations) {
      void it(`${name} rejects with UnexpectedStatusError without decoding`, async () => {
        stub.route('GET', /.*/, { status: 500, body: 'true' });
        stub.route('POST', /.*/, { status: 500, body: 'cGF5bG9hZC1rZXk=' });

        await assert.rejects(call(client), (error: unknown) => {
          assert.ok(error instanceof UnexpectedStatusError);
          assert.equal(error.status, 500);
          return true;
        });
      });
    }

    void it('keeps status text and headers for diagnostics', async () => {
      stub.route('GET', '/receiveraw', {
        status: 404,
        headers: { 'x-reason': 'unknown key' },
        body: 'missing',
      });

      await assert.rejects(client.receivePayload(Buffer.from('key')), (error: unknown) => {
        assert.ok(error instanceof UnexpectedStatusError);
        assert.equal(error.operation, 'receivePayload');
        assert.equal(error.statusText, 'Not Found');
        assert.equal(error.headers['x-reason'], 'unknown key');
        assert.equal(error.message, 'receivePayload: non-200 status code: 404 Not Found');
        return true;
      });
    });
  });

  void describe('transport failures', () => {
    void it('propagates TransportError when the node is gone', async () => {
      const orphan = createClient(path.join(path.dirname(stub.socketPath), 'gone.ipc'));
      try {
        await assert.rejects(orphan.receivePayload(Buffer.from('key')), (error: unknown) => {
          assert.ok(error instanceof TransportError);
          assert.equal(error.code, 'ENOENT');
          return true;
        });
      } finally {
        orphan.close();
      }
    });
  });

  void describe('concurrency', () => {
    void it('serves parallel sends independently', async () => {
      let counter = 0;
      stub.route('POST', '/sendraw', () => {
        counter += 1;
        return { body: Buffer.from(`key-${counter}`).toString('base64') };
      });

      const keys = await Promise.all(
        Array.from({ length: 10 }, (_, i) =>
          client.sendPayload(Buffer.from(`tx-${i}`), undefined, [RECIPIENT_ONE])
        )
      );

      const distinct = new Set(keys.map((key) => key.toString('utf8')));
      assert.equal(distinct.size, 10);
      assert.equal(stub.requests.length, 10);
    });
  });
});
