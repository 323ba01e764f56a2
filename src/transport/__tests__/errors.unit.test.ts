/**
 * Transport error formatting and classification.
 */

import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  DecodingError,
  LaunchError,
  RelayError,
  TransportError,
  UnexpectedStatusError,
} from '@/transport/RelayError.js';
import {
  formatConnectionError,
  formatTimeoutError,
  formatUnknownLocationError,
  isConnectionError,
  isTransportError,
} from '@/transport/errors.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

function systemError(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

void describe('formatConnectionError', () => {
  void it('includes request name, socket, code and details', () => {
    const cause = systemError('connect ENOENT /tmp/node.ipc', 'ENOENT');

    const error = formatConnectionError('upcheck', '/tmp/node.ipc', cause);

    assert.equal(
      error.message,
      'IPC upcheck connection error | Socket: /tmp/node.ipc | Code: ENOENT | Details: connect ENOENT /tmp/node.ipc'
    );
    assert.equal(error.code, 'ENOENT');
    assert.equal(error.socketPath, '/tmp/node.ipc');
    assert.equal(error.cause, cause);
  });

  void it('leaves out the code when the cause has none', () => {
    const error = formatConnectionError('isSender', '/tmp/node.ipc', new Error('socket hang up'));

    assert.equal(
      error.message,
      'IPC isSender connection error | Socket: /tmp/node.ipc | Details: socket hang up'
    );
    assert.equal(error.code, undefined);
    assert.equal(error.exitCode, EXIT_CODES.NODE_CONNECTION_FAILURE);
  });
});

void describe('formatTimeoutError', () => {
  void it('names the phase and the elapsed limit in seconds', () => {
    const error = formatTimeoutError('receivePayload', '/tmp/node.ipc', 'response header', 5000);

    assert.equal(
      error.message,
      'receivePayload response header timeout after 5s (socket /tmp/node.ipc)'
    );
    assert.equal(error.code, 'ETIMEDOUT');
    assert.equal(error.exitCode, EXIT_CODES.NODE_TIMEOUT);
  });

  void it('keeps fractional seconds for short limits', () => {
    const error = formatTimeoutError('upcheck', '/tmp/node.ipc', 'dial', 250);

    assert.equal(error.message, 'upcheck dial timeout after 0.25s (socket /tmp/node.ipc)');
  });
});

void describe('formatUnknownLocationError', () => {
  void it('reports the unmapped URL', () => {
    const error = formatUnknownLocationError('http://elsewhere/upcheck', '/tmp/node.ipc');

    assert.equal(error.message, 'No socket registered for http://elsewhere/upcheck');
    assert.equal(error.code, 'EUNKNOWNLOCATION');
  });
});

void describe('isTransportError', () => {
  void it('accepts transport failures whatever their code', () => {
    const error: unknown = formatTimeoutError('upcheck', '/tmp/node.ipc', 'dial', 1000);

    assert.equal(isTransportError(error), true);
    if (isTransportError(error)) {
      assert.equal(error.socketPath, '/tmp/node.ipc');
    }
  });

  void it('rejects other relay errors and plain errors', () => {
    assert.equal(isTransportError(new UnexpectedStatusError('upcheck', 503, '', {})), false);
    assert.equal(isTransportError(new DecodingError('transaction hash', 'bad')), false);
    assert.equal(isTransportError(systemError('connect ENOENT', 'ENOENT')), false);
    assert.equal(isTransportError(undefined), false);
  });
});

void describe('isConnectionError', () => {
  void it('is true for a missing or refusing socket', () => {
    assert.equal(isConnectionError(new TransportError('x', '/s', 'ENOENT')), true);
    assert.equal(isConnectionError(new TransportError('x', '/s', 'ECONNREFUSED')), true);
  });

  void it('is false for other transport failures and other errors', () => {
    assert.equal(isConnectionError(new TransportError('x', '/s', 'ETIMEDOUT')), false);
    assert.equal(isConnectionError(new TransportError('x', '/s', 'ECONNRESET')), false);
    assert.equal(isConnectionError(new TransportError('x', '/s')), false);
    assert.equal(isConnectionError(systemError('x', 'ENOENT')), false);
    assert.equal(isConnectionError('ENOENT'), false);
  });
});

void describe('RelayError hierarchy', () => {
  void it('maps every error kind to its exit code', () => {
    assert.equal(
      new LaunchError('boom', 'constellation-node', './node.conf', 'ENOENT').exitCode,
      EXIT_CODES.NODE_LAUNCH_FAILURE
    );
    assert.equal(
      new UnexpectedStatusError('upcheck', 503, 'Service Unavailable', {}).exitCode,
      EXIT_CODES.NODE_REJECTED_REQUEST
    );
    assert.equal(
      new DecodingError('sendPayload response', 'invalid base64').exitCode,
      EXIT_CODES.NODE_RESPONSE_MALFORMED
    );
    assert.equal(new RelayError('bug').exitCode, EXIT_CODES.SOFTWARE_ERROR);
  });

  void it('keeps subclasses distinguishable', () => {
    const error: unknown = new UnexpectedStatusError('isSender', 500, '', {});

    assert.ok(error instanceof RelayError);
    assert.ok(!(error instanceof TransportError));
    assert.ok(!(error instanceof DecodingError));
  });

  void it('builds the default status message without trailing space', () => {
    const error = new UnexpectedStatusError('isSender', 500, '', {});

    assert.equal(error.message, 'isSender: non-200 status code: 500');
    assert.equal(error.name, 'UnexpectedStatusError');
  });

  void it('prefixes decoding failures with their subject', () => {
    const error = new DecodingError('transaction hash', 'expected 64 bytes, got 3');

    assert.equal(error.message, 'Failed to decode transaction hash: expected 64 bytes, got 3');
  });
});
