/**
 * Logger unit tests: context prefixes and debug gating.
 */

import assert from 'node:assert/strict';
import { afterEach, beforeEach, describe, it, mock } from 'node:test';

import {
  createLogger,
  disableDebugLogging,
  enableDebugLogging,
  isDebugEnabled,
} from '@/ui/logging/index.js';

void describe('logger', () => {
  let lines: string[];
  let savedDebugEnv: string | undefined;

  beforeEach(() => {
    lines = [];
    savedDebugEnv = process.env['RELAYCTL_DEBUG'];
    delete process.env['RELAYCTL_DEBUG'];
    disableDebugLogging();
    mock.method(console, 'error', (message: string) => {
      lines.push(message);
    });
  });

  afterEach(() => {
    mock.restoreAll();
    disableDebugLogging();
    if (savedDebugEnv === undefined) {
      delete process.env['RELAYCTL_DEBUG'];
    } else {
      process.env['RELAYCTL_DEBUG'] = savedDebugEnv;
    }
  });

  void it('prefixes info messages with the context', () => {
    createLogger('supervisor').info('Node started (PID 42)');

    assert.deepEqual(lines, ['[supervisor] Node started (PID 42)']);
  });

  void it('hides debug messages by default', () => {
    const logger = createLogger('transport');

    logger.debug('connected');
    logger('connected again');

    assert.deepEqual(lines, []);
    assert.equal(isDebugEnabled(), false);
  });

  void it('shows debug messages once debug logging is enabled', () => {
    enableDebugLogging();
    const logger = createLogger('transport');

    logger.debug('connected');
    logger('upcheck → 200 in 3ms');

    assert.deepEqual(lines, ['[transport] connected', '[transport] upcheck → 200 in 3ms']);
  });

  void it('honours RELAYCTL_DEBUG=1', () => {
    process.env['RELAYCTL_DEBUG'] = '1';

    createLogger('health').debug('probing');

    assert.equal(isDebugEnabled(), true);
    assert.deepEqual(lines, ['[health] probing']);
  });

  void it('ignores other RELAYCTL_DEBUG values', () => {
    process.env['RELAYCTL_DEBUG'] = 'true';

    createLogger('health').debug('probing');

    assert.deepEqual(lines, []);
  });
});
