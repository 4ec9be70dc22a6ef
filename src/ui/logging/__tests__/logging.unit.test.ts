import assert from 'node:assert/strict';
import { afterEach, describe, it, mock } from 'node:test';

import {
  createLogger,
  disableDebugLogging,
  enableDebugLogging,
  formatLogLine,
  isDebugEnabled,
} from '@/ui/logging/index.js';

void describe('formatLogLine', () => {
  void it('prefixes the context and marks non-info levels', () => {
    assert.equal(formatLogLine('sizing', 'info', 'ready'), '[sizing] ready');
    assert.equal(formatLogLine('sizing', 'debug', 'step'), '[sizing] debug: step');
    assert.equal(formatLogLine('sizing', 'warn', 'odd'), '[sizing] warning: odd');
    assert.equal(formatLogLine('sizing', 'error', 'bad'), '[sizing] error: bad');
  });
});

void describe('createLogger', () => {
  afterEach(() => {
    disableDebugLogging();
    mock.restoreAll();
  });

  void it('writes to stderr, never stdout', () => {
    const stderr = mock.method(console, 'error', () => undefined);
    const stdout = mock.method(console, 'log', () => undefined);

    createLogger('test').warn('careful');

    assert.equal(stderr.mock.callCount(), 1);
    assert.deepEqual(stderr.mock.calls.at(0)?.arguments, ['[test] warning: careful']);
    assert.equal(stdout.mock.callCount(), 0);
  });

  void it('drops debug messages until debug logging is enabled', () => {
    const stderr = mock.method(console, 'error', () => undefined);
    const log = createLogger('test');
    disableDebugLogging();

    log.debug('hidden');
    assert.equal(stderr.mock.callCount(), 0);

    enableDebugLogging();
    assert.equal(isDebugEnabled(), true);
    log.debug('shown');
    assert.deepEqual(stderr.mock.calls.at(0)?.arguments, ['[test] debug: shown']);
  });
});
