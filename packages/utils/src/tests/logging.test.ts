// packages/utils/src/tests/logging.test.ts
import test from 'node:test';
import assert from 'node:assert/strict';

import { defaultLogLevel, isLogLevel, makeLogger } from '../index.js';

test('isLogLevel: pino level names only', () => {
  assert.ok(isLogLevel('debug'));
  assert.ok(isLogLevel('silent'));
  assert.ok(!isLogLevel('verbose'));
  assert.ok(!isLogLevel(3));
});

test('defaultLogLevel: N3TX_LOG_LEVEL, silent otherwise', () => {
  assert.equal(defaultLogLevel({ N3TX_LOG_LEVEL: ' Info ' }), 'info');
  assert.equal(defaultLogLevel({ N3TX_LOG_LEVEL: 'nope' }), 'silent');
  assert.equal(defaultLogLevel({}), 'silent');
});

test('makeLogger: logger at the requested level', () => {
  const log = makeLogger('test', 'warn');
  assert.equal(log.level, 'warn');
  assert.equal(log.isLevelEnabled('info'), false);
  assert.equal(log.isLevelEnabled('error'), true);
});
