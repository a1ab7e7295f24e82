import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  DEFAULT_LOGGING_CONFIG,
  resolveLoggingConfig,
} from '../engine/config.js';

describe('resolveLoggingConfig', () => {
  it('uses defaults when nothing is set', () => {
    assert.deepEqual(resolveLoggingConfig({}), DEFAULT_LOGGING_CONFIG);
    assert.deepEqual(resolveLoggingConfig({}), {
      enabled: true,
      level: 'warn',
    });
  });

  it('reads the level case-insensitively', () => {
    const config = resolveLoggingConfig({ DISPATCHER_LOG_LEVEL: ' DEBUG ' });
    assert.equal(config.level, 'debug');
  });

  it('falls back to the default level for unknown values', () => {
    const config = resolveLoggingConfig({ DISPATCHER_LOG_LEVEL: 'verbose' });
    assert.equal(config.level, 'warn');
  });

  it('disables logging from a false literal', () => {
    const config = resolveLoggingConfig({ DISPATCHER_LOG_ENABLED: 'off' });
    assert.equal(config.enabled, false);
  });

  it('keeps logging enabled for unrecognised flags', () => {
    const config = resolveLoggingConfig({ DISPATCHER_LOG_ENABLED: 'maybe' });
    assert.equal(config.enabled, true);
  });
});
