// ABOUTME: Tests for environment configuration loading
// ABOUTME: Verifies defaults, numeric coercion and rejection of invalid values

import { describe, it, expect } from 'vitest';
import { loadConfig } from '../config.js';
import { ConfigurationError } from '../errors.js';

describe('loadConfig', () => {
  it('uses defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      top: 10,
      resolveConcurrency: 8,
      resolveTimeoutMs: 2000,
      runTimeoutMs: 30000,
      logLevel: 'warn',
      port: 3000,
    });
  });

  it('coerces numeric settings from strings', () => {
    const config = loadConfig({
      OGC_USAGE_TOP: '0',
      OGC_USAGE_RESOLVE_CONCURRENCY: '4',
      LOG_LEVEL: 'debug',
      PORT: '8080',
    });

    expect(config.top).toBe(0);
    expect(config.resolveConcurrency).toBe(4);
    expect(config.logLevel).toBe('debug');
    expect(config.port).toBe(8080);
  });

  it('rejects invalid values', () => {
    expect(() => loadConfig({ OGC_USAGE_TOP: '-1' })).toThrow(ConfigurationError);
    expect(() => loadConfig({ LOG_LEVEL: 'verbose' })).toThrow('LOG_LEVEL');
    expect(() => loadConfig({ PORT: 'http' })).toThrow('Invalid environment configuration');
  });
});
