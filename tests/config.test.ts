import { describe, expect, it } from 'vitest';
import { loadConfig } from '../src/config.js';

describe('loadConfig', () => {
  it('fills defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      port: 8787,
      supabaseUrl: null,
      supabaseKey: null,
      apiKeys: [],
      logLevel: 'info',
      bodyLimit: '50mb',
      batchSize: 1000,
      interval: { min: 0, max: 3600 },
    });
  });

  it('splits and trims API keys', () => {
    expect(loadConfig({ API_KEYS: ' test-key, ,other-key ' }).apiKeys).toEqual(['test-key', 'other-key']);
  });

  it('coerces numeric settings', () => {
    const config = loadConfig({ MEASUREMENT_BATCH_SIZE: '250', TIME_INTERVAL_MIN_SEC: '0.1', TIME_INTERVAL_MAX_SEC: '60' });
    expect(config.batchSize).toBe(250);
    expect(config.interval).toEqual({ min: 0.1, max: 60 });
  });

  it('rejects inverted interval bounds', () => {
    expect(() => loadConfig({ TIME_INTERVAL_MIN_SEC: '10', TIME_INTERVAL_MAX_SEC: '5' })).toThrow(
      'TIME_INTERVAL_MIN_SEC must not exceed TIME_INTERVAL_MAX_SEC'
    );
  });
});
