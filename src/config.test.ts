import path from 'path';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { databasePath, loadConfig } from './config';

describe('loadConfig', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('uses defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      anthropicApiKey: null,
      anthropicModel: 'claude-sonnet-4-20250514',
      googleClientId: null,
      googleClientSecret: null,
      dataDir: path.resolve('data'),
      checkLimit: 10,
      requestSpacingMs: 15000,
      resultCacheSize: 100,
      resultCacheTtlMs: 3600000,
    });
  });

  it('reads and trims values', () => {
    const config = loadConfig({
      ANTHROPIC_API_KEY: ' test-secret ',
      GOOGLE_CLIENT_ID: 'test-client',
      CHECK_LIMIT: '25',
      REQUEST_SPACING_MS: '0',
      SCREENER_DATA_DIR: '/tmp/screener',
    });
    expect(config.anthropicApiKey).toBe('test-secret');
    expect(config.googleClientId).toBe('test-client');
    expect(config.checkLimit).toBe(25);
    expect(config.requestSpacingMs).toBe(0);
    expect(databasePath(config)).toBe(path.join('/tmp/screener', 'screener.db'));
  });

  it('falls back on malformed or out-of-range numbers', () => {
    expect(loadConfig({ CHECK_LIMIT: 'abc' }).checkLimit).toBe(10);
    expect(loadConfig({ CHECK_LIMIT: '0' }).checkLimit).toBe(10);
    expect(loadConfig({ CHECK_LIMIT: '2.5' }).checkLimit).toBe(10);
    expect(loadConfig({ RESULT_CACHE_SIZE: '-1' }).resultCacheSize).toBe(100);
    expect(console.warn).toHaveBeenCalledTimes(4);
  });

  it('treats blank values as unset', () => {
    expect(loadConfig({ ANTHROPIC_API_KEY: '   ', CHECK_LIMIT: ' ' })).toMatchObject({ anthropicApiKey: null, checkLimit: 10 });
  });
});
