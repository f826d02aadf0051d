import { afterEach, describe, expect, it, vi } from 'vitest';

import { getExchangeEndpoints, getHttpTimeoutMs, parseEnv, resetEnvCache } from '../config.js';

describe('parseEnv', () => {
  it('should apply defaults', () => {
    const env = parseEnv({});

    expect(env.LEDGERLINE_BTCE_TRADE_API_URL).toBe('https://btc-e.com/tapi');
    expect(env.LEDGERLINE_BTCE_PUBLIC_API_URL).toBe('https://btc-e.com/api/3');
    expect(env.LEDGERLINE_CRYPTSY_API_URL).toBe('https://api.cryptsy.com/api');
    expect(env.LEDGERLINE_HTTP_TIMEOUT_MS).toBe(10000);
  });

  it('should coerce the timeout from its string form', () => {
    expect(parseEnv({ LEDGERLINE_HTTP_TIMEOUT_MS: '2500' }).LEDGERLINE_HTTP_TIMEOUT_MS).toBe(2500);
  });

  it('should list every invalid variable', () => {
    expect(() => parseEnv({ LEDGERLINE_CRYPTSY_API_URL: 'not a url', LEDGERLINE_HTTP_TIMEOUT_MS: '-1' })).toThrow(
      /Environment validation failed:\n {2}- LEDGERLINE_CRYPTSY_API_URL: .*\n {2}- LEDGERLINE_HTTP_TIMEOUT_MS: /
    );
  });
});

describe('cached accessors', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    resetEnvCache();
  });

  it('should read overrides from process.env', () => {
    vi.stubEnv('LEDGERLINE_BTCE_TRADE_API_URL', 'http://localhost:8080/tapi');
    vi.stubEnv('LEDGERLINE_HTTP_TIMEOUT_MS', '500');
    resetEnvCache();

    expect(getExchangeEndpoints().btceTradeApiUrl).toBe('http://localhost:8080/tapi');
    expect(getHttpTimeoutMs()).toBe(500);
  });
});
