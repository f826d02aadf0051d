import { describe, expect, it, vi } from 'vitest';
import { z } from 'zod';

import { HttpClient } from '../client.js';
import type { HttpEffects } from '../core/types.js';
import { HttpError, ResponseDecodeError, ResponseValidationError, TimeoutError } from '../types.js';

function mockResponse(body: string, status = 200) {
  return {
    headers: new Headers(),
    ok: status >= 200 && status < 300,
    status,
    text: () => Promise.resolve(body),
  };
}

function createClient(mockFetch: ReturnType<typeof vi.fn>, timeout?: number) {
  const mockEffects: HttpEffects = {
    fetch: mockFetch,
    log: vi.fn(),
    now: () => 1000,
  };

  return new HttpClient(
    {
      baseUrl: 'https://api.example.com',
      providerName: 'test-provider',
      timeout,
    },
    mockEffects
  );
}

describe('HttpClient', () => {
  it('should return ok result for successful GET request', async () => {
    const mockFetch = vi.fn().mockResolvedValue(mockResponse('{"success":true}'));
    const client = createClient(mockFetch);

    const result = await client.get<{ success: boolean }>('/test');

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value).toEqual({ success: true });
    }
    expect(mockFetch).toHaveBeenCalledWith(
      'https://api.example.com/test',
      expect.objectContaining({
        method: 'GET',
      })
    );
  });

  it('should append query parameters and skip undefined ones', async () => {
    const mockFetch = vi.fn().mockResolvedValue(mockResponse('{}'));
    const client = createClient(mockFetch);

    await client.get('trades/btc_usd', { query: { ignore_invalid: 1, limit: 150, skipped: undefined } });

    expect(mockFetch).toHaveBeenCalledWith(
      'https://api.example.com/trades/btc_usd?ignore_invalid=1&limit=150',
      expect.anything()
    );
  });

  it('should post string bodies as-is with the caller headers', async () => {
    const mockFetch = vi.fn().mockResolvedValue(mockResponse('{"success":1}'));
    const client = createClient(mockFetch);

    await client.post('', 'method=getInfo&nonce=1', {
      headers: { 'Content-Type': 'application/x-www-form-urlencoded', Key: 'test-key' },
    });

    expect(mockFetch).toHaveBeenCalledWith(
      'https://api.example.com',
      expect.objectContaining({
        body: 'method=getInfo&nonce=1',
        headers: expect.objectContaining({
          'Content-Type': 'application/x-www-form-urlencoded',
          Key: 'test-key',
        }),
        method: 'POST',
      })
    );
  });

  it('should make exactly one attempt on a non-2xx response', async () => {
    const mockFetch = vi.fn().mockResolvedValue(mockResponse('Internal Server Error', 500));
    const client = createClient(mockFetch);

    const result = await client.get('/test');

    expect(mockFetch).toHaveBeenCalledTimes(1);
    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toBeInstanceOf(HttpError);
      expect(result.error.message).toBe('HTTP 500: Internal Server Error');
    }
  });

  it('should not retry network errors', async () => {
    const mockFetch = vi.fn().mockRejectedValue(new Error('Network error'));
    const client = createClient(mockFetch);

    const result = await client.get('/test');

    expect(mockFetch).toHaveBeenCalledTimes(1);
    expect(result._unsafeUnwrapErr().message).toBe('Network error');
  });

  it('should map aborts to a timeout error', async () => {
    const abortError = new Error('The operation was aborted');
    abortError.name = 'AbortError';
    const mockFetch = vi.fn().mockRejectedValue(abortError);
    const client = createClient(mockFetch, 250);

    const result = await client.get('/test');

    expect(result._unsafeUnwrapErr()).toBeInstanceOf(TimeoutError);
    expect(result._unsafeUnwrapErr().message).toBe('Request timeout after 250ms');
  });

  it('should return undefined for an empty body', async () => {
    const client = createClient(vi.fn().mockResolvedValue(mockResponse('   ')));

    const result = await client.get('/test');

    expect(result.isOk()).toBe(true);
    expect(result._unsafeUnwrap()).toBeUndefined();
  });

  it('should use the caller body decoder', async () => {
    const client = createClient(vi.fn().mockResolvedValue(mockResponse('{"amount":0.1}')));

    const result = await client.get('/test', { parseBody: (text) => ({ raw: text }) });

    expect(result._unsafeUnwrap()).toEqual({ raw: '{"amount":0.1}' });
  });

  it('should report undecodable bodies', async () => {
    const client = createClient(vi.fn().mockResolvedValue(mockResponse('<html>maintenance</html>')));

    const result = await client.get('/test');

    expect(result._unsafeUnwrapErr()).toBeInstanceOf(ResponseDecodeError);
    expect((result._unsafeUnwrapErr() as ResponseDecodeError).truncatedPayload).toBe('<html>maintenance</html>');
  });

  it('should validate responses against a schema', async () => {
    const client = createClient(vi.fn().mockResolvedValue(mockResponse('{"server_time":"soon"}')));

    const result = await client.get('/info', { schema: z.object({ server_time: z.number() }) });

    expect(result._unsafeUnwrapErr()).toBeInstanceOf(ResponseValidationError);
    expect(result._unsafeUnwrapErr().message).toBe('Response validation failed: server_time: Expected number, received string');
  });

  it('should close idempotently', async () => {
    const client = createClient(vi.fn());

    await client.close();
    await expect(client.close()).resolves.toBeUndefined();
  });
});
