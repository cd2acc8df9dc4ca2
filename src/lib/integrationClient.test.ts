import { describe, expect, it, vi } from 'vitest';
import { FetchTimeoutError, fetchWithTimeout, type FetchLike } from './integrationClient';

describe('fetchWithTimeout', () => {
  it('makes exactly one call and returns its response', async () => {
    const fetchImpl = vi.fn(async () => new Response('busy', { status: 503 }));
    const response = await fetchWithTimeout('http://rates.test/latest', { method: 'GET' }, { fetchImpl, timeoutMs: 100 });
    expect(response.status).toBe(503);
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it('propagates a transport error without trying again', async () => {
    const fetchImpl = vi.fn(async (): Promise<Response> => {
      throw new Error('connection refused');
    });
    await expect(fetchWithTimeout('http://rates.test/latest', { method: 'GET' }, { fetchImpl, timeoutMs: 100 })).rejects.toThrow(
      'connection refused'
    );
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it('aborts a call that outlives the timeout', async () => {
    const fetchImpl: FetchLike = (_url, init) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
      });
    const pending = fetchWithTimeout('http://rates.test/slow', { method: 'GET' }, { fetchImpl, timeoutMs: 10 });
    await expect(pending).rejects.toBeInstanceOf(FetchTimeoutError);
    await expect(pending).rejects.toThrow('Request to http://rates.test/slow timed out after 10ms');
  });
});
