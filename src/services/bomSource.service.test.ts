import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { loadRecipeBook } from '../domains/pricing';
import { BomServiceError } from '../lib/errors';
import { FALLBACK_JOB_TYPES, LocalBomSource, RemoteBomSource } from './bomSource.service';

const API = 'http://bom.test/';

function jsonResponse(body: unknown, status = 200) {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('LocalBomSource', () => {
  const source = new LocalBomSource(loadRecipeBook());

  it('lists job types from the recipe book', async () => {
    expect(await source.listJobTypes()).toEqual({ source: 'live', jobTypes: ['cupcakes', 'cake', 'pastry_box'] });
  });

  it('scales estimates locally', async () => {
    const estimate = await source.estimate('cake', 2);
    expect(estimate.laborHours).toBe(1.6);
    expect(estimate.materials[0]).toEqual({ name: 'flour', unit: 'kg', qty: 1 });
  });
});

describe('RemoteBomSource', () => {
  it('fetches job types from the service', async () => {
    const fetchImpl = vi.fn(async () => jsonResponse(['cupcakes', 'cake']));
    const source = new RemoteBomSource(API, { fetchImpl });

    expect(await source.listJobTypes()).toEqual({ source: 'live', jobTypes: ['cupcakes', 'cake'] });
    expect(fetchImpl.mock.calls[0]).toEqual(['http://bom.test/job-types', expect.objectContaining({ method: 'GET' })]);
  });

  it('falls back to the built-in job types when unreachable', async () => {
    const source = new RemoteBomSource(API, {
      fetchImpl: async () => {
        throw new TypeError('fetch failed');
      }
    });
    const result = await source.listJobTypes();
    expect(result).toEqual({ source: 'fallback', jobTypes: FALLBACK_JOB_TYPES, reason: 'fetch failed' });
    expect(console.log).toHaveBeenCalledTimes(1);
  });

  it('falls back on an error status', async () => {
    const source = new RemoteBomSource(API, { fetchImpl: async () => jsonResponse({ error: 'down' }, 500) });
    expect(await source.listJobTypes()).toEqual({
      source: 'fallback',
      jobTypes: FALLBACK_JOB_TYPES,
      reason: 'BOM API responded with status 500'
    });
  });

  it('posts estimates in snake_case and maps the reply', async () => {
    const fetchImpl = vi.fn(async () =>
      jsonResponse({
        job_type: 'cupcakes',
        quantity: 10,
        materials: [{ name: 'flour', unit: 'kg', qty: 0.8 }],
        labor_hours: 0.5
      })
    );
    const source = new RemoteBomSource(API, { fetchImpl });

    expect(await source.estimate('cupcakes', 10)).toEqual({
      jobType: 'cupcakes',
      quantity: 10,
      materials: [{ name: 'flour', unit: 'kg', qty: 0.8 }],
      laborHours: 0.5
    });
    expect(fetchImpl.mock.calls[0]).toEqual([
      'http://bom.test/estimate',
      expect.objectContaining({ method: 'POST', body: '{"job_type":"cupcakes","quantity":10}' })
    ]);
  });

  it('raises the status and body of an error reply', async () => {
    const source = new RemoteBomSource(API, {
      fetchImpl: async () => new Response('Unknown job_type', { status: 400 })
    });
    const error = await source.estimate('bagels', 1).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(BomServiceError);
    expect(error instanceof BomServiceError && error.message).toBe('BOM API error 400: Unknown job_type');
    expect(error instanceof BomServiceError && error.status).toBe(400);
  });

  it('names the URL when the service cannot be reached', async () => {
    const source = new RemoteBomSource(API, {
      fetchImpl: async () => {
        throw new TypeError('fetch failed');
      }
    });
    await expect(source.estimate('cake', 1)).rejects.toThrow('Cannot reach BOM API at http://bom.test/estimate: fetch failed');
  });

  it('rejects a malformed estimate', async () => {
    const source = new RemoteBomSource(API, { fetchImpl: async () => jsonResponse({ job_type: 'cake' }) });
    await expect(source.estimate('cake', 1)).rejects.toThrow('BOM API returned a malformed estimate for cake');
  });
});
