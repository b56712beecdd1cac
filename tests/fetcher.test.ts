import axios, { type AxiosResponse } from 'axios';
import { describe, expect, it } from 'vitest';
import { CatalogResponseError, TransientCatalogError } from '../src/errors.js';
import { silentLogger } from '../src/logger.js';
import { DlsiteClient } from '../src/scrapers/dlsite/client.js';
import { RateLimitedFetcher, backoffDelay, type FetcherOptions } from '../src/scrapers/dlsite/fetcher.js';
import type { CatalogClient, ImagePayload, LookupResult } from '../src/scrapers/dlsite/types.js';
import { FakeCatalog, work } from './helpers.js';

const options: FetcherOptions = {
  concurrency: 4,
  requestDelayMs: 0,
  maxRetries: 3,
  retryBaseDelayMs: 0,
  retryMaxDelayMs: 0,
  acceptedSites: ['maniax', 'pro']
};

const rj = (number: number) => ({ namespace: 'doujin' as const, number });

describe('RateLimitedFetcher', () => {
  it('maps catalog answers to outcomes', async () => {
    const catalog = new FakeCatalog().add(
      work('RJ000001', { maker: null, title: 'First' }),
      work('RJ000003', { siteId: 'girls' })
    );
    const fetcher = new RateLimitedFetcher(catalog, options, silentLogger);

    await expect(fetcher.probe(rj(1))).resolves.toEqual({
      kind: 'found',
      identifier: rj(1),
      item: { maker: 'Unknown', code: 'RJ000001', title: 'First', translateTitle: 'NaN' },
      imageUrl: 'https://img.example.test/RJ000001_img_main.jpg'
    });
    await expect(fetcher.probe(rj(2))).resolves.toEqual({ kind: 'not-found', identifier: rj(2) });
    await expect(fetcher.probe(rj(3))).resolves.toEqual({
      kind: 'rejected-category',
      identifier: rj(3),
      siteId: 'girls'
    });
  });

  it('retries transient failures until the lookup succeeds', async () => {
    const catalog = new FakeCatalog().add(work('RJ000042')).failTransiently('RJ000042', 2);
    const fetcher = new RateLimitedFetcher(catalog, options, silentLogger);

    const outcome = await fetcher.probe(rj(42));

    expect(outcome.kind).toBe('found');
    expect(catalog.lookupCount('RJ000042')).toBe(3);
  });

  it('gives up as inconclusive once retries are exhausted', async () => {
    const catalog = new FakeCatalog().add(work('RJ000042')).failTransiently('RJ000042', 10);
    const fetcher = new RateLimitedFetcher(catalog, { ...options, maxRetries: 2 }, silentLogger);

    const outcome = await fetcher.probe(rj(42));

    expect(outcome).toEqual({
      kind: 'inconclusive',
      identifier: rj(42),
      attempts: 3,
      reason: 'simulated timeout for RJ000042'
    });
    expect(catalog.lookupCount('RJ000042')).toBe(3);
  });

  it('does not retry answers that retrying cannot fix', async () => {
    let calls = 0;
    const catalog: CatalogClient = {
      lookup: async (): Promise<LookupResult> => {
        calls += 1;
        throw new CatalogResponseError('Catalog answered 403 for RJ000007', 403);
      },
      fetchImage: async (): Promise<ImagePayload> => ({ data: Buffer.alloc(0) })
    };
    const fetcher = new RateLimitedFetcher(catalog, options, silentLogger);

    const outcome = await fetcher.probe(rj(7));

    expect(outcome).toEqual({
      kind: 'inconclusive',
      identifier: rj(7),
      attempts: 1,
      reason: 'Catalog answered 403 for RJ000007'
    });
    expect(calls).toBe(1);
  });

  it('caps a server retry hint at the longest backoff', async () => {
    let calls = 0;
    const catalog: CatalogClient = {
      lookup: async (code): Promise<LookupResult> => {
        calls += 1;
        if (calls === 1) {
          throw new TransientCatalogError('Catalog answered 429', { status: 429, retryAfterMs: 3600000 });
        }
        return { status: 'found', work: work(code) };
      },
      fetchImage: async (): Promise<ImagePayload> => ({ data: Buffer.alloc(0) })
    };
    const fetcher = new RateLimitedFetcher(catalog, { ...options, retryMaxDelayMs: 10 }, silentLogger);

    const outcome = await fetcher.probe(rj(8));

    expect(outcome.kind).toBe('found');
    expect(calls).toBe(2);
  });

  it('lets a lookup already in flight finish after an abort', async () => {
    const http = axios.create({
      adapter: config =>
        new Promise<AxiosResponse>((resolve, reject) => {
          const timer = setTimeout(
            () => resolve({ data: [{ workno: 'RJ001500', work_name: 'Slow', site_id: 'maniax' }], status: 200, statusText: '', headers: {}, config }),
            30
          );
          config.signal?.addEventListener?.('abort', () => {
            clearTimeout(timer);
            reject(new Error('canceled'));
          });
        })
    });
    const client = new DlsiteClient({ baseUrl: 'https://catalog.example.test', locale: 'ja_JP', userAgent: 'test-agent', timeoutMs: 1000, http });
    const fetcher = new RateLimitedFetcher(client, options, silentLogger);
    const controller = new AbortController();

    const pending = fetcher.probe(rj(1500), controller.signal);
    setTimeout(() => controller.abort(), 5);
    const outcome = await pending;

    expect(outcome).toEqual({
      kind: 'found',
      identifier: rj(1500),
      item: { maker: 'Unknown', code: 'RJ001500', title: 'Slow', translateTitle: 'NaN' },
      imageUrl: null
    });
  });

  it('never exceeds the concurrency cap', async () => {
    const catalog = new FakeCatalog(5);
    const fetcher = new RateLimitedFetcher(catalog, { ...options, concurrency: 3 }, silentLogger);

    const outcomes = await Promise.all(Array.from({ length: 20 }, (_, i) => fetcher.probe(rj(i + 1))));

    expect(outcomes.every(outcome => outcome.kind === 'not-found')).toBe(true);
    expect(catalog.lookups).toHaveLength(20);
    expect(catalog.maxInFlight).toBe(3);
  });

  it('reports aborted lookups as inconclusive without calling the catalog', async () => {
    const catalog = new FakeCatalog();
    const fetcher = new RateLimitedFetcher(catalog, options, silentLogger);
    const controller = new AbortController();
    controller.abort();

    const outcome = await fetcher.probe(rj(5), controller.signal);

    expect(outcome).toEqual({ kind: 'inconclusive', identifier: rj(5), attempts: 0, reason: 'aborted' });
    expect(catalog.lookups).toEqual([]);
  });

  it('passes image downloads through to the catalog', async () => {
    const catalog = new FakeCatalog().add(work('RJ000009'));
    const fetcher = new RateLimitedFetcher(catalog, options, silentLogger);

    const image = await fetcher.fetchImage('RJ000009');

    expect(image.data.toString()).toBe('image:RJ000009');
    expect(catalog.imageFetches).toEqual(['RJ000009']);
  });
});

describe('backoffDelay', () => {
  it('doubles per attempt up to the ceiling', () => {
    const delays = { retryBaseDelayMs: 1000, retryMaxDelayMs: 5000 };
    expect(backoffDelay(1, delays)).toBe(1000);
    expect(backoffDelay(2, delays)).toBe(2000);
    expect(backoffDelay(3, delays)).toBe(4000);
    expect(backoffDelay(4, delays)).toBe(5000);
  });
});
