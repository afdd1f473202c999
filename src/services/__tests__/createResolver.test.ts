import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { createBpmCache, createBpmResolver } from '../createResolver.js';
import { buildConfig } from '../../utils/config.js';
import { MemoryBpmCache } from '../../modules/cache/MemoryBpmCache.js';
import { songPage } from '../../__tests__/fakes.js';
import type { FetchFn } from '../../utils/http.js';

const ENV_KEYS = ['GETSONGBPM_API_KEY', 'MONGODB_URI', 'MONGODB_DATABASE', 'USE_SCRAPER', 'USE_BROWSER', 'CHROME_PATH'];

function fakeFetch(routes: Record<string, string>) {
  return vi.fn<FetchFn>(async (input) => {
    const u = new URL(input);
    const body = routes[`${u.origin}${u.pathname}`];
    return body === undefined ? new Response('Not Found', { status: 404 }) : new Response(body, { status: 200 });
  });
}

describe('createBpmCache', () => {
  beforeEach(() => {
    for (const key of ENV_KEYS) vi.stubEnv(key, '');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  test('builds an in-memory cache for the memory driver', async () => {
    expect(await createBpmCache(buildConfig({ cache: { driver: 'memory' } }))).toBeInstanceOf(MemoryBpmCache);
  });

  test('returns null when the cache is disabled', async () => {
    expect(await createBpmCache(buildConfig({ cache: { enabled: false } }))).toBeNull();
  });
});

describe('createBpmResolver', () => {
  beforeEach(() => {
    for (const key of ENV_KEYS) vi.stubEnv(key, '');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  test('leaves the API tier out without a key', async () => {
    const resolver = await createBpmResolver(buildConfig({ cache: { driver: 'memory' } }), { browser: null });
    expect(resolver.describe()).toEqual({ hasCache: true, hasApi: false, hasScraper: true });
  });

  test('leaves the scraper out when it is disabled', async () => {
    const config = buildConfig({ cache: { enabled: false }, api: { apiKey: 'test-key' }, scraper: { enabled: false } });
    const resolver = await createBpmResolver(config);
    expect(resolver.describe()).toEqual({ hasCache: false, hasApi: true, hasScraper: false });
  });

  test('resolves through the API, then answers repeats from the cache', async () => {
    const fetchImpl = fakeFetch({
      'https://api.getsong.co/search/': JSON.stringify({ search: [{ id: 'abc123' }] }),
      'https://api.getsong.co/song/': JSON.stringify({ song: { id: 'abc123', tempo: '128' } }),
    });
    const config = buildConfig({
      cache: { driver: 'memory' },
      api: { apiKey: 'test-key', minTimeMs: 0 },
      scraper: { minTimeMs: 0 },
    });
    const resolver = await createBpmResolver(config, { fetchImpl, browser: null });

    const first = await resolver.resolve('Daft Punk', 'Get Lucky');
    const second = await resolver.resolve('Daft Punk', 'Get Lucky');

    expect(first?.bpm).toBe(128);
    expect(first?.source).toBe('api');
    expect(second?.source).toBe('cache');
    expect(fetchImpl).toHaveBeenCalledTimes(2);
    await resolver.close();
  });

  test('falls back to the scraper when the API is not configured', async () => {
    const fetchImpl = fakeFetch({ 'https://songbpm.com/@daft-punk/get-lucky': songPage(116) });
    const cache = new MemoryBpmCache();
    const config = buildConfig({ scraper: { minTimeMs: 0 } });

    const resolver = await createBpmResolver(config, { fetchImpl, browser: null, cache });
    const result = await resolver.resolve('Daft Punk', 'Get Lucky');

    expect(result).toEqual({
      bpm: 116,
      source: 'scraper',
      rawMetadata: { strategy: 'direct-url', url: 'https://songbpm.com/@daft-punk/get-lucky' },
    });
    expect(cache.size).toBe(1);
  });
});
