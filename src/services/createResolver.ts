import { Logger } from '../utils/logger.js';
import { HttpClient, type FetchFn } from '../utils/http.js';
import type { ResolvedConfig } from '../utils/config.js';
import { MemoryBpmCache } from '../modules/cache/MemoryBpmCache.js';
import { MongoBpmCache } from '../modules/cache/MongoBpmCache.js';
import { GetSongBpmClient } from '../modules/api/GetSongBpmClient.js';
import { PlaywrightBrowserSearch } from '../modules/browser/PlaywrightBrowserSearch.js';
import { SongBpmScraper } from '../modules/scrapers/SongBpmScraper.js';
import { BpmResolver } from './BpmResolver.js';
import type { BrowserSearch, IBpmCache } from '../types/index.js';

export interface ResolverOverrides {
  fetchImpl?: FetchFn;
  browser?: BrowserSearch | null;
  cache?: IBpmCache | null;
}

// An unreachable cache disables the tier for the life of the resolver.
export async function createBpmCache(config: ResolvedConfig): Promise<IBpmCache | null> {
  const { cache } = config;
  if (!cache.enabled) return null;
  if (cache.driver === 'memory') return new MemoryBpmCache();
  try {
    return await MongoBpmCache.connect({
      uri: cache.mongodbUri,
      database: cache.database,
      collection: cache.collection,
    });
  } catch (err) {
    Logger.error('MongoDB cache unavailable; continuing without cache.', err);
    return null;
  }
}

export async function createBpmResolver(config: ResolvedConfig, overrides: ResolverOverrides = {}): Promise<BpmResolver> {
  const cache = overrides.cache !== undefined ? overrides.cache : await createBpmCache(config);

  const api = config.api.apiKey
    ? new GetSongBpmClient(
        new HttpClient({
          timeoutMs: config.api.timeoutMs,
          minTimeMs: config.api.minTimeMs,
          headers: { Accept: 'application/json' },
          fetchImpl: overrides.fetchImpl,
        }),
        { baseUrl: config.api.baseUrl, apiKey: config.api.apiKey }
      )
    : null;

  let web: SongBpmScraper | null = null;
  if (config.scraper.enabled) {
    const { browser: browserCfg } = config.scraper;
    const browser =
      overrides.browser !== undefined
        ? overrides.browser
        : browserCfg.enabled
          ? new PlaywrightBrowserSearch({
              baseUrl: config.scraper.baseUrl,
              chromePath: browserCfg.chromePath,
              timeoutMs: browserCfg.timeoutMs,
            })
          : null;
    const http = new HttpClient({
      timeoutMs: config.scraper.timeoutMs,
      minTimeMs: config.scraper.minTimeMs,
      headers: { 'User-Agent': config.scraper.userAgent },
      fetchImpl: overrides.fetchImpl,
    });
    web = SongBpmScraper.create(http, browser, {
      baseUrl: config.scraper.baseUrl,
      maxCatalogPages: config.scraper.maxCatalogPages,
    });
  }

  const resolver = new BpmResolver({ cache, api, web });
  const status = resolver.describe();
  Logger.debug(`BPM resolver ready (cache=${status.hasCache}, api=${status.hasApi}, scraper=${status.hasScraper})`);
  return resolver;
}
