import { Logger } from '../utils/logger.js';
import { normalize } from '../utils/normalize.js';
import { InvalidTrackQueryError } from '../types/errors.js';
import type {
  IBpmApiClient,
  IBpmCache,
  IWebResolver,
  NormalizedKey,
  ResolutionResult,
} from '../types/index.js';

export interface ResolverTiers {
  cache: IBpmCache | null;
  api: IBpmApiClient | null;
  web: IWebResolver | null;
}

export interface ResolverStatus {
  hasCache: boolean;
  hasApi: boolean;
  hasScraper: boolean;
}

/**
 * Cache, then the GetSongBPM API, then the web tier. The first tier with an answer wins;
 * answers from the API or the web are written back to the cache. Not-found never throws.
 */
export class BpmResolver {
  private cache: IBpmCache | null;
  private api: IBpmApiClient | null;
  private web: IWebResolver | null;

  constructor(tiers: ResolverTiers) {
    this.cache = tiers.cache;
    this.api = tiers.api;
    this.web = tiers.web;
  }

  describe(): ResolverStatus {
    return { hasCache: this.cache !== null, hasApi: this.api !== null, hasScraper: this.web !== null };
  }

  async close(): Promise<void> {
    if (!this.cache) return;
    try {
      await this.cache.close();
    } catch (err) {
      Logger.error('Failed to close cache.', err);
    }
  }

  async resolveBpm(artist: string, title: string): Promise<number | null> {
    const result = await this.resolve(artist, title);
    return result ? result.bpm : null;
  }

  async resolve(artist: string, title: string): Promise<ResolutionResult | null> {
    if (typeof artist !== 'string' || artist.trim().length === 0) throw new InvalidTrackQueryError('artist');
    if (typeof title !== 'string' || title.trim().length === 0) throw new InvalidTrackQueryError('title');

    const key = normalize(artist, title);

    const cached = await this.fromCache(key);
    if (cached) return cached;

    const { api, web } = this;
    if (api) {
      const apiResult = await this.fromTier('API', () => api.search(artist, title));
      if (apiResult) {
        Logger.info(`BPM found via API: ${apiResult.bpm}`);
        await this.remember(key, apiResult);
        return apiResult;
      }
    }

    if (web) {
      const webResult = await this.fromTier('scraper', () => web.resolve(artist, title));
      if (webResult) {
        Logger.info(`BPM found via scraper: ${webResult.bpm}`);
        await this.remember(key, webResult);
        return webResult;
      }
    }

    Logger.warn(`Could not find BPM for ${artist} - ${title}`);
    return null;
  }

  private async fromCache(key: NormalizedKey): Promise<ResolutionResult | null> {
    if (!this.cache) return null;
    try {
      const record = await this.cache.get(key);
      if (!record) return null;
      Logger.info(`BPM found in cache: ${record.bpm}`);
      return { bpm: record.bpm, source: 'cache', rawMetadata: { ...record.metadata, cachedSource: record.source } };
    } catch (err) {
      Logger.error('Cache lookup failed; continuing without cache.', err);
      return null;
    }
  }

  private async fromTier(
    label: string,
    lookup: () => Promise<ResolutionResult | null>
  ): Promise<ResolutionResult | null> {
    try {
      return await lookup();
    } catch (err) {
      Logger.error(`${label} tier failed; moving on.`, err);
      return null;
    }
  }

  private async remember(key: NormalizedKey, result: ResolutionResult): Promise<void> {
    if (!this.cache) return;
    try {
      await this.cache.put(key, result.bpm, result.source, result.rawMetadata);
    } catch (err) {
      Logger.error('Failed to write BPM to cache (non-fatal).', err);
    }
  }
}
