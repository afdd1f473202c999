import { Logger } from '../../utils/logger.js';
import { CatalogScanStrategy } from './strategies/CatalogScanStrategy.js';
import { DirectUrlStrategy } from './strategies/DirectUrlStrategy.js';
import { RenderedSearchStrategy } from './strategies/RenderedSearchStrategy.js';
import { SlugVariantStrategy } from './strategies/SlugVariantStrategy.js';
import type {
  BrowserSearch,
  IWebResolver,
  PageFetcher,
  ResolutionResult,
  WebAttemptContext,
  WebStrategy,
} from '../../types/index.js';

export interface SongBpmScraperOptions {
  baseUrl: string;
  maxCatalogPages: number;
}

/**
 * Web tier for songbpm.com. Runs its strategies in order, each once per call, and stops
 * at the first one that extracts a plausible BPM.
 */
export class SongBpmScraper implements IWebResolver {
  private strategies: readonly WebStrategy[];

  constructor(strategies: readonly WebStrategy[]) {
    this.strategies = strategies;
  }

  static create(http: PageFetcher, browser: BrowserSearch | null, options: SongBpmScraperOptions): SongBpmScraper {
    return new SongBpmScraper([
      new RenderedSearchStrategy(browser),
      new DirectUrlStrategy(http, options.baseUrl),
      new CatalogScanStrategy(http, options.baseUrl, options.maxCatalogPages),
      new SlugVariantStrategy(http, options.baseUrl),
    ]);
  }

  async resolve(artist: string, title: string): Promise<ResolutionResult | null> {
    const query = { artist, title };
    const context: WebAttemptContext = { catalog: null };

    for (const strategy of this.strategies) {
      try {
        const hit = await strategy.attempt(query, context);
        if (hit) {
          Logger.info(`Scraped BPM for ${artist} - ${title}: ${hit.bpm} (${strategy.name})`);
          return { bpm: hit.bpm, source: 'scraper', rawMetadata: { strategy: strategy.name, url: hit.url } };
        }
      } catch (err) {
        Logger.warn(`Scraper strategy ${strategy.name} failed: ${err instanceof Error ? err.message : String(err)}`);
      }
    }
    Logger.debug(`All scraper strategies missed for ${artist} - ${title}`);
    return null;
  }
}
