import { Logger } from '../../../utils/logger.js';
import { artistSlug, slugVariants } from '../../../utils/normalize.js';
import { fetchAndExtract, joinUrl } from './shared.js';
import type { PageFetcher, StrategyHit, TrackQuery, WebAttemptContext, WebStrategy } from '../../../types/index.js';

// Strategy D: only when the catalog scan found no evidence (no candidate, or best score 0).
export class SlugVariantStrategy implements WebStrategy {
  readonly name = 'slug-variants';
  private http: PageFetcher;
  private baseUrl: string;

  constructor(http: PageFetcher, baseUrl: string) {
    this.http = http;
    this.baseUrl = baseUrl;
  }

  async attempt(query: TrackQuery, context: WebAttemptContext): Promise<StrategyHit | null> {
    if (context.catalog && context.catalog.bestScore > 0) return null;
    const artist = artistSlug(query.artist);
    if (!artist) return null;

    const tried = new Set<string>();
    for (const variant of slugVariants(query.artist, query.title)) {
      if (!variant || tried.has(variant)) continue;
      tried.add(variant);

      const url = joinUrl(this.baseUrl, `/@${artist}/${variant}`);
      try {
        const outcome = await fetchAndExtract(this.http, url);
        if (outcome.kind === 'bpm') return { bpm: outcome.bpm, url: outcome.url };
        Logger.debug(`Slug variant ${variant}: ${outcome.kind}`);
      } catch (err) {
        Logger.warn(`Slug variant ${variant} failed: ${err instanceof Error ? err.message : String(err)}`);
      }
    }
    return null;
  }
}
