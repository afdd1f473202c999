import { Logger } from '../../../utils/logger.js';
import { artistSlug, titleSlug } from '../../../utils/normalize.js';
import { fetchAndExtract, joinUrl } from './shared.js';
import type { PageFetcher, StrategyHit, TrackQuery, WebStrategy } from '../../../types/index.js';

// Strategy B: guess /@artist/plain-title-slug.
export class DirectUrlStrategy implements WebStrategy {
  readonly name = 'direct-url';
  private http: PageFetcher;
  private baseUrl: string;

  constructor(http: PageFetcher, baseUrl: string) {
    this.http = http;
    this.baseUrl = baseUrl;
  }

  async attempt(query: TrackQuery): Promise<StrategyHit | null> {
    const artist = artistSlug(query.artist);
    const song = titleSlug(query.title);
    if (!artist || !song) return null;

    const outcome = await fetchAndExtract(this.http, joinUrl(this.baseUrl, `/@${artist}/${song}`));
    switch (outcome.kind) {
      case 'bpm':
        return { bpm: outcome.bpm, url: outcome.url };
      case 'not_found':
        Logger.debug(`Direct URL not found: ${outcome.url}`);
        return null;
      case 'http_error':
        Logger.warn(`Direct URL returned HTTP ${outcome.status}: ${outcome.url}`);
        return null;
      case 'no_bpm':
        Logger.warn(`Could not extract BPM from page: ${outcome.url}`);
        return null;
    }
  }
}
