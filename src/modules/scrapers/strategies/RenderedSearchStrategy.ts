import { Logger } from '../../../utils/logger.js';
import { extractBpm } from '../../extractors/BpmExtractor.js';
import type { BrowserSearch, StrategyHit, TrackQuery, WebStrategy } from '../../../types/index.js';

// Strategy A: the site's own search box in a headless browser, when one is available.
export class RenderedSearchStrategy implements WebStrategy {
  readonly name = 'rendered-search';
  private browser: BrowserSearch | null;

  constructor(browser: BrowserSearch | null) {
    this.browser = browser;
  }

  async attempt(query: TrackQuery): Promise<StrategyHit | null> {
    if (!this.browser) return null;
    const page = await this.browser.searchRendered(`${query.artist} ${query.title}`);
    if (!page) return null;
    const bpm = extractBpm(page.html);
    if (bpm === null) {
      Logger.debug(`No plausible BPM on rendered search result ${page.url}`);
      return null;
    }
    return { bpm, url: page.url };
  }
}
