import { Logger } from '../../../utils/logger.js';
import { artistSlug, titleSlug } from '../../../utils/normalize.js';
import {
  addCandidates,
  createScanState,
  isStrongMatch,
  parseCatalogPage,
  selectCandidate,
  type CatalogScanState,
} from '../catalog.js';
import { fetchAndExtract, joinUrl } from './shared.js';
import type { HttpResponse, PageFetcher, StrategyHit, TrackQuery, WebAttemptContext, WebStrategy } from '../../../types/index.js';

// Hard ceiling as well as the default
export const DEFAULT_MAX_CATALOG_PAGES = 15;

// Strategy C: walk the artist's paginated catalog, score the song links, fetch the best one.
export class CatalogScanStrategy implements WebStrategy {
  readonly name = 'catalog-scan';
  private http: PageFetcher;
  private baseUrl: string;
  private maxPages: number;

  constructor(http: PageFetcher, baseUrl: string, maxPages = DEFAULT_MAX_CATALOG_PAGES) {
    this.http = http;
    this.baseUrl = baseUrl;
    this.maxPages = Math.min(maxPages, DEFAULT_MAX_CATALOG_PAGES);
  }

  async attempt(query: TrackQuery, context: WebAttemptContext): Promise<StrategyHit | null> {
    const artist = artistSlug(query.artist);
    if (!artist) return null;
    const song = titleSlug(query.title);

    const state = await this.collect(artist, song);
    const selected = selectCandidate(state.candidates, song);
    context.catalog = { candidates: state.candidates.length, bestScore: selected?.matchScore ?? 0 };
    if (!selected) {
      Logger.debug(`Catalog scan of @${artist} found no song links (${state.pagesFetched} page(s)).`);
      return null;
    }

    Logger.debug(
      `Catalog scan picked ${selected.urlPath} (score ${selected.matchScore}) ` +
        `from ${state.candidates.length} link(s) over ${state.pagesFetched} page(s).`
    );
    const outcome = await fetchAndExtract(this.http, joinUrl(this.baseUrl, selected.urlPath));
    if (outcome.kind === 'bpm') return { bpm: outcome.bpm, url: outcome.url };
    Logger.debug(`Catalog candidate ${outcome.url}: ${outcome.kind}`);
    return null;
  }

  async collect(artist: string, song: string): Promise<CatalogScanState> {
    const state = createScanState();
    let pageUrl: string | null = joinUrl(this.baseUrl, `/@${artist}`);

    while (pageUrl && state.pagesFetched < this.maxPages && !state.visited.has(pageUrl)) {
      state.visited.add(pageUrl);
      state.pagesFetched++;

      let res: HttpResponse;
      try {
        res = await this.http.get(pageUrl);
      } catch (err) {
        Logger.warn(`Catalog page fetch failed: ${err instanceof Error ? err.message : String(err)}`);
        break;
      }
      if (!res.ok) {
        Logger.debug(`Catalog page ${pageUrl} returned HTTP ${res.status}`);
        break;
      }

      const page = parseCatalogPage(res.body, pageUrl, artist);
      const added = addCandidates(state, page.songPaths);
      if (added.some((p) => isStrongMatch(p, song))) {
        Logger.debug(`Strong catalog match on page ${state.pagesFetched}; stopping pagination.`);
        break;
      }
      pageUrl = page.nextUrl;
    }
    return state;
  }
}
