import { chromium, type Browser } from 'playwright-core';
import fs from 'fs';
import path from 'path';
import { Logger } from '../../utils/logger.js';
import type { BrowserSearch, RenderedPage } from '../../types/index.js';

export interface PlaywrightSearchOptions {
  baseUrl: string;
  chromePath: string | null;
  timeoutMs: number;
}

// Song pages live at /@artist/song
export const SONG_PATH_PATTERN = /^\/@[^/?#]+\/[^/?#]+\/?$/;

// Result lists on the search page; the first one present scopes the link lookup
const RESULT_CONTAINER_SELECTORS = ['.search-results', '[data-testid="search-results"]', 'main'];

// The home page links featured songs, so links only count once the results page has loaded
export function isSearchResultsUrl(url: URL): boolean {
  return url.pathname.startsWith('/search') || url.searchParams.has('q');
}

const SEARCH_INPUT_SELECTORS = [
  'input[type="search"]',
  'input[name="q"]',
  'form[role="search"] input',
  'input[type="text"]',
];

/**
 * Drives the site's own search box in a headless Chromium. One browser per call,
 * closed before returning; any failure or timeout yields null.
 */
export class PlaywrightBrowserSearch implements BrowserSearch {
  private options: PlaywrightSearchOptions;

  constructor(options: PlaywrightSearchOptions) {
    this.options = options;
  }

  async searchRendered(query: string): Promise<RenderedPage | null> {
    let browser: Browser | null = null;
    const { baseUrl, timeoutMs } = this.options;
    const executablePath = this.resolveExecutablePath(this.options.chromePath ?? undefined);

    try {
      Logger.debug('Launching headless browser for site search...');
      browser = await chromium.launch({ headless: true, executablePath, timeout: timeoutMs });
      const context = await browser.newContext();
      const page = await context.newPage();
      page.setDefaultTimeout(timeoutMs);

      await page.goto(baseUrl, { waitUntil: 'domcontentloaded', timeout: timeoutMs });

      let inputSelector: string | null = null;
      for (const sel of SEARCH_INPUT_SELECTORS) {
        try {
          await page.waitForSelector(sel, { state: 'visible', timeout: Math.min(5000, timeoutMs) });
          inputSelector = sel;
          break;
        } catch {
          // try next
        }
      }
      if (!inputSelector) {
        Logger.debug('Search input never became interactive.');
        return null;
      }

      const input = page.locator(inputSelector).first();
      await input.fill(query);
      await input.press('Enter');
      await page.waitForURL(isSearchResultsUrl, { timeout: timeoutMs });

      const handle = await page.waitForFunction(
        ({ pattern, containers }: { pattern: string; containers: string[] }) => {
          const re = new RegExp(pattern);
          const scope = containers.map((sel) => document.querySelector(sel)).find((el) => el !== null) ?? document;
          const anchors = Array.from(scope.querySelectorAll('a[href]'));
          const hit = anchors.find((a) => re.test(a.getAttribute('href') || ''));
          return hit ? hit.getAttribute('href') : null;
        },
        { pattern: SONG_PATH_PATTERN.source, containers: RESULT_CONTAINER_SELECTORS },
        { timeout: timeoutMs }
      );
      const href = await handle.jsonValue();
      if (!href) return null;

      const songUrl = new URL(href, baseUrl).toString();
      Logger.debug(`Following first search result: ${songUrl}`);
      await page.goto(songUrl, { waitUntil: 'domcontentloaded', timeout: timeoutMs });
      const html = await page.content();
      return { url: songUrl, html };
    } catch (err) {
      Logger.debug(`Browser search failed: ${err instanceof Error ? err.message : String(err)}`);
      return null;
    } finally {
      if (browser) {
        try {
          await browser.close();
        } catch (err) {
          Logger.warn(`Failed to close browser: ${err instanceof Error ? err.message : String(err)}`);
        }
      }
    }
  }

  private resolveExecutablePath(input: string | undefined): string | undefined {
    if (!input) return undefined;
    // If user passed a macOS .app bundle, attempt to resolve the actual binary inside.
    if (process.platform === 'darwin' && /\.app\/?$/i.test(input)) {
      const candidates = ['Google Chrome', 'Chromium', 'Brave Browser', 'Microsoft Edge'].map((bin) =>
        path.join(input, 'Contents', 'MacOS', bin)
      );
      const found = candidates.find((candidate) => fs.existsSync(candidate));
      return found ?? input;
    }
    return input;
  }
}
