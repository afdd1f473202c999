import { HttpClient } from '../utils/http.js';
import type { BrowserSearch, HttpResponse, PageFetcher, RenderedPage } from '../types/index.js';

function stripQuery(url: string): string {
  const u = new URL(url);
  return `${u.origin}${u.pathname}`;
}

// Routes by exact URL first, then by URL without its query string; anything else is a 404.
export class FakeFetcher implements PageFetcher {
  calls: string[] = [];
  private routes: Map<string, HttpResponse | Error> = new Map();

  page(url: string, body: string, status = 200): this {
    this.routes.set(url, { status, ok: status >= 200 && status < 300, url, body });
    return this;
  }

  json(url: string, payload: unknown, status = 200): this {
    return this.page(url, JSON.stringify(payload), status);
  }

  fail(url: string, err: Error): this {
    this.routes.set(url, err);
    return this;
  }

  async get(url: string, params?: Record<string, string>): Promise<HttpResponse> {
    const full = HttpClient.buildUrl(url, params);
    this.calls.push(full);
    const route = this.routes.get(full) ?? this.routes.get(stripQuery(full));
    if (route instanceof Error) throw route;
    if (route) return route;
    return { status: 404, ok: false, url: full, body: 'Not Found' };
  }
}

export class FakeBrowser implements BrowserSearch {
  queries: string[] = [];
  private result: RenderedPage | null;

  constructor(result: RenderedPage | null) {
    this.result = result;
  }

  async searchRendered(query: string): Promise<RenderedPage | null> {
    this.queries.push(query);
    return this.result;
  }
}

export function songPage(bpm: number): string {
  return `<html><body><h1>Song</h1><p>Average tempo 100 BPM</p><p>This track is ${bpm} BPM</p></body></html>`;
}

export function catalogPage(songPaths: string[], next?: string): string {
  const links = songPaths.map((p) => `<li><a href="${p}">${p}</a></li>`).join('');
  const nextLink = next ? `<a rel="next" href="${next}">Next</a>` : '';
  return `<html><body><ul>${links}</ul>${nextLink}</body></html>`;
}
