import Bottleneck from 'bottleneck';
import { Logger } from './logger.js';
import { HttpTransportError } from '../types/errors.js';
import type { HttpResponse, PageFetcher } from '../types/index.js';

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

export interface HttpClientOptions {
  timeoutMs: number;
  // Minimum spacing between requests from this client
  minTimeMs: number;
  headers?: Record<string, string>;
  fetchImpl?: FetchFn;
}

// Query parameters that never appear in logs or error messages
const SECRET_PARAMS = ['api_key'];

export function redactUrl(url: string): string {
  const target = new URL(url);
  for (const name of SECRET_PARAMS) {
    if (target.searchParams.has(name)) target.searchParams.set(name, 'REDACTED');
  }
  return target.toString();
}

export class HttpClient implements PageFetcher {
  private limiter: Bottleneck;
  private timeoutMs: number;
  private headers: Record<string, string>;
  private fetchImpl: FetchFn;

  constructor(options: HttpClientOptions) {
    this.timeoutMs = options.timeoutMs;
    this.headers = options.headers ?? {};
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.limiter = new Bottleneck({ maxConcurrent: 1, minTime: options.minTimeMs });
  }

  static buildUrl(url: string, params?: Record<string, string>): string {
    const target = new URL(url);
    for (const [key, value] of Object.entries(params ?? {})) {
      target.searchParams.set(key, value);
    }
    return target.toString();
  }

  async get(url: string, params?: Record<string, string>): Promise<HttpResponse> {
    const target = HttpClient.buildUrl(url, params);
    const shown = redactUrl(target);
    return this.limiter.schedule(async () => {
      Logger.debug(`GET ${shown}`);
      let res: Response;
      let body: string;
      try {
        res = await this.fetchImpl(target, {
          headers: this.headers,
          redirect: 'follow',
          signal: AbortSignal.timeout(this.timeoutMs),
        });
        body = await res.text();
      } catch (err) {
        throw new HttpTransportError(shown, err);
      }
      Logger.debug(`GET ${shown} -> ${res.status} (${body.length} bytes)`);
      return { status: res.status, ok: res.ok, url: redactUrl(res.url || target), body };
    });
  }
}
