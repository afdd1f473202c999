import { extractBpm } from '../../extractors/BpmExtractor.js';
import type { PageFetcher } from '../../../types/index.js';

export type PageOutcome =
  | { kind: 'not_found'; url: string }
  | { kind: 'http_error'; url: string; status: number }
  | { kind: 'no_bpm'; url: string }
  | { kind: 'bpm'; url: string; bpm: number };

// Fetch a page and run the extractor on it. Transport errors propagate to the caller.
export async function fetchAndExtract(http: PageFetcher, url: string): Promise<PageOutcome> {
  const res = await http.get(url);
  if (res.status === 404) return { kind: 'not_found', url };
  if (!res.ok) return { kind: 'http_error', url, status: res.status };
  const bpm = extractBpm(res.body);
  return bpm === null ? { kind: 'no_bpm', url } : { kind: 'bpm', url, bpm };
}

export function joinUrl(baseUrl: string, urlPath: string): string {
  return `${baseUrl.replace(/\/+$/, '')}${urlPath}`;
}
