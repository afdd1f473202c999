import { JSDOM } from 'jsdom';
import type { SearchCandidate } from '../../types/index.js';

const EXCLUDED_MARKERS = ['-instrumental', '-remix', '-cover'];

export interface CatalogPage {
  // /@artist/song paths in document order, query and fragment dropped
  songPaths: string[];
  nextUrl: string | null;
}

// Explicit accumulator threaded through the pagination loop
export interface CatalogScanState {
  candidates: string[];
  seen: Set<string>;
  visited: Set<string>;
  pagesFetched: number;
}

export function createScanState(): CatalogScanState {
  return { candidates: [], seen: new Set(), visited: new Set(), pagesFetched: 0 };
}

export function addCandidates(state: CatalogScanState, paths: string[]): string[] {
  const added: string[] = [];
  for (const p of paths) {
    if (state.seen.has(p)) continue;
    state.seen.add(p);
    state.candidates.push(p);
    added.push(p);
  }
  return added;
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment).toLowerCase();
  } catch {
    return segment.toLowerCase();
  }
}

// Song segment of /@artist/song, or null for anything else
export function songSegment(urlPath: string): string | null {
  const parts = urlPath.split('/').filter(Boolean);
  if (parts.length < 2 || !parts[0]?.startsWith('@')) return null;
  return parts[1] ?? null;
}

export function titleWords(titleSlug: string): string[] {
  return titleSlug.split('-').filter((w) => w.length > 0);
}

export function significantWords(titleSlug: string): string[] {
  return titleWords(titleSlug).filter((w) => w.length > 2);
}

function songTokens(urlPath: string): Set<string> {
  return new Set((songSegment(urlPath) ?? '').split('-').filter(Boolean));
}

export function isExcluded(urlPath: string): boolean {
  const song = songSegment(urlPath) ?? '';
  return EXCLUDED_MARKERS.some((marker) => song.includes(marker));
}

/**
 * Whether a collected link is good enough to stop paginating: the song slug contains
 * the plain title slug, or every significant title word appears as a dash-delimited token.
 */
export function isStrongMatch(urlPath: string, titleSlug: string): boolean {
  const song = songSegment(urlPath);
  if (!song || !titleSlug) return false;
  if (song.includes(titleSlug)) return true;
  const words = significantWords(titleSlug);
  if (words.length === 0) return false;
  const tokens = songTokens(urlPath);
  return words.every((w) => tokens.has(w));
}

export function scoreCandidate(urlPath: string, titleSlug: string): number {
  const tokens = songTokens(urlPath);
  let score = significantWords(titleSlug).filter((w) => tokens.has(w)).length;
  // Song segment only: the artist slug may contain the title ("beyonce" / "once")
  const song = songSegment(urlPath) ?? '';
  if (titleSlug && song.includes(titleSlug)) {
    score += titleWords(titleSlug).length;
  }
  return score;
}

export function scoreCandidates(paths: string[], titleSlug: string): SearchCandidate[] {
  return paths
    .filter((p) => !isExcluded(p))
    .map((urlPath) => ({ urlPath, matchScore: scoreCandidate(urlPath, titleSlug) }));
}

/**
 * Highest score wins, earliest on ties. With no positive score, the first non-excluded
 * link is used, then the first link collected at all.
 */
export function selectCandidate(paths: string[], titleSlug: string): SearchCandidate | null {
  if (paths.length === 0) return null;
  let best: SearchCandidate | null = null;
  for (const candidate of scoreCandidates(paths, titleSlug)) {
    if (!best || candidate.matchScore > best.matchScore) best = candidate;
  }
  // A zero best is the first non-excluded link, since only a strictly higher score replaces it
  if (best) return best;
  return { urlPath: paths[0] ?? '', matchScore: 0 };
}

/**
 * Reads one catalog listing: same-origin links under /@artist/ that name a song,
 * plus the next-page link (rel="next", or /@artist?after=...).
 */
export function parseCatalogPage(html: string, pageUrl: string, artistSlug: string): CatalogPage {
  const dom = new JSDOM(html);
  const page = new URL(pageUrl);
  const artistRoot = `/@${artistSlug}`;
  const songPaths: string[] = [];
  let nextUrl: string | null = null;

  for (const anchor of Array.from(dom.window.document.querySelectorAll('a[href]'))) {
    const href = anchor.getAttribute('href');
    if (!href) continue;
    let url: URL;
    try {
      url = new URL(href, page);
    } catch {
      continue;
    }
    if (url.origin !== page.origin) continue;

    const parts = url.pathname.split('/').filter(Boolean).map(decodeSegment);
    if (parts[0] !== `@${artistSlug}`) continue;

    if (parts.length === 1) {
      const isNext = (anchor.getAttribute('rel') || '').split(/\s+/).includes('next') || url.searchParams.has('after');
      if (isNext && nextUrl === null) nextUrl = url.toString();
      continue;
    }
    if (parts.length >= 2 && parts[1]) {
      songPaths.push(`${artistRoot}/${parts[1]}`);
    }
  }

  return { songPaths, nextUrl };
}
