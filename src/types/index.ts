// Raw input from a caller or a now-playing detector
export interface TrackQuery {
  readonly artist: string;
  readonly title: string;
}

// Cache identity: lower-cased, trimmed, whitespace collapsed
export interface NormalizedKey {
  readonly artistNorm: string;
  readonly titleNorm: string;
}

export type BpmSource = 'cache' | 'api' | 'scraper';

export interface BpmRecord {
  artistNorm: string;
  titleNorm: string;
  bpm: number;
  source: BpmSource;
  lastUpdated: Date;
  metadata: Record<string, unknown>;
}

export interface ResolutionResult {
  bpm: number;
  source: BpmSource;
  rawMetadata: Record<string, unknown>;
}

// A catalog link hypothesized to be the song page; never persisted
export interface SearchCandidate {
  urlPath: string;
  matchScore: number;
}

export interface IBpmCache {
  get(key: NormalizedKey): Promise<BpmRecord | null>;
  // Upsert: last write wins, no history
  put(key: NormalizedKey, bpm: number, source: BpmSource, metadata: Record<string, unknown>): Promise<void>;
  // Administrative operations, never called by the resolver
  clear(): Promise<number>;
  delete(key: NormalizedKey): Promise<boolean>;
  close(): Promise<void>;
}

export interface IBpmApiClient {
  search(artist: string, title: string): Promise<ResolutionResult | null>;
}

export interface IWebResolver {
  resolve(artist: string, title: string): Promise<ResolutionResult | null>;
}

// HTTP seam shared by the API client and the scraper
export interface HttpResponse {
  status: number;
  ok: boolean;
  url: string;
  body: string;
}

export interface PageFetcher {
  get(url: string, params?: Record<string, string>): Promise<HttpResponse>;
}

export interface RenderedPage {
  url: string;
  html: string;
}

// Optional headless-browser capability. Implementations never throw.
export interface BrowserSearch {
  searchRendered(query: string): Promise<RenderedPage | null>;
}

export interface StrategyHit {
  bpm: number;
  url: string;
}

// Per-call accumulator shared by the web strategies of one resolve() call
export interface WebAttemptContext {
  catalog: { candidates: number; bestScore: number } | null;
}

export interface WebStrategy {
  readonly name: string;
  attempt(query: TrackQuery, context: WebAttemptContext): Promise<StrategyHit | null>;
}

// Collaborators outside the pipeline
export interface NowPlayingTrack extends TrackQuery {
  album?: string;
  player?: string;
}

export interface TrackQueryProducer {
  getCurrentTrack(): Promise<NowPlayingTrack | null>;
}

export interface BpmConsumer {
  setBpm(bpm: number): void;
}
