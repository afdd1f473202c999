/**
 * GetSongBPM API client.
 *
 * Two calls per lookup: /search/ resolves (artist, title) to a song id, /song/ returns
 * the song record with its tempo. Every failure is logged and reported as "no result".
 */

import { Logger } from '../../utils/logger.js';
import { HttpStatusError } from '../../types/errors.js';
import type { IBpmApiClient, PageFetcher, ResolutionResult } from '../../types/index.js';

export interface GetSongBpmOptions {
  baseUrl: string;
  apiKey: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function buildLookupParam(artist: string, title: string): string {
  return `song:${title.toLowerCase()} artist:${artist.toLowerCase()}`;
}

function readId(stub: unknown): string | null {
  if (!isRecord(stub)) return null;
  const id = stub.id;
  if (typeof id === 'string' && id.trim().length > 0) return id.trim();
  if (typeof id === 'number' && Number.isFinite(id)) return String(id);
  return null;
}

function readTempo(value: unknown): number | null {
  if (typeof value !== 'number' && typeof value !== 'string') return null;
  if (typeof value === 'string' && value.trim().length === 0) return null;
  const tempo = Number(value);
  return Number.isFinite(tempo) && tempo > 0 ? tempo : null;
}

export class GetSongBpmClient implements IBpmApiClient {
  private http: PageFetcher;
  private baseUrl: string;
  private apiKey: string;

  constructor(http: PageFetcher, options: GetSongBpmOptions) {
    this.http = http;
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.apiKey = options.apiKey;
  }

  async search(artist: string, title: string): Promise<ResolutionResult | null> {
    try {
      const id = await this.findSongId(artist, title);
      if (!id) return null;
      Logger.debug(`GetSongBPM song id ${id} for ${artist} - ${title}`);
      return await this.getById(id);
    } catch (err) {
      Logger.error(`GetSongBPM lookup failed for ${artist} - ${title}.`, err);
      return null;
    }
  }

  async findSongId(artist: string, title: string): Promise<string | null> {
    const data = await this.getJson('/search/', {
      type: 'both',
      lookup: buildLookupParam(artist, title),
    });
    const results = isRecord(data) ? data.search : undefined;

    if (Array.isArray(results)) {
      if (results.length === 0) {
        Logger.debug(`GetSongBPM: no results for ${artist} - ${title}`);
        return null;
      }
      const id = readId(results[0]);
      if (!id) Logger.warn(`GetSongBPM: first search result has no id for ${artist} - ${title}`);
      return id;
    }
    // {"search": {"error": "no result"}}
    if (isRecord(results) && 'error' in results) {
      Logger.debug(`GetSongBPM: no result for ${artist} - ${title} (${String(results.error)})`);
      return null;
    }
    Logger.warn(`GetSongBPM: unexpected search response shape for ${artist} - ${title}`);
    return null;
  }

  async getById(id: string): Promise<ResolutionResult | null> {
    const data = await this.getJson('/song/', { id });
    const song = isRecord(data) ? data.song : undefined;
    if (!isRecord(song)) {
      Logger.warn(`GetSongBPM: no song data for id ${id}`);
      return null;
    }
    const bpm = readTempo(song.tempo);
    if (bpm === null) {
      Logger.warn(`GetSongBPM: song ${id} has no usable tempo`);
      return null;
    }
    const artistInfo = song.artist;
    return {
      bpm,
      source: 'api',
      rawMetadata: {
        id,
        title: typeof song.song_title === 'string' ? song.song_title : null,
        artist: isRecord(artistInfo) && typeof artistInfo.name === 'string' ? artistInfo.name : null,
        provider: 'getsongbpm',
        song,
      },
    };
  }

  private async getJson(endpoint: string, params: Record<string, string>): Promise<unknown> {
    const res = await this.http.get(`${this.baseUrl}${endpoint}`, { api_key: this.apiKey, ...params });
    if (!res.ok) {
      throw new HttpStatusError(`${this.baseUrl}${endpoint}`, res.status);
    }
    if (res.body.trim().length === 0) return null;
    try {
      return JSON.parse(res.body);
    } catch {
      Logger.warn(`GetSongBPM: invalid JSON from ${endpoint}: ${res.body.slice(0, 100)}`);
      return null;
    }
  }
}
