import { afterEach, describe, expect, test, vi } from 'vitest';
import { GetSongBpmClient } from '../GetSongBpmClient.js';
import { FakeFetcher } from '../../../__tests__/fakes.js';
import { HttpClient } from '../../../utils/http.js';

const BASE = 'https://api.getsong.co';
const SEARCH = `${BASE}/search/`;
const SONG = `${BASE}/song/`;

const client = (http: FakeFetcher) => new GetSongBpmClient(http, { baseUrl: `${BASE}/`, apiKey: 'test-key' });

const luckySong = {
  id: 'abc123',
  song_title: 'Get Lucky',
  tempo: '116',
  artist: { id: 'xyz', name: 'Daft Punk' },
};

describe('GetSongBpmClient', () => {
  test('resolves the first search hit and reads its tempo', async () => {
    const http = new FakeFetcher()
      .json(SEARCH, { search: [{ id: 'abc123', title: 'Get Lucky' }, { id: 'other' }] })
      .json(SONG, { song: luckySong });

    const result = await client(http).search('Daft Punk', 'Get Lucky');

    expect(result).toEqual({
      bpm: 116,
      source: 'api',
      rawMetadata: { id: 'abc123', title: 'Get Lucky', artist: 'Daft Punk', provider: 'getsongbpm', song: luckySong },
    });
  });

  test('sends the key, the search type and a lower-cased lookup', async () => {
    const http = new FakeFetcher();
    await client(http).search('Daft Punk', 'Get Lucky');

    const url = new URL(http.calls[0] ?? '');
    expect(`${url.origin}${url.pathname}`).toBe(SEARCH);
    expect(url.searchParams.get('api_key')).toBe('test-key');
    expect(url.searchParams.get('type')).toBe('both');
    expect(url.searchParams.get('lookup')).toBe('song:get lucky artist:daft punk');
  });

  test('queries the song endpoint by id', async () => {
    const http = new FakeFetcher().json(SEARCH, { search: [{ id: 42 }] }).json(SONG, { song: { tempo: 98 } });

    const result = await client(http).search('A', 'B');

    expect(result?.bpm).toBe(98);
    expect(result?.rawMetadata.title).toBeNull();
    expect(new URL(http.calls[1] ?? '').searchParams.get('id')).toBe('42');
  });

  test('returns null for an empty result list', async () => {
    const http = new FakeFetcher().json(SEARCH, { search: [] });
    expect(await client(http).search('Nobody', 'Nothing')).toBeNull();
    expect(http.calls).toHaveLength(1);
  });

  test('returns null for the no-result object', async () => {
    const http = new FakeFetcher().json(SEARCH, { search: { error: 'no result' } });
    expect(await client(http).search('Nobody', 'Nothing')).toBeNull();
    expect(http.calls).toHaveLength(1);
  });

  test('returns null for an unexpected response shape', async () => {
    const http = new FakeFetcher().json(SEARCH, { search: 'surprise' });
    expect(await client(http).search('A', 'B')).toBeNull();
  });

  test('returns null when the tempo is missing or not a number', async () => {
    const http = new FakeFetcher()
      .json(SEARCH, { search: [{ id: 'abc123' }] })
      .json(SONG, { song: { ...luckySong, tempo: 'fast' } });
    expect(await client(http).search('Daft Punk', 'Get Lucky')).toBeNull();

    http.json(SONG, { song: { ...luckySong, tempo: '' } });
    expect(await client(http).search('Daft Punk', 'Get Lucky')).toBeNull();

    http.json(SONG, { song: { song_title: 'Get Lucky' } });
    expect(await client(http).search('Daft Punk', 'Get Lucky')).toBeNull();
  });

  test('returns null on HTTP errors', async () => {
    const http = new FakeFetcher().page(SEARCH, 'Unauthorized', 401);
    expect(await client(http).search('Daft Punk', 'Get Lucky')).toBeNull();
  });

  test('returns null on invalid JSON', async () => {
    const http = new FakeFetcher().page(SEARCH, '<html>maintenance</html>');
    expect(await client(http).search('Daft Punk', 'Get Lucky')).toBeNull();
  });

  test('returns null when the transport fails', async () => {
    const http = new FakeFetcher().fail(SEARCH, new Error('getaddrinfo ENOTFOUND'));
    expect(await client(http).search('Daft Punk', 'Get Lucky')).toBeNull();
  });
});

describe('GetSongBpmClient logging', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  test('does not log the API key when the request fails', async () => {
    const errors = vi.spyOn(console, 'error').mockImplementation(() => {});
    const http = new HttpClient({
      timeoutMs: 1000,
      minTimeMs: 0,
      fetchImpl: async () => {
        throw new TypeError('fetch failed');
      },
    });

    const result = await new GetSongBpmClient(http, { baseUrl: BASE, apiKey: 'test-secret' }).search('Daft Punk', 'Get Lucky');

    expect(result).toBeNull();
    expect(errors).toHaveBeenCalledTimes(1);
    const logged = String(errors.mock.calls[0]?.[0]);
    expect(logged).toContain('api_key=REDACTED');
    expect(logged).not.toContain('test-secret');
  });
});
