import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import collectPlaylistTracks from '../collectPlaylistTracks';
import {
  PLAYLIST_PAGE_SIZE,
  PublicPlaylist,
  getAccessToken,
  getSearchItems,
  clearTokenCache,
  searchSongs,
} from '../wrappers/spotify';
import { PrivatePlaylist } from '../wrappers/spotifyLibrary';
import { playlistChunk } from './fixtures';

const session = { cookies: { sp_dc: 'test-cookie' }, cookieHeader: 'sp_dc=test-cookie' };

const jsonResponse = (body: unknown, status: number = 200) =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

type Handler = (url: URL, init?: RequestInit) => Response;

// answers the token endpoint itself and hands everything else to `handler`
function stubFetch(handler: Handler) {
  return vi.spyOn(globalThis, 'fetch').mockImplementation(async (input, init) => {
    const url = new URL(input instanceof Request ? input.url : input);
    if (url.pathname === '/get_access_token') {
      return jsonResponse({ accessToken: 'test-token', accessTokenExpirationTimestampMs: Date.now() + 3_600_000 });
    }
    return handler(url, init);
  });
}

const queryVariables = (url: URL) => {
  const variables: unknown = JSON.parse(url.searchParams.get('variables') ?? '{}');
  return typeof variables === 'object' && variables !== null ? Object.entries(variables) : [];
};

const variable = (url: URL, name: string) => queryVariables(url).find(([key]) => key === name)?.[1];

// a playlist of `size` tracks served by offset/limit
const playlistPages = (size: number): Handler => (url) => {
  const offset = Number(variable(url, 'offset'));
  const limit = Number(variable(url, 'limit'));
  return jsonResponse(playlistChunk(offset, Math.max(0, Math.min(limit, size - offset)), size));
};

describe('PublicPlaylist', () => {
  beforeEach(() => {
    clearTokenCache();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('accepts ids, uris and urls', () => {
    expect(new PublicPlaylist('37i9dQZF1DXcBWIGoYBM5M').uri).toBe('spotify:playlist:37i9dQZF1DXcBWIGoYBM5M');
    expect(new PublicPlaylist('spotify:playlist:37i9dQZF1DXcBWIGoYBM5M').playlistId).toBe('37i9dQZF1DXcBWIGoYBM5M');
    expect(new PublicPlaylist('https://open.spotify.com/playlist/37i9dQZF1DXcBWIGoYBM5M?si=abc').playlistId)
      .toBe('37i9dQZF1DXcBWIGoYBM5M');
  });

  it('pages through the whole playlist', async () => {
    const fetchMock = stubFetch(playlistPages(400));

    const tracks = await collectPlaylistTracks(new PublicPlaylist('https://open.spotify.com/playlist/37i9dQZF1DXcBWIGoYBM5M'));

    expect(tracks).toHaveLength(400);
    expect(tracks[399].name).toBe('Track 399');
    const pageRequests = fetchMock.mock.calls
      .map(([input]) => new URL(input instanceof Request ? input.url : input))
      .filter(url => url.searchParams.get('operationName') === 'fetchPlaylist');
    expect(pageRequests.map(url => [variable(url, 'offset'), variable(url, 'limit')])).toEqual([
      [0, PLAYLIST_PAGE_SIZE],
      [PLAYLIST_PAGE_SIZE, PLAYLIST_PAGE_SIZE],
    ]);
    expect(variable(pageRequests[0], 'uri')).toBe('spotify:playlist:37i9dQZF1DXcBWIGoYBM5M');
  });

  it('authenticates with a cached anonymous token', async () => {
    const fetchMock = stubFetch(playlistPages(3));
    const playlist = new PublicPlaylist('pl123abc');

    await playlist.getPlaylistInfo();
    await playlist.getPlaylistInfo(10, 0);

    const tokenRequests = fetchMock.mock.calls.filter(([input]) => String(input).includes('get_access_token'));
    expect(tokenRequests).toHaveLength(1);
    expect(fetchMock.mock.calls[1][1]?.headers).toEqual({ Authorization: 'Bearer test-token', Accept: 'application/json' });
  });

  it('fetches a new token after one is rejected', async () => {
    let status = 401;
    const fetchMock = stubFetch(() => jsonResponse({}, status));
    const playlist = new PublicPlaylist('pl123abc');

    await expect(playlist.getPlaylistInfo()).rejects.toThrow('Spotify API error (401)');
    status = 200;
    await playlist.getPlaylistInfo();

    const tokenRequests = fetchMock.mock.calls.filter(([input]) => String(input).includes('get_access_token'));
    expect(tokenRequests).toHaveLength(2);
  });

  it('rejects on an error status', async () => {
    stubFetch(() => jsonResponse({ error: 'nope' }, 500));

    await expect(new PublicPlaylist('pl123abc').getPlaylistInfo()).rejects.toThrow('Spotify API error (500)');
  });

  it('collects nothing when every request fails', async () => {
    stubFetch(() => jsonResponse({}, 429));

    await expect(collectPlaylistTracks(new PublicPlaylist('pl123abc'), vi.fn())).resolves.toEqual([]);
  });
});

describe('searchSongs', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('sends the search term and returns the track items', async () => {
    clearTokenCache();
    const items = [{ item: { data: { name: 'Song', uri: 'spotify:track:abcdefghij' } } }];
    const fetchMock = stubFetch(() => jsonResponse({ data: { searchV2: { tracksV2: { items } } } }));

    const result = await searchSongs('some song', 3, 6);

    expect(getSearchItems(result)).toEqual(items);
    const url = new URL(String(fetchMock.mock.calls[1][0]));
    expect(url.searchParams.get('operationName')).toBe('searchDesktop');
    expect(variable(url, 'searchTerm')).toBe('some song');
    expect(variable(url, 'limit')).toBe(3);
    expect(variable(url, 'offset')).toBe(6);
  });
});

describe('session token', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('sends the session cookies to the token endpoint', async () => {
    clearTokenCache();
    const fetchMock = stubFetch(() => jsonResponse({}));

    await expect(getAccessToken(session)).resolves.toBe('test-token');
    expect(fetchMock.mock.calls[0][1]?.headers).toMatchObject({ Cookie: 'sp_dc=test-cookie' });
  });
});

describe('PrivatePlaylist', () => {
  beforeEach(() => {
    clearTokenCache();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('creates a private playlist', async () => {
    const fetchMock = stubFetch(() => jsonResponse({ id: 'new1', uri: 'spotify:playlist:new1' }, 201));

    await expect(new PrivatePlaylist(session).createPlaylist('Mix')).resolves.toBe('spotify:playlist:new1');
    const [input, init] = fetchMock.mock.calls[1];
    expect(String(input)).toBe('https://api.spotify.com/v1/me/playlists');
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe(JSON.stringify({ name: 'Mix', public: false }));
  });

  it('adds a track by id', async () => {
    const fetchMock = stubFetch(() => jsonResponse({ snapshot_id: 'snap' }, 201));

    await new PrivatePlaylist(session, 'https://open.spotify.com/playlist/pl123abc').addTrack('abcdefghij12');

    const [input, init] = fetchMock.mock.calls[1];
    expect(String(input)).toBe('https://api.spotify.com/v1/playlists/pl123abc/tracks');
    expect(init?.body).toBe(JSON.stringify({ uris: ['spotify:track:abcdefghij12'] }));
  });

  it('needs a playlist to add to', async () => {
    await expect(new PrivatePlaylist(session).addTrack('abcdefghij12'))
      .rejects.toMatchObject({ type: 'USAGE' });
  });
});
