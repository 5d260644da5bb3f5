import Bottleneck from 'bottleneck';
import { asArray, asRecord, dig } from '../extractTrack';
import type { PlaylistSource } from '../collectPlaylistTracks';
import type { Session } from '../loadSession';
import { config } from '../../shared/config';
import { parsePlaylistId } from '../../shared/util';

const WEB_TOKEN_URL = 'https://open.spotify.com/get_access_token?reason=transport&productType=web_player';
const PATHFINDER_URL = 'https://api-partner.spotify.com/pathfinder/v1/query';
const REQUEST_TIMEOUT_MS = 15_000;
const TOKEN_EXPIRY_MARGIN_MS = 60_000;

// page size the web player itself asks for
export const PLAYLIST_PAGE_SIZE = 343;

const limiter = new Bottleneck({
  minTime: config.spotifyMinRequestIntervalMs,
  maxConcurrent: 1,
});

const tokenCache = new Map<string, { token: string, expiresAt: number }>();

export function clearTokenCache() {
  tokenCache.clear();
}

async function fetchJson(url: string | URL, init: RequestInit = {}): Promise<unknown> {
  const response = await limiter.schedule(() => fetch(url, {
    ...init,
    signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
  }));
  if (!response.ok) {
    // a rejected token is not reused
    if (response.status === 401) clearTokenCache();
    throw new Error(`Spotify API error (${response.status})`);
  }
  return response.json();
}

/** Web player access token, anonymous or scoped to a session's cookies. */
export async function getAccessToken(session?: Session): Promise<string> {
  if (config.spotifyAuthToken && !session) return config.spotifyAuthToken;

  const cacheKey = session?.cookieHeader ?? '';
  const cached = tokenCache.get(cacheKey);
  if (cached && Date.now() < cached.expiresAt - TOKEN_EXPIRY_MARGIN_MS) {
    return cached.token;
  }

  const data = asRecord(await fetchJson(WEB_TOKEN_URL, {
    headers: {
      Accept: 'application/json',
      Referer: 'https://open.spotify.com/',
      ...(session ? { Cookie: session.cookieHeader } : {}),
    },
  }));
  const token = data?.accessToken;
  if (typeof token !== 'string' || !token) {
    throw new Error('Spotify token response did not include accessToken');
  }
  const expiresAt = data?.accessTokenExpirationTimestampMs;
  tokenCache.set(cacheKey, {
    token,
    expiresAt: typeof expiresAt === 'number' ? expiresAt : Date.now() + 60 * 60 * 1000,
  });
  return token;
}

export async function pathfinderQuery(
  operationName: string,
  sha256Hash: string,
  variables: Record<string, unknown>,
  session?: Session,
): Promise<unknown> {
  const url = new URL(PATHFINDER_URL);
  url.searchParams.set('operationName', operationName);
  url.searchParams.set('variables', JSON.stringify(variables));
  url.searchParams.set('extensions', JSON.stringify({ persistedQuery: { version: 1, sha256Hash } }));
  const token = await getAccessToken(session);
  return fetchJson(url, {
    headers: {
      Authorization: `Bearer ${token}`,
      Accept: 'application/json',
    },
  });
}

/** A playlist anyone can read, addressed by ID, open.spotify.com URL, or spotify:playlist: URI. */
export class PublicPlaylist implements PlaylistSource {
  public readonly playlistId: string;

  constructor(playlist: string) {
    this.playlistId = parsePlaylistId(playlist);
  }

  get uri() {
    return `spotify:playlist:${this.playlistId}`;
  }

  getPlaylistInfo(limit: number = 25, offset: number = 0) {
    return pathfinderQuery('fetchPlaylist', config.spotifyFetchPlaylistHash, {
      uri: this.uri,
      offset,
      limit,
      enableWatchFeedEntrypoint: false,
    });
  }

  async *paginatePlaylist(): AsyncGenerator<unknown> {
    const first = await this.getPlaylistInfo(PLAYLIST_PAGE_SIZE, 0);
    yield first;
    const totalCount = dig(first, 'data', 'playlistV2', 'content', 'totalCount');
    if (typeof totalCount !== 'number') return;
    for (let offset = PLAYLIST_PAGE_SIZE; offset < totalCount; offset += PLAYLIST_PAGE_SIZE) {
      yield await this.getPlaylistInfo(PLAYLIST_PAGE_SIZE, offset);
    }
  }
}

export function searchSongs(query: string, limit: number = 10, offset: number = 0) {
  return pathfinderQuery('searchDesktop', config.spotifySearchHash, {
    searchTerm: query,
    offset,
    limit,
    numberOfTopResults: 5,
    includeAudiobooks: false,
  });
}

export const getSearchItems = (result: unknown) =>
  asArray(dig(result, 'data', 'searchV2', 'tracksV2', 'items'));
