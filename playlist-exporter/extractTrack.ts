import type { TrackRecord } from '../shared/tracks';

type UnknownRecord = Record<string, unknown>;

const isRecord = (value: unknown): value is UnknownRecord =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const asRecord = (value: unknown): UnknownRecord | null => isRecord(value) ? value : null;

export const asArray = (value: unknown): unknown[] => Array.isArray(value) ? value : [];

export const readString = (record: UnknownRecord | null, key: string): string | null => {
  const value = record?.[key];
  return typeof value === 'string' ? value : null;
};

const readNumber = (record: UnknownRecord | null, key: string): number | null => {
  const value = record?.[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
};

// walk a chain of object keys, stopping at the first missing or non-object link
export const dig = (value: unknown, ...path: string[]): unknown => {
  let current = value;
  for (const key of path) {
    const record = asRecord(current);
    if (!record) return undefined;
    current = record[key];
  }
  return current;
};

/**
 * Comma-joined display names of every artist entry that has a profile.
 * Entries without a profile (or without a name on it) are dropped.
 */
export const joinArtistNames = (artists: unknown) => asArray(dig(artists, 'items'))
  .map(entry => asRecord(dig(entry, 'profile')))
  .filter((profile): profile is UnknownRecord => profile !== null)
  .map(profile => readString(profile, 'name'))
  .filter((name): name is string => name !== null)
  .join(', ');

export const parseIdFromUri = (uri: string | null) => {
  if (uri === null) return null;
  const match = uri.match(/track:([A-Za-z0-9]+)/);
  return match ? match[1] : null;
};

const isBlank = (track: TrackRecord) =>
  !track.name && !track.artists && !track.album && !track.uri &&
  track.duration_ms === null && !track.cover_url;

export default function extractTrack(item: unknown): TrackRecord | null {
  const data = asRecord(dig(item, 'itemV2', 'data'));
  if (!data || !Object.keys(data).length) return null;

  const uri = readString(data, 'uri');

  // album display name, falling back to the album's type discriminator
  const album = asRecord(data.albumOfTrack);
  const albumName = readString(album, 'name') || readString(album, '__typename');
  const firstSource = asRecord(asArray(dig(album, 'coverArt', 'sources'))[0]);

  const track: TrackRecord = {
    name: readString(data, 'name'),
    artists: joinArtistNames(data.artists),
    album: albumName || null,
    uri,
    id: parseIdFromUri(uri),
    duration_ms: readNumber(asRecord(data.duration), 'totalMilliseconds'),
    cover_url: readString(firstSource, 'url'),
  };
  return isBlank(track) ? null : track;
}

/** Every non-empty track in a playlist response chunk, in order. */
export function extractItems(chunk: unknown): TrackRecord[] {
  const tracks: TrackRecord[] = [];
  for (const entry of getPlaylistItems(chunk)) {
    const track = extractTrack(entry);
    if (track) tracks.push(track);
  }
  return tracks;
}

export const getPlaylistItems = (chunk: unknown) =>
  asArray(dig(chunk, 'data', 'playlistV2', 'content', 'items'));
