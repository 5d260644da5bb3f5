import type { TrackRecord } from '../../shared/tracks';

export function makeTrack(overrides: Partial<TrackRecord> = {}): TrackRecord {
  return {
    name: 'Song',
    artists: 'Artist',
    album: 'Album',
    uri: 'spotify:track:abc123',
    id: 'abc123',
    duration_ms: 200000,
    cover_url: null,
    ...overrides,
  };
}

/** One raw playlist entry the way the catalog nests it. */
export function rawItem(name: string, uri: string = `spotify:track:${name.replace(/\W/g, '')}`) {
  return {
    itemV2: {
      data: {
        name,
        uri,
        artists: { items: [{ profile: { name: 'Artist' } }] },
      },
    },
  };
}

/** A playlist response chunk holding `count` entries named `Track <start>`, `Track <start + 1>`, ... */
export function playlistChunk(start: number, count: number, totalCount?: number) {
  return {
    data: {
      playlistV2: {
        name: 'Test Playlist',
        content: {
          totalCount,
          items: Array.from({ length: count }, (_, i) => rawItem(`Track ${start + i}`)),
        },
      },
    },
  };
}
