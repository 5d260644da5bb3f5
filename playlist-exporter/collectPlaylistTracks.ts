import { extractItems, getPlaylistItems } from './extractTrack';
import { createLogger, type Logger } from '../shared/util';
import type { TrackRecord } from '../shared/tracks';

export const FALLBACK_BATCH_SIZE = 100;

export interface PlaylistSource {
  /** Primary path: the playlist as a stream of paginated response chunks. */
  paginatePlaylist(): AsyncIterable<unknown>;
  /** Fallback path: one non-paginated "info" response covering `limit` items from `offset`. */
  getPlaylistInfo(limit: number, offset: number): Promise<unknown>;
}

const defaultLog = createLogger('PlaylistCollector', 'warn');

async function collectFromPages(source: PlaylistSource, tracks: TrackRecord[]) {
  for await (const chunk of source.paginatePlaylist()) {
    tracks.push(...extractItems(chunk));
  }
}

async function collectFromOffsets(source: PlaylistSource, log: Logger) {
  const tracks: TrackRecord[] = [];
  for (let offset = 0; ; offset += FALLBACK_BATCH_SIZE) {
    let info: unknown;
    try {
      info = await source.getPlaylistInfo(FALLBACK_BATCH_SIZE, offset);
    } catch (err) {
      // a failed batch is the end of what we can see
      log('Playlist info request failed at offset', offset, err instanceof Error ? err.message : err);
      break;
    }
    const items = getPlaylistItems(info);
    if (!items.length) break;
    tracks.push(...extractItems(info));
    if (items.length < FALLBACK_BATCH_SIZE) break;
  }
  return tracks;
}

/**
 * Every track of a playlist, in playlist order.
 *
 * The paginated stream is authoritative whenever it produces anything; the offset scan
 * only runs if pagination threw or came back empty. Upstream failures never escape:
 * an empty array means the playlist is empty or could not be read.
 */
export default async function collectPlaylistTracks(
  source: PlaylistSource,
  log: Logger = defaultLog,
): Promise<TrackRecord[]> {
  const paged: TrackRecord[] = [];
  try {
    await collectFromPages(source, paged);
    if (paged.length) return paged;
  } catch (err) {
    log('Paginated playlist fetch failed after', paged.length, 'tracks:', err instanceof Error ? err.message : err);
  }

  const scanned = await collectFromOffsets(source, log);
  // a stream that broke part-way still beats nothing
  return scanned.length ? scanned : paged;
}
