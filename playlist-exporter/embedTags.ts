import { extname } from 'path';
import { id3TagWriter } from './tagWriters/id3TagWriter';
import { mp4TagWriter, oggOpusTagWriter, oggVorbisTagWriter } from './tagWriters/taglibTagWriters';
import type { TagFields, TagWriter } from './tagWriters/tagWriter';
import type { TrackRecord } from '../shared/tracks';

export type TagFamily =
  { kind: 'id3' } |
  { kind: 'mp4' } |
  { kind: 'ogg-vorbis' } |
  { kind: 'ogg-opus' } |
  { kind: 'unsupported', extension: string };

type SupportedKind = Exclude<TagFamily['kind'], 'unsupported'>;

const EXTENSION_FAMILIES: Record<string, SupportedKind> = {
  '.mp3': 'id3',
  '.m4a': 'mp4',
  '.mp4': 'mp4',
  '.aac': 'mp4',
  '.ogg': 'ogg-vorbis',
  '.opus': 'ogg-opus',
};

const TAG_WRITERS: Record<SupportedKind, TagWriter> = {
  'id3': id3TagWriter,
  'mp4': mp4TagWriter,
  'ogg-vorbis': oggVorbisTagWriter,
  'ogg-opus': oggOpusTagWriter,
};

export function resolveTagFamily(filePath: string): TagFamily {
  const extension = extname(filePath).toLowerCase();
  const kind = EXTENSION_FAMILIES[extension];
  return kind ? { kind } : { kind: 'unsupported', extension };
}

export const toTagFields = (track: TrackRecord): TagFields => ({
  title: track.name || '',
  artist: track.artists || '',
  album: track.album || '',
});

/**
 * Stamp title/artist/album (and the cover, where the container takes one) into an audio
 * file in place. Unknown extensions, wav included, are skipped without touching the file.
 * Returns the family that was used; throws if the tagging library fails.
 */
export default function embedTags(filePath: string, track: TrackRecord, cover: Buffer | null = null): TagFamily {
  const family = resolveTagFamily(filePath);
  if (family.kind === 'unsupported') return family;
  const writer = TAG_WRITERS[family.kind];
  writer.write(filePath, toTagFields(track), writer.supportsCover ? cover : null);
  return family;
}
