import NodeID3 from 'node-id3';
import type { TagWriter } from './tagWriter';

// APIC picture type
const FRONT_COVER = 3;

/**
 * node-id3 creates the tag when the file has none and replaces frames on update,
 * so there is only ever one TIT2/TPE1/TALB and at most one APIC afterwards.
 * Written as ID3v2.3.
 */
export const id3TagWriter: TagWriter = {
  supportsCover: true,

  write(filePath, fields, cover) {
    const result = NodeID3.update({
      title: fields.title,
      artist: fields.artist,
      album: fields.album,
      ...(cover ? {
        image: {
          mime: 'image/jpeg',
          type: { id: FRONT_COVER, name: 'front cover' },
          description: 'Cover',
          imageBuffer: cover,
        },
      } : {}),
    }, filePath);
    if (result !== true) throw result;
  },
};
