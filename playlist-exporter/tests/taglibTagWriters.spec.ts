import { beforeEach, describe, expect, it, vi } from 'vitest';
import embedTags from '../embedTags';
import { makeTrack } from './fixtures';

const { FakeFile, openedFiles } = vi.hoisted(() => {
  class FakeTag {
    title = '';
    performers: string[] = [];
    album = '';
    pictures: unknown[] = [];
  }

  class FakeFile {
    tags = new Map<number, FakeTag>();
    saved = false;
    disposed = false;

    constructor(readonly path: string, readonly mimeType: string) {}

    getTag(type: number, create: boolean) {
      let tag = this.tags.get(type);
      if (!tag && create) {
        tag = new FakeTag();
        this.tags.set(type, tag);
      }
      return tag;
    }

    save() {
      this.saved = true;
    }

    dispose() {
      this.disposed = true;
    }
  }

  return { FakeFile, openedFiles: new Array<FakeFile>() };
});

vi.mock('node-taglib-sharp', () => ({
  File: {
    createFromPath: (path: string, mimeType: string) => {
      const file = new FakeFile(path, mimeType);
      openedFiles.push(file);
      return file;
    },
  },
  TagTypes: { Xiph: 1, Apple: 2 },
  PictureType: { FrontCover: 3 },
  ByteVector: { fromByteArray: (bytes: Uint8Array) => ({ bytes }) },
  Picture: {
    fromFullData: (data: unknown, type: number, mimeType: string, description: string) =>
      ({ data, type, mimeType, description }),
  },
}));

const XIPH = 1;
const APPLE = 2;

describe('taglib tag writers', () => {
  beforeEach(() => {
    openedFiles.length = 0;
  });

  it('writes MP4 atoms and a single front cover', () => {
    const cover = Buffer.from([0xff, 0xd8, 0xff]);

    const family = embedTags('/music/001_Song.m4a', makeTrack({ name: 'Song', artists: 'A, B', album: 'Album' }), cover);

    expect(family).toEqual({ kind: 'mp4' });
    expect(openedFiles).toHaveLength(1);
    const [file] = openedFiles;
    expect(file.mimeType).toBe('taglib/m4a');
    expect(file.tags.get(APPLE)).toEqual({
      title: 'Song',
      performers: ['A, B'],
      album: 'Album',
      pictures: [{ data: { bytes: cover }, type: 3, mimeType: 'image/jpeg', description: 'Cover' }],
    });
    expect(file.saved).toBe(true);
    expect(file.disposed).toBe(true);
  });

  it('routes .aac files through the MP4 writer', () => {
    embedTags('/music/001_Song.aac', makeTrack());

    expect(openedFiles[0].mimeType).toBe('taglib/m4a');
    expect(openedFiles[0].tags.get(APPLE)?.pictures).toEqual([]);
  });

  it('writes Vorbis comments without a cover for ogg and opus', () => {
    const cover = Buffer.from([1]);

    expect(embedTags('/music/001_Song.ogg', makeTrack({ name: 'Ogg Song' }), cover)).toEqual({ kind: 'ogg-vorbis' });
    expect(embedTags('/music/002_Song.opus', makeTrack({ name: 'Opus Song' }), cover)).toEqual({ kind: 'ogg-opus' });

    expect(openedFiles.map(file => file.mimeType)).toEqual(['taglib/ogg', 'taglib/opus']);
    expect(openedFiles[0].tags.get(XIPH)).toEqual({ title: 'Ogg Song', performers: ['Artist'], album: 'Album', pictures: [] });
    expect(openedFiles[1].tags.get(XIPH)?.title).toBe('Opus Song');
    expect(openedFiles.every(file => file.saved && file.disposed)).toBe(true);
  });
});
