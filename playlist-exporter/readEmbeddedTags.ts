import { parseFile } from 'music-metadata';

export interface EmbeddedTags {
  title: string | null;
  artist: string | null;
  album: string | null;
  pictureCount: number;
}

export default async function readEmbeddedTags(filePath: string): Promise<EmbeddedTags> {
  const { common } = await parseFile(filePath, { duration: false, skipCovers: false });
  return {
    title: common.title ?? null,
    artist: common.artist ?? null,
    album: common.album ?? null,
    pictureCount: common.picture?.length ?? 0,
  };
}
