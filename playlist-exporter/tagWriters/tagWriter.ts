export interface TagFields {
  title: string;
  artist: string;
  album: string;
}

/** One container family's way of stamping text fields (and maybe a cover) into a file in place. */
export interface TagWriter {
  readonly supportsCover: boolean;
  write(filePath: string, fields: TagFields, cover: Buffer | null): void;
}
