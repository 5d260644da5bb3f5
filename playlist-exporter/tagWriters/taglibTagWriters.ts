import { ByteVector, File, Picture, PictureType, TagTypes, type Tag } from 'node-taglib-sharp';
import type { TagFields, TagWriter } from './tagWriter';

function withFile(filePath: string, mimeType: string, edit: (file: File) => void) {
  const file = File.createFromPath(filePath, mimeType);
  try {
    edit(file);
    file.save();
  } finally {
    file.dispose();
  }
}

function setTextFields(tag: Tag, fields: TagFields) {
  tag.title = fields.title;
  tag.performers = [fields.artist];
  tag.album = fields.album;
}

/** ©nam / ©ART / ©alb atoms, plus a single JPEG covr atom when there is a cover. */
export const mp4TagWriter: TagWriter = {
  supportsCover: true,

  write(filePath, fields, cover) {
    withFile(filePath, 'taglib/m4a', (file) => {
      const tag = file.getTag(TagTypes.Apple, true);
      setTextFields(tag, fields);
      if (cover) {
        tag.pictures = [
          Picture.fromFullData(ByteVector.fromByteArray(cover), PictureType.FrontCover, 'image/jpeg', 'Cover'),
        ];
      }
    });
  },
};

// Vorbis comments only; cover art is left alone for both Ogg codecs
const createXiphTagWriter = (mimeType: string): TagWriter => ({
  supportsCover: false,

  write(filePath, fields) {
    withFile(filePath, mimeType, (file) => {
      setTextFields(file.getTag(TagTypes.Xiph, true), fields);
    });
  },
});

export const oggVorbisTagWriter = createXiphTagWriter('taglib/ogg');
export const oggOpusTagWriter = createXiphTagWriter('taglib/opus');
