/**
 * EXIF codec
 * Reads with exifr, writes JPEG EXIF with piexifjs. Video containers are not decoded.
 */

import * as piexif from 'piexifjs';
import { TagBag, TargetField } from '../../types';
import { formatExifDateTime } from '../../utils/dates';
import { MetadataWriteError, UnsupportedFormatError } from '../../utils/errors';
import { EXIFR_EXTENSIONS, readExifDateTags } from '../../utils/exif';
import { extensionOf } from '../analysis/mediaFormats';
import { DateTagChanges, MetadataCodec } from './metadataCodec';

const JPEG_EXTENSIONS = new Set(['.jpg', '.jpeg']);

export class ExifCodec implements MetadataCodec {
  async readTags(filePath: string): Promise<TagBag> {
    if (!EXIFR_EXTENSIONS.has(extensionOf(filePath))) return {};
    return readExifDateTags(filePath);
  }

  canWrite(filePath: string): boolean {
    return JPEG_EXTENSIONS.has(extensionOf(filePath));
  }

  encodeDateTags(data: Buffer, filePath: string, changes: DateTagChanges): Buffer {
    if (!this.canWrite(filePath)) {
      throw new UnsupportedFormatError(extensionOf(filePath));
    }

    try {
      const jpeg = data.toString('binary');
      const exifObj = piexif.load(jpeg);
      const zeroth = { ...exifObj['0th'] };
      const exif = { ...exifObj.Exif };

      const original = changes[TargetField.DateTimeOriginal];
      if (original) exif[piexif.ExifIFD.DateTimeOriginal] = formatExifDateTime(original);
      const digitized = changes[TargetField.DateTimeDigitized];
      if (digitized) exif[piexif.ExifIFD.DateTimeDigitized] = formatExifDateTime(digitized);
      const created = changes[TargetField.DateCreated];
      if (created) zeroth[piexif.ImageIFD.DateTime] = formatExifDateTime(created);

      const exifBytes = piexif.dump({ ...exifObj, '0th': zeroth, Exif: exif });
      return Buffer.from(piexif.insert(exifBytes, jpeg), 'binary');
    } catch (error) {
      throw new MetadataWriteError(
        `Could not encode EXIF: ${error instanceof Error ? error.message : String(error)}`,
        { filePath }
      );
    }
  }
}

export const exifCodec = new ExifCodec();
