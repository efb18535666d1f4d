/**
 * EXIF tag reading (exifr)
 * Returns date tags under canonical names: DateTimeOriginal, DateTimeDigitized, DateTime.
 */

import exifr from 'exifr';
import { TagBag, TagValue } from '../types';
import { ParseError } from './errors';

/** Containers exifr can decode */
export const EXIFR_EXTENSIONS = new Set(['.jpg', '.jpeg', '.tiff', '.tif', '.png', '.heic', '.heif']);

// exifr name -> canonical name
const TAG_NAMES: Record<string, string> = {
  DateTimeOriginal: 'DateTimeOriginal',
  CreateDate: 'DateTimeDigitized',
  ModifyDate: 'DateTime',
};

function isTagValue(value: unknown): value is TagValue {
  return typeof value === 'string' || typeof value === 'number' || value instanceof Date;
}

/**
 * Read raw date tags from an image. Values stay as written in the file
 * ('YYYY:MM:DD HH:MM:SS'). Throws ParseError when the file cannot be decoded.
 */
export async function readExifDateTags(imagePath: string): Promise<TagBag> {
  let output: unknown;
  try {
    output = await exifr.parse(imagePath, {
      pick: Object.keys(TAG_NAMES),
      reviveValues: false,
    });
  } catch (err) {
    throw new ParseError(`EXIF read failed: ${err instanceof Error ? err.message : String(err)}`, { imagePath });
  }
  if (!output || typeof output !== 'object') return {};

  const tags: Record<string, TagValue> = {};
  for (const [key, value] of Object.entries(output)) {
    const name = TAG_NAMES[key];
    if (name && isTagValue(value)) tags[name] = value;
  }
  return tags;
}
