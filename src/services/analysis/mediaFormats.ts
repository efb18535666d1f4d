/**
 * Media capability table
 * Kind and metadata-write support, keyed by lower-case extension.
 */

import path from 'path';
import { MediaKind } from '../../types';

export interface MediaFormat {
  kind: MediaKind;
  writable: boolean;
}

const IMAGE_EXTENSIONS = ['.jpg', '.jpeg', '.tiff', '.tif', '.png', '.bmp', '.gif', '.webp', '.heic', '.heif'];
const VIDEO_EXTENSIONS = ['.mp4', '.mov', '.avi', '.mkv', '.wmv', '.flv', '.webm', '.m4v', '.3gp', '.mts', '.m2ts'];
const WRITABLE_EXTENSIONS = new Set(['.jpg', '.jpeg', '.tiff', '.tif']);

const UNSUPPORTED: MediaFormat = { kind: MediaKind.Unsupported, writable: false };

export const MEDIA_FORMATS: ReadonlyMap<string, MediaFormat> = new Map<string, MediaFormat>([
  ...IMAGE_EXTENSIONS.map((ext): [string, MediaFormat] => [
    ext,
    { kind: MediaKind.Image, writable: WRITABLE_EXTENSIONS.has(ext) },
  ]),
  ...VIDEO_EXTENSIONS.map((ext): [string, MediaFormat] => [ext, { kind: MediaKind.Video, writable: false }]),
]);

export function extensionOf(filePath: string): string {
  return path.extname(filePath).toLowerCase();
}

export function mediaFormatOf(filePath: string): MediaFormat {
  return MEDIA_FORMATS.get(extensionOf(filePath)) ?? UNSUPPORTED;
}

export function mediaKindOf(filePath: string): MediaKind {
  return mediaFormatOf(filePath).kind;
}

export function isSupportedMedia(filePath: string): boolean {
  return MEDIA_FORMATS.has(extensionOf(filePath));
}

export function isWritableMedia(filePath: string): boolean {
  return mediaFormatOf(filePath).writable;
}
