/**
 * Media Scanner
 * Lists supported media files below a folder, sorted for stable batch order.
 */

import fs from 'fs/promises';
import path from 'path';
import { ValidationError } from '../../utils/errors';
import { isSupportedMedia } from './mediaFormats';

/**
 * Throws ValidationError when the path is missing or not a directory.
 */
export async function assertDirectory(folder: string): Promise<string> {
  const resolved = path.resolve(folder);
  let isDirectory = false;
  try {
    isDirectory = (await fs.stat(resolved)).isDirectory();
  } catch (error) {
    throw new ValidationError(`Folder does not exist: ${folder}`, { error: String(error) });
  }
  if (!isDirectory) {
    throw new ValidationError(`Not a directory: ${folder}`);
  }
  return resolved;
}

/**
 * Every regular file below the folder, depth-first, as absolute paths.
 */
export async function listFiles(folder: string): Promise<string[]> {
  const root = await assertDirectory(folder);
  const entries = await fs.readdir(root, { recursive: true, withFileTypes: false });
  const files: string[] = [];
  for (const entry of entries) {
    const absolute = path.join(root, entry);
    const stats = await fs.lstat(absolute);
    if (stats.isFile()) files.push(absolute);
  }
  return files.sort();
}

export async function scanMediaFiles(folder: string): Promise<string[]> {
  const files = await listFiles(folder);
  return files.filter(isSupportedMedia);
}
