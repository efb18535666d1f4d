/**
 * Metadata Codec contract
 * Byte-level decode/encode of a container's tags is delegated to an implementation of this interface.
 */

import { TagBag, TargetField } from '../../types';

export type DateTagChanges = Partial<Record<TargetField, Date>>;

export interface MetadataCodec {
  /** Decoded tag bag for a file. Throws when the file cannot be read or decoded. */
  readTags(filePath: string): Promise<TagBag>;

  /** Whether encodeDateTags supports this file's container */
  canWrite(filePath: string): boolean;

  /**
   * New file bytes with the given date fields set. Pure: never touches disk.
   * Throws UnsupportedFormatError when the format cannot carry the tags.
   */
  encodeDateTags(data: Buffer, filePath: string, changes: DateTagChanges): Buffer;
}
