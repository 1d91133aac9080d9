import { ArchiveError } from "../errors";

const END_OF_DIRECTORY_SIGNATURE = 0x06054b50;
const DIRECTORY_ENTRY_SIGNATURE = 0x02014b50;
const END_OF_DIRECTORY_SIZE = 22;
const DIRECTORY_ENTRY_SIZE = 46;
const ZIP64_MARKER = 0xffffffff;

export const METHOD_STORE = 0;
export const METHOD_DEFLATE = 8;

export interface DirectoryEntry {
  name: string;
  /** Zip compression method: 0 stored, 8 deflated. */
  method: number;
  compressedSize: number;
  uncompressedSize: number;
}

function findEndOfDirectory(buffer: Buffer): number {
  // The record sits at the end, followed by a comment of at most 64 KiB.
  const lowest = Math.max(0, buffer.length - END_OF_DIRECTORY_SIZE - 0xffff);
  for (let offset = buffer.length - END_OF_DIRECTORY_SIZE; offset >= lowest; offset--) {
    if (buffer.readUInt32LE(offset) === END_OF_DIRECTORY_SIGNATURE) return offset;
  }
  return -1;
}

/**
 * Central directory records of a zip container, in stored order.
 * Returns an empty list for Zip64 containers, whose sizes live elsewhere.
 */
export function readCentralDirectory(buffer: Buffer): DirectoryEntry[] {
  const end = findEndOfDirectory(buffer);
  if (end < 0) throw new ArchiveError("Zip end of central directory record not found");
  const count = buffer.readUInt16LE(end + 10);
  let offset = buffer.readUInt32LE(end + 16);
  if (offset === ZIP64_MARKER) return [];

  const entries: DirectoryEntry[] = [];
  for (let i = 0; i < count; i++) {
    if (
      offset + DIRECTORY_ENTRY_SIZE > buffer.length ||
      buffer.readUInt32LE(offset) !== DIRECTORY_ENTRY_SIGNATURE
    ) {
      throw new ArchiveError(`Zip central directory entry ${i} is corrupt`);
    }
    const nameLength = buffer.readUInt16LE(offset + 28);
    const extraLength = buffer.readUInt16LE(offset + 30);
    const commentLength = buffer.readUInt16LE(offset + 32);
    const nameStart = offset + DIRECTORY_ENTRY_SIZE;
    entries.push({
      name: buffer.toString("utf-8", nameStart, nameStart + nameLength),
      method: buffer.readUInt16LE(offset + 10),
      compressedSize: buffer.readUInt32LE(offset + 20),
      uncompressedSize: buffer.readUInt32LE(offset + 24),
    });
    offset = nameStart + nameLength + extraLength + commentLength;
  }
  return entries;
}
