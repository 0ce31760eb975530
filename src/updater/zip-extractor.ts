/**
 * Zip Archive Extractor
 * Reads the central directory with Node.js built-in modules and unpacks every
 * entry, in archive order, beneath a target directory.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as zlib from 'zlib';
import { ExtractionError, toError } from '../errors';
import { debugLog } from '../utils/debug-log';
import type { ExtractionSummary, ProgressCallback } from './types';

const EOCD_SIGNATURE = 0x06054b50;
const CENTRAL_HEADER_SIGNATURE = 0x02014b50;
const LOCAL_HEADER_SIGNATURE = 0x04034b50;
const EOCD_MIN_SIZE = 22;
const MAX_COMMENT_LENGTH = 0xffff;
const ZIP64_MARKER = 0xffffffff;

export interface ZipEntry {
  name: string;
  isDirectory: boolean;
  compressionMethod: number;
  compressedSize: number;
  uncompressedSize: number;
  localHeaderOffset: number;
  encrypted: boolean;
}

export interface ExtractOptions {
  onStart?: (entryCount: number) => void;
  onProgress?: ProgressCallback;
  verbose?: boolean;
}

/**
 * Map an archive entry name to a path under destDir.
 * Returns null for absolute paths, drive-qualified paths and anything that
 * resolves outside destDir (zip-slip).
 */
export function resolveEntryPath(destDir: string, entryName: string): string | null {
  const normalized = entryName.replace(/\\/g, '/');
  if (normalized.includes('\0')) return null;
  if (normalized.startsWith('/') || /^[a-zA-Z]:/.test(normalized)) return null;

  const root = path.resolve(destDir);
  const target = path.resolve(root, normalized);
  const relative = path.relative(root, target);

  if (relative === '') return root;
  if (relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
    return null;
  }
  return target;
}

function findEndOfCentralDirectory(buffer: Buffer): number {
  const lowest = Math.max(0, buffer.length - EOCD_MIN_SIZE - MAX_COMMENT_LENGTH);
  for (let offset = buffer.length - EOCD_MIN_SIZE; offset >= lowest; offset--) {
    if (buffer.readUInt32LE(offset) === EOCD_SIGNATURE) return offset;
  }
  return -1;
}

/**
 * List entries in central directory order
 */
export function readZipEntries(buffer: Buffer): ZipEntry[] {
  if (buffer.length < EOCD_MIN_SIZE) {
    throw new Error('Invalid ZIP file: too short');
  }

  const eocdOffset = findEndOfCentralDirectory(buffer);
  if (eocdOffset < 0) {
    throw new Error('Invalid ZIP file: EOCD not found');
  }

  const entryCount = buffer.readUInt16LE(eocdOffset + 10);
  const centralDirOffset = buffer.readUInt32LE(eocdOffset + 16);
  if (centralDirOffset === ZIP64_MARKER) {
    throw new Error('ZIP64 archives are not supported');
  }

  const entries: ZipEntry[] = [];
  let offset = centralDirOffset;

  for (let i = 0; i < entryCount; i++) {
    if (offset + 46 > eocdOffset || buffer.readUInt32LE(offset) !== CENTRAL_HEADER_SIGNATURE) {
      throw new Error(`Invalid central directory header at entry ${i}`);
    }

    const flags = buffer.readUInt16LE(offset + 8);
    const compressionMethod = buffer.readUInt16LE(offset + 10);
    const compressedSize = buffer.readUInt32LE(offset + 20);
    const uncompressedSize = buffer.readUInt32LE(offset + 24);
    const fileNameLength = buffer.readUInt16LE(offset + 28);
    const extraFieldLength = buffer.readUInt16LE(offset + 30);
    const commentLength = buffer.readUInt16LE(offset + 32);
    const localHeaderOffset = buffer.readUInt32LE(offset + 42);

    if (
      compressedSize === ZIP64_MARKER ||
      uncompressedSize === ZIP64_MARKER ||
      localHeaderOffset === ZIP64_MARKER
    ) {
      throw new Error('ZIP64 archives are not supported');
    }

    const name = buffer.toString('utf8', offset + 46, offset + 46 + fileNameLength);
    entries.push({
      name,
      isDirectory: name.endsWith('/') || name.endsWith('\\'),
      compressionMethod,
      compressedSize,
      uncompressedSize,
      localHeaderOffset,
      encrypted: (flags & 0x1) !== 0,
    });

    offset += 46 + fileNameLength + extraFieldLength + commentLength;
  }

  return entries;
}

/**
 * Decompress one entry's content
 */
export function readEntryData(buffer: Buffer, entry: ZipEntry): Buffer {
  if (entry.encrypted) {
    throw new Error(`Encrypted entry not supported: ${entry.name}`);
  }

  const localOffset = entry.localHeaderOffset;
  if (
    localOffset + 30 > buffer.length ||
    buffer.readUInt32LE(localOffset) !== LOCAL_HEADER_SIGNATURE
  ) {
    throw new Error(`Invalid local file header: ${entry.name}`);
  }

  const localFileNameLength = buffer.readUInt16LE(localOffset + 26);
  const localExtraLength = buffer.readUInt16LE(localOffset + 28);
  const dataOffset = localOffset + 30 + localFileNameLength + localExtraLength;
  if (dataOffset + entry.compressedSize > buffer.length) {
    throw new Error(`Truncated entry data: ${entry.name}`);
  }

  const compressed = buffer.subarray(dataOffset, dataOffset + entry.compressedSize);
  let fileData: Buffer;
  if (entry.compressionMethod === 0) {
    fileData = compressed;
  } else if (entry.compressionMethod === 8) {
    fileData = zlib.inflateRawSync(compressed);
  } else {
    throw new Error(`Unsupported compression method ${entry.compressionMethod}: ${entry.name}`);
  }

  if (fileData.length !== entry.uncompressedSize) {
    throw new Error(`Decompression size mismatch: ${entry.name}`);
  }
  return fileData;
}

/**
 * Extract every entry of a zip archive beneath destDir, overwriting existing
 * files. Entries that would escape destDir are skipped and reported.
 * @throws ExtractionError on a corrupt archive or a failed write
 */
export async function extractZip(
  archivePath: string,
  destDir: string,
  options: ExtractOptions = {}
): Promise<ExtractionSummary> {
  const summary: ExtractionSummary = { files: 0, directories: 0, skipped: [] };
  const verbose = options.verbose ?? false;

  try {
    const buffer = await fs.promises.readFile(archivePath);
    const entries = readZipEntries(buffer);
    options.onStart?.(entries.length);

    for (const [index, entry] of entries.entries()) {
      const target = resolveEntryPath(destDir, entry.name);

      if (target === null) {
        summary.skipped.push(entry.name);
        debugLog(`Skipped unsafe entry: ${entry.name}`, verbose);
      } else if (entry.isDirectory) {
        await fs.promises.mkdir(target, { recursive: true });
        summary.directories++;
      } else {
        await fs.promises.mkdir(path.dirname(target), { recursive: true });
        await fs.promises.writeFile(target, readEntryData(buffer, entry));
        summary.files++;
        debugLog(`Extracted: ${entry.name} -> ${target}`, verbose);
      }

      options.onProgress?.(index + 1, entries.length);
    }
  } catch (error) {
    const err = toError(error);
    throw new ExtractionError(
      `Failed to extract ${path.basename(archivePath)}: ${err.message}`,
      archivePath,
      { cause: err }
    );
  }

  return summary;
}
