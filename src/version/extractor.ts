/**
 * Artifact Extractor
 * Release assets are a single gzip-compressed executable (.gz) or, on Windows,
 * a zip archive holding it. Both are unpacked with Node's zlib.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as zlib from 'zlib';
import { pipeline } from 'stream/promises';
import { ArchiveExtension } from './platform';
import { createLogger } from '../utils/logger';

const log = createLogger('extract');

/**
 * Decompress a .gz asset into destPath.
 */
export async function extractGzip(archivePath: string, destPath: string): Promise<void> {
  await pipeline(
    fs.createReadStream(archivePath),
    zlib.createGunzip(),
    fs.createWriteStream(destPath)
  );
  log.debug(`Extracted: ${archivePath} -> ${destPath}`);
}

/**
 * Extract the first executable-looking entry (mihomo*.exe) of a zip archive into destPath.
 */
export async function extractZip(archivePath: string, destPath: string): Promise<void> {
  const buffer = await fs.promises.readFile(archivePath);

  // Find End of Central Directory record (EOCD)
  let eocdOffset = buffer.length - 22;
  while (eocdOffset >= 0) {
    if (buffer.readUInt32LE(eocdOffset) === 0x06054b50) break;
    eocdOffset--;
  }
  if (eocdOffset < 0) {
    throw new Error('Invalid ZIP file: EOCD not found');
  }

  let offset = buffer.readUInt32LE(eocdOffset + 16);

  while (offset < eocdOffset) {
    if (buffer.readUInt32LE(offset) !== 0x02014b50) break;

    const compressionMethod = buffer.readUInt16LE(offset + 10);
    const compressedSize = buffer.readUInt32LE(offset + 20);
    const uncompressedSize = buffer.readUInt32LE(offset + 24);
    const fileNameLength = buffer.readUInt16LE(offset + 28);
    const extraFieldLength = buffer.readUInt16LE(offset + 30);
    const commentLength = buffer.readUInt16LE(offset + 32);
    const localHeaderOffset = buffer.readUInt32LE(offset + 42);
    const fileName = buffer.toString('utf8', offset + 46, offset + 46 + fileNameLength);
    const baseName = path.basename(fileName).toLowerCase();

    if (baseName.startsWith('mihomo') && baseName.endsWith('.exe')) {
      if (buffer.readUInt32LE(localHeaderOffset) !== 0x04034b50) {
        throw new Error('Invalid local file header');
      }
      const localFileNameLength = buffer.readUInt16LE(localHeaderOffset + 26);
      const localExtraLength = buffer.readUInt16LE(localHeaderOffset + 28);
      const dataOffset = localHeaderOffset + 30 + localFileNameLength + localExtraLength;
      const compressed = buffer.subarray(dataOffset, dataOffset + compressedSize);

      let fileData: Buffer;
      if (compressionMethod === 0) {
        fileData = compressed;
      } else if (compressionMethod === 8) {
        fileData = zlib.inflateRawSync(compressed);
      } else {
        throw new Error(`Unsupported compression method: ${compressionMethod}`);
      }

      if (fileData.length !== uncompressedSize) {
        throw new Error('Decompression size mismatch');
      }

      await fs.promises.writeFile(destPath, fileData);
      log.debug(`Extracted: ${fileName} -> ${destPath}`);
      return;
    }

    offset += 46 + fileNameLength + extraFieldLength + commentLength;
  }

  throw new Error('Executable not found in archive');
}

/**
 * Extract an asset based on its extension
 */
export async function extractArtifact(
  archivePath: string,
  destPath: string,
  extension: ArchiveExtension
): Promise<void> {
  if (extension === 'gz') {
    await extractGzip(archivePath, destPath);
  } else {
    await extractZip(archivePath, destPath);
  }
}
