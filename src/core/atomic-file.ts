/**
 * Atomic file writes: write a sibling temp file, fsync, rename into place.
 * Readers see either the old content or the new, never a partial file.
 */

import * as fs from 'fs';
import * as path from 'path';
import { randomBytes } from 'crypto';
import { errorMessage, isErrnoException } from '../errors';
import { createLogger } from '../utils/logger';

const log = createLogger('fs');

function fsyncDir(dirPath: string): Promise<void> {
  return fs.promises
    .open(dirPath, 'r')
    .then(async (handle) => {
      try {
        await handle.sync();
      } finally {
        await handle.close();
      }
    })
    .catch((error: unknown) => {
      // Not supported everywhere (Windows); the rename still stands
      log.debug(`Directory fsync skipped for ${dirPath}: ${errorMessage(error)}`);
    });
}

export interface AtomicWriteOptions {
  mode?: number;
}

/**
 * Write content to filePath via temp file + rename on the same filesystem.
 */
export async function writeFileAtomic(
  filePath: string,
  content: string,
  options: AtomicWriteOptions = {}
): Promise<void> {
  const dir = path.dirname(filePath);
  await fs.promises.mkdir(dir, { recursive: true });

  // Refuse to write through a symlink
  try {
    const stat = await fs.promises.lstat(filePath);
    if (stat.isSymbolicLink()) {
      throw new Error(`Refusing to write: ${filePath} is a symlink`);
    }
  } catch (error) {
    if (!(isErrnoException(error) && error.code === 'ENOENT')) throw error;
  }

  const tmpPath = path.join(
    dir,
    `.${path.basename(filePath)}.${process.pid}.${randomBytes(4).toString('hex')}.tmp`
  );
  const handle = await fs.promises.open(tmpPath, 'wx', options.mode ?? 0o644);
  try {
    await handle.writeFile(content, 'utf8');
    await handle.sync();
  } finally {
    await handle.close();
  }

  try {
    await fs.promises.rename(tmpPath, filePath);
  } catch (error) {
    await fs.promises.rm(tmpPath, { force: true });
    throw error;
  }
  await fsyncDir(dir);
}

/**
 * Read a UTF-8 file, returning null when it does not exist.
 */
export async function readFileIfExists(filePath: string): Promise<string | null> {
  try {
    return await fs.promises.readFile(filePath, 'utf8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') return null;
    throw error;
  }
}

export async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.promises.access(target);
    return true;
  } catch {
    return false;
  }
}
