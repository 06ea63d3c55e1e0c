/**
 * Pointer files ("default version", "current profile").
 *
 * A pointer names one key of a store. Writes go through writeFileAtomic so
 * concurrent readers see the old or the new value. The invariant "the pointer
 * is unset or references an existing key" is checked on every read: a
 * dangling pointer reads as unset.
 */

import * as fs from 'fs';
import { writeFileAtomic, readFileIfExists } from './atomic-file';
import { IOError } from '../errors';
import { createLogger } from '../utils/logger';

const log = createLogger('pointer');

export type KeyExists = (key: string) => Promise<boolean>;

export class PointerFile {
  constructor(
    readonly filePath: string,
    private readonly keyExists: KeyExists
  ) {}

  /**
   * Raw pointer value without the existence check.
   */
  async readRaw(): Promise<string | null> {
    let content: string | null;
    try {
      content = await readFileIfExists(this.filePath);
    } catch (error) {
      throw new IOError(`Cannot read pointer file ${this.filePath}`, {
        cause: error,
        path: this.filePath,
      });
    }
    if (content === null) return null;
    const value = content.trim();
    return value.length > 0 ? value : null;
  }

  /**
   * Pointer value, or null when unset or dangling.
   */
  async read(): Promise<string | null> {
    const value = await this.readRaw();
    if (value === null) return null;
    if (!(await this.keyExists(value))) {
      log.debug(`Ignoring dangling pointer ${this.filePath} -> ${value}`);
      return null;
    }
    return value;
  }

  async write(key: string): Promise<void> {
    await writeFileAtomic(this.filePath, `${key}\n`);
  }

  async clear(): Promise<void> {
    await fs.promises.rm(this.filePath, { force: true });
  }

  /**
   * Clear the pointer only if it still references key.
   */
  async clearIf(key: string): Promise<boolean> {
    if ((await this.readRaw()) !== key) return false;
    await this.clear();
    return true;
  }
}
