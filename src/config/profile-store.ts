/**
 * Profile Store
 *
 * Named configuration profiles under <home>/configs as `<name>.yaml`, plus the
 * `current` pointer file.
 */

import * as fs from 'fs';
import * as path from 'path';
import { HomeContext } from '../core/home-context';
import { PointerFile } from '../core/pointer-file';
import { writeFileAtomic, pathExists } from '../core/atomic-file';
import { IOError, NotFoundError, ValidationError, isErrnoException } from '../errors';

const PROFILE_NAME = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;
const PROFILE_EXT = '.yaml';
const RESERVED_NAMES = new Set(['current']);

export interface Profile {
  name: string;
  path: string;
  /** Unix timestamp (ms); birth time where the filesystem records it */
  createdAt: number;
}

export function isValidProfileName(name: string): boolean {
  return PROFILE_NAME.test(name) && !RESERVED_NAMES.has(name) && !name.endsWith(PROFILE_EXT);
}

export function assertValidProfileName(name: string): void {
  if (!isValidProfileName(name)) {
    throw new ValidationError(`Invalid profile name: "${name}"`, { key: 'name' });
  }
}

export class ProfileStore {
  readonly currentPointer: PointerFile;

  constructor(private readonly home: HomeContext) {
    this.currentPointer = new PointerFile(home.currentProfilePointer, (key) => this.exists(key));
  }

  pathOf(name: string): string {
    assertValidProfileName(name);
    return this.home.profilePath(name);
  }

  async exists(name: string): Promise<boolean> {
    if (!isValidProfileName(name)) return false;
    return pathExists(this.home.profilePath(name));
  }

  async get(name: string): Promise<Profile | null> {
    if (!isValidProfileName(name)) return null;
    const filePath = this.home.profilePath(name);
    try {
      const stat = await fs.promises.stat(filePath);
      if (!stat.isFile()) return null;
      return { name, path: filePath, createdAt: createdAtOf(stat) };
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') return null;
      throw new IOError(`Cannot stat profile ${name}`, { cause: error, path: filePath });
    }
  }

  /**
   * Profiles ordered by name.
   */
  async list(): Promise<Profile[]> {
    let names: string[];
    try {
      names = await fs.promises.readdir(this.home.configsDir);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') return [];
      throw new IOError(`Cannot list ${this.home.configsDir}`, {
        cause: error,
        path: this.home.configsDir,
      });
    }

    const profiles: Profile[] = [];
    for (const file of names) {
      if (file.startsWith('.') || !file.endsWith(PROFILE_EXT)) continue;
      const profile = await this.get(file.slice(0, -PROFILE_EXT.length));
      if (profile) profiles.push(profile);
    }
    return profiles.sort((a, b) => a.name.localeCompare(b.name));
  }

  async read(name: string): Promise<string> {
    const filePath = this.pathOf(name);
    try {
      return await fs.promises.readFile(filePath, 'utf8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        throw new NotFoundError(`Profile ${name} does not exist`);
      }
      throw new IOError(`Cannot read profile ${name}`, { cause: error, path: filePath });
    }
  }

  async write(name: string, content: string): Promise<string> {
    const filePath = this.pathOf(name);
    await writeFileAtomic(filePath, content, { mode: 0o600 });
    return filePath;
  }

  async remove(name: string): Promise<void> {
    const filePath = this.pathOf(name);
    try {
      await fs.promises.unlink(filePath);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        throw new NotFoundError(`Profile ${name} does not exist`);
      }
      throw new IOError(`Cannot delete profile ${name}`, { cause: error, path: filePath });
    }
  }
}

function createdAtOf(stat: fs.Stats): number {
  return stat.birthtimeMs > 0 ? stat.birthtimeMs : stat.mtimeMs;
}

/** Profile name for a path inside the configs directory, or null */
export function profileNameOf(home: HomeContext, filePath: string): string | null {
  const resolved = path.resolve(filePath);
  if (path.dirname(resolved) !== home.configsDir || !resolved.endsWith(PROFILE_EXT)) {
    return null;
  }
  return path.basename(resolved, PROFILE_EXT);
}
