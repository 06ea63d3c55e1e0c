/**
 * Version Store
 *
 * On-disk record of installed versions under <home>/versions. A version is
 * visible only once its directory carries the .published marker; staging
 * directories are hidden (`.tmp-<id>-<rand>`) and become visible through a
 * single directory rename.
 */

import * as fs from 'fs';
import * as path from 'path';
import { randomBytes } from 'crypto';
import { HomeContext } from '../core/home-context';
import { PointerFile } from '../core/pointer-file';
import { writeFileAtomic, readFileIfExists } from '../core/atomic-file';
import { IOError, ValidationError, errorMessage, isErrnoException } from '../errors';
import { PublishedMarker, PUBLISHED_MARKER, Version } from './types';
import { createLogger } from '../utils/logger';

const log = createLogger('version-store');

const VERSION_ID = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;
const RESERVED_IDS = new Set(['default']);
const STAGING_PREFIX = '.tmp-';

/** Staging directories older than this are leftovers of an interrupted install */
const STALE_STAGING_MS = 60 * 60 * 1000;

export type PublishOutcome = 'published' | 'already-published';

/**
 * Reject ids that could escape the versions directory or shadow the pointer file.
 */
export function assertValidVersionId(version: string): void {
  if (!VERSION_ID.test(version) || RESERVED_IDS.has(version)) {
    throw new ValidationError(`Invalid version id: "${version}"`, { key: 'version' });
  }
}

function parseMarker(content: string): PublishedMarker | null {
  try {
    const marker: Partial<PublishedMarker> = JSON.parse(content);
    if (
      typeof marker.version === 'string' &&
      typeof marker.tag === 'string' &&
      typeof marker.installedAt === 'number' &&
      typeof marker.binary === 'string'
    ) {
      return {
        version: marker.version,
        tag: marker.tag,
        installedAt: marker.installedAt,
        binary: marker.binary,
      };
    }
  } catch (error) {
    log.debug(`Unreadable marker: ${errorMessage(error)}`);
  }
  return null;
}

export class VersionStore {
  readonly defaultPointer: PointerFile;

  constructor(private readonly home: HomeContext) {
    this.defaultPointer = new PointerFile(home.defaultVersionPointer, (key) =>
      this.isPublished(key)
    );
  }

  async isPublished(version: string): Promise<boolean> {
    if (!VERSION_ID.test(version) || RESERVED_IDS.has(version)) return false;
    return (await this.get(version)) !== null;
  }

  /**
   * Published version, or null when absent or not fully published.
   */
  async get(version: string): Promise<Version | null> {
    const installDir = this.home.versionDir(version);
    let content: string | null;
    try {
      content = await readFileIfExists(path.join(installDir, PUBLISHED_MARKER));
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOTDIR') return null;
      throw new IOError(`Cannot read version ${version}`, { cause: error, path: installDir });
    }
    if (content === null) return null;

    const marker = parseMarker(content);
    if (!marker || marker.version !== version) return null;

    return {
      version,
      tag: marker.tag,
      installDir,
      binaryPath: path.join(installDir, marker.binary),
      installedAt: marker.installedAt,
    };
  }

  /**
   * Snapshot of published versions ordered by install timestamp.
   */
  async list(): Promise<Version[]> {
    let entries: fs.Dirent[];
    try {
      entries = await fs.promises.readdir(this.home.versionsDir, { withFileTypes: true });
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') return [];
      throw new IOError(`Cannot list ${this.home.versionsDir}`, {
        cause: error,
        path: this.home.versionsDir,
      });
    }

    const versions: Version[] = [];
    for (const entry of entries) {
      if (!entry.isDirectory() || entry.name.startsWith('.')) continue;
      const version = await this.get(entry.name);
      if (version) versions.push(version);
    }
    return versions.sort(
      (a, b) => a.installedAt - b.installedAt || a.version.localeCompare(b.version)
    );
  }

  /**
   * Create a hidden staging directory on the same filesystem as the store.
   */
  async createStaging(version: string): Promise<string> {
    assertValidVersionId(version);
    await fs.promises.mkdir(this.home.versionsDir, { recursive: true });
    const dir = path.join(
      this.home.versionsDir,
      `${STAGING_PREFIX}${version}-${randomBytes(6).toString('hex')}`
    );
    await fs.promises.mkdir(dir);
    return dir;
  }

  async discardStaging(stagingDir: string): Promise<void> {
    await fs.promises.rm(stagingDir, { recursive: true, force: true });
  }

  /**
   * Write the marker into the staging directory and rename it into place.
   * Losing the rename to a concurrent publish of the same id is success.
   */
  async publish(stagingDir: string, marker: PublishedMarker): Promise<PublishOutcome> {
    await writeFileAtomic(
      path.join(stagingDir, PUBLISHED_MARKER),
      JSON.stringify(marker, null, 2) + '\n'
    );

    const finalDir = this.home.versionDir(marker.version);
    try {
      await this.renameDir(stagingDir, finalDir);
      return 'published';
    } catch (error) {
      if (!isErrnoException(error) || !['ENOTEMPTY', 'EEXIST', 'EPERM'].includes(error.code ?? '')) {
        throw error;
      }
      if (await this.isPublished(marker.version)) {
        log.debug(`${marker.version} published concurrently; discarding ${stagingDir}`);
        await this.discardStaging(stagingDir);
        return 'already-published';
      }

      // Unpublished directory under the final name: not a version, replace it
      log.warn(`Replacing unpublished directory ${finalDir}`);
      await fs.promises.rm(finalDir, { recursive: true, force: true });
      await this.renameDir(stagingDir, finalDir);
      return 'published';
    }
  }

  async remove(version: string): Promise<void> {
    assertValidVersionId(version);
    const dir = this.home.versionDir(version);
    // Leave the visible namespace before deleting
    const trash = path.join(
      this.home.versionsDir,
      `${STAGING_PREFIX}rm-${version}-${randomBytes(4).toString('hex')}`
    );
    await fs.promises.rename(dir, trash);
    await fs.promises.rm(trash, { recursive: true, force: true });
  }

  /**
   * Remove staging directories left behind by interrupted installs.
   * Entries that vanish mid-sweep belong to installs that just finished.
   */
  async sweepStaging(now = Date.now()): Promise<number> {
    let entries: fs.Dirent[];
    try {
      entries = await fs.promises.readdir(this.home.versionsDir, { withFileTypes: true });
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') return 0;
      throw new IOError(`Cannot read ${this.home.versionsDir}`, {
        cause: error,
        path: this.home.versionsDir,
      });
    }

    let removed = 0;
    for (const entry of entries) {
      if (!entry.isDirectory() || !entry.name.startsWith(STAGING_PREFIX)) continue;
      const dir = path.join(this.home.versionsDir, entry.name);
      let stat: fs.Stats;
      try {
        stat = await fs.promises.stat(dir);
      } catch (error) {
        if (isErrnoException(error) && error.code === 'ENOENT') continue;
        throw new IOError(`Cannot inspect ${dir}`, { cause: error, path: dir });
      }
      if (now - stat.mtimeMs < STALE_STAGING_MS) continue;
      try {
        await fs.promises.rm(dir, { recursive: true, force: true });
      } catch (error) {
        throw new IOError(`Cannot remove ${dir}`, { cause: error, path: dir });
      }
      removed++;
    }
    if (removed > 0) log.debug(`Removed ${removed} stale staging director${removed === 1 ? 'y' : 'ies'}`);
    return removed;
  }

  /** Directory rename; overridable in tests to simulate interruption */
  protected renameDir(from: string, to: string): Promise<void> {
    return fs.promises.rename(from, to);
  }
}
