/**
 * Version Manager
 *
 * Composes the VersionStore with a ReleaseSource:
 * install (idempotent, verify-then-publish), default switching, listing and
 * uninstall. Errors from the store or the source keep their kind and gain
 * the version they concern.
 */

import * as fs from 'fs';
import * as path from 'path';
import { HomeContext } from '../core/home-context';
import { ConflictError, NotFoundError, ValidationError, errorMessage, withContext } from '../errors';
import { ReleaseSource, releaseForVersion, FetchArtifactOptions } from './release-source';
import { VersionStore, assertValidVersionId } from './version-store';
import {
  InstalledVersion,
  RemoteRelease,
  ResolvedRelease,
  Version,
  isChannel,
} from './types';
import { createLogger } from '../utils/logger';

const log = createLogger('versions');

/** Reports whether a version backs the running service */
export interface VersionUsageProbe {
  isVersionInUse(version: string): Promise<boolean>;
}

export interface InstallResult {
  version: Version;
  /** False when the version was already published and nothing was downloaded */
  downloaded: boolean;
}

export interface VersionManagerOptions {
  source: ReleaseSource;
  usage?: VersionUsageProbe;
  store?: VersionStore;
}

export class VersionManager {
  readonly store: VersionStore;
  private readonly source: ReleaseSource;
  private usage?: VersionUsageProbe;

  constructor(home: HomeContext, options: VersionManagerOptions) {
    this.store = options.store ?? new VersionStore(home);
    this.source = options.source;
    this.usage = options.usage;
  }

  /** ServiceManager registers itself after construction */
  setUsageProbe(probe: VersionUsageProbe): void {
    this.usage = probe;
  }

  /**
   * Resolve a channel name (case-insensitive) or explicit version id to a release.
   */
  async resolve(versionOrChannel: string): Promise<ResolvedRelease> {
    const normalized = versionOrChannel.trim().toLowerCase();
    if (isChannel(normalized)) {
      try {
        return await this.source.resolveChannel(normalized);
      } catch (error) {
        throw withContext(error, `Cannot resolve channel ${normalized}`);
      }
    }
    const version = versionOrChannel.trim();
    assertValidVersionId(version);
    return releaseForVersion(version);
  }

  async install(
    versionOrChannel: string,
    options: FetchArtifactOptions = {}
  ): Promise<InstallResult> {
    const release = await this.resolve(versionOrChannel);

    const existing = await this.store.get(release.version);
    if (existing) {
      log.debug(`${release.version} already installed`);
      return { version: existing, downloaded: false };
    }

    try {
      await this.store.sweepStaging();
    } catch (error) {
      log.warn(`Skipping staging cleanup: ${errorMessage(error)}`);
    }
    const stagingDir = await this.store.createStaging(release.version);
    try {
      const binaryPath = await this.source.fetchArtifact(release, stagingDir, options);
      await this.verifyArtifact(binaryPath);

      const outcome = await this.store.publish(stagingDir, {
        version: release.version,
        tag: release.tag,
        installedAt: Date.now(),
        binary: path.relative(stagingDir, binaryPath),
      });

      const version = await this.store.get(release.version);
      if (!version) {
        throw new NotFoundError(`${release.version} vanished after publish`);
      }
      log.debug(`${release.version} ${outcome}`);
      return { version, downloaded: true };
    } catch (error) {
      await this.store.discardStaging(stagingDir);
      throw withContext(error, `Install ${release.version} failed`);
    }
  }

  /**
   * Make the binary executable and check it is a non-empty executable file.
   */
  private async verifyArtifact(binaryPath: string): Promise<void> {
    let stat: fs.Stats;
    try {
      stat = await fs.promises.stat(binaryPath);
    } catch (error) {
      throw new ValidationError(`Artifact missing: ${path.basename(binaryPath)}`, { cause: error });
    }
    if (!stat.isFile() || stat.size === 0) {
      throw new ValidationError(`Artifact is empty: ${path.basename(binaryPath)}`);
    }

    if (process.platform !== 'win32') {
      await fs.promises.chmod(binaryPath, 0o755);
      const after = await fs.promises.stat(binaryPath);
      if ((after.mode & 0o111) === 0) {
        throw new ValidationError(`Artifact is not executable: ${path.basename(binaryPath)}`);
      }
    }
  }

  async setDefault(version: string): Promise<void> {
    if (!(await this.store.isPublished(version))) {
      throw new NotFoundError(`Version ${version} is not installed`);
    }
    await this.store.defaultPointer.write(version);
  }

  async getDefault(): Promise<string | null> {
    return this.store.defaultPointer.read();
  }

  async uninstall(version: string): Promise<void> {
    if (!(await this.store.isPublished(version))) {
      throw new NotFoundError(`Version ${version} is not installed`);
    }
    if (this.usage && (await this.usage.isVersionInUse(version))) {
      throw new ConflictError(`Version ${version} backs the running service; stop it first`);
    }

    try {
      await this.store.remove(version);
    } catch (error) {
      throw withContext(error, `Uninstall ${version} failed`);
    }
    if (await this.store.defaultPointer.clearIf(version)) {
      log.debug(`Cleared default pointer (was ${version})`);
    }
  }

  async list(): Promise<InstalledVersion[]> {
    const [versions, current] = await Promise.all([this.store.list(), this.getDefault()]);
    return versions.map((v) => ({ ...v, isDefault: v.version === current }));
  }

  /**
   * Binary path of version, or of the default when omitted.
   */
  async getBinaryPath(version?: string): Promise<string> {
    const target = version ?? (await this.getDefault());
    if (!target) {
      throw new NotFoundError('No default version set (run: mihomo-manager install)');
    }
    const installed = await this.store.get(target);
    if (!installed) {
      throw new NotFoundError(`Version ${target} is not installed`);
    }
    return installed.binaryPath;
  }

  async listRemote(limit = 20): Promise<RemoteRelease[]> {
    try {
      return await this.source.listRemote(limit);
    } catch (error) {
      throw withContext(error, 'Cannot list remote releases');
    }
  }
}
