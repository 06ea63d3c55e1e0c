/**
 * Config Manager
 *
 * Composes the ProfileStore with structural validation and external
 * controller discovery. The `current` pointer follows the same atomic
 * discipline as the default version pointer.
 */

import * as fs from 'fs';
import * as lockfile from 'proper-lockfile';
import getPort from 'get-port';
import { randomBytes } from 'crypto';
import { HomeContext } from '../core/home-context';
import {
  ConflictError,
  IOError,
  NotFoundError,
  ValidationError,
  errorMessage,
  isErrnoException,
} from '../errors';
import { Profile, ProfileStore, assertValidProfileName } from './profile-store';
import { Backup, BackupStore } from './backup-store';
import { validateProfileContent, ProfileDocument } from './profile-schema';
import { createLogger } from '../utils/logger';

const log = createLogger('config');

export const DEFAULT_PROFILE = 'default';
export const PREFERRED_CONTROLLER_PORT = 9090;

const LOCK_STALE_MS = 10000;
const LOCK_RETRIES = 20;
const LOCK_RETRY_MIN_MS = 25;
const LOCK_RETRY_MAX_MS = 250;

const DEFAULT_PROFILE_CONTENT = `# Created by mihomo-manager
port: 7890
socks-port: 7891
allow-lan: false
mode: rule
log-level: info
proxies: []
proxy-groups: []
rules:
  - MATCH,DIRECT
`;

/** Reports whether a profile path backs the running service */
export interface ProfileUsageProbe {
  isProfileInUse(profilePath: string): Promise<boolean>;
}

export interface ControllerInfo {
  /** Base URL of the control plane, e.g. http://127.0.0.1:9090 */
  url: string;
  /** Address as written in the profile */
  address: string;
  secret: string | null;
}

export interface EnsureControllerResult extends ControllerInfo {
  /** True when the profile file was edited */
  modified: boolean;
}

export interface EnsureDefaultResult {
  /** True when configs/default.yaml was written */
  created: boolean;
  current: string;
}

export interface ProfileSummary extends Profile {
  isCurrent: boolean;
}

export interface RestoreOptions {
  /** Profile to restore into (default: the one the backup was taken from) */
  profile?: string;
  /** Back up the profile being replaced first (default: true) */
  backupCurrent?: boolean;
}

export interface RestoreResult {
  profile: string;
  /** Backup of the replaced content, when one was taken */
  safetyBackup: Backup | null;
}

/**
 * Control-plane URL for an external-controller address.
 * Wildcard and empty hosts are reached over loopback.
 */
export function controllerUrl(address: string): string {
  const idx = address.lastIndexOf(':');
  const host = address.slice(0, idx);
  const port = address.slice(idx + 1);
  const wildcard = host === '' || host === '0.0.0.0' || host === '[::]' || host === '*';
  return `http://${wildcard ? '127.0.0.1' : host}:${port}`;
}

function secretOf(doc: ProfileDocument): string | null {
  if (doc.secret === undefined) return null;
  const value = String(doc.secret);
  return value.length > 0 ? value : null;
}

/**
 * Set a top-level scalar key, replacing its line when present and appending
 * otherwise. The rest of the text is left untouched.
 */
export function setTopLevelKey(content: string, key: string, value: string): string {
  const escaped = key.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  const line = new RegExp(`^${escaped}:.*$`, 'm');
  const rendered = `${key}: ${value}`;
  if (line.test(content)) {
    return content.replace(line, rendered);
  }
  const base = content.length === 0 || content.endsWith('\n') ? content : `${content}\n`;
  return `${base}${rendered}\n`;
}

export class ConfigManager {
  readonly store: ProfileStore;
  readonly backups: BackupStore;
  private usage?: ProfileUsageProbe;

  constructor(
    private readonly home: HomeContext,
    options: { usage?: ProfileUsageProbe; store?: ProfileStore; backups?: BackupStore } = {}
  ) {
    this.store = options.store ?? new ProfileStore(home);
    this.backups = options.backups ?? new BackupStore(home);
    this.usage = options.usage;
  }

  /** ServiceManager registers itself after construction */
  setUsageProbe(probe: ProfileUsageProbe): void {
    this.usage = probe;
  }

  /**
   * Create configs/default.yaml when no profile exists, and make sure the
   * current pointer resolves.
   */
  async ensureDefaultConfig(): Promise<EnsureDefaultResult> {
    const profiles = await this.store.list();
    let created = false;
    if (profiles.length === 0) {
      await this.store.write(DEFAULT_PROFILE, DEFAULT_PROFILE_CONTENT);
      log.debug(`Created ${this.home.profilePath(DEFAULT_PROFILE)}`);
      created = true;
    }

    const current = await this.store.currentPointer.read();
    if (current) {
      return { created, current };
    }

    const names = created ? [DEFAULT_PROFILE] : profiles.map((p) => p.name);
    const target = names.includes(DEFAULT_PROFILE) ? DEFAULT_PROFILE : names[0];
    await this.store.currentPointer.write(target);
    log.debug(`Current profile -> ${target}`);
    return { created, current: target };
  }

  /**
   * Make sure the profile (current when omitted) names an external controller
   * and a secret, choosing a free loopback port and a random secret for the
   * missing parts. The file is only rewritten when something was missing.
   */
  async ensureExternalController(name?: string): Promise<EnsureControllerResult> {
    const profileName = name ?? (await this.requireCurrent());
    const filePath = this.store.pathOf(profileName);
    if (!(await this.store.exists(profileName))) {
      throw new NotFoundError(`Profile ${profileName} does not exist`);
    }

    return this.withProfileLock(filePath, async () => {
      const content = await this.store.read(profileName);
      const doc = validateProfileContent(content, filePath);

      let updated = content;
      let address = doc['external-controller'];
      let secret = secretOf(doc);

      if (!address) {
        const port = await getPort({ port: PREFERRED_CONTROLLER_PORT, host: '127.0.0.1' });
        address = `127.0.0.1:${port}`;
        updated = setTopLevelKey(updated, 'external-controller', address);
      }
      if (!secret) {
        secret = randomBytes(16).toString('hex');
        updated = setTopLevelKey(updated, 'secret', JSON.stringify(secret));
      }

      const modified = updated !== content;
      if (modified) {
        const reparsed = validateProfileContent(updated, filePath);
        if (reparsed['external-controller'] !== address || secretOf(reparsed) !== secret) {
          throw new ValidationError(
            `Cannot add external-controller to ${filePath}; set it by hand`,
            { key: 'external-controller' }
          );
        }
        await this.store.write(profileName, updated);
        log.debug(`Added controller ${address} to ${profileName}`);
      }

      return { url: controllerUrl(address), address, secret, modified };
    });
  }

  private async withProfileLock<T>(filePath: string, operation: () => Promise<T>): Promise<T> {
    let release: () => Promise<void>;
    try {
      await fs.promises.mkdir(this.home.configsDir, { recursive: true });
      release = await lockfile.lock(filePath, {
        stale: LOCK_STALE_MS,
        retries: { retries: LOCK_RETRIES, minTimeout: LOCK_RETRY_MIN_MS, maxTimeout: LOCK_RETRY_MAX_MS },
        realpath: false,
      });
    } catch (error) {
      throw new IOError(`Failed to lock ${filePath}: ${errorMessage(error)}`, {
        cause: error,
        path: filePath,
      });
    }

    try {
      return await operation();
    } finally {
      try {
        await release();
      } catch (error) {
        log.warn(`Failed to release lock on ${filePath}: ${errorMessage(error)}`);
      }
    }
  }

  /**
   * Controller address and secret of a profile, without editing it.
   */
  async readController(filePath?: string): Promise<ControllerInfo | null> {
    const target = filePath ?? (await this.getCurrentPath());
    let content: string;
    try {
      content = await fs.promises.readFile(target, 'utf8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        throw new NotFoundError(`Profile file ${target} does not exist`);
      }
      throw new IOError(`Cannot read ${target}`, { cause: error, path: target });
    }
    const doc = validateProfileContent(content, target);
    const address = doc['external-controller'];
    if (!address) return null;
    return { url: controllerUrl(address), address, secret: secretOf(doc) };
  }

  async setCurrent(name: string): Promise<void> {
    assertValidProfileName(name);
    if (!(await this.store.exists(name))) {
      throw new NotFoundError(`Profile ${name} does not exist`);
    }
    await this.store.currentPointer.write(name);
  }

  async getCurrent(): Promise<string | null> {
    return this.store.currentPointer.read();
  }

  async getCurrentPath(): Promise<string> {
    return this.home.profilePath(await this.requireCurrent());
  }

  private async requireCurrent(): Promise<string> {
    const current = await this.getCurrent();
    if (!current) {
      throw new NotFoundError('No current profile (run: mihomo-manager profile use <name>)');
    }
    return current;
  }

  /**
   * Structural check of a profile file.
   */
  async validate(filePath: string): Promise<ProfileDocument> {
    let content: string;
    try {
      content = await fs.promises.readFile(filePath, 'utf8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        throw new NotFoundError(`Config file ${filePath} does not exist`);
      }
      throw new IOError(`Cannot read ${filePath}`, { cause: error, path: filePath });
    }
    return validateProfileContent(content, filePath);
  }

  async listProfiles(): Promise<ProfileSummary[]> {
    const [profiles, current] = await Promise.all([this.store.list(), this.getCurrent()]);
    return profiles.map((p) => ({ ...p, isCurrent: p.name === current }));
  }

  async showProfile(name?: string): Promise<{ profile: Profile; content: string }> {
    const profileName = name ?? (await this.requireCurrent());
    const profile = await this.store.get(profileName);
    if (!profile) {
      throw new NotFoundError(`Profile ${profileName} does not exist`);
    }
    return { profile, content: await this.store.read(profileName) };
  }

  async deleteProfile(name: string): Promise<void> {
    assertValidProfileName(name);
    if (!(await this.store.exists(name))) {
      throw new NotFoundError(`Profile ${name} does not exist`);
    }
    if (this.usage && (await this.usage.isProfileInUse(this.home.profilePath(name)))) {
      throw new ConflictError(`Profile ${name} backs the running service; stop it first`);
    }
    await this.store.remove(name);
    if (await this.store.currentPointer.clearIf(name)) {
      log.debug(`Cleared current pointer (was ${name})`);
    }
  }

  /**
   * Copy a validated YAML file into the store under name.
   */
  async importProfile(
    name: string,
    sourcePath: string,
    options: { force?: boolean } = {}
  ): Promise<Profile> {
    assertValidProfileName(name);
    if (!options.force && (await this.store.exists(name))) {
      throw new ConflictError(`Profile ${name} already exists (use --force to replace it)`);
    }
    await this.validate(sourcePath);
    const content = await fs.promises.readFile(sourcePath, 'utf8');
    await this.store.write(name, content);

    const profile = await this.store.get(name);
    if (!profile) {
      throw new NotFoundError(`Profile ${name} vanished after import`);
    }
    return profile;
  }

  async backupProfile(name?: string, description?: string): Promise<Backup> {
    const profileName = name ?? (await this.requireCurrent());
    const content = await this.store.read(profileName);
    return this.backups.create(profileName, content, { description });
  }

  async listBackups(profile?: string): Promise<Backup[]> {
    return this.backups.list(profile);
  }

  /**
   * Write a backup's content back into a profile. The content must pass the
   * structural check; the replaced profile is backed up first unless told
   * otherwise.
   */
  async restoreBackup(id: string, options: RestoreOptions = {}): Promise<RestoreResult> {
    const { backup, content } = await this.backups.read(id);
    const target = options.profile ?? backup.profile;
    const filePath = this.store.pathOf(target);
    validateProfileContent(content, backup.path);

    return this.withProfileLock(filePath, async () => {
      let safetyBackup: Backup | null = null;
      if ((options.backupCurrent ?? true) && (await this.store.exists(target))) {
        safetyBackup = await this.backups.create(target, await this.store.read(target), {
          description: `before restoring ${id}`,
        });
      }
      await this.store.write(target, content);
      log.debug(`Restored ${id} into ${target}`);
      return { profile: target, safetyBackup };
    });
  }

  async deleteBackup(id: string): Promise<void> {
    await this.backups.remove(id);
  }
}
