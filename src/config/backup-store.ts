/**
 * Backup Store
 *
 * Timestamped copies of profiles under <home>/backups as `<id>.yaml`, where
 * id is `<profile>-<YYYYMMDD-HHMMSS>` (UTC) with a `-<n>` suffix when two
 * backups of a profile land in the same second. The first line of each file
 * is a metadata comment; the rest is the profile content byte for byte.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { HomeContext } from '../core/home-context';
import { pathExists, writeFileAtomic } from '../core/atomic-file';
import { IOError, NotFoundError, ValidationError, isErrnoException } from '../errors';
import { createLogger } from '../utils/logger';

const log = createLogger('backup');

const HEADER_PREFIX = '# mihomo-manager backup ';
const BACKUP_EXT = '.yaml';
const BACKUP_ID = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

const HeaderSchema = z.object({
  profile: z.string().min(1),
  createdAt: z.string().datetime(),
  description: z.string().nullable().default(null),
});

export interface Backup {
  id: string;
  /** Profile the backup was taken from */
  profile: string;
  /** Unix timestamp (ms) */
  createdAt: number;
  description: string | null;
  path: string;
}

export function isValidBackupId(id: string): boolean {
  return BACKUP_ID.test(id) && !id.endsWith(BACKUP_EXT);
}

function assertValidBackupId(id: string): void {
  if (!isValidBackupId(id)) {
    throw new ValidationError(`Invalid backup id: "${id}"`, { key: 'id' });
  }
}

/** UTC timestamp as YYYYMMDD-HHMMSS */
export function backupStamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}-` +
    `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

function splitHeader(text: string): { header: string; body: string } | null {
  if (!text.startsWith(HEADER_PREFIX)) return null;
  const newline = text.indexOf('\n');
  if (newline === -1) return { header: text.slice(HEADER_PREFIX.length), body: '' };
  return { header: text.slice(HEADER_PREFIX.length, newline), body: text.slice(newline + 1) };
}

export class BackupStore {
  constructor(private readonly home: HomeContext) {}

  pathOf(id: string): string {
    assertValidBackupId(id);
    return path.join(this.home.backupsDir, `${id}${BACKUP_EXT}`);
  }

  /**
   * Store a copy of a profile's content.
   */
  async create(
    profile: string,
    content: string,
    options: { description?: string; now?: Date } = {}
  ): Promise<Backup> {
    const created = options.now ?? new Date();
    const base = `${profile}-${backupStamp(created)}`;
    let id = base;
    for (let n = 2; await pathExists(this.pathOf(id)); n++) {
      id = `${base}-${n}`;
    }

    const description = options.description?.trim() || null;
    const header = JSON.stringify({ profile, createdAt: created.toISOString(), description });
    const filePath = this.pathOf(id);
    await writeFileAtomic(filePath, `${HEADER_PREFIX}${header}\n${content}`, { mode: 0o600 });
    log.debug(`Backed up ${profile} as ${id}`);
    return { id, profile, createdAt: created.getTime(), description, path: filePath };
  }

  /**
   * Backups newest first, optionally of one profile only. Files without a
   * readable header are skipped.
   */
  async list(profile?: string): Promise<Backup[]> {
    let names: string[];
    try {
      names = await fs.promises.readdir(this.home.backupsDir);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') return [];
      throw new IOError(`Cannot list ${this.home.backupsDir}`, {
        cause: error,
        path: this.home.backupsDir,
      });
    }

    const backups: Backup[] = [];
    for (const file of names) {
      if (file.startsWith('.') || !file.endsWith(BACKUP_EXT)) continue;
      const id = file.slice(0, -BACKUP_EXT.length);
      if (!isValidBackupId(id)) continue;
      const loaded = await this.load(id);
      if (!loaded) {
        log.debug(`Skipping ${file}: no backup header`);
        continue;
      }
      if (profile === undefined || loaded.backup.profile === profile) {
        backups.push(loaded.backup);
      }
    }
    return backups.sort((a, b) => b.createdAt - a.createdAt || b.id.localeCompare(a.id));
  }

  /**
   * A backup and the profile content it holds.
   */
  async read(id: string): Promise<{ backup: Backup; content: string }> {
    const loaded = await this.load(id);
    if (!loaded) {
      throw new ValidationError(`Backup ${id} has no metadata header`, { key: id });
    }
    return loaded;
  }

  async remove(id: string): Promise<void> {
    const filePath = this.pathOf(id);
    try {
      await fs.promises.unlink(filePath);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        throw new NotFoundError(`Backup ${id} does not exist`);
      }
      throw new IOError(`Cannot delete backup ${id}`, { cause: error, path: filePath });
    }
  }

  /** null when the file lacks a valid header */
  private async load(id: string): Promise<{ backup: Backup; content: string } | null> {
    const filePath = this.pathOf(id);
    let text: string;
    try {
      text = await fs.promises.readFile(filePath, 'utf8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        throw new NotFoundError(`Backup ${id} does not exist`);
      }
      throw new IOError(`Cannot read backup ${id}`, { cause: error, path: filePath });
    }

    const parts = splitHeader(text);
    if (!parts) return null;
    let raw: unknown;
    try {
      raw = JSON.parse(parts.header);
    } catch {
      return null;
    }
    const parsed = HeaderSchema.safeParse(raw);
    if (!parsed.success) return null;

    const { profile, createdAt, description } = parsed.data;
    return {
      backup: { id, profile, createdAt: Date.parse(createdAt), description, path: filePath },
      content: parts.body,
    };
  }
}
