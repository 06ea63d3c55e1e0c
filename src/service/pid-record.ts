/**
 * PidRecord persistence (<home>/mihomo.pid).
 *
 * JSON `{ pid, startedAt, binaryPath, configPath }`. A plain integer written
 * by older releases is still read; its paths are empty.
 */

import * as fs from 'fs';
import { writeFileAtomic, readFileIfExists } from '../core/atomic-file';
import { IOError } from '../errors';
import { createLogger } from '../utils/logger';

const log = createLogger('pid');

export interface PidRecord {
  pid: number;
  /** Unix timestamp (ms) of the spawn */
  startedAt: number;
  binaryPath: string;
  configPath: string;
}

function isPid(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

/**
 * Parse PID file content; null when it holds nothing usable.
 */
export function parsePidRecord(content: string): PidRecord | null {
  const trimmed = content.trim();
  if (/^\d+$/.test(trimmed)) {
    const pid = parseInt(trimmed, 10);
    return pid > 0 ? { pid, startedAt: 0, binaryPath: '', configPath: '' } : null;
  }

  try {
    const data: Partial<Record<keyof PidRecord, unknown>> = JSON.parse(trimmed);
    if (!isPid(data.pid)) return null;
    return {
      pid: data.pid,
      startedAt: typeof data.startedAt === 'number' ? data.startedAt : 0,
      binaryPath: typeof data.binaryPath === 'string' ? data.binaryPath : '',
      configPath: typeof data.configPath === 'string' ? data.configPath : '',
    };
  } catch {
    return null;
  }
}

export class PidRecordFile {
  constructor(readonly filePath: string) {}

  async read(): Promise<PidRecord | null> {
    let content: string | null;
    try {
      content = await readFileIfExists(this.filePath);
    } catch (error) {
      throw new IOError(`Cannot read ${this.filePath}`, { cause: error, path: this.filePath });
    }
    if (content === null) return null;

    const record = parsePidRecord(content);
    if (!record) {
      log.warn(`Ignoring unreadable PID file ${this.filePath}`);
    }
    return record;
  }

  async write(record: PidRecord): Promise<void> {
    await writeFileAtomic(this.filePath, JSON.stringify(record, null, 2) + '\n', { mode: 0o600 });
  }

  async remove(): Promise<void> {
    await fs.promises.rm(this.filePath, { force: true });
  }
}
