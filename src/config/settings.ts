/**
 * Manager Settings (<home>/config.toml)
 *
 * All keys are optional; a missing file yields the defaults. Invalid files
 * are reported as ValidationError naming the offending key.
 */

import * as fs from 'fs';
import * as toml from 'toml';
import { z } from 'zod';
import { HomeContext } from '../core/home-context';
import { ValidationError, IOError, errorMessage, isErrnoException } from '../errors';

export const DEFAULT_API_BASE = 'https://api.github.com';
export const DEFAULT_DOWNLOAD_BASE = 'https://github.com/MetaCubeX/mihomo/releases/download';

const DownloadSchema = z
  .object({
    api_base: z.string().url().default(DEFAULT_API_BASE),
    download_base: z.string().url().default(DEFAULT_DOWNLOAD_BASE),
    max_retries: z.number().int().min(1).max(10).default(5),
    timeout_ms: z.number().int().positive().default(120000),
  })
  .default({});

const ServiceSchema = z
  .object({
    probe_ms: z.number().int().positive().default(1500),
    grace_period_ms: z.number().int().positive().default(5000),
    kill_timeout_ms: z.number().int().positive().default(2000),
  })
  .default({});

const StreamSchema = z
  .object({
    max_reconnect_attempts: z.number().int().min(0).default(5),
    base_delay_ms: z.number().int().positive().default(500),
    max_delay_ms: z.number().int().positive().default(10000),
    stable_after_ms: z.number().int().positive().default(5000),
  })
  .default({});

const MonitorSchema = z
  .object({
    interval_ms: z.number().int().positive().default(5000),
    policy: z.enum(['never', 'restart-with-backoff']).default('restart-with-backoff'),
    max_attempts: z.number().int().min(1).default(3),
    base_delay_ms: z.number().int().positive().default(1000),
    healthy_reset_ms: z.number().int().positive().default(60000),
  })
  .default({});

const SettingsSchema = z.object({
  download: DownloadSchema,
  service: ServiceSchema,
  stream: StreamSchema,
  monitor: MonitorSchema,
});

export type ManagerSettings = z.infer<typeof SettingsSchema>;

export function defaultSettings(): ManagerSettings {
  return SettingsSchema.parse({});
}

/**
 * Parse config.toml text into settings.
 */
export function parseSettings(content: string, source = 'config.toml'): ManagerSettings {
  let raw: unknown;
  try {
    raw = toml.parse(content);
  } catch (error) {
    throw new ValidationError(`Invalid TOML in ${source}: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  const result = SettingsSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const key = issue.path.join('.');
    throw new ValidationError(`Invalid setting "${key}" in ${source}: ${issue.message}`, { key });
  }
  return result.data;
}

/**
 * Load settings for a home directory.
 */
export function loadSettings(home: HomeContext): ManagerSettings {
  let content: string;
  try {
    content = fs.readFileSync(home.settingsFile, 'utf8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') return defaultSettings();
    throw new IOError(`Cannot read ${home.settingsFile}`, { cause: error, path: home.settingsFile });
  }
  return parseSettings(content, home.settingsFile);
}
