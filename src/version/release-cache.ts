/**
 * Release Cache
 * Remembers channel resolutions for an hour so that repeated
 * `install stable` calls do not hit the release API each time.
 */

import * as path from 'path';
import { HomeContext } from '../core/home-context';
import { readFileIfExists, writeFileAtomic } from '../core/atomic-file';
import { Channel, ReleaseCache, ResolvedRelease, RELEASE_CACHE_DURATION_MS } from './types';
import { errorMessage } from '../errors';
import { createLogger } from '../utils/logger';

const log = createLogger('release-cache');

export function getReleaseCachePath(home: HomeContext): string {
  return path.join(home.cacheDir, 'releases.json');
}

async function readCacheFile(home: HomeContext): Promise<ReleaseCache> {
  try {
    const content = await readFileIfExists(getReleaseCachePath(home));
    if (content === null) return { channels: {} };
    const parsed: ReleaseCache = JSON.parse(content);
    if (parsed && typeof parsed.channels === 'object' && parsed.channels !== null) {
      return parsed;
    }
  } catch (error) {
    log.debug(`Ignoring unreadable release cache: ${errorMessage(error)}`);
  }
  return { channels: {} };
}

/**
 * Cached resolution for a channel, if still fresh
 */
export async function readCachedChannel(
  home: HomeContext,
  channel: Channel,
  now = Date.now()
): Promise<ResolvedRelease | null> {
  const entry = (await readCacheFile(home)).channels[channel];
  if (!entry || now - entry.checkedAt >= RELEASE_CACHE_DURATION_MS) {
    return null;
  }
  return { version: entry.version, tag: entry.tag };
}

/**
 * Record a channel resolution. Failure to write only costs a future API call.
 */
export async function writeCachedChannel(
  home: HomeContext,
  channel: Channel,
  release: ResolvedRelease,
  now = Date.now()
): Promise<void> {
  const cache = await readCacheFile(home);
  cache.channels[channel] = { ...release, checkedAt: now };
  try {
    await writeFileAtomic(getReleaseCachePath(home), JSON.stringify(cache, null, 2));
  } catch (error) {
    log.debug(`Release cache not written: ${errorMessage(error)}`);
  }
}
