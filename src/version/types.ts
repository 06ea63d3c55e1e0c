/**
 * Version Module Type Definitions
 */

/** Release channels; resolved to a concrete version at install time */
export type Channel = 'stable' | 'beta' | 'nightly';

export const CHANNELS: readonly Channel[] = ['stable', 'beta', 'nightly'];

export function isChannel(value: string): value is Channel {
  return CHANNELS.some((channel) => channel === value);
}

/** Tag of the rolling prerelease that carries nightly (alpha) builds */
export const NIGHTLY_TAG = 'Prerelease-Alpha';

/** A concrete release: version id plus the tag its assets are published under */
export interface ResolvedRelease {
  version: string;
  tag: string;
}

/** An installed version */
export interface Version {
  version: string;
  tag: string;
  installDir: string;
  binaryPath: string;
  /** Unix timestamp (ms) of publication into the store */
  installedAt: number;
}

export interface InstalledVersion extends Version {
  isDefault: boolean;
}

/** Marker written into a version directory before it is published */
export interface PublishedMarker {
  version: string;
  tag: string;
  installedAt: number;
  binary: string;
}

export const PUBLISHED_MARKER = '.published';

/** Release listing entry from the release feed */
export interface RemoteRelease {
  version: string;
  prerelease: boolean;
  publishedAt: string;
}

/** Channel resolution cache file structure */
export interface ReleaseCache {
  channels: Partial<Record<Channel, ResolvedRelease & { checkedAt: number }>>;
}

/** Cache duration for channel resolution (1 hour in milliseconds) */
export const RELEASE_CACHE_DURATION_MS = 60 * 60 * 1000;

/** Download progress */
export interface DownloadProgress {
  total: number;
  downloaded: number;
  percentage: number;
}

export type ProgressCallback = (progress: DownloadProgress) => void;

export interface DownloadResult {
  success: boolean;
  filePath?: string;
  error?: string;
  /** HTTP status of the final failure, when there was one */
  statusCode?: number;
  retries: number;
}
