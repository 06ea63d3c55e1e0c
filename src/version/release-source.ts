/**
 * Release Source
 *
 * Resolves channels to concrete releases and fetches verified-ready
 * executables. VersionManager only sees the ReleaseSource interface; the
 * GitHub implementation talks to the release API and download host.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { HomeContext } from '../core/home-context';
import { NetworkError, NotFoundError, ValidationError, errorMessage } from '../errors';
import { DEFAULT_API_BASE, DEFAULT_DOWNLOAD_BASE } from '../config/settings';
import { downloadWithRetry, fetchJson, HttpStatusError } from './downloader';
import { extractArtifact } from './extractor';
import { detectPlatform, getAssetName, getAssetPrefix, getExecutableName, PlatformInfo } from './platform';
import { readCachedChannel, writeCachedChannel } from './release-cache';
import {
  Channel,
  NIGHTLY_TAG,
  ProgressCallback,
  RemoteRelease,
  ResolvedRelease,
} from './types';
import { createLogger } from '../utils/logger';

const log = createLogger('releases');

const REPO = 'MetaCubeX/mihomo';
const VERSION_TAG = /^v\d+\.\d+\.\d+/;

export interface FetchArtifactOptions {
  signal?: AbortSignal;
  onProgress?: ProgressCallback;
}

export interface ReleaseSource {
  resolveChannel(channel: Channel): Promise<ResolvedRelease>;
  /**
   * Download, decompress and place the executable for release into destDir.
   * Returns the path of the executable.
   */
  fetchArtifact(
    release: ResolvedRelease,
    destDir: string,
    options?: FetchArtifactOptions
  ): Promise<string>;
  listRemote(limit: number): Promise<RemoteRelease[]>;
}

/**
 * Release for an explicitly named version. Nightly ids live under the rolling tag.
 */
export function releaseForVersion(version: string): ResolvedRelease {
  return {
    version,
    tag: version.startsWith('alpha-') ? NIGHTLY_TAG : version,
  };
}

const GitHubAssetSchema = z.object({ name: z.string() });

const GitHubReleaseSchema = z.object({
  tag_name: z.string(),
  prerelease: z.boolean().default(false),
  draft: z.boolean().default(false),
  published_at: z.string().nullable().default(null),
  assets: z.array(GitHubAssetSchema).default([]),
});

type GitHubRelease = z.infer<typeof GitHubReleaseSchema>;

export interface GitHubReleaseSourceOptions {
  apiBase?: string;
  downloadBase?: string;
  maxRetries?: number;
  timeoutMs?: number;
  platform?: PlatformInfo;
  /** Channel cache location; no caching without it */
  home?: HomeContext;
}

export class GitHubReleaseSource implements ReleaseSource {
  private readonly apiBase: string;
  private readonly downloadBase: string;
  private readonly maxRetries: number;
  private readonly timeoutMs: number;
  private readonly platform: PlatformInfo;
  private readonly home?: HomeContext;

  constructor(options: GitHubReleaseSourceOptions = {}) {
    this.apiBase = (options.apiBase ?? DEFAULT_API_BASE).replace(/\/+$/, '');
    this.downloadBase = (options.downloadBase ?? DEFAULT_DOWNLOAD_BASE).replace(/\/+$/, '');
    this.maxRetries = options.maxRetries ?? 5;
    this.timeoutMs = options.timeoutMs ?? 120000;
    this.platform = options.platform ?? detectPlatform();
    this.home = options.home;
  }

  async resolveChannel(channel: Channel): Promise<ResolvedRelease> {
    if (this.home) {
      const cached = await readCachedChannel(this.home, channel);
      if (cached) {
        log.debug(`Channel ${channel} -> ${cached.version} (cached)`);
        return cached;
      }
    }

    const release = await this.resolveUncached(channel);
    log.debug(`Channel ${channel} -> ${release.version}`);
    if (this.home) {
      await writeCachedChannel(this.home, channel, release);
    }
    return release;
  }

  async fetchArtifact(
    release: ResolvedRelease,
    destDir: string,
    options: FetchArtifactOptions = {}
  ): Promise<string> {
    const assetName = getAssetName(release.version, this.platform);
    const url = `${this.downloadBase}/${encodeURIComponent(release.tag)}/${assetName}`;
    const archivePath = path.join(destDir, assetName);
    const binaryPath = path.join(destDir, getExecutableName(this.platform));

    log.debug(`Downloading ${url}`);
    const result = await downloadWithRetry(url, archivePath, {
      maxRetries: this.maxRetries,
      timeout: this.timeoutMs,
      onProgress: options.onProgress,
      signal: options.signal,
    });

    if (!result.success) {
      if (result.statusCode === 404) {
        throw new NotFoundError(`No ${assetName} published for ${release.version}`);
      }
      throw new NetworkError(result.error ?? `Download failed: ${url}`, {
        statusCode: result.statusCode,
      });
    }

    try {
      await extractArtifact(archivePath, binaryPath, this.platform.extension);
    } catch (error) {
      throw new ValidationError(
        `Cannot decompress ${assetName}: ${errorMessage(error)}`,
        { cause: error }
      );
    } finally {
      await fs.promises.rm(archivePath, { force: true });
    }
    return binaryPath;
  }

  async listRemote(limit: number): Promise<RemoteRelease[]> {
    const releases = await this.fetchReleases(Math.min(Math.max(limit, 1), 100));
    return releases
      .filter((r) => !r.draft)
      .slice(0, limit)
      .map((r) => ({
        version: r.tag_name,
        prerelease: r.prerelease,
        publishedAt: r.published_at ?? '',
      }));
  }

  private resolveUncached(channel: Channel): Promise<ResolvedRelease> {
    switch (channel) {
      case 'stable':
        return this.resolveStable();
      case 'beta':
        return this.resolveBeta();
      case 'nightly':
        return this.resolveNightly();
    }
  }

  private async resolveStable(): Promise<ResolvedRelease> {
    const latest = await this.fetchRelease(`/repos/${REPO}/releases/latest`);
    return { version: latest.tag_name, tag: latest.tag_name };
  }

  private async resolveBeta(): Promise<ResolvedRelease> {
    const releases = await this.fetchReleases(30);
    const beta = releases.find((r) => r.prerelease && !r.draft && VERSION_TAG.test(r.tag_name));
    if (beta) {
      return { version: beta.tag_name, tag: beta.tag_name };
    }
    log.debug('No versioned prerelease; beta falls back to nightly');
    return this.resolveNightly();
  }

  private async resolveNightly(): Promise<ResolvedRelease> {
    const nightly = await this.fetchRelease(`/repos/${REPO}/releases/tags/${NIGHTLY_TAG}`);
    const version = extractNightlyVersion(
      nightly.assets.map((a) => a.name),
      getAssetPrefix(this.platform)
    );
    if (!version) {
      throw new NotFoundError(`No nightly build published for ${getAssetPrefix(this.platform)}*`);
    }
    return { version, tag: NIGHTLY_TAG };
  }

  private async fetchReleases(perPage: number): Promise<GitHubRelease[]> {
    const data = await this.getJson(`/repos/${REPO}/releases?per_page=${perPage}`);
    const parsed = z.array(GitHubReleaseSchema).safeParse(data);
    if (!parsed.success) {
      throw new NetworkError('Unexpected release listing from release API');
    }
    return parsed.data;
  }

  private async fetchRelease(apiPath: string): Promise<GitHubRelease> {
    const parsed = GitHubReleaseSchema.safeParse(await this.getJson(apiPath));
    if (!parsed.success) {
      throw new NetworkError(`Unexpected release document from ${apiPath}`);
    }
    return parsed.data;
  }

  private async getJson(apiPath: string): Promise<unknown> {
    const url = `${this.apiBase}${apiPath}`;
    try {
      return await fetchJson(url, { maxRetries: Math.min(this.maxRetries, 3) });
    } catch (error) {
      if (error instanceof HttpStatusError && error.statusCode === 404) {
        throw new NotFoundError(`Release not found: ${url}`, { cause: error });
      }
      throw new NetworkError(`Release API request failed: ${errorMessage(error)}`, {
        cause: error,
        statusCode: error instanceof HttpStatusError ? error.statusCode : undefined,
      });
    }
  }
}

/**
 * Pull the `alpha-<hash>` id out of the nightly release's asset names.
 */
export function extractNightlyVersion(assetNames: string[], prefix: string): string | null {
  const escaped = prefix.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  const exact = new RegExp(`^${escaped}(alpha-[0-9a-zA-Z]+)\\.(gz|zip)$`);
  for (const name of assetNames) {
    const match = exact.exec(name);
    if (match) return match[1];
  }
  for (const name of assetNames) {
    const match = /(alpha-[0-9a-zA-Z]+)\.(gz|zip)$/.exec(name);
    if (match) return match[1];
  }
  return null;
}
