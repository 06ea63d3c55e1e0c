/**
 * Version module: installed versions, release resolution and artifact download.
 */

export * from './types';
export * from './platform';
export { VersionStore, assertValidVersionId } from './version-store';
export type { PublishOutcome } from './version-store';
export { VersionManager } from './version-manager';
export type { VersionManagerOptions, VersionUsageProbe, InstallResult } from './version-manager';
export { GitHubReleaseSource, releaseForVersion, extractNightlyVersion } from './release-source';
export type {
  ReleaseSource,
  GitHubReleaseSourceOptions,
  FetchArtifactOptions,
} from './release-source';
export { downloadWithRetry, downloadFile, fetchJson, HttpStatusError } from './downloader';
export { extractArtifact } from './extractor';
