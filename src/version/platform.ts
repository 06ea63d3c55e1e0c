/**
 * Platform Detection
 * Maps the running platform to mihomo release asset names.
 */

import { ValidationError } from '../errors';

export type ArchiveExtension = 'gz' | 'zip';

export interface PlatformInfo {
  os: 'linux' | 'darwin' | 'windows' | 'freebsd';
  arch: 'amd64' | 'arm64' | 'armv7' | '386';
  extension: ArchiveExtension;
}

const OS_MAP: Partial<Record<NodeJS.Platform, PlatformInfo['os']>> = {
  linux: 'linux',
  darwin: 'darwin',
  win32: 'windows',
  freebsd: 'freebsd',
};

const ARCH_MAP: Record<string, PlatformInfo['arch']> = {
  x64: 'amd64',
  arm64: 'arm64',
  arm: 'armv7',
  ia32: '386',
};

/**
 * Detect current platform
 */
export function detectPlatform(
  platform: NodeJS.Platform = process.platform,
  arch: string = process.arch
): PlatformInfo {
  const os = OS_MAP[platform];
  const mappedArch = ARCH_MAP[arch];
  if (!os || !mappedArch) {
    throw new ValidationError(`Unsupported platform: ${platform}-${arch}`);
  }
  return { os, arch: mappedArch, extension: os === 'windows' ? 'zip' : 'gz' };
}

/** Name of the executable inside a version directory */
export function getExecutableName(platform: PlatformInfo = detectPlatform()): string {
  return platform.os === 'windows' ? 'mihomo.exe' : 'mihomo';
}

/** Release asset file name, e.g. mihomo-linux-amd64-v1.18.0.gz */
export function getAssetName(version: string, platform: PlatformInfo = detectPlatform()): string {
  return `mihomo-${platform.os}-${platform.arch}-${version}.${platform.extension}`;
}

/** Asset name prefix shared by every version for this platform */
export function getAssetPrefix(platform: PlatformInfo = detectPlatform()): string {
  return `mihomo-${platform.os}-${platform.arch}-`;
}
