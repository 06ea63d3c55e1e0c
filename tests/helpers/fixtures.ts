import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { HomeContext } from '../../src/core/home-context';
import { FetchArtifactOptions, ReleaseSource } from '../../src/version/release-source';
import { Channel, RemoteRelease, ResolvedRelease } from '../../src/version/types';
import { NotFoundError } from '../../src/errors';

export function makeTempHome(prefix = 'mihomo-manager-test-'): HomeContext {
  return new HomeContext(fs.mkdtempSync(path.join(os.tmpdir(), prefix)));
}

export function removeTempHome(home: HomeContext): void {
  fs.rmSync(home.root, { recursive: true, force: true });
}

export function makeTempDir(prefix = 'mihomo-manager-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/**
 * Executable Node script standing in for the mihomo binary.
 * 'serve' keeps running until signalled; 'exit' terminates at once with code 3;
 * 'ignore-term' keeps running through SIGTERM.
 */
export function writeFakeBinary(
  filePath: string,
  behavior: 'serve' | 'exit' | 'ignore-term' = 'serve'
): string {
  const body =
    behavior === 'exit'
      ? "console.error('config error'); process.exit(3);"
      : behavior === 'ignore-term'
        ? "process.on('SIGTERM', () => {}); setInterval(() => {}, 1000);"
        : "console.log('serving ' + process.argv.slice(2).join(' ')); setInterval(() => {}, 1000);";
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, `#!${process.execPath}\n${body}\n`, { mode: 0o755 });
  return filePath;
}

/**
 * ReleaseSource fake: channels map to fixed releases and every fetch writes a
 * fake binary, counting the calls.
 */
export class FakeReleaseSource implements ReleaseSource {
  fetchCount = 0;
  resolveCount = 0;
  /** Versions for which fetchArtifact reports a missing artifact */
  missing = new Set<string>();
  /** Artifact written as an empty file, failing verification */
  empty = new Set<string>();
  /** Awaited inside fetchArtifact, letting tests interleave installs */
  gate: Promise<void> | null = null;

  constructor(
    private readonly channels: Partial<Record<Channel, ResolvedRelease>> = {
      stable: { version: 'v1.19.0', tag: 'v1.19.0' },
      beta: { version: 'v1.19.1', tag: 'v1.19.1' },
      nightly: { version: 'alpha-abc1234', tag: 'Prerelease-Alpha' },
    }
  ) {}

  async resolveChannel(channel: Channel): Promise<ResolvedRelease> {
    this.resolveCount++;
    const release = this.channels[channel];
    if (!release) throw new NotFoundError(`No ${channel} release`);
    return release;
  }

  async fetchArtifact(
    release: ResolvedRelease,
    destDir: string,
    _options?: FetchArtifactOptions
  ): Promise<string> {
    this.fetchCount++;
    if (this.gate) await this.gate;
    if (this.missing.has(release.version)) {
      throw new NotFoundError(`No artifact for ${release.version}`);
    }
    const binaryPath = path.join(destDir, 'mihomo');
    if (this.empty.has(release.version)) {
      fs.writeFileSync(binaryPath, '');
      return binaryPath;
    }
    return writeFakeBinary(binaryPath);
  }

  async listRemote(limit: number): Promise<RemoteRelease[]> {
    return [
      { version: 'v1.19.1', prerelease: true, publishedAt: '2026-09-02T10:00:00Z' },
      { version: 'v1.19.0', prerelease: false, publishedAt: '2026-08-20T10:00:00Z' },
    ].slice(0, limit);
  }
}
