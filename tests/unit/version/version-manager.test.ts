import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { HomeContext } from '../../../src/core/home-context';
import { VersionManager } from '../../../src/version/version-manager';
import { VersionStore } from '../../../src/version/version-store';
import {
  ConflictError,
  IOError,
  NotFoundError,
  ValidationError,
} from '../../../src/errors';
import { FakeReleaseSource, makeTempHome, removeTempHome } from '../../helpers/fixtures';

/** Store whose final rename never happens, as if the process died right before it */
class InterruptedStore extends VersionStore {
  protected renameDir(): Promise<void> {
    return Promise.reject(new Error('simulated crash before rename'));
  }
}

/** Store whose cleanup of old staging directories always fails */
class UnsweepableStore extends VersionStore {
  sweepStaging(): Promise<number> {
    return Promise.reject(new IOError('Cannot read versions directory'));
  }
}

describe('VersionManager', () => {
  let home: HomeContext;
  let source: FakeReleaseSource;
  let manager: VersionManager;

  beforeEach(() => {
    home = makeTempHome();
    source = new FakeReleaseSource();
    manager = new VersionManager(home, { source });
  });

  afterEach(() => {
    removeTempHome(home);
  });

  describe('install', () => {
    it('publishes an executable binary with its marker', async () => {
      const result = await manager.install('v1.19.0');

      expect(result.downloaded).toBe(true);
      expect(result.version.version).toBe('v1.19.0');
      expect(result.version.tag).toBe('v1.19.0');
      expect(result.version.binaryPath).toBe(path.join(home.versionDir('v1.19.0'), 'mihomo'));
      expect(fs.existsSync(path.join(home.versionDir('v1.19.0'), '.published'))).toBe(true);
      if (process.platform !== 'win32') {
        expect(fs.statSync(result.version.binaryPath).mode & 0o111).not.toBe(0);
      }
    });

    it('is idempotent: a second install downloads nothing', async () => {
      await manager.install('v1.19.0');
      const second = await manager.install('v1.19.0');

      expect(second.downloaded).toBe(false);
      expect(source.fetchCount).toBe(1);
      expect((await manager.list()).map((v) => v.version)).toEqual(['v1.19.0']);
    });

    it('resolves channel names case-insensitively', async () => {
      const result = await manager.install('Stable');

      expect(result.version.version).toBe('v1.19.0');
      expect(source.resolveCount).toBe(1);
    });

    it('stores nightly builds under the rolling tag', async () => {
      const result = await manager.install('nightly');

      expect(result.version.version).toBe('alpha-abc1234');
      expect(result.version.tag).toBe('Prerelease-Alpha');
    });

    it('lets concurrent installs of one id both succeed with one directory', async () => {
      let release: () => void = () => undefined;
      source.gate = new Promise((resolve) => {
        release = resolve;
      });

      const first = manager.install('v1.19.0');
      const second = manager.install('v1.19.0');
      await new Promise((resolve) => setTimeout(resolve, 50));
      release();
      const results = await Promise.all([first, second]);

      expect(results.map((r) => r.version.version)).toEqual(['v1.19.0', 'v1.19.0']);
      expect(source.fetchCount).toBe(2);
      expect(fs.readdirSync(home.versionsDir)).toEqual(['v1.19.0']);
    });

    it('installs even when the staging cleanup fails', async () => {
      const unswept = new VersionManager(home, { source, store: new UnsweepableStore(home) });

      const result = await unswept.install('v1.19.0');

      expect(result.downloaded).toBe(true);
      expect(result.version.version).toBe('v1.19.0');
      expect(fs.readdirSync(home.versionsDir)).toEqual(['v1.19.0']);
    });

    it('leaves nothing visible when interrupted before the rename', async () => {
      const interrupted = new VersionManager(home, { source, store: new InterruptedStore(home) });

      const error = await interrupted.install('v1.19.0').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(IOError);
      expect(String(error)).toContain('Install v1.19.0 failed: simulated crash before rename');
      expect(await manager.list()).toEqual([]);
      expect(fs.readdirSync(home.versionsDir)).toEqual([]);
      expect(await manager.getDefault()).toBeNull();
    });

    it('rejects an empty artifact and publishes nothing', async () => {
      source.empty.add('v1.19.0');

      await expect(manager.install('v1.19.0')).rejects.toBeInstanceOf(ValidationError);
      expect(await manager.list()).toEqual([]);
    });

    it('reports a missing artifact as NotFoundError', async () => {
      source.missing.add('v9.9.9');

      await expect(manager.install('v9.9.9')).rejects.toBeInstanceOf(NotFoundError);
      expect(fs.readdirSync(home.versionsDir)).toEqual([]);
    });

    it('rejects ids that could escape the versions directory', async () => {
      await expect(manager.install('../evil')).rejects.toBeInstanceOf(ValidationError);
      await expect(manager.install('default')).rejects.toBeInstanceOf(ValidationError);
      expect(source.fetchCount).toBe(0);
    });
  });

  describe('default pointer', () => {
    it('refuses to point at a version that is not installed', async () => {
      await expect(manager.setDefault('v1.19.0')).rejects.toBeInstanceOf(NotFoundError);
      expect(fs.existsSync(home.defaultVersionPointer)).toBe(false);
    });

    it('switches atomically and is reflected in list()', async () => {
      await manager.install('v1.19.0');
      await manager.install('v1.19.1');
      await manager.setDefault('v1.19.1');

      expect(await manager.getDefault()).toBe('v1.19.1');
      const flags = (await manager.list()).map((v) => [v.version, v.isDefault]);
      expect(flags).toContainEqual(['v1.19.1', true]);
      expect(flags).toContainEqual(['v1.19.0', false]);
    });

    it('reads a pointer to a vanished directory as unset', async () => {
      await manager.install('v1.19.0');
      await manager.setDefault('v1.19.0');
      fs.rmSync(home.versionDir('v1.19.0'), { recursive: true });

      expect(await manager.getDefault()).toBeNull();
      await expect(manager.getBinaryPath()).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('uninstall', () => {
    it('clears the default pointer when it referenced the version', async () => {
      await manager.install('v1.19.0');
      await manager.setDefault('v1.19.0');

      await manager.uninstall('v1.19.0');

      expect(fs.existsSync(home.versionDir('v1.19.0'))).toBe(false);
      expect(fs.existsSync(home.defaultVersionPointer)).toBe(false);
    });

    it('keeps the default pointer when another version is removed', async () => {
      await manager.install('v1.19.0');
      await manager.install('v1.19.1');
      await manager.setDefault('v1.19.0');

      await manager.uninstall('v1.19.1');

      expect(await manager.getDefault()).toBe('v1.19.0');
    });

    it('refuses while the running service uses the version', async () => {
      await manager.install('v1.19.0');
      manager.setUsageProbe({ isVersionInUse: async (v) => v === 'v1.19.0' });

      await expect(manager.uninstall('v1.19.0')).rejects.toBeInstanceOf(ConflictError);
      expect(fs.existsSync(home.versionDir('v1.19.0'))).toBe(true);
    });

    it('reports unknown versions as NotFoundError', async () => {
      await expect(manager.uninstall('v0.0.1')).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  it('lists remote releases through the source', async () => {
    const releases = await manager.listRemote(1);
    expect(releases).toEqual([
      { version: 'v1.19.1', prerelease: true, publishedAt: '2026-09-02T10:00:00Z' },
    ]);
  });
});
