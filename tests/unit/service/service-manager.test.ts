import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { HomeContext } from '../../../src/core/home-context';
import { ConfigManager } from '../../../src/config/config-manager';
import { ConflictError, NotFoundError, ProcessError } from '../../../src/errors';
import { ServiceManager } from '../../../src/service/service-manager';
import { VersionManager } from '../../../src/version/version-manager';
import {
  FakeReleaseSource,
  makeTempHome,
  removeTempHome,
  writeFakeBinary,
} from '../../helpers/fixtures';

describe.skipIf(process.platform === 'win32')('ServiceManager', () => {
  let home: HomeContext;
  let versions: VersionManager;
  let configs: ConfigManager;
  let service: ServiceManager;

  beforeEach(() => {
    home = makeTempHome();
    versions = new VersionManager(home, { source: new FakeReleaseSource() });
    configs = new ConfigManager(home);
    service = new ServiceManager(home, versions, configs, {
      probeMs: 300,
      gracePeriodMs: 1000,
      killTimeoutMs: 1000,
      pollIntervalMs: 20,
    });
  });

  afterEach(async () => {
    await service.stop();
    removeTempHome(home);
  });

  async function installDefault(version = 'v1.19.0'): Promise<void> {
    await versions.install(version);
    await versions.setDefault(version);
  }

  it('starts the default version with the current profile', async () => {
    await installDefault();

    const started = await service.start();

    expect(started.version).toBe('v1.19.0');
    expect(started.binaryPath).toBe(path.join(home.versionDir('v1.19.0'), 'mihomo'));
    expect(started.profile).toBe('default');
    expect(started.configPath).toBe(home.profilePath('default'));
    expect(started.controller.address).toMatch(/^127\.0\.0\.1:\d+$/);

    const report = await service.status();
    expect(report.state.status).toBe('running');
    expect(report.version).toBe('v1.19.0');
    expect(report.configPath).toBe(home.profilePath('default'));
    expect(report.startedAt).toBeGreaterThan(0);

    await expect(service.controller()).resolves.toEqual({
      url: started.controller.url,
      address: started.controller.address,
      secret: started.controller.secret,
    });
  });

  it('requires a default version', async () => {
    await expect(service.start()).rejects.toThrow(
      new NotFoundError('No default version set (run: mihomo-manager install)')
    );
  });

  it('protects the running version and profile', async () => {
    await installDefault();
    await service.start();

    await expect(versions.uninstall('v1.19.0')).rejects.toBeInstanceOf(ConflictError);
    await expect(configs.deleteProfile('default')).rejects.toBeInstanceOf(ConflictError);

    await service.stop();
    await expect(versions.uninstall('v1.19.0')).resolves.toBeUndefined();
  });

  it('keeps the running binary until restart picks up the new default', async () => {
    await installDefault('v1.19.0');
    const first = await service.start();
    await installDefault('v1.19.1');

    expect((await service.status()).version).toBe('v1.19.0');

    const restarted = await service.restart();

    expect(restarted.version).toBe('v1.19.1');
    expect(restarted.pid).not.toBe(first.pid);
    expect((await service.status()).version).toBe('v1.19.1');
  });

  it('reports a binary that exits at once as a process error', async () => {
    await installDefault();
    writeFakeBinary(await versions.getBinaryPath('v1.19.0'), 'exit');

    const err = await service.start().catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ProcessError);
    expect(err).toMatchObject({
      message: 'Cannot start mihomo v1.19.0: mihomo failed to start: exited with code 3\nconfig error',
    });
    expect(fs.existsSync(home.pidFile)).toBe(false);
    expect((await service.status()).state.status).toBe('stopped');
  });

  it('reports stopped with no record', async () => {
    await expect(service.status()).resolves.toEqual({
      state: { status: 'stopped' },
      version: null,
      configPath: null,
      startedAt: null,
    });
  });
});
