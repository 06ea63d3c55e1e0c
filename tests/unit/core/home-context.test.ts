import { describe, expect, it } from 'vitest';
import * as os from 'os';
import * as path from 'path';
import { HomeContext, getPlatformConfigDir } from '../../../src/core/home-context';

describe('HomeContext', () => {
  it('prefers an explicit override over MIHOMO_HOME', () => {
    const home = HomeContext.resolve({
      home: '/tmp/explicit-home',
      env: { MIHOMO_HOME: '/tmp/env-home' },
    });

    expect(home.root).toBe(path.resolve('/tmp/explicit-home'));
    expect(home.source).toBe('override');
  });

  it('falls back to MIHOMO_HOME', () => {
    const home = HomeContext.resolve({ env: { MIHOMO_HOME: '/tmp/env-home' } });

    expect(home.root).toBe(path.resolve('/tmp/env-home'));
    expect(home.source).toBe('env');
  });

  it('ignores a blank override', () => {
    const home = HomeContext.resolve({ home: '  ', env: { MIHOMO_HOME: '/tmp/env-home' } });
    expect(home.source).toBe('env');
  });

  it('uses XDG_CONFIG_HOME on linux when absolute', () => {
    expect(getPlatformConfigDir({ XDG_CONFIG_HOME: '/xdg' }, 'linux')).toBe(
      path.join('/xdg', 'mihomo-manager')
    );
    expect(getPlatformConfigDir({ XDG_CONFIG_HOME: 'relative' }, 'linux')).toBe(
      path.join(os.homedir(), '.config', 'mihomo-manager')
    );
  });

  it('uses Application Support on macOS', () => {
    expect(getPlatformConfigDir({}, 'darwin')).toBe(
      path.join(os.homedir(), 'Library', 'Application Support', 'mihomo-manager')
    );
  });

  it('expands a leading tilde', () => {
    const home = new HomeContext('~/mm');
    expect(home.root).toBe(path.join(os.homedir(), 'mm'));
  });

  it('lays out every path under the root', () => {
    const home = new HomeContext('/srv/mm');

    expect(home.versionsDir).toBe(path.join('/srv/mm', 'versions'));
    expect(home.defaultVersionPointer).toBe(path.join('/srv/mm', 'versions', 'default'));
    expect(home.configsDir).toBe(path.join('/srv/mm', 'configs'));
    expect(home.currentProfilePointer).toBe(path.join('/srv/mm', 'configs', 'current'));
    expect(home.backupsDir).toBe(path.join('/srv/mm', 'backups'));
    expect(home.settingsFile).toBe(path.join('/srv/mm', 'config.toml'));
    expect(home.pidFile).toBe(path.join('/srv/mm', 'mihomo.pid'));
    expect(home.serviceLogFile).toBe(path.join('/srv/mm', 'logs', 'mihomo.log'));
    expect(home.versionDir('v1.19.0')).toBe(path.join('/srv/mm', 'versions', 'v1.19.0'));
    expect(home.profilePath('work')).toBe(path.join('/srv/mm', 'configs', 'work.yaml'));
  });
});
