/**
 * Home directory resolution.
 *
 * Resolved once per invocation and handed to every component constructor;
 * nothing else reads MIHOMO_HOME.
 */

import * as os from 'os';
import * as path from 'path';

export const HOME_ENV_VAR = 'MIHOMO_HOME';
export const APP_DIR_NAME = 'mihomo-manager';

export type HomeSource = 'override' | 'env' | 'default';

export interface HomeResolveOptions {
  /** Explicit directory, e.g. from --home */
  home?: string;
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
}

/**
 * Platform config directory used when neither an override nor MIHOMO_HOME is set.
 */
export function getPlatformConfigDir(
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform
): string {
  if (platform === 'win32') {
    const appData = env.APPDATA || path.join(os.homedir(), 'AppData', 'Roaming');
    return path.join(appData, APP_DIR_NAME);
  }
  if (platform === 'darwin') {
    return path.join(os.homedir(), 'Library', 'Application Support', APP_DIR_NAME);
  }
  const xdg = env.XDG_CONFIG_HOME;
  const base = xdg && path.isAbsolute(xdg) ? xdg : path.join(os.homedir(), '.config');
  return path.join(base, APP_DIR_NAME);
}

function expandHome(dir: string): string {
  if (dir === '~') return os.homedir();
  if (dir.startsWith('~/') || dir.startsWith('~\\')) {
    return path.join(os.homedir(), dir.slice(2));
  }
  return dir;
}

export class HomeContext {
  readonly root: string;
  readonly source: HomeSource;

  constructor(root: string, source: HomeSource = 'override') {
    this.root = path.resolve(expandHome(root));
    this.source = source;
  }

  static resolve(options: HomeResolveOptions = {}): HomeContext {
    if (options.home && options.home.trim()) {
      return new HomeContext(options.home.trim(), 'override');
    }
    const env = options.env ?? process.env;
    const fromEnv = env[HOME_ENV_VAR];
    if (fromEnv && fromEnv.trim()) {
      return new HomeContext(fromEnv.trim(), 'env');
    }
    return new HomeContext(getPlatformConfigDir(env, options.platform), 'default');
  }

  get versionsDir(): string {
    return path.join(this.root, 'versions');
  }

  get defaultVersionPointer(): string {
    return path.join(this.versionsDir, 'default');
  }

  get configsDir(): string {
    return path.join(this.root, 'configs');
  }

  get currentProfilePointer(): string {
    return path.join(this.configsDir, 'current');
  }

  get backupsDir(): string {
    return path.join(this.root, 'backups');
  }

  get settingsFile(): string {
    return path.join(this.root, 'config.toml');
  }

  get pidFile(): string {
    return path.join(this.root, 'mihomo.pid');
  }

  get logsDir(): string {
    return path.join(this.root, 'logs');
  }

  get serviceLogFile(): string {
    return path.join(this.logsDir, 'mihomo.log');
  }

  get cacheDir(): string {
    return path.join(this.root, '.cache');
  }

  versionDir(version: string): string {
    return path.join(this.versionsDir, version);
  }

  profilePath(name: string): string {
    return path.join(this.configsDir, `${name}.yaml`);
  }
}
