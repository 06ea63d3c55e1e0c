/**
 * Service Manager
 *
 * Resolves the default version's binary and the current profile, then
 * delegates to the ProcessSupervisor. The paths are bound at spawn time:
 * switching the default version or the current profile does not touch a
 * running process until restart().
 */

import * as path from 'path';
import { HomeContext } from '../core/home-context';
import { NotFoundError, withContext } from '../errors';
import { VersionManager, VersionUsageProbe } from '../version/version-manager';
import { ConfigManager, ControllerInfo, ProfileUsageProbe } from '../config/config-manager';
import { PidRecord } from './pid-record';
import { ProcessSupervisor, ServiceState, SupervisorOptions } from './process-supervisor';
import { createLogger } from '../utils/logger';

const log = createLogger('service');

export interface LaunchTarget {
  version: string;
  binaryPath: string;
  profile: string;
  configPath: string;
  controller: ControllerInfo;
}

export interface StartResult extends LaunchTarget {
  pid: number;
}

export interface ServiceStatusReport {
  state: ServiceState;
  /** Version directory name of the running binary, when it is a managed one */
  version: string | null;
  configPath: string | null;
  startedAt: number | null;
}

export class ServiceManager implements VersionUsageProbe, ProfileUsageProbe {
  readonly supervisor: ProcessSupervisor;

  constructor(
    private readonly home: HomeContext,
    private readonly versions: VersionManager,
    private readonly configs: ConfigManager,
    supervisor: ProcessSupervisor | SupervisorOptions = {}
  ) {
    this.supervisor =
      supervisor instanceof ProcessSupervisor ? supervisor : new ProcessSupervisor(home, supervisor);
    versions.setUsageProbe(this);
    configs.setUsageProbe(this);
  }

  /**
   * Binary, profile and controller the next start would use.
   */
  async resolveLaunchTarget(): Promise<LaunchTarget> {
    const version = await this.versions.getDefault();
    if (!version) {
      throw new NotFoundError('No default version set (run: mihomo-manager install)');
    }
    const binaryPath = await this.versions.getBinaryPath(version);

    const { current } = await this.configs.ensureDefaultConfig();
    const configPath = await this.configs.getCurrentPath();
    await this.configs.validate(configPath);
    const controller = await this.configs.ensureExternalController(current);

    return { version, binaryPath, profile: current, configPath, controller };
  }

  async start(): Promise<StartResult> {
    const target = await this.resolveLaunchTarget();
    try {
      const record = await this.supervisor.start(target.binaryPath, target.configPath);
      log.debug(`Started ${target.version} with ${target.profile} (PID ${record.pid})`);
      return { ...target, pid: record.pid };
    } catch (error) {
      throw withContext(error, `Cannot start mihomo ${target.version}`);
    }
  }

  async stop(): Promise<void> {
    try {
      await this.supervisor.stop();
    } catch (error) {
      throw withContext(error, 'Cannot stop mihomo');
    }
  }

  /**
   * Stop, then start with the default version and current profile as they are now.
   */
  async restart(): Promise<StartResult> {
    const target = await this.resolveLaunchTarget();
    try {
      const record = await this.supervisor.restart(target.binaryPath, target.configPath);
      return { ...target, pid: record.pid };
    } catch (error) {
      throw withContext(error, `Cannot restart mihomo ${target.version}`);
    }
  }

  async status(): Promise<ServiceStatusReport> {
    const state = await this.supervisor.status();
    const record = state.status === 'running' ? state.record : null;
    return {
      state,
      version: record ? this.versionOf(record) : null,
      configPath: record?.configPath || null,
      startedAt: record?.startedAt || null,
    };
  }

  /**
   * Controller of the running instance, else of the current profile.
   */
  async controller(): Promise<ControllerInfo> {
    const { state } = await this.status();
    const configPath =
      state.status === 'running' && state.record.configPath
        ? state.record.configPath
        : await this.configs.getCurrentPath();
    const info = await this.configs.readController(configPath);
    if (!info) {
      throw new NotFoundError(`No external-controller in ${configPath}`);
    }
    return info;
  }

  async isVersionInUse(version: string): Promise<boolean> {
    const record = await this.runningRecord();
    return record !== null && this.versionOf(record) === version;
  }

  async isProfileInUse(profilePath: string): Promise<boolean> {
    const record = await this.runningRecord();
    return record !== null && record.configPath === path.resolve(profilePath);
  }

  private async runningRecord(): Promise<PidRecord | null> {
    const state = await this.supervisor.status();
    return state.status === 'running' ? state.record : null;
  }

  private versionOf(record: PidRecord): string | null {
    const relative = path.relative(this.home.versionsDir, record.binaryPath);
    if (!relative || relative.startsWith('..') || path.isAbsolute(relative)) return null;
    return relative.split(path.sep)[0];
  }
}
