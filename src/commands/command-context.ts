/**
 * Command Context
 *
 * Everything a command handler needs, built once per invocation from the
 * resolved home directory and its settings.
 */

import { HomeContext } from '../core/home-context';
import { ManagerSettings, loadSettings } from '../config/settings';
import { ConfigManager } from '../config/config-manager';
import { VersionManager } from '../version/version-manager';
import { GitHubReleaseSource, ReleaseSource } from '../version/release-source';
import { ServiceManager } from '../service/service-manager';
import { ControlPlaneClient } from '../client/control-plane-client';

export interface CommandContext {
  home: HomeContext;
  settings: ManagerSettings;
  versions: VersionManager;
  configs: ConfigManager;
  service: ServiceManager;
  /** Client for the running instance, else for the current profile's controller */
  client(): Promise<ControlPlaneClient>;
}

export interface CommandContextOverrides {
  settings?: ManagerSettings;
  source?: ReleaseSource;
}

export function createCommandContext(
  home: HomeContext,
  overrides: CommandContextOverrides = {}
): CommandContext {
  const settings = overrides.settings ?? loadSettings(home);
  const source =
    overrides.source ??
    new GitHubReleaseSource({
      apiBase: settings.download.api_base,
      downloadBase: settings.download.download_base,
      maxRetries: settings.download.max_retries,
      timeoutMs: settings.download.timeout_ms,
      home,
    });

  const versions = new VersionManager(home, { source });
  const configs = new ConfigManager(home);
  const service = new ServiceManager(home, versions, configs, {
    probeMs: settings.service.probe_ms,
    gracePeriodMs: settings.service.grace_period_ms,
    killTimeoutMs: settings.service.kill_timeout_ms,
  });

  return {
    home,
    settings,
    versions,
    configs,
    service,
    async client() {
      const controller = await service.controller();
      return new ControlPlaneClient({
        baseUrl: controller.url,
        secret: controller.secret,
        reconnect: {
          maxReconnectAttempts: settings.stream.max_reconnect_attempts,
          baseDelayMs: settings.stream.base_delay_ms,
          maxDelayMs: settings.stream.max_delay_ms,
          stableAfterMs: settings.stream.stable_after_ms,
        },
      });
    },
  };
}
