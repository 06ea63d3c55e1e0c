export { ConfigManager, controllerUrl, setTopLevelKey, DEFAULT_PROFILE, PREFERRED_CONTROLLER_PORT } from './config-manager';
export type {
  ControllerInfo,
  EnsureControllerResult,
  EnsureDefaultResult,
  ProfileSummary,
  ProfileUsageProbe,
  RestoreOptions,
  RestoreResult,
} from './config-manager';
export { BackupStore, backupStamp, isValidBackupId } from './backup-store';
export type { Backup } from './backup-store';
export { ProfileStore, assertValidProfileName, isValidProfileName, profileNameOf } from './profile-store';
export type { Profile } from './profile-store';
export { validateProfileContent, parseProfileYaml, INBOUND_PORT_KEYS } from './profile-schema';
export type { ProfileDocument } from './profile-schema';
export { loadSettings, parseSettings, defaultSettings, DEFAULT_API_BASE, DEFAULT_DOWNLOAD_BASE } from './settings';
export type { ManagerSettings } from './settings';
