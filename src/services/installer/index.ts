/**
 * Installer module exports.
 */

export {
  AtomicInstaller,
  numericVersion,
  type AtomicInstallerDeps,
  type InstallMode,
  type InstallRequest,
  type InstallResult,
  type ManagedInstallRequest,
  type PackagedInstallRequest,
  type SelfInstallRequest,
} from "./atomic-installer.js";
export { BinDirResolver, type BinDirChoice } from "./bin-dir.js";
export {
  WRAPPER_MARKER,
  generateLauncherScript,
  isManagedLauncherScript,
  launcherScriptName,
} from "./launcher-script.js";
export { SettingsStore, type SettingsRecord, type SettingsUpdate } from "./settings-store.js";
