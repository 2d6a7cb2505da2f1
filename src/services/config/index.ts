/**
 * Installer configuration module.
 */

export {
  loadInstallerConfig,
  parseChannel,
  type ConfiguredInstallMode,
  type InstallerConfig,
} from "./installer-config.js";
