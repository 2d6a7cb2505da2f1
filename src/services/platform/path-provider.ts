import { join } from "node:path";
import type { PlatformInfo } from "./platform-info.js";

/** Base name of the installed binary, without extension. */
export const BINARY_BASENAME = "squirrel";

/**
 * Binary filename for a platform: `squirrel.exe` on Windows, `squirrel` elsewhere.
 */
export function binaryFileName(platform: NodeJS.Platform): string {
  return platform === "win32" ? `${BINARY_BASENAME}.exe` : BINARY_BASENAME;
}

/**
 * Installer path provider.
 * Abstracts the platform-specific install root and everything laid out under it.
 */
export interface PathProvider {
  /** Root directory owned by the installer */
  readonly installRoot: string;

  /** Directory holding one subdirectory per installed version: `<root>/versions/` */
  readonly versionsDir: string;

  /** The CurrentPointer: `<root>/current` (symlink, junction on Windows) */
  readonly currentPointerPath: string;

  /** Scratch area for downloads, on the same filesystem as versionsDir: `<root>/staging/` */
  readonly stagingDir: string;

  /** Persisted installer settings: `<root>/settings.json` */
  readonly settingsPath: string;

  /** Session log files: `<root>/logs/` */
  readonly logsDir: string;

  /** `squirrel` or `squirrel.exe` */
  readonly binaryName: string;

  /** Absolute path of the binary behind the CurrentPointer */
  readonly currentBinaryPath: string;

  /**
   * User-local bin directories, in preference order (Windows: `<root>/bin`).
   * The first existing, writable entry receives the launcher wrapper; if none
   * exists the first entry is created.
   */
  readonly defaultBinDirs: readonly string[];

  /**
   * Directory for one installed version.
   * @param version Numeric version (tag without leading "v")
   * @returns `<root>/versions/<version>/`
   */
  versionDir(version: string): string;
}

/**
 * Default PathProvider implementation.
 *
 * Install root:
 * - Linux: `~/.local/share/squirrel/`
 * - macOS: `~/Library/Application Support/squirrel/`
 * - Windows: `<home>/AppData/Local/squirrel/`
 *
 * An explicit root (SQUIRREL_HOME) replaces the platform default.
 */
export class DefaultPathProvider implements PathProvider {
  readonly installRoot: string;
  readonly versionsDir: string;
  readonly currentPointerPath: string;
  readonly stagingDir: string;
  readonly settingsPath: string;
  readonly logsDir: string;
  readonly binaryName: string;
  readonly currentBinaryPath: string;
  readonly defaultBinDirs: readonly string[];

  constructor(platformInfo: PlatformInfo, installRootOverride?: string) {
    this.installRoot = installRootOverride ?? this.computeInstallRoot(platformInfo);
    this.versionsDir = join(this.installRoot, "versions");
    this.currentPointerPath = join(this.installRoot, "current");
    this.stagingDir = join(this.installRoot, "staging");
    this.settingsPath = join(this.installRoot, "settings.json");
    this.logsDir = join(this.installRoot, "logs");
    this.binaryName = binaryFileName(platformInfo.platform);
    this.currentBinaryPath = join(this.currentPointerPath, this.binaryName);
    this.defaultBinDirs =
      platformInfo.platform === "win32"
        ? [join(this.installRoot, "bin")]
        : [join(platformInfo.homeDir, ".local", "bin"), join(platformInfo.homeDir, "bin")];
  }

  versionDir(version: string): string {
    return join(this.versionsDir, version);
  }

  private computeInstallRoot(platformInfo: PlatformInfo): string {
    const { platform, homeDir } = platformInfo;

    switch (platform) {
      case "darwin":
        return join(homeDir, "Library", "Application Support", BINARY_BASENAME);
      case "win32":
        return join(homeDir, "AppData", "Local", BINARY_BASENAME);
      case "linux":
      default:
        return join(homeDir, ".local", "share", BINARY_BASENAME);
    }
  }
}
