/**
 * Binary Locator - finds the real squirrel binary for the launcher.
 */

import { join, win32 } from "node:path";
import { BinaryNotFoundError, getErrorMessage } from "../errors.js";
import type { Logger } from "../logging/index.js";
import type { FileSystemLayer } from "../platform/filesystem.js";
import type { PathProvider } from "../platform/path-provider.js";
import type { PlatformInfo } from "../platform/platform-info.js";

export interface CandidateLocationOptions {
  readonly platformInfo: PlatformInfo;
  readonly pathProvider: PathProvider;
  /** Directory holding the launcher, where a packaged copy may sit */
  readonly launcherDir: string;
  /** %ProgramFiles%, Windows only */
  readonly programFiles?: string | undefined;
}

/**
 * Ordered candidate paths: user-local bin, the managed install, system-wide
 * directories, then the packaged copy beside the launcher.
 */
export function candidateLocations(options: CandidateLocationOptions): readonly string[] {
  const { platformInfo, pathProvider, launcherDir } = options;
  const name = pathProvider.binaryName;
  const userBin = join(platformInfo.homeDir, ".local", "bin", name);
  const managed = pathProvider.currentBinaryPath;
  const packaged = join(launcherDir, name);

  switch (platformInfo.platform) {
    case "win32": {
      const programFiles = options.programFiles ?? "C:\\Program Files";
      return [userBin, managed, win32.join(programFiles, "squirrel", name), packaged];
    }
    case "darwin":
      return [
        userBin,
        managed,
        `/usr/local/bin/${name}`,
        `/opt/homebrew/bin/${name}`,
        `/usr/bin/${name}`,
        packaged,
      ];
    default:
      return [userBin, managed, `/usr/local/bin/${name}`, `/usr/bin/${name}`, packaged];
  }
}

export class BinaryLocator {
  constructor(
    private readonly fileSystem: FileSystemLayer,
    private readonly platformInfo: PlatformInfo,
    private readonly logger: Logger
  ) {}

  /**
   * First candidate that exists (and is executable, outside Windows).
   * A candidate that resolves to the launcher itself is skipped.
   *
   * @param launcherPath - Path the launcher was started from
   * @throws BinaryNotFoundError listing every candidate
   */
  async locate(candidates: readonly string[], launcherPath: string): Promise<string> {
    const self = await this.realpathOrNull(launcherPath);

    for (const candidate of candidates) {
      if (!(await this.isRunnable(candidate))) {
        this.logger.silly("Candidate not usable", { path: candidate });
        continue;
      }
      if (self !== null && (await this.realpathOrNull(candidate)) === self) {
        this.logger.debug("Skipping candidate that is the launcher", { path: candidate });
        continue;
      }
      this.logger.debug("Located binary", { path: candidate });
      return candidate;
    }

    throw new BinaryNotFoundError(candidates);
  }

  private async isRunnable(path: string): Promise<boolean> {
    const mode = this.platformInfo.platform === "win32" ? "exists" : "execute";
    try {
      await this.fileSystem.access(path, mode);
      return true;
    } catch {
      return false;
    }
  }

  private async realpathOrNull(path: string): Promise<string | null> {
    try {
      return await this.fileSystem.realpath(path);
    } catch (error) {
      this.logger.silly("Cannot resolve path", { path, error: getErrorMessage(error) });
      return null;
    }
  }
}
