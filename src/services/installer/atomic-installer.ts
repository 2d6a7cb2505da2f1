/**
 * Atomic Installer - places a verified artifact and publishes it.
 *
 * Managed mode:
 * 1. Write the artifact into a fresh staging directory
 * 2. Set the execute bit
 * 3. Create `versions/<version>/` if absent
 * 4. Rename the staged file into it
 * 5. Swap the CurrentPointer (the single publish point)
 * 6. Publish the launcher wrapper and upsert settings
 * 7. Remove the staging directory, whatever happened
 *
 * Nothing before step 5 is visible to users of the previous version.
 *
 * Self-install mode stops after step 4 and hands placement to the binary
 * (`squirrel self install`). Packaged mode writes the binary beside the
 * launcher instead of into the install root.
 */

import { randomBytes } from "node:crypto";
import { basename, dirname, join, relative } from "node:path";
import {
  ConfigError,
  FileSystemError,
  InstallFailedError,
  getErrorMessage,
  type InstallStep,
} from "../errors.js";
import type { VerifiedArtifact } from "../integrity/index.js";
import type { Logger } from "../logging/index.js";
import type { FileSystemLayer } from "../platform/filesystem.js";
import type { PathProvider } from "../platform/path-provider.js";
import type { PlatformInfo } from "../platform/platform-info.js";
import type { ProcessRunner } from "../platform/process.js";
import type { ReleaseChannel } from "../release/types.js";
import { toError } from "../../shared/error-utils.js";
import {
  generateLauncherScript,
  isManagedLauncherScript,
  launcherScriptName,
} from "./launcher-script.js";
import type { SettingsStore } from "./settings-store.js";

export type InstallMode = "managed" | "self-install" | "packaged";

export interface ManagedInstallRequest {
  readonly mode: "managed";
  readonly tag: string;
  readonly artifact: VerifiedArtifact;
  readonly channel: ReleaseChannel;
  /** Directory for the launcher wrapper; null skips publishing */
  readonly binDir: string | null;
}

export interface SelfInstallRequest {
  readonly mode: "self-install";
  readonly tag: string;
  readonly artifact: VerifiedArtifact;
  /** Passed on as `--bin-dir` */
  readonly binDir?: string | undefined;
}

export interface PackagedInstallRequest {
  readonly mode: "packaged";
  readonly tag: string;
  readonly artifact: VerifiedArtifact;
  /** Directory beside the launcher that receives the fallback copy */
  readonly targetDir: string;
}

export type InstallRequest = ManagedInstallRequest | SelfInstallRequest | PackagedInstallRequest;

export interface InstallResult {
  readonly mode: InstallMode;
  readonly tag: string;
  /** Tag without its leading "v" */
  readonly version: string;
  /** Where the binary now lives */
  readonly binaryPath: string;
  /** Version the CurrentPointer named before this install */
  readonly previousVersion: string | null;
  /** Launcher wrapper written or confirmed; null when none was published */
  readonly launcherPath: string | null;
}

export interface AtomicInstallerDeps {
  readonly fileSystem: FileSystemLayer;
  readonly processRunner: ProcessRunner;
  readonly pathProvider: PathProvider;
  readonly platformInfo: PlatformInfo;
  readonly settingsStore: SettingsStore;
  readonly logger: Logger;
  /** Clock for `last_update_check`. Default: current time */
  readonly now?: () => Date;
}

/**
 * Version directory name for a tag: one leading "v" removed.
 *
 * @throws ConfigError when the result is not a plain directory name
 */
export function numericVersion(tag: string): string {
  const version = tag.startsWith("v") ? tag.slice(1) : tag;
  if (version === "" || version === "." || version === ".." || /[\\/]/.test(version)) {
    throw new ConfigError(`Invalid version tag: "${tag}"`, [
      'Pass a release tag such as "v1.2.0".',
    ]);
  }
  return version;
}

export class AtomicInstaller {
  private readonly now: () => Date;

  constructor(private readonly deps: AtomicInstallerDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * @throws InstallFailedError naming the failing step
   */
  async install(request: InstallRequest): Promise<InstallResult> {
    const result =
      request.mode === "packaged"
        ? await this.installPackaged(request)
        : await this.installVersioned(request);
    this.deps.logger.info("Installed", {
      tag: result.tag,
      mode: result.mode,
      path: result.binaryPath,
      previous: result.previousVersion,
    });
    return result;
  }

  /**
   * Version named by the CurrentPointer, or null when nothing is installed.
   */
  async getCurrentVersion(): Promise<string | null> {
    try {
      const target = await this.deps.fileSystem.readlink(this.deps.pathProvider.currentPointerPath);
      return basename(target);
    } catch (error) {
      if (error instanceof FileSystemError && error.fsCode === "ENOENT") {
        return null;
      }
      throw error;
    }
  }

  /**
   * Installed version directories, sorted by name.
   */
  async listInstalledVersions(): Promise<readonly string[]> {
    try {
      const entries = await this.deps.fileSystem.readdir(this.deps.pathProvider.versionsDir);
      return entries
        .filter((entry) => entry.isDirectory)
        .map((entry) => entry.name)
        .sort();
    } catch (error) {
      if (error instanceof FileSystemError && error.fsCode === "ENOENT") {
        return [];
      }
      throw error;
    }
  }

  private async installVersioned(
    request: ManagedInstallRequest | SelfInstallRequest
  ): Promise<InstallResult> {
    const { fileSystem, pathProvider } = this.deps;
    const version = numericVersion(request.tag);
    const previousVersion = await this.getCurrentVersion();
    const versionDir = pathProvider.versionDir(version);
    const binaryPath = join(versionDir, pathProvider.binaryName);

    const workDir = await this.runStep("stage", async () => {
      await fileSystem.mkdir(pathProvider.stagingDir);
      return fileSystem.mkdtemp(pathProvider.stagingDir, "install-");
    });

    try {
      const staged = join(workDir, pathProvider.binaryName);
      await this.runStep("stage", () => fileSystem.writeFileBuffer(staged, request.artifact.bytes));
      await this.runStep("chmod", () => fileSystem.makeExecutable(staged));
      const created = await this.runStep("create-version-dir", () =>
        this.ensureDirectory(versionDir)
      );
      await this.runStep("move", async () => {
        try {
          await fileSystem.rename(staged, binaryPath);
        } catch (error) {
          if (created) {
            await this.removeQuietly(versionDir);
          }
          throw error;
        }
      });

      if (request.mode === "self-install") {
        await this.runSelfInstall(binaryPath, request.binDir);
        return {
          mode: "self-install",
          tag: request.tag,
          version,
          binaryPath,
          previousVersion,
          launcherPath: null,
        };
      }

      await this.runStep("swap-pointer", () => this.swapPointer(versionDir));
      const binDir = request.binDir;
      const launcherPath =
        binDir === null ? null : await this.runStep("publish", () => this.publishLauncher(binDir));
      await this.runStep("persist-settings", () =>
        this.deps.settingsStore.update({
          channel: request.channel,
          current_version: version,
          last_update_check: this.now().toISOString(),
        })
      );

      return {
        mode: "managed",
        tag: request.tag,
        version,
        binaryPath,
        previousVersion,
        launcherPath,
      };
    } finally {
      await this.removeQuietly(workDir);
    }
  }

  private async installPackaged(request: PackagedInstallRequest): Promise<InstallResult> {
    const { fileSystem, pathProvider } = this.deps;
    const version = numericVersion(request.tag);
    const binaryPath = join(request.targetDir, pathProvider.binaryName);

    // Staged next to the target so the final rename stays on one filesystem
    const workDir = await this.runStep("stage", async () => {
      await fileSystem.mkdir(request.targetDir);
      return fileSystem.mkdtemp(request.targetDir, ".staging-");
    });

    try {
      const staged = join(workDir, pathProvider.binaryName);
      await this.runStep("stage", () => fileSystem.writeFileBuffer(staged, request.artifact.bytes));
      await this.runStep("chmod", () => fileSystem.makeExecutable(staged));
      await this.runStep("move", () => fileSystem.rename(staged, binaryPath));
    } finally {
      await this.removeQuietly(workDir);
    }

    return {
      mode: "packaged",
      tag: request.tag,
      version,
      binaryPath,
      previousVersion: null,
      launcherPath: null,
    };
  }

  /**
   * Point `current` at `versionDir`.
   *
   * Unix: a new link is created beside `current` and renamed over it, one
   * rename(2). Windows: see replaceJunction; a reader can briefly find no
   * pointer.
   */
  private async swapPointer(versionDir: string): Promise<void> {
    const { fileSystem, pathProvider, platformInfo, logger } = this.deps;
    const pointer = pathProvider.currentPointerPath;

    if (platformInfo.platform === "win32") {
      await this.replaceJunction(pointer, versionDir);
      logger.debug("Pointer replaced", { pointer, target: versionDir });
      return;
    }

    const target = relative(dirname(pointer), versionDir);
    const temp = `${pointer}.${randomBytes(4).toString("hex")}`;
    await fileSystem.symlink(target, temp);
    try {
      await fileSystem.rename(temp, pointer);
    } catch (error) {
      await this.removeQuietly(temp);
      throw error;
    }
    logger.debug("Pointer swapped", { pointer, target });
  }

  /**
   * Junctions cannot be renamed over each other. The old one is moved aside
   * and put back when the new one cannot be created.
   */
  private async replaceJunction(pointer: string, versionDir: string): Promise<void> {
    const { fileSystem, logger } = this.deps;
    const aside = `${pointer}.old-${randomBytes(4).toString("hex")}`;

    let moved = true;
    try {
      await fileSystem.rename(pointer, aside);
    } catch (error) {
      if (!(error instanceof FileSystemError && error.fsCode === "ENOENT")) {
        throw error;
      }
      moved = false;
    }

    try {
      await fileSystem.symlink(versionDir, pointer);
    } catch (error) {
      if (moved) {
        try {
          await fileSystem.rename(aside, pointer);
        } catch (restoreError) {
          logger.error("Could not restore the previous pointer", {
            pointer,
            aside,
            error: getErrorMessage(restoreError),
          });
        }
      }
      throw error;
    }

    if (moved) {
      await this.removeQuietly(aside);
    }
  }

  /**
   * Write the launcher wrapper into `binDir` unless an identical one is there.
   * A file this installer did not write is left alone.
   *
   * @returns The wrapper path, or null when an unmanaged file blocks it
   */
  private async publishLauncher(binDir: string): Promise<string | null> {
    const { fileSystem, pathProvider, platformInfo, logger } = this.deps;
    const scriptPath = join(binDir, launcherScriptName(platformInfo.platform));
    const content = generateLauncherScript(platformInfo.platform, pathProvider.currentBinaryPath);

    let existing: string | null = null;
    try {
      existing = await fileSystem.readFile(scriptPath);
    } catch (error) {
      if (!(error instanceof FileSystemError && error.fsCode === "ENOENT")) {
        throw error;
      }
    }

    if (existing === content) {
      return scriptPath;
    }
    if (existing !== null && !isManagedLauncherScript(existing)) {
      logger.warn("Not replacing a launcher this installer did not write", { path: scriptPath });
      return null;
    }

    await fileSystem.mkdir(binDir);
    const temp = `${scriptPath}.${process.pid}.tmp`;
    await fileSystem.writeFile(temp, content);
    await fileSystem.makeExecutable(temp);
    await fileSystem.rename(temp, scriptPath);
    logger.debug("Launcher published", { path: scriptPath });
    return scriptPath;
  }

  private async runSelfInstall(binaryPath: string, binDir: string | undefined): Promise<void> {
    const args = ["self", "install", ...(binDir !== undefined ? ["--bin-dir", binDir] : [])];
    this.deps.logger.info("Running self-install", { binary: binaryPath, binDir: binDir ?? null });

    const result = await this.deps.processRunner.run(binaryPath, args, { stdio: "inherit" }).wait();

    if (result.spawnError !== undefined) {
      throw new InstallFailedError(
        "self-install",
        `Could not start ${binaryPath}: ${result.spawnError}`
      );
    }
    if (result.signal !== undefined) {
      throw new InstallFailedError("self-install", `Self-install was terminated by ${result.signal}`);
    }
    if (result.exitCode !== 0) {
      const exitCode = result.exitCode ?? 1;
      throw new InstallFailedError(
        "self-install",
        `Self-install exited with code ${exitCode}`,
        undefined,
        exitCode
      );
    }
  }

  /**
   * @returns true when the directory was created by this call
   */
  private async ensureDirectory(path: string): Promise<boolean> {
    try {
      await this.deps.fileSystem.access(path, "exists");
      return false;
    } catch (error) {
      if (!(error instanceof FileSystemError && error.fsCode === "ENOENT")) {
        throw error;
      }
    }
    await this.deps.fileSystem.mkdir(path);
    return true;
  }

  private async runStep<T>(step: InstallStep, action: () => Promise<T>): Promise<T> {
    try {
      return await action();
    } catch (error) {
      if (error instanceof InstallFailedError) {
        throw error;
      }
      this.deps.logger.error("Install step failed", { step, error: getErrorMessage(error) });
      throw new InstallFailedError(
        step,
        `Install failed at step "${step}": ${getErrorMessage(error)}`,
        toError(error)
      );
    }
  }

  private async removeQuietly(path: string): Promise<void> {
    try {
      await this.deps.fileSystem.rm(path, { recursive: true, force: true });
    } catch (error) {
      this.deps.logger.debug("Cleanup failed", { path, error: getErrorMessage(error) });
    }
  }
}
