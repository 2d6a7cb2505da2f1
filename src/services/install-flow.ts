/**
 * Install flow - orchestrates one install from version resolution to advice.
 *
 * Version Resolver -> Platform Id -> Manifest Resolver -> fetch artifact ->
 * Integrity Verifier -> Atomic Installer -> companion skill -> Path Advisor
 *
 * Every step before the installer is read-only, so a failure there (checksum
 * mismatch included) leaves the install root untouched.
 */

import { ConfigError, getErrorMessage } from "./errors.js";
import type { DownloadProgress, ResilientFetcher } from "./fetcher/index.js";
import type {
  AtomicInstaller,
  BinDirResolver,
  InstallMode,
  InstallRequest,
  SettingsStore,
} from "./installer/index.js";
import { VerifiedArtifact } from "./integrity/index.js";
import type { Logger } from "./logging/index.js";
import type { PathAdvice, PathAdvisor } from "./path-advisor/index.js";
import type { PlatformId, PlatformIdResolver } from "./platform-id/index.js";
import type {
  ManifestResolver,
  ReleaseChannel,
  ResolvedVersion,
  VersionResolver,
} from "./release/index.js";
import { DEFAULT_CHANNEL } from "./release/index.js";
import type { SkillInstallResult, SkillInstaller } from "./skill/index.js";

/**
 * User-facing progress. The CLI prints these; tests record them.
 */
export interface InstallReporter {
  /** A step starts */
  step(message: string): void;
  /** Detail of the current step */
  info(message: string): void;
  warn(message: string): void;
  progress(progress: DownloadProgress): void;
}

export interface InstallOptions {
  readonly mode: InstallMode;
  /** Exact tag; skips channel resolution */
  readonly pinnedVersion?: string | undefined;
  /** Channel from flag or environment; unset falls back to settings, then the default */
  readonly channel?: ReleaseChannel | undefined;
  /** Managed: launcher directory override. Self-install: passed as --bin-dir */
  readonly binDir?: string | undefined;
  /** Packaged: directory beside the launcher */
  readonly targetDir?: string | undefined;
  readonly installSkill: boolean;
  /** Packaged `skills/squirrel/SKILL.md` */
  readonly skillSource: string;
}

export interface InstallOutcome {
  readonly tag: string;
  readonly version: string;
  readonly channel: ReleaseChannel;
  readonly versionSource: ResolvedVersion["source"];
  readonly platformId: PlatformId;
  readonly mode: InstallMode;
  readonly binaryPath: string;
  readonly previousVersion: string | null;
  readonly launcherPath: string | null;
  /** Null when the mode leaves PATH to someone else */
  readonly pathAdvice: PathAdvice | null;
  /** Null when skill install was disabled */
  readonly skill: SkillInstallResult | null;
}

export interface InstallFlowDeps {
  readonly platformIdResolver: PlatformIdResolver;
  readonly versionResolver: VersionResolver;
  readonly manifestResolver: ManifestResolver;
  readonly fetcher: ResilientFetcher;
  readonly installer: AtomicInstaller;
  readonly settingsStore: SettingsStore;
  readonly binDirResolver: BinDirResolver;
  readonly skillInstaller: SkillInstaller;
  readonly pathAdvisor: PathAdvisor;
  /** Environment the path advice is computed for */
  readonly env: NodeJS.ProcessEnv;
  readonly logger: Logger;
}

export class InstallFlow {
  constructor(private readonly deps: InstallFlowDeps) {}

  /**
   * @throws ServiceError subclasses from each step; the skill step never throws
   */
  async run(options: InstallOptions, reporter: InstallReporter): Promise<InstallOutcome> {
    const { deps } = this;

    const platformId = await deps.platformIdResolver.detect();
    reporter.step(`Detected platform: ${platformId}`);

    // Flag or environment, then the channel of the last install, then the default
    const channel =
      options.channel ?? (await deps.settingsStore.readChannel()) ?? DEFAULT_CHANNEL;
    if (options.pinnedVersion === undefined) {
      reporter.info(`Fetching releases (channel: ${channel})...`);
    }
    const resolved = await deps.versionResolver.resolve({ pin: options.pinnedVersion, channel });
    reporter.step(
      resolved.source === "pinned"
        ? `Pinned version: ${resolved.tag}`
        : `Latest version: ${resolved.tag} (channel: ${channel})`
    );
    if (!resolved.precise) {
      reporter.warn("Release list read without prerelease flags; took the newest release");
    }

    reporter.step("Downloading manifest...");
    const artifact = await deps.manifestResolver.resolve(resolved.tag, platformId);

    reporter.step(`Downloading squirrel ${resolved.tag}...`);
    const bytes = await deps.fetcher.fetchBytes(artifact.url, {
      onProgress: (progress) => reporter.progress(progress),
      onRetry: ({ attempt, attempts }) =>
        reporter.warn(`Download failed, retrying (${attempt}/${attempts - 1})...`),
    });

    reporter.step("Verifying checksum...");
    const verified = VerifiedArtifact.verify(bytes, artifact.sha256);
    reporter.info(`Checksum verified: ${verified.sha256.slice(0, 16)}...`);

    const request = await this.buildRequest(options, resolved.tag, channel, verified);
    if (request.mode === "self-install") {
      reporter.step("Running self install...");
    }
    const result = await deps.installer.install(request);
    reporter.info(`Binary: ${result.binaryPath}`);

    const skill = options.installSkill
      ? await this.installSkill(options.skillSource, reporter)
      : null;

    const adviseDir = request.mode === "packaged" ? null : (request.binDir ?? null);
    const pathAdvice = adviseDir === null ? null : deps.pathAdvisor.advise(adviseDir, deps.env);

    deps.logger.info("Install complete", {
      tag: result.tag,
      mode: result.mode,
      platformId,
      channel,
    });
    return {
      tag: result.tag,
      version: result.version,
      channel,
      versionSource: resolved.source,
      platformId,
      mode: result.mode,
      binaryPath: result.binaryPath,
      previousVersion: result.previousVersion,
      launcherPath: result.launcherPath,
      pathAdvice,
      skill,
    };
  }

  private async buildRequest(
    options: InstallOptions,
    tag: string,
    channel: ReleaseChannel,
    artifact: VerifiedArtifact
  ): Promise<InstallRequest> {
    switch (options.mode) {
      case "managed": {
        const binDir = await this.deps.binDirResolver.resolve(options.binDir);
        return { mode: "managed", tag, artifact, channel, binDir: binDir.path };
      }
      case "self-install": {
        // without an override the binary picks its own directory
        const binDir =
          options.binDir === undefined
            ? undefined
            : (await this.deps.binDirResolver.resolve(options.binDir)).path;
        return { mode: "self-install", tag, artifact, binDir };
      }
      case "packaged":
        if (options.targetDir === undefined) {
          throw new ConfigError("Packaged install needs a target directory");
        }
        return { mode: "packaged", tag, artifact, targetDir: options.targetDir };
    }
  }

  /**
   * Best-effort: anything thrown here becomes a warning.
   */
  private async installSkill(
    source: string,
    reporter: InstallReporter
  ): Promise<SkillInstallResult> {
    let result: SkillInstallResult;
    try {
      result = await this.deps.skillInstaller.install(source);
    } catch (error) {
      this.deps.logger.warn("Skill install failed", { error: getErrorMessage(error) });
      result = { targets: [], sourceMissing: false };
    }

    for (const target of result.targets) {
      if (target.status === "installed" && target.path !== undefined) {
        reporter.info(`Skill installed: ${target.path}`);
      } else if (target.status === "failed") {
        reporter.warn(
          `Could not install skill into ${target.agentHome}: ${target.reason ?? "unknown error"}`
        );
      }
    }
    return result;
  }
}
