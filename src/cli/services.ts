/**
 * Production wiring: real platform layers behind the service interfaces.
 */

import type { InstallerConfig } from "../services/config/index.js";
import { BinaryLocator, Dispatcher, processSignalHost } from "../services/dispatcher/index.js";
import { ResilientFetcher } from "../services/fetcher/index.js";
import { InstallFlow } from "../services/install-flow.js";
import { AtomicInstaller, BinDirResolver, SettingsStore } from "../services/installer/index.js";
import { NodeLogService, type LoggingService } from "../services/logging/index.js";
import { PathAdvisor } from "../services/path-advisor/index.js";
import {
  DefaultFileSystemLayer,
  DefaultNetworkLayer,
  DefaultPathProvider,
  ExecaProcessRunner,
  createPlatformInfo,
  type FileSystemLayer,
  type PathProvider,
  type PlatformInfo,
  type ProcessRunner,
} from "../services/platform/index.js";
import {
  LibcDetector,
  PlatformIdResolver,
  createDefaultLibcProbes,
} from "../services/platform-id/index.js";
import {
  ManifestResolver,
  ReleaseUrls,
  VersionResolver,
  selectReleaseParser,
} from "../services/release/index.js";
import { SkillInstaller } from "../services/skill/index.js";

/**
 * Layers shared by the installer and the launcher.
 */
export interface PlatformServices {
  readonly platformInfo: PlatformInfo;
  readonly pathProvider: PathProvider;
  readonly loggingService: LoggingService;
  readonly fileSystem: FileSystemLayer;
  readonly processRunner: ProcessRunner;
}

/**
 * @param installRoot - SQUIRREL_HOME, when set
 */
export function createPlatformServices(installRoot?: string): PlatformServices {
  const platformInfo = createPlatformInfo();
  const pathProvider = new DefaultPathProvider(platformInfo, installRoot);
  const loggingService = new NodeLogService(pathProvider);
  return {
    platformInfo,
    pathProvider,
    loggingService,
    fileSystem: new DefaultFileSystemLayer(loggingService.createLogger("fs")),
    processRunner: new ExecaProcessRunner(loggingService.createLogger("process")),
  };
}

export async function createInstallFlow(
  config: InstallerConfig,
  env: NodeJS.ProcessEnv
): Promise<InstallFlow> {
  const platform = createPlatformServices(config.home);
  const { platformInfo, pathProvider, loggingService, fileSystem, processRunner } = platform;

  const parser = await selectReleaseParser(config.parser, loggingService.createLogger("config"));
  const urls = new ReleaseUrls(config.repository);
  const fetcher = new ResilientFetcher(
    new DefaultNetworkLayer(loggingService.createLogger("network")),
    loggingService.createLogger("fetcher")
  );
  const settingsStore = new SettingsStore(
    fileSystem,
    pathProvider,
    loggingService.createLogger("settings")
  );
  const releaseLogger = loggingService.createLogger("release");

  return new InstallFlow({
    platformIdResolver: new PlatformIdResolver(
      platformInfo,
      new LibcDetector(
        createDefaultLibcProbes({ fileSystem, processRunner }),
        loggingService.createLogger("platform")
      ),
      loggingService.createLogger("platform")
    ),
    versionResolver: new VersionResolver(fetcher, parser, urls, releaseLogger),
    manifestResolver: new ManifestResolver(fetcher, parser, urls, releaseLogger),
    fetcher,
    installer: new AtomicInstaller({
      fileSystem,
      processRunner,
      pathProvider,
      platformInfo,
      settingsStore,
      logger: loggingService.createLogger("installer"),
    }),
    settingsStore,
    binDirResolver: new BinDirResolver(
      fileSystem,
      pathProvider,
      loggingService.createLogger("installer")
    ),
    skillInstaller: new SkillInstaller(
      fileSystem,
      platformInfo,
      loggingService.createLogger("skill")
    ),
    pathAdvisor: new PathAdvisor(platformInfo, loggingService.createLogger("path-advisor")),
    env,
    logger: loggingService.createLogger("install"),
  });
}

/**
 * Launcher collaborators. The launcher never reads installer configuration
 * beyond the install root.
 */
export function createLauncherServices(installRoot?: string): {
  readonly platform: PlatformServices;
  readonly locator: BinaryLocator;
  readonly dispatcher: Dispatcher;
} {
  const platform = createPlatformServices(installRoot);
  const logger = platform.loggingService.createLogger("dispatcher");
  return {
    platform,
    locator: new BinaryLocator(platform.fileSystem, platform.platformInfo, logger),
    dispatcher: new Dispatcher(platform.processRunner, processSignalHost(), logger),
  };
}
