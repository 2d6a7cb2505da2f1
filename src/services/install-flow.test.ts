/**
 * Tests for the install flow, wired with real services over state mocks.
 */

import { describe, it, expect } from "vitest";
import { InstallFlow, type InstallOptions, type InstallReporter } from "./install-flow.js";
import { ChecksumMismatchError, ConfigError } from "./errors.js";
import { ResilientFetcher, type DownloadProgress } from "./fetcher/index.js";
import { AtomicInstaller, BinDirResolver, SettingsStore } from "./installer/index.js";
import { computeSha256 } from "./integrity/index.js";
import { PathAdvisor } from "./path-advisor/index.js";
import { LibcDetector, PlatformIdResolver } from "./platform-id/index.js";
import {
  ManifestResolver,
  ReleaseUrls,
  StructuredReleaseParser,
  VersionResolver,
} from "./release/index.js";
import { SkillInstaller } from "./skill/index.js";
import {
  createFileSystemMock,
  directory,
  file,
  type Entry,
  type MockFileSystemLayer,
} from "./platform/filesystem.state-mock.js";
import {
  createMockHttpClient,
  type MockHttpClient,
  type ResponseSetup,
} from "./platform/http-client.state-mock.js";
import { createMockProcessRunner, type MockProcessRunner } from "./platform/process.state-mock.js";
import { createTestPathProvider } from "./platform/path-provider.test-utils.js";
import { createMockPlatformInfo } from "./platform/platform-info.test-utils.js";
import { createSilentLogger } from "./logging/logging.test-utils.js";

const ROOT = "/test/root";
const LISTING_URL = "https://api.github.com/repos/squirrelscan/squirrelscan/releases";
const DOWNLOAD = "https://github.com/squirrelscan/squirrelscan/releases/download";
const SKILL_SOURCE = "/pkg/skills/squirrel/SKILL.md";

const BINARY = Buffer.from("squirrel binary v1.2.0");
const BETA_BINARY = Buffer.from("squirrel binary v1.3.0-beta.1");
const SHA = computeSha256(BINARY);
const BETA_SHA = computeSha256(BETA_BINARY);

const LISTING = JSON.stringify([
  { tag_name: "v1.3.0-beta.1", prerelease: true },
  { tag_name: "v1.2.0", prerelease: false },
]);

function manifest(tag: string, sha256: string): string {
  return JSON.stringify({
    binaries: { "linux-x64": { filename: `squirrel-${tag}-linux-x64`, sha256 } },
  });
}

function releaseResponses(
  overrides: Record<string, ResponseSetup> = {}
): Record<string, ResponseSetup> {
  return {
    [LISTING_URL]: { body: LISTING },
    [`${DOWNLOAD}/v1.2.0/manifest.json`]: { body: manifest("v1.2.0", SHA) },
    [`${DOWNLOAD}/v1.2.0/squirrel-v1.2.0-linux-x64`]: { body: BINARY },
    [`${DOWNLOAD}/v1.3.0-beta.1/manifest.json`]: { body: manifest("v1.3.0-beta.1", BETA_SHA) },
    [`${DOWNLOAD}/v1.3.0-beta.1/squirrel-v1.3.0-beta.1-linux-x64`]: { body: BETA_BINARY },
    ...overrides,
  };
}

function createReporter(): InstallReporter & {
  lines: string[];
  downloads: DownloadProgress[];
} {
  const lines: string[] = [];
  const downloads: DownloadProgress[] = [];
  return {
    lines,
    downloads,
    step: (message) => lines.push(`==> ${message}`),
    info: (message) => lines.push(`:: ${message}`),
    warn: (message) => lines.push(`Warning: ${message}`),
    progress: (progress) => downloads.push(progress),
  };
}

interface Harness {
  flow: InstallFlow;
  fileSystem: MockFileSystemLayer;
  httpClient: MockHttpClient;
  processRunner: MockProcessRunner;
}

function createHarness(
  options: {
    entries?: Record<string, Entry>;
    responses?: Record<string, ResponseSetup>;
  } = {}
): Harness {
  const logger = createSilentLogger();
  const platformInfo = createMockPlatformInfo();
  const pathProvider = createTestPathProvider(ROOT);
  const fileSystem = createFileSystemMock({
    entries: {
      [ROOT]: directory(),
      "/home/test/.local/bin": directory(),
      "/home/test/.claude": directory(),
      [SKILL_SOURCE]: file("# squirrel\n"),
      ...options.entries,
    },
  });
  const httpClient = createMockHttpClient({ responses: options.responses ?? releaseResponses() });
  const processRunner = createMockProcessRunner();
  const fetcher = new ResilientFetcher(httpClient, logger, { retryDelayMs: 0 });
  const parser = new StructuredReleaseParser();
  const urls = new ReleaseUrls();
  const settingsStore = new SettingsStore(fileSystem, pathProvider, logger);

  const flow = new InstallFlow({
    platformIdResolver: new PlatformIdResolver(platformInfo, new LibcDetector([], logger), logger),
    versionResolver: new VersionResolver(fetcher, parser, urls, logger),
    manifestResolver: new ManifestResolver(fetcher, parser, urls, logger),
    fetcher,
    installer: new AtomicInstaller({
      fileSystem,
      processRunner,
      pathProvider,
      platformInfo,
      settingsStore,
      logger,
      now: () => new Date("2026-01-02T03:04:05.000Z"),
    }),
    settingsStore,
    binDirResolver: new BinDirResolver(fileSystem, pathProvider, logger),
    skillInstaller: new SkillInstaller(fileSystem, platformInfo, logger),
    pathAdvisor: new PathAdvisor(platformInfo, logger),
    env: { PATH: "/usr/bin:/bin", SHELL: "/bin/bash" },
    logger,
  });
  return { flow, fileSystem, httpClient, processRunner };
}

const MANAGED: InstallOptions = {
  mode: "managed",
  installSkill: true,
  skillSource: SKILL_SOURCE,
};

describe("InstallFlow", () => {
  describe("managed mode", () => {
    it("installs the latest stable release", async () => {
      const { flow, fileSystem } = createHarness();
      const reporter = createReporter();

      const outcome = await flow.run(MANAGED, reporter);

      expect(outcome).toEqual({
        tag: "v1.2.0",
        version: "1.2.0",
        channel: "stable",
        versionSource: "channel",
        platformId: "linux-x64",
        mode: "managed",
        binaryPath: `${ROOT}/versions/1.2.0/squirrel`,
        previousVersion: null,
        launcherPath: "/home/test/.local/bin/squirrel",
        pathAdvice: {
          binDir: "/home/test/.local/bin",
          onPath: false,
          shell: "bash",
          profileFile: "/home/test/.bashrc",
          instructions: [
            "/home/test/.local/bin is not on your PATH. Add this line to /home/test/.bashrc:",
            '  export PATH="$HOME/.local/bin:$PATH"',
            "Then restart your terminal.",
          ],
        },
        skill: {
          sourceMissing: false,
          targets: [
            {
              agentHome: "/home/test/.claude",
              status: "installed",
              path: "/home/test/.claude/skills/squirrel/SKILL.md",
            },
            { agentHome: "/home/test/.copilot", status: "absent" },
          ],
        },
      });
      expect(fileSystem).toHaveFile(`${ROOT}/current/squirrel`, BINARY);
      expect(reporter.lines).toEqual([
        "==> Detected platform: linux-x64",
        ":: Fetching releases (channel: stable)...",
        "==> Latest version: v1.2.0 (channel: stable)",
        "==> Downloading manifest...",
        "==> Downloading squirrel v1.2.0...",
        "==> Verifying checksum...",
        `:: Checksum verified: ${SHA.slice(0, 16)}...`,
        `:: Binary: ${ROOT}/versions/1.2.0/squirrel`,
        ":: Skill installed: /home/test/.claude/skills/squirrel/SKILL.md",
      ]);
      expect(reporter.downloads.at(-1)?.bytesDownloaded).toBe(BINARY.length);
    });

    it("uses the channel persisted by the last install", async () => {
      const { flow, fileSystem } = createHarness({
        entries: { [`${ROOT}/settings.json`]: file('{"channel":"beta"}') },
      });
      const reporter = createReporter();

      const outcome = await flow.run(MANAGED, reporter);

      expect(outcome).toMatchObject({ tag: "v1.3.0-beta.1", channel: "beta" });
      expect(reporter.lines[1]).toBe(":: Fetching releases (channel: beta)...");
      expect(JSON.parse(await fileSystem.readFile(`${ROOT}/settings.json`))).toMatchObject({
        channel: "beta",
        current_version: "1.3.0-beta.1",
      });
    });

    it("lets an explicit channel win over the persisted one", async () => {
      const { flow, fileSystem } = createHarness({
        entries: { [`${ROOT}/settings.json`]: file('{"channel":"beta"}') },
      });

      const outcome = await flow.run({ ...MANAGED, channel: "stable" }, createReporter());

      expect(outcome).toMatchObject({ tag: "v1.2.0", channel: "stable" });
      expect(JSON.parse(await fileSystem.readFile(`${ROOT}/settings.json`))).toMatchObject({
        channel: "stable",
      });
    });

    it("skips the release listing for a pinned version", async () => {
      const { flow, httpClient } = createHarness();
      const reporter = createReporter();

      const outcome = await flow.run({ ...MANAGED, pinnedVersion: "v1.2.0" }, reporter);

      expect(outcome.versionSource).toBe("pinned");
      expect(httpClient.$.requests.map((request) => request.url)).toEqual([
        `${DOWNLOAD}/v1.2.0/manifest.json`,
        `${DOWNLOAD}/v1.2.0/squirrel-v1.2.0-linux-x64`,
      ]);
      expect(reporter.lines.slice(0, 2)).toEqual([
        "==> Detected platform: linux-x64",
        "==> Pinned version: v1.2.0",
      ]);
    });

    it("installs into an explicit bin directory", async () => {
      const { flow, fileSystem } = createHarness();

      const outcome = await flow.run({ ...MANAGED, binDir: "/opt/squirrel/bin" }, createReporter());

      expect(outcome.launcherPath).toBe("/opt/squirrel/bin/squirrel");
      expect(outcome.pathAdvice?.binDir).toBe("/opt/squirrel/bin");
      expect(fileSystem).toHaveFile("/opt/squirrel/bin/squirrel");
    });

    it("reports download retries", async () => {
      const artifactUrl = `${DOWNLOAD}/v1.2.0/squirrel-v1.2.0-linux-x64`;
      const { flow } = createHarness({
        responses: releaseResponses({ [artifactUrl]: [{ status: 503 }, { body: BINARY }] }),
      });
      const reporter = createReporter();

      await flow.run(MANAGED, reporter);

      expect(reporter.lines).toContain("Warning: Download failed, retrying (1/2)...");
    });
  });

  describe("failures", () => {
    it("installs nothing when the checksum does not match", async () => {
      const { flow, fileSystem } = createHarness({
        responses: releaseResponses({
          [`${DOWNLOAD}/v1.2.0/manifest.json`]: { body: manifest("v1.2.0", "f".repeat(64)) },
        }),
      });

      const before = fileSystem.$.snapshot();

      const error = await flow.run(MANAGED, createReporter()).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ChecksumMismatchError);
      expect(error).toMatchObject({ expected: "f".repeat(64), actual: SHA });
      expect(fileSystem).toBeUnchanged(before);
    });

    it("requires a target directory in packaged mode", async () => {
      const { flow } = createHarness();

      await expect(
        flow.run({ ...MANAGED, mode: "packaged" }, createReporter())
      ).rejects.toBeInstanceOf(ConfigError);
    });
  });

  describe("other modes", () => {
    it("hands placement to the binary in self-install mode", async () => {
      const { flow, fileSystem, processRunner } = createHarness();
      const reporter = createReporter();

      const outcome = await flow.run({ ...MANAGED, mode: "self-install" }, reporter);

      expect(outcome).toMatchObject({ mode: "self-install", launcherPath: null, pathAdvice: null });
      expect(processRunner).toHaveSpawned([
        { command: `${ROOT}/versions/1.2.0/squirrel`, args: ["self", "install"], stdio: "inherit" },
      ]);
      expect(reporter.lines).toContain("==> Running self install...");
      expect(fileSystem.$.entries.has(`${ROOT}/current`)).toBe(false);
    });

    it("gives self-install a default bin directory when the override is unwritable", async () => {
      const { flow, fileSystem, processRunner } = createHarness();
      fileSystem.$.failOn("access", "/opt/locked", "EACCES");

      await flow.run({ ...MANAGED, mode: "self-install", binDir: "/opt/locked" }, createReporter());

      expect(processRunner).toHaveSpawned([
        { args: ["self", "install", "--bin-dir", "/home/test/.local/bin"] },
      ]);
    });

    it("creates a missing self-install override before handing it over", async () => {
      const { flow, fileSystem, processRunner } = createHarness();

      await flow.run(
        { ...MANAGED, mode: "self-install", binDir: "/opt/squirrel/bin" },
        createReporter()
      );

      expect(fileSystem.$.entries.has("/opt/squirrel/bin")).toBe(true);
      expect(processRunner).toHaveSpawned([
        { args: ["self", "install", "--bin-dir", "/opt/squirrel/bin"] },
      ]);
    });

    it("writes the packaged copy beside the launcher", async () => {
      const { flow, fileSystem } = createHarness();

      const outcome = await flow.run(
        { ...MANAGED, mode: "packaged", targetDir: "/pkg/dist/bin", pinnedVersion: "v1.2.0" },
        createReporter()
      );

      expect(outcome).toMatchObject({
        mode: "packaged",
        binaryPath: "/pkg/dist/bin/squirrel",
        pathAdvice: null,
      });
      expect(fileSystem).toHaveFile("/pkg/dist/bin/squirrel", BINARY);
    });

    it("skips the skill when disabled", async () => {
      const { flow, fileSystem } = createHarness();

      const outcome = await flow.run({ ...MANAGED, installSkill: false }, createReporter());

      expect(outcome.skill).toBeNull();
      expect(fileSystem.$.entries.has("/home/test/.claude/skills")).toBe(false);
    });

    it("still succeeds when the skill cannot be installed", async () => {
      const { flow } = createHarness({
        entries: { "/home/test/.claude": directory({ writable: false }) },
      });
      const reporter = createReporter();

      const outcome = await flow.run(MANAGED, reporter);

      expect(outcome.skill?.targets[0]?.status).toBe("failed");
      expect(reporter.lines).toContain(
        "Warning: Could not install skill into /home/test/.claude: EACCES: mkdir '/home/test/.claude/skills'"
      );
    });
  });
});
