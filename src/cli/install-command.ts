/**
 * `squirrel-install` command.
 *
 * Flags override the environment (see loadInstallerConfig). `--packaged`
 * installs the release matching this package's version beside the launcher,
 * which is how an npm install obtains its binary.
 */

import { Command, CommanderError, Option } from "commander";
import {
  loadInstallerConfig,
  parseChannel,
  type InstallerConfig,
} from "../services/config/index.js";
import { InstallFailedError } from "../services/errors.js";
import type { InstallFlow, InstallOptions, InstallOutcome } from "../services/install-flow.js";
import type { InstallMode } from "../services/installer/index.js";
import { ConsoleReporter, type OutputStream } from "./output.js";

/**
 * Parsed command-line flags.
 */
export type InstallFlags = {
  readonly version?: string;
  readonly channel?: string;
  readonly binDir?: string;
  readonly selfInstall?: boolean;
  readonly packaged?: boolean;
  /** false with --no-skill */
  readonly skill: boolean;
};

/**
 * Facts about the installed npm package.
 */
export interface PackageInfo {
  readonly version: string;
  /** Directory the launcher runs from; packaged installs land here */
  readonly launcherDir: string;
  /** The bundled `skills/squirrel/SKILL.md` */
  readonly skillSource: string;
}

export interface InstallCliContext {
  readonly env: NodeJS.ProcessEnv;
  readonly stdout: OutputStream;
  readonly stderr: OutputStream;
  readonly packageInfo: PackageInfo;
  createFlow(config: InstallerConfig): Promise<Pick<InstallFlow, "run">>;
}

function selectMode(flags: InstallFlags, config: InstallerConfig): InstallMode {
  if (flags.packaged === true) return "packaged";
  if (flags.selfInstall === true) return "self-install";
  return config.mode;
}

/**
 * Merge flags over environment configuration.
 *
 * @throws ConfigError for an unknown --channel
 */
export function buildInstallOptions(
  flags: InstallFlags,
  config: InstallerConfig,
  packageInfo: PackageInfo
): InstallOptions {
  const mode = selectMode(flags, config);
  const pinnedVersion =
    flags.version ??
    config.pinnedVersion ??
    (mode === "packaged" ? `v${packageInfo.version}` : undefined);

  return {
    mode,
    pinnedVersion,
    channel: flags.channel !== undefined ? parseChannel(flags.channel) : config.channel,
    binDir: flags.binDir ?? config.binDir,
    targetDir: mode === "packaged" ? packageInfo.launcherDir : undefined,
    installSkill: flags.skill && !config.skipSkill,
    skillSource: packageInfo.skillSource,
  };
}

function printSummary(outcome: InstallOutcome, reporter: ConsoleReporter): void {
  reporter.line("");
  reporter.step("Installation complete!");
  if (outcome.previousVersion !== null && outcome.previousVersion !== outcome.version) {
    reporter.info(`Upgraded from ${outcome.previousVersion} to ${outcome.version}`);
  }
  if (outcome.launcherPath !== null) {
    reporter.info(`Launcher: ${outcome.launcherPath}`);
  }

  const advice = outcome.pathAdvice;
  if (advice !== null && !advice.onPath) {
    const [first = "", ...rest] = advice.instructions;
    reporter.warn(first);
    for (const line of rest) {
      reporter.line(line);
    }
  }
  reporter.line("");
}

/**
 * @returns Process exit code: 0 on success, 1 on any failure
 */
export async function runInstall(flags: InstallFlags, context: InstallCliContext): Promise<number> {
  const reporter = ConsoleReporter.create(context.stderr, context.env);
  try {
    const config = loadInstallerConfig(context.env);
    const options = buildInstallOptions(flags, config, context.packageInfo);
    const flow = await context.createFlow(config);

    reporter.step("Installing squirrelscan...");
    const outcome = await flow.run(options, reporter);
    printSummary(outcome, reporter);
    return 0;
  } catch (error) {
    reporter.error(error);
    return failureExitCode(error);
  }
}

/**
 * A failed self-install exits with the binary's own code; everything else with 1.
 */
function failureExitCode(error: unknown): number {
  if (
    error instanceof InstallFailedError &&
    error.step === "self-install" &&
    error.exitCode !== undefined &&
    error.exitCode !== 0
  ) {
    return error.exitCode;
  }
  return 1;
}

export function createInstallProgram(
  context: InstallCliContext,
  onExitCode: (code: number) => void
): Command {
  return new Command()
    .name("squirrel-install")
    .description("Download, verify and install the squirrel binary")
    .option("--version <tag>", "install this exact release tag")
    .option("--channel <channel>", "release channel (stable or beta)")
    .option("--bin-dir <dir>", "directory for the squirrel launcher")
    .addOption(
      new Option("--self-install", "let the downloaded binary install itself").conflicts("packaged")
    )
    .addOption(
      new Option("--packaged", "install this package's release beside its launcher").hideHelp()
    )
    .option("--no-skill", "skip the companion agent skill")
    .exitOverride()
    .configureOutput({
      writeOut: (text) => {
        context.stdout.write(text);
      },
      writeErr: (text) => {
        context.stderr.write(text);
      },
    })
    .action(async (_options: unknown, command: Command) => {
      onExitCode(await runInstall(command.opts<InstallFlags>(), context));
    });
}

/**
 * Parse arguments (without node and script path) and run.
 */
export async function runInstallCli(
  argv: readonly string[],
  context: InstallCliContext
): Promise<number> {
  let exitCode = 0;
  const program = createInstallProgram(context, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync([...argv], { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }
  return exitCode;
}
