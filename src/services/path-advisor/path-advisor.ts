/**
 * Path Advisor - tells the user how to put the bin directory on PATH.
 *
 * Advice only: no shell profile is ever written.
 */

import { join, posix, win32 } from "node:path";
import type { Logger } from "../logging/index.js";
import type { PlatformInfo } from "../platform/platform-info.js";

export interface PathAdvice {
  readonly binDir: string;
  readonly onPath: boolean;
  /** Shell the advice targets, from $SHELL; "powershell" on Windows */
  readonly shell: string;
  /** Profile the export line belongs in; null on Windows */
  readonly profileFile: string | null;
  /** Lines to print; empty when the directory is already on PATH */
  readonly instructions: readonly string[];
}

/**
 * A shell the advisor knows how to extend PATH for.
 */
interface ShellProfile {
  readonly shell: string;
  matches(shellName: string): boolean;
  profileFile(platformInfo: PlatformInfo): string;
  exportLine(dir: string): string;
}

const posixExport = (dir: string): string => `export PATH="${dir}:$PATH"`;

const SHELL_PROFILES: readonly ShellProfile[] = [
  {
    shell: "zsh",
    matches: (name) => name === "zsh",
    profileFile: ({ homeDir }) => join(homeDir, ".zshrc"),
    exportLine: posixExport,
  },
  {
    shell: "bash",
    matches: (name) => name === "bash",
    // Terminal.app starts login shells, which read .bash_profile but not .bashrc
    profileFile: ({ homeDir, platform }) =>
      join(homeDir, platform === "darwin" ? ".bash_profile" : ".bashrc"),
    exportLine: posixExport,
  },
  {
    shell: "fish",
    matches: (name) => name === "fish",
    profileFile: ({ homeDir }) => join(homeDir, ".config", "fish", "config.fish"),
    exportLine: (dir) => `fish_add_path "${dir}"`,
  },
];

const FALLBACK_PROFILE: Omit<ShellProfile, "matches"> = {
  shell: "sh",
  profileFile: ({ homeDir }) => join(homeDir, ".profile"),
  exportLine: posixExport,
};

/**
 * Whether `dir` appears in a PATH value. Trailing separators are ignored,
 * a leading `~` is expanded, and Windows compares case-insensitively.
 */
export function isOnPath(dir: string, pathValue: string, platformInfo: PlatformInfo): boolean {
  const windows = platformInfo.platform === "win32";
  const delimiter = windows ? win32.delimiter : posix.delimiter;
  const normalize = (entry: string): string => {
    let value = entry.trim();
    if (value === "~" || value.startsWith("~/")) {
      value = platformInfo.homeDir + value.slice(1);
    }
    value = value.replace(windows ? /[\\/]+$/ : /\/+$/, "");
    return windows ? value.replace(/\//g, "\\").toLowerCase() : value;
  };

  const target = normalize(dir);
  return pathValue
    .split(delimiter)
    .filter((entry) => entry.trim() !== "")
    .some((entry) => normalize(entry) === target);
}

export class PathAdvisor {
  constructor(
    private readonly platformInfo: PlatformInfo,
    private readonly logger: Logger
  ) {}

  /**
   * @param env - Environment to inspect; PATH (or Path) and SHELL are read
   */
  advise(binDir: string, env: NodeJS.ProcessEnv): PathAdvice {
    const pathValue = env.PATH ?? env.Path ?? "";
    const onPath = isOnPath(binDir, pathValue, this.platformInfo);

    if (this.platformInfo.platform === "win32") {
      const advice: PathAdvice = {
        binDir,
        onPath,
        shell: "powershell",
        profileFile: null,
        instructions: onPath
          ? []
          : [
              `Add ${binDir} to your PATH from PowerShell:`,
              `  [Environment]::SetEnvironmentVariable("Path", "${binDir};" + [Environment]::GetEnvironmentVariable("Path", "User"), "User")`,
              "Then restart your terminal.",
            ],
      };
      this.logger.debug("Path advice", { binDir, onPath, shell: advice.shell });
      return advice;
    }

    const shellName = posix.basename(env.SHELL ?? "");
    const profile =
      SHELL_PROFILES.find((candidate) => candidate.matches(shellName)) ?? FALLBACK_PROFILE;
    const profileFile = profile.profileFile(this.platformInfo);

    this.logger.debug("Path advice", { binDir, onPath, shell: profile.shell, profileFile });
    return {
      binDir,
      onPath,
      shell: profile.shell,
      profileFile,
      instructions: onPath
        ? []
        : [
            `${binDir} is not on your PATH. Add this line to ${profileFile}:`,
            `  ${profile.exportLine(this.displayPath(binDir))}`,
            "Then restart your terminal.",
          ],
    };
  }

  /** `$HOME/...` for directories under the home directory. */
  private displayPath(dir: string): string {
    const home = this.platformInfo.homeDir;
    return dir.startsWith(`${home}/`) ? `$HOME${dir.slice(home.length)}` : dir;
  }
}
