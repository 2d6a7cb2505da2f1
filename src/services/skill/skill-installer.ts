/**
 * Companion skill installer.
 *
 * Copies the packaged SKILL.md into the skill directory of each agent CLI
 * whose home directory exists. Best-effort: failures become warnings and
 * never reach the caller as errors.
 */

import { join } from "node:path";
import { FileSystemError, getErrorMessage } from "../errors.js";
import type { Logger } from "../logging/index.js";
import type { FileSystemLayer } from "../platform/filesystem.js";
import type { PlatformInfo } from "../platform/platform-info.js";

/** Agent CLI home directories, relative to the user's home. */
export const AGENT_HOMES: readonly string[] = [".claude", ".copilot"];

export const SKILL_NAME = "squirrel";

export interface SkillTargetResult {
  /** Agent home directory the skill belongs to */
  readonly agentHome: string;
  readonly status: "installed" | "absent" | "failed";
  /** Written file, for "installed" */
  readonly path?: string;
  /** Failure reason, for "failed" */
  readonly reason?: string;
}

export interface SkillInstallResult {
  readonly targets: readonly SkillTargetResult[];
  /** True when the packaged skill could not be read at all */
  readonly sourceMissing: boolean;
}

export class SkillInstaller {
  constructor(
    private readonly fileSystem: FileSystemLayer,
    private readonly platformInfo: PlatformInfo,
    private readonly logger: Logger
  ) {}

  /**
   * @param sourceFile - The packaged `skills/squirrel/SKILL.md`
   */
  async install(sourceFile: string): Promise<SkillInstallResult> {
    let content: string;
    try {
      content = await this.fileSystem.readFile(sourceFile);
    } catch (error) {
      this.logger.warn("Skill source unavailable, skipping skill install", {
        path: sourceFile,
        error: getErrorMessage(error),
      });
      return { targets: [], sourceMissing: true };
    }

    const targets: SkillTargetResult[] = [];
    for (const agentHome of AGENT_HOMES) {
      targets.push(await this.installInto(join(this.platformInfo.homeDir, agentHome), content));
    }
    return { targets, sourceMissing: false };
  }

  private async installInto(agentHome: string, content: string): Promise<SkillTargetResult> {
    try {
      await this.fileSystem.readdir(agentHome);
    } catch (error) {
      if (error instanceof FileSystemError && error.fsCode === "ENOENT") {
        this.logger.debug("Agent not installed", { agentHome });
        return { agentHome, status: "absent" };
      }
      return this.failed(agentHome, error);
    }

    const skillDir = join(agentHome, "skills", SKILL_NAME);
    const path = join(skillDir, "SKILL.md");
    try {
      await this.fileSystem.mkdir(skillDir);
      await this.fileSystem.writeFile(path, content);
    } catch (error) {
      return this.failed(agentHome, error);
    }
    this.logger.info("Skill installed", { path });
    return { agentHome, status: "installed", path };
  }

  private failed(agentHome: string, error: unknown): SkillTargetResult {
    const reason = getErrorMessage(error);
    this.logger.warn("Skill install failed", { agentHome, error: reason });
    return { agentHome, status: "failed", reason };
  }
}
