/**
 * Installer configuration from environment variables.
 *
 * Every variable is optional; an empty value counts as unset. Command-line
 * flags are applied on top by the CLI, and an unset channel falls back to
 * the one persisted by the last install.
 */

import { z } from "zod";
import { ConfigError } from "../errors.js";
import { PARSER_PREFERENCES, type ParserPreference } from "../release/parsers/types.js";
import { DEFAULT_REPOSITORY } from "../release/release-urls.js";
import { RELEASE_CHANNELS, type ReleaseChannel } from "../release/types.js";

/** Install modes selectable from the environment. Packaged mode is flag-only. */
export type ConfiguredInstallMode = "managed" | "self-install";

export interface InstallerConfig {
  /** SQUIRREL_VERSION: exact tag to install, bypassing channel resolution */
  readonly pinnedVersion: string | undefined;
  /** SQUIRREL_CHANNEL */
  readonly channel: ReleaseChannel | undefined;
  /** SQUIRREL_BIN_DIR: where the launcher wrapper goes */
  readonly binDir: string | undefined;
  /** SQUIRREL_INSTALL_MODE */
  readonly mode: ConfiguredInstallMode;
  /** SQUIRREL_REPO: GitHub `owner/name` hosting the releases */
  readonly repository: string;
  /** SQUIRREL_PARSER */
  readonly parser: ParserPreference;
  /** SQUIRREL_SKIP_SKILL */
  readonly skipSkill: boolean;
  /** SQUIRREL_HOME: replaces the platform's default install root */
  readonly home: string | undefined;
}

const unsetIfEmpty = (value: unknown): unknown =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

function optional<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess(unsetIfEmpty, schema.optional());
}

const FLAG_VALUES = ["1", "true", "yes", "0", "false", "no"] as const;
const TRUTHY: ReadonlySet<string> = new Set(["1", "true", "yes"]);

const envSchema = z.object({
  SQUIRREL_VERSION: optional(z.string().trim()),
  SQUIRREL_CHANNEL: optional(z.enum(RELEASE_CHANNELS)),
  SQUIRREL_BIN_DIR: optional(z.string()),
  SQUIRREL_INSTALL_MODE: optional(z.enum(["managed", "self-install"])),
  SQUIRREL_REPO: optional(z.string().regex(/^[\w.-]+\/[\w.-]+$/, "expected owner/name")),
  SQUIRREL_PARSER: optional(z.enum(PARSER_PREFERENCES)),
  SQUIRREL_SKIP_SKILL: optional(z.enum(FLAG_VALUES)),
  SQUIRREL_HOME: optional(z.string()),
});

function describeExpected(issue: z.ZodIssue): string {
  if (issue.code === "invalid_enum_value") {
    return `expected one of: ${issue.options.join(", ")}`;
  }
  return issue.message;
}

/**
 * Parse installer configuration from an environment.
 *
 * @throws ConfigError naming every invalid variable
 */
export function loadInstallerConfig(env: NodeJS.ProcessEnv = process.env): InstallerConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => {
      const name = issue.path.join(".");
      return `${name}=${JSON.stringify(env[name] ?? "")}: ${describeExpected(issue)}`;
    });
    throw new ConfigError("Invalid environment configuration", problems);
  }

  const vars = result.data;
  return {
    pinnedVersion: vars.SQUIRREL_VERSION,
    channel: vars.SQUIRREL_CHANNEL,
    binDir: vars.SQUIRREL_BIN_DIR,
    mode: vars.SQUIRREL_INSTALL_MODE ?? "managed",
    repository: vars.SQUIRREL_REPO ?? DEFAULT_REPOSITORY,
    parser: vars.SQUIRREL_PARSER ?? "auto",
    skipSkill: vars.SQUIRREL_SKIP_SKILL !== undefined && TRUTHY.has(vars.SQUIRREL_SKIP_SKILL),
    home: vars.SQUIRREL_HOME,
  };
}

/**
 * Validate a channel given on the command line.
 *
 * @throws ConfigError for anything but a known channel
 */
export function parseChannel(value: string): ReleaseChannel {
  const channel = RELEASE_CHANNELS.find((known) => known === value);
  if (channel === undefined) {
    throw new ConfigError(`Unknown channel: "${value}"`, [
      `Expected one of: ${RELEASE_CHANNELS.join(", ")}`,
    ]);
  }
  return channel;
}
