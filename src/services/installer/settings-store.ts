/**
 * Settings store - read-modify-write of `<root>/settings.json`.
 *
 * Keys this installer does not know survive every update, so a newer
 * squirrel binary can keep its own fields in the same file.
 */

import { z } from "zod";
import { FileSystemError, getErrorMessage } from "../errors.js";
import type { Logger } from "../logging/index.js";
import type { FileSystemLayer } from "../platform/filesystem.js";
import type { PathProvider } from "../platform/path-provider.js";
import { RELEASE_CHANNELS, type ReleaseChannel } from "../release/types.js";

/**
 * Settings as stored: `channel`, `current_version`, `auto_update`,
 * `notifications`, `last_update_check` and whatever else the file holds.
 */
export type SettingsRecord = Readonly<Record<string, unknown>>;

/**
 * Fields the installer writes after a successful install.
 */
export interface SettingsUpdate {
  readonly channel: ReleaseChannel;
  readonly current_version: string;
  readonly last_update_check: string;
}

/** Applied only when the record does not have the key yet. */
const DEFAULTS = {
  auto_update: true,
  notifications: true,
} as const;

// Arrays and null fail this schema
const recordSchema = z.record(z.unknown());

function isReleaseChannel(value: unknown): value is ReleaseChannel {
  return RELEASE_CHANNELS.some((channel) => channel === value);
}

export class SettingsStore {
  constructor(
    private readonly fileSystem: FileSystemLayer,
    private readonly pathProvider: PathProvider,
    private readonly logger: Logger
  ) {}

  /**
   * Read the record. A missing file is empty; a corrupt one is logged and
   * treated as empty.
   */
  async read(): Promise<SettingsRecord> {
    const path = this.pathProvider.settingsPath;

    let content: string;
    try {
      content = await this.fileSystem.readFile(path);
    } catch (error) {
      if (error instanceof FileSystemError && error.fsCode === "ENOENT") {
        return {};
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      this.logger.warn("Ignoring corrupt settings file", { path, error: getErrorMessage(error) });
      return {};
    }

    const record = recordSchema.safeParse(parsed);
    if (!record.success) {
      this.logger.warn("Ignoring corrupt settings file", { path, error: "not an object" });
      return {};
    }
    return record.data;
  }

  /**
   * The persisted channel, if it names a known one.
   */
  async readChannel(): Promise<ReleaseChannel | undefined> {
    const { channel } = await this.read();
    return isReleaseChannel(channel) ? channel : undefined;
  }

  /**
   * Merge `update` into the stored record and write it back atomically.
   *
   * @returns The record as written
   */
  async update(update: SettingsUpdate): Promise<SettingsRecord> {
    const path = this.pathProvider.settingsPath;
    const merged: SettingsRecord = { ...DEFAULTS, ...(await this.read()), ...update };

    await this.fileSystem.mkdir(this.pathProvider.installRoot);
    const temp = `${path}.${process.pid}.tmp`;
    await this.fileSystem.writeFile(temp, `${JSON.stringify(merged, null, 2)}\n`);
    try {
      await this.fileSystem.rename(temp, path);
    } catch (error) {
      await this.fileSystem.rm(temp, { force: true }).catch((cleanupError: unknown) => {
        this.logger.debug("Settings temp cleanup failed", {
          path: temp,
          error: getErrorMessage(cleanupError),
        });
      });
      throw error;
    }

    this.logger.debug("Settings updated", {
      path,
      channel: update.channel,
      version: update.current_version,
    });
    return merged;
  }
}
