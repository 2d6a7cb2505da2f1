/**
 * Chooses the directory that receives the launcher wrapper.
 *
 * Ordered chain: the explicit override when it is (or can be made) writable,
 * then the first existing writable default, then the first default created.
 */

import { ConfigError, getErrorMessage } from "../errors.js";
import type { Logger } from "../logging/index.js";
import type { FileSystemLayer } from "../platform/filesystem.js";
import type { PathProvider } from "../platform/path-provider.js";

export interface BinDirChoice {
  readonly path: string;
  readonly source: "override" | "existing" | "created";
}

export class BinDirResolver {
  constructor(
    private readonly fileSystem: FileSystemLayer,
    private readonly pathProvider: PathProvider,
    private readonly logger: Logger
  ) {}

  async resolve(override?: string): Promise<BinDirChoice> {
    if (override !== undefined) {
      try {
        await this.fileSystem.mkdir(override);
        await this.fileSystem.access(override, "write");
        return { path: override, source: "override" };
      } catch (error) {
        this.logger.warn("Bin directory override not writable, using default", {
          path: override,
          error: getErrorMessage(error),
        });
      }
    }

    for (const candidate of this.pathProvider.defaultBinDirs) {
      if (await this.isWritableDirectory(candidate)) {
        return { path: candidate, source: "existing" };
      }
    }

    const [first] = this.pathProvider.defaultBinDirs;
    if (first === undefined) {
      throw new ConfigError("No default bin directory configured");
    }
    await this.fileSystem.mkdir(first);
    this.logger.info("Created bin directory", { path: first });
    return { path: first, source: "created" };
  }

  private async isWritableDirectory(path: string): Promise<boolean> {
    try {
      await this.fileSystem.readdir(path);
      await this.fileSystem.access(path, "write");
      return true;
    } catch {
      return false;
    }
  }
}
