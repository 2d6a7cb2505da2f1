/**
 * Filesystem access behind an injectable interface. Services get the
 * in-memory state mock in unit tests and DefaultFileSystemLayer in
 * production; both throw FileSystemError.
 */

import * as fs from "node:fs/promises";
import { constants } from "node:fs";
import { join } from "node:path";
import { FileSystemError } from "../errors.js";
import type { LogContext, Logger } from "../logging/index.js";

export interface DirEntry {
  /** Base name, not a full path */
  readonly name: string;
  readonly isDirectory: boolean;
  readonly isFile: boolean;
  readonly isSymbolicLink: boolean;
}

export interface MkdirOptions {
  /** Create missing parents. Default: true */
  readonly recursive?: boolean;
}

export interface RmOptions {
  /** Default: false */
  readonly recursive?: boolean;
  /** Succeed when the path is already gone. Default: false */
  readonly force?: boolean;
}

export type AccessMode = "exists" | "read" | "write" | "execute";

/** POSIX codes services branch on; everything else is UNKNOWN */
export type FileSystemErrorCode =
  | "ENOENT"
  | "EACCES"
  | "EEXIST"
  | "ENOTDIR"
  | "EISDIR"
  | "ENOTEMPTY"
  | "UNKNOWN";

/**
 * Paths are absolute and text is UTF-8. There is no exists(): callers act
 * and handle ENOENT, or probe with access() where probing is the point.
 */
export interface FileSystemLayer {
  /** @throws FileSystemError ENOENT, EISDIR */
  readFile(path: string): Promise<string>;

  /** Overwrites. @throws FileSystemError ENOENT when the parent is missing */
  writeFile(path: string, content: string): Promise<void>;

  writeFileBuffer(path: string, content: Buffer): Promise<void>;

  /** No-op for an existing directory. @throws FileSystemError EEXIST for a file */
  mkdir(path: string, options?: MkdirOptions): Promise<void>;

  /**
   * Creates `<parentDir>/<prefix><random>`; the parent must exist.
   *
   * @returns the new directory
   */
  mkdtemp(parentDir: string, prefix: string): Promise<string>;

  /** @throws FileSystemError ENOENT, ENOTDIR */
  readdir(path: string): Promise<readonly DirEntry[]>;

  /**
   * Symlinks are removed as links, never followed.
   *
   * @throws FileSystemError ENOENT unless `force`, ENOTEMPTY unless `recursive`
   */
  rm(path: string, options?: RmOptions): Promise<void>;

  /** chmod 755. No-op on Windows. */
  makeExecutable(path: string): Promise<void>;

  /**
   * Directory link at `linkPath`; a junction on Windows.
   *
   * @throws FileSystemError EEXIST when `linkPath` is taken
   */
  symlink(target: string, linkPath: string): Promise<void>;

  /** @throws FileSystemError ENOENT, or UNKNOWN (EINVAL) for a non-link */
  readlink(linkPath: string): Promise<string>;

  /** Follows every link. @throws FileSystemError ENOENT */
  realpath(path: string): Promise<string>;

  /**
   * Atomic within one filesystem. Replaces a file or link at `newPath`.
   */
  rename(oldPath: string, newPath: string): Promise<void>;

  /** @throws FileSystemError ENOENT, EACCES */
  access(path: string, mode: AccessMode): Promise<void>;
}

const MAPPED_CODES = new Set<string>(["ENOENT", "EACCES", "EEXIST", "ENOTDIR", "EISDIR", "ENOTEMPTY"]);

function isMappedCode(code: string): code is Exclude<FileSystemErrorCode, "UNKNOWN"> {
  return MAPPED_CODES.has(code);
}

/**
 * fs.rm reports ERR_FS_* codes and keeps the POSIX code under `info.code`.
 */
function errnoOf(error: Error): string | undefined {
  if ("info" in error && typeof error.info === "object" && error.info !== null) {
    const info: object = error.info;
    if ("code" in info && typeof info.code === "string") {
      return info.code;
    }
  }
  return "code" in error && typeof error.code === "string" ? error.code : undefined;
}

function toFileSystemError(error: unknown, path: string): FileSystemError {
  if (!(error instanceof Error)) {
    return new FileSystemError("UNKNOWN", path, String(error));
  }
  const code = errnoOf(error);
  return code !== undefined && isMappedCode(code)
    ? new FileSystemError(code, path, error.message, error)
    : new FileSystemError("UNKNOWN", path, error.message, error, code);
}

const ACCESS_FLAGS: Readonly<Record<AccessMode, number>> = {
  exists: constants.F_OK,
  read: constants.R_OK,
  write: constants.W_OK,
  execute: constants.X_OK,
};

const isWindows = (): boolean => process.platform === "win32";

export class DefaultFileSystemLayer implements FileSystemLayer {
  constructor(private readonly logger: Logger) {}

  readFile(path: string): Promise<string> {
    return this.run("read", path, () => fs.readFile(path, "utf-8"));
  }

  writeFile(path: string, content: string): Promise<void> {
    return this.run("write", path, () => fs.writeFile(path, content, "utf-8"));
  }

  writeFileBuffer(path: string, content: Buffer): Promise<void> {
    return this.run("write", path, () => fs.writeFile(path, content), { size: content.length });
  }

  async mkdir(path: string, options: MkdirOptions = {}): Promise<void> {
    await this.run("mkdir", path, () => fs.mkdir(path, { recursive: options.recursive ?? true }));
  }

  mkdtemp(parentDir: string, prefix: string): Promise<string> {
    return this.run("mkdtemp", parentDir, () => fs.mkdtemp(join(parentDir, prefix)));
  }

  readdir(path: string): Promise<readonly DirEntry[]> {
    return this.run("readdir", path, async () =>
      (await fs.readdir(path, { withFileTypes: true })).map((entry) => ({
        name: entry.name,
        isDirectory: entry.isDirectory(),
        isFile: entry.isFile(),
        isSymbolicLink: entry.isSymbolicLink(),
      }))
    );
  }

  async rm(path: string, options: RmOptions = {}): Promise<void> {
    const { recursive = false, force = false } = options;
    this.logger.debug("rm", { path, recursive });
    try {
      if (recursive) {
        await fs.rm(path, { recursive, force });
      } else if ((await fs.lstat(path)).isDirectory()) {
        await fs.rmdir(path);
      } else {
        await fs.unlink(path);
      }
    } catch (error) {
      const mapped = toFileSystemError(error, path);
      if (force && mapped.fsCode === "ENOENT") {
        return;
      }
      throw this.warned("rm", mapped);
    }
  }

  async makeExecutable(path: string): Promise<void> {
    if (isWindows()) {
      return;
    }
    await this.run("chmod", path, () => fs.chmod(path, 0o755));
  }

  symlink(target: string, linkPath: string): Promise<void> {
    return this.run("symlink", linkPath, () =>
      fs.symlink(target, linkPath, isWindows() ? "junction" : undefined), { target }
    );
  }

  readlink(linkPath: string): Promise<string> {
    return this.probe(linkPath, () => fs.readlink(linkPath));
  }

  realpath(path: string): Promise<string> {
    return this.probe(path, () => fs.realpath(path));
  }

  rename(oldPath: string, newPath: string): Promise<void> {
    return this.run("rename", oldPath, () => fs.rename(oldPath, newPath), { newPath });
  }

  access(path: string, mode: AccessMode): Promise<void> {
    return this.probe(path, () => fs.access(path, ACCESS_FLAGS[mode]));
  }

  /**
   * Logged operation: debug before, warn with the mapped code on failure.
   */
  private async run<T>(
    operation: string,
    path: string,
    action: () => Promise<T>,
    context: LogContext = {}
  ): Promise<T> {
    this.logger.debug(operation, { path, ...context });
    try {
      return await action();
    } catch (error) {
      throw this.warned(operation, toFileSystemError(error, path));
    }
  }

  private warned(operation: string, error: FileSystemError): FileSystemError {
    this.logger.warn(`${operation} failed`, {
      path: error.path,
      code: error.fsCode,
      error: error.message,
    });
    return error;
  }

  /** Lookups that routinely fail; errors are mapped but not logged */
  private async probe<T>(path: string, action: () => Promise<T>): Promise<T> {
    try {
      return await action();
    } catch (error) {
      throw toFileSystemError(error, path);
    }
  }
}
