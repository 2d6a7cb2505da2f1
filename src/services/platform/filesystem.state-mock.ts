/**
 * Behavioral mock for FileSystemLayer with in-memory state.
 *
 * Provides a stateful mock that simulates real filesystem behavior:
 * - In-memory file/directory/symlink storage with symlink resolution
 * - Proper error handling (ENOENT, EISDIR, EEXIST, ENOTEMPTY)
 * - Per-operation failure injection
 * - Custom matchers for behavioral assertions
 *
 * @example
 * const mock = createFileSystemMock({
 *   entries: {
 *     "/root": directory(),
 *     "/root/settings.json": file('{"channel":"stable"}'),
 *   },
 * });
 *
 * await mock.writeFile("/root/settings.json", "{}");
 * expect(mock).toHaveFile("/root/settings.json", "{}");
 */

import { posix } from "node:path";
import { expect } from "vitest";
import type {
  AccessMode,
  DirEntry,
  FileSystemErrorCode,
  FileSystemLayer,
  MkdirOptions,
  RmOptions,
} from "./filesystem.js";
import { FileSystemError } from "../errors.js";
import type {
  MockState,
  MockWithState,
  Snapshot,
  MatcherImplementationsFor,
} from "../../test/state-mock.js";

// =============================================================================
// Entry Types
// =============================================================================

/**
 * File entry in the mock filesystem.
 */
export interface FileEntry {
  readonly type: "file";
  readonly content: string | Buffer;
  readonly executable?: boolean;
  /** If set, accessing this entry throws an error with this code */
  readonly error?: FileSystemErrorCode;
}

/**
 * Directory entry in the mock filesystem.
 */
export interface DirectoryEntry {
  readonly type: "directory";
  /** False simulates a directory the process may not write into */
  readonly writable?: boolean;
  /** If set, accessing this entry throws an error with this code */
  readonly error?: FileSystemErrorCode;
}

/**
 * Symlink entry in the mock filesystem.
 */
export interface SymlinkEntry {
  readonly type: "symlink";
  /** Link target, absolute or relative to the link's directory */
  readonly target: string;
}

/**
 * Any entry type in the mock filesystem.
 */
export type Entry = FileEntry | DirectoryEntry | SymlinkEntry;

/**
 * FileSystemLayer method names that support failure injection.
 */
export type FileSystemOperation = keyof FileSystemLayer;

/**
 * Create a file entry.
 *
 * @example
 * file("hello world")
 * file(Buffer.from([0x7f, 0x45, 0x4c, 0x46]), { executable: true })
 * file("secret", { error: "EACCES" })
 */
export function file(
  content: string | Buffer,
  options?: { executable?: boolean; error?: FileSystemErrorCode }
): FileEntry {
  return {
    type: "file" as const,
    content,
    ...(options?.executable !== undefined && { executable: options.executable }),
    ...(options?.error !== undefined && { error: options.error }),
  };
}

/**
 * Create a directory entry.
 *
 * @example
 * directory()
 * directory({ writable: false })
 */
export function directory(options?: {
  writable?: boolean;
  error?: FileSystemErrorCode;
}): DirectoryEntry {
  return {
    type: "directory" as const,
    ...(options?.writable !== undefined && { writable: options.writable }),
    ...(options?.error !== undefined && { error: options.error }),
  };
}

/**
 * Create a symlink entry.
 *
 * @example
 * symlink("/root/versions/1.0.0")
 */
export function symlink(target: string): SymlinkEntry {
  return { type: "symlink" as const, target };
}

// =============================================================================
// State Interface
// =============================================================================

/**
 * State interface for the filesystem mock.
 */
export interface FileSystemMockState extends MockState {
  /** Read-only access to all entries, keyed by normalized path. */
  readonly entries: ReadonlyMap<string, Entry>;

  /**
   * Set an entry, auto-creating parent directories.
   * Test helper - does NOT follow real filesystem semantics.
   */
  setEntry(path: string, entry: Entry): void;

  /**
   * Make the next calls of an operation on a path fail with the given code.
   * The path is matched after normalization, before symlink resolution.
   *
   * @param times - Number of failures before the operation works again (default: Infinity)
   */
  failOn(
    operation: FileSystemOperation,
    path: string,
    code: FileSystemErrorCode,
    times?: number
  ): void;
}

/**
 * FileSystemLayer with behavioral mock state access via `$` property.
 */
export type MockFileSystemLayer = FileSystemLayer & MockWithState<FileSystemMockState>;

// =============================================================================
// Path Helpers
// =============================================================================

function normalizePath(path: string): string {
  const normalized = posix.normalize(path.replace(/\\/g, "/"));
  return normalized.length > 1 && normalized.endsWith("/") ? normalized.slice(0, -1) : normalized;
}

function parentOf(path: string): string | null {
  if (path === "/") return null;
  return posix.dirname(path);
}

function isDescendant(path: string, ancestor: string): boolean {
  return ancestor === "/" ? path !== "/" : path.startsWith(ancestor + "/");
}

function fsError(code: FileSystemErrorCode, path: string, operation: string): FileSystemError {
  return new FileSystemError(code, path, `${code}: ${operation} '${path}'`);
}

// =============================================================================
// State Implementation
// =============================================================================

interface InjectedFailure {
  readonly code: FileSystemErrorCode;
  remaining: number;
}

class FileSystemMockStateImpl implements FileSystemMockState {
  private readonly _entries = new Map<string, Entry>();
  private readonly failures = new Map<string, InjectedFailure>();

  get entries(): ReadonlyMap<string, Entry> {
    return this._entries;
  }

  setEntry(path: string, entry: Entry): void {
    const normalized = normalizePath(path);
    let parent = parentOf(normalized);
    while (parent !== null) {
      if (!this._entries.has(parent)) {
        this._entries.set(parent, directory());
      }
      parent = parentOf(parent);
    }
    this._entries.set(normalized, entry);
  }

  failOn(
    operation: FileSystemOperation,
    path: string,
    code: FileSystemErrorCode,
    times = Infinity
  ): void {
    this.failures.set(`${operation}:${normalizePath(path)}`, { code, remaining: times });
  }

  /** Throws the injected failure for (operation, path), if any. */
  checkFailure(operation: FileSystemOperation, path: string): void {
    const failure = this.failures.get(`${operation}:${path}`);
    if (failure === undefined || failure.remaining <= 0) return;
    failure.remaining--;
    throw fsError(failure.code, path, operation);
  }

  /** Raw entry without following a final symlink. */
  lstat(path: string): Entry | undefined {
    return this._entries.get(path);
  }

  /**
   * Resolve every symlink in the path.
   * Returns the resolved path; the entry may not exist.
   */
  resolve(path: string, depth = 0): string {
    if (depth > 40) {
      throw fsError("UNKNOWN", path, "resolve (ELOOP)");
    }
    const segments = path.split("/").filter((s) => s.length > 0);
    let current = "/";
    for (let i = 0; i < segments.length; i++) {
      const next = posix.join(current, segments[i] ?? "");
      const entry = this._entries.get(next);
      if (entry?.type === "symlink") {
        const target = posix.isAbsolute(entry.target)
          ? entry.target
          : posix.join(current, entry.target);
        const rest = segments.slice(i + 1).join("/");
        return this.resolve(normalizePath(rest ? `${target}/${rest}` : target), depth + 1);
      }
      current = next;
    }
    return current;
  }

  set(path: string, entry: Entry): void {
    this._entries.set(path, entry);
  }

  delete(path: string): void {
    this._entries.delete(path);
  }

  children(path: string): string[] {
    return [...this._entries.keys()].filter((key) => parentOf(key) === path && key !== path);
  }

  descendants(path: string): string[] {
    return [...this._entries.keys()].filter((key) => isDescendant(key, path));
  }

  snapshot(): Snapshot {
    return { __brand: "Snapshot", value: this.toString() };
  }

  toString(): string {
    const sorted = [...this._entries.entries()].sort(([a], [b]) => a.localeCompare(b));
    return sorted
      .map(([path, entry]) => {
        switch (entry.type) {
          case "file": {
            const content =
              typeof entry.content === "string"
                ? JSON.stringify(
                    entry.content.length > 50 ? entry.content.slice(0, 50) + "..." : entry.content
                  )
                : `<Buffer ${entry.content.length} bytes>`;
            return `${path}: file(${content})${entry.executable ? " [exec]" : ""}`;
          }
          case "directory":
            return `${path}: directory${entry.writable === false ? " [read-only]" : ""}`;
          case "symlink":
            return `${path}: symlink -> ${entry.target}`;
        }
      })
      .join("\n");
  }
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Options for creating a mock filesystem.
 */
export interface MockFileSystemOptions {
  /** Initial entries. Parent directories are created automatically. */
  entries?: Record<string, Entry>;
}

/**
 * Create a behavioral mock for FileSystemLayer.
 *
 * @example Failure injection
 * const mock = createFileSystemMock({ entries: { "/root": directory() } });
 * mock.$.failOn("rename", "/root/staging/install-0/squirrel", "EACCES");
 */
export function createFileSystemMock(options?: MockFileSystemOptions): MockFileSystemLayer {
  const state = new FileSystemMockStateImpl();
  for (const [path, entry] of Object.entries(options?.entries ?? {})) {
    state.setEntry(path, entry);
  }
  let mkdtempCounter = 0;

  function existing(path: string, operation: string): { path: string; entry: Entry } {
    const resolved = state.resolve(path);
    const entry = state.lstat(resolved);
    if (entry === undefined) {
      throw fsError("ENOENT", path, operation);
    }
    if (entry.type !== "symlink" && entry.error !== undefined) {
      throw fsError(entry.error, path, operation);
    }
    return { path: resolved, entry };
  }

  function requireParentDirectory(path: string, operation: string): void {
    const parent = parentOf(path);
    if (parent === null) return;
    const { entry } = existing(parent, operation);
    if (entry.type !== "directory") {
      throw fsError("ENOTDIR", path, operation);
    }
    if (entry.writable === false) {
      throw fsError("EACCES", path, operation);
    }
  }

  function writeContent(rawPath: string, content: string | Buffer, operation: string): void {
    const path = normalizePath(rawPath);
    const resolved = state.resolve(path);
    requireParentDirectory(resolved, operation);
    const current = state.lstat(resolved);
    if (current?.type === "directory") {
      throw fsError("EISDIR", path, operation);
    }
    if (current?.type === "file" && current.error !== undefined) {
      throw fsError(current.error, path, operation);
    }
    const executable = current?.type === "file" && current.executable === true;
    state.set(resolved, file(content, executable ? { executable } : undefined));
  }

  const mock: MockFileSystemLayer = {
    $: state,

    async readFile(rawPath: string): Promise<string> {
      const path = normalizePath(rawPath);
      state.checkFailure("readFile", path);
      const { entry } = existing(path, "open");
      if (entry.type === "directory") {
        throw fsError("EISDIR", path, "read");
      }
      if (entry.type !== "file") {
        throw fsError("ENOENT", path, "open");
      }
      return typeof entry.content === "string" ? entry.content : entry.content.toString("utf-8");
    },

    async writeFile(rawPath: string, content: string): Promise<void> {
      state.checkFailure("writeFile", normalizePath(rawPath));
      writeContent(rawPath, content, "open");
    },

    async writeFileBuffer(rawPath: string, content: Buffer): Promise<void> {
      state.checkFailure("writeFileBuffer", normalizePath(rawPath));
      writeContent(rawPath, Buffer.from(content), "open");
    },

    async mkdir(rawPath: string, options?: MkdirOptions): Promise<void> {
      const path = normalizePath(rawPath);
      state.checkFailure("mkdir", path);
      const recursive = options?.recursive ?? true;
      const resolved = state.resolve(path);
      const current = state.lstat(resolved);
      if (current?.type === "directory") {
        if (!recursive) throw fsError("EEXIST", path, "mkdir");
        return;
      }
      if (current !== undefined) {
        throw fsError("EEXIST", path, "mkdir");
      }
      const parent = parentOf(resolved);
      if (parent !== null && state.lstat(state.resolve(parent)) === undefined) {
        if (!recursive) throw fsError("ENOENT", path, "mkdir");
        await mock.mkdir(parent, { recursive: true });
      }
      requireParentDirectory(resolved, "mkdir");
      state.set(resolved, directory());
    },

    async mkdtemp(rawParent: string, prefix: string): Promise<string> {
      const parent = normalizePath(rawParent);
      state.checkFailure("mkdtemp", parent);
      const { path: resolvedParent, entry } = existing(parent, "mkdtemp");
      if (entry.type !== "directory") {
        throw fsError("ENOTDIR", parent, "mkdtemp");
      }
      if (entry.writable === false) {
        throw fsError("EACCES", parent, "mkdtemp");
      }
      const created = posix.join(resolvedParent, `${prefix}${mkdtempCounter++}`);
      state.set(created, directory());
      return posix.join(parent, `${prefix}${mkdtempCounter - 1}`);
    },

    async readdir(rawPath: string): Promise<readonly DirEntry[]> {
      const path = normalizePath(rawPath);
      state.checkFailure("readdir", path);
      const { path: resolved, entry } = existing(path, "scandir");
      if (entry.type !== "directory") {
        throw fsError("ENOTDIR", path, "scandir");
      }
      return state
        .children(resolved)
        .sort()
        .map((child) => {
          const childEntry = state.lstat(child);
          return {
            name: posix.basename(child),
            isDirectory: childEntry?.type === "directory",
            isFile: childEntry?.type === "file",
            isSymbolicLink: childEntry?.type === "symlink",
          };
        });
    },

    async rm(rawPath: string, options?: RmOptions): Promise<void> {
      const path = normalizePath(rawPath);
      state.checkFailure("rm", path);
      const parent = parentOf(path);
      const target = parent === null ? path : posix.join(state.resolve(parent), posix.basename(path));
      const entry = state.lstat(target);
      if (entry === undefined) {
        if (options?.force) return;
        throw fsError("ENOENT", path, "rm");
      }
      if (entry.type === "directory") {
        const descendants = state.descendants(target);
        if (descendants.length > 0 && !options?.recursive) {
          throw fsError("ENOTEMPTY", path, "rmdir");
        }
        for (const descendant of descendants) {
          state.delete(descendant);
        }
      }
      state.delete(target);
    },

    async makeExecutable(rawPath: string): Promise<void> {
      const path = normalizePath(rawPath);
      state.checkFailure("makeExecutable", path);
      const { path: resolved, entry } = existing(path, "chmod");
      if (entry.type === "file") {
        state.set(resolved, { ...entry, executable: true });
      }
    },

    async symlink(target: string, rawLinkPath: string): Promise<void> {
      const linkPath = normalizePath(rawLinkPath);
      state.checkFailure("symlink", linkPath);
      const parent = parentOf(linkPath);
      const resolvedLink =
        parent === null ? linkPath : posix.join(state.resolve(parent), posix.basename(linkPath));
      if (state.lstat(resolvedLink) !== undefined) {
        throw fsError("EEXIST", linkPath, "symlink");
      }
      requireParentDirectory(resolvedLink, "symlink");
      state.set(resolvedLink, symlink(normalizePath(target)));
    },

    async readlink(rawPath: string): Promise<string> {
      const path = normalizePath(rawPath);
      state.checkFailure("readlink", path);
      const entry = state.lstat(path);
      if (entry === undefined) throw fsError("ENOENT", path, "readlink");
      if (entry.type !== "symlink") {
        throw new FileSystemError("UNKNOWN", path, `EINVAL: readlink '${path}'`, undefined, "EINVAL");
      }
      return entry.target;
    },

    async realpath(rawPath: string): Promise<string> {
      const path = normalizePath(rawPath);
      state.checkFailure("realpath", path);
      return existing(path, "realpath").path;
    },

    async rename(rawOld: string, rawNew: string): Promise<void> {
      const oldPath = normalizePath(rawOld);
      const newPath = normalizePath(rawNew);
      state.checkFailure("rename", oldPath);
      const entry = state.lstat(oldPath);
      if (entry === undefined) throw fsError("ENOENT", oldPath, "rename");
      requireParentDirectory(newPath, "rename");

      const existingTarget = state.lstat(newPath);
      if (existingTarget?.type === "directory") {
        if (entry.type !== "directory") throw fsError("EISDIR", newPath, "rename");
        if (state.descendants(newPath).length > 0) throw fsError("ENOTEMPTY", newPath, "rename");
      } else if (existingTarget !== undefined && entry.type === "directory") {
        throw fsError("ENOTDIR", newPath, "rename");
      }

      const moved = entry.type === "directory" ? state.descendants(oldPath) : [];
      for (const descendant of moved) {
        const child = state.lstat(descendant);
        state.delete(descendant);
        if (child !== undefined) {
          state.set(newPath + descendant.slice(oldPath.length), child);
        }
      }
      state.delete(oldPath);
      state.set(newPath, entry);
    },

    async access(rawPath: string, mode: AccessMode): Promise<void> {
      const path = normalizePath(rawPath);
      state.checkFailure("access", path);
      const { entry } = existing(path, "access");
      if (mode === "execute" && entry.type === "file" && entry.executable !== true) {
        throw fsError("EACCES", path, "access");
      }
      if (mode === "write" && entry.type === "directory" && entry.writable === false) {
        throw fsError("EACCES", path, "access");
      }
    },
  };

  return mock;
}

// =============================================================================
// Custom Matchers
// =============================================================================

interface FileSystemMatchers {
  /** Assert a regular file exists at path (after symlink resolution), optionally with content. */
  toHaveFile(path: string, content?: string | Buffer): void;
  /** Assert a directory exists at path. */
  toHaveDirectory(path: string): void;
  /** Assert a symlink exists at path, optionally pointing at target. */
  toHaveSymlink(path: string, target?: string): void;
}

declare module "vitest" {
  interface Assertion<T> extends FileSystemMatchers {}
}

function resolvedEntry(mock: MockFileSystemLayer, path: string): Entry | undefined {
  const state = mock.$;
  if (!(state instanceof FileSystemMockStateImpl)) return undefined;
  return state.lstat(state.resolve(normalizePath(path)));
}

export const fileSystemMatchers: MatcherImplementationsFor<MockFileSystemLayer, FileSystemMatchers> =
  {
    toHaveFile(received, path, content?) {
      const entry = resolvedEntry(received, path);
      let pass = entry?.type === "file";
      if (pass && content !== undefined && entry?.type === "file") {
        const actual = Buffer.from(entry.content);
        pass = actual.equals(Buffer.from(content));
      }
      return {
        pass,
        message: () =>
          pass
            ? `Expected no file at ${path}`
            : `Expected file at ${path}${content !== undefined ? " with given content" : ""}\nState:\n${received.$.toString()}`,
      };
    },

    toHaveDirectory(received, path) {
      const pass = resolvedEntry(received, path)?.type === "directory";
      return {
        pass,
        message: () =>
          pass
            ? `Expected no directory at ${path}`
            : `Expected directory at ${path}\nState:\n${received.$.toString()}`,
      };
    },

    toHaveSymlink(received, path, target?) {
      const entry = received.$.entries.get(normalizePath(path));
      const pass =
        entry?.type === "symlink" && (target === undefined || entry.target === normalizePath(target));
      return {
        pass,
        message: () =>
          pass
            ? `Expected no symlink at ${path}`
            : `Expected symlink at ${path}${target !== undefined ? ` -> ${target}` : ""}\nState:\n${received.$.toString()}`,
      };
    },
  };

expect.extend(fileSystemMatchers);
