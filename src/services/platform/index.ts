/**
 * Platform layer exports.
 *
 * Platform layers abstract OS/runtime-specific operations (filesystem,
 * HTTP, child processes, host paths) behind injectable interfaces.
 */

// Filesystem Layer
export { DefaultFileSystemLayer } from "./filesystem.js";
export type {
  FileSystemLayer,
  DirEntry,
  MkdirOptions,
  RmOptions,
  AccessMode,
  FileSystemErrorCode,
} from "./filesystem.js";

// Network Layer
export { DefaultNetworkLayer } from "./network.js";
export type { HttpClient, HttpRequestOptions, NetworkLayerConfig } from "./network.js";

// Process Layer
export { ExecaProcessRunner } from "./process.js";
export type { ProcessRunner, SpawnedProcess, ProcessOptions, ProcessResult } from "./process.js";

// Host information
export { createPlatformInfo } from "./platform-info.js";
export type { PlatformInfo } from "./platform-info.js";
export { DefaultPathProvider, BINARY_BASENAME, binaryFileName } from "./path-provider.js";
export type { PathProvider } from "./path-provider.js";
