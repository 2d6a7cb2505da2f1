/**
 * Platform information provider.
 * Abstracts process.platform, process.arch, os.homedir() and the environment
 * for testability.
 */

import { homedir } from "node:os";

export interface PlatformInfo {
  /** Operating system platform: 'linux', 'darwin', 'win32', ... */
  readonly platform: NodeJS.Platform;

  /** Raw CPU architecture as reported by the runtime (e.g. 'x64', 'arm64', 'ia32') */
  readonly arch: string;

  /** User's home directory */
  readonly homeDir: string;
}

/**
 * PlatformInfo for the running process.
 */
export function createPlatformInfo(): PlatformInfo {
  return {
    platform: process.platform,
    arch: process.arch,
    homeDir: homedir(),
  };
}
