import type { PlatformInfo } from "./platform-info.js";

/**
 * PlatformInfo for tests: Linux x64 with home `/home/test` unless overridden.
 */
export function createMockPlatformInfo(overrides: Partial<PlatformInfo> = {}): PlatformInfo {
  return { platform: "linux", arch: "x64", homeDir: "/home/test", ...overrides };
}
