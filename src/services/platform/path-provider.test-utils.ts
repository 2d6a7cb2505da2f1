/**
 * Test utilities for PathProvider.
 */
import { DefaultPathProvider, type PathProvider } from "./path-provider.js";
import { createMockPlatformInfo } from "./platform-info.test-utils.js";
import type { PlatformInfo } from "./platform-info.js";

/**
 * Create a PathProvider rooted at a fixed test directory.
 * Defaults to a Linux layout under `/test/root` with home `/home/test`.
 *
 * @param installRoot - Install root (use a temp directory in boundary tests)
 * @param platformInfo - Optional platform overrides (binary name, bin dirs)
 */
export function createTestPathProvider(
  installRoot = "/test/root",
  platformInfo?: Partial<PlatformInfo>
): PathProvider {
  return new DefaultPathProvider(createMockPlatformInfo(platformInfo), installRoot);
}
