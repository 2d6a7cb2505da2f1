/**
 * Helpers for boundary tests that touch the real filesystem.
 */

import { mkdtemp, realpath, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

export interface TempDir {
  /** Canonical path (macOS /var and Windows short names resolved) */
  readonly path: string;
  cleanup(): Promise<void>;
}

export async function createTempDir(prefix = "squirrel-test-"): Promise<TempDir> {
  const path = await realpath(await mkdtemp(join(tmpdir(), prefix)));
  return {
    path,
    cleanup: () => rm(path, { recursive: true, force: true, maxRetries: 3, retryDelay: 100 }),
  };
}
