/**
 * Release resolution types.
 */

import type { PlatformId } from "../platform-id/index.js";

/**
 * Named stability track governing which release counts as "latest".
 */
export type ReleaseChannel = "stable" | "beta";

export const RELEASE_CHANNELS = ["stable", "beta"] as const satisfies readonly ReleaseChannel[];

/** Channel used when neither flag, environment nor settings name one. */
export const DEFAULT_CHANNEL: ReleaseChannel = "stable";

/**
 * One entry of the newest-first release listing.
 */
export interface ReleaseEntry {
  readonly tag: string;
  readonly prerelease: boolean;
}

/**
 * A parsed release listing.
 */
export interface ReleaseListing {
  /** Newest first */
  readonly releases: readonly ReleaseEntry[];
  /**
   * False when prerelease flags could not be read. Every entry then reports
   * prerelease: false and channel filtering is meaningless.
   */
  readonly precise: boolean;
}

/**
 * Outcome of version resolution.
 */
export interface ResolvedVersion {
  readonly tag: string;
  readonly source: "pinned" | "channel";
  /** False when the tag came from a listing without prerelease flags */
  readonly precise: boolean;
}

/**
 * A manifest entry as written in the document, before validation.
 */
export interface RawManifestEntry {
  readonly filename: string;
  readonly sha256: string;
}

/**
 * Everything needed to download and verify one platform's artifact.
 */
export interface ResolvedArtifact {
  readonly tag: string;
  readonly platformId: PlatformId;
  readonly filename: string;
  /** Lowercase hex */
  readonly sha256: string;
  readonly url: string;
}
