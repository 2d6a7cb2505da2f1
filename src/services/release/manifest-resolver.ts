/**
 * Manifest Resolver - finds a platform's artifact in a release manifest.
 */

import { ManifestError, NetworkError } from "../errors.js";
import type { ResilientFetcher } from "../fetcher/index.js";
import type { Logger } from "../logging/index.js";
import type { PlatformId } from "../platform-id/index.js";
import { ReleaseParseError, type ReleaseParser } from "./parsers/types.js";
import type { ReleaseUrls } from "./release-urls.js";
import type { RawManifestEntry, ResolvedArtifact } from "./types.js";

const SHA256_HEX = /^[0-9a-f]{64}$/i;

/**
 * A usable entry names a plain file and carries a full hex SHA-256.
 * Anything else is treated as absent.
 */
export function isUsableEntry(entry: RawManifestEntry): boolean {
  return (
    entry.filename !== "" &&
    !/[\\/]/.test(entry.filename) &&
    entry.filename !== "." &&
    entry.filename !== ".." &&
    SHA256_HEX.test(entry.sha256)
  );
}

export class ManifestResolver {
  constructor(
    private readonly fetcher: ResilientFetcher,
    private readonly parser: ReleaseParser,
    private readonly urls: ReleaseUrls,
    private readonly logger: Logger
  ) {}

  /**
   * @throws ManifestError MANIFEST_UNAVAILABLE, MANIFEST_MALFORMED or
   *   UNSUPPORTED_PLATFORM_FOR_RELEASE
   */
  async resolve(tag: string, platformId: PlatformId): Promise<ResolvedArtifact> {
    const url = this.urls.manifest(tag);

    let body: string;
    try {
      body = await this.fetcher.fetchText(url);
    } catch (error) {
      if (error instanceof NetworkError) {
        throw new ManifestError(
          `Failed to fetch the manifest for ${tag}`,
          "MANIFEST_UNAVAILABLE",
          tag,
          { remediation: [`URL: ${url}`, ...error.remediation], cause: error }
        );
      }
      throw error;
    }

    let entry: RawManifestEntry | null;
    try {
      entry = this.parser.findManifestEntry(body, platformId);
    } catch (error) {
      if (error instanceof ReleaseParseError) {
        throw new ManifestError(
          `The manifest for ${tag} is malformed: ${error.message}`,
          "MANIFEST_MALFORMED",
          tag,
          { remediation: [`URL: ${url}`], cause: error }
        );
      }
      throw error;
    }

    if (entry === null || !isUsableEntry(entry)) {
      if (entry !== null) {
        this.logger.warn("Ignoring unusable manifest entry", {
          tag,
          platformId,
          filename: entry.filename,
        });
      }
      throw new ManifestError(
        `Release ${tag} has no binary for ${platformId}`,
        "UNSUPPORTED_PLATFORM_FOR_RELEASE",
        tag,
        {
          platformId,
          remediation: [`See ${this.urls.releasePage(tag)} for the platforms this release supports.`],
        }
      );
    }

    const artifact: ResolvedArtifact = {
      tag,
      platformId,
      filename: entry.filename,
      sha256: entry.sha256.toLowerCase(),
      url: this.urls.artifact(tag, entry.filename),
    };
    this.logger.debug("Resolved artifact", { tag, platformId, filename: artifact.filename });
    return artifact;
  }
}
