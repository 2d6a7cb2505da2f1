/**
 * Version Resolver - turns a pin or a channel into a release tag.
 */

import { ReleaseResolutionError } from "../errors.js";
import type { ResilientFetcher } from "../fetcher/index.js";
import type { Logger } from "../logging/index.js";
import { ReleaseParseError, type ReleaseParser } from "./parsers/types.js";
import type { ReleaseUrls } from "./release-urls.js";
import type { ReleaseChannel, ReleaseListing, ResolvedVersion } from "./types.js";

const GITHUB_JSON = "application/vnd.github+json";

export interface VersionRequest {
  /** Used verbatim when non-empty; no network access happens */
  readonly pin?: string | undefined;
  readonly channel: ReleaseChannel;
}

/**
 * Pick the release from a newest-first listing.
 *
 * stable takes the first non-prerelease entry, beta the first entry. An
 * imprecise listing carries no prerelease flags, so its first tag is taken
 * for either channel.
 *
 * @throws ReleaseResolutionError NO_RELEASES_FOUND for an empty listing,
 *   NO_MATCHING_RELEASE when stable filtering leaves nothing
 */
export function selectRelease(
  listing: ReleaseListing,
  channel: ReleaseChannel,
  releasesPage: string
): string {
  const first = listing.releases[0];
  if (first === undefined) {
    throw new ReleaseResolutionError("No releases found", "NO_RELEASES_FOUND", [
      `Check ${releasesPage} for published releases.`,
    ]);
  }

  if (channel === "beta" || !listing.precise) {
    return first.tag;
  }

  const stable = listing.releases.find((release) => !release.prerelease);
  if (stable === undefined) {
    throw new ReleaseResolutionError("No stable release found", "NO_MATCHING_RELEASE", [
      "Only prereleases are published. Install from the beta channel:",
      "  SQUIRREL_CHANNEL=beta squirrel-install   (or: squirrel-install --channel beta)",
    ]);
  }
  return stable.tag;
}

export class VersionResolver {
  constructor(
    private readonly fetcher: ResilientFetcher,
    private readonly parser: ReleaseParser,
    private readonly urls: ReleaseUrls,
    private readonly logger: Logger
  ) {}

  /**
   * @throws NetworkError when the listing cannot be fetched
   * @throws ReleaseResolutionError when it has no usable release
   */
  async resolve(request: VersionRequest): Promise<ResolvedVersion> {
    const { pin, channel } = request;
    if (pin !== undefined && pin !== "") {
      this.logger.info("Using pinned version", { tag: pin });
      return { tag: pin, source: "pinned", precise: true };
    }

    const url = this.urls.listing();
    const body = await this.fetcher.fetchText(url, { accept: GITHUB_JSON });

    let listing: ReleaseListing;
    try {
      listing = this.parser.parseReleaseListing(body);
    } catch (error) {
      if (error instanceof ReleaseParseError) {
        throw new ReleaseResolutionError(
          `Could not read the release listing: ${error.message}`,
          "LISTING_MALFORMED",
          [`URL: ${url}`]
        );
      }
      throw error;
    }

    if (!listing.precise) {
      this.logger.warn("Release listing read without prerelease flags, taking the first tag", {
        channel,
        parser: this.parser.kind,
      });
    }

    const tag = selectRelease(listing, channel, this.urls.releasesPage());
    this.logger.info("Resolved version", {
      tag,
      channel,
      candidates: listing.releases.length,
      precise: listing.precise,
    });
    return { tag, source: "channel", precise: listing.precise };
  }
}
