/**
 * Degraded parser: extracts fields from raw text with regular expressions.
 *
 * Used when the structured parser cannot be loaded. It reads the first
 * `tag_name` it sees and cannot tell prereleases apart, so its listings are
 * flagged imprecise.
 */

import type { RawManifestEntry, ReleaseListing } from "../types.js";
import { ReleaseParseError, type ReleaseParser } from "./types.js";

const TAG_NAME = /"tag_name"\s*:\s*"([^"]*)"/;
const FILENAME = /"filename"\s*:\s*"([^"]*)"/;
const SHA256 = /"sha256"\s*:\s*"([^"]*)"/;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export class PatternReleaseParser implements ReleaseParser {
  readonly kind = "pattern" as const;

  parseReleaseListing(body: string): ReleaseListing {
    if (!body.trimStart().startsWith("[")) {
      throw new ReleaseParseError("Release listing is not a JSON array");
    }
    const tag = TAG_NAME.exec(body)?.[1];
    return {
      releases: tag ? [{ tag, prerelease: false }] : [],
      precise: false,
    };
  }

  findManifestEntry(body: string, platformId: string): RawManifestEntry | null {
    if (!/"binaries"\s*:/.test(body)) {
      throw new ReleaseParseError("Manifest has no binaries section");
    }
    // Everything from the platform key up to the end of its object
    const section = new RegExp(`"${escapeRegExp(platformId)}"[^}]*`).exec(body)?.[0];
    if (section === undefined) {
      return null;
    }
    const filename = FILENAME.exec(section)?.[1];
    const sha256 = SHA256.exec(section)?.[1];
    if (!filename || !sha256) {
      return null;
    }
    return { filename, sha256 };
  }
}
