/**
 * Structured parser: JSON validated with zod schemas.
 */

import { z } from "zod";
import type { RawManifestEntry, ReleaseListing } from "../types.js";
import { ReleaseParseError, type ReleaseParser } from "./types.js";

const releaseSchema = z.object({
  tag_name: z.string().min(1),
  prerelease: z.boolean().default(false),
});

const listingSchema = z.array(releaseSchema);

const manifestSchema = z.object({
  binaries: z.record(z.unknown()),
});

const entrySchema = z.object({
  filename: z.string(),
  sha256: z.string(),
});

function parseJson(body: string, what: string): unknown {
  try {
    return JSON.parse(body);
  } catch (error) {
    throw new ReleaseParseError(
      `${what} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

export class StructuredReleaseParser implements ReleaseParser {
  readonly kind = "structured" as const;

  parseReleaseListing(body: string): ReleaseListing {
    const result = listingSchema.safeParse(parseJson(body, "Release listing"));
    if (!result.success) {
      throw new ReleaseParseError(`Unexpected release listing: ${describeIssues(result.error)}`);
    }
    return {
      releases: result.data.map((release) => ({
        tag: release.tag_name,
        prerelease: release.prerelease,
      })),
      precise: true,
    };
  }

  findManifestEntry(body: string, platformId: string): RawManifestEntry | null {
    const result = manifestSchema.safeParse(parseJson(body, "Manifest"));
    if (!result.success) {
      throw new ReleaseParseError(`Unexpected manifest: ${describeIssues(result.error)}`);
    }
    if (!Object.hasOwn(result.data.binaries, platformId)) {
      return null;
    }
    const entry = entrySchema.safeParse(result.data.binaries[platformId]);
    if (!entry.success || entry.data.filename === "" || entry.data.sha256 === "") {
      return null;
    }
    return entry.data;
  }
}
