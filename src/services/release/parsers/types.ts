/**
 * Interchangeable parsers for release listings and manifests.
 */

import type { RawManifestEntry, ReleaseListing } from "../types.js";

/**
 * Which parser to use. `auto` prefers structured and falls back to pattern
 * when the structured implementation cannot be loaded.
 */
export type ParserPreference = "auto" | "structured" | "pattern";

export const PARSER_PREFERENCES = [
  "auto",
  "structured",
  "pattern",
] as const satisfies readonly ParserPreference[];

/**
 * Thrown when a document is not in the expected shape.
 */
export class ReleaseParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ReleaseParseError";
  }
}

/**
 * Both implementations share one contract so resolvers are parser-agnostic.
 */
export interface ReleaseParser {
  readonly kind: "structured" | "pattern";

  /**
   * @throws ReleaseParseError when the body is not a release listing
   */
  parseReleaseListing(body: string): ReleaseListing;

  /**
   * Look up a platform's entry.
   *
   * @returns The entry as written, or null when the manifest has none for
   *   this platform or it lacks a filename or checksum
   * @throws ReleaseParseError when the body is not a manifest
   */
  findManifestEntry(body: string, platformId: string): RawManifestEntry | null;
}
