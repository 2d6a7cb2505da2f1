/**
 * Contract tests shared by both release parsers, plus their differences.
 */

import { describe, it, expect } from "vitest";
import { StructuredReleaseParser } from "./structured-parser.js";
import { PatternReleaseParser } from "./pattern-parser.js";
import { ReleaseParseError, type ReleaseParser } from "./types.js";

const SHA_A = "a".repeat(64);
const SHA_B = "b".repeat(64);

const LISTING = JSON.stringify(
  [
    { tag_name: "v2.1.0-beta", prerelease: true, name: "Beta" },
    { tag_name: "v2.0.0", prerelease: false, name: "Stable" },
  ],
  null,
  2
);

const MANIFEST = JSON.stringify(
  {
    version: "1.2.0",
    binaries: {
      "linux-x64": { filename: "squirrel-v1.2.0-linux-x64", sha256: SHA_A },
      "linux-x64-musl": { filename: "squirrel-v1.2.0-linux-x64-musl", sha256: SHA_B },
      "darwin-arm64": { filename: "", sha256: SHA_A },
      "windows-x64": { filename: "squirrel-v1.2.0-windows-x64.exe" },
    },
  },
  null,
  2
);

describe.each<[string, ReleaseParser]>([
  ["structured", new StructuredReleaseParser()],
  ["pattern", new PatternReleaseParser()],
])("%s parser contract", (_kind, parser) => {
  it("finds a platform entry", () => {
    expect(parser.findManifestEntry(MANIFEST, "linux-x64")).toEqual({
      filename: "squirrel-v1.2.0-linux-x64",
      sha256: SHA_A,
    });
  });

  it("does not confuse a platform with a longer one sharing its prefix", () => {
    expect(parser.findManifestEntry(MANIFEST, "linux-x64-musl")).toEqual({
      filename: "squirrel-v1.2.0-linux-x64-musl",
      sha256: SHA_B,
    });
  });

  it("returns null for a missing platform", () => {
    expect(parser.findManifestEntry(MANIFEST, "windows-arm64")).toBeNull();
  });

  it("treats an entry with an empty filename as absent", () => {
    expect(parser.findManifestEntry(MANIFEST, "darwin-arm64")).toBeNull();
  });

  it("treats an entry without a checksum as absent", () => {
    expect(parser.findManifestEntry(MANIFEST, "windows-x64")).toBeNull();
  });

  it("rejects a document without binaries", () => {
    expect(() => parser.findManifestEntry('{"version":"1.2.0"}', "linux-x64")).toThrow(
      ReleaseParseError
    );
  });

  it("returns an empty listing for an empty array", () => {
    expect(parser.parseReleaseListing("[]").releases).toEqual([]);
  });

  it("rejects a listing that is not an array", () => {
    expect(() => parser.parseReleaseListing('{"message":"Not Found"}')).toThrow(ReleaseParseError);
  });

  it("puts the newest tag first", () => {
    expect(parser.parseReleaseListing(LISTING).releases[0]?.tag).toBe("v2.1.0-beta");
  });
});

describe("StructuredReleaseParser", () => {
  const parser = new StructuredReleaseParser();

  it("reads every release with its prerelease flag", () => {
    expect(parser.parseReleaseListing(LISTING)).toEqual({
      releases: [
        { tag: "v2.1.0-beta", prerelease: true },
        { tag: "v2.0.0", prerelease: false },
      ],
      precise: true,
    });
  });

  it("defaults a missing prerelease flag to false", () => {
    expect(parser.parseReleaseListing('[{"tag_name":"v1.0.0"}]').releases).toEqual([
      { tag: "v1.0.0", prerelease: false },
    ]);
  });

  it("reports invalid JSON", () => {
    expect(() => parser.parseReleaseListing("<html>")).toThrow(/^Release listing is not valid JSON/);
  });

  it("names the offending field", () => {
    expect(() => parser.parseReleaseListing('[{"tag_name":""}]')).toThrow(
      /^Unexpected release listing: 0\.tag_name: /
    );
  });

  it("ignores inherited keys when looking up platforms", () => {
    expect(parser.findManifestEntry(MANIFEST, "constructor")).toBeNull();
  });
});

describe("PatternReleaseParser", () => {
  const parser = new PatternReleaseParser();

  it("returns only the first tag and flags the listing imprecise", () => {
    expect(parser.parseReleaseListing(LISTING)).toEqual({
      releases: [{ tag: "v2.1.0-beta", prerelease: false }],
      precise: false,
    });
  });

  it("reads compact JSON", () => {
    const compact = JSON.stringify({
      binaries: { "darwin-x64": { filename: "squirrel-darwin-x64", sha256: SHA_B } },
    });

    expect(parser.findManifestEntry(compact, "darwin-x64")).toEqual({
      filename: "squirrel-darwin-x64",
      sha256: SHA_B,
    });
  });

  it("treats regex metacharacters in the platform id literally", () => {
    expect(parser.findManifestEntry(MANIFEST, "linux.x64")).toBeNull();
  });
});
