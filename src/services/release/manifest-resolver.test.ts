/**
 * Tests for ManifestResolver.
 */

import { describe, it, expect } from "vitest";
import { ManifestResolver, isUsableEntry } from "./manifest-resolver.js";
import { ReleaseUrls } from "./release-urls.js";
import { StructuredReleaseParser } from "./parsers/structured-parser.js";
import { PatternReleaseParser } from "./parsers/pattern-parser.js";
import type { ReleaseParser } from "./parsers/types.js";
import { ManifestError, NetworkError } from "../errors.js";
import { ResilientFetcher } from "../fetcher/resilient-fetcher.js";
import { createMockHttpClient, type MockHttpClient } from "../platform/http-client.state-mock.js";
import { createSilentLogger } from "../logging/logging.test-utils.js";

const BASE = "https://github.com/squirrelscan/squirrelscan/releases";
const MANIFEST_URL = `${BASE}/download/v1.2.0/manifest.json`;
const SHA = "0123456789abcdef".repeat(4);

const MANIFEST = JSON.stringify({
  binaries: {
    "linux-x64": { filename: "squirrel-v1.2.0-linux-x64", sha256: SHA.toUpperCase() },
    "darwin-arm64": { filename: "../squirrel", sha256: SHA },
    "linux-arm64": { filename: "squirrel-v1.2.0-linux-arm64", sha256: "abc123" },
  },
});

function createResolver(
  httpClient: MockHttpClient,
  parser: ReleaseParser = new StructuredReleaseParser()
): ManifestResolver {
  const fetcher = new ResilientFetcher(httpClient, createSilentLogger(), { retryDelayMs: 0 });
  return new ManifestResolver(fetcher, parser, new ReleaseUrls(), createSilentLogger());
}

describe("ManifestResolver", () => {
  it.each<[string, ReleaseParser]>([
    ["structured", new StructuredReleaseParser()],
    ["pattern", new PatternReleaseParser()],
  ])("resolves a platform's artifact with the %s parser", async (_kind, parser) => {
    const httpClient = createMockHttpClient({ responses: { [MANIFEST_URL]: { body: MANIFEST } } });

    const artifact = await createResolver(httpClient, parser).resolve("v1.2.0", "linux-x64");

    expect(artifact).toEqual({
      tag: "v1.2.0",
      platformId: "linux-x64",
      filename: "squirrel-v1.2.0-linux-x64",
      sha256: SHA,
      url: `${BASE}/download/v1.2.0/squirrel-v1.2.0-linux-x64`,
    });
  });

  it("points at the release page when the platform is missing", async () => {
    const httpClient = createMockHttpClient({ responses: { [MANIFEST_URL]: { body: MANIFEST } } });

    const error = await createResolver(httpClient)
      .resolve("v1.2.0", "windows-arm64")
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ManifestError);
    expect(error).toMatchObject({
      errorCode: "UNSUPPORTED_PLATFORM_FOR_RELEASE",
      tag: "v1.2.0",
      platformId: "windows-arm64",
      message: "Release v1.2.0 has no binary for windows-arm64",
      remediation: [`See ${BASE}/tag/v1.2.0 for the platforms this release supports.`],
    });
  });

  it("treats an entry with a path in its filename as absent", async () => {
    const httpClient = createMockHttpClient({ responses: { [MANIFEST_URL]: { body: MANIFEST } } });

    await expect(createResolver(httpClient).resolve("v1.2.0", "darwin-arm64")).rejects.toMatchObject({
      errorCode: "UNSUPPORTED_PLATFORM_FOR_RELEASE",
    });
  });

  it("treats an entry with a truncated checksum as absent", async () => {
    const httpClient = createMockHttpClient({ responses: { [MANIFEST_URL]: { body: MANIFEST } } });

    await expect(createResolver(httpClient).resolve("v1.2.0", "linux-arm64")).rejects.toMatchObject({
      errorCode: "UNSUPPORTED_PLATFORM_FOR_RELEASE",
    });
  });

  it("reports an unavailable manifest with its tag", async () => {
    const httpClient = createMockHttpClient();

    const error = await createResolver(httpClient)
      .resolve("v1.2.0", "linux-x64")
      .catch((e: unknown) => e);

    expect(error).toMatchObject({
      errorCode: "MANIFEST_UNAVAILABLE",
      tag: "v1.2.0",
      message: "Failed to fetch the manifest for v1.2.0",
    });
    expect(error instanceof ManifestError && error.cause).toBeInstanceOf(NetworkError);
    expect(httpClient).toHaveRequestCount(1);
  });

  it("reports a malformed manifest", async () => {
    const httpClient = createMockHttpClient({
      responses: { [MANIFEST_URL]: { body: "<!DOCTYPE html>" } },
    });

    await expect(createResolver(httpClient).resolve("v1.2.0", "linux-x64")).rejects.toMatchObject({
      errorCode: "MANIFEST_MALFORMED",
      tag: "v1.2.0",
    });
  });
});

describe("isUsableEntry", () => {
  it.each([
    [{ filename: "squirrel-linux-x64", sha256: SHA }, true],
    [{ filename: "squirrel.exe", sha256: SHA.toUpperCase() }, true],
    [{ filename: "", sha256: SHA }, false],
    [{ filename: "bin/squirrel", sha256: SHA }, false],
    [{ filename: "..\\squirrel.exe", sha256: SHA }, false],
    [{ filename: "..", sha256: SHA }, false],
    [{ filename: "squirrel", sha256: "" }, false],
    [{ filename: "squirrel", sha256: `${SHA}0` }, false],
    [{ filename: "squirrel", sha256: "g".repeat(64) }, false],
  ])("%o usable: %s", (entry, expected) => {
    expect(isUsableEntry(entry)).toBe(expected);
  });
});

describe("ReleaseUrls", () => {
  it("builds deterministic URLs for a repository", () => {
    const urls = new ReleaseUrls("acme/tool");

    expect(urls.listing()).toBe("https://api.github.com/repos/acme/tool/releases");
    expect(urls.manifest("v1.0.0")).toBe(
      "https://github.com/acme/tool/releases/download/v1.0.0/manifest.json"
    );
    expect(urls.artifact("v1.0.0", "tool linux")).toBe(
      "https://github.com/acme/tool/releases/download/v1.0.0/tool%20linux"
    );
    expect(urls.releasePage("v1.0.0")).toBe("https://github.com/acme/tool/releases/tag/v1.0.0");
  });
});
