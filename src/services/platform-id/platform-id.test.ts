/**
 * Tests for platform identifier resolution.
 */

import { describe, it, expect } from "vitest";
import { resolvePlatformId, PlatformIdResolver, type RawPlatform } from "./platform-id.js";
import { LibcDetector, type LibcProbe } from "./libc-detector.js";
import { UnsupportedPlatformError } from "../errors.js";
import { createMockPlatformInfo } from "../platform/platform-info.test-utils.js";
import { createSilentLogger } from "../logging/logging.test-utils.js";

function fixedProbe(result: boolean): LibcProbe {
  return { name: "fixed", test: async () => result };
}

describe("resolvePlatformId", () => {
  it.each<[RawPlatform, string]>([
    [{ os: "darwin", arch: "arm64" }, "darwin-arm64"],
    [{ os: "darwin", arch: "x86_64" }, "darwin-x64"],
    [{ os: "linux", arch: "x64" }, "linux-x64"],
    [{ os: "linux", arch: "aarch64", libc: "glibc" }, "linux-arm64"],
    [{ os: "linux", arch: "amd64", libc: "musl" }, "linux-x64-musl"],
    [{ os: "Linux", arch: "arm64", libc: "musl" }, "linux-arm64-musl"],
    [{ os: "win32", arch: "x64" }, "windows-x64"],
    [{ os: "Windows_NT", arch: "arm64" }, "windows-arm64"],
  ])("maps %o to %s", (raw, expected) => {
    expect(resolvePlatformId(raw)).toBe(expected);
  });

  it("ignores libc outside Linux", () => {
    expect(resolvePlatformId({ os: "darwin", arch: "arm64", libc: "musl" })).toBe("darwin-arm64");
  });

  it("is deterministic for the same input", () => {
    const raw: RawPlatform = { os: "linux", arch: "x86_64", libc: "musl" };

    expect(resolvePlatformId(raw)).toBe(resolvePlatformId(raw));
  });

  it("rejects unknown architectures naming the raw pair", () => {
    expect(() => resolvePlatformId({ os: "linux", arch: "ia32" })).toThrow(
      "Unsupported architecture: linux/ia32"
    );
  });

  it("rejects unknown operating systems naming the raw pair", () => {
    expect(() => resolvePlatformId({ os: "aix", arch: "ppc64" })).toThrow(
      "Unsupported platform: aix/ppc64"
    );
  });

  it("does not treat inherited object keys as OS names", () => {
    expect(() => resolvePlatformId({ os: "constructor", arch: "x64" })).toThrow(
      UnsupportedPlatformError
    );
  });

  it("gives BSD a family-specific remediation", () => {
    try {
      resolvePlatformId({ os: "freebsd", arch: "x64" });
      expect.unreachable("should have thrown");
    } catch (error) {
      expect(error).toBeInstanceOf(UnsupportedPlatformError);
      expect(error).toMatchObject({
        message: "Unsupported platform: freebsd/x64 (BSD is not supported)",
        code: "UNSUPPORTED_PLATFORM",
        remediation: [
          "BSD systems have no prebuilt binary.",
          "Check https://github.com/squirrelscan/squirrelscan/releases for supported platforms.",
        ],
      });
    }
  });

  it.each(["MINGW64_NT-10.0", "msys", "CYGWIN_NT-10.0"])(
    "rejects POSIX emulation on Windows (%s)",
    (os) => {
      expect(() => resolvePlatformId({ os, arch: "x86_64" })).toThrow(
        `Unsupported platform: ${os}/x86_64 (POSIX emulation on Windows is not supported)`
      );
    }
  );
});

describe("PlatformIdResolver", () => {
  it("adds the musl suffix when the detector finds musl on Linux", async () => {
    const resolver = new PlatformIdResolver(
      createMockPlatformInfo({ platform: "linux", arch: "arm64" }),
      new LibcDetector([fixedProbe(true)], createSilentLogger()),
      createSilentLogger()
    );

    expect(await resolver.detect()).toBe("linux-arm64-musl");
  });

  it("returns plain linux ids on glibc", async () => {
    const resolver = new PlatformIdResolver(
      createMockPlatformInfo({ platform: "linux", arch: "x64" }),
      new LibcDetector([fixedProbe(false)], createSilentLogger()),
      createSilentLogger()
    );

    expect(await resolver.detect()).toBe("linux-x64");
  });

  it("skips the probe chain outside Linux", async () => {
    let probed = false;
    const probe: LibcProbe = {
      name: "spy",
      test: async () => {
        probed = true;
        return true;
      },
    };
    const resolver = new PlatformIdResolver(
      createMockPlatformInfo({ platform: "darwin", arch: "arm64" }),
      new LibcDetector([probe], createSilentLogger()),
      createSilentLogger()
    );

    expect(await resolver.detect()).toBe("darwin-arm64");
    expect(probed).toBe(false);
  });

  it("propagates unsupported hosts", async () => {
    const resolver = new PlatformIdResolver(
      createMockPlatformInfo({ platform: "freebsd", arch: "x64" }),
      new LibcDetector([], createSilentLogger()),
      createSilentLogger()
    );

    await expect(resolver.detect()).rejects.toBeInstanceOf(UnsupportedPlatformError);
  });
});
