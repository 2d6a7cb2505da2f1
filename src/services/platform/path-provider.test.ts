/**
 * Tests for DefaultPathProvider.
 */

import { join } from "node:path";
import { describe, it, expect } from "vitest";
import { DefaultPathProvider, binaryFileName } from "./path-provider.js";
import { createMockPlatformInfo } from "./platform-info.test-utils.js";

describe("DefaultPathProvider", () => {
  describe("install root", () => {
    it("uses ~/.local/share/squirrel on Linux", () => {
      const provider = new DefaultPathProvider(
        createMockPlatformInfo({ platform: "linux", homeDir: "/home/alice" })
      );
      expect(provider.installRoot).toBe(join("/home/alice", ".local", "share", "squirrel"));
    });

    it("uses Application Support on macOS", () => {
      const provider = new DefaultPathProvider(
        createMockPlatformInfo({ platform: "darwin", homeDir: "/Users/alice" })
      );
      expect(provider.installRoot).toBe(
        join("/Users/alice", "Library", "Application Support", "squirrel")
      );
    });

    it("uses AppData/Local on Windows", () => {
      const provider = new DefaultPathProvider(
        createMockPlatformInfo({ platform: "win32", homeDir: "C:/Users/alice" })
      );
      expect(provider.installRoot).toBe(join("C:/Users/alice", "AppData", "Local", "squirrel"));
    });

    it("prefers an explicit root", () => {
      const provider = new DefaultPathProvider(createMockPlatformInfo(), "/opt/squirrel");
      expect(provider.installRoot).toBe("/opt/squirrel");
    });
  });

  it("lays out versions, pointer, staging, settings and logs under the root", () => {
    const provider = new DefaultPathProvider(createMockPlatformInfo(), "/r");

    expect(provider.versionsDir).toBe(join("/r", "versions"));
    expect(provider.currentPointerPath).toBe(join("/r", "current"));
    expect(provider.stagingDir).toBe(join("/r", "staging"));
    expect(provider.settingsPath).toBe(join("/r", "settings.json"));
    expect(provider.logsDir).toBe(join("/r", "logs"));
    expect(provider.versionDir("1.2.0")).toBe(join("/r", "versions", "1.2.0"));
    expect(provider.currentBinaryPath).toBe(join("/r", "current", "squirrel"));
  });

  it("lists user bin directories in preference order", () => {
    const provider = new DefaultPathProvider(createMockPlatformInfo({ homeDir: "/home/bob" }));
    expect(provider.defaultBinDirs).toEqual([
      join("/home/bob", ".local", "bin"),
      join("/home/bob", "bin"),
    ]);
  });

  it("keeps the launcher under the install root on Windows", () => {
    const provider = new DefaultPathProvider(
      createMockPlatformInfo({ platform: "win32", homeDir: "C:/Users/bob" }),
      "/r"
    );
    expect(provider.defaultBinDirs).toEqual([join("/r", "bin")]);
  });

  it("uses the .exe binary name on Windows", () => {
    const provider = new DefaultPathProvider(createMockPlatformInfo({ platform: "win32" }), "/r");
    expect(provider.binaryName).toBe("squirrel.exe");
    expect(provider.currentBinaryPath).toBe(join("/r", "current", "squirrel.exe"));
  });
});

describe("binaryFileName", () => {
  it("adds .exe only on Windows", () => {
    expect(binaryFileName("win32")).toBe("squirrel.exe");
    expect(binaryFileName("linux")).toBe("squirrel");
    expect(binaryFileName("darwin")).toBe("squirrel");
  });
});
