/**
 * Tests for PlatformInfo factory functions.
 */

import { homedir } from "node:os";
import { describe, it, expect } from "vitest";
import { createPlatformInfo } from "./platform-info.js";
import { createMockPlatformInfo } from "./platform-info.test-utils.js";

describe("createPlatformInfo", () => {
  it("reflects the running process", () => {
    const info = createPlatformInfo();

    expect(info.platform).toBe(process.platform);
    expect(info.arch).toBe(process.arch);
    expect(info.homeDir).toBe(homedir());
  });
});

describe("createMockPlatformInfo", () => {
  it("returns sensible defaults", () => {
    expect(createMockPlatformInfo()).toEqual({
      platform: "linux",
      arch: "x64",
      homeDir: "/home/test",
    });
  });

  it("accepts partial overrides", () => {
    const info = createMockPlatformInfo({ platform: "darwin", arch: "arm64" });

    expect(info.platform).toBe("darwin");
    expect(info.arch).toBe("arm64");
    expect(info.homeDir).toBe("/home/test");
  });
});
