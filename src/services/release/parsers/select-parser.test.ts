/**
 * Tests for the release parser capability probe.
 */

import { describe, it, expect } from "vitest";
import { selectReleaseParser } from "./select-parser.js";
import { ConfigError } from "../../errors.js";
import { createBehavioralLogger, createSilentLogger } from "../../logging/logging.test-utils.js";

const failingLoader = async (): Promise<never> => {
  throw new Error("Cannot find package 'zod'");
};

describe("selectReleaseParser", () => {
  it("loads the structured parser in auto mode", async () => {
    const parser = await selectReleaseParser("auto", createSilentLogger());

    expect(parser.kind).toBe("structured");
  });

  it("uses the pattern parser when asked", async () => {
    const parser = await selectReleaseParser("pattern", createSilentLogger(), failingLoader);

    expect(parser.kind).toBe("pattern");
  });

  it("falls back to the pattern parser with a warning in auto mode", async () => {
    const logger = createBehavioralLogger();

    const parser = await selectReleaseParser("auto", logger, failingLoader);

    expect(parser.kind).toBe("pattern");
    expect(logger.getMessagesByLevel("warn")).toEqual([
      {
        level: "warn",
        message: "Structured release parser unavailable, using pattern matching",
        context: { error: "Cannot find package 'zod'" },
      },
    ]);
  });

  it("fails when structured is required but unavailable", async () => {
    await expect(
      selectReleaseParser("structured", createSilentLogger(), failingLoader)
    ).rejects.toThrow(ConfigError);
  });
});
