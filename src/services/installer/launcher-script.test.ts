/**
 * Tests for launcher wrapper generation.
 */

import { describe, it, expect } from "vitest";
import {
  generateLauncherScript,
  isManagedLauncherScript,
  launcherScriptName,
} from "./launcher-script.js";

describe("generateLauncherScript", () => {
  it("execs the target from a POSIX shell", () => {
    expect(generateLauncherScript("linux", "/home/test/.local/share/squirrel/current/squirrel")).toBe(
      "#!/bin/sh\n# managed by squirrel-install\nexec '/home/test/.local/share/squirrel/current/squirrel' \"$@\"\n"
    );
  });

  it("escapes single quotes in the path", () => {
    expect(generateLauncherScript("darwin", "/Users/o'neil/current/squirrel")).toBe(
      "#!/bin/sh\n# managed by squirrel-install\nexec '/Users/o'\\''neil/current/squirrel' \"$@\"\n"
    );
  });

  it("writes a cmd script with backslashes on Windows", () => {
    expect(generateLauncherScript("win32", "C:/Users/test/AppData/Local/squirrel/current/squirrel.exe")).toBe(
      '@echo off\r\nrem managed by squirrel-install\r\n"C:\\Users\\test\\AppData\\Local\\squirrel\\current\\squirrel.exe" %*\r\nexit /b %ERRORLEVEL%\r\n'
    );
  });
});

describe("launcherScriptName", () => {
  it("adds .cmd on Windows only", () => {
    expect(launcherScriptName("win32")).toBe("squirrel.cmd");
    expect(launcherScriptName("linux")).toBe("squirrel");
  });
});

describe("isManagedLauncherScript", () => {
  it("recognises generated wrappers on every platform", () => {
    expect(isManagedLauncherScript(generateLauncherScript("linux", "/x"))).toBe(true);
    expect(isManagedLauncherScript(generateLauncherScript("win32", "C:/x"))).toBe(true);
  });

  it("rejects foreign files", () => {
    expect(isManagedLauncherScript("#!/usr/bin/env node\nrequire('./cli.js');\n")).toBe(false);
    expect(isManagedLauncherScript("\u007fELF")).toBe(false);
    expect(isManagedLauncherScript("")).toBe(false);
  });
});
