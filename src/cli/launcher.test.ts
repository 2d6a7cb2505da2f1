/**
 * Tests for the squirrel launcher.
 */

import { describe, it, expect } from "vitest";
import { reproduceOutcome, runLauncher, type TerminationHost } from "./launcher.js";
import type { OutputStream } from "./output.js";
import { BinaryLocator, Dispatcher, type SignalHost } from "../services/dispatcher/index.js";
import { createFileSystemMock, file, type Entry } from "../services/platform/filesystem.state-mock.js";
import {
  createMockProcessRunner,
  type MockProcessRunner,
} from "../services/platform/process.state-mock.js";
import { createMockPlatformInfo } from "../services/platform/platform-info.test-utils.js";
import { createSilentLogger } from "../services/logging/logging.test-utils.js";

const LAUNCHER = "/pkg/dist/bin/squirrel.js";
const USER_BIN = "/home/test/.local/bin/squirrel";
const MANAGED = "/test/root/current/squirrel";

const signalHost: SignalHost = { on: () => undefined, off: () => undefined };

function setup(entries: Record<string, Entry>, runner: MockProcessRunner = createMockProcessRunner()) {
  const chunks: string[] = [];
  const stderr: OutputStream = { isTTY: false, write: (chunk) => chunks.push(chunk) };
  const context = {
    locator: new BinaryLocator(
      createFileSystemMock({ entries: { [LAUNCHER]: file("launcher"), ...entries } }),
      createMockPlatformInfo(),
      createSilentLogger()
    ),
    dispatcher: new Dispatcher(runner, signalHost, createSilentLogger()),
    candidates: [USER_BIN, MANAGED],
    launcherPath: LAUNCHER,
    stderr,
    env: {},
  };
  return { context, chunks, runner };
}

describe("runLauncher", () => {
  it("runs the first usable binary with the arguments unchanged", async () => {
    const { context, runner } = setup(
      { [MANAGED]: file("bin", { executable: true }) },
      createMockProcessRunner({ defaultResult: { exitCode: 3 } })
    );

    const outcome = await runLauncher(["audit", "https://example.com", "--", "-x"], context);

    expect(outcome).toEqual({ kind: "exit", exitCode: 3 });
    expect(runner).toHaveSpawned([
      { command: MANAGED, args: ["audit", "https://example.com", "--", "-x"] },
    ]);
  });

  it("passes a terminating signal through", async () => {
    const { context } = setup(
      { [USER_BIN]: file("bin", { executable: true }) },
      createMockProcessRunner({ onSpawn: () => ({ exitCode: null, signal: "SIGTERM" }) })
    );

    expect(await runLauncher([], context)).toEqual({ kind: "signal", signal: "SIGTERM" });
  });

  it("prints where it looked and exits 1 when no binary exists", async () => {
    const { context, chunks, runner } = setup({});

    expect(await runLauncher(["--version"], context)).toEqual({ kind: "exit", exitCode: 1 });

    expect(chunks).toEqual([
      `Error: squirrel binary not found. Checked:\n  - ${USER_BIN}\n  - ${MANAGED}\n`,
      "  Reinstall with: npm install -g squirrelscan\n",
      "  Or: curl -fsSL https://squirrelscan.com/install | bash\n",
    ]);
    expect(runner).toHaveSpawned([]);
  });

  it("exits 1 when the binary cannot be started", async () => {
    const { context, chunks } = setup(
      { [USER_BIN]: file("bin", { executable: true }) },
      createMockProcessRunner({ onSpawn: () => ({ spawnError: "spawn EACCES" }) })
    );

    expect(await runLauncher([], context)).toEqual({ kind: "exit", exitCode: 1 });

    expect(chunks).toEqual([
      "Error: Could not execute squirrel: spawn EACCES\n",
      `  Binary: ${USER_BIN}\n`,
    ]);
  });
});

describe("reproduceOutcome", () => {
  function createHost(): TerminationHost & { calls: string[] } {
    const calls: string[] = [];
    return {
      calls,
      setExitCode: (code) => {
        calls.push(`exit ${code}`);
      },
      raise: (signal) => {
        calls.push(`raise ${signal}`);
      },
    };
  }

  it("sets the child's exit code", () => {
    const host = createHost();

    reproduceOutcome({ kind: "exit", exitCode: 42 }, host);

    expect(host.calls).toEqual(["exit 42"]);
  });

  it("re-raises the child's signal instead of exiting with a code", () => {
    const host = createHost();

    reproduceOutcome({ kind: "signal", signal: "SIGINT" }, host);

    expect(host.calls).toEqual(["raise SIGINT"]);
  });
});
