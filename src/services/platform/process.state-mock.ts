/**
 * ProcessRunner double: records every spawn and settles children from
 * per-spawn configuration. `toHaveSpawned` registers on import.
 */

import { expect } from "vitest";
import type { ProcessOptions, ProcessResult, ProcessRunner, SpawnedProcess } from "./process.js";
import type {
  MatcherImplementationsFor,
  MockState,
  MockWithState,
  Snapshot,
} from "../../test/state-mock.js";

/** Expected spawn for `toHaveSpawned`; omitted fields are not compared */
export interface SpawnRecord {
  readonly command?: string;
  readonly args?: readonly string[];
  readonly stdio?: "pipe" | "inherit";
}

export interface SpawnedProcessMockState extends MockState {
  readonly command: string;
  readonly args: readonly string[];
  readonly stdio: "pipe" | "inherit";
  /** Signals delivered while the child was alive */
  readonly signals: readonly NodeJS.Signals[];
  /** Ends a held child. Ignored once it has exited. */
  exit(result: Partial<ProcessResult>): void;
}

export interface ProcessRunnerMockState extends MockState {
  readonly count: number;
  /** @throws Error when fewer children were spawned */
  spawned(index: number): MockSpawnedProcess;
}

export type MockSpawnedProcess = SpawnedProcess & MockWithState<SpawnedProcessMockState>;

export type MockProcessRunner = ProcessRunner & MockWithState<ProcessRunnerMockState>;

/** How one spawn behaves. Unset fields fall back to the runner's defaults. */
export interface SpawnConfig {
  /** Present and undefined: the child has no pid */
  pid?: number | undefined;
  exitCode?: number | null;
  stdout?: string;
  stderr?: string;
  signal?: NodeJS.Signals;
  /** The child never starts; wait() reports this message */
  spawnError?: string;
  /** Stay alive until `$.exit()` */
  hold?: boolean;
}

export interface MockProcessRunnerOptions {
  defaultResult?: { exitCode?: number; stdout?: string; stderr?: string };
  /** Returning undefined uses defaultResult */
  onSpawn?: (
    command: string,
    args: readonly string[],
    options: ProcessOptions | undefined
  ) => SpawnConfig | undefined;
}

const DEFAULT_PID = 12345;

class MockChild implements MockSpawnedProcess {
  readonly $: SpawnedProcessMockState;
  private result: ProcessResult | undefined;
  private readonly received: NodeJS.Signals[] = [];
  private readonly pending: Array<(result: ProcessResult) => void> = [];

  constructor(
    command: string,
    args: readonly string[],
    stdio: "pipe" | "inherit",
    readonly pid: number | undefined,
    initial: ProcessResult | undefined
  ) {
    this.result = initial;
    const received = this.received;
    const describe = (): string =>
      `${command} [${args.join(" ")}] signals=[${received.join(", ")}]`;
    this.$ = {
      command,
      args,
      stdio,
      signals: received,
      exit: (partial) => this.finish(partial),
      snapshot: (): Snapshot => ({ __brand: "Snapshot", value: describe() }),
      toString: describe,
    };
  }

  sendSignal(signal: NodeJS.Signals): boolean {
    if (this.pid === undefined || this.result !== undefined) {
      return false;
    }
    this.received.push(signal);
    return true;
  }

  wait(timeout?: number): Promise<ProcessResult> {
    if (this.result !== undefined) {
      return Promise.resolve(this.result);
    }
    if (timeout !== undefined) {
      return Promise.resolve({ stdout: "", stderr: "", exitCode: null, running: true });
    }
    return new Promise((resolve) => this.pending.push(resolve));
  }

  private finish(partial: Partial<ProcessResult>): void {
    if (this.result !== undefined) {
      return;
    }
    const result: ProcessResult = {
      stdout: partial.stdout ?? "",
      stderr: partial.stderr ?? "",
      exitCode: partial.exitCode ?? null,
      ...(partial.signal !== undefined && { signal: partial.signal }),
    };
    this.result = result;
    for (const resolve of this.pending.splice(0)) {
      resolve(result);
    }
  }
}

function initialResult(
  config: SpawnConfig | undefined,
  defaults: ProcessResult
): ProcessResult | undefined {
  if (config?.spawnError !== undefined) {
    return { stdout: "", stderr: config.spawnError, exitCode: null, spawnError: config.spawnError };
  }
  if (config?.hold === true) {
    return undefined;
  }
  const exitCode = config?.exitCode !== undefined ? config.exitCode : defaults.exitCode;
  const base: ProcessResult = {
    stdout: config?.stdout ?? defaults.stdout,
    stderr: config?.stderr ?? defaults.stderr,
    exitCode,
  };
  return config?.signal !== undefined ? { ...base, signal: config.signal } : base;
}

/**
 * @example
 * const runner = createMockProcessRunner({
 *   onSpawn: (_command, args) => (args[0] === "--version" ? { stderr: "musl libc" } : undefined),
 * });
 *
 * @example A child that lives until the test ends it
 * const runner = createMockProcessRunner({ onSpawn: () => ({ hold: true }) });
 * runner.$.spawned(0).$.exit({ signal: "SIGINT" });
 */
export function createMockProcessRunner(options: MockProcessRunnerOptions = {}): MockProcessRunner {
  const children: MockChild[] = [];
  const defaults: ProcessResult = {
    exitCode: options.defaultResult?.exitCode ?? 0,
    stdout: options.defaultResult?.stdout ?? "",
    stderr: options.defaultResult?.stderr ?? "",
  };
  const describe = (): string => `spawned=[${children.map((c) => c.$.toString()).join("; ")}]`;

  const state: ProcessRunnerMockState = {
    get count(): number {
      return children.length;
    },
    spawned(index: number): MockSpawnedProcess {
      const child = children[index];
      if (child === undefined) {
        throw new Error(`No spawn at index ${index}; ${children.length} recorded`);
      }
      return child;
    },
    snapshot: (): Snapshot => ({ __brand: "Snapshot", value: describe() }),
    toString: describe,
  };

  return {
    $: state,
    run(command, args, runOptions) {
      const config = options.onSpawn?.(command, args, runOptions);
      const pid = config !== undefined && "pid" in config ? config.pid : DEFAULT_PID;
      const child = new MockChild(
        command,
        args,
        runOptions?.stdio ?? "pipe",
        pid,
        initialResult(config, defaults)
      );
      children.push(child);
      return child;
    },
  };
}

function matches(actual: SpawnedProcessMockState, expected: SpawnRecord): boolean {
  const argsMatch =
    expected.args === undefined ||
    (expected.args.length === actual.args.length &&
      expected.args.every((arg, i) => actual.args[i] === arg));
  return (
    (expected.command === undefined || expected.command === actual.command) &&
    argsMatch &&
    (expected.stdio === undefined || expected.stdio === actual.stdio)
  );
}

interface ProcessRunnerMatchers {
  /** Exactly these spawns, in order. Extra spawns fail the assertion. */
  toHaveSpawned(expected: SpawnRecord[]): void;
}

declare module "vitest" {
  interface Assertion<T> extends ProcessRunnerMatchers {}
}

export const processRunnerMatchers: MatcherImplementationsFor<
  MockProcessRunner,
  ProcessRunnerMatchers
> = {
  toHaveSpawned(received, expected) {
    const problems: string[] = [];
    const total = Math.max(received.$.count, expected.length);
    for (let i = 0; i < total; i++) {
      const want = expected[i];
      const got = i < received.$.count ? received.$.spawned(i).$ : undefined;
      if (want === undefined) {
        problems.push(`#${i}: unexpected ${got?.toString() ?? ""}`);
      } else if (got === undefined) {
        problems.push(`#${i}: expected ${JSON.stringify(want)}, nothing spawned`);
      } else if (!matches(got, want)) {
        problems.push(`#${i}: expected ${JSON.stringify(want)}, got ${got.toString()}`);
      }
    }
    const pass = problems.length === 0;
    return {
      pass,
      message: () =>
        pass
          ? `Expected spawns to differ from ${JSON.stringify(expected)}`
          : `Spawn mismatch:\n${problems.join("\n")}`,
    };
  },
};

expect.extend(processRunnerMatchers);
