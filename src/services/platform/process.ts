/**
 * Child processes through execa.
 */

import { execa } from "execa";
import type { Logger } from "../logging/index.js";

export interface ProcessOptions {
  readonly cwd?: string;
  /** Replaces the inherited environment entirely */
  readonly env?: NodeJS.ProcessEnv;
  /**
   * "pipe" (default) captures output into the result. "inherit" shares this
   * process's terminal, leaving stdout and stderr empty in the result.
   */
  readonly stdio?: "pipe" | "inherit";
}

export interface ProcessResult {
  readonly stdout: string;
  readonly stderr: string;
  /** null when the child was signalled, never started, or is still running */
  readonly exitCode: number | null;
  readonly signal?: NodeJS.Signals;
  /** Why the child could not be started (ENOENT, EACCES, ENOEXEC) */
  readonly spawnError?: string;
  /** Set when wait(timeout) gave up before the child exited */
  readonly running?: boolean;
}

export interface SpawnedProcess {
  /** undefined when the child never started */
  readonly pid: number | undefined;

  /**
   * @returns false once the child has exited or when it never started
   */
  sendSignal(signal: NodeJS.Signals): boolean;

  /**
   * Resolves when the child exits. Exit status is reported in the result,
   * never thrown.
   *
   * @param timeout - ms to wait before resolving with `running: true`
   */
  wait(timeout?: number): Promise<ProcessResult>;
}

export interface ProcessRunner {
  /**
   * Spawns immediately and returns a handle.
   *
   * @example
   * const { stdout, stderr } = await runner.run("ldd", ["--version"]).wait(2000);
   */
  run(command: string, args: readonly string[], options?: ProcessOptions): SpawnedProcess;
}

type ExecaSubprocess = ReturnType<typeof execa>;

const STILL_RUNNING: ProcessResult = { stdout: "", stderr: "", exitCode: null, running: true };

function text(value: unknown): string {
  return typeof value === "string" ? value : "";
}

function isSignal(value: unknown): value is NodeJS.Signals {
  return typeof value === "string" && value.startsWith("SIG");
}

function startFailure(settled: object): string | undefined {
  const failed = "failed" in settled && settled.failed === true;
  const exited = "exitCode" in settled && typeof settled.exitCode === "number";
  const signalled = "signal" in settled && isSignal(settled.signal);
  if (!failed || exited || signalled) {
    return undefined;
  }
  if ("originalMessage" in settled && typeof settled.originalMessage === "string") {
    return settled.originalMessage;
  }
  if ("shortMessage" in settled && typeof settled.shortMessage === "string") {
    return settled.shortMessage;
  }
  return "unknown spawn error";
}

function delay<T>(ms: number, value: T): { promise: Promise<T>; cancel: () => void } {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const promise = new Promise<T>((resolve) => {
    timer = setTimeout(() => resolve(value), ms);
  });
  return { promise, cancel: () => clearTimeout(timer) };
}

/**
 * Handle over one execa child. Exit is observed once; later wait() calls
 * return the same result.
 */
export class ExecaSpawnedProcess implements SpawnedProcess {
  private result: ProcessResult | undefined;
  private readonly exit: Promise<ProcessResult>;

  constructor(
    private readonly child: ExecaSubprocess,
    private readonly logger: Logger,
    private readonly label: string
  ) {
    this.exit = this.settle();
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  sendSignal(signal: NodeJS.Signals): boolean {
    const pid = this.child.pid;
    if (pid === undefined || this.result !== undefined) {
      return false;
    }
    this.logger.debug("Signal", { command: this.label, pid, signal });
    return this.child.kill(signal);
  }

  async wait(timeout?: number): Promise<ProcessResult> {
    if (this.result !== undefined) {
      return this.result;
    }
    if (timeout === undefined) {
      return this.record(await this.exit);
    }

    const timer = delay(timeout, STILL_RUNNING);
    try {
      const outcome = await Promise.race([this.exit, timer.promise]);
      if (outcome === STILL_RUNNING) {
        this.logger.warn("Wait timeout", { command: this.label, pid: this.pid ?? 0, timeout });
        return STILL_RUNNING;
      }
      return this.record(outcome);
    } finally {
      timer.cancel();
    }
  }

  private record(result: ProcessResult): ProcessResult {
    if (this.result !== undefined) {
      return this.result;
    }
    this.result = result;

    const prefix = `[${this.label} ${this.pid ?? 0}]`;
    for (const [stream, output] of [
      ["stdout", result.stdout],
      ["stderr", result.stderr],
    ] as const) {
      for (const line of output.split("\n")) {
        if (line.trim() !== "") {
          this.logger.silly(`${prefix} ${stream}: ${line}`);
        }
      }
    }

    if (result.spawnError !== undefined) {
      this.logger.error("Spawn failed", { command: this.label, error: result.spawnError });
    } else {
      this.logger.debug("Exited", {
        command: this.label,
        pid: this.pid ?? 0,
        exitCode: result.exitCode ?? -1,
        signal: result.signal ?? null,
      });
    }
    return result;
  }

  private async settle(): Promise<ProcessResult> {
    // reject: false makes execa resolve for every outcome, spawn errors included
    const settled = await this.child;
    const stdout = text(settled.stdout);
    const stderr = text(settled.stderr);

    const spawnError = startFailure(settled);
    if (spawnError !== undefined) {
      return { stdout, stderr: stderr || spawnError, exitCode: null, spawnError };
    }

    const exitCode = settled.exitCode ?? null;
    return isSignal(settled.signal)
      ? { stdout, stderr, exitCode, signal: settled.signal }
      : { stdout, stderr, exitCode };
  }
}

export class ExecaProcessRunner implements ProcessRunner {
  constructor(private readonly logger: Logger) {}

  run(command: string, args: readonly string[], options: ProcessOptions = {}): SpawnedProcess {
    const child = execa(command, [...args], {
      cleanup: true,
      encoding: "utf8",
      reject: false,
      stdio: options.stdio ?? "pipe",
      ...(options.cwd !== undefined && { cwd: options.cwd }),
      // extendEnv: false so keys absent from the replacement stay absent
      ...(options.env !== undefined && { env: options.env, extendEnv: false }),
    }) as ExecaSubprocess;

    const spawned = new ExecaSpawnedProcess(child, this.logger, command);
    if (spawned.pid !== undefined) {
      this.logger.debug("Spawned", { command, args: args.join(" "), pid: spawned.pid });
    }
    return spawned;
  }
}
