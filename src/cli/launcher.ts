/**
 * `squirrel` launcher: find the real binary and become it.
 */

import { isServiceError } from "../services/errors.js";
import type {
  BinaryLocator,
  DispatchOutcome,
  Dispatcher,
} from "../services/dispatcher/index.js";
import { ConsoleReporter, type OutputStream } from "./output.js";

export interface LauncherContext {
  readonly locator: BinaryLocator;
  readonly dispatcher: Dispatcher;
  /** Ordered paths to probe; see candidateLocations */
  readonly candidates: readonly string[];
  /** Path this launcher was started from */
  readonly launcherPath: string;
  readonly stderr: OutputStream;
  readonly env: NodeJS.ProcessEnv;
}

/**
 * Locate and run the binary with `args` untouched.
 *
 * Service failures (no binary, binary would not start) are printed and
 * become exit code 1. Anything else propagates.
 */
export async function runLauncher(
  args: readonly string[],
  context: LauncherContext
): Promise<DispatchOutcome> {
  try {
    const binaryPath = await context.locator.locate(context.candidates, context.launcherPath);
    return await context.dispatcher.dispatch(binaryPath, args);
  } catch (error) {
    if (!isServiceError(error)) throw error;
    ConsoleReporter.create(context.stderr, context.env).error(error);
    return { kind: "exit", exitCode: 1 };
  }
}

/**
 * What the launcher does to itself once the child is gone.
 */
export interface TerminationHost {
  setExitCode(code: number): void;
  raise(signal: NodeJS.Signals): void;
}

export function processTerminationHost(): TerminationHost {
  return {
    setExitCode: (code) => {
      process.exitCode = code;
    },
    raise: (signal) => {
      process.kill(process.pid, signal);
    },
  };
}

/**
 * Reproduce the child's termination: same exit code, or the same signal
 * re-raised on this process.
 */
export function reproduceOutcome(outcome: DispatchOutcome, host: TerminationHost): void {
  if (outcome.kind === "signal") {
    host.raise(outcome.signal);
  } else {
    host.setExitCode(outcome.exitCode);
  }
}
