/**
 * Dispatcher - runs the located binary in place of the launcher.
 *
 * Arguments are passed through positionally, stdio is inherited, and the
 * child's termination (exit code or signal) is handed back for the launcher
 * to reproduce on itself.
 */

import { LaunchFailedError } from "../errors.js";
import type { Logger } from "../logging/index.js";
import type { ProcessRunner } from "../platform/process.js";

/** Signals relayed to the child while it runs. */
export const FORWARDED_SIGNALS: readonly NodeJS.Signals[] = ["SIGINT", "SIGTERM", "SIGHUP"];

/**
 * How the child ended.
 */
export type DispatchOutcome =
  | { readonly kind: "exit"; readonly exitCode: number }
  | { readonly kind: "signal"; readonly signal: NodeJS.Signals };

/**
 * The launcher's own process, as far as signal handling is concerned.
 */
export interface SignalHost {
  on(signal: NodeJS.Signals, listener: () => void): void;
  off(signal: NodeJS.Signals, listener: () => void): void;
}

/**
 * SignalHost over the running process.
 */
export function processSignalHost(): SignalHost {
  return {
    on: (signal, listener) => {
      process.on(signal, listener);
    },
    off: (signal, listener) => {
      process.off(signal, listener);
    },
  };
}

export class Dispatcher {
  constructor(
    private readonly processRunner: ProcessRunner,
    private readonly signalHost: SignalHost,
    private readonly logger: Logger
  ) {}

  /**
   * Run the binary to completion.
   *
   * Signal listeners are installed only while the child runs, so a signal
   * re-raised afterwards takes its default action.
   *
   * @throws LaunchFailedError when the binary cannot be started
   */
  async dispatch(binaryPath: string, args: readonly string[]): Promise<DispatchOutcome> {
    this.logger.debug("Dispatching", { binary: binaryPath, args: args.length });
    const child = this.processRunner.run(binaryPath, args, { stdio: "inherit" });

    const listeners = FORWARDED_SIGNALS.map((signal) => {
      const listener = (): void => {
        const delivered = child.sendSignal(signal);
        this.logger.debug("Forwarded signal", { signal, delivered });
      };
      this.signalHost.on(signal, listener);
      return { signal, listener };
    });

    try {
      const result = await child.wait();

      if (result.spawnError !== undefined) {
        throw new LaunchFailedError(binaryPath, result.spawnError);
      }
      if (result.signal !== undefined) {
        this.logger.debug("Child terminated by signal", { signal: result.signal });
        return { kind: "signal", signal: result.signal };
      }
      const exitCode = result.exitCode ?? 1;
      this.logger.debug("Child exited", { exitCode });
      return { kind: "exit", exitCode };
    } finally {
      for (const { signal, listener } of listeners) {
        this.signalHost.off(signal, listener);
      }
    }
  }
}
