/**
 * Linux C library detection as an ordered chain of probes.
 *
 * Each probe answers "is there evidence of musl?". The first probe that
 * answers true decides; if none does, the host is glibc.
 */

import { getErrorMessage } from "../errors.js";
import type { Logger } from "../logging/index.js";
import type { FileSystemLayer } from "../platform/filesystem.js";
import type { ProcessRunner } from "../platform/process.js";
import type { Libc } from "./platform-id.js";

/** Time allowed for `ldd` to answer. */
const LDD_TIMEOUT_MS = 2000;

/**
 * A single piece of musl evidence.
 */
export interface LibcProbe {
  /** Short name used in logs */
  readonly name: string;
  /** Resolves true when the probe found musl. May throw; a throw counts as no evidence. */
  test(): Promise<boolean>;
}

/**
 * Dependencies of the default probes.
 */
export interface LibcProbeDeps {
  readonly fileSystem: FileSystemLayer;
  readonly processRunner: ProcessRunner;
}

async function lddOutput(processRunner: ProcessRunner, args: readonly string[]): Promise<string> {
  const child = processRunner.run("ldd", args);
  const result = await child.wait(LDD_TIMEOUT_MS);
  if (result.running) {
    child.sendSignal("SIGKILL");
    return "";
  }
  if (result.spawnError !== undefined) {
    return "";
  }
  // musl's ldd prints its banner to stderr and exits non-zero
  return `${result.stdout}\n${result.stderr}`;
}

/**
 * The default probe chain, in evaluation order:
 * 1. musl dynamic loader (`/lib/ld-musl-*`)
 * 2. Alpine release marker (`/etc/alpine-release`)
 * 3. `ldd --version` output mentions musl
 * 4. `ldd /bin/ls` links against musl
 */
export function createDefaultLibcProbes(deps: LibcProbeDeps): readonly LibcProbe[] {
  const { fileSystem, processRunner } = deps;
  return [
    {
      name: "musl-loader",
      async test() {
        const entries = await fileSystem.readdir("/lib");
        return entries.some((entry) => entry.name.startsWith("ld-musl-"));
      },
    },
    {
      name: "alpine-release",
      async test() {
        await fileSystem.access("/etc/alpine-release", "exists");
        return true;
      },
    },
    {
      name: "ldd-version",
      async test() {
        return /musl/i.test(await lddOutput(processRunner, ["--version"]));
      },
    },
    {
      name: "ldd-linkage",
      async test() {
        return /musl/.test(await lddOutput(processRunner, ["/bin/ls"]));
      },
    },
  ];
}

/**
 * Evaluates a probe chain.
 */
export class LibcDetector {
  constructor(
    private readonly probes: readonly LibcProbe[],
    private readonly logger: Logger
  ) {}

  async detect(): Promise<Libc> {
    for (const probe of this.probes) {
      let found: boolean;
      try {
        found = await probe.test();
      } catch (error) {
        this.logger.silly("Probe found no evidence", {
          probe: probe.name,
          error: getErrorMessage(error),
        });
        continue;
      }
      if (found) {
        this.logger.debug("musl detected", { probe: probe.name });
        return "musl";
      }
    }
    return "glibc";
  }
}
