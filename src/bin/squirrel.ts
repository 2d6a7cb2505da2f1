#!/usr/bin/env node
/**
 * squirrel launcher.
 *
 * Finds the installed squirrel binary and runs it with this process's
 * arguments, standard streams, exit code and terminating signal.
 */

import { dirname } from "node:path";
import { fileURLToPath } from "node:url";
import { runLauncher, processTerminationHost, reproduceOutcome } from "../cli/launcher.js";
import { ConsoleReporter } from "../cli/output.js";
import { createLauncherServices } from "../cli/services.js";
import { candidateLocations } from "../services/dispatcher/index.js";

async function main(): Promise<void> {
  const launcherPath = fileURLToPath(import.meta.url);
  const home = process.env.SQUIRREL_HOME;
  const { platform, locator, dispatcher } = createLauncherServices(home ? home : undefined);

  const outcome = await runLauncher(process.argv.slice(2), {
    locator,
    dispatcher,
    candidates: candidateLocations({
      platformInfo: platform.platformInfo,
      pathProvider: platform.pathProvider,
      launcherDir: dirname(launcherPath),
      programFiles: process.env.ProgramFiles,
    }),
    launcherPath,
    stderr: process.stderr,
    env: process.env,
  });
  reproduceOutcome(outcome, processTerminationHost());
}

// Skip when running in test environment (Vitest sets VITEST env var)
if (!process.env.VITEST) {
  main().catch((error: unknown) => {
    ConsoleReporter.create(process.stderr, process.env).error(error);
    process.exitCode = 1;
  });
}
