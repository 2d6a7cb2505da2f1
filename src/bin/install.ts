#!/usr/bin/env node
/**
 * squirrel-install entry point.
 *
 * Downloads the squirrel binary for this platform, verifies it against the
 * release manifest and installs it. See `squirrel-install --help`.
 */

import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { runInstallCli } from "../cli/install-command.js";
import { ConsoleReporter } from "../cli/output.js";
import { packageInfoFor, packageRootFrom } from "../cli/package-info.js";
import { createInstallFlow } from "../cli/services.js";

async function main(): Promise<number> {
  const packageRoot = packageRootFrom(import.meta.url);
  const packageInfo = packageInfoFor(
    packageRoot,
    await readFile(join(packageRoot, "package.json"), "utf-8")
  );

  return runInstallCli(process.argv.slice(2), {
    env: process.env,
    stdout: process.stdout,
    stderr: process.stderr,
    packageInfo,
    createFlow: (config) => createInstallFlow(config, process.env),
  });
}

// Skip when running in test environment (Vitest sets VITEST env var)
if (!process.env.VITEST) {
  main().then(
    (exitCode) => {
      process.exitCode = exitCode;
    },
    (error: unknown) => {
      ConsoleReporter.create(process.stderr, process.env).error(error);
      process.exitCode = 1;
    }
  );
}
