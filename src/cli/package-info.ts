/**
 * Locations inside the installed npm package.
 *
 * Layout:
 *   <root>/package.json
 *   <root>/dist/bin/          launcher scripts; packaged binary goes here
 *   <root>/skills/squirrel/SKILL.md
 */

import { dirname, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { ConfigError, getErrorMessage } from "../services/errors.js";
import type { PackageInfo } from "./install-command.js";

const packageJsonSchema = z.object({
  version: z.string().min(1),
});

/**
 * Package root for a module two levels below it (`dist/bin/*.js` or `src/bin/*.ts`).
 */
export function packageRootFrom(moduleUrl: string): string {
  return resolve(dirname(fileURLToPath(moduleUrl)), "..", "..");
}

/**
 * @param packageJson - Contents of `<root>/package.json`
 * @throws ConfigError when the manifest is unreadable or has no version
 */
export function packageInfoFor(packageRoot: string, packageJson: string): PackageInfo {
  let data: unknown;
  try {
    data = JSON.parse(packageJson);
  } catch (error) {
    throw new ConfigError(`Invalid package.json: ${getErrorMessage(error)}`);
  }

  const parsed = packageJsonSchema.safeParse(data);
  if (!parsed.success) {
    throw new ConfigError("Invalid package.json: missing version", [
      `Package: ${packageRoot}`,
    ]);
  }

  return {
    version: parsed.data.version,
    launcherDir: join(packageRoot, "dist", "bin"),
    skillSource: join(packageRoot, "skills", "squirrel", "SKILL.md"),
  };
}
