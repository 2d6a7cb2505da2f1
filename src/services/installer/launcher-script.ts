/**
 * Launcher wrapper published into the user's bin directory.
 *
 * The wrapper always execs `<root>/current/squirrel`, so it never changes
 * between versions; only the CurrentPointer moves.
 */

/** Second line of every wrapper; identifies files this installer may replace. */
export const WRAPPER_MARKER = "managed by squirrel-install";

/**
 * Wrapper filename: `squirrel.cmd` on Windows, `squirrel` elsewhere.
 */
export function launcherScriptName(platform: NodeJS.Platform): string {
  return platform === "win32" ? "squirrel.cmd" : "squirrel";
}

/**
 * Generate the wrapper that execs the binary behind the CurrentPointer.
 */
export function generateLauncherScript(platform: NodeJS.Platform, targetPath: string): string {
  if (platform === "win32") {
    const windowsPath = targetPath.replace(/\//g, "\\");
    return `@echo off\r\nrem ${WRAPPER_MARKER}\r\n"${windowsPath}" %*\r\nexit /b %ERRORLEVEL%\r\n`;
  }
  // End the quote, add an escaped quote, start a new quote
  const escapedPath = targetPath.replace(/'/g, "'\\''");
  return `#!/bin/sh\n# ${WRAPPER_MARKER}\nexec '${escapedPath}' "$@"\n`;
}

/**
 * Whether existing file content is a wrapper this installer wrote.
 */
export function isManagedLauncherScript(content: string): boolean {
  return content.split(/\r?\n/, 2)[1]?.includes(WRAPPER_MARKER) ?? false;
}
