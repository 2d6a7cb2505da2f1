/**
 * Terminal output for the installer and launcher.
 *
 * Line prefixes follow the shell installer convention:
 * `==>` for steps, `::` for details, `Warning:` and `Error:`.
 */

import { isServiceError, getErrorMessage } from "../services/errors.js";
import type { DownloadProgress } from "../services/fetcher/index.js";
import type { InstallReporter } from "../services/install-flow.js";

/**
 * Where output goes. `process.stderr` satisfies this.
 */
export interface OutputStream {
  write(chunk: string): unknown;
  readonly isTTY?: boolean;
}

const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
} as const;

type ColorName = Exclude<keyof typeof COLORS, "reset">;

/**
 * Colors only on a terminal, and never when NO_COLOR is set.
 */
export function colorEnabled(stream: OutputStream, env: NodeJS.ProcessEnv): boolean {
  return stream.isTTY === true && !env.NO_COLOR;
}

export class Palette {
  constructor(private readonly enabled: boolean) {}

  paint(text: string, color: ColorName): string {
    return this.enabled ? `${COLORS[color]}${text}${COLORS.reset}` : text;
  }

  green(text: string): string {
    return this.paint(text, "green");
  }

  blue(text: string): string {
    return this.paint(text, "blue");
  }

  yellow(text: string): string {
    return this.paint(text, "yellow");
  }

  red(text: string): string {
    return this.paint(text, "red");
  }

  bold(text: string): string {
    return this.paint(text, "bold");
  }
}

function formatMegabytes(bytes: number): string {
  return (bytes / (1024 * 1024)).toFixed(1);
}

/**
 * Progress text for a download, e.g. `42% (4.2 / 10.0 MB)`.
 */
export function formatProgress({ bytesDownloaded, totalBytes }: DownloadProgress): string {
  if (totalBytes === null || totalBytes === 0) {
    return `${formatMegabytes(bytesDownloaded)} MB`;
  }
  const percent = Math.min(100, Math.floor((bytesDownloaded / totalBytes) * 100));
  return `${percent}% (${formatMegabytes(bytesDownloaded)} / ${formatMegabytes(totalBytes)} MB)`;
}

/**
 * `Error:` line followed by the error's remediation, indented.
 */
export function formatErrorLines(error: unknown): readonly string[] {
  const lines = [getErrorMessage(error)];
  if (isServiceError(error)) {
    lines.push(...error.remediation.map((line) => `  ${line}`));
  }
  return lines;
}

/**
 * InstallReporter writing prefixed lines to a stream.
 *
 * Download progress is redrawn in place on a terminal and omitted otherwise.
 */
export class ConsoleReporter implements InstallReporter {
  private progressActive = false;

  constructor(
    private readonly stream: OutputStream,
    private readonly palette: Palette
  ) {}

  static create(stream: OutputStream, env: NodeJS.ProcessEnv): ConsoleReporter {
    return new ConsoleReporter(stream, new Palette(colorEnabled(stream, env)));
  }

  step(message: string): void {
    this.line(`${this.palette.green("==>")} ${message}`);
  }

  info(message: string): void {
    this.line(`${this.palette.blue("::")} ${message}`);
  }

  warn(message: string): void {
    this.line(`${this.palette.yellow("Warning:")} ${message}`);
  }

  error(error: unknown): void {
    const [first = "", ...rest] = formatErrorLines(error);
    this.line(`${this.palette.red("Error:")} ${first}`);
    for (const line of rest) {
      this.line(line);
    }
  }

  progress(progress: DownloadProgress): void {
    if (this.stream.isTTY !== true) return;
    this.stream.write(`\r${this.palette.blue("::")} Downloaded ${formatProgress(progress)}`);
    this.progressActive = true;
  }

  /** Unprefixed line. */
  line(text: string): void {
    if (this.progressActive) {
      this.stream.write("\n");
      this.progressActive = false;
    }
    this.stream.write(`${text}\n`);
  }
}
