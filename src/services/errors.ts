/**
 * Service error definitions.
 *
 * Every failure that reaches the user is a ServiceError subclass carrying a
 * stable `code` and, where one exists, remediation lines the CLI prints under
 * the message.
 */

import type { FileSystemErrorCode } from "./platform/filesystem.js";

/**
 * Discriminant for ServiceError subclasses.
 */
export type ServiceErrorType =
  | "filesystem"
  | "platform"
  | "network"
  | "release"
  | "manifest"
  | "integrity"
  | "install"
  | "dispatch"
  | "config";

/**
 * Error codes for network failures.
 */
export type NetworkErrorCode = "NETWORK_ERROR" | "HTTP_STATUS" | "TIMEOUT" | "TOO_MANY_REDIRECTS";

/**
 * Error codes for version resolution.
 */
export type ReleaseResolutionErrorCode =
  | "NO_RELEASES_FOUND"
  | "NO_MATCHING_RELEASE"
  | "LISTING_MALFORMED";

/**
 * Error codes for manifest resolution.
 */
export type ManifestErrorCode =
  | "MANIFEST_UNAVAILABLE"
  | "MANIFEST_MALFORMED"
  | "UNSUPPORTED_PLATFORM_FOR_RELEASE";

/**
 * Installer steps, reported by InstallFailedError.
 */
export type InstallStep =
  | "stage"
  | "chmod"
  | "create-version-dir"
  | "move"
  | "swap-pointer"
  | "publish"
  | "persist-settings"
  | "self-install";

/**
 * Base class for all service errors.
 */
export abstract class ServiceError extends Error {
  abstract readonly type: ServiceErrorType;
  readonly code: string | undefined;
  /** Human-readable next steps, one per line. */
  readonly remediation: readonly string[];

  constructor(message: string, code?: string, remediation: readonly string[] = []) {
    super(message);
    this.name = this.constructor.name;
    this.code = code ?? undefined;
    this.remediation = remediation;
    // Fix prototype chain for instanceof to work
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Error from filesystem operations.
 */
export class FileSystemError extends ServiceError {
  readonly type = "filesystem" as const;

  constructor(
    /** Mapped error code */
    readonly fsCode: FileSystemErrorCode,
    /** Path that caused the error */
    readonly path: string,
    message: string,
    /** Original error for debugging */
    override readonly cause?: Error,
    /** Original Node.js error code (e.g., "EMFILE", "ENOSPC") */
    readonly originalCode?: string
  ) {
    super(message, fsCode);
    this.name = "FileSystemError";
  }
}

/**
 * The host OS/architecture combination has no published build.
 */
export class UnsupportedPlatformError extends ServiceError {
  readonly type = "platform" as const;

  constructor(message: string, remediation: readonly string[] = []) {
    super(message, "UNSUPPORTED_PLATFORM", remediation);
    this.name = "UnsupportedPlatformError";
  }
}

/**
 * A remote resource could not be retrieved after all attempts.
 */
export class NetworkError extends ServiceError {
  readonly type = "network" as const;

  constructor(
    readonly url: string,
    message: string,
    readonly errorCode: NetworkErrorCode = "NETWORK_ERROR",
    readonly status?: number,
    override readonly cause?: Error
  ) {
    super(message, errorCode, [
      "Check your internet connection and proxy settings, then retry.",
    ]);
    this.name = "NetworkError";
  }
}

/**
 * The release listing had nothing usable for the requested channel.
 */
export class ReleaseResolutionError extends ServiceError {
  readonly type = "release" as const;

  constructor(
    message: string,
    readonly errorCode: ReleaseResolutionErrorCode,
    remediation: readonly string[] = []
  ) {
    super(message, errorCode, remediation);
    this.name = "ReleaseResolutionError";
  }
}

/**
 * The release manifest was missing, unreadable, or lacked this platform.
 */
export class ManifestError extends ServiceError {
  readonly type = "manifest" as const;
  readonly platformId: string | undefined;
  override readonly cause: Error | undefined;

  constructor(
    message: string,
    readonly errorCode: ManifestErrorCode,
    readonly tag: string,
    options: {
      readonly platformId?: string;
      readonly remediation?: readonly string[];
      readonly cause?: Error;
    } = {}
  ) {
    super(message, errorCode, options.remediation);
    this.name = "ManifestError";
    this.platformId = options.platformId;
    this.cause = options.cause;
  }
}

/**
 * Downloaded bytes do not hash to the manifest checksum.
 */
export class ChecksumMismatchError extends ServiceError {
  readonly type = "integrity" as const;

  constructor(
    readonly expected: string,
    readonly actual: string
  ) {
    super(`Checksum mismatch\n  Expected: ${expected}\n  Actual:   ${actual}`, "CHECKSUM_MISMATCH", [
      "The download may be corrupted or tampered with. Nothing was installed; retry later.",
    ]);
    this.name = "ChecksumMismatchError";
  }
}

/**
 * An installer step failed. The previously active version, if any, is untouched
 * unless the failing step came after the pointer swap.
 */
export class InstallFailedError extends ServiceError {
  readonly type = "install" as const;

  constructor(
    readonly step: InstallStep,
    message: string,
    override readonly cause?: Error,
    /** Exit code of the installed binary when step is "self-install" */
    readonly exitCode?: number
  ) {
    super(message, "INSTALL_FAILED");
    this.name = "InstallFailedError";
  }
}

/**
 * No candidate location holds an executable binary.
 */
export class BinaryNotFoundError extends ServiceError {
  readonly type = "dispatch" as const;

  constructor(readonly probedPaths: readonly string[]) {
    super(
      `squirrel binary not found. Checked:\n${probedPaths.map((p) => `  - ${p}`).join("\n")}`,
      "BINARY_NOT_FOUND",
      [
        "Reinstall with: npm install -g squirrelscan",
        "Or: curl -fsSL https://squirrelscan.com/install | bash",
      ]
    );
    this.name = "BinaryNotFoundError";
  }
}

/**
 * The located binary could not be started.
 */
export class LaunchFailedError extends ServiceError {
  readonly type = "dispatch" as const;

  constructor(
    readonly binaryPath: string,
    reason: string
  ) {
    super(`Could not execute squirrel: ${reason}`, "LAUNCH_FAILED", [`Binary: ${binaryPath}`]);
    this.name = "LaunchFailedError";
  }
}

/**
 * Invalid installer configuration (flags or environment).
 */
export class ConfigError extends ServiceError {
  readonly type = "config" as const;

  constructor(message: string, remediation: readonly string[] = []) {
    super(message, "INVALID_CONFIG", remediation);
    this.name = "ConfigError";
  }
}

/**
 * Type guard to check if an error is a ServiceError.
 */
export function isServiceError(error: unknown): error is ServiceError {
  return error instanceof ServiceError;
}

export { getErrorMessage } from "../shared/error-utils.js";
