/**
 * Canonical platform identifiers used as manifest lookup keys.
 *
 * A PlatformId is `{os}-{arch}[-{libc}]`, e.g. `linux-x64-musl`,
 * `darwin-arm64`, `windows-x64`. The libc suffix only appears for Linux
 * on musl.
 */

import { UnsupportedPlatformError } from "../errors.js";
import type { Logger } from "../logging/index.js";
import type { PlatformInfo } from "../platform/platform-info.js";
import type { LibcDetector } from "./libc-detector.js";

export type PlatformOs = "darwin" | "linux" | "windows";
export type PlatformArch = "x64" | "arm64";
export type Libc = "glibc" | "musl";

/**
 * Canonical platform string, e.g. `linux-x64-musl`.
 */
export type PlatformId = `${PlatformOs}-${PlatformArch}` | `linux-${PlatformArch}-musl`;

/**
 * Raw host description as reported by the runtime or `uname`.
 */
export interface RawPlatform {
  readonly os: string;
  readonly arch: string;
  /** Only consulted for Linux. Default: glibc */
  readonly libc?: Libc;
}

const RELEASES_PAGE = "https://github.com/squirrelscan/squirrelscan/releases";

const OS_NAMES: ReadonlyMap<string, PlatformOs> = new Map<string, PlatformOs>([
  ["darwin", "darwin"],
  ["linux", "linux"],
  ["win32", "windows"],
  ["windows", "windows"],
  ["windows_nt", "windows"],
]);

const ARCH_NAMES: ReadonlyMap<string, PlatformArch> = new Map<string, PlatformArch>([
  ["x64", "x64"],
  ["x86_64", "x64"],
  ["amd64", "x64"],
  ["arm64", "arm64"],
  ["aarch64", "arm64"],
]);

/**
 * Known-unsupported OS families, matched in order against the lowercased raw name.
 * These get a tailored remediation instead of the generic message.
 */
const UNSUPPORTED_FAMILIES: ReadonlyArray<{
  readonly pattern: RegExp;
  readonly family: string;
  readonly remediation: readonly string[];
}> = [
  {
    pattern: /^(freebsd|openbsd|netbsd|dragonfly)/,
    family: "BSD",
    remediation: [
      "BSD systems have no prebuilt binary.",
      `Check ${RELEASES_PAGE} for supported platforms.`,
    ],
  },
  {
    pattern: /^(cygwin|mingw|msys)/,
    family: "POSIX emulation on Windows",
    remediation: [
      "Run the installer from native Windows (PowerShell or cmd) instead of a POSIX emulation shell.",
      `Or download the Windows build manually from ${RELEASES_PAGE}`,
    ],
  },
];

/**
 * Map raw OS/arch/libc names to a PlatformId.
 *
 * @throws UnsupportedPlatformError naming the raw OS/arch pair
 */
export function resolvePlatformId(raw: RawPlatform): PlatformId {
  const osKey = raw.os.toLowerCase();
  const os = OS_NAMES.get(osKey);
  if (os === undefined) {
    const family = UNSUPPORTED_FAMILIES.find((entry) => entry.pattern.test(osKey));
    throw new UnsupportedPlatformError(
      family
        ? `Unsupported platform: ${raw.os}/${raw.arch} (${family.family} is not supported)`
        : `Unsupported platform: ${raw.os}/${raw.arch}`,
      family?.remediation ?? [`Check ${RELEASES_PAGE} for supported platforms.`]
    );
  }

  const arch = ARCH_NAMES.get(raw.arch.toLowerCase());
  if (arch === undefined) {
    throw new UnsupportedPlatformError(
      `Unsupported architecture: ${raw.os}/${raw.arch}`,
      ["Prebuilt binaries exist for x64 and arm64 only."]
    );
  }

  if (os === "linux" && raw.libc === "musl") {
    return `linux-${arch}-musl`;
  }
  return `${os}-${arch}`;
}

/**
 * Resolves the PlatformId of the running host.
 */
export class PlatformIdResolver {
  constructor(
    private readonly platformInfo: PlatformInfo,
    private readonly libcDetector: LibcDetector,
    private readonly logger: Logger
  ) {}

  async detect(): Promise<PlatformId> {
    const { platform, arch } = this.platformInfo;
    // Probe chain only matters on Linux
    const libc: Libc = platform === "linux" ? await this.libcDetector.detect() : "glibc";
    const platformId = resolvePlatformId({ os: platform, arch, libc });
    this.logger.info("Detected platform", { os: platform, arch, libc, platformId });
    return platformId;
  }
}
