export { resolvePlatformId, PlatformIdResolver } from "./platform-id.js";
export type { PlatformId, PlatformOs, PlatformArch, Libc, RawPlatform } from "./platform-id.js";
export { LibcDetector, createDefaultLibcProbes } from "./libc-detector.js";
export type { LibcProbe, LibcProbeDeps } from "./libc-detector.js";
