export { VersionResolver, selectRelease } from "./version-resolver.js";
export type { VersionRequest } from "./version-resolver.js";
export { ManifestResolver, isUsableEntry } from "./manifest-resolver.js";
export { ReleaseUrls, DEFAULT_REPOSITORY } from "./release-urls.js";
export { RELEASE_CHANNELS, DEFAULT_CHANNEL } from "./types.js";
export type {
  ReleaseChannel,
  ReleaseEntry,
  ReleaseListing,
  ResolvedVersion,
  RawManifestEntry,
  ResolvedArtifact,
} from "./types.js";
export * from "./parsers/index.js";
