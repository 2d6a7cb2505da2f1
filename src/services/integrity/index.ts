export { computeSha256, verifyChecksum, VerifiedArtifact } from "./checksum.js";
