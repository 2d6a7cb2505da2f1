/**
 * Integrity Verifier.
 *
 * The manifest checksum is the only integrity control on downloaded
 * artifacts. A mismatch always fails; there is no option to skip it.
 */

import { createHash } from "node:crypto";
import { ChecksumMismatchError } from "../errors.js";

/**
 * Lowercase hex SHA-256 of the given bytes.
 */
export function computeSha256(bytes: Uint8Array): string {
  return createHash("sha256").update(bytes).digest("hex");
}

/**
 * Compare the digest of `bytes` with `expected`, ignoring case.
 *
 * @returns The computed digest
 * @throws ChecksumMismatchError when they differ
 */
export function verifyChecksum(bytes: Uint8Array, expected: string): string {
  const actual = computeSha256(bytes);
  if (actual !== expected.toLowerCase()) {
    throw new ChecksumMismatchError(expected, actual);
  }
  return actual;
}

/**
 * Artifact bytes whose checksum has been checked.
 * The installer only accepts this type, so nothing unverified can reach disk.
 */
export class VerifiedArtifact {
  private constructor(
    readonly bytes: Buffer,
    /** Lowercase hex */
    readonly sha256: string
  ) {}

  /**
   * @throws ChecksumMismatchError
   */
  static verify(bytes: Buffer, expectedSha256: string): VerifiedArtifact {
    return new VerifiedArtifact(bytes, verifyChecksum(bytes, expectedSha256));
  }
}
