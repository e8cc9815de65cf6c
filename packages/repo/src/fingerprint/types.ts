export const FINGERPRINT_SCHEMA_VERSION = 1;

/**
 * Last successful build of one unit. Valid only while the content hash and the toolchain
 * version still match and the compiled module is still where the build left it.
 */
export interface Fingerprint {
  path: string;
  /** SHA-256 of the source bytes, hex encoded */
  contentHash: string;
  /** Source mtime (epoch ms) when the hash was taken */
  sourceMTime: number;
  sizeBytes: number;
  toolchainVersion: string;
  /** Epoch ms of the successful compile */
  recordedAt: number;
  /** Absolute output directory of the build */
  outputDir?: string;
  /** Compiled module relative to `outputDir`; absent when the compiler left none */
  artifactPath?: string;
}

export type StalenessReason =
  /** No successful build on record */
  | 'missing'
  /** Built with a different compiler version */
  | 'toolchain'
  /** Built into another output directory, or the compiled module is gone */
  | 'output'
  /** Content hash differs */
  | 'content'
  /** mtime and size unchanged, hash skipped */
  | 'unchanged'
  /** mtime moved but the hash still matches */
  | 'touched';

export interface StalenessResult {
  stale: boolean;
  reason: StalenessReason;
  /** Present whenever the check had to hash the file */
  contentHash?: string;
}
