/**
 * One source file tracked as an independent item of build work.
 * Identity is `relativePath`; units are created by a scan and never mutated.
 */
export interface SourceUnit {
  /** Root-relative path with forward slashes */
  readonly relativePath: string;
  readonly absolutePath: string;
  readonly sizeBytes: number;
  /** Modification time in epoch milliseconds */
  readonly modifiedTime: number;
}

export interface ScanOptions {
  /** File extension to collect, including the dot. Defaults to `.py`. */
  extension?: string;
  /** Maximum number of directories listed concurrently */
  concurrency?: number;
  /** Root-relative directories never entered, regardless of rules */
  skipDirs?: readonly string[];
  signal?: AbortSignal;
}

export interface ScanResult {
  root: string;
  units: SourceUnit[];
  warnings: string[];
  /** Number of directories that were listed */
  directoriesVisited: number;
}
