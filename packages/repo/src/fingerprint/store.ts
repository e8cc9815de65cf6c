import nodeFs from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { z } from 'zod';
import { CacheError, atomicWrite, type Logger } from '@cyforge/shared';
import type { SourceUnit } from '../scanner/types';
import { hashFile, hashContent } from './hasher';
import {
  FINGERPRINT_SCHEMA_VERSION,
  type Fingerprint,
  type StalenessResult,
} from './types';

type Fs = typeof nodeFs;

export const FINGERPRINT_FILENAME = 'fingerprints.json';

const FingerprintEntrySchema = z
  .object({
    contentHash: z.string().min(1),
    sourceMTime: z.number(),
    sizeBytes: z.number().int().min(0),
    toolchainVersion: z.string(),
    recordedAt: z.number(),
    outputDir: z.string().optional(),
    artifactPath: z.string().optional(),
  })
  .passthrough();

type FingerprintEntry = z.infer<typeof FingerprintEntrySchema>;

const StoreFileSchema = z
  .object({
    schemaVersion: z.number().int(),
    updatedAt: z.number().optional(),
    entries: z.record(z.string(), z.unknown()),
  })
  .passthrough();

export interface FingerprintStoreOptions {
  /** Version string of the active compiler configuration */
  toolchainVersion: string;
  logger?: Logger;
  fs?: Fs;
}

/**
 * Durable map from unit path to the fingerprint of its last successful build.
 *
 * `record()` mutates memory only; `flush()` persists with write-to-temp-then-rename, and
 * concurrent flushes are queued so a single write is ever in progress. Fields this version does
 * not know about, at the top level or inside entries, are written back untouched.
 */
export class FingerprintStore {
  readonly filePath: string;
  readonly toolchainVersion: string;
  /** Set when the file on disk was unreadable and the store started empty */
  readonly loadWarning?: string;

  private readonly entries = new Map<string, FingerprintEntry>();
  /** Entries that failed validation; kept verbatim until overwritten or pruned */
  private readonly unreadable = new Map<string, unknown>();
  private readonly extraFields: Record<string, unknown>;
  private readonly fs: Fs;
  private dirty = false;
  private flushChain: Promise<void> = Promise.resolve();

  private constructor(
    filePath: string,
    options: FingerprintStoreOptions,
    extraFields: Record<string, unknown> = {},
    loadWarning?: string,
  ) {
    this.filePath = filePath;
    this.toolchainVersion = options.toolchainVersion;
    this.fs = options.fs ?? nodeFs;
    this.extraFields = extraFields;
    this.loadWarning = loadWarning;
  }

  /**
   * Opens the store at `filePath`. A missing file yields an empty store; a corrupt one is
   * reported through the logger and also yields an empty store.
   */
  static async load(filePath: string, options: FingerprintStoreOptions): Promise<FingerprintStore> {
    const fs = options.fs ?? nodeFs;
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return new FingerprintStore(filePath, options);
      }
      return FingerprintStore.recover(
        filePath,
        options,
        new CacheError(`Fingerprint store is unreadable: ${(error as Error).message}`, {
          cause: error,
          details: { filePath },
        }),
      );
    }

    try {
      return FingerprintStore.fromContent(filePath, options, content);
    } catch (error) {
      if (error instanceof CacheError) {
        return FingerprintStore.recover(filePath, options, error);
      }
      throw error;
    }
  }

  private static recover(
    filePath: string,
    options: FingerprintStoreOptions,
    error: CacheError,
  ): FingerprintStore {
    const warning = `${error.message}; every unit will be rebuilt`;
    void options.logger?.warn(warning);
    const store = new FingerprintStore(filePath, options, {}, warning);
    // The broken file is replaced at the next flush even if nothing is recorded.
    store.dirty = true;
    return store;
  }

  private static fromContent(
    filePath: string,
    options: FingerprintStoreOptions,
    content: string,
  ): FingerprintStore {
    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new CacheError(`Failed to parse fingerprint store: ${(error as Error).message}`, {
        cause: error,
        details: { filePath },
      });
    }

    const result = StoreFileSchema.safeParse(parsed);
    if (!result.success) {
      const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      throw new CacheError(`Fingerprint store has an invalid layout: ${issues}`, {
        details: { filePath },
      });
    }

    const { schemaVersion: _version, updatedAt: _updatedAt, entries, ...extra } = result.data;
    const store = new FingerprintStore(filePath, options, extra);
    for (const [path, raw] of Object.entries(entries)) {
      const entry = FingerprintEntrySchema.safeParse(raw);
      if (entry.success) {
        store.entries.set(path, entry.data);
      } else {
        store.unreadable.set(path, raw);
      }
    }
    return store;
  }

  get size(): number {
    return this.entries.size;
  }

  get(path: string): Fingerprint | undefined {
    const entry = this.entries.get(path);
    return entry ? toFingerprint(path, entry) : undefined;
  }

  paths(): string[] {
    return [...this.entries.keys()].sort();
  }

  /**
   * Decides whether `unit` needs a rebuild. Unchanged mtime and size skip hashing; any other
   * change is settled by the content hash. With `outputDir`, the entry must also have been
   * built into that directory and its compiled module must still exist.
   */
  async isStale(unit: SourceUnit, outputDir?: string): Promise<StalenessResult> {
    const entry = this.entries.get(unit.relativePath);
    if (!entry) {
      return { stale: true, reason: 'missing' };
    }
    if (entry.toolchainVersion !== this.toolchainVersion) {
      return { stale: true, reason: 'toolchain' };
    }
    if (outputDir !== undefined && !(await this.outputIntact(entry, resolve(outputDir)))) {
      return { stale: true, reason: 'output' };
    }
    if (entry.sourceMTime === unit.modifiedTime && entry.sizeBytes === unit.sizeBytes) {
      return { stale: false, reason: 'unchanged' };
    }

    const contentHash = await hashFile(unit.absolutePath);
    if (contentHash !== entry.contentHash) {
      return { stale: true, reason: 'content', contentHash };
    }

    // Same bytes under a new mtime: remember the mtime so the next run takes the fast path.
    this.entries.set(unit.relativePath, {
      ...entry,
      sourceMTime: unit.modifiedTime,
      sizeBytes: unit.sizeBytes,
    });
    this.dirty = true;
    return { stale: false, reason: 'touched', contentHash };
  }

  private async outputIntact(entry: FingerprintEntry, outputDir: string): Promise<boolean> {
    if (entry.outputDir === undefined || resolve(entry.outputDir) !== outputDir) {
      return false;
    }
    if (entry.artifactPath === undefined) {
      return false;
    }
    try {
      await this.fs.access(join(outputDir, entry.artifactPath));
      return true;
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') return false;
      throw error;
    }
  }

  /**
   * Builds the fingerprint for `unit`. Pass `content` when the bytes that were compiled are
   * already in memory, so the hash describes exactly what the compiler saw.
   */
  async fingerprint(
    unit: SourceUnit,
    options: { content?: string | Buffer; outputDir?: string; artifactPath?: string } = {},
  ): Promise<Fingerprint> {
    const contentHash =
      options.content !== undefined
        ? hashContent(options.content)
        : await hashFile(unit.absolutePath);
    return {
      path: unit.relativePath,
      contentHash,
      sourceMTime: unit.modifiedTime,
      sizeBytes: unit.sizeBytes,
      toolchainVersion: this.toolchainVersion,
      recordedAt: Date.now(),
      outputDir: options.outputDir,
      artifactPath: options.artifactPath,
    };
  }

  record(unit: SourceUnit, fingerprint: Fingerprint): void {
    if (fingerprint.path !== unit.relativePath) {
      throw new CacheError(
        `Fingerprint for ${fingerprint.path} cannot be recorded for ${unit.relativePath}`,
      );
    }
    const { path: _path, ...entry } = fingerprint;
    const previous = this.entries.get(unit.relativePath);
    // Keep fields written by newer versions.
    this.entries.set(unit.relativePath, { ...previous, ...entry });
    this.unreadable.delete(unit.relativePath);
    this.dirty = true;
  }

  forget(path: string): boolean {
    const removed = this.entries.delete(path) || this.unreadable.delete(path);
    if (removed) this.dirty = true;
    return removed;
  }

  /**
   * Drops entries whose paths are not in `livePaths`. Returns the dropped paths.
   */
  prune(livePaths: Iterable<string>): string[] {
    const live = new Set(livePaths);
    const removed: string[] = [];
    for (const path of [...this.entries.keys(), ...this.unreadable.keys()]) {
      if (!live.has(path)) {
        this.entries.delete(path);
        this.unreadable.delete(path);
        removed.push(path);
      }
    }
    if (removed.length > 0) this.dirty = true;
    return removed.sort();
  }

  /**
   * Persists pending changes. Calls are serialized; a failed write leaves the previous file
   * in place and keeps the changes pending for the next flush.
   */
  flush(): Promise<void> {
    const run = this.flushChain.then(() => this.write());
    this.flushChain = run.catch(() => undefined);
    return run;
  }

  private async write(): Promise<void> {
    if (!this.dirty) return;
    this.dirty = false;

    const entries: Record<string, unknown> = {};
    const paths = [...new Set([...this.entries.keys(), ...this.unreadable.keys()])].sort();
    for (const path of paths) {
      entries[path] = this.entries.get(path) ?? this.unreadable.get(path);
    }
    const document = {
      ...this.extraFields,
      schemaVersion: FINGERPRINT_SCHEMA_VERSION,
      toolchainVersion: this.toolchainVersion,
      updatedAt: Date.now(),
      entries,
    };

    try {
      await atomicWrite(this.filePath, JSON.stringify(document, null, 2));
    } catch (error) {
      this.dirty = true;
      throw new CacheError(`Failed to write fingerprint store: ${(error as Error).message}`, {
        cause: error,
        details: { filePath: this.filePath },
      });
    }
  }
}

function toFingerprint(path: string, entry: FingerprintEntry): Fingerprint {
  return {
    path,
    contentHash: entry.contentHash,
    sourceMTime: entry.sourceMTime,
    sizeBytes: entry.sizeBytes,
    toolchainVersion: entry.toolchainVersion,
    recordedAt: entry.recordedAt,
    outputDir: entry.outputDir,
    artifactPath: entry.artifactPath,
  };
}
