import nodeFs from 'node:fs/promises';
import type { Dirent } from 'node:fs';
import path from 'node:path';
import { ScanError, WorkerPool, defaultConcurrency, type Logger } from '@cyforge/shared';
import { PathMatcher } from '../matcher/matcher';
import type { ScanOptions, ScanResult, SourceUnit } from './types';

export * from './types';

type Fs = typeof nodeFs;

/** Directory names never entered at any depth. */
export const BUILTIN_SKIP_DIRS: readonly string[] = ['.git', '__pycache__', 'node_modules'];

export const DEFAULT_EXTENSION = '.py';

/**
 * Units found in one directory and, in name order, every directory below it.
 * Each directory fills only its own arena, so workers never share a list.
 */
interface Arena {
  units: SourceUnit[];
}

type ListedEntry = { kind: 'dir'; relativePath: string } | { kind: 'file'; unit: SourceUnit };

interface ScanContext {
  root: string;
  matcher: PathMatcher;
  extension: string;
  skipDirs: Set<string>;
  pool: WorkerPool;
  warnings: string[];
  directoriesVisited: number;
}

export class Scanner {
  private readonly fs: Fs;
  private readonly logger?: Logger;

  constructor(options: { fs?: Fs; logger?: Logger } = {}) {
    this.fs = options.fs ?? nodeFs;
    this.logger = options.logger;
  }

  /**
   * Collects every file under `root` with the target extension that `matcher` does not
   * exclude. The order of `units` depends only on the tree: entries sorted by name, files
   * and subdirectories interleaved, depth first.
   */
  async scan(
    root: string,
    matcher: PathMatcher = PathMatcher.empty(),
    options: ScanOptions = {},
  ): Promise<ScanResult> {
    const absoluteRoot = path.resolve(root);
    await this.assertDirectory(absoluteRoot);

    const context: ScanContext = {
      root: absoluteRoot,
      matcher,
      extension: options.extension ?? DEFAULT_EXTENSION,
      skipDirs: new Set((options.skipDirs ?? []).map((d) => d.replace(/\/+$/, ''))),
      pool: new WorkerPool(options.concurrency ?? defaultConcurrency(), options.signal),
      warnings: [],
      directoriesVisited: 0,
    };

    const arena = await this.visit(context, '');
    return {
      root: absoluteRoot,
      units: arena.units,
      // Workers finish in any order.
      warnings: [...context.warnings].sort(),
      directoriesVisited: context.directoriesVisited,
    };
  }

  /**
   * Yields the same units as {@link scan}, in the same order.
   */
  async *iterate(
    root: string,
    matcher: PathMatcher = PathMatcher.empty(),
    options: ScanOptions = {},
  ): AsyncGenerator<SourceUnit> {
    const result = await this.scan(root, matcher, options);
    yield* result.units;
  }

  private async assertDirectory(absoluteRoot: string): Promise<void> {
    let isDirectory: boolean;
    try {
      isDirectory = (await this.fs.stat(absoluteRoot)).isDirectory();
    } catch (error) {
      throw new ScanError('', `Target directory does not exist: ${absoluteRoot}`, {
        cause: error,
        fatal: true,
      });
    }
    if (!isDirectory) {
      throw new ScanError('', `Target is not a directory: ${absoluteRoot}`, { fatal: true });
    }
  }

  private async visit(context: ScanContext, relativeDir: string): Promise<Arena> {
    // Listing and stat calls hold a slot; waiting on subdirectories does not.
    const listing = await context.pool.submit(() => this.list(context, relativeDir));

    const parts = await Promise.all(
      listing.map((entry) =>
        entry.kind === 'dir'
          ? this.visit(context, entry.relativePath)
          : Promise.resolve({ units: [entry.unit] }),
      ),
    );
    return { units: parts.flatMap((part) => part.units) };
  }

  private async list(
    context: ScanContext,
    relativeDir: string,
  ): Promise<ListedEntry[]> {
    const absoluteDir = path.join(context.root, relativeDir);
    let entries: Dirent[];
    try {
      entries = await this.fs.readdir(absoluteDir, { withFileTypes: true });
    } catch (error) {
      this.warn(
        context,
        new ScanError(
          relativeDir,
          `Cannot read directory ${relativeDir || '.'}: ${(error as Error).message}`,
          { cause: error },
        ),
      );
      return [];
    }
    context.directoriesVisited++;

    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    const result: ListedEntry[] = [];
    for (const entry of entries) {
      const relativePath = relativeDir ? `${relativeDir}/${entry.name}` : entry.name;

      if (entry.isDirectory()) {
        if (this.shouldEnter(context, entry.name, relativePath)) {
          result.push({ kind: 'dir', relativePath });
        }
        continue;
      }
      // Symlinked files are followed; symlinked directories are not, so cycles cannot occur.
      if (!entry.isFile() && !entry.isSymbolicLink()) continue;
      if (!entry.name.endsWith(context.extension)) continue;
      if (context.matcher.isExcluded(relativePath)) continue;

      const absolutePath = path.join(absoluteDir, entry.name);
      try {
        const stats = await this.fs.stat(absolutePath);
        if (!stats.isFile()) continue;
        result.push({
          kind: 'file',
          unit: {
            relativePath,
            absolutePath,
            sizeBytes: stats.size,
            modifiedTime: stats.mtimeMs,
          },
        });
      } catch (error) {
        this.warn(
          context,
          new ScanError(relativePath, `Cannot stat ${relativePath}: ${(error as Error).message}`, {
            cause: error,
          }),
        );
      }
    }
    return result;
  }

  private shouldEnter(context: ScanContext, name: string, relativePath: string): boolean {
    if (BUILTIN_SKIP_DIRS.includes(name) || context.skipDirs.has(relativePath)) {
      return false;
    }
    return context.matcher.mayContainIncluded(relativePath);
  }

  private warn(context: ScanContext, error: ScanError): void {
    context.warnings.push(error.message);
    void this.logger?.warn(error.message);
  }
}
