import { promises as fs, type Stats } from 'fs';
import { remove } from 'fs-extra';
import path from 'path';
import { isWithin, normalizePath, type Logger } from '@cyforge/shared';
import { PathMatcher } from '@cyforge/repo';

export interface CleanOptions {
  /** Directory being cleaned; never removed itself */
  root: string;
  /** Files with these extensions are removed at the root and inside artifact directories */
  artifactExtensions: readonly string[];
  /** Root-relative directories removed with their contents */
  artifactDirs: readonly string[];
  /** Root-relative files removed when present, such as the fingerprint store */
  files?: readonly string[];
  /** Allow-list; a matching path and its ancestors survive */
  keep?: PathMatcher;
  logger?: Logger;
}

export interface CleanResult {
  /** Root-relative paths that were deleted, sorted */
  removed: string[];
  /** Root-relative paths spared by the keep list, sorted */
  kept: string[];
  warnings: string[];
}

interface CleanContext {
  root: string;
  extensions: Set<string>;
  keep: PathMatcher;
  removed: string[];
  kept: string[];
  warnings: string[];
}

/**
 * Removes compiled artifacts and build directories under `options.root`.
 *
 * Only these paths are ever deleted: artifact-extension files directly in the root, the
 * configured artifact directories and the listed files. An artifact directory holding something the keep
 * list matches is emptied around it instead of being removed.
 */
export async function cleanArtifacts(options: CleanOptions): Promise<CleanResult> {
  const root = path.resolve(options.root);
  const context: CleanContext = {
    root,
    extensions: new Set(options.artifactExtensions),
    keep: options.keep ?? PathMatcher.empty(),
    removed: [],
    kept: [],
    warnings: [],
  };

  const entries = await fs.readdir(root, { withFileTypes: true });
  for (const entry of entries) {
    if (entry.isFile() && context.extensions.has(path.extname(entry.name))) {
      await removeFile(context, entry.name);
    }
  }

  for (const dir of artifactDirsUnder(context, options.artifactDirs)) {
    const absolute = path.join(root, dir);
    let stats: Stats;
    try {
      stats = await fs.lstat(absolute);
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') continue;
      throw error;
    }
    if (!stats.isDirectory()) {
      context.warnings.push(`Not a directory, left alone: ${dir}`);
      continue;
    }
    await sweepDirectory(context, dir);
  }

  for (const file of options.files ?? []) {
    try {
      await fs.lstat(path.join(root, file));
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') continue;
      throw error;
    }
    await removeFile(context, normalizePath(file));
  }

  for (const warning of context.warnings) {
    await options.logger?.warn(warning);
  }
  return {
    removed: [...context.removed].sort(),
    kept: [...context.kept].sort(),
    warnings: context.warnings,
  };
}

/**
 * Normalized, de-duplicated artifact directories inside the root, parents before children.
 */
function artifactDirsUnder(context: CleanContext, dirs: readonly string[]): string[] {
  const result = new Set<string>();
  for (const dir of dirs) {
    const absolute = path.resolve(context.root, dir);
    if (absolute === context.root || !isWithin(context.root, absolute)) {
      context.warnings.push(`Artifact directory outside the clean root ignored: ${dir}`);
      continue;
    }
    result.add(normalizePath(path.relative(context.root, absolute)));
  }
  return [...result].sort();
}

async function removeFile(context: CleanContext, relativePath: string): Promise<void> {
  if (context.keep.isExcluded(relativePath)) {
    context.kept.push(relativePath);
    return;
  }
  await remove(path.join(context.root, relativePath));
  context.removed.push(relativePath);
}

async function sweepDirectory(context: CleanContext, relativePath: string): Promise<void> {
  if (context.keep.isExcluded(`${relativePath}/`)) {
    context.kept.push(relativePath);
    return;
  }
  const absolute = path.join(context.root, relativePath);
  if (!(await containsKept(context, relativePath))) {
    await remove(absolute);
    context.removed.push(relativePath);
    return;
  }

  const entries = await fs.readdir(absolute, { withFileTypes: true });
  for (const entry of entries) {
    const child = `${relativePath}/${entry.name}`;
    if (entry.isDirectory()) {
      await sweepDirectory(context, child);
    } else {
      await removeFile(context, child);
    }
  }
}

async function containsKept(context: CleanContext, relativePath: string): Promise<boolean> {
  const entries = await fs.readdir(path.join(context.root, relativePath), { withFileTypes: true });
  for (const entry of entries) {
    const child = `${relativePath}/${entry.name}`;
    if (entry.isDirectory()) {
      if (context.keep.isExcluded(`${child}/`) || (await containsKept(context, child))) {
        return true;
      }
    } else if (context.keep.isExcluded(child)) {
      return true;
    }
  }
  return false;
}
