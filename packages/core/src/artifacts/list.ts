import { promises as fs, type Dirent } from 'fs';
import path from 'path';

export interface ArtifactEntry {
  /** Path relative to the listed directory, forward slashes */
  path: string;
  sizeBytes: number;
}

export const DEFAULT_ARTIFACT_EXTENSIONS: readonly string[] = ['.so', '.pyd'];

/**
 * Compiled modules under `dir`, sorted by path. A missing directory lists as empty.
 * Symlinked directories are not followed.
 */
export async function listArtifacts(
  dir: string,
  extensions: readonly string[] = DEFAULT_ARTIFACT_EXTENSIONS,
): Promise<ArtifactEntry[]> {
  const wanted = new Set(extensions);
  const found: ArtifactEntry[] = [];

  async function walk(relativeDir: string): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(path.join(dir, relativeDir), { withFileTypes: true });
    } catch (error) {
      if (relativeDir === '' && (error as NodeJS.ErrnoException).code === 'ENOENT') return;
      throw error;
    }
    for (const entry of entries) {
      const relativePath = relativeDir ? `${relativeDir}/${entry.name}` : entry.name;
      if (entry.isDirectory()) {
        await walk(relativePath);
      } else if (entry.isFile() && wanted.has(path.extname(entry.name))) {
        const stats = await fs.stat(path.join(dir, relativePath));
        found.push({ path: relativePath, sizeBytes: stats.size });
      }
    }
  }

  await walk('');
  return found.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
}

/**
 * The module the compiler left beside `sourcePath`: `<stem><ext>` or `<stem>.<tag><ext>`, such
 * as `a.cpython-311-x86_64-linux-gnu.so` for `a.pyx`. Undefined when there is none.
 */
export async function findCompiledModule(
  sourcePath: string,
  extensions: readonly string[] = DEFAULT_ARTIFACT_EXTENSIONS,
): Promise<string | undefined> {
  const dir = path.dirname(sourcePath);
  const stem = path.basename(sourcePath, path.extname(sourcePath));
  const entries = await fs.readdir(dir, { withFileTypes: true });
  const candidates = entries
    .filter(
      (entry) =>
        entry.isFile() &&
        extensions.includes(path.extname(entry.name)) &&
        (entry.name === `${stem}${path.extname(entry.name)}` || entry.name.startsWith(`${stem}.`)),
    )
    .map((entry) => entry.name)
    .sort();
  return candidates.length > 0 ? path.join(dir, candidates[0]) : undefined;
}

/** Human-readable size: bytes below 1 KiB, then KiB and MiB with one decimal. */
export function formatSize(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KiB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MiB`;
}
