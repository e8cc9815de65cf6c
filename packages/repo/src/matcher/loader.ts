import nodeFs from 'node:fs/promises';
import path from 'node:path';
import type { ExclusionSource } from './types';

type Fs = typeof nodeFs;

export const EXCLUDE_FILENAME = 'exclude.txt';
export const GITIGNORE_FILENAME = '.gitignore';

export interface LoadExclusionOptions {
  /** Patterns from configuration, applied after the files */
  extra?: readonly string[];
  fs?: Fs;
}

/**
 * Turns exclusion-file text into rule lines: `#` comments and blank lines are dropped, and a
 * Windows separator in front of a path character becomes `/`. Escapes such as `\#` survive.
 */
export function parseExclusionText(text: string): string[] {
  const patterns: string[] = [];
  for (const line of text.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;
    patterns.push(trimmed.replace(/\\(?=[\w.-])/g, '/'));
  }
  return patterns;
}

async function readOptional(fs: Fs, filePath: string): Promise<string | undefined> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return undefined;
    }
    throw error;
  }
}

/**
 * Reads `exclude.txt` and then `.gitignore` from the target root. Either may be absent;
 * with no `exclude.txt` the `.gitignore` alone supplies the rules.
 */
export async function loadExclusionSources(
  root: string,
  options: LoadExclusionOptions = {},
): Promise<ExclusionSource[]> {
  const fs = options.fs ?? nodeFs;
  const sources: ExclusionSource[] = [];

  for (const filename of [EXCLUDE_FILENAME, GITIGNORE_FILENAME]) {
    const filePath = path.join(root, filename);
    const content = await readOptional(fs, filePath);
    if (content !== undefined) {
      sources.push({ origin: filePath, patterns: parseExclusionText(content) });
    }
  }

  if (options.extra && options.extra.length > 0) {
    sources.push({ origin: 'config', patterns: [...options.extra] });
  }
  return sources;
}

export async function loadExclusionRules(
  root: string,
  options: LoadExclusionOptions = {},
): Promise<string[]> {
  const sources = await loadExclusionSources(root, options);
  return sources.flatMap((source) => source.patterns);
}
