const MISSING_MODULE_PATTERNS: readonly RegExp[] = [
  /No module named ['"]([\w.]+)['"]/g,
  /ModuleNotFoundError:[^\n]*?['"]([\w.]+)['"]/g,
  /['"]([\w./]+)\.pxd['"] not found/g,
  /cimported module ['"]([\w.]+)['"]/g,
];

/**
 * Module names the compiler reported as unresolvable, in order of first appearance.
 */
export function parseMissingModules(output: string): string[] {
  const found = new Map<number, string>();
  for (const pattern of MISSING_MODULE_PATTERNS) {
    for (const match of output.matchAll(pattern)) {
      const offset = match.index ?? 0;
      if (!found.has(offset)) {
        // Declaration files are reported by path.
        found.set(offset, match[1].replace(/\//g, '.'));
      }
    }
  }
  const ordered = [...found.entries()].sort((a, b) => a[0] - b[0]).map(([, name]) => name);
  return [...new Set(ordered)];
}

/**
 * The distribution to install for a module path: its top-level package.
 */
export function installableName(moduleName: string): string {
  return moduleName.split('.')[0];
}

const DEFAULT_DIAGNOSTIC_LINES = 40;

/**
 * Tail of the compiler output worth showing for a failed unit: stderr first, then stdout.
 */
export function summarizeDiagnostics(
  result: { stdout: string; stderr: string; truncated?: boolean },
  maxLines: number = DEFAULT_DIAGNOSTIC_LINES,
): string {
  const lines = [result.stderr, result.stdout]
    .map((text) => text.trimEnd())
    .filter((text) => text.length > 0)
    .join('\n')
    .split(/\r?\n/);
  const tail = lines.length > maxLines ? lines.slice(-maxLines) : lines;
  const text = tail.join('\n');
  return result.truncated ? `${text}\n[output truncated]` : text;
}
