import { promises as fs } from 'fs';
import path from 'path';
import { CompileError, ensureDir } from '@cyforge/shared';
import type { SourceUnit } from '@cyforge/repo';

export const CIMPORT_LINE = '# cimport cython';

export const FUNCTION_DIRECTIVES: readonly string[] = [
  '# @boundscheck(False)',
  '# @wraparound(False)',
  '# @nonecheck(False)',
  '# @cdivision(True)',
];

export const WHILE_DIRECTIVE = '# @cython.infer_types(True)';

const RANGE_LOOP = /^for\s+([A-Za-z_]\w*)\s+in\s+range\s*\(/;
const FUNCTION_DEF = /^(?:async\s+)?def\s+[A-Za-z_]\w*\s*\(/;
const WHILE_LOOP = /^while[\s(]/;

type TripleQuote = '"""' | "'''";

export interface AnnotatedSource {
  unit: SourceUnit;
  /** Where the annotated copy was written */
  outputPath: string;
  /** Bytes read from the unit, as compiled */
  sourceContent: Buffer;
  annotated: string;
}

/**
 * Inserts optimization hints above loop and function headers.
 *
 * This is a line heuristic, not a parser. Covered: `for <name> in range(...)`, `while`,
 * `def` and `async def`. Lines inside triple-quoted strings are left alone, and a header that
 * already carries its hints is not annotated again, so the function is idempotent.
 */
export function annotate(source: string): string {
  const eol = source.includes('\r\n') ? '\r\n' : '\n';
  const lines = source.split(/\r?\n/);
  const output: string[] = [];
  let openQuote: TripleQuote | null = null;

  for (const line of lines) {
    const insideString = openQuote !== null;
    const stripped = line.trim();
    if (!insideString && stripped.startsWith('#')) {
      output.push(line);
      continue;
    }
    openQuote = trackTripleQuotes(line, openQuote);
    if (insideString || !stripped) {
      output.push(line);
      continue;
    }

    const indent = line.slice(0, line.length - line.trimStart().length);
    const hints = hintsFor(stripped);
    if (hints.length > 0 && output[output.length - 1] !== indent + hints[hints.length - 1]) {
      output.push(...hints.map((hint) => indent + hint));
    }
    output.push(line);
  }

  if (!source.includes('cimport cython')) {
    output.unshift(CIMPORT_LINE);
  }
  return output.join(eol);
}

function hintsFor(stripped: string): readonly string[] {
  const loop = RANGE_LOOP.exec(stripped);
  if (loop) {
    return [`# cdef int ${loop[1]} (annotated)`];
  }
  if (FUNCTION_DEF.test(stripped)) {
    return FUNCTION_DIRECTIVES;
  }
  if (WHILE_LOOP.test(stripped)) {
    return [WHILE_DIRECTIVE];
  }
  return [];
}

/**
 * Returns the triple quote still open at the end of `line`, given the one open at its start.
 */
export function trackTripleQuotes(line: string, open: TripleQuote | null): TripleQuote | null {
  let state = open;
  let index = 0;
  while (index < line.length) {
    if (state) {
      const close = line.indexOf(state, index);
      if (close === -1) break;
      state = null;
      index = close + 3;
      continue;
    }
    const double = line.indexOf('"""', index);
    const single = line.indexOf("'''", index);
    if (double === -1 && single === -1) break;
    if (single === -1 || (double !== -1 && double < single)) {
      state = '"""';
      index = double + 3;
    } else {
      state = "'''";
      index = single + 3;
    }
  }
  return state;
}

/**
 * Path of the annotated copy: the unit's relative directory mirrored under `outDir`,
 * with the extension replaced by `.pyx`.
 */
export function annotatedPathFor(unit: SourceUnit, outDir: string): string {
  const parsed = path.posix.parse(unit.relativePath);
  return path.join(outDir, ...parsed.dir.split('/').filter(Boolean), `${parsed.name}.pyx`);
}

/**
 * Reads `unit`, writes its annotated copy under `outDir` and returns both.
 * Each output path belongs to exactly one unit, so concurrent calls never share a file.
 */
export async function annotateUnit(unit: SourceUnit, outDir: string): Promise<AnnotatedSource> {
  const outputPath = annotatedPathFor(unit, outDir);
  if (path.resolve(outputPath) === path.resolve(unit.absolutePath)) {
    throw new CompileError(`Annotated output would overwrite its source: ${unit.relativePath}`);
  }

  const sourceContent = await fs.readFile(unit.absolutePath);
  const annotated = annotate(sourceContent.toString('utf8'));
  await ensureDir(outputPath);
  await fs.writeFile(outputPath, annotated, 'utf8');
  return { unit, outputPath, sourceContent, annotated };
}
