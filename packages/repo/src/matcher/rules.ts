import { PatternError } from '@cyforge/shared';
import type { ExclusionRule } from './types';

const GLOB_CHARS = /[*?[]/;

/**
 * Finds the first bracket class in `pattern` that never closes, honouring `\` escapes and
 * a leading `]` inside the class. Returns its offset, or -1 when every class is balanced.
 */
export function findUnbalancedBracket(pattern: string): number {
  let i = 0;
  while (i < pattern.length) {
    const ch = pattern[i];
    if (ch === '\\') {
      i += 2;
      continue;
    }
    if (ch !== '[') {
      i++;
      continue;
    }
    const open = i;
    let j = i + 1;
    if (pattern[j] === '!' || pattern[j] === '^') j++;
    if (pattern[j] === ']') j++;
    while (j < pattern.length && pattern[j] !== ']') {
      j += pattern[j] === '\\' ? 2 : 1;
    }
    if (j >= pattern.length) {
      return open;
    }
    i = j + 1;
  }
  return -1;
}

export function hasGlob(segment: string): boolean {
  return GLOB_CHARS.test(segment);
}

/**
 * Splits a pattern body into its path segments, dropping the anchoring and directory slashes.
 */
export function patternSegments(pattern: string): string[] {
  return pattern.split('/').filter((segment) => segment.length > 0);
}

/**
 * Parses one line of an exclusion file. Comments and blank lines must already be removed.
 */
export function parseRule(raw: string, index: number): ExclusionRule {
  const negated = raw.startsWith('!');
  const pattern = negated ? raw.slice(1) : raw;

  if (pattern.length === 0 || pattern === '/') {
    throw new PatternError(index, raw, 'empty pattern');
  }
  const unbalanced = findUnbalancedBracket(pattern);
  if (unbalanced !== -1) {
    throw new PatternError(index, raw, `unbalanced bracket class at offset ${unbalanced}`);
  }

  const directoryOnly = pattern.endsWith('/');
  const body = directoryOnly ? pattern.slice(0, -1) : pattern;
  const segments = patternSegments(body);

  return {
    index,
    raw,
    pattern,
    negated,
    directoryOnly,
    anchored: body.includes('/'),
    specificity: segments.filter((segment) => segment !== '**').length,
  };
}
