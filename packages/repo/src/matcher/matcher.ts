import ignore, { type Ignore } from 'ignore';
import { hasGlob, parseRule, patternSegments } from './rules';
import type { ExclusionRule, ExclusionRuleSet, MatchResult } from './types';

interface CompiledRule {
  rule: ExclusionRule;
  /** Single-pattern matcher; also reports a match when an ancestor directory matches */
  test: Ignore;
  segments: string[];
}

/**
 * Predicate over root-relative, forward-slash paths built from an ordered rule set.
 *
 * Every rule that matches a path, directly or through one of its ancestor directories, is a
 * candidate. The most specific candidate decides; among equally specific candidates the last
 * one in file order does. An exclusion that reaches a path through an excluded ancestor
 * directory only yields to a strictly more specific negation. Directory paths are queried
 * with a trailing `/`.
 */
export class PathMatcher {
  readonly rules: ExclusionRuleSet;
  private readonly compiled: CompiledRule[];

  private constructor(compiled: CompiledRule[]) {
    this.compiled = compiled;
    this.rules = Object.freeze(compiled.map((c) => c.rule));
  }

  /**
   * Compiles every rule up front. A malformed rule throws PatternError and nothing is built.
   */
  static compile(lines: readonly string[]): PathMatcher {
    const compiled = lines.map((raw, index) => {
      const rule = parseRule(raw, index);
      return {
        rule,
        test: ignore({ ignorecase: false }).add(rule.pattern),
        segments: patternSegments(rule.pattern),
      };
    });
    return new PathMatcher(compiled);
  }

  static empty(): PathMatcher {
    return new PathMatcher([]);
  }

  isExcluded(relativePath: string): boolean {
    return this.match(relativePath).excluded;
  }

  match(relativePath: string): MatchResult {
    const winner = this.winnerFor(relativePath);
    if (!winner) {
      return { excluded: false };
    }
    return { excluded: !winner.rule.negated, rule: winner.rule };
  }

  /**
   * Whether anything beneath `dirPath` can still be included. False means the scanner may
   * skip the subtree without listing it.
   */
  mayContainIncluded(dirPath: string): boolean {
    const dir = dirPath.replace(/\/+$/, '');
    const winner = this.winnerFor(`${dir}/`);
    if (!winner || winner.rule.negated) {
      return true;
    }
    const dirSegments = dir.split('/');
    // Beneath the directory the winning exclusion applies through an ancestor.
    return this.compiled.some(
      (candidate) =>
        candidate.rule.negated &&
        candidate.rule.specificity > winner.rule.specificity &&
        reachesBelow(candidate, dirSegments),
    );
  }

  private winnerFor(relativePath: string): CompiledRule | undefined {
    if (relativePath === '' || relativePath === '/') {
      return undefined;
    }
    const ancestors = ancestorDirs(relativePath);
    const viaAncestor = (candidate: CompiledRule) =>
      ancestors.some((ancestor) => candidate.test.ignores(ancestor));

    let winner: CompiledRule | undefined;
    for (const candidate of this.compiled) {
      if (!candidate.test.ignores(relativePath)) continue;
      if (!winner || prevails(candidate, winner, viaAncestor)) {
        winner = candidate;
      }
    }
    return winner;
  }
}

/** Strict ancestor directories of `relativePath`, each with a trailing `/`. */
function ancestorDirs(relativePath: string): string[] {
  const segments = relativePath.replace(/\/+$/, '').split('/');
  const dirs: string[] = [];
  for (let i = 1; i < segments.length; i++) {
    dirs.push(`${segments.slice(0, i).join('/')}/`);
  }
  return dirs;
}

/** True when candidate `a` takes the decision away from `b` for the path being matched. */
function prevails(
  a: CompiledRule,
  b: CompiledRule,
  viaAncestor: (candidate: CompiledRule) => boolean,
): boolean {
  if (a.rule.negated !== b.rule.negated) {
    const negation = a.rule.negated ? a : b;
    const exclusion = a.rule.negated ? b : a;
    if (viaAncestor(exclusion)) {
      const negationWins = negation.rule.specificity > exclusion.rule.specificity;
      return a === negation ? negationWins : !negationWins;
    }
  }
  return outranks(a.rule, b.rule);
}

/** True when `a` beats `b`: more specific, or equally specific and later in the file. */
function outranks(a: ExclusionRule, b: ExclusionRule): boolean {
  if (a.specificity !== b.specificity) {
    return a.specificity > b.specificity;
  }
  return a.index > b.index;
}

/**
 * Conservative check that `candidate` could match some path strictly below `dirSegments`.
 */
function reachesBelow(candidate: CompiledRule, dirSegments: string[]): boolean {
  if (!candidate.rule.anchored) {
    return true;
  }
  const segments = candidate.segments;
  for (let i = 0; i < segments.length; i++) {
    const segment = segments[i];
    if (hasGlob(segment)) {
      return true;
    }
    if (i >= dirSegments.length) {
      return true;
    }
    if (segment !== dirSegments[i]) {
      return false;
    }
  }
  // The rule names the directory itself or one of its ancestors, so it was already weighed.
  return false;
}

export function compileRules(lines: readonly string[]): PathMatcher {
  return PathMatcher.compile(lines);
}
