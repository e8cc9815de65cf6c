export interface ExclusionRule {
  /** Position in the rule set, in file order */
  index: number;
  /** The line as written, including any leading `!` */
  raw: string;
  /** Pattern body with the negation marker removed */
  pattern: string;
  /** `!pattern`: re-includes what an earlier or less specific rule excluded */
  negated: boolean;
  /** Trailing `/`: matches directories (and therefore everything beneath them) only */
  directoryOnly: boolean;
  /** Contains a `/` before its last character, so it is relative to the root rather than any level */
  anchored: boolean;
  /** Number of literal path segments; deeper patterns win conflicts */
  specificity: number;
}

export type ExclusionRuleSet = readonly ExclusionRule[];

export interface MatchResult {
  excluded: boolean;
  /** The rule that decided the outcome, if any rule matched */
  rule?: ExclusionRule;
}

export interface ExclusionSource {
  /** File the rules came from, or `config` for configured patterns */
  origin: string;
  patterns: string[];
}
