export interface Rule {
  /** Raw pattern text as written in the rules source. */
  readonly description: string;
  readonly pattern: RegExp;
}

export interface RuleSet {
  /** Name of the rules source, usually its path. */
  readonly source: string;
  readonly rules: readonly Rule[];
}
