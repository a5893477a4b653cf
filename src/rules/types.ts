import type { LintConfig } from '../config/config.js';
import type { Crawler } from '../crawler/crawler.js';
import type { LintFix } from '../fixes/types.js';
import type { Segment } from '../segments/segment.js';

// === Evaluation ===

export interface RuleContext {
  segment: Segment;
  /** Root first, down to the segment's parent. */
  parentStack: readonly Segment[];
  config: LintConfig;
}

/**
 * A finding of one rule at one place. `anchor: null` means nothing found.
 */
export interface LintResult {
  anchor: Segment | null;
  fixes: LintFix[];
  description: string | null;
}

export type RuleOutcome = LintResult | LintResult[] | null;

export function lintResult(
  anchor: Segment | null,
  fixes: LintFix[] = [],
  description: string | null = null,
): LintResult {
  return { anchor, fixes, description };
}

/**
 * Root of the tree a context was crawled from.
 */
export function contextRoot(context: RuleContext): Segment {
  return context.parentStack[0] ?? context.segment;
}

// === Keywords ===

export type KeywordKind = 'boolean' | 'string' | 'number';

/** Keyword name to the kind of value it takes, in declaration order. */
export type KeywordSpec = Readonly<Record<string, KeywordKind>>;

export type KeysOfKind<S extends KeywordSpec, K extends KeywordKind> = {
  [P in keyof S]: S[P] extends K ? P : never;
}[keyof S] &
  string;

/**
 * Keyword values of one rule, resolved and type-checked once per run.
 */
export interface RuleOptions<S extends KeywordSpec> {
  boolean(keyword: KeysOfKind<S, 'boolean'>): boolean;
  string(keyword: KeysOfKind<S, 'string'>): string;
  number(keyword: KeysOfKind<S, 'number'>): number;
}

// === Registry view ===

/**
 * What the linter needs to know about a rule, independent of its keywords.
 */
export interface RuleDefinition {
  readonly code: string;
  readonly name: string;
  readonly description: string;
  readonly groups: readonly string[];
  readonly crawlBehaviour: Crawler;
  /** Resolve keywords against `config`. Throws ConfigError. */
  bind(config: LintConfig): BoundRule;
}

export interface BoundRule {
  readonly definition: RuleDefinition;
  evaluate(context: RuleContext): LintResult[];
}
