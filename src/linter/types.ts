import type { LintFix } from '../fixes/types.js';
import type { Segment } from '../segments/segment.js';

export interface RuleViolation {
  ruleCode: string;
  ruleName: string;
  description: string;
  anchor: Segment;
  /** 1-based, at the time of linting. */
  line: number;
  column: number;
  fixes: LintFix[];
}

/**
 * A rule that faulted on one crawl match. The match contributes nothing.
 */
export interface RuleError {
  ruleCode: string;
  message: string;
  line: number | null;
  column: number | null;
}

/**
 * A fix held back because it touched what another rule's fix touched in the
 * same pass.
 */
export interface ConflictNote {
  ruleCode: string;
  blockedBy: string;
  line: number;
  column: number;
  loop: number;
}

export interface LintReport {
  violations: RuleViolation[];
  ruleErrors: RuleError[];
}

export interface FixReport extends LintReport {
  source: string;
  output: string;
  changed: boolean;
  /** Passes that applied at least one fix. */
  loops: number;
  appliedFixes: number;
  /** Rule codes of the violations whose fixes were applied, in order. */
  fixedRules: string[];
  loopLimitReached: boolean;
  conflicts: ConflictNote[];
  /** Set when fixing failed and the source was left as it was. */
  fixError: string | null;
}
