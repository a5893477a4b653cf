import { RootOnlyCrawler } from '../crawler/crawler.js';
import { ReflowSequence, type ReflowIssue } from '../reflow/sequence.js';
import { BaseRule } from './base.js';
import { lintResult, type LintResult, type RuleContext, type RuleOutcome } from './types.js';

/**
 * Whitespace between code follows the `layout.type` spacing policy.
 * Line breaks are left as they are, and so is the space in front of a
 * terminator (TM01 and TM02 own it).
 */
export class SpacingRule extends BaseRule<Record<never, never>> {
  readonly code = 'LT01';
  readonly name = 'layout.spacing';
  readonly description = 'Inappropriate spacing.';
  readonly groups = ['all', 'layout'] as const;
  readonly crawlBehaviour = new RootOnlyCrawler();
  readonly configKeywords = {};

  evaluate(context: RuleContext): RuleOutcome {
    const issues = ReflowSequence.fromRoot(context.segment, context.config).respace().getIssues();

    const results: LintResult[] = [];
    for (const issue of issues) {
      if (issue.after?.isType('statement_terminator')) continue;
      const anchor = issue.after ?? issue.before;
      if (!anchor || issue.fixes.length === 0) continue;
      results.push(lintResult(anchor, issue.fixes, describeIssue(issue)));
    }
    return results;
  }
}

export function describeIssue(issue: ReflowIssue): string {
  const before = issue.before ? `'${issue.before.raw}'` : 'start of file';
  const after = issue.after ? `'${issue.after.raw}'` : 'end of file';
  if (issue.kind === 'trailing_whitespace') return 'Unnecessary trailing whitespace.';
  if (issue.result === '') return `Unexpected whitespace between ${before} and ${after}.`;
  return `Expected single whitespace between ${before} and ${after}.`;
}
