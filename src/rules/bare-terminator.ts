import { SegmentSeekerCrawler } from '../crawler/crawler.js';
import { ReflowSequence } from '../reflow/sequence.js';
import { Segments, sp } from '../segments/functional.js';
import { BaseRule } from './base.js';
import { contextRoot, lintResult, type RuleContext, type RuleOutcome } from './types.js';

export const BARE_TERMINATOR_DESCRIPTION =
  'Semi-colon without a statement should follow the preceding code on the same line.';

/**
 * Terminators that do not close a statement (`SELECT 1; ;`, or one at the
 * start of a file) get the same spacing and line position as any other.
 * Terminators right after a statement are left to TM01.
 */
export class BareTerminatorRule extends BaseRule<Record<never, never>> {
  readonly code = 'TM02';
  readonly name = 'convention.bare_terminator';
  readonly description = 'Terminators without a statement are laid out like any other.';
  readonly groups = ['all', 'convention'] as const;
  readonly crawlBehaviour = new SegmentSeekerCrawler(['statement_terminator']);
  readonly configKeywords = {};

  evaluate(context: RuleContext): RuleOutcome {
    const { segment: terminator, parentStack } = context;
    const parent = parentStack[parentStack.length - 1];
    if (!parent) return null;

    const previousCode = new Segments(...parent.segments)
      .select({ selectIf: sp.isCode(), stopSeg: terminator })
      .last()
      .get();
    if (previousCode?.isType('statement')) return null;

    const fixes = ReflowSequence.fromAroundTarget(terminator, contextRoot(context), context.config)
      .rebreak()
      .getFixes();
    if (fixes.length === 0) return null;
    return lintResult(terminator, fixes, BARE_TERMINATOR_DESCRIPTION);
  }
}
