import { SegmentSeekerCrawler } from '../crawler/crawler.js';
import { ReflowSequence } from '../reflow/sequence.js';
import { Segments, sp } from '../segments/functional.js';
import { Segment } from '../segments/segment.js';
import { BaseRule } from './base.js';
import { contextRoot, lintResult, type RuleContext, type RuleOptions, type RuleOutcome } from './types.js';

const TERMINATOR_KEYWORDS = {
  multiline_newline: 'boolean',
  require_final_semicolon: 'boolean',
} as const;

type TerminatorKeywords = typeof TERMINATOR_KEYWORDS;

export const MULTILINE_DESCRIPTION =
  'Semi-colon should be on its own line immediately after multiline statement.';
export const SAME_LINE_DESCRIPTION = 'Semi-colon follow statement immediately on the same line.';
export const MISSING_DESCRIPTION = 'Statement is missing a terminating semi-colon.';

/**
 * Statements are terminated by a semi-colon placed right after them: on the
 * same line, or with `multiline_newline`, on the line after a multi-line
 * statement. With `require_final_semicolon` a missing terminator is inserted.
 */
export class TerminatorRule extends BaseRule<TerminatorKeywords> {
  readonly code = 'TM01';
  readonly name = 'convention.terminator';
  readonly description = 'Statements must end with a semi-colon.';
  readonly groups = ['all', 'convention'] as const;
  readonly crawlBehaviour = new SegmentSeekerCrawler(['statement']);
  readonly configKeywords = TERMINATOR_KEYWORDS;

  evaluate(context: RuleContext, options: RuleOptions<TerminatorKeywords>): RuleOutcome {
    const { segment: statement, parentStack } = context;
    const parent = parentStack[parentStack.length - 1];
    if (!parent) return null;
    const root = contextRoot(context);

    const position = statement.positionMarker;
    const isMultiline = position.workingLineNo !== position.workingLocAfter(statement.raw).line;
    const forceAlone = options.boolean('multiline_newline') && isMultiline;
    const config = forceAlone
      ? context.config.deriveOverride(['layout', 'type', 'statement_terminator', 'line_position'], 'alone')
      : context.config;

    const siblings = new Segments(...parent.segments);
    const nextCode = siblings.select({ selectIf: sp.isCode(), startSeg: statement }).first().get();

    if (nextCode?.isType('statement_terminator')) {
      this.logger.debug(`Assessing terminator position: ${nextCode.describe()}`);
      let seq = ReflowSequence.fromAroundTarget(nextCode, root, config);

      if (forceAlone) {
        const lastCode = new Segments(...statement.rawSegments).last(sp.isCode()).get();
        const lastLine = lastCode?.positionMarker.workingLineNo ?? position.workingLineNo;
        if (nextCode.positionMarker.workingLineNo !== lastLine + 1) {
          // Move it after the first line break that follows the statement.
          const nextNewline = siblings
            .select({ selectIf: sp.isType('newline'), startSeg: statement, stopSeg: nextCode })
            .first()
            .get();
          if (nextNewline) {
            this.logger.debug(`Moving terminator after ${nextNewline.positionMarker.toString()}`);
            seq = seq.without(nextCode).insert(nextCode, nextNewline, 'after');
          }
        }
      }

      const fixes = seq.rebreak().getFixes();
      if (fixes.length === 0) return null;
      return lintResult(nextCode, fixes, forceAlone ? MULTILINE_DESCRIPTION : SAME_LINE_DESCRIPTION);
    }

    if (!options.boolean('require_final_semicolon')) return null;

    this.logger.debug(`Required terminator not found after ${statement.describe()}`);
    const lastLeaf = statement.rawSegments[statement.rawSegments.length - 1];
    const fixes = ReflowSequence.fromAroundTarget(lastLeaf, root, config, 'after')
      .insert(Segment.leaf('statement_terminator', ';'), statement, 'after')
      .rebreak()
      .getFixes();
    return lintResult(statement, fixes, MISSING_DESCRIPTION);
  }
}
