import type { LintConfig } from '../config/config.js';
import {
  ConfigError,
  DetachedSegmentError,
  RuleEvaluationError,
  StructuralError,
  errorMessage,
} from '../errors.js';
import { applyFixes } from '../fixes/apply.js';
import { partitionByConflicts } from '../fixes/conflicts.js';
import { parse } from '../parser/parser.js';
import { ReflowConfig } from '../reflow/config.js';
import { builtinRules, selectRules } from '../rules/registry.js';
import type { BoundRule, LintResult, RuleDefinition } from '../rules/types.js';
import type { Segment } from '../segments/segment.js';
import { validateTree } from '../segments/validate.js';
import { createLogger } from '../utils/logger.js';
import type { ConflictNote, FixReport, LintReport, RuleError, RuleViolation } from './types.js';

const logger = createLogger('linter');

interface FixTreeOutcome {
  loops: number;
  appliedFixes: number;
  fixedRules: string[];
  loopLimitReached: boolean;
  conflicts: ConflictNote[];
  report: LintReport;
}

/**
 * Runs the selected rules over parsed trees and drives the fix loop.
 *
 * Rule keywords are bound and `layout.type` policies parsed in the
 * constructor, so a missing or mistyped value fails before any file is read.
 */
export class Linter {
  readonly rules: readonly BoundRule[];
  readonly maxLoops: number;

  constructor(
    readonly config: LintConfig,
    available: readonly RuleDefinition[] = builtinRules(),
  ) {
    const selected = selectRules(
      available,
      config.getString(['core', 'rules']),
      config.getString(['core', 'exclude_rules']),
    );
    this.rules = selected.map((rule) => rule.bind(config));
    ReflowConfig.fromLintConfig(config);

    const maxLoops = config.getNumber(['core', 'max_loops']);
    if (!Number.isInteger(maxLoops) || maxLoops < 1) {
      throw new ConfigError(`Config value 'core.max_loops' must be a positive integer, got ${maxLoops}`);
    }
    this.maxLoops = maxLoops;
  }

  // === Lint ===

  lintString(source: string): LintReport {
    return this.lintTree(parse(source));
  }

  lintTree(root: Segment): LintReport {
    const violations: RuleViolation[] = [];
    const ruleErrors: RuleError[] = [];

    for (const bound of this.rules) {
      const { definition } = bound;
      const seen = new Map<Segment, Set<string>>();

      for (const { segment, parentStack } of definition.crawlBehaviour.crawl(root)) {
        let results: LintResult[];
        try {
          results = bound.evaluate({ segment, parentStack, config: this.config });
        } catch (err) {
          const failure =
            err instanceof RuleEvaluationError
              ? err
              : new RuleEvaluationError(definition.code, errorMessage(err), { cause: err });
          const at = segment.positionMarker;
          logger.warn(`${definition.code} failed at ${at.toString()}: ${failure.message}`);
          ruleErrors.push({
            ruleCode: definition.code,
            message: failure.message,
            line: at.workingLineNo,
            column: at.workingLinePos,
          });
          continue;
        }

        for (const result of results) {
          const { anchor } = result;
          if (anchor === null) continue;
          const description = result.description ?? definition.description;
          const descriptions = seen.get(anchor) ?? new Set<string>();
          if (descriptions.has(description)) continue;
          descriptions.add(description);
          seen.set(anchor, descriptions);

          const at = anchor.positionMarker;
          violations.push({
            ruleCode: definition.code,
            ruleName: definition.name,
            description,
            anchor,
            line: at.workingLineNo,
            column: at.workingLinePos,
            fixes: result.fixes,
          });
        }
      }
    }

    return { violations: sortViolations(violations), ruleErrors };
  }

  // === Fix ===

  /**
   * Lint and fix `source`. A structural failure while fixing leaves the
   * source untouched and is reported as `fixError` next to the findings.
   */
  fixString(source: string): FixReport {
    const root = parse(source);
    try {
      const outcome = this.fixTree(root);
      const output = root.raw;
      validateTree(parse(output), output);
      return {
        ...outcome.report,
        source,
        output,
        changed: output !== source,
        loops: outcome.loops,
        appliedFixes: outcome.appliedFixes,
        fixedRules: outcome.fixedRules,
        loopLimitReached: outcome.loopLimitReached,
        conflicts: outcome.conflicts,
        fixError: null,
      };
    } catch (err) {
      if (!(err instanceof StructuralError || err instanceof DetachedSegmentError)) throw err;
      logger.error(`Fixing failed, leaving the source unchanged: ${err.message}`);
      return {
        ...this.lintString(source),
        source,
        output: source,
        changed: false,
        loops: 0,
        appliedFixes: 0,
        fixedRules: [],
        loopLimitReached: false,
        conflicts: [],
        fixError: err.message,
      };
    }
  }

  /**
   * Lint, apply non-conflicting fixes, repeat until nothing fixable is left
   * or `core.max_loops` passes have run. Mutates `root`; throws
   * StructuralError when an edit breaks the tree.
   */
  fixTree(root: Segment): FixTreeOutcome {
    const conflicts: ConflictNote[] = [];
    const fixedRules: string[] = [];
    let appliedFixes = 0;
    let loops = 0;
    let report = this.lintTree(root);

    while (true) {
      const fixable = report.violations.filter((violation) => violation.fixes.length > 0);
      if (fixable.length === 0) break;
      if (loops >= this.maxLoops) {
        logger.warn(`Stopped after ${this.maxLoops} fix passes with ${fixable.length} fixable violation(s) left`);
        return { loops, appliedFixes, fixedRules, loopLimitReached: true, conflicts, report };
      }

      loops++;
      const partition = partitionByConflicts(fixable);
      for (const { deferred, blockedBy } of partition.conflicts) {
        logger.debug(`Pass ${loops}: ${deferred.ruleCode} deferred, overlaps ${blockedBy.ruleCode}`);
        conflicts.push({
          ruleCode: deferred.ruleCode,
          blockedBy: blockedBy.ruleCode,
          line: deferred.line,
          column: deferred.column,
          loop: loops,
        });
      }

      appliedFixes += applyFixes(
        root,
        partition.accepted.flatMap((violation) => violation.fixes),
      );
      fixedRules.push(...partition.accepted.map((violation) => violation.ruleCode));
      logger.debug(`Pass ${loops}: applied fixes from ${partition.accepted.length} violation(s)`);
      report = this.lintTree(root);
    }

    return { loops, appliedFixes, fixedRules, loopLimitReached: false, conflicts, report };
  }
}

function sortViolations(violations: RuleViolation[]): RuleViolation[] {
  return violations
    .map((violation, index) => ({ violation, index }))
    .sort((a, b) => a.violation.line - b.violation.line || a.violation.column - b.violation.column || a.index - b.index)
    .map(({ violation }) => violation);
}
