import { BareTerminatorRule } from './bare-terminator.js';
import { SpacingRule } from './spacing.js';
import { TerminatorRule } from './terminator.js';
import type { RuleDefinition } from './types.js';

/**
 * Every built-in rule, in evaluation order.
 */
export function builtinRules(): RuleDefinition[] {
  return [new TerminatorRule(), new BareTerminatorRule(), new SpacingRule()];
}

/**
 * Rules named by `selection` (comma separated codes, names or groups; `all`
 * selects everything), minus those named by `exclusion`.
 */
export function selectRules(
  rules: readonly RuleDefinition[],
  selection: string,
  exclusion = '',
): RuleDefinition[] {
  const wanted = splitList(selection);
  const unwanted = splitList(exclusion);
  const matches = (rule: RuleDefinition, names: string[]): boolean =>
    names.some((name) => name === rule.code || name === rule.name || rule.groups.includes(name));

  return rules.filter((rule) => matches(rule, wanted) && !matches(rule, unwanted));
}

function splitList(value: string): string[] {
  return value
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}
