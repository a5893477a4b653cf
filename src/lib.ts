export { Segment } from './segments/segment.js';
export { Segments, sp } from './segments/functional.js';
export { PositionMarker } from './segments/position.js';
export { validateTree } from './segments/validate.js';
export { lex } from './parser/lexer.js';
export { parse } from './parser/parser.js';
export { SegmentSeekerCrawler, RootOnlyCrawler } from './crawler/crawler.js';
export type { Crawler, CrawlMatch } from './crawler/crawler.js';
export { LintConfig } from './config/config.js';
export { DEFAULT_CONFIG, CONFIG_FILE_NAME } from './config/defaults.js';
export { loadConfig, applyOverrides } from './config/loader.js';
export { ReflowSequence } from './reflow/sequence.js';
export type { ReflowIssue } from './reflow/sequence.js';
export { ReflowConfig } from './reflow/config.js';
export { Fix, sortFixes, describeFix } from './fixes/fix.js';
export { applyFixes } from './fixes/apply.js';
export { partitionByConflicts } from './fixes/conflicts.js';
export type { LintFix } from './fixes/types.js';
export { BaseRule } from './rules/base.js';
export { builtinRules, selectRules } from './rules/registry.js';
export { lintResult } from './rules/types.js';
export type { LintResult, RuleContext, RuleDefinition, RuleOptions } from './rules/types.js';
export { Linter } from './linter/linter.js';
export type { FixReport, LintReport, RuleViolation } from './linter/types.js';
export {
  ConfigError,
  DetachedSegmentError,
  RuleEvaluationError,
  StructuralError,
} from './errors.js';
