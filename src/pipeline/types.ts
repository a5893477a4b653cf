import type { WriteResult } from '../applier/types.js';
import type { ConflictNote, RuleError } from '../linter/types.js';

export type RunMode = 'lint' | 'fix';

export interface PipelineOptions {
  mode: RunMode;
  projectRoot: string;
  storeDir: string;
  runId: string;
  concurrency: number;
  dryRun: boolean;
  backup: boolean;
}

export interface PipelineCallbacks {
  /** Called as each file finishes, in completion order. */
  onFileComplete?: (report: FileReport) => void;
}

/**
 * A violation detached from the tree it was found in.
 */
export interface ViolationRecord {
  ruleCode: string;
  ruleName: string;
  description: string;
  line: number;
  column: number;
  fixable: boolean;
}

export interface FileFixSummary {
  changed: boolean;
  loops: number;
  appliedFixes: number;
  loopLimitReached: boolean;
  /** Set when fixing broke the tree and the file was left as it was. */
  fixError: string | null;
  /** Rule codes of the violations fixed. */
  fixedRules: string[];
  output: string;
  /** Null when nothing was written (no change, dry run or fix error). */
  write: WriteResult | null;
}

export interface FileReport {
  filePath: string;
  /** Relative to the project root where possible. */
  displayPath: string;
  source: string;
  /** Violations left in the file after this run. */
  violations: ViolationRecord[];
  ruleErrors: RuleError[];
  conflicts: ConflictNote[];
  fix: FileFixSummary | null;
  /** Set when the file could not be read or processed at all. */
  error: string | null;
}

export interface PipelineStats {
  files: number;
  filesWithViolations: number;
  violations: number;
  filesFixed: number;
  fixesApplied: number;
  errors: number;
  elapsedMs: number;
}

export interface PipelineResult {
  reports: FileReport[];
  stats: PipelineStats;
}
