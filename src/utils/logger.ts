import type { RuleDefinition } from '../rules/types.js';
import type { FileReport, PipelineStats, RunMode, ViolationRecord } from '../pipeline/types.js';
import { color, glyph } from '../ui/theme.js';
import {
  branch,
  diffLine,
  error,
  faint,
  filePath,
  fixMark,
  muted,
  nested,
  ruleCode,
  step,
  success,
  warn,
} from '../ui/format.js';
import { buildBanner } from '../ui/banner.js';

// === Diagnostics ===

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 50,
};

let activeLevel: LogLevel = 'warn';

/**
 * Set the process-wide level for every logger. `warn` by default.
 */
export function setLogLevel(level: LogLevel): void {
  activeLevel = level;
}

export function getLogLevel(): LogLevel {
  return activeLevel;
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * Scoped diagnostics on stderr, so reports on stdout stay parseable.
 */
export function createLogger(scope: string): Logger {
  const emit = (level: Exclude<LogLevel, 'silent'>, message: string): void => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[activeLevel]) return;
    console.error(formatLogLine(level, scope, message));
  };

  return {
    debug: (message) => emit('debug', message),
    info: (message) => emit('info', message),
    warn: (message) => emit('warn', message),
    error: (message) => emit('error', message),
  };
}

export function formatLogLine(level: Exclude<LogLevel, 'silent'>, scope: string, message: string): string {
  const text = `[${scope}] ${message}`;
  switch (level) {
    case 'debug':
      return faint(text);
    case 'info':
      return muted(text);
    case 'warn':
      return warn(text);
    case 'error':
      return error(text);
  }
}

// === Reports ===

export function printError(message: string): void {
  console.error(error(message));
}

export function printHeader(command: string, projectRoot: string, extra?: Record<string, string>): void {
  for (const line of buildBanner({ command, projectRoot, details: extra })) {
    console.log(line);
  }
  console.log();
}

/**
 * One violation as `path:line:col: CODE description`, without colour.
 */
export function formatViolationLine(path: string, violation: ViolationRecord): string {
  return `${path}:${violation.line}:${violation.column}: ${violation.ruleCode} ${violation.description}`;
}

export function printFileReport(report: FileReport, mode: RunMode): void {
  console.log(step(filePath(report.displayPath)));

  if (report.error) {
    console.log(branch(error(report.error), true));
    console.log();
    return;
  }

  const lines: string[] = [];
  for (const violation of report.violations) {
    lines.push(`${formatViolationLine(report.displayPath, violation)}${fixMark(violation.fixable)}`);
  }
  for (const ruleError of report.ruleErrors) {
    const at = ruleError.line === null ? '' : ` at ${ruleError.line}:${ruleError.column}`;
    lines.push(warn(`${ruleError.ruleCode} failed${at}: ${ruleError.message}`));
  }
  for (const conflict of report.conflicts) {
    lines.push(
      faint(
        `${conflict.ruleCode} at ${conflict.line}:${conflict.column} deferred to pass ${conflict.loop + 1} (overlaps ${conflict.ruleCode === conflict.blockedBy ? 'itself' : conflict.blockedBy})`,
      ),
    );
  }

  const fix = report.fix;
  if (mode === 'fix' && fix) {
    if (fix.fixError) {
      lines.push(error(`Not fixed: ${fix.fixError}`));
    } else if (fix.changed) {
      const verb = fix.write ? 'Fixed' : 'Would fix';
      lines.push(
        color.success(`${glyph.ok} ${verb} ${fix.appliedFixes} edit(s) in ${fix.loops} pass(es)`),
      );
      if (fix.write && !fix.write.success) lines.push(error(`Write failed: ${fix.write.error ?? 'unknown error'}`));
      if (fix.loopLimitReached) lines.push(warn('Fix loop limit reached; run again or raise core.max_loops'));
    }
  }

  if (lines.length === 0) {
    console.log(success('Clean'));
    console.log();
    return;
  }

  lines.forEach((line, i) => console.log(branch(line, i === lines.length - 1)));
  console.log();
}

/**
 * Changed lines between the source and the fixed output, for `--dry-run`.
 */
export function printDiff(source: string, output: string): void {
  const before = source.split('\n');
  const after = output.split('\n');
  for (const line of lineDiff(before, after)) {
    console.log(nested(diffLine(line.kind, line.text)));
  }
  console.log();
}

interface DiffLine {
  kind: 'add' | 'remove';
  text: string;
}

/**
 * Removed and added lines from a longest-common-subsequence line diff.
 */
export function lineDiff(before: readonly string[], after: readonly string[]): DiffLine[] {
  const rows = before.length;
  const cols = after.length;
  const lcs: number[][] = Array.from({ length: rows + 1 }, () => new Array<number>(cols + 1).fill(0));
  for (let i = rows - 1; i >= 0; i--) {
    for (let j = cols - 1; j >= 0; j--) {
      lcs[i][j] = before[i] === after[j] ? lcs[i + 1][j + 1] + 1 : Math.max(lcs[i + 1][j], lcs[i][j + 1]);
    }
  }

  const out: DiffLine[] = [];
  let i = 0;
  let j = 0;
  while (i < rows && j < cols) {
    if (before[i] === after[j]) {
      i++;
      j++;
    } else if (lcs[i + 1][j] >= lcs[i][j + 1]) {
      out.push({ kind: 'remove', text: before[i++] });
    } else {
      out.push({ kind: 'add', text: after[j++] });
    }
  }
  while (i < rows) out.push({ kind: 'remove', text: before[i++] });
  while (j < cols) out.push({ kind: 'add', text: after[j++] });
  return out;
}

export function printSummary(stats: PipelineStats, mode: RunMode, dryRun: boolean): void {
  const seconds = (stats.elapsedMs / 1000).toFixed(1);
  console.log(step('Summary'));
  console.log(branch(`Files: ${stats.files} ${faint(`(${seconds}s)`)}`));
  if (mode === 'fix') {
    const label = dryRun ? 'Would fix' : 'Fixed';
    console.log(branch(`${label}: ${stats.filesFixed} file(s), ${stats.fixesApplied} edit(s)`));
  }
  if (stats.errors > 0) {
    console.log(branch(error(`Errors: ${stats.errors}`)));
  }
  if (stats.violations === 0) {
    console.log(success('No violations'));
  } else {
    console.log(
      branch(warn(`${stats.violations} violation(s) in ${stats.filesWithViolations} file(s)`), true),
    );
  }
  console.log();
}

export function printRules(rules: readonly RuleDefinition[]): void {
  console.log(step(`Rules (${rules.length})`));
  rules.forEach((rule, i) => {
    const line = `${ruleCode(rule.code)} ${color.bold(rule.name)} ${muted(rule.description)} ${faint(`[${rule.groups.join(', ')}]`)}`;
    console.log(branch(line, i === rules.length - 1));
  });
  console.log();
}

// === JSON ===

/**
 * Machine-readable report. Contains no ANSI codes and no fixed source text.
 */
export function formatJsonReport(runId: string, mode: RunMode, reports: readonly FileReport[]): string {
  const files = reports.map((report) => ({
    path: report.displayPath,
    error: report.error,
    violations: report.violations.map((violation) => ({
      code: violation.ruleCode,
      name: violation.ruleName,
      description: violation.description,
      line: violation.line,
      column: violation.column,
      fixable: violation.fixable,
    })),
    ruleErrors: report.ruleErrors,
    conflicts: report.conflicts,
    fix: report.fix
      ? {
          changed: report.fix.changed,
          loops: report.fix.loops,
          appliedFixes: report.fix.appliedFixes,
          loopLimitReached: report.fix.loopLimitReached,
          fixError: report.fix.fixError,
          written: report.fix.write?.success ?? false,
          backupPath: report.fix.write?.backupPath ?? null,
        }
      : null,
  }));
  return JSON.stringify({ version: 1, runId, mode, files }, null, 2);
}
