import { readFile } from 'node:fs/promises';
import { relativePath, writeFixedFile } from '../applier/file-writer.js';
import { appendHistoryEntry, buildHistoryEntry } from '../applier/history.js';
import type { WriteResult } from '../applier/types.js';
import type { Linter } from '../linter/linter.js';
import type { LintReport } from '../linter/types.js';
import { historyPath } from '../store/persistence.js';
import { createLogger } from '../utils/logger.js';
import { mapWithConcurrency } from './concurrency.js';
import type {
  FileReport,
  PipelineCallbacks,
  PipelineOptions,
  PipelineResult,
  PipelineStats,
  ViolationRecord,
} from './types.js';

const logger = createLogger('pipeline');

/**
 * Lint (or fix) every file with a bounded worker pool. Reports come back in
 * input order; a file that fails to read or process gets a report with
 * `error` and the rest carry on.
 */
export async function runFiles(
  files: readonly string[],
  linter: Linter,
  options: PipelineOptions,
  callbacks: PipelineCallbacks = {},
): Promise<PipelineResult> {
  const startedAt = Date.now();

  const results = await mapWithConcurrency(files, options.concurrency, async (file) => {
    const report = await processFile(file, linter, options);
    callbacks.onFileComplete?.(report);
    return report;
  });

  const reports = results.map((result, i) => {
    if (!(result instanceof Error)) return result;
    logger.error(`${files[i]}: ${result.message}`);
    const report = errorReport(files[i], options, result.message);
    callbacks.onFileComplete?.(report);
    return report;
  });

  return { reports, stats: computeStats(reports, Date.now() - startedAt) };
}

/**
 * Lint or fix one file. Throws only when the file cannot be read.
 */
export async function processFile(
  filePath: string,
  linter: Linter,
  options: PipelineOptions,
): Promise<FileReport> {
  const displayPath = relativePath(filePath, options.projectRoot);
  const source = await readFile(filePath, 'utf-8');
  logger.debug(`Processing ${displayPath} (${source.length} chars)`);

  if (options.mode === 'lint') {
    const report = linter.lintString(source);
    return {
      filePath,
      displayPath,
      source,
      violations: toRecords(report),
      ruleErrors: report.ruleErrors,
      conflicts: [],
      fix: null,
      error: null,
    };
  }

  const fixed = linter.fixString(source);
  let write: WriteResult | null = null;
  if (fixed.changed && !options.dryRun) {
    write = await writeFixedFile(filePath, fixed.output, {
      projectRoot: options.projectRoot,
      storeDir: options.storeDir,
      runId: options.runId,
      backup: options.backup,
    });
    if (write.success) {
      await appendHistoryEntry(
        historyPath(options.storeDir),
        buildHistoryEntry(
          options.runId,
          displayPath,
          write.backupPath,
          fixed.appliedFixes,
          fixed.loops,
          fixed.fixedRules,
          source,
          fixed.output,
        ),
      );
    } else {
      logger.warn(`Could not write ${displayPath}: ${write.error ?? 'unknown error'}`);
    }
  }

  return {
    filePath,
    displayPath,
    source,
    violations: toRecords(fixed),
    ruleErrors: fixed.ruleErrors,
    conflicts: fixed.conflicts,
    fix: {
      changed: fixed.changed,
      loops: fixed.loops,
      appliedFixes: fixed.appliedFixes,
      loopLimitReached: fixed.loopLimitReached,
      fixError: fixed.fixError,
      fixedRules: [...new Set(fixed.fixedRules)].sort(),
      output: fixed.output,
      write,
    },
    error: null,
  };
}

function toRecords(report: LintReport): ViolationRecord[] {
  return report.violations.map((violation) => ({
    ruleCode: violation.ruleCode,
    ruleName: violation.ruleName,
    description: violation.description,
    line: violation.line,
    column: violation.column,
    fixable: violation.fixes.length > 0,
  }));
}

function errorReport(filePath: string, options: PipelineOptions, message: string): FileReport {
  return {
    filePath,
    displayPath: relativePath(filePath, options.projectRoot),
    source: '',
    violations: [],
    ruleErrors: [],
    conflicts: [],
    fix: null,
    error: message,
  };
}

export function computeStats(reports: readonly FileReport[], elapsedMs: number): PipelineStats {
  return {
    files: reports.length,
    filesWithViolations: reports.filter((report) => report.violations.length > 0).length,
    violations: reports.reduce((sum, report) => sum + report.violations.length, 0),
    filesFixed: reports.filter((report) => report.fix?.changed === true).length,
    fixesApplied: reports.reduce((sum, report) => sum + (report.fix?.changed ? report.fix.appliedFixes : 0), 0),
    errors: reports.filter(
      (report) =>
        report.error !== null || Boolean(report.fix?.fixError) || report.fix?.write?.success === false,
    ).length,
    elapsedMs,
  };
}
