import { describe, it, expect } from 'vitest';
import { LintConfig } from '../../config/config.js';
import type { ConfigSection } from '../../config/types.js';
import { Linter } from '../../linter/linter.js';
import { BARE_TERMINATOR_DESCRIPTION } from '../bare-terminator.js';
import { MISSING_DESCRIPTION, MULTILINE_DESCRIPTION, SAME_LINE_DESCRIPTION } from '../terminator.js';

function linterFor(rules: string, terminator: ConfigSection = {}): Linter {
  return new Linter(
    LintConfig.defaults().merge({ core: { rules }, rules: { 'convention.terminator': terminator } }),
  );
}

// ---------------------------------------------------------------------------
// TM01
// ---------------------------------------------------------------------------

describe('TM01 convention.terminator', () => {
  it('accepts a terminator right after the statement', () => {
    expect(linterFor('TM01').lintString('SELECT a FROM foo;').violations).toEqual([]);
  });

  it('removes space before a terminator on the same line', () => {
    const linter = linterFor('TM01');
    const { violations } = linter.lintString('SELECT b FROM bar  ;');

    expect(violations).toHaveLength(1);
    expect(violations[0].description).toBe(SAME_LINE_DESCRIPTION);
    expect([violations[0].line, violations[0].column]).toEqual([1, 20]);

    expect(linter.fixString('SELECT b FROM bar  ;').output).toBe('SELECT b FROM bar;');
  });

  it('pulls a terminator up onto the last line of the statement', () => {
    const report = linterFor('TM01').fixString('SELECT a\nFROM foo\n;');
    expect(report.output).toBe('SELECT a\nFROM foo;');
    expect(report.loops).toBe(1);
  });

  describe('with multiline_newline', () => {
    const linter = linterFor('TM01', { multiline_newline: true });

    it('moves a detached terminator to the line after the statement', () => {
      const source = 'SELECT a\nFROM foo\n\n;';
      const { violations } = linter.lintString(source);
      expect(violations.map((v) => [v.description, v.line, v.column])).toEqual([[MULTILINE_DESCRIPTION, 4, 1]]);

      const report = linter.fixString(source);
      expect(report.output).toBe('SELECT a\nFROM foo\n;\n');
      expect(report.appliedFixes).toBe(2);
      expect(report.violations).toEqual([]);
    });

    it('breaks the line before a terminator that trails a multi-line statement', () => {
      expect(linter.fixString('SELECT a\nFROM foo;').output).toBe('SELECT a\nFROM foo\n;');
    });

    it('keeps single-line statements on one line', () => {
      expect(linter.lintString('SELECT a FROM foo;').violations).toEqual([]);
    });

    it('is idempotent once fixed', () => {
      const { output } = linter.fixString('SELECT a\nFROM foo\n\n;');
      expect(linter.lintString(output).violations).toEqual([]);
    });
  });

  describe('with require_final_semicolon', () => {
    it('inserts a missing terminator', () => {
      const linter = linterFor('TM01', { require_final_semicolon: true });
      const { violations } = linter.lintString('SELECT a FROM foo');
      expect(violations.map((v) => [v.description, v.line, v.column])).toEqual([[MISSING_DESCRIPTION, 1, 1]]);

      expect(linter.fixString('SELECT a FROM foo').output).toBe('SELECT a FROM foo;');
    });

    it('inserts before a trailing newline', () => {
      const linter = linterFor('TM01', { require_final_semicolon: true });
      expect(linter.fixString('SELECT a FROM foo\n').output).toBe('SELECT a FROM foo;\n');
    });

    it('puts the terminator on its own line after a multi-line statement', () => {
      const linter = linterFor('TM01', { require_final_semicolon: true, multiline_newline: true });
      const report = linter.fixString('SELECT a\nFROM foo');
      expect(report.output).toBe('SELECT a\nFROM foo\n;');
      expect(linter.lintString(report.output).violations).toEqual([]);
    });

    it('leaves a statement with an unclosed bracket terminated', () => {
      const linter = linterFor('TM01', { require_final_semicolon: true });
      const report = linter.fixString('SELECT (1;');
      expect(report.output).toBe('SELECT (1;');
      expect(report.changed).toBe(false);
      expect(linter.lintString(report.output).violations).toEqual([]);
    });

    it('ignores statements that already have one', () => {
      const linter = linterFor('TM01', { require_final_semicolon: true });
      expect(linter.lintString('SELECT a;\nSELECT b;').violations).toEqual([]);
    });
  });

  it('reports nothing for a missing terminator by default', () => {
    expect(linterFor('TM01').lintString('SELECT a FROM foo').violations).toEqual([]);
  });
});

// ---------------------------------------------------------------------------
// TM02
// ---------------------------------------------------------------------------

describe('TM02 convention.bare_terminator', () => {
  it('pulls a bare terminator onto the preceding code', () => {
    const linter = linterFor('TM02');
    const { violations } = linter.lintString('SELECT 1; ;');
    expect(violations.map((v) => [v.description, v.line, v.column])).toEqual([
      [BARE_TERMINATOR_DESCRIPTION, 1, 11],
    ]);
    expect(linter.fixString('SELECT 1; ;').output).toBe('SELECT 1;;');
  });

  it('leaves terminators that close a statement to TM01', () => {
    expect(linterFor('TM02').lintString('SELECT 1  ;').violations).toEqual([]);
  });
});
