import { describe, it, expect } from 'vitest';
import { LintConfig } from '../../config/config.js';
import { Linter } from '../../linter/linter.js';

const linter = new Linter(LintConfig.defaults().merge({ core: { rules: 'LT01' } }));

const summarize = (source: string) =>
  linter.lintString(source).violations.map((v) => `${v.line}:${v.column} ${v.description}`);

describe('LT01 layout.spacing', () => {
  it('collapses runs of spaces', () => {
    expect(summarize('SELECT  a FROM foo;')).toEqual(["1:9 Expected single whitespace between 'SELECT' and 'a'."]);
    expect(linter.fixString('SELECT  a FROM foo;').output).toBe('SELECT a FROM foo;');
  });

  it('keeps commas against the preceding code and spaces them after', () => {
    expect(summarize('SELECT a ,b FROM foo')).toEqual([
      "1:10 Unexpected whitespace between 'a' and ','.",
      "1:11 Expected single whitespace between ',' and 'b'.",
    ]);
    expect(linter.fixString('SELECT a ,b FROM foo').output).toBe('SELECT a, b FROM foo');
  });

  it('spaces comparison operators', () => {
    expect(linter.fixString('SELECT a FROM t WHERE x=1').output).toBe('SELECT a FROM t WHERE x = 1');
  });

  it('lets brackets hug their contents', () => {
    expect(linter.fixString('SELECT count ( a ) FROM t').output).toBe('SELECT count (a) FROM t');
  });

  it('removes trailing whitespace before a newline', () => {
    expect(summarize('SELECT a  \nFROM foo')).toEqual(['2:1 Unnecessary trailing whitespace.']);
    expect(linter.fixString('SELECT a  \nFROM foo').output).toBe('SELECT a\nFROM foo');
  });

  it('leaves indentation alone', () => {
    expect(summarize('SELECT a\n    FROM foo')).toEqual([]);
  });

  it('leaves the space before a terminator to the terminator rules', () => {
    expect(summarize('SELECT a ;')).toEqual([]);
  });
});
