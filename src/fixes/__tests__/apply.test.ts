import { describe, it, expect } from 'vitest';
import { StructuralError } from '../../errors.js';
import { parse } from '../../parser/parser.js';
import { Segment } from '../../segments/segment.js';
import { applyFixes } from '../apply.js';
import { Fix, describeFix, fixFootprint, fixSpan, sortFixes, spansOverlap } from '../fix.js';

/** `SELECT a FROM foo;` with handles on its leaves. */
function sample() {
  const root = parse('SELECT a FROM foo;');
  const statement = root.segments[0];
  const [select, ws1, a, , , , foo] = statement.segments;
  const terminator = root.segments[1];
  return { root, statement, select, ws1, a, foo, terminator };
}

// ---------------------------------------------------------------------------
// applyFixes
// ---------------------------------------------------------------------------

describe('applyFixes', () => {
  it('applies every kind of fix in one pass', () => {
    const { root, select, a, terminator } = sample();
    const applied = applyFixes(root, [
      Fix.replace(a, [Segment.leaf('identifier', 'b')]),
      Fix.delete(terminator),
      Fix.createBefore(select, [Segment.leaf('block_comment', '/* c */'), Segment.leaf('whitespace', ' ')]),
    ]);
    expect(applied).toBe(3);
    expect(root.raw).toBe('/* c */ SELECT b FROM foo');
  });

  it('keeps repeated after-inserts on one anchor in order', () => {
    const { root, foo } = sample();
    applyFixes(root, [
      Fix.createAfter(foo, [Segment.leaf('whitespace', ' ')]),
      Fix.createAfter(foo, [Segment.leaf('identifier', 'x')]),
    ]);
    expect(root.raw).toBe('SELECT a FROM foo x;');
  });

  it('edits leaf text', () => {
    const { root, ws1 } = sample();
    applyFixes(root, [Fix.editRaw(ws1, '   ')]);
    expect(root.raw).toBe('SELECT   a FROM foo;');
  });

  it('inserts next to an anchor another fix deletes', () => {
    const { root, terminator } = sample();
    applyFixes(root, [Fix.createBefore(terminator, [Segment.leaf('whitespace', ' ')]), Fix.delete(terminator)]);
    expect(root.raw).toBe('SELECT a FROM foo ');
  });

  it('deletes a segment once however often it is named', () => {
    const { root, terminator } = sample();
    expect(applyFixes(root, [Fix.delete(terminator), Fix.delete(terminator)])).toBe(1);
    expect(root.raw).toBe('SELECT a FROM foo');
  });

  it('copies payloads that are already in a tree', () => {
    const { root, select, terminator, statement } = sample();
    applyFixes(root, [Fix.createAfter(terminator, [select])]);
    expect(root.raw).toBe('SELECT a FROM foo;SELECT');
    expect(select.parent).toBe(statement);
  });

  it('rejects an anchor outside the tree', () => {
    const { root } = sample();
    expect(() => applyFixes(root, [Fix.delete(Segment.leaf('identifier', 'x'))])).toThrow(StructuralError);
  });

  it('rejects a text edit on a container', () => {
    const { root, statement } = sample();
    expect(() => applyFixes(root, [Fix.editRaw(statement, 'x')])).toThrow('Cannot edit the text of container');
  });
});

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

describe('sortFixes', () => {
  it('orders by the boundary each fix acts on', () => {
    const { select, foo, terminator } = sample();
    const fixes = [Fix.delete(terminator), Fix.createBefore(foo, [Segment.leaf('identifier', 'x')]), Fix.delete(select)];
    expect(sortFixes(fixes).map(describeFix)).toEqual([
      'delete keyword("SELECT")',
      'insert identifier("x") before identifier("foo")',
      'delete statement_terminator(";")',
    ]);
  });

  it('keeps generation order on ties', () => {
    const { a } = sample();
    const first = Fix.createBefore(a, [Segment.leaf('identifier', 'x')]);
    const second = Fix.delete(a);
    expect(sortFixes([first, second])).toEqual([first, second]);
  });
});

describe('fixFootprint', () => {
  it('covers everything beneath a removed anchor', () => {
    const { statement } = sample();
    expect(fixFootprint(Fix.delete(statement))).toHaveLength(8);
    expect(fixFootprint(Fix.createAfter(statement, []))).toEqual([statement]);
  });
});

describe('fixSpan', () => {
  it('covers the text a destructive fix removes', () => {
    const { statement, terminator } = sample();
    expect(fixSpan(Fix.delete(terminator))).toEqual({ start: 17, end: 18 });
    expect(fixSpan(Fix.replace(statement, []))).toEqual({ start: 0, end: 17 });
  });

  it('is empty at the gap an insert fills', () => {
    const { statement, a } = sample();
    expect(fixSpan(Fix.createAfter(statement, []))).toEqual({ start: 17, end: 17 });
    expect(fixSpan(Fix.createBefore(a, []))).toEqual({ start: 7, end: 7 });
  });

  it('is null for an anchor outside any tree', () => {
    expect(fixSpan(Fix.delete(Segment.leaf('identifier', 'x')))).toBeNull();
  });
});

describe('spansOverlap', () => {
  it('compares removed ranges strictly', () => {
    expect(spansOverlap({ start: 0, end: 4 }, { start: 3, end: 6 })).toBe(true);
    expect(spansOverlap({ start: 0, end: 4 }, { start: 4, end: 6 })).toBe(false);
  });

  it('lets an insert touch either end of a removed range', () => {
    expect(spansOverlap({ start: 4, end: 4 }, { start: 2, end: 4 })).toBe(true);
    expect(spansOverlap({ start: 2, end: 6 }, { start: 2, end: 2 })).toBe(true);
    expect(spansOverlap({ start: 7, end: 7 }, { start: 2, end: 6 })).toBe(false);
  });

  it('treats two inserts as overlapping only in the same gap', () => {
    expect(spansOverlap({ start: 5, end: 5 }, { start: 5, end: 5 })).toBe(true);
    expect(spansOverlap({ start: 5, end: 5 }, { start: 6, end: 6 })).toBe(false);
  });
});
