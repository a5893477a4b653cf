import { describe, it, expect } from 'vitest';
import { describeFix } from '../../fixes/fix.js';
import { Segment } from '../../segments/segment.js';
import { reconcilePoint, resolveBoundary, trimTrailingWhitespace } from '../boundary.js';
import type { BlockLayout } from '../config.js';
import { ReflowBlock, ReflowPoint } from '../elements.js';

const SINGLE: BlockLayout = { spacingBefore: 'single', spacingAfter: 'single', linePosition: null };
const TERMINATOR: BlockLayout = { spacingBefore: 'touch', spacingAfter: 'single', linePosition: 'inline' };

function block(type: string, raw: string, layout: BlockLayout): ReflowBlock {
  return new ReflowBlock(Segment.leaf(type, raw), layout);
}

const ws = (raw: string) => Segment.leaf('whitespace', raw);
const nl = () => Segment.leaf('newline', '\n');

// ---------------------------------------------------------------------------
// resolveBoundary
// ---------------------------------------------------------------------------

describe('resolveBoundary', () => {
  it('forbids a break before an inline block when rebreaking', () => {
    const policy = resolveBoundary(block('identifier', 'a', SINGLE), block('statement_terminator', ';', TERMINATOR), 'rebreak');
    expect(policy).toEqual({ newline: 'forbidden', spacing: '' });
  });

  it('leaves line breaks free when respacing', () => {
    const policy = resolveBoundary(block('identifier', 'a', SINGLE), block('statement_terminator', ';', TERMINATOR), 'respace');
    expect(policy).toEqual({ newline: 'free', spacing: '' });
  });

  it('requires a break next to an alone block', () => {
    const alone: BlockLayout = { ...TERMINATOR, linePosition: 'alone' };
    const policy = resolveBoundary(block('identifier', 'a', SINGLE), block('statement_terminator', ';', alone), 'rebreak');
    expect(policy.newline).toBe('required');
  });

  it('never pulls a block onto the line of an inline comment', () => {
    const comment = block('inline_comment', '-- note', { ...SINGLE, spacingBefore: 'any' });
    const policy = resolveBoundary(comment, block('statement_terminator', ';', TERMINATOR), 'rebreak');
    expect(policy.newline).toBe('free');
  });

  it('has no spacing opinion when either side is any', () => {
    const open = block('start_bracket', '(', { spacingBefore: 'any', spacingAfter: 'touch', linePosition: null });
    expect(resolveBoundary(block('identifier', 'count', SINGLE), open, 'respace').spacing).toBeNull();
  });

  it('wants a single space between two single blocks', () => {
    expect(resolveBoundary(block('keyword', 'SELECT', SINGLE), block('identifier', 'a', SINGLE), 'respace').spacing).toBe(' ');
  });
});

// ---------------------------------------------------------------------------
// reconcilePoint
// ---------------------------------------------------------------------------

describe('reconcilePoint', () => {
  it('adds a newline to an empty point that needs one', () => {
    const change = reconcilePoint(new ReflowPoint([]), { newline: 'required', spacing: '' });
    expect(change?.kind).toBe('line_break');
    expect(change?.fixes).toEqual([]);
    expect(change?.addition?.raw).toBe('\n');
    expect(change?.result.map((s) => s.raw)).toEqual(['\n']);
  });

  it('turns existing spacing into a newline', () => {
    const space = ws('  ');
    const change = reconcilePoint(new ReflowPoint([space]), { newline: 'required', spacing: ' ' });
    expect(change?.fixes.map(describeFix)).toEqual(['replace whitespace("  ") with newline("\\n")']);
    expect(change?.addition).toBeNull();
  });

  it('removes a forbidden break entirely for touch spacing', () => {
    const change = reconcilePoint(new ReflowPoint([nl(), ws('  ')]), { newline: 'forbidden', spacing: '' });
    expect(change?.fixes.map(describeFix)).toEqual(['delete newline("\\n")', 'delete whitespace("  ")']);
    expect(change?.result).toEqual([]);
  });

  it('collapses a forbidden break to the wanted spacing', () => {
    const change = reconcilePoint(new ReflowPoint([ws(' '), nl()]), { newline: 'forbidden', spacing: ' ' });
    expect(change?.fixes.map(describeFix)).toEqual([
      'replace whitespace(" ") with whitespace(" ")',
      'delete newline("\\n")',
    ]);
    expect(change?.result.map((s) => s.raw)).toEqual([' ']);
  });

  it('leaves indentation after a newline alone', () => {
    expect(reconcilePoint(new ReflowPoint([nl(), ws('    ')]), { newline: 'free', spacing: ' ' })).toBeNull();
  });

  it('trims whitespace before a newline', () => {
    const change = reconcilePoint(new ReflowPoint([ws('  '), nl()]), { newline: 'free', spacing: ' ' });
    expect(change?.kind).toBe('trailing_whitespace');
    expect(change?.fixes.map(describeFix)).toEqual(['delete whitespace("  ")']);
  });

  it('edits spacing to the wanted width', () => {
    const change = reconcilePoint(new ReflowPoint([ws('   ')]), { newline: 'free', spacing: ' ' });
    expect(change?.kind).toBe('spacing');
    expect(change?.fixes.map(describeFix)).toEqual(['edit whitespace("   ") to " "']);
    expect(change?.result.map((s) => s.raw)).toEqual([' ']);
  });

  it('adds missing spacing', () => {
    const change = reconcilePoint(new ReflowPoint([]), { newline: 'free', spacing: ' ' });
    expect(change?.fixes).toEqual([]);
    expect(change?.addition?.raw).toBe(' ');
  });

  it('returns null when the point already fits', () => {
    expect(reconcilePoint(new ReflowPoint([ws(' ')]), { newline: 'free', spacing: ' ' })).toBeNull();
    expect(reconcilePoint(new ReflowPoint([ws('     ')]), { newline: 'free', spacing: null })).toBeNull();
  });
});

describe('trimTrailingWhitespace', () => {
  it('keeps whitespace that is not followed by a newline', () => {
    expect(trimTrailingWhitespace(new ReflowPoint([nl(), ws('  ')]))).toBeNull();
  });
});
