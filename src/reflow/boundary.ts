import { Fix } from '../fixes/fix.js';
import type { LintFix } from '../fixes/types.js';
import { Segment } from '../segments/segment.js';
import type { SpacingPolicy } from './config.js';
import type { ReflowBlock, ReflowPoint } from './elements.js';

export type ReflowMode = 'rebreak' | 'respace';

export type NewlinePolicy = 'required' | 'forbidden' | 'free';

export interface BoundaryPolicy {
  newline: NewlinePolicy;
  /** Whitespace wanted on a single line; null keeps whatever is there. */
  spacing: string | null;
}

export type ReflowIssueKind = 'line_break' | 'spacing' | 'trailing_whitespace';

export interface BoundaryChange {
  kind: ReflowIssueKind;
  /** Edits to the whitespace leaves already in the point. */
  fixes: LintFix[];
  /** New leaf for a point that is currently empty; the caller anchors it. */
  addition: Segment | null;
  /** Leaves of the point once the change is made. */
  result: Segment[];
}

/**
 * What a boundary between two blocks should look like.
 */
export function resolveBoundary(prev: ReflowBlock, next: ReflowBlock, mode: ReflowMode): BoundaryPolicy {
  let newline: NewlinePolicy = 'free';
  if (mode === 'rebreak') {
    if (prev.layout.linePosition === 'alone' || next.layout.linePosition === 'alone') {
      newline = 'required';
    } else if (next.layout.linePosition === 'inline' && !prev.segment.isType('inline_comment')) {
      // Nothing can join the line of an inline comment.
      newline = 'forbidden';
    }
  }
  return { newline, spacing: resolveSpacing(prev.layout.spacingAfter, next.layout.spacingBefore) };
}

function resolveSpacing(after: SpacingPolicy, before: SpacingPolicy): string | null {
  if (after === 'any' || before === 'any') return null;
  if (after === 'touch' || before === 'touch') return '';
  return ' ';
}

/**
 * Minimal change that brings `point` in line with `policy`, or null.
 */
export function reconcilePoint(point: ReflowPoint, policy: BoundaryPolicy): BoundaryChange | null {
  const { segments } = point;

  if (policy.newline === 'required' && !point.hasNewline) {
    const newline = Segment.leaf('newline', '\n');
    if (segments.length === 0) {
      return { kind: 'line_break', fixes: [], addition: newline, result: [newline] };
    }
    return {
      kind: 'line_break',
      fixes: [Fix.replace(segments[0], [newline]), ...segments.slice(1).map(Fix.delete)],
      addition: null,
      result: [newline],
    };
  }

  if (policy.newline === 'forbidden' && point.hasNewline) {
    const spacing = policy.spacing ?? ' ';
    if (spacing === '') {
      return { kind: 'line_break', fixes: segments.map(Fix.delete), addition: null, result: [] };
    }
    const whitespace = Segment.leaf('whitespace', spacing);
    return {
      kind: 'line_break',
      fixes: [Fix.replace(segments[0], [whitespace]), ...segments.slice(1).map(Fix.delete)],
      addition: null,
      result: [whitespace],
    };
  }

  // Indentation after a newline is not ours to judge.
  if (point.hasNewline) return trimTrailingWhitespace(point);

  const desired = policy.spacing;
  if (desired === null || point.raw === desired) return null;

  if (desired === '') {
    return { kind: 'spacing', fixes: segments.map(Fix.delete), addition: null, result: [] };
  }
  if (segments.length === 0) {
    const whitespace = Segment.leaf('whitespace', desired);
    return { kind: 'spacing', fixes: [], addition: whitespace, result: [whitespace] };
  }
  return {
    kind: 'spacing',
    fixes: [Fix.editRaw(segments[0], desired), ...segments.slice(1).map(Fix.delete)],
    addition: null,
    result: [segments[0].withRaw(desired)],
  };
}

/**
 * Remove whitespace that sits directly before a newline.
 */
export function trimTrailingWhitespace(point: ReflowPoint): BoundaryChange | null {
  const { segments } = point;
  const trailing = segments.filter(
    (segment, i) => segment.isType('whitespace') && i + 1 < segments.length && segments[i + 1].isType('newline'),
  );
  if (trailing.length === 0) return null;

  return {
    kind: 'trailing_whitespace',
    fixes: trailing.map(Fix.delete),
    addition: null,
    result: segments.filter((segment) => !trailing.includes(segment)),
  };
}
