import type { Segment } from '../segments/segment.js';
import type { LintFix } from './types.js';

export const Fix = {
  createBefore(anchor: Segment, edit: readonly Segment[]): LintFix {
    return { type: 'insert', anchor, position: 'before', edit };
  },
  createAfter(anchor: Segment, edit: readonly Segment[]): LintFix {
    return { type: 'insert', anchor, position: 'after', edit };
  },
  delete(anchor: Segment): LintFix {
    return { type: 'delete', anchor };
  },
  replace(anchor: Segment, edit: readonly Segment[]): LintFix {
    return { type: 'replace', anchor, edit };
  },
  editRaw(anchor: Segment, raw: string): LintFix {
    return { type: 'edit_raw', anchor, raw };
  },
} as const;

export function isDestructive(fix: LintFix): boolean {
  return fix.type !== 'insert';
}

/**
 * Source offset of the boundary a fix acts on. Used to order fixes
 * left to right.
 */
export function fixOffset(fix: LintFix): number {
  const { workingOffset } = fix.anchor.positionMarker;
  if (fix.type === 'insert' && fix.position === 'after') {
    return workingOffset + fix.anchor.raw.length;
  }
  return workingOffset;
}

/**
 * Stable left-to-right sort; ties keep their generation order.
 */
export function sortFixes(fixes: readonly LintFix[]): LintFix[] {
  return fixes
    .map((fix, index) => ({ fix, index, offset: fixOffset(fix) }))
    .sort((a, b) => a.offset - b.offset || a.index - b.index)
    .map(({ fix }) => fix);
}

/**
 * Segments a fix touches: the anchor, plus everything beneath it when the
 * fix removes or rewrites the anchor.
 */
export function fixFootprint(fix: LintFix): Segment[] {
  return isDestructive(fix) ? [...fix.anchor.walk()] : [fix.anchor];
}

export interface FixSpan {
  start: number;
  /** Equal to `start` for inserts, which act on the gap at `start`. */
  end: number;
}

/**
 * Range of working text a fix acts on, or null when the anchor is not in a
 * rooted tree.
 */
export function fixSpan(fix: LintFix): FixSpan | null {
  if (!fix.anchor.getRoot().isRoot) return null;
  const start = fixOffset(fix);
  return { start, end: isDestructive(fix) ? start + fix.anchor.raw.length : start };
}

/**
 * Two spans act on the same text or the same gap. An insert at either end
 * of a removed range counts as touching it.
 */
export function spansOverlap(a: FixSpan, b: FixSpan): boolean {
  const aGap = a.start === a.end;
  const bGap = b.start === b.end;
  if (aGap && bGap) return a.start === b.start;
  if (aGap) return b.start <= a.start && a.start <= b.end;
  if (bGap) return a.start <= b.start && b.start <= a.end;
  return a.start < b.end && b.start < a.end;
}

export function describeFix(fix: LintFix): string {
  switch (fix.type) {
    case 'insert':
      return `insert ${fix.edit.map((s) => s.describe()).join(', ')} ${fix.position} ${fix.anchor.describe()}`;
    case 'delete':
      return `delete ${fix.anchor.describe()}`;
    case 'replace':
      return `replace ${fix.anchor.describe()} with ${fix.edit.map((s) => s.describe()).join(', ')}`;
    case 'edit_raw':
      return `edit ${fix.anchor.describe()} to ${JSON.stringify(fix.raw)}`;
  }
}
