import { StructuralError } from '../errors.js';
import type { Segment } from '../segments/segment.js';
import { validateTree } from '../segments/validate.js';
import type { LintFix } from './types.js';

/**
 * Apply fixes to the tree in place, then check the tree invariants.
 *
 * Order: inserts, then replacements and raw edits, then deletions, so a fix
 * anchored on a segment another fix removes still finds its anchor. Repeated
 * `after` inserts on one anchor land in the order they were given.
 *
 * Returns the number of fixes applied. Throws StructuralError when an anchor
 * is not in the tree or the result breaks an invariant; the tree must then be
 * discarded.
 */
export function applyFixes(root: Segment, fixes: readonly LintFix[]): number {
  const lastInsertedAfter = new Map<Segment, Segment>();
  let applied = 0;

  for (const fix of fixes) {
    if (fix.type !== 'insert') continue;
    const parent = requireParent(root, fix.anchor);
    const payload = fix.edit.map(detached);
    if (payload.length === 0) continue;

    if (fix.position === 'before') {
      parent.spliceChildren(parent.segments.indexOf(fix.anchor), 0, ...payload);
    } else {
      const after = lastInsertedAfter.get(fix.anchor) ?? fix.anchor;
      parent.spliceChildren(parent.segments.indexOf(after) + 1, 0, ...payload);
      lastInsertedAfter.set(fix.anchor, payload[payload.length - 1]);
    }
    applied++;
  }

  for (const fix of fixes) {
    if (fix.type === 'replace') {
      const parent = requireParent(root, fix.anchor);
      parent.spliceChildren(parent.segments.indexOf(fix.anchor), 1, ...fix.edit.map(detached));
      applied++;
    } else if (fix.type === 'edit_raw') {
      if (!fix.anchor.isLeaf) {
        throw new StructuralError(`Cannot edit the text of container ${fix.anchor.describe()}`);
      }
      const parent = requireParent(root, fix.anchor);
      parent.spliceChildren(parent.segments.indexOf(fix.anchor), 1, fix.anchor.withRaw(fix.raw));
      applied++;
    }
  }

  const deleted = new Set<Segment>();
  for (const fix of fixes) {
    if (fix.type !== 'delete' || deleted.has(fix.anchor)) continue;
    const parent = requireParent(root, fix.anchor);
    parent.spliceChildren(parent.segments.indexOf(fix.anchor), 1);
    deleted.add(fix.anchor);
    applied++;
  }

  validateTree(root);
  return applied;
}

function requireParent(root: Segment, anchor: Segment): Segment {
  const parent = anchor.parent;
  if (parent === null || !root.isAncestorOf(anchor)) {
    throw new StructuralError(`Fix anchor ${anchor.describe()} is not part of the tree`);
  }
  return parent;
}

function detached(segment: Segment): Segment {
  return segment.parent !== null || segment.isRoot ? segment.copy() : segment;
}
