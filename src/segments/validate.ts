import { StructuralError } from '../errors.js';
import type { Segment } from './segment.js';

/**
 * Check the tree invariants fix application relies on:
 * every child points back at its parent, every leaf has text, and the leaves
 * concatenate to the root's text. Throws StructuralError on the first breach.
 */
export function validateTree(root: Segment, expectedRaw?: string): void {
  for (const segment of root.walk()) {
    if (segment.isLeaf) {
      if (segment.raw.length === 0) {
        throw new StructuralError(`Empty leaf ${segment.type} in tree`);
      }
      continue;
    }
    for (const child of segment.segments) {
      if (child.parent !== segment) {
        throw new StructuralError(
          `${child.describe()} is listed under ${segment.describe()} but points elsewhere`,
        );
      }
    }
  }

  const leafText = root.rawSegments.map((leaf) => leaf.raw).join('');
  if (leafText !== root.raw) {
    throw new StructuralError('Leaf text no longer matches the rendered tree');
  }
  if (expectedRaw !== undefined && expectedRaw !== root.raw) {
    throw new StructuralError('Rendered tree does not match the expected text');
  }
}
