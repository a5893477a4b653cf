import type { Segment } from '../segments/segment.js';
import type { BlockLayout } from './config.js';

/**
 * One non-whitespace leaf and the layout policy that applies to it.
 * `inserted` blocks exist only in the desired arrangement, not in the tree.
 */
export class ReflowBlock {
  readonly kind = 'block';

  constructor(
    readonly segment: Segment,
    readonly layout: BlockLayout,
    readonly inserted = false,
  ) {}
}

/**
 * The run of whitespace and newline leaves between two blocks (possibly empty).
 */
export class ReflowPoint {
  readonly kind = 'point';

  constructor(readonly segments: readonly Segment[]) {}

  get hasNewline(): boolean {
    return this.segments.some((segment) => segment.isType('newline'));
  }

  get raw(): string {
    return this.segments.map((segment) => segment.raw).join('');
  }

  indexOf(segment: Segment): number {
    return this.segments.indexOf(segment);
  }
}

export type ReflowElement = ReflowBlock | ReflowPoint;
