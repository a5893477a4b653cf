import type { Segment } from './segment.js';

export type SegmentPredicate = (segment: Segment) => boolean;

export interface SelectOptions {
  selectIf?: SegmentPredicate;
  /** Only consider segments after this one. */
  startSeg?: Segment;
  /** Only consider segments before this one. */
  stopSeg?: Segment;
}

/**
 * An ordered selection of sibling segments with chainable filters.
 */
export class Segments {
  readonly items: readonly Segment[];

  constructor(...segments: Segment[]) {
    this.items = segments;
  }

  get length(): number {
    return this.items.length;
  }

  /**
   * Segments strictly between `startSeg` and `stopSeg` that pass `selectIf`.
   */
  select({ selectIf, startSeg, stopSeg }: SelectOptions = {}): Segments {
    const startIdx = startSeg ? this.items.indexOf(startSeg) : -1;
    if (startSeg && startIdx === -1) return new Segments();
    const stopIdx = stopSeg ? this.items.indexOf(stopSeg) : this.items.length;
    const end = stopIdx === -1 ? this.items.length : stopIdx;
    const window = this.items.slice(startIdx + 1, end);
    return new Segments(...(selectIf ? window.filter(selectIf) : window));
  }

  filter(predicate: SegmentPredicate): Segments {
    return new Segments(...this.items.filter(predicate));
  }

  first(predicate?: SegmentPredicate): Segments {
    const found = predicate ? this.items.find(predicate) : this.items[0];
    return found ? new Segments(found) : new Segments();
  }

  last(predicate?: SegmentPredicate): Segments {
    for (let i = this.items.length - 1; i >= 0; i--) {
      const segment = this.items[i];
      if (!predicate || predicate(segment)) return new Segments(segment);
    }
    return new Segments();
  }

  any(predicate: SegmentPredicate): boolean {
    return this.items.some(predicate);
  }

  all(predicate: SegmentPredicate): boolean {
    return this.items.every(predicate);
  }

  reversed(): Segments {
    return new Segments(...[...this.items].reverse());
  }

  get(index = 0): Segment | undefined {
    return this.items[index];
  }
}

/**
 * Predicate builders for `Segments`.
 */
export const sp = {
  isCode: (): SegmentPredicate => (segment) => segment.isCode,
  isComment: (): SegmentPredicate => (segment) => segment.isComment,
  isWhitespace: (): SegmentPredicate => (segment) => segment.isWhitespace,
  isType:
    (...types: string[]): SegmentPredicate =>
    (segment) =>
      segment.isType(...types),
  not:
    (predicate: SegmentPredicate): SegmentPredicate =>
    (segment) =>
      !predicate(segment),
} as const;
