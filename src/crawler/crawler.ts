import type { Segment } from '../segments/segment.js';

export interface CrawlMatch {
  segment: Segment;
  /** Root first, down to (not including) `segment`. */
  parentStack: readonly Segment[];
}

export interface Crawler {
  crawl(root: Segment): Generator<CrawlMatch>;
}

export interface SegmentSeekerOptions {
  /** Keep descending below a match (default true). */
  allowRecurse?: boolean;
}

/**
 * Yields every segment whose tags intersect `types`, depth-first and
 * pre-order. A container and its descendants can all match; each is reported.
 * Every `crawl()` call is an independent traversal.
 */
export class SegmentSeekerCrawler implements Crawler {
  readonly types: ReadonlySet<string>;
  private readonly allowRecurse: boolean;

  constructor(types: Iterable<string>, options: SegmentSeekerOptions = {}) {
    this.types = new Set(types);
    this.allowRecurse = options.allowRecurse ?? true;
  }

  passesFilter(segment: Segment): boolean {
    for (const type of this.types) {
      if (segment.classTypes.has(type)) return true;
    }
    return false;
  }

  *crawl(root: Segment): Generator<CrawlMatch> {
    yield* this.visit(root, []);
  }

  private *visit(segment: Segment, parentStack: readonly Segment[]): Generator<CrawlMatch> {
    const matched = this.passesFilter(segment);
    if (matched) {
      yield { segment, parentStack };
      if (!this.allowRecurse) return;
    }

    const childStack = [...parentStack, segment];
    for (const child of segment.segments) {
      yield* this.visit(child, childStack);
    }
  }
}

/**
 * Yields the root alone, for rules that look at a whole file.
 */
export class RootOnlyCrawler implements Crawler {
  *crawl(root: Segment): Generator<CrawlMatch> {
    yield { segment: root, parentStack: [] };
  }
}
