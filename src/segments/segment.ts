import { DetachedSegmentError, StructuralError } from '../errors.js';
import { PositionMarker } from './position.js';
import {
  NON_CODE_TAGS,
  ORIGIN,
  advancePoint,
  expandTypes,
  type SourcePoint,
} from './types.js';

export interface SegmentOptions {
  /** Tags on top of the ones implied by the type. */
  tags?: readonly string[];
  /** Position reported by the lexer. */
  source?: SourcePoint | null;
}

/**
 * A node of the syntax tree. Leaves carry text; containers carry children and
 * derive their text from them.
 *
 * Segments are immutable by convention. The only mutators are
 * `spliceChildren` and `replaceSubtree`, and only fix application calls them.
 */
export class Segment {
  readonly type: string;
  readonly classTypes: ReadonlySet<string>;
  readonly source: SourcePoint | null;

  private readonly tags: readonly string[];
  private readonly leafRaw: string | null;
  private readonly childList: Segment[];
  private readonly rootFlag: boolean;
  private parentRef: Segment | null = null;
  private rawCache: string | null = null;
  private positions: Map<Segment, PositionMarker> | null = null;

  private constructor(
    type: string,
    leafRaw: string | null,
    children: readonly Segment[],
    options: SegmentOptions,
    root: boolean,
  ) {
    this.type = type;
    this.tags = options.tags ?? [];
    this.classTypes = expandTypes(type, this.tags);
    this.source = options.source ?? null;
    this.leafRaw = leafRaw;
    this.rootFlag = root;
    this.childList = [];
    for (const child of children) {
      child.assertDetached();
      child.parentRef = this;
      this.childList.push(child);
    }
  }

  static leaf(type: string, raw: string, options: SegmentOptions = {}): Segment {
    if (raw.length === 0) {
      throw new StructuralError(`Leaf segment of type '${type}' must have text`);
    }
    return new Segment(type, raw, [], options, false);
  }

  static container(
    type: string,
    children: readonly Segment[],
    options: SegmentOptions = {},
  ): Segment {
    return new Segment(type, null, children, options, false);
  }

  /**
   * A root owns position computation for everything beneath it.
   */
  static root(children: readonly Segment[], type = 'file'): Segment {
    return new Segment(type, null, children, {}, true);
  }

  // === Read-only view ===

  get isLeaf(): boolean {
    return this.leafRaw !== null;
  }

  get isRoot(): boolean {
    return this.rootFlag;
  }

  get parent(): Segment | null {
    return this.parentRef;
  }

  get segments(): readonly Segment[] {
    return this.childList;
  }

  get raw(): string {
    if (this.leafRaw !== null) return this.leafRaw;
    if (this.rawCache === null) {
      this.rawCache = this.childList.map((child) => child.raw).join('');
    }
    return this.rawCache;
  }

  /**
   * Leaves beneath this segment in source order (the segment itself for a leaf).
   */
  get rawSegments(): Segment[] {
    if (this.isLeaf) return [this];
    return this.childList.flatMap((child) => child.rawSegments);
  }

  isType(...types: string[]): boolean {
    return types.some((type) => this.classTypes.has(type));
  }

  get isWhitespace(): boolean {
    return this.isLeaf && this.isType('whitespace', 'newline');
  }

  get isComment(): boolean {
    return this.isType('comment');
  }

  get isCode(): boolean {
    if (!this.isLeaf) return this.childList.some((child) => child.isCode);
    return !NON_CODE_TAGS.some((tag) => this.classTypes.has(tag));
  }

  /**
   * Pre-order walk over this segment and everything beneath it.
   */
  *walk(): Generator<Segment> {
    yield this;
    for (const child of this.childList) {
      yield* child.walk();
    }
  }

  getRoot(): Segment {
    let node: Segment = this;
    while (node.parentRef !== null) node = node.parentRef;
    return node;
  }

  isAncestorOf(other: Segment): boolean {
    let node = other.parentRef;
    while (node !== null) {
      if (node === this) return true;
      node = node.parentRef;
    }
    return false;
  }

  // === Positions ===

  get positionMarker(): PositionMarker {
    const root = this.getRoot();
    if (!root.rootFlag) {
      throw new DetachedSegmentError(`${this.describe()} is not attached to a root segment`);
    }
    return root.positionOf(this);
  }

  private positionOf(target: Segment): PositionMarker {
    if (this.positions === null) {
      this.positions = this.indexPositions();
    }
    const marker = this.positions.get(target);
    if (!marker) {
      throw new DetachedSegmentError(`${target.describe()} is not attached to a root segment`);
    }
    return marker;
  }

  private indexPositions(): Map<Segment, PositionMarker> {
    const index = new Map<Segment, PositionMarker>();
    let point: SourcePoint = ORIGIN;

    const visit = (segment: Segment): void => {
      if (segment.leafRaw !== null) {
        index.set(segment, new PositionMarker(point, segment.source));
        point = advancePoint(point, segment.leafRaw);
        return;
      }
      const start = point;
      for (const child of segment.childList) visit(child);
      const first = segment.childList[0];
      const templated = segment.source ?? (first ? index.get(first)?.templated ?? null : null);
      index.set(segment, new PositionMarker(start, templated));
    };

    visit(this);
    return index;
  }

  // === Edit surface (fix application only) ===

  /**
   * Array-style splice on the children. Inserted segments must be detached.
   * Returns the removed children, now detached.
   */
  spliceChildren(start: number, deleteCount: number, ...items: Segment[]): Segment[] {
    if (this.isLeaf) {
      throw new StructuralError(`Cannot splice children of leaf ${this.describe()}`);
    }
    for (const item of items) item.assertDetached();

    const removed = this.childList.splice(start, deleteCount, ...items);
    for (const segment of removed) segment.parentRef = null;
    for (const item of items) item.parentRef = this;
    this.invalidate();
    return removed;
  }

  /**
   * Swap `target` (anywhere beneath this segment) for `replacement`.
   */
  replaceSubtree(target: Segment, replacement: readonly Segment[]): void {
    const parent = target.parentRef;
    if (parent === null || !this.isAncestorOf(target)) {
      throw new StructuralError(`${target.describe()} is not beneath ${this.describe()}`);
    }
    parent.spliceChildren(parent.childList.indexOf(target), 1, ...replacement);
  }

  /**
   * Deep, detached copy with a fresh identity.
   */
  copy(): Segment {
    const options: SegmentOptions = { tags: this.tags, source: this.source };
    if (this.leafRaw !== null) return new Segment(this.type, this.leafRaw, [], options, false);
    return new Segment(
      this.type,
      null,
      this.childList.map((child) => child.copy()),
      options,
      this.rootFlag,
    );
  }

  /**
   * Same type and tags, different text.
   */
  withRaw(raw: string): Segment {
    return Segment.leaf(this.type, raw, { tags: this.tags, source: this.source });
  }

  describe(): string {
    const raw = this.raw.length > 20 ? `${this.raw.slice(0, 17)}...` : this.raw;
    return `${this.type}(${JSON.stringify(raw)})`;
  }

  toString(): string {
    return this.describe();
  }

  private assertDetached(): void {
    if (this.parentRef !== null || this.rootFlag) {
      throw new StructuralError(`${this.describe()} is already attached to a tree`);
    }
  }

  private invalidate(): void {
    let node: Segment | null = this;
    while (node !== null) {
      node.rawCache = null;
      node.positions = null;
      node = node.parentRef;
    }
  }
}
