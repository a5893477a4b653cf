import type { LintConfig } from '../config/config.js';
import { Fix, sortFixes } from '../fixes/fix.js';
import type { FixPosition, LintFix } from '../fixes/types.js';
import type { Segment } from '../segments/segment.js';
import {
  reconcilePoint,
  resolveBoundary,
  trimTrailingWhitespace,
  type BoundaryChange,
  type ReflowIssueKind,
  type ReflowMode,
} from './boundary.js';
import { ReflowConfig } from './config.js';
import { ReflowBlock, ReflowPoint, type ReflowElement } from './elements.js';

export type TargetSides = 'both' | 'before' | 'after';

/**
 * One boundary that did not match the layout policy.
 */
export interface ReflowIssue {
  kind: ReflowIssueKind;
  /** Block before the boundary (null at the start of the sequence). */
  before: Segment | null;
  /** Block after the boundary (null at the end of the sequence). */
  after: Segment | null;
  /** Whitespace at the boundary once fixed. */
  result: string;
  fixes: LintFix[];
}

/**
 * An ordered view of a slice of the tree: points (whitespace runs) and blocks
 * (single non-whitespace leaves), alternating, starting and ending with a
 * point. Operations return new sequences; the tree is never touched. Edits
 * that the desired arrangement needs come back as fixes.
 */
export class ReflowSequence {
  private constructor(
    readonly elements: readonly ReflowElement[],
    readonly root: Segment,
    readonly reflowConfig: ReflowConfig,
    private readonly embodiedFixes: readonly LintFix[],
    private readonly issues: readonly ReflowIssue[],
  ) {}

  // === Construction ===

  static fromRawSegments(segments: readonly Segment[], root: Segment, config: LintConfig): ReflowSequence {
    const reflowConfig = ReflowConfig.fromLintConfig(config);
    const elements: ReflowElement[] = [];
    let pending: Segment[] = [];

    for (const segment of segments) {
      if (segment.isWhitespace) {
        pending.push(segment);
        continue;
      }
      elements.push(new ReflowPoint(pending));
      elements.push(new ReflowBlock(segment, reflowConfig.getBlockLayout(segment)));
      pending = [];
    }
    elements.push(new ReflowPoint(pending));

    return new ReflowSequence(elements, root, reflowConfig, [], []);
  }

  static fromRoot(root: Segment, config: LintConfig): ReflowSequence {
    return ReflowSequence.fromRawSegments(root.rawSegments, root, config);
  }

  /**
   * Sequence covering `target` and its surroundings out to the nearest code
   * leaf on each requested side.
   */
  static fromAroundTarget(
    target: Segment,
    root: Segment,
    config: LintConfig,
    sides: TargetSides = 'both',
  ): ReflowSequence {
    const allRaws = root.rawSegments;
    const targetRaws = target.rawSegments;
    const startIdx = allRaws.indexOf(targetRaws[0]);
    const endIdx = allRaws.indexOf(targetRaws[targetRaws.length - 1]);
    if (targetRaws.length === 0 || startIdx === -1 || endIdx === -1) {
      throw new Error(`${target.describe()} is not beneath ${root.describe()}`);
    }

    let preIdx = startIdx;
    if (sides !== 'after') {
      preIdx = startIdx - 1;
      while (preIdx > 0 && !allRaws[preIdx].isCode) preIdx--;
      preIdx = Math.max(preIdx, 0);
    }

    let postIdx = endIdx + 1;
    if (sides !== 'before') {
      while (postIdx < allRaws.length && !allRaws[postIdx].isCode) postIdx++;
      postIdx = Math.min(postIdx + 1, allRaws.length);
    }

    return ReflowSequence.fromRawSegments(allRaws.slice(preIdx, postIdx), root, config);
  }

  // === Rearrangement ===

  get blocks(): ReflowBlock[] {
    return this.elements.filter((element): element is ReflowBlock => element instanceof ReflowBlock);
  }

  /**
   * Sequence with `target` taken out; the points either side merge. When the
   * block started a line, the spaces that followed it are dropped too, so
   * they do not become the indentation of whatever comes next.
   */
  without(target: Segment): ReflowSequence {
    const idx = this.elements.findIndex(
      (element) => element instanceof ReflowBlock && element.segment === target,
    );
    const block = this.elements[idx];
    if (idx === -1 || !(block instanceof ReflowBlock) || block.inserted) {
      throw new Error(`${target.describe()} is not an existing block in this sequence`);
    }

    const before = this.pointAt(idx - 1);
    const after = this.pointAt(idx + 1);
    const orphaned = before.hasNewline ? leadingWhitespace(after.segments) : [];
    const merged = new ReflowPoint([
      ...before.segments,
      ...after.segments.filter((segment) => !orphaned.includes(segment)),
    ]);

    return this.derive(
      [...this.elements.slice(0, idx - 1), merged, ...this.elements.slice(idx + 2)],
      [...this.embodiedFixes, Fix.delete(target), ...orphaned.map(Fix.delete)],
    );
  }

  /**
   * Sequence with `insertion` placed before or after `target`. A container
   * target is located by its first (before) or last (after) leaf; a
   * whitespace target splits its point. An insertion that is already in the
   * tree is copied, which makes `without` + `insert` a move.
   */
  insert(insertion: Segment, target: Segment, position: FixPosition = 'before'): ReflowSequence {
    if (insertion.isWhitespace) {
      throw new Error('Whitespace is placed by reflow, not inserted');
    }

    const leaves = target.rawSegments;
    const leaf = position === 'after' ? leaves[leaves.length - 1] : leaves[0];
    const idx = this.elements.findIndex((element) =>
      element instanceof ReflowBlock ? element.segment === leaf : element.segments.includes(leaf),
    );
    const element = this.elements[idx];
    if (leaves.length === 0 || idx === -1 || (element instanceof ReflowBlock && element.inserted)) {
      throw new Error(`${target.describe()} is not an existing element of this sequence`);
    }

    const payload = insertion.parent !== null || insertion.isRoot ? insertion.copy() : insertion;
    const block = new ReflowBlock(payload, this.reflowConfig.getBlockLayout(payload), true);
    const fix = position === 'before' ? Fix.createBefore(target, [payload]) : Fix.createAfter(target, [payload]);

    let elements: ReflowElement[];
    if (element instanceof ReflowBlock) {
      elements =
        position === 'before'
          ? [...this.elements.slice(0, idx), block, new ReflowPoint([]), ...this.elements.slice(idx)]
          : [...this.elements.slice(0, idx + 1), new ReflowPoint([]), block, ...this.elements.slice(idx + 1)];
    } else {
      const split = element.indexOf(leaf) + (position === 'after' ? 1 : 0);
      elements = [
        ...this.elements.slice(0, idx),
        new ReflowPoint(element.segments.slice(0, split)),
        block,
        new ReflowPoint(element.segments.slice(split)),
        ...this.elements.slice(idx + 1),
      ];
    }

    return this.derive(elements, [...this.embodiedFixes, fix]);
  }

  // === Layout ===

  /**
   * Reconcile spacing and line breaks at every boundary with the layout
   * policy of the blocks on either side.
   */
  rebreak(): ReflowSequence {
    return this.reflow('rebreak');
  }

  /**
   * Reconcile spacing only; line breaks stay where they are.
   */
  respace(): ReflowSequence {
    return this.reflow('respace');
  }

  /**
   * Every fix this sequence implies, in left-to-right source order.
   */
  getFixes(): LintFix[] {
    return sortFixes([...this.embodiedFixes, ...this.issues.flatMap((issue) => issue.fixes)]);
  }

  getIssues(): readonly ReflowIssue[] {
    return this.issues;
  }

  /**
   * Text of the desired arrangement.
   */
  getRaw(): string {
    return this.elements
      .map((element) => (element instanceof ReflowBlock ? element.segment.raw : element.raw))
      .join('');
  }

  private reflow(mode: ReflowMode): ReflowSequence {
    const elements = [...this.elements];
    let embodied = [...this.embodiedFixes];
    const issues: ReflowIssue[] = [...this.issues];

    for (let i = 0; i < elements.length; i++) {
      const point = elements[i];
      if (!(point instanceof ReflowPoint)) continue;

      const prev = i > 0 ? elements[i - 1] : undefined;
      const next = i + 1 < elements.length ? elements[i + 1] : undefined;
      const prevBlock = prev instanceof ReflowBlock ? prev : null;
      const nextBlock = next instanceof ReflowBlock ? next : null;

      let change: BoundaryChange | null = null;
      if (prevBlock && nextBlock) {
        change = reconcilePoint(point, resolveBoundary(prevBlock, nextBlock, mode));
      } else if (prevBlock?.inserted || nextBlock?.inserted) {
        // Edge of the sequence next to a moved block: only tidy up.
        change = trimTrailingWhitespace(point);
      }
      if (!change) continue;

      const fixes = [...change.fixes];
      if (change.addition) {
        const anchored = anchorAddition(change.addition, prevBlock, nextBlock, embodied);
        embodied = anchored.embodied;
        if (anchored.fix) fixes.push(anchored.fix);
      }

      elements[i] = new ReflowPoint(change.result);
      issues.push({
        kind: change.kind,
        before: prevBlock?.segment ?? null,
        after: nextBlock?.segment ?? null,
        result: change.result.map((segment) => segment.raw).join(''),
        fixes,
      });
    }

    return new ReflowSequence(elements, this.root, this.reflowConfig, embodied, issues);
  }

  private pointAt(index: number): ReflowPoint {
    const element = this.elements[index];
    if (!(element instanceof ReflowPoint)) {
      throw new Error('Reflow elements must alternate between points and blocks');
    }
    return element;
  }

  private derive(elements: ReflowElement[], embodiedFixes: LintFix[]): ReflowSequence {
    return new ReflowSequence(elements, this.root, this.reflowConfig, embodiedFixes, this.issues);
  }
}

function leadingWhitespace(segments: readonly Segment[]): Segment[] {
  const end = segments.findIndex((segment) => !segment.isType('whitespace'));
  return segments.slice(0, end === -1 ? segments.length : end);
}

/**
 * Attach a new whitespace leaf to something that exists in the tree: before
 * the next block, into the insertion that creates the next block, or after
 * the previous block.
 */
function anchorAddition(
  addition: Segment,
  prev: ReflowBlock | null,
  next: ReflowBlock | null,
  embodied: LintFix[],
): { fix: LintFix | null; embodied: LintFix[] } {
  if (next && !next.inserted) {
    return { fix: Fix.createBefore(next.segment, [addition]), embodied };
  }

  if (next) {
    const idx = embodied.findIndex((fix) => fix.type === 'insert' && fix.edit.includes(next.segment));
    const creator = embodied[idx];
    if (creator && creator.type === 'insert') {
      const at = creator.edit.indexOf(next.segment);
      const widened: LintFix = {
        ...creator,
        edit: [...creator.edit.slice(0, at), addition, ...creator.edit.slice(at)],
      };
      return { fix: null, embodied: [...embodied.slice(0, idx), widened, ...embodied.slice(idx + 1)] };
    }
  }

  if (prev && !prev.inserted) {
    return { fix: Fix.createAfter(prev.segment, [addition]), embodied };
  }

  throw new Error('Whitespace between two inserted blocks has no anchor in the tree');
}
