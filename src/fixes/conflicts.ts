import type { Segment } from '../segments/segment.js';
import { fixFootprint, fixSpan, spansOverlap, type FixSpan } from './fix.js';
import type { LintFix } from './types.js';

export interface FixCandidate {
  ruleCode: string;
  fixes: readonly LintFix[];
}

export interface FixConflict<T extends FixCandidate = FixCandidate> {
  /** Held back for the next pass. */
  deferred: T;
  /** Already accepted in this pass and overlapping `deferred`. */
  blockedBy: T;
}

export interface ConflictPartition<T extends FixCandidate> {
  accepted: T[];
  conflicts: FixConflict<T>[];
}

/**
 * Accept candidates in order unless they touch a segment an accepted
 * candidate already touches, or act on the same text or gap. All fixes of
 * one candidate go together.
 */
export function partitionByConflicts<T extends FixCandidate>(
  candidates: readonly T[],
): ConflictPartition<T> {
  const accepted: T[] = [];
  const conflicts: FixConflict<T>[] = [];
  const owners = new Map<Segment, T>();
  const claimed: Array<{ span: FixSpan; owner: T }> = [];

  for (const candidate of candidates) {
    const footprint = candidate.fixes.flatMap(fixFootprint);
    const spans = candidate.fixes.map(fixSpan).filter((span): span is FixSpan => span !== null);
    const blockedBy =
      footprint.map((segment) => owners.get(segment)).find((owner) => owner !== undefined) ??
      claimed.find((claim) => spans.some((span) => spansOverlap(span, claim.span)))?.owner;

    if (blockedBy) {
      conflicts.push({ deferred: candidate, blockedBy });
      continue;
    }

    accepted.push(candidate);
    for (const segment of footprint) owners.set(segment, candidate);
    for (const span of spans) claimed.push({ span, owner: candidate });
  }

  return { accepted, conflicts };
}
