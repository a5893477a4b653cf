import { advancePoint, type SourcePoint } from './types.js';

/**
 * Where a segment sits in the source.
 *
 * `working` is recomputed from the current tree and is what layout decisions
 * use. `templated` is the position the lexer saw before any rewriting; it is
 * null for segments created by fixes.
 */
export class PositionMarker {
  constructor(
    readonly working: SourcePoint,
    readonly templated: SourcePoint | null,
  ) {}

  get workingLineNo(): number {
    return this.working.line;
  }

  get workingLinePos(): number {
    return this.working.column;
  }

  get workingOffset(): number {
    return this.working.offset;
  }

  /**
   * Line and column immediately after `raw`, when `raw` starts here.
   */
  workingLocAfter(raw: string): { line: number; column: number } {
    const after = advancePoint(this.working, raw);
    return { line: after.line, column: after.column };
  }

  toString(): string {
    return `L${this.working.line}:C${this.working.column}`;
  }
}
