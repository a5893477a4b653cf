import type { Segment } from '../segments/segment.js';

export type FixPosition = 'before' | 'after';

/**
 * One structural edit. Anchors are segment identities, not offsets, so fixes
 * from several rules can be collected against one tree and applied in a
 * single pass.
 */
export type LintFix =
  | {
      readonly type: 'insert';
      readonly anchor: Segment;
      readonly position: FixPosition;
      readonly edit: readonly Segment[];
    }
  | { readonly type: 'delete'; readonly anchor: Segment }
  | { readonly type: 'replace'; readonly anchor: Segment; readonly edit: readonly Segment[] }
  | { readonly type: 'edit_raw'; readonly anchor: Segment; readonly raw: string };

export type LintFixType = LintFix['type'];
