// === Type tags ===

/**
 * Parent tags for each built-in segment type. A segment satisfies its own
 * type plus every tag reachable through this table.
 */
export const TYPE_HIERARCHY: Readonly<Record<string, readonly string[]>> = {
  whitespace: [],
  newline: [],
  inline_comment: ['comment'],
  block_comment: ['comment'],
  keyword: ['word'],
  identifier: ['word'],
  numeric_literal: ['literal'],
  quoted_literal: ['literal'],
  statement_terminator: ['symbol'],
  comma: ['symbol'],
  dot: ['symbol'],
  star: ['symbol'],
  start_bracket: ['symbol', 'bracket'],
  end_bracket: ['symbol', 'bracket'],
  binary_operator: ['symbol', 'operator'],
  comparison_operator: ['symbol', 'operator'],
  unlexable: [],
  statement: [],
  bracketed: [],
  file: [],
};

/** Tags that never count as code. */
export const NON_CODE_TAGS = ['whitespace', 'newline', 'comment'] as const;

/**
 * Expand a type (and any extra tags) into the full set of tags it satisfies.
 * Order: the type itself, then parents breadth-first.
 */
export function expandTypes(type: string, extra: readonly string[] = []): ReadonlySet<string> {
  const seen = new Set<string>();
  const queue = [type, ...extra];
  while (queue.length > 0) {
    const next = queue.shift();
    if (next === undefined || seen.has(next)) continue;
    seen.add(next);
    queue.push(...(TYPE_HIERARCHY[next] ?? []));
  }
  return seen;
}

// === Positions ===

/** 1-based line and column, 0-based offset. */
export interface SourcePoint {
  readonly offset: number;
  readonly line: number;
  readonly column: number;
}

export const ORIGIN: SourcePoint = { offset: 0, line: 1, column: 1 };

/**
 * Move a point past `raw`.
 */
export function advancePoint(point: SourcePoint, raw: string): SourcePoint {
  let { line, column } = point;
  for (const ch of raw) {
    if (ch === '\n') {
      line++;
      column = 1;
    } else {
      column++;
    }
  }
  return { offset: point.offset + raw.length, line, column };
}
