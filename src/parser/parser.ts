import { Segment } from '../segments/segment.js';
import { lex } from './lexer.js';

/**
 * Parse source text into a `file` root:
 *
 *   file
 *   ├─ statement        first to last code leaf before a terminator
 *   │  └─ bracketed     matched ( ... ) groups, nested
 *   ├─ statement_terminator
 *   └─ whitespace / newline / comments between statements
 *
 * Brackets that never close stay flat and do not hide the terminators
 * after them.
 */
export function parse(source: string): Segment {
  return Segment.root(buildFileChildren(lex(source)));
}

function buildFileChildren(leaves: Segment[]): Segment[] {
  const children: Segment[] = [];
  const paired = pairedBrackets(leaves);
  let pending: Segment[] = [];
  let depth = 0;

  for (const leaf of leaves) {
    if (paired.has(leaf)) {
      if (leaf.isType('start_bracket')) depth++;
      if (leaf.isType('end_bracket')) depth--;
    }

    if (leaf.isType('statement_terminator') && depth === 0) {
      children.push(...flushStatement(pending), leaf);
      pending = [];
      continue;
    }
    pending.push(leaf);
  }

  children.push(...flushStatement(pending));
  return children;
}

/**
 * Brackets that have a partner. An unmatched `(` must not hold the
 * terminators after it inside one statement.
 */
function pairedBrackets(leaves: readonly Segment[]): Set<Segment> {
  const paired = new Set<Segment>();
  const open: Segment[] = [];
  for (const leaf of leaves) {
    if (leaf.isType('start_bracket')) {
      open.push(leaf);
    } else if (leaf.isType('end_bracket')) {
      const partner = open.pop();
      if (partner) paired.add(partner).add(leaf);
    }
  }
  return paired;
}

/**
 * Wrap the code run of `leaves` in a statement; leading and trailing
 * non-code leaves stay at file level.
 */
function flushStatement(leaves: Segment[]): Segment[] {
  const first = leaves.findIndex((leaf) => leaf.isCode);
  if (first === -1) return leaves;

  let last = leaves.length - 1;
  while (!leaves[last].isCode) last--;

  return [
    ...leaves.slice(0, first),
    Segment.container('statement', groupBrackets(leaves.slice(first, last + 1))),
    ...leaves.slice(last + 1),
  ];
}

function groupBrackets(leaves: Segment[]): Segment[] {
  const out: Segment[] = [];
  let i = 0;

  while (i < leaves.length) {
    const leaf = leaves[i];
    if (!leaf.isType('start_bracket')) {
      out.push(leaf);
      i++;
      continue;
    }

    const close = findClosingBracket(leaves, i);
    if (close === -1) {
      out.push(leaf);
      i++;
      continue;
    }

    const inner = groupBrackets(leaves.slice(i + 1, close));
    out.push(Segment.container('bracketed', [leaf, ...inner, leaves[close]]));
    i = close + 1;
  }

  return out;
}

function findClosingBracket(leaves: Segment[], open: number): number {
  let depth = 0;
  for (let i = open; i < leaves.length; i++) {
    if (leaves[i].isType('start_bracket')) depth++;
    if (leaves[i].isType('end_bracket')) {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}
