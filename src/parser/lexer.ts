import { Segment } from '../segments/segment.js';
import { advancePoint, ORIGIN, type SourcePoint } from '../segments/types.js';

const KEYWORDS = new Set([
  'ALL', 'ALTER', 'AND', 'AS', 'ASC', 'BETWEEN', 'BY', 'CASE', 'CREATE',
  'DELETE', 'DESC', 'DISTINCT', 'DROP', 'ELSE', 'END', 'EXISTS', 'FROM',
  'GROUP', 'HAVING', 'IN', 'INNER', 'INSERT', 'INTO', 'IS', 'JOIN', 'LEFT',
  'LIKE', 'LIMIT', 'NOT', 'NULL', 'ON', 'OR', 'ORDER', 'OUTER', 'RIGHT',
  'SELECT', 'SET', 'TABLE', 'THEN', 'UNION', 'UPDATE', 'VALUES', 'WHEN',
  'WHERE', 'WITH',
]);

interface LexMatcher {
  type: string;
  pattern: RegExp;
}

// Order matters: first match wins.
const MATCHERS: LexMatcher[] = [
  { type: 'newline', pattern: /\r?\n/y },
  { type: 'whitespace', pattern: /[ \t\f\v\r]+/y },
  { type: 'inline_comment', pattern: /--[^\r\n]*/y },
  { type: 'block_comment', pattern: /\/\*[\s\S]*?(?:\*\/|$)/y },
  { type: 'quoted_literal', pattern: /'(?:[^']|'')*'/y },
  { type: 'identifier', pattern: /"(?:[^"]|"")*"/y },
  { type: 'numeric_literal', pattern: /\d+(?:\.\d+)?/y },
  { type: 'word', pattern: /[A-Za-z_][A-Za-z0-9_$]*/y },
  { type: 'statement_terminator', pattern: /;/y },
  { type: 'comma', pattern: /,/y },
  { type: 'dot', pattern: /\./y },
  { type: 'star', pattern: /\*/y },
  { type: 'start_bracket', pattern: /\(/y },
  { type: 'end_bracket', pattern: /\)/y },
  { type: 'comparison_operator', pattern: /<>|!=|>=|<=|=|<|>/y },
  { type: 'binary_operator', pattern: /\|\||[+\-/%]/y },
];

/**
 * Split source text into leaf segments. Lossless: the leaves concatenate back
 * to `source`. Characters nothing matches become single `unlexable` leaves.
 */
export function lex(source: string): Segment[] {
  const leaves: Segment[] = [];
  let point: SourcePoint = ORIGIN;

  while (point.offset < source.length) {
    const [type, raw] = matchAt(source, point.offset);
    leaves.push(Segment.leaf(type, raw, { source: point }));
    point = advancePoint(point, raw);
  }

  return leaves;
}

function matchAt(source: string, offset: number): [string, string] {
  for (const { type, pattern } of MATCHERS) {
    pattern.lastIndex = offset;
    const match = pattern.exec(source);
    if (match && match[0].length > 0) {
      if (type === 'word') {
        return [KEYWORDS.has(match[0].toUpperCase()) ? 'keyword' : 'identifier', match[0]];
      }
      return [type, match[0]];
    }
  }
  return ['unlexable', source[offset]];
}
