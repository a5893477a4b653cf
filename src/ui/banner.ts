import { createRequire } from 'node:module';
import { shortPath } from './format.js';
import { color, frame } from './theme.js';

const require = createRequire(import.meta.url);
const { version } = require('../../package.json') as { version: string };

export const TOOL_NAME = 'reflowlint';

const MIN_INNER_WIDTH = 60;

export interface BannerInfo {
  command: string;
  projectRoot?: string;
  /** Extra `label: value` rows, in order. */
  details?: Record<string, string>;
}

export function visibleLength(text: string): number {
  return text.replace(/\x1b\[[0-9;]*m/g, '').length;
}

/**
 * Startup banner, one string per line:
 *
 *   ╭─── reflowlint v0.1.0 · Fix ───────────────────────────╮
 *   │                                                        │
 *   │  Scope: ~/work/warehouse                               │
 *   │  Files: 12                                             │
 *   │                                                        │
 *   ╰────────────────────────────────────────────────────────╯
 */
export function buildBanner({ command, projectRoot, details = {} }: BannerInfo): string[] {
  const rows: string[] = [];
  if (projectRoot) rows.push(`${color.muted('Scope:')} ${color.file(shortPath(projectRoot))}`);
  for (const [label, value] of Object.entries(details)) {
    rows.push(`${color.muted(`${label}:`)} ${value}`);
  }

  // "─── " before the title and " " after it
  const titleWidth = `${TOOL_NAME} v${version} · ${command}`.length + 5;
  const width = Math.max(MIN_INNER_WIDTH, titleWidth + 4, ...rows.map((row) => visibleLength(row) + 4));

  const edge = (text: string) => color.faint(text);
  const lines = [
    edge(`${frame.topLeft}${frame.h.repeat(3)} `) +
      color.brand(`${TOOL_NAME} v${version}`) +
      edge(' · ') +
      color.bold(command) +
      edge(` ${frame.h.repeat(width - titleWidth)}${frame.topRight}`),
  ];

  if (rows.length > 0) {
    const blank = edge(frame.v) + ' '.repeat(width) + edge(frame.v);
    lines.push(blank);
    for (const row of rows) {
      lines.push(`${edge(frame.v)}  ${row}${' '.repeat(width - visibleLength(row) - 2)}${edge(frame.v)}`);
    }
    lines.push(blank);
  }

  lines.push(edge(`${frame.bottomLeft}${frame.h.repeat(width)}${frame.bottomRight}`));
  return lines;
}
