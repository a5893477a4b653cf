import { color, glyph } from './theme.js';

/**
 * Heading for one file or section: "● text".
 */
export function step(text: string): string {
  return `${color.brand(glyph.step)} ${color.bold(text)}`;
}

/**
 * Line under a heading: "  ├─ text", or "  └─ text" for the last one.
 */
export function branch(text: string, last = false): string {
  return `  ${color.faint(last ? glyph.lastBranch : glyph.branch)} ${text}`;
}

/**
 * Line hanging off a branch: "  │  text".
 */
export function nested(text: string): string {
  return `  ${color.faint(glyph.pipe)}  ${text}`;
}

export function success(text: string): string {
  return branch(color.success(`${glyph.ok} ${text}`), true);
}

export function error(text: string): string {
  return color.error(`${glyph.fail} ${text}`);
}

export function warn(text: string): string {
  return color.warning(`${glyph.warn} ${text}`);
}

export function filePath(path: string): string {
  return color.file(path);
}

export function muted(text: string): string {
  return color.muted(text);
}

export function faint(text: string): string {
  return color.faint(text);
}

/**
 * Rule code padded to the width of the built-in codes.
 */
export function ruleCode(code: string): string {
  return color.rule(code.padEnd(4));
}

/**
 * Marker after a violation that `fix` can repair.
 */
export function fixMark(fixable: boolean): string {
  return fixable ? ` ${color.faint(glyph.fix)}` : '';
}

/**
 * One line of a dry-run diff.
 */
export function diffLine(kind: 'add' | 'remove', text: string): string {
  return kind === 'add' ? color.added(`+ ${text}`) : color.removed(`- ${text}`);
}

/**
 * Shorten paths by replacing $HOME with ~.
 */
export function shortPath(fullPath: string): string {
  const home = process.env.HOME ?? process.env.USERPROFILE ?? '';
  if (home && fullPath.startsWith(home)) {
    return '~' + fullPath.slice(home.length);
  }
  return fullPath;
}
