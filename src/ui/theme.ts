import chalk from 'chalk';

// === Palette ===
const palette = {
  emerald: chalk.hex('#10B981'),
  amber: chalk.hex('#F59E0B'),
  red: chalk.hex('#EF4444'),
  cyan: chalk.hex('#06B6D4'),
  zinc400: chalk.hex('#A1A1AA'),
  zinc500: chalk.hex('#71717A'),
} as const;

// === Roles ===
export const color = {
  brand: palette.emerald,
  success: palette.emerald,
  error: palette.red,
  warning: palette.amber,
  rule: palette.amber.bold,   // rule codes
  file: palette.cyan,         // file paths
  muted: palette.zinc400,     // descriptions, labels
  faint: palette.zinc500,     // positions, connectors, debug
  added: palette.emerald,
  removed: palette.red,
  bold: chalk.bold,
} as const;

// === Glyphs ===
export const glyph = {
  step: '●',
  ok: '✓',
  fail: '✗',
  warn: '⚠',
  fix: '✎',
  branch: '├─',
  lastBranch: '└─',
  pipe: '│',
} as const;

// === Frame ===
export const frame = {
  topLeft: '╭',
  topRight: '╮',
  bottomLeft: '╰',
  bottomRight: '╯',
  v: '│',
  h: '─',
} as const;
