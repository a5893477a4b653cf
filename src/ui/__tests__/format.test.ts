import { describe, it, expect } from 'vitest';
import { TOOL_NAME, buildBanner, visibleLength } from '../banner.js';
import { branch, diffLine, fixMark, nested, ruleCode, shortPath, success } from '../format.js';

const plain = (text: string) => text.replace(/\x1b\[[0-9;]*m/g, '');

// ---------------------------------------------------------------------------
// Tree lines
// ---------------------------------------------------------------------------

describe('tree lines', () => {
  it('draws branches and the closing branch', () => {
    expect(plain(branch('a.sql'))).toBe('  ├─ a.sql');
    expect(plain(branch('a.sql', true))).toBe('  └─ a.sql');
    expect(plain(nested('+ x'))).toBe('  │  + x');
  });

  it('closes a section with a success line', () => {
    expect(plain(success('Clean'))).toBe('  └─ ✓ Clean');
  });
});

// ---------------------------------------------------------------------------
// Violation pieces
// ---------------------------------------------------------------------------

describe('violation pieces', () => {
  it('pads rule codes', () => {
    expect(plain(ruleCode('TX1'))).toBe('TX1 ');
    expect(plain(ruleCode('LT01'))).toBe('LT01');
  });

  it('marks only fixable violations', () => {
    expect(plain(fixMark(true))).toBe(' ✎');
    expect(fixMark(false)).toBe('');
  });

  it('prefixes diff lines', () => {
    expect(plain(diffLine('add', 'SELECT a;'))).toBe('+ SELECT a;');
    expect(plain(diffLine('remove', 'SELECT a ;'))).toBe('- SELECT a ;');
  });
});

describe('shortPath', () => {
  it('leaves paths outside the home directory alone', () => {
    expect(shortPath('/nonexistent-root/q.sql')).toBe('/nonexistent-root/q.sql');
  });
});

// ---------------------------------------------------------------------------
// Banner
// ---------------------------------------------------------------------------

describe('buildBanner', () => {
  it('frames the title and rows at one width', () => {
    const lines = buildBanner({
      command: 'Lint',
      projectRoot: '/nonexistent-root/sql',
      details: { Files: '2', Rules: 'LT01, TM01' },
    });

    expect(lines).toHaveLength(6);
    expect(plain(lines[0])).toMatch(new RegExp(`^╭─── ${TOOL_NAME} v\\S+ · Lint ─+╮$`));
    expect(plain(lines[2])).toMatch(/^│ {2}Scope: \/nonexistent-root\/sql +│$/);
    expect(plain(lines[3])).toMatch(/^│ {2}Files: 2 +│$/);
    expect(plain(lines[4])).toMatch(/^│ {2}Rules: LT01, TM01 +│$/);
    expect(plain(lines[5])).toMatch(/^╰─+╯$/);

    const widths = new Set(lines.map(visibleLength));
    expect(widths.size).toBe(1);
    expect(visibleLength(lines[5])).toBe(62);
  });

  it('omits the body when there are no rows', () => {
    const lines = buildBanner({ command: 'Fix' });
    expect(lines).toHaveLength(2);
    expect(visibleLength(lines[0])).toBe(visibleLength(lines[1]));
  });
});
