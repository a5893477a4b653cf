import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigError } from '../../errors.js';
import { LintConfig } from '../config.js';
import { CONFIG_FILE_NAME } from '../defaults.js';
import { applyOverrides, loadConfig, toSection } from '../loader.js';

let tempDir: string;

beforeEach(async () => {
  tempDir = await mkdtemp(join(tmpdir(), 'loader-test-'));
});

afterEach(async () => {
  await rm(tempDir, { recursive: true, force: true });
});

// ---------------------------------------------------------------------------
// loadConfig
// ---------------------------------------------------------------------------

describe('loadConfig', () => {
  it('falls back to defaults without a config file', async () => {
    const { config, source } = await loadConfig(tempDir);
    expect(source).toBeNull();
    expect(config.getNumber(['core', 'max_loops'])).toBe(10);
  });

  it('merges the project config over the defaults', async () => {
    const path = join(tempDir, CONFIG_FILE_NAME);
    await writeFile(
      path,
      JSON.stringify({ rules: { 'convention.terminator': { multiline_newline: true } } }),
      'utf-8',
    );

    const { config, source } = await loadConfig(tempDir);

    expect(source).toBe(path);
    expect(config.getBoolean(['rules', 'convention.terminator', 'multiline_newline'])).toBe(true);
    expect(config.getBoolean(['rules', 'convention.terminator', 'require_final_semicolon'])).toBe(false);
  });

  it('resolves an explicit path against the project root', async () => {
    await writeFile(join(tempDir, 'custom.json'), JSON.stringify({ core: { max_loops: 2 } }), 'utf-8');
    const { config } = await loadConfig(tempDir, 'custom.json');
    expect(config.getNumber(['core', 'max_loops'])).toBe(2);
  });

  it('rejects a missing explicit file', async () => {
    await expect(loadConfig(tempDir, 'absent.json')).rejects.toThrow(ConfigError);
  });

  it('rejects invalid JSON', async () => {
    await writeFile(join(tempDir, CONFIG_FILE_NAME), '{ nope', 'utf-8');
    await expect(loadConfig(tempDir)).rejects.toThrow('Config file is not valid JSON');
  });

  it('rejects a non-object root', async () => {
    await writeFile(join(tempDir, CONFIG_FILE_NAME), '[1, 2]', 'utf-8');
    await expect(loadConfig(tempDir)).rejects.toThrow('Config root must be an object');
  });
});

// ---------------------------------------------------------------------------
// toSection
// ---------------------------------------------------------------------------

describe('toSection', () => {
  it('keeps scalars, nulls and nested sections', () => {
    expect(toSection({ a: 1, b: { c: 'x', d: null } }, [])).toEqual({ a: 1, b: { c: 'x', d: null } });
  });

  it('names the path of an unsupported value', () => {
    expect(() => toSection({ core: { rules: ['a'] } }, [])).toThrow(
      "Config 'core.rules' has an unsupported value",
    );
  });
});

// ---------------------------------------------------------------------------
// applyOverrides
// ---------------------------------------------------------------------------

describe('applyOverrides', () => {
  it('returns the same config when nothing is set', () => {
    const config = LintConfig.defaults();
    expect(applyOverrides(config, {})).toBe(config);
  });

  it('writes command-line values into core', () => {
    const config = applyOverrides(LintConfig.defaults(), {
      rules: 'layout',
      excludeRules: 'TM02',
      maxLoops: 4,
    });
    expect(config.getString(['core', 'rules'])).toBe('layout');
    expect(config.getString(['core', 'exclude_rules'])).toBe('TM02');
    expect(config.getNumber(['core', 'max_loops'])).toBe(4);
  });
});
