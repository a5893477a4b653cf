import { ConfigError } from '../errors.js';
import { DEFAULT_CONFIG } from './defaults.js';
import {
  isConfigScalar,
  isConfigSection,
  type ConfigPath,
  type ConfigSection,
  type ConfigValue,
} from './types.js';

/**
 * Immutable, path-keyed configuration.
 *
 * `deriveOverride` copies only the sections along the overridden path and
 * shares the rest, so a rule can take a scoped copy for one evaluation without
 * touching the instance every other rule and file reads.
 */
export class LintConfig {
  private constructor(private readonly root: ConfigSection) {}

  static fromObject(section: ConfigSection): LintConfig {
    return new LintConfig(freezeSection(section));
  }

  static defaults(): LintConfig {
    return LintConfig.fromObject(DEFAULT_CONFIG);
  }

  get(path: ConfigPath): ConfigValue | undefined {
    let node: ConfigValue = this.root;
    for (const key of path) {
      if (!isConfigSection(node) || !Object.hasOwn(node, key)) return undefined;
      node = node[key];
    }
    return node;
  }

  has(path: ConfigPath): boolean {
    return this.get(path) !== undefined;
  }

  getBoolean(path: ConfigPath): boolean {
    const value = this.get(path);
    if (typeof value !== 'boolean') throw typeMismatch(path, 'boolean', value);
    return value;
  }

  getString(path: ConfigPath): string {
    const value = this.get(path);
    if (typeof value !== 'string') throw typeMismatch(path, 'string', value);
    return value;
  }

  getNumber(path: ConfigPath): number {
    const value = this.get(path);
    if (typeof value !== 'number' || Number.isNaN(value)) throw typeMismatch(path, 'number', value);
    return value;
  }

  /**
   * Section at `path`, or an empty section when nothing is configured there.
   */
  getSection(path: ConfigPath): ConfigSection {
    const value = this.get(path);
    if (value === undefined || value === null) return {};
    if (!isConfigSection(value)) throw typeMismatch(path, 'section', value);
    return value;
  }

  /**
   * New config with `value` at `path`; this instance is left as it was.
   */
  deriveOverride(path: ConfigPath, value: ConfigValue): LintConfig {
    if (path.length === 0) {
      if (!isConfigSection(value)) throw new ConfigError('Root override must be a section');
      return LintConfig.fromObject(value);
    }
    return new LintConfig(setAt(this.root, path, freezeValue(value)));
  }

  /**
   * Deep-merge `overrides` on top of this config.
   */
  merge(overrides: ConfigSection): LintConfig {
    return new LintConfig(freezeSection(mergeSections(this.root, overrides)));
  }

  toObject(): ConfigSection {
    return this.root;
  }
}

function setAt(section: ConfigSection, path: ConfigPath, value: ConfigValue): ConfigSection {
  const [head, ...rest] = path;
  if (rest.length === 0) {
    return Object.freeze({ ...section, [head]: value });
  }
  const current = section[head];
  const child = isConfigSection(current) ? current : {};
  return Object.freeze({ ...section, [head]: setAt(child, rest, value) });
}

function mergeSections(base: ConfigSection, overrides: ConfigSection): ConfigSection {
  const merged: Record<string, ConfigValue> = { ...base };
  for (const [key, value] of Object.entries(overrides)) {
    const existing = merged[key];
    merged[key] =
      isConfigSection(existing) && isConfigSection(value) ? mergeSections(existing, value) : value;
  }
  return merged;
}

function freezeValue(value: ConfigValue): ConfigValue {
  return isConfigSection(value) ? freezeSection(value) : value;
}

function freezeSection(section: ConfigSection): ConfigSection {
  const copy: Record<string, ConfigValue> = {};
  for (const [key, value] of Object.entries(section)) {
    copy[key] = freezeValue(value);
  }
  return Object.freeze(copy);
}

function typeMismatch(path: ConfigPath, expected: string, value: ConfigValue | undefined): ConfigError {
  const key = path.join('.');
  if (value === undefined) return new ConfigError(`Missing config value '${key}' (expected ${expected})`);
  const actual = isConfigScalar(value) ? typeof value : value === null ? 'null' : 'section';
  return new ConfigError(`Config value '${key}' should be a ${expected}, got ${actual}`);
}
