import { join, resolve } from 'node:path';
import { ConfigError } from '../errors.js';
import { readJson } from '../store/persistence.js';
import { exists } from '../utils/paths.js';
import { LintConfig } from './config.js';
import { CONFIG_FILE_NAME } from './defaults.js';
import { isConfigScalar, isConfigSection, type ConfigSection, type ConfigValue } from './types.js';

export interface LoadedConfig {
  config: LintConfig;
  /** File the overrides came from, or null when running on defaults. */
  source: string | null;
}

/**
 * Load `.reflowlint.json` from the project root (or `explicitPath`) and merge
 * it over the defaults. A missing project file means defaults; a missing
 * explicit file, unreadable JSON or a value of the wrong shape is a ConfigError.
 */
export async function loadConfig(projectRoot: string, explicitPath?: string): Promise<LoadedConfig> {
  const configPath = explicitPath ? resolve(projectRoot, explicitPath) : join(projectRoot, CONFIG_FILE_NAME);

  if (!(await exists(configPath))) {
    if (explicitPath) throw new ConfigError(`Config file not found: ${configPath}`);
    return { config: LintConfig.defaults(), source: null };
  }

  const data = await readJson(configPath);
  if (data === null) {
    throw new ConfigError(`Config file is not valid JSON: ${configPath}`);
  }

  return {
    config: LintConfig.defaults().merge(toSection(data, [])),
    source: configPath,
  };
}

/**
 * Validate parsed JSON as a config section.
 */
export function toSection(data: unknown, path: string[]): ConfigSection {
  if (!isConfigSection(data)) {
    throw new ConfigError(`Config ${describePath(path)} must be an object`);
  }

  const section: Record<string, ConfigValue> = {};
  for (const [key, value] of Object.entries(data)) {
    const childPath = [...path, key];
    if (value === null || isConfigScalar(value)) {
      section[key] = value;
    } else if (isConfigSection(value)) {
      section[key] = toSection(value, childPath);
    } else {
      throw new ConfigError(`Config ${describePath(childPath)} has an unsupported value`);
    }
  }
  return section;
}

function describePath(path: string[]): string {
  return path.length === 0 ? 'root' : `'${path.join('.')}'`;
}

export interface ConfigOverrides {
  rules?: string;
  excludeRules?: string;
  maxLoops?: number;
}

/**
 * Command-line values on top of the loaded config. Unset values are ignored.
 */
export function applyOverrides(config: LintConfig, overrides: ConfigOverrides): LintConfig {
  const core: Record<string, ConfigValue> = {};
  if (overrides.rules !== undefined) core.rules = overrides.rules;
  if (overrides.excludeRules !== undefined) core.exclude_rules = overrides.excludeRules;
  if (overrides.maxLoops !== undefined) core.max_loops = overrides.maxLoops;
  return Object.keys(core).length === 0 ? config : config.merge({ core });
}
