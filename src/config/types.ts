export type ConfigScalar = string | number | boolean;

export type ConfigValue = ConfigScalar | null | ConfigSection;

export interface ConfigSection {
  readonly [key: string]: ConfigValue;
}

export type ConfigPath = readonly string[];

export function isConfigSection(value: unknown): value is ConfigSection {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isConfigScalar(value: unknown): value is ConfigScalar {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}
