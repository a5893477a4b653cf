import type { LintConfig } from '../config/config.js';
import type { ConfigScalar } from '../config/types.js';
import type { Crawler } from '../crawler/crawler.js';
import { ConfigError } from '../errors.js';
import { createLogger, type Logger } from '../utils/logger.js';
import type {
  BoundRule,
  KeysOfKind,
  KeywordKind,
  KeywordSpec,
  LintResult,
  RuleContext,
  RuleDefinition,
  RuleOptions,
  RuleOutcome,
} from './types.js';

/**
 * Base class for lint rules. Subclasses declare their identity, the crawl
 * that feeds them and their keywords, and implement `evaluate`.
 */
export abstract class BaseRule<S extends KeywordSpec> implements RuleDefinition {
  abstract readonly code: string;
  abstract readonly name: string;
  abstract readonly description: string;
  abstract readonly groups: readonly string[];
  abstract readonly crawlBehaviour: Crawler;
  abstract readonly configKeywords: S;

  private loggerInstance: Logger | null = null;

  protected get logger(): Logger {
    this.loggerInstance ??= createLogger(`rule:${this.code}`);
    return this.loggerInstance;
  }

  abstract evaluate(context: RuleContext, options: RuleOptions<S>): RuleOutcome;

  /**
   * Resolve every keyword. Lookup order: `rules.<code>.<kw>`,
   * `rules.<name>.<kw>`, `rules.<kw>`.
   */
  bindOptions(config: LintConfig): RuleOptions<S> {
    const spec: KeywordSpec = this.configKeywords;
    const values = new Map<string, ConfigScalar>();
    for (const [keyword, kind] of Object.entries(spec)) {
      values.set(keyword, this.resolveKeyword(config, keyword, kind));
    }
    return new BoundOptions<S>(this.code, values);
  }

  bind(config: LintConfig): BoundRule {
    const options = this.bindOptions(config);
    return {
      definition: this,
      evaluate: (context) => normalizeOutcome(this.evaluate(context, options)),
    };
  }

  private resolveKeyword(config: LintConfig, keyword: string, kind: KeywordKind): ConfigScalar {
    const candidates = [
      ['rules', this.code, keyword],
      ['rules', this.name, keyword],
      ['rules', keyword],
    ];
    const path = candidates.find((candidate) => config.has(candidate));
    if (!path) {
      throw new ConfigError(`Rule ${this.code} needs config keyword '${keyword}' (${kind})`);
    }
    switch (kind) {
      case 'boolean':
        return config.getBoolean(path);
      case 'string':
        return config.getString(path);
      case 'number':
        return config.getNumber(path);
    }
  }
}

class BoundOptions<S extends KeywordSpec> implements RuleOptions<S> {
  constructor(
    private readonly ruleCode: string,
    private readonly values: ReadonlyMap<string, ConfigScalar>,
  ) {}

  boolean(keyword: KeysOfKind<S, 'boolean'>): boolean {
    const value = this.values.get(keyword);
    if (typeof value !== 'boolean') throw this.unbound(keyword, 'boolean');
    return value;
  }

  string(keyword: KeysOfKind<S, 'string'>): string {
    const value = this.values.get(keyword);
    if (typeof value !== 'string') throw this.unbound(keyword, 'string');
    return value;
  }

  number(keyword: KeysOfKind<S, 'number'>): number {
    const value = this.values.get(keyword);
    if (typeof value !== 'number') throw this.unbound(keyword, 'number');
    return value;
  }

  private unbound(keyword: string, kind: KeywordKind): ConfigError {
    return new ConfigError(`Rule ${this.ruleCode} has no ${kind} keyword '${keyword}'`);
  }
}

/**
 * Flatten a rule's return value and drop "nothing found" results.
 */
function normalizeOutcome(outcome: RuleOutcome): LintResult[] {
  if (outcome === null) return [];
  const results = Array.isArray(outcome) ? outcome : [outcome];
  return results.filter((result) => result.anchor !== null);
}
