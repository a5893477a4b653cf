import type { LintConfig } from '../config/config.js';
import { isConfigSection } from '../config/types.js';
import { ConfigError } from '../errors.js';
import type { Segment } from '../segments/segment.js';

export type SpacingPolicy = 'single' | 'touch' | 'any';
export type LinePosition = 'alone' | 'inline';

export interface BlockLayout {
  spacingBefore: SpacingPolicy;
  spacingAfter: SpacingPolicy;
  linePosition: LinePosition | null;
}

const SPACING_POLICIES: readonly SpacingPolicy[] = ['single', 'touch', 'any'];
const LINE_POSITIONS: readonly LinePosition[] = ['alone', 'inline'];

const DEFAULT_LAYOUT: BlockLayout = {
  spacingBefore: 'single',
  spacingAfter: 'single',
  linePosition: null,
};

type PartialLayout = Partial<BlockLayout>;

const parsed = new WeakMap<LintConfig, ReflowConfig>();

/**
 * Layout policy per segment type, read from `layout.type.<type>` sections.
 */
export class ReflowConfig {
  private readonly byType: ReadonlyMap<string, PartialLayout>;

  private constructor(byType: ReadonlyMap<string, PartialLayout>) {
    this.byType = byType;
  }

  /**
   * Parse once per config; later calls with the same config reuse the
   * result. Throws ConfigError for unknown policies.
   */
  static fromLintConfig(config: LintConfig): ReflowConfig {
    const cached = parsed.get(config);
    if (cached) return cached;

    const types = config.getSection(['layout', 'type']);
    const byType = new Map<string, PartialLayout>();

    for (const [type, section] of Object.entries(types)) {
      if (!isConfigSection(section)) {
        throw new ConfigError(`Config value 'layout.type.${type}' must be a section`);
      }
      const layout: PartialLayout = {};
      const before = section.spacing_before;
      const after = section.spacing_after;
      const position = section.line_position;
      if (before !== undefined) layout.spacingBefore = parseSpacing(type, 'spacing_before', before);
      if (after !== undefined) layout.spacingAfter = parseSpacing(type, 'spacing_after', after);
      if (position !== undefined) layout.linePosition = parseLinePosition(type, position);
      byType.set(type, layout);
    }

    const reflowConfig = new ReflowConfig(byType);
    parsed.set(config, reflowConfig);
    return reflowConfig;
  }

  /**
   * Effective layout for a segment. Parent tags apply first in sorted order,
   * then the segment's own type, so the most specific setting wins.
   */
  getBlockLayout(segment: Segment): BlockLayout {
    const parents = [...segment.classTypes].filter((type) => type !== segment.type).sort();
    const layout: BlockLayout = { ...DEFAULT_LAYOUT };
    for (const type of [...parents, segment.type]) {
      Object.assign(layout, this.byType.get(type));
    }
    return layout;
  }
}

function parseSpacing(type: string, key: string, value: unknown): SpacingPolicy {
  const match = SPACING_POLICIES.find((policy) => policy === value);
  if (!match) {
    throw new ConfigError(
      `Config value 'layout.type.${type}.${key}' must be one of ${SPACING_POLICIES.join(', ')}`,
    );
  }
  return match;
}

function parseLinePosition(type: string, value: unknown): LinePosition | null {
  if (value === null || value === 'default') return null;
  const match = LINE_POSITIONS.find((position) => position === value);
  if (!match) {
    throw new ConfigError(
      `Config value 'layout.type.${type}.line_position' must be one of ${LINE_POSITIONS.join(', ')}`,
    );
  }
  return match;
}
