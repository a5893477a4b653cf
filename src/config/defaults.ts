import type { ConfigSection } from './types.js';

export const CONFIG_FILE_NAME = '.reflowlint.json';

export const DEFAULT_CONFIG = {
  core: {
    // Comma-separated rule codes, names or groups.
    rules: 'all',
    exclude_rules: '',
    // Fix passes per file before giving up on convergence.
    max_loops: 10,
  },
  rules: {
    'convention.terminator': {
      multiline_newline: false,
      require_final_semicolon: false,
    },
  },
  layout: {
    type: {
      statement_terminator: { spacing_before: 'touch', line_position: 'inline' },
      comma: { spacing_before: 'touch' },
      dot: { spacing_before: 'touch', spacing_after: 'touch' },
      start_bracket: { spacing_before: 'any', spacing_after: 'touch' },
      end_bracket: { spacing_before: 'touch' },
      inline_comment: { spacing_before: 'any' },
      block_comment: { spacing_before: 'any', spacing_after: 'any' },
      unlexable: { spacing_before: 'any', spacing_after: 'any' },
    },
  },
} satisfies ConfigSection;
