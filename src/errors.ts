/**
 * A tree invariant no longer holds (e.g. leaf text no longer adds up to the
 * container's text after an edit). Fatal for the file being fixed.
 */
export class StructuralError extends Error {
  override readonly name = 'StructuralError';
}

/**
 * Position requested for a segment that is not attached to a root.
 */
export class DetachedSegmentError extends Error {
  override readonly name = 'DetachedSegmentError';
}

/**
 * Missing or mistyped configuration. Raised while binding rules, before any
 * file is processed.
 */
export class ConfigError extends Error {
  override readonly name = 'ConfigError';
}

/**
 * A rule faulted while evaluating one crawl match.
 */
export class RuleEvaluationError extends Error {
  override readonly name = 'RuleEvaluationError';

  constructor(
    readonly ruleCode: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Bad command line. The CLI prints it with the usage text and exits 2.
 */
export class UsageError extends Error {
  override readonly name = 'UsageError';
}
