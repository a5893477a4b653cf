import { describe, it, expect } from 'vitest';
import { UsageError } from '../../errors.js';
import { DEFAULT_CONCURRENCY, parseCliArgs } from '../args.js';

describe('parseCliArgs', () => {
  it('shows help without a command', () => {
    expect(parseCliArgs([]).command).toBe('help');
    expect(parseCliArgs(['help']).command).toBe('help');
    expect(parseCliArgs(['lint', '-h']).command).toBe('help');
  });

  it('applies defaults', () => {
    expect(parseCliArgs(['lint'])).toEqual({
      command: 'lint',
      paths: [],
      config: undefined,
      rules: undefined,
      excludeRules: undefined,
      format: 'human',
      concurrency: DEFAULT_CONCURRENCY,
      maxLoops: undefined,
      dryRun: false,
      backup: true,
      verbose: false,
    });
  });

  it('reads every option', () => {
    const options = parseCliArgs([
      'fix',
      'queries',
      'report.sql',
      '--config',
      'ci.json',
      '--rules',
      'TM01,layout',
      '--exclude-rules',
      'TM02',
      '--format',
      'json',
      '--concurrency',
      '8',
      '--max-loops',
      '3',
      '--dry-run',
      '--no-backup',
      '--verbose',
    ]);

    expect(options).toEqual({
      command: 'fix',
      paths: ['queries', 'report.sql'],
      config: 'ci.json',
      rules: 'TM01,layout',
      excludeRules: 'TM02',
      format: 'json',
      concurrency: 8,
      maxLoops: 3,
      dryRun: true,
      backup: false,
      verbose: true,
    });
  });

  it('rejects an unknown command', () => {
    expect(() => parseCliArgs(['format'])).toThrow(new UsageError('Unknown command: format'));
  });

  it('rejects an unknown format', () => {
    expect(() => parseCliArgs(['lint', '--format', 'xml'])).toThrow('--format must be human or json, got xml');
  });

  it('rejects numbers that are not positive integers', () => {
    expect(() => parseCliArgs(['lint', '--max-loops', '0'])).toThrow('--max-loops must be a positive integer, got 0');
    expect(() => parseCliArgs(['lint', '--concurrency', '1.5'])).toThrow(
      '--concurrency must be a positive integer, got 1.5',
    );
  });

  it('turns unknown flags into usage errors', () => {
    expect(() => parseCliArgs(['lint', '--fast'])).toThrow(UsageError);
  });
});
