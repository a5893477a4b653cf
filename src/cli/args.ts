import { parseArgs } from 'node:util';
import { UsageError, errorMessage } from '../errors.js';

export const COMMANDS = ['lint', 'fix', 'rules'] as const;

export type Command = (typeof COMMANDS)[number] | 'help';

export type OutputFormat = 'human' | 'json';

export interface CliOptions {
  command: Command;
  /** Files and directories to lint; the current directory when empty. */
  paths: string[];
  config: string | undefined;
  rules: string | undefined;
  excludeRules: string | undefined;
  format: OutputFormat;
  concurrency: number;
  maxLoops: number | undefined;
  dryRun: boolean;
  backup: boolean;
  verbose: boolean;
}

export const DEFAULT_CONCURRENCY = 4;

/**
 * Parse `argv` (without the node and script entries). Throws UsageError.
 */
export function parseCliArgs(argv: readonly string[]): CliOptions {
  const { values, positionals } = readArgs(argv);

  const [cmd, ...paths] = positionals;
  let command: Command;
  if (values.help === true || cmd === undefined || cmd === 'help') {
    command = 'help';
  } else {
    const known = COMMANDS.find((name) => name === cmd);
    if (!known) throw new UsageError(`Unknown command: ${cmd}`);
    command = known;
  }

  const format = values.format ?? 'human';
  if (format !== 'human' && format !== 'json') {
    throw new UsageError(`--format must be human or json, got ${format}`);
  }

  return {
    command,
    paths,
    config: values.config,
    rules: values.rules,
    excludeRules: values['exclude-rules'],
    format,
    concurrency:
      values.concurrency === undefined
        ? DEFAULT_CONCURRENCY
        : parsePositiveInt(values.concurrency, '--concurrency'),
    maxLoops: values['max-loops'] === undefined ? undefined : parsePositiveInt(values['max-loops'], '--max-loops'),
    dryRun: values['dry-run'] ?? false,
    backup: !(values['no-backup'] ?? false),
    verbose: values.verbose ?? false,
  };
}

function readArgs(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      options: {
        config: { type: 'string' },
        rules: { type: 'string' },
        'exclude-rules': { type: 'string' },
        format: { type: 'string', default: 'human' },
        concurrency: { type: 'string' },
        'max-loops': { type: 'string' },
        'dry-run': { type: 'boolean', default: false },
        'no-backup': { type: 'boolean', default: false },
        verbose: { type: 'boolean', default: false },
        help: { type: 'boolean', short: 'h', default: false },
      },
      strict: true,
      allowPositionals: true,
    });
  } catch (err) {
    throw new UsageError(errorMessage(err));
  }
}

function parsePositiveInt(value: string, flag: string): number {
  const n = Number(value);
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(n) || n < 1) {
    throw new UsageError(`${flag} must be a positive integer, got ${value}`);
  }
  return n;
}
