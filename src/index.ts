#!/usr/bin/env node
import { join } from 'node:path';
import { v4 as uuidv4 } from 'uuid';
import { parseCliArgs, type CliOptions } from './cli/args.js';
import { applyOverrides, loadConfig } from './config/loader.js';
import { discoverSqlFiles } from './discovery/files.js';
import { ConfigError, UsageError, errorMessage } from './errors.js';
import { Linter } from './linter/linter.js';
import { runFiles } from './pipeline/lint-files.js';
import type { PipelineOptions } from './pipeline/types.js';
import { builtinRules } from './rules/registry.js';
import { STORE_DIR_NAME, initStoreDir } from './store/persistence.js';
import { color } from './ui/theme.js';
import { TOOL_NAME } from './ui/banner.js';
import { shortPath } from './ui/format.js';
import { findProjectRoot } from './utils/paths.js';
import {
  formatJsonReport,
  printDiff,
  printError,
  printFileReport,
  printHeader,
  printRules,
  printSummary,
  setLogLevel,
} from './utils/logger.js';

const EXIT_OK = 0;
const EXIT_VIOLATIONS = 1;
const EXIT_USAGE = 2;

function printHelp(): void {
  console.log(`
${color.brand(TOOL_NAME)} <command> [paths...] [options]

${color.bold('Commands:')}
  lint       Report layout violations in .sql files
  fix        Fix what can be fixed, then report what is left
  rules      List the available rules

${color.bold('Options:')}
  --config <file>         Config file (default: .reflowlint.json in the project root)
  --rules <list>          Comma separated rule codes, names or groups (default: all)
  --exclude-rules <list>  Rules to leave out
  --format human|json     Output format (default: human)
  --concurrency N         Files processed in parallel (default: 4)
  --max-loops N           Fix passes per file (default: core.max_loops)
  --dry-run               Show what fix would change without writing
  --no-backup             Do not back up files before fixing
  --verbose               Show debug output
`.trimEnd());
}

async function main(): Promise<number> {
  let cli: CliOptions;
  try {
    cli = parseCliArgs(process.argv.slice(2));
  } catch (err) {
    if (!(err instanceof UsageError)) throw err;
    printError(err.message);
    printHelp();
    return EXIT_USAGE;
  }

  if (cli.command === 'help') {
    printHelp();
    return EXIT_OK;
  }

  setLogLevel(cli.verbose ? 'debug' : 'warn');

  const cwd = process.cwd();
  const projectRoot = (await findProjectRoot(cwd)) ?? cwd;

  let linter: Linter;
  let configSource: string | null;
  try {
    const loaded = await loadConfig(projectRoot, cli.config);
    configSource = loaded.source;
    const config = applyOverrides(loaded.config, {
      rules: cli.rules,
      excludeRules: cli.excludeRules,
      maxLoops: cli.maxLoops,
    });
    linter = new Linter(config);
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    printError(err.message);
    return EXIT_USAGE;
  }

  if (cli.command === 'rules') {
    return runRules(cli, linter);
  }

  const { files, missing } = await discoverSqlFiles(cli.paths.length > 0 ? cli.paths : ['.'], cwd);
  if (missing.length > 0) {
    for (const path of missing) printError(`Path not found: ${path}`);
    return EXIT_USAGE;
  }

  const runId = uuidv4();
  const writes = cli.command === 'fix' && !cli.dryRun;
  const options: PipelineOptions = {
    mode: cli.command,
    projectRoot,
    storeDir: writes ? await initStoreDir(projectRoot) : join(projectRoot, STORE_DIR_NAME),
    runId,
    concurrency: cli.concurrency,
    dryRun: cli.dryRun,
    backup: cli.backup,
  };

  const human = cli.format === 'human';
  if (human) {
    printHeader(cli.command === 'fix' ? 'Fix' : 'Lint', projectRoot, {
      Files: String(files.length),
      Rules: linter.rules.map((rule) => rule.definition.code).join(', ') || 'none',
      Config: configSource ? shortPath(configSource) : 'defaults',
    });
  }

  const { reports, stats } = await runFiles(files, linter, options);

  if (human) {
    for (const report of reports) {
      printFileReport(report, options.mode);
      if (cli.dryRun && report.fix?.changed) printDiff(report.source, report.fix.output);
    }
    printSummary(stats, options.mode, cli.dryRun);
  } else {
    console.log(formatJsonReport(runId, options.mode, reports));
  }

  return stats.violations > 0 || stats.errors > 0 ? EXIT_VIOLATIONS : EXIT_OK;
}

function runRules(cli: CliOptions, linter: Linter): number {
  const selected = new Set(linter.rules.map((rule) => rule.definition.code));
  const rules = builtinRules();
  if (cli.format === 'json') {
    const list = rules.map((rule) => ({
      code: rule.code,
      name: rule.name,
      description: rule.description,
      groups: rule.groups,
      selected: selected.has(rule.code),
    }));
    console.log(JSON.stringify(list, null, 2));
  } else {
    printRules(rules);
  }
  return EXIT_OK;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    printError(`Unexpected error: ${errorMessage(err)}`);
    process.exitCode = EXIT_VIOLATIONS;
  });
