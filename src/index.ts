#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { analyzeCompany, type EngineError } from './core/analysis-engine.js';
import { getCache, closeCache } from './core/cache.js';
import { getConfig } from './core/config.js';
import { setLogLevel } from './core/logger.js';
import { renderTable } from './output/table-renderer.js';
import { renderJson } from './output/json-renderer.js';
import { CSV_SECTIONS, renderCsv, type CsvSection } from './output/csv-renderer.js';
import { METRIC_DEFINITIONS, METRIC_TABLE_VERSION, parseMetricList } from './processing/metric-definitions.js';
import { TICKER_CORRECTIONS_VERSION, validateTicker } from './processing/ticker-normalizer.js';
import type { Metric } from './core/types.js';

interface AnalyzeCommandOptions {
  years?: string;
  metrics?: string;
  quarters?: string;
  cagrYears?: string;
  json?: boolean;
  csv?: string | boolean;
}

function parsePositiveInt(value: string, flag: string, min: number = 1): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < min) {
    throw new UsageError(`${flag} must be a whole number >= ${min} (got "${value}")`);
  }
  return n;
}

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function printMetricList(print: (line: string) => void): void {
  for (const m of METRIC_DEFINITIONS) {
    print(`  ${chalk.cyan(m.id.padEnd(22))} ${m.display_name}`);
  }
}

function printEngineError(err: EngineError): void {
  console.error(chalk.red(err.message));
  // company_not_found already names its suggestions in the message
  if (err.type === 'invalid_ticker' && err.suggestions) {
    for (const s of err.suggestions) console.error(chalk.dim(`  ${s}`));
  }
}

function csvSection(value: string | boolean | undefined): CsvSection {
  if (value === undefined || value === true) return 'series';
  const section = CSV_SECTIONS.find(s => s === value);
  if (!section) {
    throw new UsageError(`--csv section must be one of ${CSV_SECTIONS.join(', ')} (got "${String(value)}")`);
  }
  return section;
}

async function executeAnalyze(ticker: string, options: AnalyzeCommandOptions): Promise<void> {
  try {
    let metrics: Metric[] | undefined;
    if (options.metrics) {
      const parsed = parseMetricList(options.metrics);
      if (parsed.unknown.length > 0) {
        console.error(chalk.red(`Unknown metric: ${parsed.unknown.join(', ')}`));
        console.error('\nSupported metrics:');
        printMetricList(line => console.error(line));
        process.exitCode = 1;
        return;
      }
      metrics = parsed.metrics;
    }

    const years = options.years ? parsePositiveInt(options.years, '--years') : undefined;
    const quarters = options.quarters ? parsePositiveInt(options.quarters, '--quarters', 0) : undefined;
    const cagrYears = options.cagrYears ? parsePositiveInt(options.cagrYears, '--cagr-years', 2) : undefined;
    const section = csvSection(options.csv);

    const outcome = await analyzeCompany({ ticker, years, metrics, cagrYears });
    if (!outcome.success) {
      printEngineError(outcome.error);
      process.exitCode = 1;
      return;
    }

    if (options.json) {
      console.log(renderJson(outcome.result));
    } else if (options.csv !== undefined) {
      console.log(renderCsv(outcome.result, section));
    } else {
      console.log('');
      console.log(renderTable(outcome.result, { quarters }));
      console.log('');
    }
  } catch (err) {
    console.error(chalk.red(`Error: ${err instanceof Error ? err.message : String(err)}`));
    process.exitCode = 1;
  } finally {
    closeCache();
  }
}

const program = new Command();

program
  .name('filing-metrics')
  .description('Normalized financial metrics, growth rates and data-quality reports from SEC XBRL filings')
  .version('0.1.0')
  .hook('preAction', () => {
    setLogLevel(getConfig().logLevel);
  });

program
  .command('analyze')
  .alias('a')
  .description('Analyze a company\'s reported metrics (e.g., analyze AAPL -m revenue,eps)')
  .argument('<ticker>', 'Ticker symbol (e.g., AAPL, BRK.B)')
  .option('-y, --years <n>', 'Trailing fiscal years to analyze')
  .option('-m, --metrics <list>', 'Comma-separated metrics (default: all)')
  .option('-q, --quarters <n>', 'Trailing quarters to show in the table', '4')
  .option('--cagr-years <n>', 'Rolling CAGR window in years (default: full span)')
  .option('-j, --json', 'Output as JSON')
  .option('--csv [section]', `Output as CSV (${CSV_SECTIONS.join('|')})`)
  .action(async (ticker: string, options: AnalyzeCommandOptions) => {
    await executeAnalyze(ticker, options);
  });

program
  .command('normalize')
  .description('Normalize and validate a ticker symbol without fetching data')
  .argument('<ticker>', 'Ticker symbol')
  .action((ticker: string) => {
    const result = validateTicker(ticker);
    if (!result.success) {
      console.error(chalk.red(result.message));
      for (const s of result.error.suggestions) console.error(chalk.dim(`  ${s}`));
      process.exitCode = 1;
      return;
    }
    console.log(result.ticker.symbol);
    for (const w of result.ticker.warnings) console.error(chalk.yellow(w));
  });

program
  .command('metrics')
  .description('List all supported metrics')
  .action(() => {
    console.log(chalk.bold('\nSupported Metrics\n'));
    for (const m of METRIC_DEFINITIONS) {
      console.log(`  ${chalk.cyan(m.id.padEnd(22))} ${m.display_name}`);
      console.log(`  ${''.padEnd(22)} ${chalk.dim(m.description)}`);
      console.log(`  ${''.padEnd(22)} ${chalk.dim('XBRL: ' + m.concepts.join(', '))}`);
      console.log('');
    }
    console.log(chalk.dim(`  Metric table v${METRIC_TABLE_VERSION}, ticker corrections ${TICKER_CORRECTIONS_VERSION}\n`));
  });

program
  .command('cache')
  .description('Manage the local cache')
  .option('--clear', 'Clear all cached data')
  .option('--stats', 'Show cache statistics')
  .action((options: { clear?: boolean; stats?: boolean }) => {
    try {
      const cache = getCache();
      if (options.clear) {
        cache.clear();
        console.log(chalk.green('Cache cleared.'));
      } else if (options.stats) {
        const stats = cache.stats();
        const sizeMb = (stats.sizeBytes / 1024 / 1024).toFixed(1);
        console.log(`\n  Cache entries: ${stats.entries}`);
        console.log(`  Cache size:    ${sizeMb} MB`);
        console.log(`  Location:      ${cache.path}\n`);
      } else {
        const stats = cache.stats();
        const sizeMb = (stats.sizeBytes / 1024 / 1024).toFixed(1);
        console.log(`\n  Cache: ${stats.entries} entries, ${sizeMb} MB`);
        console.log(`  Use --clear to reset, --stats for details\n`);
      }
    } finally {
      closeCache();
    }
  });

if (process.argv.length <= 2) {
  program.help();
}

await program.parseAsync();
