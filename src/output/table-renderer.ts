import chalk from 'chalk';
import { getMetricDefinition } from '../processing/metric-definitions.js';
import { describeGrowth, formatValue, padRight } from './format-utils.js';
import type {
  AnalysisResult,
  GrowthKind,
  GrowthResult,
  MetricAnalysis,
  MetricDefinition,
  QualityReport,
  SeriesEntry,
} from '../core/types.js';

/**
 * Renders analysis results as formatted terminal tables: one block per
 * metric with its annual series, the most recent quarters, CAGR and a
 * data-quality footer.
 */

export interface TableOptions {
  /** How many trailing quarters to show; 0 hides the quarterly table */
  quarters?: number;
}

export function renderTable(result: AnalysisResult, options: TableOptions = {}): string {
  const quarters = options.quarters ?? 4;
  const lines: string[] = [];

  const title = result.company
    ? `${result.company.name} (${result.company.ticker}) — Financial Metrics`
    : 'Financial Metrics';
  lines.push(chalk.bold(title));
  lines.push(chalk.dim('='.repeat(title.length)));
  lines.push('');

  for (const outcome of result.metrics) {
    const def = getMetricDefinition(outcome.metric);
    if (outcome.status === 'unavailable') {
      lines.push(chalk.bold(def.display_name));
      lines.push(chalk.yellow(`  ${outcome.message}`));
      lines.push('');
      continue;
    }
    lines.push(...renderMetric(outcome, def, quarters));
    lines.push('');
  }

  if (result.warnings.length > 0) {
    lines.push(chalk.dim('  -- Warnings ' + '-'.repeat(47)));
    for (const w of result.warnings) lines.push(chalk.yellow(`  ! ${w}`));
  }

  return lines.join('\n').trimEnd();
}

function renderMetric(analysis: MetricAnalysis, def: MetricDefinition, quarters: number): string[] {
  const lines: string[] = [chalk.bold(def.display_name)];
  const { annual, quarterly } = analysis.series;

  if (annual.length > 0) {
    lines.push(...renderFrame(annual, analysis.growth, 'yoy', def));
  }

  const recent = quarters > 0 ? quarterly.slice(-quarters) : [];
  if (recent.length > 0) {
    if (annual.length > 0) lines.push('');
    lines.push(...renderFrame(recent, analysis.growth, 'qoq', def));
  }

  if (annual.length >= 3) {
    lines.push(`  Trend: ${sparkline(annual.map(e => e.value))}`);
  }

  const cagr = analysis.growth.find(g => g.kind === 'cagr');
  if (cagr) {
    lines.push(`  ${cagr.years}-Year CAGR: ${chalk.bold(colorize(cagr))}`);
  }

  lines.push(chalk.dim(`  Annual:    ${qualityLine(analysis.annual_quality, 'fiscal years')}`));
  lines.push(chalk.dim(`  Quarterly: ${qualityLine(analysis.quarterly_quality, 'quarters')}`));

  const restated = [...annual, ...quarterly].filter(e => e.superseded > 0).length;
  if (restated > 0) {
    lines.push(chalk.dim(`  Sources:   ${restated} periods chosen over earlier or competing filings`));
  }

  return lines;
}

function renderFrame(
  entries: readonly SeriesEntry[],
  growth: readonly GrowthResult[],
  kind: Extract<GrowthKind, 'yoy' | 'qoq'>,
  def: MetricDefinition
): string[] {
  const colPeriod = kind === 'yoy' ? 'Fiscal Year' : 'Quarter';
  const colChange = kind === 'yoy' ? 'YoY Change' : 'QoQ Change';
  const valueColWidth = Math.max(16, ...entries.map(e => formatValue(e.value, def).length + 2));

  const lines = [
    `  ${chalk.underline(padRight(colPeriod, 14))}${chalk.underline(padRight('Value', valueColWidth))}${chalk.underline(padRight(colChange, 12))}`,
  ];

  for (const entry of entries) {
    const label = entry.key.fiscal_period_label;
    const change = growth.find(g => g.kind === kind && g.to_period.fiscal_period_label === label);
    const changeStr = change ? colorize(change) : '--';
    lines.push(`  ${padRight(label, 14)}${padRight(formatValue(entry.value, def), valueColWidth)}${changeStr}`);
  }

  return lines;
}

function colorize(result: GrowthResult): string {
  const text = describeGrowth(result);
  if (result.caveat !== 'none') return chalk.dim(text);
  if (result.rate > 0) return chalk.green(text);
  if (result.rate < 0) return chalk.red(text);
  return text;
}

export function qualityLine(report: QualityReport, unit: string): string {
  const pct = Math.round(report.completeness_ratio * 100);
  const base = `${report.present_periods}/${report.expected_periods} ${unit} (${pct}%)`;
  return report.missing_period_labels.length > 0
    ? `${base}, missing ${report.missing_period_labels.join(', ')}`
    : base;
}

/** Generate a Unicode sparkline from a series of values */
export function sparkline(values: number[]): string {
  if (values.length < 2) return '';
  const blocks = ['▁', '▂', '▃', '▄', '▅', '▆', '▇', '█'];
  const min = Math.min(...values);
  const max = Math.max(...values);
  const range = max - min;
  if (range === 0) return blocks[4].repeat(values.length);

  return values.map(v => {
    const idx = Math.round(((v - min) / range) * (blocks.length - 1));
    return blocks[idx];
  }).join('');
}
