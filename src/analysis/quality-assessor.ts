import { getMetricDefinition } from '../processing/metric-definitions.js';
import { labelForOrdinal, periodOrdinal } from '../processing/growth-calculator.js';
import type { Metric, MetricOutcome, OrganizedSeries, QualityReport } from '../core/types.js';

/**
 * Data Quality Assessor: measures a series against the periods the caller
 * expected. It never invents expectations of its own.
 */

/** Below this ratio a series is flagged as limited */
export const LOW_COMPLETENESS = 0.6;

export function assessQuality(
  series: OrganizedSeries,
  metric: Metric,
  expectedLabels: readonly string[]
): QualityReport {
  const present = new Set<string>();
  for (const entry of [...series.annual, ...series.quarterly]) {
    if (entry.key.metric === metric) present.add(entry.key.fiscal_period_label);
  }

  const missing = expectedLabels.filter(label => !present.has(label));
  const expected = expectedLabels.length;
  const presentCount = expected - missing.length;

  return {
    metric,
    expected_periods: expected,
    present_periods: presentCount,
    missing_period_labels: missing,
    completeness_ratio: expected === 0 ? 0 : presentCount / expected,
  };
}

/** `count` fiscal-year labels ending at `latestYear`, oldest first */
export function trailingFiscalYearLabels(latestYear: number, count: number): string[] {
  const labels: string[] = [];
  for (let y = latestYear - count + 1; y <= latestYear; y++) {
    labels.push(labelForOrdinal(y, 'annual'));
  }
  return labels;
}

/** `count` calendar-quarter labels ending at `latestLabel` ("Q2 2024"), oldest first */
export function trailingQuarterLabels(latestLabel: string, count: number): string[] {
  const last = periodOrdinal(latestLabel, 'quarterly');
  const labels: string[] = [];
  for (let q = last - count + 1; q <= last; q++) {
    labels.push(labelForOrdinal(q, 'quarterly'));
  }
  return labels;
}

/** Human-readable warnings for a set of metric outcomes */
export function summarizeQuality(outcomes: readonly MetricOutcome[]): string[] {
  const warnings: string[] = [];
  const unavailable: string[] = [];

  for (const outcome of outcomes) {
    const name = getMetricDefinition(outcome.metric).display_name;
    if (outcome.status === 'unavailable') {
      unavailable.push(name);
      continue;
    }

    const { annual_quality: annual, quarterly_quality: quarterly } = outcome;
    if (annual.expected_periods > 0 && annual.completeness_ratio < LOW_COMPLETENESS) {
      warnings.push(
        `Limited annual data for ${name}: ${annual.present_periods}/${annual.expected_periods} fiscal years ` +
        `(missing ${annual.missing_period_labels.join(', ')})`
      );
    }
    if (quarterly.expected_periods > 0 && quarterly.completeness_ratio < LOW_COMPLETENESS) {
      warnings.push(
        `Limited quarterly data for ${name}: ${quarterly.present_periods}/${quarterly.expected_periods} quarters; QoQ analysis may be incomplete`
      );
    }
  }

  if (unavailable.length > 0) {
    warnings.push(`Data unavailable: ${unavailable.join(', ')}`);
  }

  return warnings;
}
