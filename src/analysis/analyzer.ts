import { METRICS } from '../core/types.js';
import { NoMappedFactsError } from '../core/errors.js';
import { getMetricDefinition } from '../processing/metric-definitions.js';
import { mapFacts } from '../processing/fact-mapper.js';
import { organize } from '../processing/period-organizer.js';
import { computeGrowth, labelForOrdinal, periodOrdinal } from '../processing/growth-calculator.js';
import { assessQuality, summarizeQuality, trailingFiscalYearLabels, trailingQuarterLabels } from './quality-assessor.js';
import type { AnalysisResult, Metric, MetricOutcome, OrganizedSeries, RawFact } from '../core/types.js';

/**
 * Runs the pipeline for one company's facts:
 * map -> organize -> {growth, quality} -> combined result.
 * Synchronous and pure; no I/O.
 */

export interface ExpectedWindows {
  annual: readonly string[];
  quarterly: readonly string[];
}

export interface AnalyzeOptions {
  metrics?: readonly Metric[];
  /** Trailing window used when `expected` isn't given */
  years?: number;
  /** Periods the quality report measures against */
  expected?: ExpectedWindows;
  cagrYears?: number;
  /** Reference date for the fallback window when no period was reported */
  asOf?: Date;
}

/**
 * Expected periods ending at the newest period reported for any metric:
 * `years` fiscal years and `years * 4` quarters.
 */
export function expectedWindows(
  organized: ReadonlyMap<Metric, OrganizedSeries>,
  years: number,
  asOf: Date = new Date()
): ExpectedWindows {
  let latestYear: number | null = null;
  let latestQuarter: number | null = null;

  for (const series of organized.values()) {
    for (const e of series.annual) {
      const y = periodOrdinal(e.key.fiscal_period_label, 'annual');
      if (latestYear === null || y > latestYear) latestYear = y;
    }
    for (const e of series.quarterly) {
      const q = periodOrdinal(e.key.fiscal_period_label, 'quarterly');
      if (latestQuarter === null || q > latestQuarter) latestQuarter = q;
    }
  }

  // Nothing reported: the last complete year / quarter before asOf
  const fallbackQuarter = asOf.getUTCFullYear() * 4 + Math.floor(asOf.getUTCMonth() / 3) - 1;

  return {
    annual: trailingFiscalYearLabels(latestYear ?? asOf.getUTCFullYear() - 1, years),
    quarterly: trailingQuarterLabels(labelForOrdinal(latestQuarter ?? fallbackQuarter, 'quarterly'), years * 4),
  };
}

export function analyzeFacts(facts: readonly RawFact[], options: AnalyzeOptions = {}): AnalysisResult {
  const metrics = options.metrics ?? METRICS;
  const mapped = mapFacts(facts);
  const organized = organize(mapped);
  const expected = options.expected ?? expectedWindows(organized, options.years ?? 5, options.asOf);

  const outcomes = metrics.map((metric): MetricOutcome => {
    const def = getMetricDefinition(metric);
    const mappedCount = mapped.get(metric)?.length ?? 0;
    const series = organized.get(metric);

    if (mappedCount === 0 || !series) {
      return unavailable(metric, new NoMappedFactsError(def.display_name, 'no reported concept maps to this metric'));
    }
    if (series.annual.length === 0 && series.quarterly.length === 0) {
      return unavailable(metric, new NoMappedFactsError(
        def.display_name,
        `${mappedCount} facts mapped but none had a usable value, unit and period`
      ));
    }

    return {
      status: 'ok',
      metric,
      series,
      growth: computeGrowth(series, metric, { cagrYears: options.cagrYears }),
      annual_quality: assessQuality(series, metric, expected.annual),
      quarterly_quality: assessQuality(series, metric, expected.quarterly),
    };
  });

  return {
    company: null,
    metrics: outcomes,
    warnings: summarizeQuality(outcomes),
  };
}

function unavailable(metric: Metric, error: NoMappedFactsError): MetricOutcome {
  return { status: 'unavailable', metric, code: error.code, message: error.message };
}
