import { getMetricDefinition } from '../processing/metric-definitions.js';
import type { AnalysisResult, MetricOutcome } from '../core/types.js';

/**
 * Renders analysis results as structured JSON for programmatic use.
 * Rates stay fractions (0.125, not 12.5); a rate that couldn't be
 * computed is null with its caveat alongside.
 */

export function toJsonPayload(result: AnalysisResult) {
  return {
    company: result.company,
    metrics: result.metrics.map(metricPayload),
    warnings: result.warnings,
  };
}

function metricPayload(outcome: MetricOutcome) {
  const display_name = getMetricDefinition(outcome.metric).display_name;
  if (outcome.status === 'unavailable') {
    return {
      metric: outcome.metric,
      display_name,
      status: outcome.status,
      error: { code: outcome.code, message: outcome.message },
    };
  }

  return {
    metric: outcome.metric,
    display_name,
    status: outcome.status,
    annual: outcome.series.annual,
    quarterly: outcome.series.quarterly,
    growth: outcome.growth,
    quality: {
      annual: outcome.annual_quality,
      quarterly: outcome.quarterly_quality,
    },
  };
}

export function renderJson(result: AnalysisResult): string {
  return JSON.stringify(toJsonPayload(result), null, 2);
}
