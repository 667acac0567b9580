/**
 * Renders analysis results as CSV for spreadsheet import.
 * One table per section; rows follow the result's own order.
 */

import { csvEscape } from './format-utils.js';
import type { AnalysisResult, MetricAnalysis } from '../core/types.js';

export type CsvSection = 'series' | 'growth' | 'quality';

export const CSV_SECTIONS: readonly CsvSection[] = ['series', 'growth', 'quality'];

function analyzed(result: AnalysisResult): MetricAnalysis[] {
  return result.metrics.filter((m): m is MetricAnalysis => m.status === 'ok');
}

function row(cells: Array<string | number | null>): string {
  return cells.map(c => (c === null ? '' : csvEscape(String(c)))).join(',');
}

export function renderSeriesCsv(result: AnalysisResult): string {
  const lines = ['Metric,Frame,Period,Period_End,Value,Filed,Form_Type,Accession_Number,Concept'];
  for (const m of analyzed(result)) {
    for (const entry of [...m.series.annual, ...m.series.quarterly]) {
      lines.push(row([
        m.metric,
        entry.key.frame_type,
        entry.key.fiscal_period_label,
        entry.key.period_end,
        entry.value,
        entry.source.filed_at,
        entry.source.form_type,
        entry.source.accession_number,
        entry.source.concept_name,
      ]));
    }
  }
  return lines.join('\n');
}

export function renderGrowthCsv(result: AnalysisResult): string {
  const lines = ['Metric,Kind,From,To,Start_Value,End_Value,Years,Rate,Caveat'];
  for (const m of analyzed(result)) {
    for (const g of m.growth) {
      lines.push(row([
        m.metric,
        g.kind,
        g.from_period.fiscal_period_label,
        g.to_period.fiscal_period_label,
        g.start_value,
        g.end_value,
        g.years,
        g.rate,
        g.caveat,
      ]));
    }
  }
  return lines.join('\n');
}

export function renderQualityCsv(result: AnalysisResult): string {
  const lines = ['Metric,Frame,Expected,Present,Completeness,Missing'];
  for (const outcome of result.metrics) {
    // No frame was assessed; the reason code takes the Missing column
    if (outcome.status === 'unavailable') {
      lines.push(row([outcome.metric, null, null, null, null, outcome.code]));
      continue;
    }
    for (const [frame, q] of [['annual', outcome.annual_quality], ['quarterly', outcome.quarterly_quality]] as const) {
      lines.push(row([
        outcome.metric,
        frame,
        q.expected_periods,
        q.present_periods,
        q.completeness_ratio.toFixed(2),
        q.missing_period_labels.join(';'),
      ]));
    }
  }
  return lines.join('\n');
}

export function renderCsv(result: AnalysisResult, section: CsvSection = 'series'): string {
  switch (section) {
    case 'series': return renderSeriesCsv(result);
    case 'growth': return renderGrowthCsv(result);
    case 'quality': return renderQualityCsv(result);
  }
}
