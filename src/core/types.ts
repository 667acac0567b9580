/**
 * Core data model for filing-metrics.
 *
 * Design principles:
 * - RawFacts are immutable; every derived entity is recomputed per request
 * - "Authoritative" is derived by an explicit comparator, never by overwriting
 * - Growth non-computability is a typed outcome, not an exception
 * - Every organized value keeps the provenance of the fact it came from
 */

export const METRICS = [
  'revenue',
  'gross_profit',
  'operating_income',
  'net_income',
  'diluted_eps',
  'basic_eps',
  'operating_cash_flow',
  'total_assets',
  'total_liabilities',
] as const;

/** Closed metric vocabulary. Array order is the synonym-resolution priority. */
export type Metric = typeof METRICS[number];

export type FrameType = 'annual' | 'quarterly';

export interface MetricDefinition {
  id: Metric;
  display_name: string;
  description: string;
  statement_type: 'income_statement' | 'balance_sheet' | 'cash_flow';
  units: readonly string[];
  unit_type: 'currency' | 'per_share';
  aggregation: 'sum' | 'end_of_period';
  /** Concept names in priority order (first = preferred) */
  concepts: readonly string[];
}

/** One reported value as produced by the fetch collaborator's deserializer */
export interface RawFact {
  readonly concept_name: string;
  readonly value: number | null;
  readonly unit: string;
  readonly period_start: string | null;
  readonly period_end: string;
  readonly filed_at: string;
  readonly frame_type: FrameType;
  readonly taxonomy?: string;
  readonly accession_number?: string;
  readonly form_type?: string;
}

export interface PeriodKey {
  metric: Metric;
  frame_type: FrameType;
  period_end: string;
  fiscal_period_label: string;
}

/** Reference to a slot that has no value in the series */
export interface MissingPeriodKey {
  metric: Metric;
  frame_type: FrameType;
  period_end: null;
  fiscal_period_label: string;
}

export type PeriodRef = PeriodKey | MissingPeriodKey;

export interface FactSource {
  concept_name: string;
  filed_at: string;
  accession_number: string | null;
  form_type: string | null;
}

export interface SeriesEntry {
  key: PeriodKey;
  value: number;
  source: FactSource;
  /** How many other facts competed for this slot and lost */
  superseded: number;
}

/** At most one entry per PeriodKey; each frame sorted oldest first */
export interface OrganizedSeries {
  metric: Metric;
  annual: SeriesEntry[];
  quarterly: SeriesEntry[];
}

export type GrowthKind = 'yoy' | 'qoq' | 'cagr';

export type GrowthCaveat = 'none' | 'sign_flip' | 'zero_base' | 'insufficient_data';

interface GrowthResultBase {
  metric: Metric;
  kind: GrowthKind;
  from_period: PeriodRef;
  to_period: PeriodRef;
  start_value: number | null;
  end_value: number | null;
  /** Span in years: n for CAGR, 1 for YoY, 0.25 for QoQ */
  years: number;
}

export type GrowthResult =
  | (GrowthResultBase & { rate: number; caveat: 'none' })
  | (GrowthResultBase & { rate: null; caveat: Exclude<GrowthCaveat, 'none'> });

export interface QualityReport {
  metric: Metric;
  expected_periods: number;
  present_periods: number;
  missing_period_labels: string[];
  completeness_ratio: number;
}

export interface NormalizedTicker {
  symbol: string;
  input: string;
  warnings: string[];
}

export interface CompanyInfo {
  cik: string;
  ticker: string;
  name: string;
}

export interface MetricAnalysis {
  status: 'ok';
  metric: Metric;
  series: OrganizedSeries;
  growth: GrowthResult[];
  annual_quality: QualityReport;
  quarterly_quality: QualityReport;
}

export interface UnavailableMetric {
  status: 'unavailable';
  metric: Metric;
  code: 'NO_MAPPED_FACTS';
  message: string;
}

export type MetricOutcome = MetricAnalysis | UnavailableMetric;

export interface AnalysisResult {
  company: CompanyInfo | null;
  metrics: MetricOutcome[];
  warnings: string[];
}

/** Raw XBRL fact from SEC companyfacts API */
export interface SecFact {
  end: string;
  val: number;
  accn: string;
  fy: number | null;
  fp: string | null;
  form: string;
  filed: string;
  start?: string;
  frame?: string;
}

/** SEC companyfacts API response shape */
export interface CompanyFacts {
  cik: number;
  entityName: string;
  facts: Record<string, Record<string, {
    label: string | null;
    description: string | null;
    units: Record<string, SecFact[]>;
  }>>;
}

/** CIK lookup result */
export interface CikLookup {
  cik: string;
  ticker: string;
  name: string;
}
