import { METRICS } from '../core/types.js';
import { InvariantViolationError } from '../core/errors.js';
import { getMetricDefinition } from './metric-definitions.js';
import { conceptPriority } from './fact-mapper.js';
import type { FrameType, Metric, OrganizedSeries, PeriodKey, RawFact, SeriesEntry } from '../core/types.js';

/**
 * Period Organizer: buckets mapped facts into annual and quarterly slots and
 * resolves each slot to a single authoritative value.
 *
 * Resolution strategy: "most recently filed wins"
 * - The same period appears in many filings (10-K, 10-K/A, the following
 *   year's comparatives, ...). A later filing supersedes an earlier one,
 *   which handles restatements.
 * - At equal filing dates, a fact whose span matches the frame beats one
 *   with no start date, and the span closest to a nominal year or quarter
 *   beats the rest. Then the preferred synonym wins, then the later
 *   accession number, and finally the larger value.
 * - Facts with partial spans (year-to-date values, 3-month values tagged as
 *   fiscal-year, ...) are rejected before grouping.
 */

/** Accepted duration in days per frame, covering 52/53-week calendars */
export const SPAN_WINDOWS: Record<FrameType, { min: number; max: number }> = {
  annual: { min: 350, max: 380 },
  quarterly: { min: 80, max: 100 },
};

/** Nominal frame length in days; in-window spans rank by distance from it */
const NOMINAL_SPAN_DAYS: Record<FrameType, number> = {
  annual: 365,
  quarterly: 91,
};

/** Period ends this early in a month are attributed to the preceding month */
const MONTH_GRACE_DAYS = 7;

const DAY_MS = 24 * 60 * 60 * 1000;

type SpanQuality = 'full' | 'unknown';

interface Candidate {
  fact: RawFact;
  value: number;
  span: SpanQuality;
  /** Days away from the nominal frame length; 0 for snapshots */
  spanDistance: number;
  priority: number;
}

interface Slot {
  winner: Candidate;
  label: string;
  superseded: number;
}

function parseDate(iso: string): { year: number; month: number; day: number } | null {
  const m = /^(\d{4})-(\d{2})-(\d{2})$/.exec(iso);
  if (!m) return null;
  const year = Number(m[1]);
  const month = Number(m[2]);
  const day = Number(m[3]);
  if (month < 1 || month > 12 || day < 1 || day > 31) return null;
  return { year, month, day };
}

/** Whole days between two ISO dates, or null if either is malformed */
export function spanDays(start: string, end: string): number | null {
  const s = parseDate(start);
  const e = parseDate(end);
  if (!s || !e) return null;
  return Math.round(
    (Date.UTC(e.year, e.month - 1, e.day) - Date.UTC(s.year, s.month - 1, s.day)) / DAY_MS
  );
}

/**
 * Label for a period: "FY2023" for annual frames, calendar quarter "Q3 2023"
 * for quarterly frames. Depends only on the end date and the frame.
 */
export function fiscalPeriodLabel(periodEnd: string, frame: FrameType): string {
  const d = parseDate(periodEnd);
  if (!d) throw new InvariantViolationError(`malformed period end "${periodEnd}"`);

  let { year, month } = d;
  if (d.day <= MONTH_GRACE_DAYS) {
    month -= 1;
    if (month === 0) {
      month = 12;
      year -= 1;
    }
  }

  return frame === 'annual'
    ? `FY${year}`
    : `Q${Math.floor((month - 1) / 3) + 1} ${year}`;
}

/** Classify a fact for a metric, or null when it's malformed */
function toCandidate(metric: Metric, fact: RawFact): Candidate | null {
  const def = getMetricDefinition(metric);

  if (fact.value === null || !Number.isFinite(fact.value)) return null;
  if (!def.units.includes(fact.unit)) return null;
  if (!parseDate(fact.period_end)) return null;

  let span: SpanQuality = 'full';
  let spanDistance = 0;
  if (fact.period_start !== null) {
    const days = spanDays(fact.period_start, fact.period_end);
    if (days === null || days < 0) return null;
    if (def.aggregation === 'sum') {
      const window = SPAN_WINDOWS[fact.frame_type];
      if (days < window.min || days > window.max) return null;
      spanDistance = Math.abs(days - NOMINAL_SPAN_DAYS[fact.frame_type]);
    }
  } else if (def.aggregation === 'sum') {
    span = 'unknown';
  }

  return {
    fact,
    value: fact.value,
    span,
    spanDistance,
    priority: conceptPriority(metric, fact.concept_name),
  };
}

/**
 * Positive when `a` is more authoritative than `b`, negative when less.
 * Zero only for facts carrying the same value.
 */
function compareCandidates(a: Candidate, b: Candidate): number {
  if (a.fact.filed_at !== b.fact.filed_at) return a.fact.filed_at > b.fact.filed_at ? 1 : -1;
  if (a.span !== b.span) return a.span === 'full' ? 1 : -1;
  if (a.spanDistance !== b.spanDistance) return b.spanDistance - a.spanDistance;
  if (a.priority !== b.priority) return b.priority - a.priority;
  const accnA = a.fact.accession_number ?? '';
  const accnB = b.fact.accession_number ?? '';
  if (accnA !== accnB) return accnA > accnB ? 1 : -1;
  return Math.sign(a.value - b.value);
}

/** Reduce one PeriodKey group to its authoritative fact */
function resolveGroup(group: Candidate[]): Candidate {
  const [winner] = [...group].sort((a, b) => compareCandidates(b, a));
  return winner;
}

function organizeFrame(metric: Metric, frame: FrameType, candidates: Candidate[]): SeriesEntry[] {
  const byPeriodEnd = new Map<string, Candidate[]>();
  for (const c of candidates) {
    if (c.fact.frame_type !== frame) continue;
    const group = byPeriodEnd.get(c.fact.period_end);
    if (group) group.push(c);
    else byPeriodEnd.set(c.fact.period_end, [c]);
  }

  // Distinct period ends can share a label (e.g. a changed fiscal year end)
  const byLabel = new Map<string, Slot>();
  for (const [periodEnd, group] of byPeriodEnd) {
    const slot: Slot = {
      winner: resolveGroup(group),
      label: fiscalPeriodLabel(periodEnd, frame),
      superseded: group.length - 1,
    };
    const existing = byLabel.get(slot.label);
    if (!existing) {
      byLabel.set(slot.label, slot);
      continue;
    }
    const order = compareCandidates(slot.winner, existing.winner)
      || (slot.winner.fact.period_end > existing.winner.fact.period_end ? 1 : -1);
    const [keep, drop] = order > 0 ? [slot, existing] : [existing, slot];
    byLabel.set(slot.label, { ...keep, superseded: keep.superseded + drop.superseded + 1 });
  }

  return Array.from(byLabel.values())
    .map(slot => toEntry(metric, frame, slot))
    .sort((a, b) => a.key.period_end.localeCompare(b.key.period_end));
}

function toEntry(metric: Metric, frame: FrameType, slot: Slot): SeriesEntry {
  const { fact } = slot.winner;
  const key: PeriodKey = {
    metric,
    frame_type: frame,
    period_end: fact.period_end,
    fiscal_period_label: slot.label,
  };
  return {
    key,
    value: slot.winner.value,
    source: {
      concept_name: fact.concept_name,
      filed_at: fact.filed_at,
      accession_number: fact.accession_number ?? null,
      form_type: fact.form_type ?? null,
    },
    superseded: slot.superseded,
  };
}

/** Organize one metric's facts into annual and quarterly series */
export function organizeMetric(metric: Metric, facts: readonly RawFact[]): OrganizedSeries {
  const candidates: Candidate[] = [];
  for (const fact of facts) {
    const c = toCandidate(metric, fact);
    if (c) candidates.push(c);
  }

  return {
    metric,
    annual: organizeFrame(metric, 'annual', candidates),
    quarterly: organizeFrame(metric, 'quarterly', candidates),
  };
}

/**
 * Organize every mapped metric. Output order follows the metric vocabulary,
 * so the result doesn't depend on input order.
 */
export function organize(mapped: ReadonlyMap<Metric, readonly RawFact[]>): Map<Metric, OrganizedSeries> {
  const organized = new Map<Metric, OrganizedSeries>();
  for (const metric of METRICS) {
    const facts = mapped.get(metric);
    if (facts) organized.set(metric, organizeMetric(metric, facts));
  }
  return organized;
}
