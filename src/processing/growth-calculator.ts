import { InvariantViolationError } from '../core/errors.js';
import type {
  FrameType,
  GrowthCaveat,
  GrowthKind,
  GrowthResult,
  Metric,
  OrganizedSeries,
  PeriodRef,
  SeriesEntry,
} from '../core/types.js';

/**
 * Growth Calculator: YoY, QoQ and CAGR over an organized series.
 *
 * A rate that can't be computed is reported as rate = null plus a caveat,
 * never as zero and never by omission:
 * - zero_base: growth from zero is undefined
 * - sign_flip: a move across zero (loss -> profit, profit -> loss) has no
 *   meaningful percentage; present it as a turnaround instead
 * - insufficient_data: an endpoint is missing from the series
 */

export type GrowthOutcome =
  | { rate: number; caveat: 'none' }
  | { rate: null; caveat: Exclude<GrowthCaveat, 'none'> };

export interface GrowthOptions {
  /** Rolling CAGR window in years; defaults to the full annual span */
  cagrYears?: number;
}

/**
 * Simple growth (YoY / QoQ): (end - start) / |start|.
 * Dividing by the absolute base keeps the rate's sign equal to the
 * direction of change, so a narrowing loss reads as positive growth.
 */
export function simpleGrowth(start: number, end: number): GrowthOutcome {
  if (start === 0) return { rate: null, caveat: 'zero_base' };
  if (end !== 0 && Math.sign(start) !== Math.sign(end)) return { rate: null, caveat: 'sign_flip' };
  return { rate: (end - start) / Math.abs(start), caveat: 'none' };
}

/**
 * Compound annual growth: (end / start)^(1/years) - 1.
 * Only defined when both endpoints are positive.
 */
export function compoundGrowth(start: number, end: number, years: number): GrowthOutcome {
  if (!(years > 0)) throw new RangeError(`CAGR needs a positive number of years, got ${years}`);
  if (start === 0 || end === 0) return { rate: null, caveat: 'zero_base' };
  if (start < 0 || end < 0) return { rate: null, caveat: 'sign_flip' };
  const rate = Math.pow(end / start, 1 / years) - 1;
  return Number.isFinite(rate) ? { rate, caveat: 'none' } : { rate: null, caveat: 'insufficient_data' };
}

/** Sequential index of a label: years for FY labels, quarters for "Qn YYYY" */
export function periodOrdinal(label: string, frame: FrameType): number {
  if (frame === 'annual') {
    const m = /^FY(\d{4})$/.exec(label);
    if (m) return Number(m[1]);
  } else {
    const m = /^Q([1-4]) (\d{4})$/.exec(label);
    if (m) return Number(m[2]) * 4 + Number(m[1]) - 1;
  }
  throw new InvariantViolationError(`unrecognized ${frame} period label "${label}"`);
}

export function labelForOrdinal(ordinal: number, frame: FrameType): string {
  if (frame === 'annual') return `FY${ordinal}`;
  return `Q${(ordinal % 4) + 1} ${Math.floor(ordinal / 4)}`;
}

interface Timeline {
  frame: FrameType;
  byOrdinal: Map<number, SeriesEntry>;
  first: number;
  last: number;
}

function timeline(entries: SeriesEntry[], frame: FrameType): Timeline | null {
  if (entries.length === 0) return null;
  const byOrdinal = new Map<number, SeriesEntry>();
  for (const e of entries) {
    byOrdinal.set(periodOrdinal(e.key.fiscal_period_label, frame), e);
  }
  const ordinals = Array.from(byOrdinal.keys());
  return { frame, byOrdinal, first: Math.min(...ordinals), last: Math.max(...ordinals) };
}

/**
 * Sortable end date for a period: its own period_end when reported, else
 * one estimated from the nearest reported period of the same frame.
 */
function chronoKey(t: Timeline, ordinal: number): string {
  const entry = t.byOrdinal.get(ordinal);
  if (entry) return entry.key.period_end;
  if (t.frame === 'quarterly') {
    const year = Math.floor(ordinal / 4);
    const month = (ordinal % 4) * 3 + 3;
    return `${year}-${String(month).padStart(2, '0')}-31`;
  }
  const anchor = t.byOrdinal.get(t.first);
  if (!anchor) throw new InvariantViolationError(`annual timeline has no entry at ${t.first}`);
  const year = Number(anchor.key.period_end.slice(0, 4)) + (ordinal - t.first);
  return `${year}${anchor.key.period_end.slice(4)}`;
}

interface Ranked {
  result: GrowthResult;
  from: string;
  to: string;
}

const KIND_ORDER: Record<GrowthKind, number> = { yoy: 0, qoq: 1, cagr: 2 };

function byChronology(a: Ranked, b: Ranked): number {
  if (a.to !== b.to) return a.to < b.to ? -1 : 1;
  if (a.from !== b.from) return a.from < b.from ? -1 : 1;
  return KIND_ORDER[a.result.kind] - KIND_ORDER[b.result.kind];
}

function refAt(metric: Metric, t: Timeline, ordinal: number): { ref: PeriodRef; value: number | null } {
  const entry = t.byOrdinal.get(ordinal);
  if (entry) return { ref: entry.key, value: entry.value };
  return {
    ref: {
      metric,
      frame_type: t.frame,
      period_end: null,
      fiscal_period_label: labelForOrdinal(ordinal, t.frame),
    },
    value: null,
  };
}

function pairResult(
  metric: Metric,
  kind: GrowthKind,
  t: Timeline,
  from: number,
  to: number,
  years: number,
  outcomeOf: (start: number, end: number) => GrowthOutcome
): Ranked {
  const start = refAt(metric, t, from);
  const end = refAt(metric, t, to);
  const outcome: GrowthOutcome = start.value === null || end.value === null
    ? { rate: null, caveat: 'insufficient_data' }
    : outcomeOf(start.value, end.value);

  return {
    result: {
      metric,
      kind,
      from_period: start.ref,
      to_period: end.ref,
      start_value: start.value,
      end_value: end.value,
      years,
      ...outcome,
    },
    from: chronoKey(t, from),
    to: chronoKey(t, to),
  };
}

/** One result per adjacent pair from the oldest to the newest present period */
function sequential(metric: Metric, kind: 'yoy' | 'qoq', t: Timeline | null): Ranked[] {
  if (!t) return [];
  const years = kind === 'yoy' ? 1 : 0.25;
  const results: Ranked[] = [];
  for (let to = t.first + 1; to <= t.last; to++) {
    results.push(pairResult(metric, kind, t, to - 1, to, years, simpleGrowth));
  }
  return results;
}

function compound(metric: Metric, t: Timeline | null, cagrYears: number | undefined): Ranked[] {
  if (!t) return [];
  const span = t.last - t.first;
  const n = cagrYears ?? span;
  if (n < 2 || n > span) return [];

  const results: Ranked[] = [];
  for (let from = t.first; from + n <= t.last; from++) {
    results.push(pairResult(metric, 'cagr', t, from, from + n, n, (s, e) => compoundGrowth(s, e, n)));
  }
  return results;
}

/**
 * Compute every growth rate for a metric's series.
 *
 * Ordering contract: oldest to newest by the end of the compared period,
 * then by its start; YoY, QoQ, CAGR only break exact ties. Renderers and
 * exporters rely on this order.
 */
export function computeGrowth(
  series: OrganizedSeries,
  metric: Metric,
  options: GrowthOptions = {}
): GrowthResult[] {
  if (series.metric !== metric) {
    throw new InvariantViolationError(`series for ${series.metric} passed as ${metric}`);
  }
  const { cagrYears } = options;
  if (cagrYears !== undefined && (!Number.isInteger(cagrYears) || cagrYears < 2)) {
    throw new RangeError(`cagrYears must be an integer of at least 2, got ${cagrYears}`);
  }

  const annual = timeline(series.annual, 'annual');
  const quarterly = timeline(series.quarterly, 'quarterly');

  return [
    ...sequential(metric, 'yoy', annual),
    ...sequential(metric, 'qoq', quarterly),
    ...compound(metric, annual, cagrYears),
  ]
    .sort(byChronology)
    .map(r => r.result);
}
