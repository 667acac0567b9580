import type { RawFact } from '../src/core/types.js';

/** A fiscal-year revenue fact; override any field */
export function annualFact(periodEnd: string, value: number | null, overrides: Partial<RawFact> = {}): RawFact {
  const year = Number(periodEnd.slice(0, 4));
  return {
    concept_name: 'Revenues',
    value,
    unit: 'USD',
    period_start: `${year - 1}${periodEnd.slice(4)}`,
    period_end: periodEnd,
    filed_at: `${year + 1}-02-15`,
    frame_type: 'annual',
    ...overrides,
  };
}

/** A three-month revenue fact; override any field */
export function quarterFact(start: string, end: string, value: number | null, overrides: Partial<RawFact> = {}): RawFact {
  return {
    concept_name: 'Revenues',
    value,
    unit: 'USD',
    period_start: start,
    period_end: end,
    filed_at: end,
    frame_type: 'quarterly',
    ...overrides,
  };
}
