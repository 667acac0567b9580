import type { CompanyFacts, FrameType, RawFact } from '../core/types.js';

/**
 * Turns the companyfacts payload into RawFacts.
 *
 * The frame comes from the filer's fiscal-period tag (fp): FY -> annual,
 * Q1-Q4 -> quarterly. A 10-K tags its comparative quarters and a 10-Q its
 * year-to-date totals with the same fp, so frames assigned here can carry
 * the wrong span; the period organizer rejects those.
 */

const PERIODIC_FORMS = ['10-K', '10-Q'];

const FRAME_BY_FP: Record<string, FrameType> = {
  FY: 'annual',
  Q1: 'quarterly',
  Q2: 'quarterly',
  Q3: 'quarterly',
  Q4: 'quarterly',
};

export interface DeserializeOptions {
  /** Drop facts whose period ends before this ISO date */
  since?: string;
  taxonomies?: readonly string[];
}

export function toRawFacts(companyFacts: CompanyFacts, options: DeserializeOptions = {}): RawFact[] {
  const { since, taxonomies = ['us-gaap'] } = options;
  const facts: RawFact[] = [];

  for (const taxonomy of taxonomies) {
    const concepts = companyFacts.facts[taxonomy];
    if (!concepts) continue;

    for (const [conceptName, concept] of Object.entries(concepts)) {
      for (const [unit, entries] of Object.entries(concept.units)) {
        for (const entry of entries) {
          if (!PERIODIC_FORMS.some(f => entry.form.startsWith(f))) continue;
          const frame = entry.fp ? FRAME_BY_FP[entry.fp] : undefined;
          if (!frame) continue;
          if (since && entry.end < since) continue;

          facts.push({
            concept_name: conceptName,
            value: entry.val,
            unit,
            period_start: entry.start ?? null,
            period_end: entry.end,
            filed_at: entry.filed,
            frame_type: frame,
            taxonomy,
            accession_number: entry.accn,
            form_type: entry.form,
          });
        }
      }
    }
  }

  return facts;
}

/**
 * First period end kept for a trailing window of `years` years. One extra
 * year is kept so the oldest year in the window still has a YoY base.
 */
export function trailingWindowStart(years: number, asOf: Date = new Date()): string {
  const start = new Date(Date.UTC(asOf.getUTCFullYear() - years - 1, asOf.getUTCMonth(), 1));
  return start.toISOString().slice(0, 10);
}
