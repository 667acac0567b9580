import { describe, it, expect } from 'vitest';
import { toRawFacts, trailingWindowStart } from '../src/processing/facts-deserializer.js';
import type { CompanyFacts, SecFact } from '../src/core/types.js';

function fact(overrides: Partial<SecFact>): SecFact {
  return {
    start: '2022-01-01',
    end: '2022-12-31',
    val: 100,
    accn: '0000000001-23-000001',
    fy: 2022,
    fp: 'FY',
    form: '10-K',
    filed: '2023-02-15',
    ...overrides,
  };
}

function companyFacts(entries: SecFact[], taxonomy: string = 'us-gaap'): CompanyFacts {
  return {
    cik: 1,
    entityName: 'Test Co',
    facts: { [taxonomy]: { Revenues: { label: null, description: null, units: { USD: entries } } } },
  };
}

describe('toRawFacts', () => {
  it('converts periodic filings into raw facts with provenance', () => {
    expect(toRawFacts(companyFacts([fact({})]))).toEqual([{
      concept_name: 'Revenues',
      value: 100,
      unit: 'USD',
      period_start: '2022-01-01',
      period_end: '2022-12-31',
      filed_at: '2023-02-15',
      frame_type: 'annual',
      taxonomy: 'us-gaap',
      accession_number: '0000000001-23-000001',
      form_type: '10-K',
    }]);
  });

  it('assigns frames from the fiscal-period tag', () => {
    const facts = toRawFacts(companyFacts([
      fact({ fp: 'Q2', form: '10-Q', start: '2022-04-01', end: '2022-06-30' }),
      fact({ fp: 'FY' }),
    ]));
    expect(facts.map(f => f.frame_type)).toEqual(['quarterly', 'annual']);
  });

  it('keeps amendments and drops other forms and untagged periods', () => {
    const facts = toRawFacts(companyFacts([
      fact({ form: '10-K/A', accn: 'amended' }),
      fact({ form: '8-K', accn: 'current-report' }),
      fact({ fp: null, accn: 'untagged' }),
      fact({ fp: 'H1', accn: 'half-year' }),
    ]));
    expect(facts.map(f => f.accession_number)).toEqual(['amended']);
  });

  it('leaves instant facts without a start', () => {
    const [raw] = toRawFacts(companyFacts([fact({ start: undefined })]));
    expect(raw.period_start).toBeNull();
  });

  it('drops periods ending before the window', () => {
    const facts = toRawFacts(
      companyFacts([fact({ end: '2017-12-31' }), fact({ end: '2018-06-30' })]),
      { since: '2018-06-01' }
    );
    expect(facts.map(f => f.period_end)).toEqual(['2018-06-30']);
  });

  it('reads only the requested taxonomies', () => {
    expect(toRawFacts(companyFacts([fact({})], 'ifrs-full'))).toEqual([]);
    expect(toRawFacts(companyFacts([fact({})], 'ifrs-full'), { taxonomies: ['ifrs-full'] })).toHaveLength(1);
  });
});

describe('trailingWindowStart', () => {
  it('starts one extra year back on the first of the month', () => {
    expect(trailingWindowStart(5, new Date(Date.UTC(2024, 5, 15)))).toBe('2018-06-01');
  });
});
