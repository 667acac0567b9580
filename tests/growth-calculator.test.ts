import { describe, it, expect } from 'vitest';
import {
  compoundGrowth,
  computeGrowth,
  labelForOrdinal,
  periodOrdinal,
  simpleGrowth,
} from '../src/processing/growth-calculator.js';
import { organizeMetric } from '../src/processing/period-organizer.js';
import { InvariantViolationError } from '../src/core/errors.js';
import { annualFact, quarterFact } from './fixtures.js';

describe('simpleGrowth', () => {
  it('computes growth as a fraction', () => {
    expect(simpleGrowth(100, 150)).toEqual({ rate: 0.5, caveat: 'none' });
  });

  it('flags a zero base', () => {
    expect(simpleGrowth(0, 50)).toEqual({ rate: null, caveat: 'zero_base' });
  });

  it('flags a sign flip', () => {
    expect(simpleGrowth(-20, 30)).toEqual({ rate: null, caveat: 'sign_flip' });
    expect(simpleGrowth(30, -20)).toEqual({ rate: null, caveat: 'sign_flip' });
  });

  it('reports a narrowing loss as positive growth', () => {
    expect(simpleGrowth(-50, -20)).toEqual({ rate: 0.6, caveat: 'none' });
  });

  it('reports a drop to zero as -100%', () => {
    expect(simpleGrowth(100, 0)).toEqual({ rate: -1, caveat: 'none' });
  });
});

describe('compoundGrowth', () => {
  it('computes the compound annual rate', () => {
    const result = compoundGrowth(100, 144, 2);
    expect(result.caveat).toBe('none');
    expect(result.rate).toBeCloseTo(0.2, 10);
  });

  it('flags zero endpoints', () => {
    expect(compoundGrowth(100, 0, 2)).toEqual({ rate: null, caveat: 'zero_base' });
    expect(compoundGrowth(0, 100, 2)).toEqual({ rate: null, caveat: 'zero_base' });
  });

  it('flags negative endpoints', () => {
    expect(compoundGrowth(-10, 50, 3)).toEqual({ rate: null, caveat: 'sign_flip' });
    expect(compoundGrowth(-10, -50, 3)).toEqual({ rate: null, caveat: 'sign_flip' });
  });

  it('rejects a non-positive span', () => {
    expect(() => compoundGrowth(100, 120, 0)).toThrow(RangeError);
  });
});

describe('period ordinals', () => {
  it('round-trips labels', () => {
    expect(periodOrdinal('FY2023', 'annual')).toBe(2023);
    expect(periodOrdinal('Q3 2024', 'quarterly')).toBe(2024 * 4 + 2);
    expect(labelForOrdinal(2024 * 4 + 2, 'quarterly')).toBe('Q3 2024');
    expect(labelForOrdinal(2024 * 4, 'quarterly')).toBe('Q1 2024');
  });

  it('throws on a label from the wrong frame', () => {
    expect(() => periodOrdinal('Q1 2023', 'annual')).toThrow(InvariantViolationError);
  });
});

describe('computeGrowth', () => {
  // FY2022 is missing
  const annual = [
    annualFact('2020-12-31', 100),
    annualFact('2021-12-31', 150),
    annualFact('2023-12-31', 180),
  ];

  it('emits YoY for every adjacent pair and marks gaps', () => {
    const series = organizeMetric('revenue', annual);
    const yoy = computeGrowth(series, 'revenue').filter(g => g.kind === 'yoy');

    expect(yoy.map(g => [g.from_period.fiscal_period_label, g.to_period.fiscal_period_label, g.rate, g.caveat]))
      .toEqual([
        ['FY2020', 'FY2021', 0.5, 'none'],
        ['FY2021', 'FY2022', null, 'insufficient_data'],
        ['FY2022', 'FY2023', null, 'insufficient_data'],
      ]);
    expect(yoy[1].to_period).toEqual({
      metric: 'revenue',
      frame_type: 'annual',
      period_end: null,
      fiscal_period_label: 'FY2022',
    });
    expect(yoy[1].start_value).toBe(150);
    expect(yoy[1].end_value).toBeNull();
  });

  it('emits CAGR over the full annual span by default', () => {
    const series = organizeMetric('revenue', annual);
    const cagr = computeGrowth(series, 'revenue').filter(g => g.kind === 'cagr');

    expect(cagr).toHaveLength(1);
    expect(cagr[0].years).toBe(3);
    expect(cagr[0].from_period.fiscal_period_label).toBe('FY2020');
    expect(cagr[0].to_period.fiscal_period_label).toBe('FY2023');
    expect(cagr[0].rate).toBeCloseTo(Math.pow(1.8, 1 / 3) - 1, 10);
  });

  it('emits rolling CAGR windows when a window is given', () => {
    const series = organizeMetric('revenue', annual);
    const cagr = computeGrowth(series, 'revenue', { cagrYears: 2 }).filter(g => g.kind === 'cagr');

    expect(cagr.map(g => g.caveat)).toEqual(['insufficient_data', 'none']);
    expect(cagr[1].from_period.fiscal_period_label).toBe('FY2021');
    expect(cagr[1].rate).toBeCloseTo(Math.sqrt(1.2) - 1, 10);
  });

  it('skips CAGR when the span is under two years', () => {
    const series = organizeMetric('revenue', [annualFact('2022-12-31', 100), annualFact('2023-12-31', 110)]);
    expect(computeGrowth(series, 'revenue').map(g => g.kind)).toEqual(['yoy']);
  });

  it('computes QoQ with a quarter-year span', () => {
    const series = organizeMetric('revenue', [
      quarterFact('2023-01-01', '2023-03-31', 100),
      quarterFact('2023-04-01', '2023-06-30', 110),
    ]);
    const [qoq] = computeGrowth(series, 'revenue');
    expect(qoq.kind).toBe('qoq');
    expect(qoq.years).toBe(0.25);
    expect(qoq.rate).toBeCloseTo(0.1, 10);
  });

  it('orders every result oldest first regardless of input order', () => {
    const facts = [
      ...annual,
      quarterFact('2023-07-01', '2023-09-30', 50),
      quarterFact('2023-04-01', '2023-06-30', 45),
    ];
    const forward = computeGrowth(organizeMetric('revenue', facts), 'revenue');
    const reversed = computeGrowth(organizeMetric('revenue', [...facts].reverse()), 'revenue');

    expect(reversed).toEqual(forward);
    expect(forward.map(g => `${g.kind}:${g.from_period.fiscal_period_label}-${g.to_period.fiscal_period_label}`)).toEqual([
      'yoy:FY2020-FY2021',
      'yoy:FY2021-FY2022',
      'qoq:Q2 2023-Q3 2023',
      'cagr:FY2020-FY2023',
      'yoy:FY2022-FY2023',
    ]);
  });

  it('interleaves annual and quarterly results by period end', () => {
    const facts = [
      annualFact('2021-12-31', 100),
      annualFact('2022-12-31', 110),
      annualFact('2023-12-31', 121),
      quarterFact('2021-01-01', '2021-03-31', 20),
      quarterFact('2021-04-01', '2021-06-30', 22),
    ];
    const growth = computeGrowth(organizeMetric('revenue', facts), 'revenue');

    expect(growth.map(g => g.to_period.period_end)).toEqual([
      '2021-06-30',
      '2022-12-31',
      '2023-12-31',
      '2023-12-31',
    ]);
    expect(growth.map(g => g.kind)).toEqual(['qoq', 'yoy', 'cagr', 'yoy']);
  });

  it('keeps rate null exactly when a caveat is set', () => {
    const series = organizeMetric('revenue', [
      annualFact('2020-12-31', 0),
      annualFact('2021-12-31', -5),
      annualFact('2022-12-31', 10),
      annualFact('2023-12-31', 12),
    ]);
    for (const g of computeGrowth(series, 'revenue')) {
      expect(g.rate === null).toBe(g.caveat !== 'none');
    }
  });

  it('rejects a series for another metric', () => {
    const series = organizeMetric('revenue', annual);
    expect(() => computeGrowth(series, 'net_income')).toThrow(InvariantViolationError);
  });

  it('rejects a CAGR window under two years', () => {
    const series = organizeMetric('revenue', annual);
    expect(() => computeGrowth(series, 'revenue', { cagrYears: 1 })).toThrow(RangeError);
  });

  it('returns nothing for an empty series', () => {
    expect(computeGrowth({ metric: 'revenue', annual: [], quarterly: [] }, 'revenue')).toEqual([]);
  });
});
