import { describe, it, expect } from 'vitest';
import { analyzeFacts } from '../src/analysis/analyzer.js';
import { renderTable, sparkline } from '../src/output/table-renderer.js';
import { renderJson } from '../src/output/json-renderer.js';
import { renderCsv, renderGrowthCsv, renderQualityCsv, renderSeriesCsv } from '../src/output/csv-renderer.js';
import { csvEscape, describeGrowth, formatCurrency, formatPerShare, formatRate } from '../src/output/format-utils.js';
import { annualFact, quarterFact } from './fixtures.js';
import type { AnalysisResult, GrowthResult } from '../src/core/types.js';

const ANSI = /\x1b\[[0-9;]*m/g;

function strip(text: string): string[] {
  return text.replace(ANSI, '').split('\n');
}

function sampleResult(): AnalysisResult {
  const facts = [
    annualFact('2021-12-31', 100e9),
    annualFact('2022-12-31', 120e9),
    annualFact('2023-12-31', 90e9),
    quarterFact('2023-01-01', '2023-03-31', 20e9),
    quarterFact('2023-04-01', '2023-06-30', 25e9),
    annualFact('2022-12-31', -5e9, { concept_name: 'NetIncomeLoss' }),
    annualFact('2023-12-31', 3e9, { concept_name: 'NetIncomeLoss' }),
  ];
  const analysis = analyzeFacts(facts, {
    metrics: ['revenue', 'net_income', 'gross_profit'],
    expected: { annual: ['FY2021', 'FY2022', 'FY2023'], quarterly: ['Q1 2023', 'Q2 2023'] },
  });
  return { ...analysis, company: { cik: '1', ticker: 'TEST', name: 'Test Co' } };
}

describe('formatCurrency', () => {
  it('scales to the largest unit', () => {
    expect(formatCurrency(2.5e12)).toBe('$2.50T');
    expect(formatCurrency(394.33e9)).toBe('$394.33B');
    expect(formatCurrency(1234)).toBe('$1.23K');
    expect(formatCurrency(12)).toBe('$12');
  });

  it('handles negative values and zero', () => {
    expect(formatCurrency(-1e9)).toBe('-$1.00B');
    expect(formatCurrency(0)).toBe('$0');
  });
});

describe('formatPerShare', () => {
  it('shows two decimals', () => {
    expect(formatPerShare(6.13)).toBe('$6.13');
    expect(formatPerShare(-0.5)).toBe('-$0.50');
  });
});

describe('formatRate', () => {
  it('renders fractions as signed percentages', () => {
    expect(formatRate(0.125)).toBe('+12.5%');
    expect(formatRate(-0.034)).toBe('-3.4%');
    expect(formatRate(0)).toBe('0.0%');
  });
});

describe('describeGrowth', () => {
  const base = {
    metric: 'net_income' as const,
    kind: 'yoy' as const,
    from_period: { metric: 'net_income' as const, frame_type: 'annual' as const, period_end: '2022-12-31', fiscal_period_label: 'FY2022' },
    to_period: { metric: 'net_income' as const, frame_type: 'annual' as const, period_end: '2023-12-31', fiscal_period_label: 'FY2023' },
    years: 1,
  };

  it('labels each caveat distinctly', () => {
    const cases: Array<[GrowthResult, string]> = [
      [{ ...base, start_value: 0, end_value: 5, rate: null, caveat: 'zero_base' }, 'n/a (zero base)'],
      [{ ...base, start_value: 5, end_value: null, rate: null, caveat: 'insufficient_data' }, 'n/a (missing period)'],
      [{ ...base, start_value: -5, end_value: 3, rate: null, caveat: 'sign_flip' }, 'Turned positive'],
      [{ ...base, start_value: 5, end_value: -3, rate: null, caveat: 'sign_flip' }, 'Turned negative'],
      [{ ...base, kind: 'cagr', start_value: -5, end_value: -3, rate: null, caveat: 'sign_flip' }, 'n/a (negative values)'],
      [{ ...base, start_value: 100, end_value: 150, rate: 0.5, caveat: 'none' }, '+50.0%'],
    ];
    for (const [result, text] of cases) {
      expect(describeGrowth(result)).toBe(text);
    }
  });
});

describe('csvEscape', () => {
  it('quotes only when needed', () => {
    expect(csvEscape('plain')).toBe('plain');
    expect(csvEscape('a,b')).toBe('"a,b"');
    expect(csvEscape('say "hi"')).toBe('"say ""hi"""');
  });

  it('quotes line breaks, including a bare carriage return', () => {
    expect(csvEscape('a\nb')).toBe('"a\nb"');
    expect(csvEscape('a\rb')).toBe('"a\rb"');
  });
});

describe('sparkline', () => {
  it('scales values to block heights', () => {
    expect(sparkline([100, 120, 90])).toBe('▃█▁');
    expect(sparkline([5, 5])).toBe('▅▅');
    expect(sparkline([1])).toBe('');
  });
});

describe('renderTable', () => {
  const lines = strip(renderTable(sampleResult()));

  it('titles the report with the company', () => {
    expect(lines[0]).toBe('Test Co (TEST) — Financial Metrics');
  });

  it('renders annual rows with YoY change', () => {
    expect(lines).toContain('  FY2021        $100.00B        --');
    expect(lines).toContain('  FY2022        $120.00B        +20.0%');
    expect(lines).toContain('  FY2023        $90.00B         -25.0%');
  });

  it('renders recent quarters with QoQ change', () => {
    expect(lines).toContain('  Q1 2023       $20.00B         --');
    expect(lines).toContain('  Q2 2023       $25.00B         +25.0%');
  });

  it('renders trend and CAGR', () => {
    expect(lines).toContain('  Trend: ▃█▁');
    expect(lines).toContain('  2-Year CAGR: -5.1%');
  });

  it('describes a turnaround instead of a percentage', () => {
    expect(lines).toContain('  FY2022        -$5.00B         --');
    expect(lines).toContain('  FY2023        $3.00B          Turned positive');
  });

  it('reports data quality', () => {
    expect(lines).toContain('  Annual:    3/3 fiscal years (100%)');
    expect(lines).toContain('  Annual:    2/3 fiscal years (67%), missing FY2021');
    expect(lines).toContain('  Quarterly: 0/2 quarters (0%), missing Q1 2023, Q2 2023');
  });

  it('explains unavailable metrics and lists warnings', () => {
    const at = lines.indexOf('Gross Profit');
    expect(at).toBeGreaterThan(0);
    expect(lines[at + 1]).toBe('  No usable facts for Gross Profit: no reported concept maps to this metric');
    expect(lines).toContain('  ! Limited quarterly data for Net Income: 0/2 quarters; QoQ analysis may be incomplete');
    expect(lines[lines.length - 1]).toBe('  ! Data unavailable: Gross Profit');
  });

  it('hides quarters when asked', () => {
    expect(strip(renderTable(sampleResult(), { quarters: 0 }))).not.toContain('  Q2 2023       $25.00B         +25.0%');
  });
});

describe('renderJson', () => {
  const payload = JSON.parse(renderJson(sampleResult()));

  it('keeps rates as fractions', () => {
    expect(payload.metrics[0].growth[0].rate).toBe(0.2);
    expect(payload.metrics[1].growth[0]).toMatchObject({ rate: null, caveat: 'sign_flip' });
  });

  it('includes company, quality and unavailable metrics', () => {
    expect(payload.company).toEqual({ cik: '1', ticker: 'TEST', name: 'Test Co' });
    expect(payload.metrics[0].quality.annual.completeness_ratio).toBe(1);
    expect(payload.metrics[2]).toEqual({
      metric: 'gross_profit',
      display_name: 'Gross Profit',
      status: 'unavailable',
      error: {
        code: 'NO_MAPPED_FACTS',
        message: 'No usable facts for Gross Profit: no reported concept maps to this metric',
      },
    });
  });
});

describe('CSV renderers', () => {
  const result = sampleResult();

  it('writes one series row per period with provenance columns', () => {
    const lines = renderSeriesCsv(result).split('\n');
    expect(lines[0]).toBe('Metric,Frame,Period,Period_End,Value,Filed,Form_Type,Accession_Number,Concept');
    expect(lines[1]).toBe('revenue,annual,FY2021,2021-12-31,100000000000,2022-02-15,,,Revenues');
    expect(lines).toHaveLength(1 + 5 + 2);
  });

  it('writes growth rows with empty rates for caveats', () => {
    const lines = renderGrowthCsv(result).split('\n');
    expect(lines[0]).toBe('Metric,Kind,From,To,Start_Value,End_Value,Years,Rate,Caveat');
    expect(lines[1]).toBe('revenue,yoy,FY2021,FY2022,100000000000,120000000000,1,0.2,none');
    expect(lines).toContain('net_income,yoy,FY2022,FY2023,-5000000000,3000000000,1,,sign_flip');
  });

  it('writes quality rows, including unavailable metrics', () => {
    const lines = renderQualityCsv(result).split('\n');
    expect(lines).toContain('net_income,annual,3,2,0.67,FY2021');
    expect(lines).toContain('net_income,quarterly,2,0,0.00,Q1 2023;Q2 2023');
    expect(lines[lines.length - 1]).toBe('gross_profit,,,,,NO_MAPPED_FACTS');
  });

  it('defaults to the series section', () => {
    expect(renderCsv(result)).toBe(renderSeriesCsv(result));
  });
});
