import { METRICS, type Metric, type MetricDefinition } from '../core/types.js';

/**
 * The tracked metric vocabulary.
 *
 * Concepts are ordered by priority (try first = index 0). Multiple
 * concepts exist because the US-GAAP taxonomy evolves and filers use
 * different tags for the same economic meaning. A concept listed under
 * more than one metric belongs to whichever metric comes first in METRICS.
 */

export const METRIC_TABLE_VERSION = 3;

const DEFINITIONS: Record<Metric, MetricDefinition> = {
  revenue: {
    id: 'revenue',
    display_name: 'Revenue',
    description: 'Total revenue / net sales for the period',
    statement_type: 'income_statement',
    units: ['USD'],
    unit_type: 'currency',
    aggregation: 'sum',
    concepts: [
      'RevenueFromContractWithCustomerExcludingAssessedTax',
      'Revenues',
      'SalesRevenueNet',
      'RevenueFromContractWithCustomerIncludingAssessedTax',
      'TotalRevenuesAndOtherIncome',
      'SalesRevenueGoodsNet',
      'SalesRevenueServicesNet',
      'RevenuesNetOfInterestExpense',
      'ServiceRevenues',
      'RevenueNotFromContractWithCustomerExcludingInterestIncome',
    ],
  },
  gross_profit: {
    id: 'gross_profit',
    display_name: 'Gross Profit',
    description: 'Revenue less cost of revenue',
    statement_type: 'income_statement',
    units: ['USD'],
    unit_type: 'currency',
    aggregation: 'sum',
    concepts: [
      'GrossProfit',
      'GrossProfitLoss',
    ],
  },
  operating_income: {
    id: 'operating_income',
    display_name: 'Operating Income',
    description: 'Income (loss) from operations',
    statement_type: 'income_statement',
    units: ['USD'],
    unit_type: 'currency',
    aggregation: 'sum',
    concepts: [
      'OperatingIncomeLoss',
      'IncomeLossFromOperations',
      'OperatingIncomeLossBeforeIncomeTaxExpenseBenefit',
    ],
  },
  net_income: {
    id: 'net_income',
    display_name: 'Net Income',
    description: 'Net income (loss) attributable to the company',
    statement_type: 'income_statement',
    units: ['USD'],
    unit_type: 'currency',
    aggregation: 'sum',
    concepts: [
      'NetIncomeLoss',
      'NetIncomeLossAttributableToParent',
      'ProfitLoss',
      'NetIncomeLossAvailableToCommonStockholdersBasic',
      'NetIncomeLossAvailableToCommonStockholdersDiluted',
    ],
  },
  diluted_eps: {
    id: 'diluted_eps',
    display_name: 'Diluted EPS',
    description: 'Earnings per share, diluted',
    statement_type: 'income_statement',
    units: ['USD/shares'],
    unit_type: 'per_share',
    aggregation: 'sum',
    concepts: [
      'EarningsPerShareDiluted',
      'EarningsPerShareBasicAndDiluted',
      'IncomeLossFromContinuingOperationsPerDilutedShare',
    ],
  },
  basic_eps: {
    id: 'basic_eps',
    display_name: 'Basic EPS',
    description: 'Earnings per share, basic',
    statement_type: 'income_statement',
    units: ['USD/shares'],
    unit_type: 'per_share',
    aggregation: 'sum',
    concepts: [
      'EarningsPerShareBasic',
      'EarningsPerShareBasicAndDiluted',
      'IncomeLossFromContinuingOperationsPerBasicShare',
    ],
  },
  operating_cash_flow: {
    id: 'operating_cash_flow',
    display_name: 'Operating Cash Flow',
    description: 'Net cash provided by operating activities',
    statement_type: 'cash_flow',
    units: ['USD'],
    unit_type: 'currency',
    aggregation: 'sum',
    concepts: [
      'NetCashProvidedByUsedInOperatingActivities',
      'NetCashProvidedByUsedInOperatingActivitiesContinuingOperations',
    ],
  },
  total_assets: {
    id: 'total_assets',
    display_name: 'Total Assets',
    description: 'Total assets at period end',
    statement_type: 'balance_sheet',
    units: ['USD'],
    unit_type: 'currency',
    aggregation: 'end_of_period',
    concepts: [
      'Assets',
    ],
  },
  total_liabilities: {
    id: 'total_liabilities',
    display_name: 'Total Liabilities',
    description: 'Total liabilities at period end',
    statement_type: 'balance_sheet',
    units: ['USD'],
    unit_type: 'currency',
    aggregation: 'end_of_period',
    concepts: [
      'Liabilities',
    ],
  },
};

for (const def of Object.values(DEFINITIONS)) {
  Object.freeze(def.units);
  Object.freeze(def.concepts);
  Object.freeze(def);
}
Object.freeze(DEFINITIONS);

/** Definitions in metric priority order */
export const METRIC_DEFINITIONS: readonly MetricDefinition[] = Object.freeze(
  METRICS.map(id => DEFINITIONS[id])
);

export function getMetricDefinition(id: Metric): MetricDefinition {
  return DEFINITIONS[id];
}

export function isMetric(value: string): value is Metric {
  return METRICS.some(m => m === value);
}

/** Lookup a metric by id, display name or keyword (case-insensitive) */
export function findMetricByName(name: string): MetricDefinition | undefined {
  const lower = name.toLowerCase().trim();

  const byId = METRIC_DEFINITIONS.find(m => m.id === lower);
  if (byId) return byId;

  const byName = METRIC_DEFINITIONS.find(m => m.display_name.toLowerCase() === lower);
  if (byName) return byName;

  // Longer phrases first so "operating cash flow" isn't taken by "operating"
  const keywords: Array<[string, Metric]> = [
    ['operating cash flow', 'operating_cash_flow'],
    ['cash from operations', 'operating_cash_flow'],
    ['ocf', 'operating_cash_flow'],
    ['gross profit', 'gross_profit'],
    ['gross margin', 'gross_profit'],
    ['operating income', 'operating_income'],
    ['operating profit', 'operating_income'],
    ['ebit', 'operating_income'],
    ['net income', 'net_income'],
    ['bottom line', 'net_income'],
    ['earnings per share', 'diluted_eps'],
    ['profit', 'net_income'],
    ['earnings', 'net_income'],
    ['basic eps', 'basic_eps'],
    ['diluted eps', 'diluted_eps'],
    ['eps', 'diluted_eps'],
    ['top line', 'revenue'],
    ['revenue', 'revenue'],
    ['sales', 'revenue'],
    ['assets', 'total_assets'],
    ['liabilities', 'total_liabilities'],
  ];

  for (const [keyword, metricId] of keywords) {
    if (lower.includes(keyword)) {
      return DEFINITIONS[metricId];
    }
  }

  return undefined;
}

export interface MetricListParse {
  metrics: Metric[];
  unknown: string[];
}

/**
 * Parse a comma-separated metric list ("revenue, net income, eps").
 * Duplicates collapse; the result keeps metric priority order.
 */
export function parseMetricList(input: string): MetricListParse {
  const found = new Set<Metric>();
  const unknown: string[] = [];

  for (const part of input.split(',')) {
    const name = part.trim();
    if (!name) continue;
    const def = findMetricByName(name);
    if (def) found.add(def.id);
    else unknown.push(name);
  }

  return { metrics: METRICS.filter(m => found.has(m)), unknown };
}
