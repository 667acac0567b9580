/**
 * MCP tool handlers. Kept apart from the transport so they can be called
 * directly; each returns a CallTool-shaped result.
 */

import { analyzeCompany, type EngineError } from '../core/analysis-engine.js';
import { getSecClient, type SecClient } from '../core/sec-client.js';
import { METRIC_DEFINITIONS, METRIC_TABLE_VERSION } from '../processing/metric-definitions.js';
import { validateTicker } from '../processing/ticker-normalizer.js';
import { toJsonPayload } from '../output/json-renderer.js';
import type { Metric } from '../core/types.js';

export interface ToolResult {
  [key: string]: unknown;
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
}

function text(value: string, isError: boolean = false): ToolResult {
  return isError
    ? { content: [{ type: 'text', text: value }], isError: true }
    : { content: [{ type: 'text', text: value }] };
}

function describeError(error: EngineError): string {
  let errorText = error.message;
  if (error.type === 'invalid_ticker' && error.suggestions?.length) {
    errorText += '\n\n' + error.suggestions.map(s => `  ${s}`).join('\n');
  }
  return errorText;
}

export interface AnalyzeToolArgs {
  ticker: string;
  metrics?: Metric[];
  years?: number;
  cagr_years?: number;
}

export async function analyzeCompanyTool(
  args: AnalyzeToolArgs,
  client: SecClient = getSecClient()
): Promise<ToolResult> {
  const outcome = await analyzeCompany(
    { ticker: args.ticker, metrics: args.metrics, years: args.years, cagrYears: args.cagr_years },
    client
  );
  if (!outcome.success) return text(describeError(outcome.error), true);

  return text(JSON.stringify({ ticker: outcome.ticker, ...toJsonPayload(outcome.result) }, null, 2));
}

export function normalizeTickerTool(args: { ticker: string }): ToolResult {
  const result = validateTicker(args.ticker);
  if (!result.success) {
    const hints = result.error.suggestions.map(s => `  ${s}`).join('\n');
    return text(hints ? `${result.message}\n\n${hints}` : result.message, true);
  }
  return text(JSON.stringify(result.ticker, null, 2));
}

export function listMetricsTool(): ToolResult {
  return text(JSON.stringify({
    version: METRIC_TABLE_VERSION,
    metrics: METRIC_DEFINITIONS.map(m => ({
      id: m.id,
      display_name: m.display_name,
      description: m.description,
      statement_type: m.statement_type,
      unit_type: m.unit_type,
    })),
  }, null, 2));
}
