/**
 * Core analysis execution engine.
 *
 * Glues the collaborators to the pipeline: normalize the ticker, resolve
 * the registrant, fetch and deserialize its facts, analyze. Returns data
 * (never prints) so the CLI, the HTTP API and the MCP server share it.
 */

import { normalizeTicker } from '../processing/ticker-normalizer.js';
import { toRawFacts, trailingWindowStart } from '../processing/facts-deserializer.js';
import { analyzeFacts } from '../analysis/analyzer.js';
import { resolveCompany } from './resolver.js';
import { getSecClient, type SecClient } from './sec-client.js';
import { getConfig } from './config.js';
import { createLogger } from './logger.js';
import {
  CompanyNotFoundError,
  DataParseError,
  InvalidTickerError,
  NotFoundError,
  RateLimitError,
  SecApiError,
} from './errors.js';
import type { AnalysisResult, Metric, NormalizedTicker } from './types.js';

const log = createLogger('engine');

export interface AnalyzeParams {
  ticker: string;
  years?: number;
  metrics?: readonly Metric[];
  cagrYears?: number;
  asOf?: Date;
}

export type EngineErrorType =
  | 'invalid_ticker'
  | 'company_not_found'
  | 'no_data'
  | 'rate_limited'
  | 'api_error';

export interface EngineError {
  type: EngineErrorType;
  message: string;
  suggestions?: string[];
}

export type AnalyzeEngineResult =
  | { success: true; ticker: NormalizedTicker; result: AnalysisResult }
  | { success: false; error: EngineError };

/**
 * Analyze one company end to end.
 * Expected failures come back as typed errors; anything else is a bug and is thrown.
 */
export async function analyzeCompany(
  params: AnalyzeParams,
  client: SecClient = getSecClient()
): Promise<AnalyzeEngineResult> {
  const years = params.years ?? getConfig().trailingYears;
  const asOf = params.asOf ?? new Date();

  try {
    const ticker = normalizeTicker(params.ticker);
    for (const w of ticker.warnings) log.info(w);

    const company = await resolveCompany(ticker, client);
    log.debug(`resolved ${ticker.symbol} to CIK ${company.cik} (${company.name})`);

    const companyFacts = await client.getCompanyFacts(company.cik);
    const facts = toRawFacts(companyFacts, { since: trailingWindowStart(years, asOf) });
    log.debug(`${facts.length} periodic facts for ${ticker.symbol} since ${trailingWindowStart(years, asOf)}`);

    const analysis = analyzeFacts(facts, {
      metrics: params.metrics,
      years,
      cagrYears: params.cagrYears,
      asOf,
    });

    return {
      success: true,
      ticker,
      result: {
        ...analysis,
        company,
        warnings: [...ticker.warnings, ...analysis.warnings],
      },
    };
  } catch (err) {
    const error = toEngineError(err);
    if (!error) throw err;
    log.debug(`${params.ticker}: ${error.type}: ${error.message}`);
    return { success: false, error };
  }
}

/** Map an expected failure to an engine error; null for anything unexpected */
export function toEngineError(err: unknown): EngineError | null {
  if (err instanceof InvalidTickerError) {
    return { type: 'invalid_ticker', message: err.reason, suggestions: err.suggestions };
  }
  if (err instanceof CompanyNotFoundError) {
    return { type: 'company_not_found', message: err.message, suggestions: err.suggestions };
  }
  if (err instanceof NotFoundError) {
    return { type: 'no_data', message: 'SEC has no XBRL financial data for this company.' };
  }
  if (err instanceof RateLimitError) {
    return { type: 'rate_limited', message: err.message };
  }
  if (err instanceof SecApiError || err instanceof DataParseError) {
    return { type: 'api_error', message: err.message };
  }
  return null;
}
