import { getSecClient, type SecClient } from './sec-client.js';
import { CompanyNotFoundError } from './errors.js';
import type { CikLookup, NormalizedTicker } from './types.js';

/**
 * Company resolver: normalized ticker -> CIK.
 *
 * Uses SEC's company tickers JSON, which maps every listed ticker to a CIK.
 * The index is loaded once per client and cached on disk for 7 days since
 * tickers rarely change.
 */

const indexes = new WeakMap<SecClient, Map<string, CikLookup>>();

async function loadIndex(client: SecClient): Promise<Map<string, CikLookup>> {
  const existing = indexes.get(client);
  if (existing) return existing;

  const index = new Map<string, CikLookup>();
  for (const entry of await client.getCompanyTickers()) {
    // First listing wins; SEC orders the file by market cap
    if (!index.has(entry.ticker)) index.set(entry.ticker, entry);
  }
  indexes.set(client, index);
  return index;
}

/**
 * Resolve a normalized ticker to its registrant.
 * Throws CompanyNotFoundError with up to 5 similar tickers when there is no exact match.
 */
export async function resolveCompany(
  ticker: NormalizedTicker,
  client: SecClient = getSecClient()
): Promise<CikLookup> {
  const index = await loadIndex(client);

  const exact = index.get(ticker.symbol);
  if (exact) return exact;

  throw new CompanyNotFoundError(ticker.symbol, similarTickers(ticker.symbol, index.keys()));
}

/**
 * Tickers extending the base symbol (before any share-class suffix), or the
 * base minus its last letter, shortest first.
 */
export function similarTickers(symbol: string, known: Iterable<string>, limit: number = 5): string[] {
  const base = symbol.split('-')[0];
  const trimmed = base.length > 2 ? base.slice(0, -1) : null;
  const matches: string[] = [];
  for (const candidate of known) {
    if (candidate === symbol) continue;
    if (candidate.startsWith(base) || candidate === trimmed) {
      matches.push(candidate);
    }
  }
  return matches
    .sort((a, b) => a.length - b.length || a.localeCompare(b))
    .slice(0, limit);
}
