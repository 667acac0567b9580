import { InvalidTickerError } from '../core/errors.js';
import type { NormalizedTicker } from '../core/types.js';

/**
 * Ticker normalization: raw user input -> the symbol form SEC's ticker
 * index uses. Share-class suffixes are hyphenated there (BRK-A), so a dot
 * separator is rewritten before validation.
 */

/** 1-5 letters, optionally a hyphen and a one-letter share class */
const VALID_TICKER = /^[A-Z]{1,5}(-[A-Z])?$/;

export const TICKER_CORRECTIONS_VERSION = '2025-01';

/**
 * Symbols that moved after a rename or merger.
 * Keys and values are in normalized (hyphenated, upper-case) form.
 */
export const TICKER_CORRECTIONS: Readonly<Record<string, string>> = Object.freeze({
  'FB': 'META',
  'ANTM': 'ELV',
  'VIAC': 'PARA',
  'UTX': 'RTX',
  'RTN': 'RTX',
  'SQ': 'XYZ',
  'BRK': 'BRK-B',
  'BF': 'BF-B',
});

/**
 * Normalize a raw ticker.
 * Throws InvalidTickerError with a human-readable reason when the input
 * can't be a ticker.
 */
export function normalizeTicker(raw: string): NormalizedTicker {
  const warnings: string[] = [];
  const cleaned = raw.trim().toUpperCase();

  if (!cleaned) {
    throw new InvalidTickerError(raw, 'Ticker symbol required', ["Enter a ticker symbol such as 'AAPL'"]);
  }

  if (cleaned.length > 10 || /\s/.test(cleaned)) {
    throw new InvalidTickerError(
      raw,
      `'${raw.trim()}' doesn't look like a ticker symbol. Try 'AAPL' or 'MSFT'`,
      suggestionsFor(cleaned)
    );
  }

  let symbol = cleaned.replace(/^([A-Z]{1,5})\.([A-Z])$/, '$1-$2');
  if (symbol !== cleaned) {
    warnings.push(`Converted ${cleaned} to ${symbol}`);
  }

  const corrected = TICKER_CORRECTIONS[symbol];
  if (corrected) {
    warnings.push(`Converted ${symbol} to ${corrected}`);
    symbol = corrected;
  }

  if (!VALID_TICKER.test(symbol)) {
    throw new InvalidTickerError(raw, `'${symbol}' is not a valid ticker format`, suggestionsFor(symbol));
  }

  return { symbol, input: raw, warnings };
}

export type TickerValidation =
  | { success: true; ticker: NormalizedTicker; message: string }
  | { success: false; error: InvalidTickerError; message: string };

/** Non-throwing variant for UIs that re-prompt */
export function validateTicker(raw: string): TickerValidation {
  try {
    const ticker = normalizeTicker(raw);
    return { success: true, ticker, message: `Analyzing ${ticker.symbol}...` };
  } catch (err) {
    if (err instanceof InvalidTickerError) {
      return { success: false, error: err, message: err.reason };
    }
    throw err;
  }
}

/** Hints for common mistakes */
function suggestionsFor(input: string): string[] {
  const suggestions: string[] = [];

  if (/\s/.test(input)) {
    suggestions.push("Use the ticker symbol (e.g., 'AAPL'), not the company name");
  }

  if (/\d/.test(input)) {
    suggestions.push('Ticker symbols contain letters only');
  }

  const base = input.split(/[.\-/]/)[0];
  if (base.length > 5) {
    suggestions.push('Most ticker symbols are 1-4 letters (AAPL, MSFT, GOOGL)');
  }

  if (/^[A-Z]{1,5}[^A-Z0-9\s.-][A-Z]$/.test(input)) {
    suggestions.push(`Write share classes with a dot or hyphen, e.g. '${input.slice(0, -2)}.${input.slice(-1)}'`);
  }

  return suggestions;
}
