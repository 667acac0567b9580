/**
 * Shared formatting utilities for output renderers.
 */

import type { GrowthResult, MetricDefinition } from '../core/types.js';

/** Pad a string to a minimum length, accounting for ANSI escape sequences */
export function padRight(str: string, len: number): string {
  const stripped = str.replace(/\x1b\[[0-9;]*m/g, '');
  const padding = Math.max(0, len - stripped.length);
  return str + ' '.repeat(padding);
}

/** Escape a value for CSV output (quote if it contains commas, quotes or line breaks) */
export function csvEscape(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function formatCurrency(value: number): string {
  const abs = Math.abs(value);
  const sign = value < 0 ? '-' : '';

  if (abs >= 1e12) return `${sign}$${(abs / 1e12).toFixed(2)}T`;
  if (abs >= 1e9) return `${sign}$${(abs / 1e9).toFixed(2)}B`;
  if (abs >= 1e6) return `${sign}$${(abs / 1e6).toFixed(2)}M`;
  if (abs >= 1e3) return `${sign}$${(abs / 1e3).toFixed(2)}K`;
  return `${sign}$${abs.toFixed(0)}`;
}

export function formatPerShare(value: number): string {
  return `${value < 0 ? '-' : ''}$${Math.abs(value).toFixed(2)}`;
}

export function formatValue(value: number, metric: MetricDefinition): string {
  return metric.unit_type === 'per_share' ? formatPerShare(value) : formatCurrency(value);
}

/** A fractional rate as a signed percentage, e.g. 0.125 -> "+12.5%" */
export function formatRate(rate: number): string {
  const pct = rate * 100;
  const rounded = Math.round(pct * 10) / 10;
  return (rounded > 0 ? '+' : '') + rounded.toFixed(1) + '%';
}

/**
 * Text for a growth result. Non-computable rates get a distinct label so
 * they can't be mistaken for 0% or a blank.
 */
export function describeGrowth(result: GrowthResult): string {
  switch (result.caveat) {
    case 'none':
      return formatRate(result.rate);
    case 'zero_base':
      return 'n/a (zero base)';
    case 'insufficient_data':
      return 'n/a (missing period)';
    case 'sign_flip':
      if (result.start_value !== null && result.end_value !== null) {
        if (result.start_value < 0 && result.end_value > 0) return 'Turned positive';
        if (result.start_value > 0 && result.end_value < 0) return 'Turned negative';
      }
      return 'n/a (negative values)';
  }
}
