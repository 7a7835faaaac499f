/**
 * Shared formatting utilities for displaying line items and ratios.
 *
 * Formatters return a fallback string for values that are not finite numbers,
 * so a missing figure never renders as 0 or NaN.
 */
import type { CellValue } from '../domain/dataset';
import type { PeerAverage } from '../domain/ratios';

/**
 * Format a decimal as a percentage.
 * @param v - Decimal value (e.g., 0.05 for 5%)
 * @param digits - Number of decimal places
 * @param fallback - String to return if value is not finite
 */
export const formatPct = (v: number | undefined, digits = 2, fallback = 'N/A'): string =>
  v !== undefined && Number.isFinite(v) ? `${(v * 100).toFixed(digits)}%` : fallback;

/**
 * Format a difference between two decimals in percentage points with a sign.
 * @param v - Decimal difference (e.g., 0.012 for +1.20pp)
 */
export const formatSignedPoints = (v: number | undefined, digits = 2, fallback = 'N/A'): string => {
  if (v === undefined || !Number.isFinite(v)) return fallback;
  const sign = v >= 0 ? '+' : '';
  return `${sign}${(v * 100).toFixed(digits)}pp`;
};

/** Fixed-precision number. */
export const formatNumber = (v: number | undefined, digits = 2, fallback = 'N/A'): string =>
  v !== undefined && Number.isFinite(v) ? v.toFixed(digits) : fallback;

/**
 * Thousands-separated number, keeping up to two decimals.
 * @param v - Raw value (e.g., 1234567.5 for "1,234,567.5")
 */
export const formatThousands = (v: number, fallback = '—'): string => {
  if (!Number.isFinite(v)) return fallback;
  const sign = v < 0 ? '-' : '';
  const [whole, frac] = Math.abs(v).toFixed(2).replace(/\.?0+$/, '').split('.');
  const grouped = whole.replace(/\B(?=(\d{3})+(?!\d))/g, ',');
  return frac ? `${sign}${grouped}.${frac}` : `${sign}${grouped}`;
};

/** Spreadsheet cell for tables: numbers grouped, text and blanks as a dash. */
export const formatCell = (v: CellValue | undefined, fallback = '—'): string =>
  typeof v === 'number' ? formatThousands(v, fallback) : fallback;

/** Headline for a peer average; partial averages say so. */
export const formatAverage = (average: PeerAverage, digits = 2): string => {
  switch (average.kind) {
    case 'complete':
      return formatPct(average.value, digits);
    case 'partial':
      return `${formatPct(average.value, digits)} (partial, ${average.contributors} of ${average.total})`;
    case 'unavailable':
      return 'N/A';
  }
};

/**
 * Format a ratio for chart axis ticks; whole percentages once values reach 10%.
 */
export const formatAxisValue = (value: number): string => {
  if (!Number.isFinite(value)) return '';
  const pct = value * 100;
  return `${pct.toFixed(Math.abs(pct) >= 10 ? 0 : 1)}%`;
};
