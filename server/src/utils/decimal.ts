/**
 * Decimal.js helpers for displaying money
 *
 * Tax arithmetic runs on plain numbers with no intermediate rounding.
 * Rounding happens here, once, when a figure is shown to the user.
 */

import Decimal from 'decimal.js';

// Precision: 20 significant digits
// Rounding: ROUND_HALF_UP for displayed rupee amounts
Decimal.set({
  precision: 20,
  rounding: Decimal.ROUND_HALF_UP,
  toExpNeg: -9e15,  // Don't use exponential notation for small numbers
  toExpPos: 9e15    // Don't use exponential notation for large numbers
});

function groupThousands(digits: string): string {
  return digits.replace(/\B(?=(\d{3})+(?!\d))/g, ',');
}

/**
 * Format with thousands separators and 2 decimals
 * Example: formatAmount(9700000) = '9,700,000.00'
 */
export function formatAmount(value: number): string {
  if (!Number.isFinite(value)) return String(value);

  const [whole, fraction] = new Decimal(value).toFixed(2).split('.');
  return `${groupThousands(whole)}.${fraction}`;
}

/**
 * Format a whole amount with thousands separators and no decimals
 * Example: formatWhole(600000) = '600,000'
 */
export function formatWhole(value: number): string {
  return groupThousands(new Decimal(value).toFixed(0));
}

export function formatRupees(value: number): string {
  return `Rs. ${formatAmount(value)}`;
}

/**
 * Express a fractional rate as a percentage without float noise
 * Example: formatPercent(0.11) = '11' (0.11 * 100 is 11.000000000000002 in floating point)
 */
export function formatPercent(rate: number): string {
  return new Decimal(rate).times(100).toString();
}
