/**
 * Decimal.js Utilities for the Option Edge Calculator
 *
 * Always use Decimal for prices and rates inside the core.
 * Convert to number only for presentation.
 */

import { Decimal } from 'decimal.js';

export { Decimal };

// Configure Decimal.js for financial calculations
Decimal.set({
  precision: 20,
  rounding: Decimal.ROUND_HALF_UP,
  toExpNeg: -9,
  toExpPos: 9,
});

// Plain decimal or exponent notation, nothing else
const NUMERIC_TEXT = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

// ============================================================================
// CONVERSION UTILITIES
// ============================================================================

/**
 * Convert number to Decimal safely
 */
export function toDecimal(value: Decimal.Value): Decimal {
  if (value instanceof Decimal) {
    return value;
  }
  return new Decimal(value);
}

/**
 * Parse user-entered text, returns undefined when it is not a finite number
 */
export function parseDecimal(text: string): Decimal | undefined {
  const trimmed = text.trim();
  if (!NUMERIC_TEXT.test(trimmed)) {
    return undefined;
  }
  const value = new Decimal(trimmed);
  return value.isFinite() ? value : undefined;
}

/**
 * Round to display precision and convert to number (only for display).
 * A value that rounds to zero is returned as 0, never -0.
 */
export function toDisplayNumber(value: Decimal, decimals = 2): number {
  const rounded = value.toDecimalPlaces(decimals, Decimal.ROUND_HALF_UP);
  return rounded.isZero() ? 0 : rounded.toNumber();
}

/**
 * Format with sign (for edge display)
 */
export function formatWithSign(value: number, decimals = 2): string {
  const sign = value > 0 ? '+' : '';
  return `${sign}${value.toFixed(decimals)}`;
}

// ============================================================================
// VALIDATION
// ============================================================================

/**
 * Check if value is strictly positive and finite
 */
export function isPositive(value: Decimal): boolean {
  return value.isFinite() && value.greaterThan(0);
}

// ============================================================================
// CONSTANTS
// ============================================================================

export const ONE = new Decimal(1);
export const TWO = new Decimal(2);
