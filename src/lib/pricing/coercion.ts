/**
 * Cell-level numeric parsing for report values
 *
 * Required values (ordered product sales) are parsed strictly and fail the run.
 * Optional values fall back to the defaults in COERCION_FALLBACKS.
 */

const DECIMAL_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const CURRENCY_SYMBOLS = /[$,]/g;

/**
 * Fallback applied when an optional cell is missing or not numeric
 */
export const COERCION_FALLBACKS = {
  units_ordered: 0,
  available: 0,
} as const;

/**
 * Parse a decimal number, or null when the text is not one
 */
export function parseDecimal(raw: string | undefined): number | null {
  if (raw === undefined) {
    return null;
  }
  const text = raw.trim();
  if (!DECIMAL_PATTERN.test(text)) {
    return null;
  }
  const value = Number(text);
  return Number.isFinite(value) ? value : null;
}

/**
 * Parse a currency string such as "$1,234.50" by dropping `$` and `,`
 */
export function parseCurrency(raw: string | undefined): number | null {
  if (raw === undefined) {
    return null;
  }
  return parseDecimal(raw.replace(CURRENCY_SYMBOLS, ''));
}

/**
 * Parse an optional cell, using `fallback` when it is missing or not a number
 */
export function coerceNumber(raw: string | undefined, fallback: number): number {
  return parseDecimal(raw) ?? fallback;
}

/**
 * Drop the fractional part, rounding toward zero
 */
export function truncate(value: number): number {
  return Math.trunc(value);
}

// Digits past the rounding position inspected when looking for an exact tie
const TIE_CHECK_DIGITS = 20;

/**
 * Round to `digits` decimal places. Exact ties go to the even neighbour;
 * everything else rounds to the nearest decimal of the stored binary value.
 */
export function roundTo(value: number, digits: number): number {
  let rounded: number;
  if (isExactTie(value, digits)) {
    const scaled = value * 10 ** digits;
    const floor = Math.floor(scaled);
    rounded = (floor % 2 === 0 ? floor : floor + 1) / 10 ** digits;
  } else {
    rounded = Number(value.toFixed(digits));
  }
  // toFixed keeps the sign of tiny negatives ("-0.00")
  return Object.is(rounded, -0) ? 0 : rounded;
}

/**
 * True when the stored value lies exactly halfway between two `digits`-place decimals
 */
function isExactTie(value: number, digits: number): boolean {
  // toFixed writes the exact decimal expansion of the double
  const expanded = Math.abs(value).toFixed(digits + TIE_CHECK_DIGITS);
  return expanded.endsWith('5'.padEnd(TIE_CHECK_DIGITS, '0'));
}
